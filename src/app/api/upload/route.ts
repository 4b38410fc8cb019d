import type { NextRequest } from 'next/server'
import { getAppContext } from '@/lib/app-context'
import { createRouteHandlers } from '@/lib/http/handlers'

export const runtime = 'nodejs'
export const maxDuration = 300
export const dynamic = 'force-dynamic'

export async function POST(req: NextRequest) {
  return createRouteHandlers(getAppContext()).upload(req)
}
