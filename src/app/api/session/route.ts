import { getAppContext } from '@/lib/app-context'
import { createRouteHandlers } from '@/lib/http/handlers'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

export async function POST() {
  return createRouteHandlers(getAppContext()).createSession()
}
