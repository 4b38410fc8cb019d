import { NextResponse, type NextRequest } from 'next/server'
import type { AppContext } from '@/lib/app-context'
import { NotFoundError, ValidationError, errorMessage, httpStatusForError } from '@/lib/rag/errors'
import type { UploadedFile } from '@/lib/session/session'
import { isPdfFileName, sanitizeUploadName } from '@/lib/storage/upload-name'

function makeTraceId() {
  return typeof globalThis.crypto?.randomUUID === 'function'
    ? globalThis.crypto.randomUUID()
    : `${Date.now().toString(36)}-${Math.random().toString(16).slice(2)}`
}

function errorResponse(tag: string, e: unknown) {
  const status = httpStatusForError(e)
  if (status >= 500) {
    console.error(`[api] ${tag} failed:`, e)
  } else {
    console.warn(`[api] ${tag} rejected: ${errorMessage(e)}`)
  }
  return NextResponse.json({ error: errorMessage(e) }, { status })
}

function requireString(value: unknown, field: string): string {
  if (typeof value !== 'string' || !value) {
    throw new ValidationError(`${field} is required`)
  }
  return value
}

async function readJson(req: NextRequest): Promise<Record<string, unknown>> {
  const body: unknown = await req.json().catch(() => null)
  if (!body || typeof body !== 'object' || Array.isArray(body)) {
    throw new ValidationError('Request body must be a JSON object')
  }
  return Object.fromEntries(Object.entries(body))
}

/**
 * Transport handlers over an app context.\n
 * Route modules bind these to the process-wide context; tests pass their own.
 */
export function createRouteHandlers(ctx: AppContext) {
  const { registry, config } = ctx

  return {
    async createSession() {
      try {
        const session = registry.create()
        return NextResponse.json({ session_id: session.id, message: 'Session created successfully' })
      } catch (e) {
        return errorResponse('create session', e)
      }
    },

    async getSessionInfo(sessionId: string) {
      try {
        return NextResponse.json(registry.info(sessionId))
      } catch (e) {
        return errorResponse('get session info', e)
      }
    },

    async deleteSession(sessionId: string) {
      try {
        if (!(await registry.delete(sessionId))) throw new NotFoundError(`Session not found: ${sessionId}`)
        return NextResponse.json({ message: 'Session deleted successfully' })
      } catch (e) {
        return errorResponse('delete session', e)
      }
    },

    async upload(req: NextRequest) {
      try {
        const formData = await req.formData().catch(() => {
          throw new ValidationError('Expected multipart form data')
        })
        const sessionId = requireString(formData.get('session_id'), 'session_id')
        const session = registry.get(sessionId)

        const entries = formData.getAll('files')
        if (!entries.length) throw new ValidationError('files is required')

        // Validate every file before writing any of them.
        const files: File[] = []
        for (const entry of entries) {
          if (typeof entry === 'string') throw new ValidationError('files must be file uploads')
          if (!isPdfFileName(entry.name)) {
            throw new ValidationError(`Only PDF files are allowed: ${entry.name}`)
          }
          if (entry.size > config.maxUploadBytes) {
            throw new ValidationError(`File size exceeds ${Math.floor(config.maxUploadBytes / (1024 * 1024))}MB limit: ${entry.name}`)
          }
          files.push(entry)
        }

        const uploads: UploadedFile[] = []
        for (const file of files) {
          const { sanitized, changed } = sanitizeUploadName(file.name)
          if (changed) {
            console.log('[api] upload filename sanitized:', JSON.stringify({ original: file.name, sanitized }))
          }
          uploads.push({ name: sanitized, bytes: new Uint8Array(await file.arrayBuffer()) })
        }

        const result = await session.upload(uploads)
        return NextResponse.json({
          message: 'Documents uploaded and processed successfully',
          documents: result.documents,
          total_chunks: result.totalChunks,
          skipped: result.failed.map((f) => f.path.split(/[\\/]/).pop()),
        })
      } catch (e) {
        return errorResponse('upload documents', e)
      }
    },

    async ask(req: NextRequest) {
      try {
        const body = await readJson(req)
        const sessionId = requireString(body.session_id, 'session_id')
        if (typeof body.question !== 'string') throw new ValidationError('question is required')
        // Stored documents carry sanitized names; accept the name as uploaded too.
        const sourceFilter =
          typeof body.source === 'string' && body.source ? sanitizeUploadName(body.source).sanitized : undefined

        const session = registry.get(sessionId)
        const response = await session.ask(body.question, { traceId: makeTraceId(), sourceFilter })

        return NextResponse.json({
          answer: response.answer,
          references: response.references,
          chunks_used: response.chunksUsed,
          sources: response.sources,
        })
      } catch (e) {
        return errorResponse('ask question', e)
      }
    },

    async getDocuments(sessionId: string) {
      try {
        return NextResponse.json({ documents: registry.get(sessionId).getDocuments() })
      } catch (e) {
        return errorResponse('get documents', e)
      }
    },

    async getHistory(sessionId: string) {
      try {
        return NextResponse.json({ history: registry.get(sessionId).getChatHistory() })
      } catch (e) {
        return errorResponse('get chat history', e)
      }
    },

    async clearHistory(sessionId: string) {
      try {
        await registry.get(sessionId).clearChat()
        return NextResponse.json({ message: 'Chat history cleared' })
      } catch (e) {
        return errorResponse('clear chat history', e)
      }
    },
  }
}

export type RouteHandlers = ReturnType<typeof createRouteHandlers>
