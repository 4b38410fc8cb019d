import { randomUUID } from 'node:crypto'
import { NotFoundError, errorMessage } from '@/lib/rag/errors'
import { KeyedLock } from './keyed-lock'
import { Session, type SessionDeps, type SessionInfo } from './session'

export type SessionFactory = (id: string, lock: KeyedLock) => Session

export function createSessionFactory(deps: Omit<SessionDeps, 'lock'>): SessionFactory {
  return (id, lock) => new Session(id, { ...deps, lock })
}

/**
 * Owns every live session.\n
 * Lookups and deletes are keyed by id; a delete waits for the session's
 * in-flight operation before tearing it down.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, Session>()
  private readonly lock = new KeyedLock()

  constructor(
    private readonly factory: SessionFactory,
    private readonly newId: () => string = randomUUID
  ) {}

  create(): Session {
    let id = this.newId()
    while (this.sessions.has(id)) id = this.newId()
    const session = this.factory(id, this.lock)
    this.sessions.set(id, session)
    console.log('[session]', JSON.stringify({ sessionId: id, stage: 'registered', total: this.sessions.size }))
    return session
  }

  get(id: string): Session {
    const session = this.sessions.get(id)
    if (!session) throw new NotFoundError(`Session not found: ${id}`)
    return session
  }

  exists(id: string) {
    return this.sessions.has(id)
  }

  /**
   * Returns false when the session did not exist.\n
   * The session is unregistered and closed even when removing its files
   * fails; that failure is rethrown so the caller can report it.
   */
  async delete(id: string): Promise<boolean> {
    const session = this.sessions.get(id)
    if (!session) return false
    this.sessions.delete(id)
    try {
      await session.cleanup()
    } catch (e) {
      console.error('[session]', JSON.stringify({ sessionId: id, stage: 'cleanup_failed', error: errorMessage(e) }))
      throw e
    }
    console.log('[session]', JSON.stringify({ sessionId: id, stage: 'deleted', total: this.sessions.size }))
    return true
  }

  list(): string[] {
    return Array.from(this.sessions.keys())
  }

  info(id: string): SessionInfo {
    return this.get(id).info()
  }

  /** Delete every session; one failed cleanup does not stop the others. */
  async cleanupAll() {
    const results = await Promise.allSettled(this.list().map((id) => this.delete(id)))
    const failed = results.filter((r) => r.status === 'rejected').length
    console.log('[session]', JSON.stringify({ stage: 'all_cleaned_up', total: results.length, failed }))
  }
}
