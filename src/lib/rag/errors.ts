export type RagErrorCode =
  | 'not_found'
  | 'validation'
  | 'document_load'
  | 'ingestion'
  | 'index'
  | 'retrieval'
  | 'generation'

export class RagError extends Error {
  readonly code: RagErrorCode

  constructor(code: RagErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'RagError'
    this.code = code
  }
}

export class NotFoundError extends RagError {
  constructor(message: string) {
    super('not_found', message)
    this.name = 'NotFoundError'
  }
}

export class ValidationError extends RagError {
  constructor(message: string) {
    super('validation', message)
    this.name = 'ValidationError'
  }
}

export class DocumentLoadError extends RagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('document_load', message, options)
    this.name = 'DocumentLoadError'
  }
}

export class IngestionError extends RagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ingestion', message, options)
    this.name = 'IngestionError'
  }
}

/** Semantic index / vector store failure. Lexical failures never surface. */
export class IndexError extends RagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('index', message, options)
    this.name = 'IndexError'
  }
}

export class RetrievalError extends RagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('retrieval', message, options)
    this.name = 'RetrievalError'
  }
}

export class GenerationError extends RagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('generation', message, options)
    this.name = 'GenerationError'
  }
}

export function errorMessage(e: unknown) {
  return e instanceof Error ? e.message : String(e)
}

export function httpStatusForError(e: unknown) {
  if (e instanceof NotFoundError) return 404
  if (e instanceof ValidationError) return 400
  return 500
}
