export type RelayErrorCode =
  | 'conflict'
  | 'invalid_turn'
  | 'unsupported_modality'
  | 'adapter_timeout'
  | 'adapter_transport'
  | 'malformed_response'
  | 'retrieval_failed'
  | 'invalid_state'

/** Base class for every error the relay reports to a client. */
export class RelayError extends Error {
  constructor(
    readonly code: RelayErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = new.target.name
  }
}

/** A turn was submitted while another one is still active on the session. */
export class ConflictError extends RelayError {
  constructor(
    readonly sessionId: string,
    readonly activeTurnId: string
  ) {
    super('conflict', `Session ${sessionId} already has an active turn (${activeTurnId})`)
  }
}

export class InvalidTurnError extends RelayError {
  constructor(message: string) {
    super('invalid_turn', message)
  }
}

export class UnsupportedModalityError extends RelayError {
  constructor(
    readonly endpoint: string,
    readonly missing: string[],
    message = `Endpoint ${endpoint} does not accept: ${missing.join(', ')}`
  ) {
    super('unsupported_modality', message)
  }
}

export class AdapterTimeoutError extends RelayError {
  constructor(readonly idleMs: number) {
    super('adapter_timeout', `No output received for ${idleMs}ms`)
  }
}

export class AdapterTransportError extends RelayError {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super('adapter_transport', message, options)
  }
}

export class MalformedResponseError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('malformed_response', message, options)
  }
}

export class RetrievalError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('retrieval_failed', message, options)
  }
}

/** Use of a closed session or an exhausted turn stream. Always a caller defect. */
export class InvalidStateError extends RelayError {
  constructor(message: string) {
    super('invalid_state', message)
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/** Normalizes an unknown throwable into a transport error unless it already is a relay error. */
export function toRelayError(error: unknown): RelayError {
  if (error instanceof RelayError) return error
  return new AdapterTransportError(errorMessage(error), undefined, { cause: error })
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'APIUserAbortError')
}
