/**
 * Head Coordination Errors
 *
 * Every error thrown by headsync carries a stable `code`.
 *
 * - InvalidStateError: a caller broke an ordering precondition (contract violation).
 *   Fatal to that caller. Never retried, never swallowed.
 * - BridgeCallError: the external bridge rejected. Only the operation that made
 *   the call observes it; the queue keeps running.
 * - ConfigError: configuration input failed validation.
 */

export type HeadErrorCode = 'INVALID_STATE' | 'BRIDGE_CALL_FAILED' | 'INVALID_CONFIG'

export class HeadError extends Error {
  code: HeadErrorCode

  constructor(code: HeadErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'HeadError'
    this.code = code
  }
}

export class InvalidStateError extends HeadError {
  operation: string
  state: string

  constructor(operation: string, state: string, expected: string) {
    super('INVALID_STATE', `Cannot ${operation} while ${state}; expected ${expected}`)
    this.name = 'InvalidStateError'
    this.operation = operation
    this.state = state
  }
}

export class BridgeCallError extends HeadError {
  operation: string

  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super('BRIDGE_CALL_FAILED', `Bridge call "${operation}" failed: ${reason}`, { cause })
    this.name = 'BridgeCallError'
    this.operation = operation
  }
}

export class ConfigError extends HeadError {
  key: string

  constructor(key: string, message: string) {
    super('INVALID_CONFIG', `Invalid config "${key}": ${message}`)
    this.name = 'ConfigError'
    this.key = key
  }
}
