/**
 * Chopsticks Domain Errors
 *
 * Every error the core throws is a ChopsticksError with a stable code, so the
 * UI layer can branch on `code` instead of matching message text.
 */

export type ChopsticksErrorCode =
  | 'INVALID_STATE'
  | 'NO_LEGAL_MOVES'
  | 'ILLEGAL_MOVE'
  | 'INVALID_CONFIG'

/**
 * JSON representation of a ChopsticksError.
 */
export interface ChopsticksErrorJSON {
  error: true
  type: string
  code: ChopsticksErrorCode
  message: string
  context: Record<string, unknown>
}

/**
 * Base class for all domain errors.
 */
export class ChopsticksError extends Error {
  /** Error code for programmatic handling */
  readonly code: ChopsticksErrorCode

  /** Additional context for debugging */
  readonly context: Record<string, unknown>

  constructor(code: ChopsticksErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message)
    this.name = 'ChopsticksError'
    this.code = code
    this.context = context

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype)
  }

  toJSON(): ChopsticksErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    }
  }
}

/**
 * Malformed hand values, a malformed state string, or a query that needs a
 * terminal state (such as `winner`) made on a live one.
 */
export class InvalidStateError extends ChopsticksError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super('INVALID_STATE', message, context)
    this.name = 'InvalidStateError'
  }
}

/**
 * Move generation or selection requested on a finished game.
 */
export class NoLegalMovesError extends ChopsticksError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super('NO_LEGAL_MOVES', message, context)
    this.name = 'NoLegalMovesError'
  }
}

export class IllegalMoveError extends ChopsticksError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super('ILLEGAL_MOVE', message, context)
    this.name = 'IllegalMoveError'
  }
}

export class InvalidConfigError extends ChopsticksError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super('INVALID_CONFIG', message, context)
    this.name = 'InvalidConfigError'
  }
}
