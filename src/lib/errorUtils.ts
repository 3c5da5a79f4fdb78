/**
 * Error handling utilities
 *
 * Result-object conversion for callers that sit between the solver and a
 * user interface.
 */

import { type ChopsticksErrorCode, ChopsticksError } from '../game/errors'

export interface ErrorResponse {
  success: false
  error: string
  code: ChopsticksErrorCode
}

/**
 * Check if an error came from the solver core, optionally with a given code.
 */
export function isChopsticksError(err: unknown, code?: ChopsticksErrorCode): err is ChopsticksError {
  return err instanceof ChopsticksError && (code === undefined || err.code === code)
}

/**
 * Create a standardized error response object.
 *
 * @example
 * try {
 *   game = makeMove(game, move)
 * } catch (err) {
 *   if (!isChopsticksError(err)) throw err
 *   return toErrorResponse(err)
 * }
 */
export function toErrorResponse(err: ChopsticksError): ErrorResponse {
  return {
    success: false,
    error: err.message,
    code: err.code,
  }
}
