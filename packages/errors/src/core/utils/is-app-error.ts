import type { AppError, ErrorCode } from "../../ports/error"
import { BaseError } from "../base-error"

/**
 * Type guard for {@link AppError}, optionally narrowed to one code.
 *
 * @example
 * ```ts
 * catch (err) {
 *   if (isAppError(err, "not_found")) return undefined
 *   throw err
 * }
 * ```
 */
export function isAppError(e: unknown, code?: ErrorCode): e is AppError {
  if (!(e instanceof BaseError)) return false

  return code === undefined || e.code === code
}
