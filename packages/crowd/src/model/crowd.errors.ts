import { BaseError } from "@stowage/errors"

export type CrowdErrorCode =
  | "invalid_requirement"
  | "task_not_found"
  | "access_denied"
  | "service_error"

export class CrowdError extends BaseError<CrowdErrorCode> {
  static invalidRequirement(message: string): CrowdError {
    return new CrowdError(`Invalid qualification requirement: ${message}`, {
      code: "invalid_requirement",
    })
  }

  static taskNotFound(hitId: string, cause?: unknown): CrowdError {
    return new CrowdError(`Task not found: ${hitId}`, {
      code: "task_not_found",
      context: { hitId },
      cause,
    })
  }

  static accessDenied(operation: string, cause: unknown): CrowdError {
    return new CrowdError(`Access denied for ${operation}`, {
      code: "access_denied",
      context: { operation },
      cause,
    })
  }

  static serviceError(
    operation: string,
    context: Record<string, unknown>,
    cause: unknown,
    isRetryable: boolean,
  ): CrowdError {
    const reason = cause instanceof Error ? cause.message : String(cause)

    return new CrowdError(`Mechanical Turk request failed during ${operation}: ${reason}`, {
      code: "service_error",
      context: { operation, ...context },
      cause,
      isRetryable,
    })
  }
}

export function isCrowdError(err: unknown, code?: CrowdErrorCode): err is CrowdError {
  return err instanceof CrowdError && (code === undefined || err.code === code)
}
