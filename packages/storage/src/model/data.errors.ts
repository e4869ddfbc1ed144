import { BaseError } from "@stowage/errors"
import type { ObjectRef } from "../ports/storage-object"

export type DataErrorCode =
  | "invalid_location"
  | "unsupported_format"
  | "decode_error"
  | "encode_error"
  | "not_found"
  | "access_denied"
  | "backend_error"

export type DecodeErrorDetail = {
  /** 1-based line of the offending record */
  line?: number
  /** 0-based byte or character offset reported by the parser */
  position?: number
  cause?: unknown
}

export type EncodeErrorDetail = {
  /** Index of the offending element for sequence formats */
  index?: number
  cause?: unknown
}

export class DataError extends BaseError<DataErrorCode> {
  static invalidLocation(reason: string, input: Record<string, unknown> = {}): DataError {
    return new DataError(`Invalid location: ${reason}`, {
      code: "invalid_location",
      context: { reason, ...input },
    })
  }

  static unsupportedFormat(format: string): DataError {
    return new DataError(`Unsupported format: ${format}`, {
      code: "unsupported_format",
      context: { format },
    })
  }

  static decodeError(
    format: string,
    message: string,
    detail: DecodeErrorDetail = {},
  ): DataError {
    const where = detail.line !== undefined ? ` (line ${detail.line})` : ""

    return new DataError(`Cannot decode ${format} payload${where}: ${message}`, {
      code: "decode_error",
      context: {
        format,
        ...(detail.line !== undefined && { line: detail.line }),
        ...(detail.position !== undefined && { position: detail.position }),
      },
      cause: detail.cause,
    })
  }

  static encodeError(
    format: string,
    message: string,
    detail: EncodeErrorDetail = {},
  ): DataError {
    return new DataError(`Cannot encode value as ${format}: ${message}`, {
      code: "encode_error",
      context: {
        format,
        ...(detail.index !== undefined && { index: detail.index }),
      },
      cause: detail.cause,
    })
  }

  static notFound(ref: ObjectRef, cause?: unknown): DataError {
    return new DataError(`Object not found: s3://${ref.bucket}/${ref.key}`, {
      code: "not_found",
      context: { bucket: ref.bucket, key: ref.key },
      cause,
    })
  }

  static accessDenied(operation: string, ref: Partial<ObjectRef>, cause: unknown): DataError {
    return new DataError(`Access denied for ${operation}`, {
      code: "access_denied",
      context: { operation, ...ref },
      cause,
    })
  }

  static backendError(
    operation: string,
    ref: Partial<ObjectRef>,
    cause: unknown,
    isRetryable: boolean,
  ): DataError {
    const reason = cause instanceof Error ? cause.message : String(cause)

    return new DataError(`Storage backend failed during ${operation}: ${reason}`, {
      code: "backend_error",
      context: { operation, ...ref },
      cause,
      isRetryable,
    })
  }
}

export function isDataError(err: unknown, code?: DataErrorCode): err is DataError {
  return err instanceof DataError && (code === undefined || err.code === code)
}
