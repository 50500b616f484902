import type { AppError, ErrorCode, ErrorContext, SerializedError } from "../ports/error"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
}>

export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly context: ErrorContext
  readonly isRetryable: boolean
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: BaseErrorOptions<C>) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })

    this.name = new.target.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isRetryable = options.isRetryable ?? false
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    Error.captureStackTrace?.(this, new.target)
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** Default: false */
  includeStack?: boolean
}>

/**
 * Converts any thrown value into a {@link SerializedError}.
 *
 * `BaseError` keeps its code and context, plain `Error`s get code `unknown`,
 * and anything else is reported as `NonErrorThrown` with the value in context.
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  const includeStack = options?.includeStack ?? false

  if (!(err instanceof Error)) {
    return {
      name: "NonErrorThrown",
      code: "unknown",
      message: typeof err === "string" ? err : "Unknown error",
      context: typeof err === "string" ? {} : { value: err },
      isOperational: false,
      isRetryable: false,
      timestamp: new Date().toISOString(),
    }
  }

  const base = err instanceof BaseError ? err : undefined

  return {
    name: err.name,
    code: base?.code ?? "unknown",
    message: err.message,
    context: base ? { ...base.context } : {},
    isOperational: base?.isOperational ?? false,
    isRetryable: base?.isRetryable ?? false,
    timestamp: (base?.timestamp ?? new Date()).toISOString(),
    ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
    ...(includeStack && err.stack && { stack: err.stack }),
  }
}
