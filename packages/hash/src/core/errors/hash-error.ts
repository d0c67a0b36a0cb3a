export type HashErrorCode = "argument_misuse" | "malformed_reply" | "server_error"

/**
 * Structured metadata carried by an error, e.g. the command and full key.
 */
export type HashErrorContext = Readonly<Record<string, unknown>>

export type HashErrorOptions<C extends HashErrorCode> = Readonly<{
  code: C
  requestSent: boolean
  context?: HashErrorContext
  cause?: unknown
}>

/**
 * JSON-safe shape for logs.
 */
export type SerializedHashError = Readonly<{
  name: string
  code: HashErrorCode | "unknown"
  message: string
  context: HashErrorContext
  requestSent?: boolean
  /** First word of a store error reply. */
  prefix?: string
  cause?: SerializedHashError
  stack?: string
}>

export type SerializeOptions = Readonly<{
  /** @default false */
  includeStack?: boolean
}>

/**
 * Base of every error raised by the hash commands.
 */
export class HashError<C extends HashErrorCode = HashErrorCode> extends Error {
  readonly code: C
  readonly context: HashErrorContext

  /**
   * Whether the request reached the store. When it did, a write may have taken
   * effect even though the call failed.
   */
  readonly requestSent: boolean

  constructor(message: string, options: HashErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = new.target.name
    this.code = options.code
    this.requestSent = options.requestSent
    this.context = Object.freeze({ ...options.context })

    Error.captureStackTrace?.(this, new.target)
  }

  serialize(options: SerializeOptions = {}): SerializedHashError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: { ...this.context },
      requestSent: this.requestSent,
      ...(this.cause !== undefined && { cause: serializeError(this.cause, options) }),
      ...(options.includeStack === true && this.stack !== undefined && { stack: this.stack }),
    }
  }

  toJSON(): SerializedHashError {
    return this.serialize()
  }
}

/**
 * Serializes any thrown value. Errors from outside this package get code
 * `unknown`.
 */
export function serializeError(err: unknown, options: SerializeOptions = {}): SerializedHashError {
  if (err instanceof HashError) return err.serialize(options)

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(options.includeStack === true && err.stack !== undefined && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: typeof err === "string" ? {} : { value: err },
  }
}

export function isHashError(err: unknown): err is HashError {
  return err instanceof HashError
}
