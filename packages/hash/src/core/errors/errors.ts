import {
  HashError,
  type HashErrorContext,
  type SerializedHashError,
  type SerializeOptions,
} from "./hash-error"

/**
 * A call was made with arguments that cannot be sent. Raised before any
 * request leaves the process.
 */
export class ArgumentMisuseError extends HashError<"argument_misuse"> {
  constructor(message: string, context?: HashErrorContext, cause?: unknown) {
    super(message, {
      code: "argument_misuse",
      requestSent: false,
      ...(context !== undefined && { context }),
      ...(cause !== undefined && { cause }),
    })
  }
}

/**
 * The store's reply does not have the shape the command defines.
 */
export class MalformedReplyError extends HashError<"malformed_reply"> {
  constructor(message: string, context?: HashErrorContext) {
    super(message, {
      code: "malformed_reply",
      requestSent: true,
      ...(context !== undefined && { context }),
    })
  }
}

/**
 * The store answered with an error reply, e.g. `WRONGTYPE` or a non-integer
 * increment target.
 */
export class ServerReplyError extends HashError<"server_error"> {
  /** First word of the reply, e.g. `ERR`, `WRONGTYPE`. */
  readonly prefix: string

  constructor(readonly reply: string, context?: HashErrorContext) {
    super(reply, {
      code: "server_error",
      requestSent: true,
      ...(context !== undefined && { context }),
    })

    this.prefix = reply.split(" ", 1)[0] ?? ""
  }

  override serialize(options?: SerializeOptions): SerializedHashError {
    return { ...super.serialize(options), prefix: this.prefix }
  }
}
