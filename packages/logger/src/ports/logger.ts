import type { LogContext, LogContextPatch, LogMeta } from "./log-context"

export interface Logger<TContext extends LogContext = LogContext> {
  trace(message: string, meta?: LogMeta<TContext>): void
  debug(message: string, meta?: LogMeta<TContext>): void
  info(message: string, meta?: LogMeta<TContext>): void
  warn(message: string, meta?: LogMeta<TContext>): void
  error(message: string, meta?: LogMeta<TContext>): void
  fatal(message: string, meta?: LogMeta<TContext>): void

  /**
   * Creates a logger bound to additional context.
   *
   * @remarks
   * The patch is shallow-merged over the parent's context and included in every
   * entry the child emits. The parent is left untouched.
   */
  child<U extends LogContextPatch>(context: U): Logger<TContext & U>
}
