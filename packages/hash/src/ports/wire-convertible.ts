import type { WireArgument, WireValue } from "./wire-value"

/**
 * Capability of a type `T` to travel over the wire.
 *
 * @remarks
 * The command layer is generic over this capability and never inspects `T`.
 * Any type opts in by supplying an implementation; there is no registry.
 *
 * - `fromWire` returns `undefined` when the reply cannot represent a `T`. It is
 *   never handed a `null` reply.
 * - `toWire` throws {@link ArgumentMisuseError} when the value has no wire form.
 *
 * @example
 * ```ts
 * const isoDate: WireConvertible<Date> = {
 *   name: "iso-date",
 *   toWire: (d) => d.toISOString(),
 *   fromWire: (v) => {
 *     const text = convert.string.fromWire(v)
 *     const date = text === undefined ? undefined : new Date(text)
 *     return date && Number.isFinite(date.getTime()) ? date : undefined
 *   },
 * }
 * ```
 */
export interface WireConvertible<T> {
  /** Used in error messages and logs. */
  readonly name: string

  toWire(value: T): WireArgument

  fromWire(value: WireValue): T | undefined
}
