import type { FieldName } from "../../ports/hash-key"
import type { WireConvertible } from "../../ports/wire-convertible"
import type { WireArgument, WireValue } from "../../ports/wire-value"
import { ArgumentMisuseError, MalformedReplyError } from "../errors/errors"
import { describeWire, wireText } from "../wire/wire"

/**
 * Projects one reply element onto `T`.
 *
 * @remarks
 * Total: a null reply, a value of the wrong shape, and a convertible that
 * throws all yield `undefined`. Conversion misses are absent values, not errors.
 */
export function decode<T>(value: WireValue, as: WireConvertible<T>): T | undefined {
  if (value.kind === "null") return undefined

  try {
    return as.fromWire(value)
  } catch {
    return undefined
  }
}

/**
 * Element-wise {@link decode}; one slot per input, same order.
 */
export function decodeList<T>(
  values: readonly WireValue[],
  as: WireConvertible<T>,
): (T | undefined)[] {
  return values.map((v) => decode(v, as))
}

/**
 * Element-wise {@link decode} keyed by field. A value that fails to convert
 * keeps its field with an `undefined` value; sibling entries are unaffected.
 */
export function decodeMap<T>(
  entries: Iterable<readonly [FieldName, WireValue]>,
  as: WireConvertible<T>,
): Map<FieldName, T | undefined> {
  const out = new Map<FieldName, T | undefined>()

  for (const [field, value] of entries) {
    out.set(field, decode(value, as))
  }

  return out
}

/**
 * Splits a flat `[field, value, field, value, ...]` array reply into entries.
 *
 * @throws {MalformedReplyError} for a non-array, an odd number of elements, or
 * a field name that is not text.
 */
export function fieldPairs(value: WireValue): [FieldName, WireValue][] {
  if (value.kind !== "array") {
    throw new MalformedReplyError(`Expected field/value array, got ${describeWire(value)}`)
  }

  const { items } = value
  if (items.length % 2 !== 0) {
    throw new MalformedReplyError(`Field/value array has odd length ${items.length}`)
  }

  const pairs: [FieldName, WireValue][] = []

  for (let i = 0; i < items.length; i += 2) {
    const name = items[i]
    const entry = items[i + 1]
    const field = name === undefined ? undefined : wireText(name)

    if (field === undefined || entry === undefined) {
      throw new MalformedReplyError(`Field name at index ${i} is not text`, { index: i })
    }

    pairs.push([field, entry])
  }

  return pairs
}

/**
 * {@link decodeMap} over a flat field/value array reply.
 */
export function decodePairs<T>(
  value: WireValue,
  as: WireConvertible<T>,
): Map<FieldName, T | undefined> {
  return decodeMap(fieldPairs(value), as)
}

/**
 * Turns a typed value into a request argument.
 *
 * @throws {ArgumentMisuseError} when the value has no wire representation.
 */
export function encode<T>(value: T, as: WireConvertible<T>): WireArgument {
  let arg: WireArgument

  try {
    arg = as.toWire(value)
  } catch (err) {
    if (err instanceof ArgumentMisuseError) throw err

    throw new ArgumentMisuseError(
      `Value cannot be encoded as ${as.name}`,
      { convertible: as.name },
      err,
    )
  }

  if (typeof arg === "string" || arg instanceof Uint8Array) return arg

  throw new ArgumentMisuseError(`Encoder ${as.name} produced a non-wire argument`, {
    convertible: as.name,
  })
}
