import { type ZodType, z } from "zod"
import type { WireConvertible } from "../../ports/wire-convertible"
import type { WireValue } from "../../ports/wire-value"
import { ArgumentMisuseError } from "../errors/errors"
import { utf8Encode, wireText } from "../wire/wire"

const INTEGER_TEXT = /^[+-]?\d+$/
const FLOAT_TEXT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/
const INFINITY_TEXT = /^([+-]?)inf(?:inity)?$/i

const jsonValueSchema = z.json()

export type JsonValue = z.output<typeof jsonValueSchema>

function misuse(convertible: string, message: string, value?: unknown): ArgumentMisuseError {
  return new ArgumentMisuseError(`${convertible}: ${message}`, {
    convertible,
    ...(value !== undefined && { value: String(value) }),
  })
}

/**
 * Text of a bulk, status or integer reply. Integers render in decimal.
 */
function textOf(value: WireValue): string | undefined {
  if (value.kind === "integer") return String(value.value)

  return wireText(value)
}

function parseSafeInteger(text: string): number | undefined {
  if (!INTEGER_TEXT.test(text)) return undefined

  const n = Number(text)

  return Number.isSafeInteger(n) ? n : undefined
}

function parseFloatText(text: string): number | undefined {
  const inf = INFINITY_TEXT.exec(text)
  if (inf) return inf[1] === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY

  return FLOAT_TEXT.test(text) ? Number(text) : undefined
}

const string: WireConvertible<string> = {
  name: "string",
  toWire: (value) => value,
  fromWire: textOf,
}

const bytes: WireConvertible<Uint8Array> = {
  name: "bytes",
  toWire: (value) => value,
  fromWire(value) {
    if (value.kind === "bulk") return value.value
    if (value.kind === "status") return utf8Encode(value.value)

    return undefined
  },
}

/**
 * Integers within `Number.MIN_SAFE_INTEGER..Number.MAX_SAFE_INTEGER`.
 * Larger stored values decode as absent; use {@link bigint} for them.
 */
const integer: WireConvertible<number> = {
  name: "integer",
  toWire(value) {
    if (!Number.isSafeInteger(value)) throw misuse("integer", "not a safe integer", value)

    return String(value)
  },
  fromWire(value) {
    if (value.kind === "integer") {
      const n = Number(value.value)

      return Number.isSafeInteger(n) ? n : undefined
    }

    const text = wireText(value)

    return text === undefined ? undefined : parseSafeInteger(text)
  },
}

const bigint: WireConvertible<bigint> = {
  name: "bigint",
  toWire: (value) => value.toString(),
  fromWire(value) {
    if (value.kind === "integer") return value.value

    const text = wireText(value)

    return text !== undefined && INTEGER_TEXT.test(text) ? BigInt(text) : undefined
  },
}

/**
 * IEEE 754 doubles. Finite values round-trip exactly; `-0` comes back as `0`.
 * Infinities travel as `inf` / `-inf`. `NaN` has no wire form.
 */
const float: WireConvertible<number> = {
  name: "float",
  toWire(value) {
    if (Number.isNaN(value)) throw misuse("float", "NaN has no wire representation")
    if (value === Number.POSITIVE_INFINITY) return "inf"
    if (value === Number.NEGATIVE_INFINITY) return "-inf"

    return String(value)
  },
  fromWire(value) {
    if (value.kind === "integer") return Number(value.value)

    const text = wireText(value)

    return text === undefined ? undefined : parseFloatText(text)
  },
}

/**
 * `1` / `0`. Any other value is absent.
 */
const boolean: WireConvertible<boolean> = {
  name: "boolean",
  toWire: (value) => (value ? "1" : "0"),
  fromWire(value) {
    const n = integer.fromWire(value)

    if (n === 1) return true
    if (n === 0) return false

    return undefined
  },
}

/**
 * The reply itself, unconverted. Read-only: it cannot be sent as an argument.
 */
const raw: WireConvertible<WireValue> = {
  name: "raw",
  toWire() {
    throw misuse("raw", "raw replies cannot be sent as arguments")
  },
  fromWire: (value) => value,
}

function jsonWith<T>(name: string, schema: ZodType<T>): WireConvertible<T> {
  return {
    name,
    toWire(value) {
      let text: string | undefined

      try {
        text = JSON.stringify(value)
      } catch (err) {
        throw new ArgumentMisuseError(`${name}: value is not serializable`, { convertible: name }, err)
      }

      if (text === undefined) throw misuse(name, "value has no JSON representation")

      return text
    },
    fromWire(value) {
      const text = wireText(value)
      if (text === undefined) return undefined

      let parsed: unknown

      try {
        parsed = JSON.parse(text)
      } catch {
        return undefined
      }

      const result = schema.safeParse(parsed)

      return result.success ? result.data : undefined
    },
  }
}

/**
 * JSON text, optionally validated against a zod schema on the way in.
 * Values that fail to parse or validate decode as absent.
 */
function json(): WireConvertible<JsonValue>
function json<T>(schema: ZodType<T>): WireConvertible<T>
function json<T>(schema?: ZodType<T>): WireConvertible<T> | WireConvertible<JsonValue> {
  return schema ? jsonWith("json", schema) : jsonWith("json", jsonValueSchema)
}

/**
 * Built-in {@link WireConvertible} implementations.
 */
export const convert = {
  string,
  bytes,
  integer,
  bigint,
  float,
  boolean,
  raw,
  json,
}
