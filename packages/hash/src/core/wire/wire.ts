import type {
  WireArray,
  WireBulk,
  WireError,
  WireInteger,
  WireNull,
  WireStatus,
  WireValue,
} from "../../ports/wire-value"

const encoder = new TextEncoder()
const decoder = new TextDecoder("utf-8", { fatal: true })

const NULL: WireNull = Object.freeze({ kind: "null" })

export const wire = {
  null(): WireNull {
    return NULL
  },

  integer(value: number | bigint): WireInteger {
    return { kind: "integer", value: BigInt(value) }
  },

  bulk(value: Uint8Array | string): WireBulk {
    return { kind: "bulk", value: typeof value === "string" ? utf8Encode(value) : value }
  },

  status(value: string): WireStatus {
    return { kind: "status", value }
  },

  error(message: string): WireError {
    return { kind: "error", message }
  },

  array(items: readonly WireValue[]): WireArray {
    return { kind: "array", items }
  },
}

export function utf8Encode(value: string): Uint8Array {
  return encoder.encode(value)
}

/**
 * Strict UTF-8 decoding; `undefined` for byte sequences that are not valid UTF-8.
 */
export function utf8Decode(bytes: Uint8Array): string | undefined {
  try {
    return decoder.decode(bytes)
  } catch {
    return undefined
  }
}

/**
 * Text carried by a bulk or status reply.
 */
export function wireText(value: WireValue): string | undefined {
  switch (value.kind) {
    case "bulk":
      return utf8Decode(value.value)
    case "status":
      return value.value
    default:
      return undefined
  }
}

/**
 * Short, single-line rendering for error messages and logs.
 */
export function describeWire(value: WireValue): string {
  switch (value.kind) {
    case "null":
      return "null"
    case "integer":
      return `integer(${value.value})`
    case "bulk":
      return `bulk(${value.value.byteLength} bytes)`
    case "status":
      return `status(${value.value})`
    case "error":
      return `error(${value.message})`
    case "array":
      return `array(${value.items.length})`
  }
}
