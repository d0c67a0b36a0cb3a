/**
 * An untyped reply from the store, as delivered by a {@link CommandTransport}.
 *
 * @remarks
 * Mirrors the reply kinds of the request/response protocol: nil, integer,
 * bulk (binary-safe) string, simple status string, error, and nested arrays.
 * Values are immutable once received.
 */
export type WireValue =
  | WireNull
  | WireInteger
  | WireBulk
  | WireStatus
  | WireError
  | WireArray

export type WireNull = { readonly kind: "null" }

/** The store's integers are signed 64-bit, so they are carried as `bigint`. */
export type WireInteger = { readonly kind: "integer"; readonly value: bigint }

export type WireBulk = { readonly kind: "bulk"; readonly value: Uint8Array }

export type WireStatus = { readonly kind: "status"; readonly value: string }

export type WireError = { readonly kind: "error"; readonly message: string }

export type WireArray = { readonly kind: "array"; readonly items: readonly WireValue[] }

export type WireKind = WireValue["kind"]

/**
 * One argument of a request. Every argument travels as a bulk string.
 */
export type WireArgument = string | Uint8Array

export type WireCommand = readonly WireArgument[]
