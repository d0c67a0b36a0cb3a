import type { ScanPosition } from "../../ports/hash-scan"
import type { WireValue } from "../../ports/wire-value"
import { MalformedReplyError } from "../errors/errors"
import { describeWire, wireText } from "../wire/wire"

export type ScanReply = {
  readonly nextPosition: ScanPosition
  readonly elements: WireValue
}

const POSITION_TEXT = /^\d+$/

/**
 * Parses a position token. Tokens are decimal, non-negative and fit in a safe
 * integer.
 */
export function parseScanPosition(value: WireValue): ScanPosition | undefined {
  if (value.kind === "integer") {
    const position = Number(value.value)

    return Number.isSafeInteger(position) && position >= 0 ? position : undefined
  }

  const text = wireText(value)
  if (text === undefined || !POSITION_TEXT.test(text)) return undefined

  const position = Number(text)

  return Number.isSafeInteger(position) ? position : undefined
}

/**
 * Splits a `[position, elements]` scan reply.
 *
 * @throws {MalformedReplyError} when the reply is not a two-element array
 * holding a valid position and an array.
 */
export function parseScanReply(reply: WireValue): ScanReply {
  if (reply.kind !== "array" || reply.items.length !== 2) {
    throw new MalformedReplyError(`Expected [position, elements], got ${describeWire(reply)}`)
  }

  const [head, elements] = reply.items
  const nextPosition = head === undefined ? undefined : parseScanPosition(head)

  if (nextPosition === undefined) {
    throw new MalformedReplyError(
      `Invalid scan position ${head === undefined ? "missing" : describeWire(head)}`,
    )
  }

  if (elements === undefined || elements.kind !== "array") {
    throw new MalformedReplyError(
      `Expected scan elements array, got ${elements === undefined ? "nothing" : describeWire(elements)}`,
    )
  }

  return { nextPosition, elements }
}
