import type { WireArray, WireValue } from "../../ports/wire-value"
import { MalformedReplyError } from "../errors/errors"
import { describeWire, wireText } from "./wire"

export function expectBigInt(reply: WireValue, command: string): bigint {
  if (reply.kind === "integer") return reply.value

  throw new MalformedReplyError(`${command}: expected integer, got ${describeWire(reply)}`, {
    command,
  })
}

/**
 * Integer reply that fits a `number` exactly.
 */
export function expectInteger(reply: WireValue, command: string): number {
  const value = expectBigInt(reply, command)
  const n = Number(value)

  if (Number.isSafeInteger(n)) return n

  throw new MalformedReplyError(`${command}: integer ${value} is outside the safe integer range`, {
    command,
    value: value.toString(),
  })
}

/**
 * Integer reply that is either `0` or `1`.
 */
export function expectFlag(reply: WireValue, command: string): boolean {
  const n = expectInteger(reply, command)

  if (n === 1) return true
  if (n === 0) return false

  throw new MalformedReplyError(`${command}: expected 0 or 1, got ${n}`, { command })
}

/**
 * `OK`, as a status or a bulk string; some transports cannot tell them apart.
 */
export function expectOk(reply: WireValue, command: string): void {
  if (wireText(reply) === "OK") return

  throw new MalformedReplyError(`${command}: expected OK, got ${describeWire(reply)}`, {
    command,
  })
}

export function expectArray(reply: WireValue, command: string): WireArray {
  if (reply.kind === "array") return reply

  throw new MalformedReplyError(`${command}: expected array, got ${describeWire(reply)}`, {
    command,
  })
}

/**
 * Text of a bulk or status reply.
 */
export function expectText(reply: WireValue, command: string): string {
  const text = wireText(reply)
  if (text !== undefined) return text

  throw new MalformedReplyError(`${command}: expected text, got ${describeWire(reply)}`, {
    command,
  })
}
