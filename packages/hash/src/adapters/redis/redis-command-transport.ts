import { ErrorReply } from "redis"
import { MalformedReplyError } from "../../core/errors/errors"
import { wire } from "../../core/wire/wire"
import type { CommandTransport } from "../../ports/command-transport"
import type { WireArgument, WireCommand, WireValue } from "../../ports/wire-value"
import { REPLY_TYPE_MAPPING, type RedisCommandClient } from "./redis-client"

export type RedisCommandTransportDeps = {
  client: RedisCommandClient
}

function toRedisArgument(arg: WireArgument): string | Buffer {
  return typeof arg === "string" ? arg : Buffer.from(arg.buffer, arg.byteOffset, arg.byteLength)
}

const INTEGER_TEXT = /^-?\d+$/

/**
 * Maps a node-redis RESP2 reply, decoded with {@link REPLY_TYPE_MAPPING}, onto
 * {@link WireValue}.
 *
 * @remarks
 * Status and bulk strings both arrive as buffers and map to `bulk`. Integers
 * arrive as decimal text.
 *
 * @throws {MalformedReplyError} for reply types RESP2 does not produce.
 */
export function toWireValue(reply: unknown): WireValue {
  if (reply === null || reply === undefined) return wire.null()
  if (Buffer.isBuffer(reply)) return wire.bulk(new Uint8Array(reply))
  if (reply instanceof ErrorReply) return wire.error(reply.message)

  if (typeof reply === "string") {
    if (INTEGER_TEXT.test(reply)) return wire.integer(BigInt(reply))

    throw new MalformedReplyError(`Expected integer text, got "${reply}"`)
  }

  if (Array.isArray(reply)) {
    const items: unknown[] = reply

    return wire.array(items.map(toWireValue))
  }

  throw new MalformedReplyError(`Unsupported reply type ${typeof reply}`)
}

/**
 * {@link CommandTransport} over a node-redis client.
 *
 * @remarks
 * - Error replies resolve as `error` values; the command layer decides what
 *   to raise.
 * - Connection and timeout failures reject unchanged.
 * - Caller owns `client.connect()` / `client.quit()`.
 */
export class RedisCommandTransport implements CommandTransport {
  public constructor(private readonly deps: RedisCommandTransportDeps) {}

  async submit(command: WireCommand): Promise<WireValue> {
    let reply: unknown

    try {
      reply = await this.deps.client.sendCommand(command.map(toRedisArgument), {
        typeMapping: REPLY_TYPE_MAPPING,
      })
    } catch (err) {
      if (err instanceof ErrorReply) return wire.error(err.message)
      throw err
    }

    return toWireValue(reply)
  }
}
