import { type Logger, NullLogger } from "@hashwire/logger"
import type { CommandTransport } from "../../ports/command-transport"
import type { FieldValues, HashCommands, HashScanCursor } from "../../ports/hash-commands"
import type { FieldName, HashKey } from "../../ports/hash-key"
import type { HashScanOptions, HashScanPage, ScanFilter } from "../../ports/hash-scan"
import type { WireConvertible } from "../../ports/wire-convertible"
import type { WireArgument, WireCommand, WireValue } from "../../ports/wire-value"
import { convert } from "../codec/convertibles"
import { decode, decodeList, decodePairs, encode } from "../codec/value-codec"
import { ArgumentMisuseError, MalformedReplyError, ServerReplyError } from "../errors/errors"
import { ScanCursor } from "../scan/scan-cursor"
import { parseScanReply } from "../scan/scan-reply"
import {
  expectArray,
  expectBigInt,
  expectFlag,
  expectInteger,
  expectOk,
  expectText,
} from "../wire/reply-shape"

export type WireHashCommandsDeps = {
  transport: CommandTransport
  logger?: Logger
}

export type WireHashCommandsOptions = {
  /** Prepended to every key before it is sent. The caller's key is unchanged. */
  keyspacePrefix?: string

  /** Count hint for `hscanAll` when the caller gives none. */
  scanCount?: number
}

const INT64_MIN = -(2n ** 63n)
const INT64_MAX = 2n ** 63n - 1n

function isFieldMap<T>(fields: FieldValues<T>): fields is ReadonlyMap<FieldName, T> {
  return fields instanceof Map
}

/**
 * {@link HashCommands} over any {@link CommandTransport}.
 *
 * @remarks
 * - Each call builds one request, submits it, and maps the reply.
 * - Arguments are encoded before anything is sent, so a value that cannot be
 *   encoded never produces a partial write.
 * - Transport rejections pass through untouched.
 */
export class WireHashCommands implements HashCommands {
  private readonly log: Logger

  public constructor(
    private readonly deps: WireHashCommandsDeps,
    private readonly opts: WireHashCommandsOptions = {},
  ) {
    this.log = (deps.logger ?? new NullLogger()).child({ module: "hash-commands" })
  }

  async hget<T>(field: FieldName, key: HashKey, as: WireConvertible<T>): Promise<T | undefined> {
    const fullKey = this.fullKey(key)

    return this.call("HGET", fullKey, ["HGET", fullKey, field], (reply) => decode(reply, as))
  }

  async hmget<T>(
    fields: readonly FieldName[],
    key: HashKey,
    as: WireConvertible<T>,
  ): Promise<(T | undefined)[]> {
    if (fields.length === 0) return []

    const fullKey = this.fullKey(key)

    return this.call("HMGET", fullKey, ["HMGET", fullKey, ...fields], (reply) => {
      const { items } = expectArray(reply, "HMGET")

      if (items.length !== fields.length) {
        throw new MalformedReplyError(
          `HMGET: expected ${fields.length} values, got ${items.length}`,
          { command: "HMGET", expected: fields.length, actual: items.length },
        )
      }

      return decodeList(items, as)
    })
  }

  async hgetall<T>(key: HashKey, as: WireConvertible<T>): Promise<Map<FieldName, T | undefined>> {
    const fullKey = this.fullKey(key)

    return this.call("HGETALL", fullKey, ["HGETALL", fullKey], (reply) => decodePairs(reply, as))
  }

  async hset<T>(field: FieldName, value: T, key: HashKey, as: WireConvertible<T>): Promise<boolean> {
    const arg = encode(value, as)
    const fullKey = this.fullKey(key)

    return this.call("HSET", fullKey, ["HSET", fullKey, field, arg], (reply) =>
      expectFlag(reply, "HSET"),
    )
  }

  async hsetnx<T>(
    field: FieldName,
    value: T,
    key: HashKey,
    as: WireConvertible<T>,
  ): Promise<boolean> {
    const arg = encode(value, as)
    const fullKey = this.fullKey(key)

    return this.call("HSETNX", fullKey, ["HSETNX", fullKey, field, arg], (reply) =>
      expectFlag(reply, "HSETNX"),
    )
  }

  async hmset<T>(fields: FieldValues<T>, key: HashKey, as: WireConvertible<T>): Promise<void> {
    const entries = isFieldMap(fields) ? [...fields.entries()] : Object.entries(fields)

    if (entries.length === 0) {
      throw new ArgumentMisuseError("HMSET requires at least one field", { key })
    }

    const args: WireArgument[] = []
    for (const [field, value] of entries) {
      args.push(field, encode(value, as))
    }

    const fullKey = this.fullKey(key)

    await this.call("HMSET", fullKey, ["HMSET", fullKey, ...args], (reply) =>
      expectOk(reply, "HMSET"),
    )
  }

  async hdel(fields: readonly FieldName[], key: HashKey): Promise<number> {
    if (fields.length === 0) return 0

    const fullKey = this.fullKey(key)

    return this.call("HDEL", fullKey, ["HDEL", fullKey, ...fields], (reply) =>
      expectInteger(reply, "HDEL"),
    )
  }

  async hexists(field: FieldName, key: HashKey): Promise<boolean> {
    const fullKey = this.fullKey(key)

    return this.call("HEXISTS", fullKey, ["HEXISTS", fullKey, field], (reply) =>
      expectFlag(reply, "HEXISTS"),
    )
  }

  async hlen(key: HashKey): Promise<number> {
    const fullKey = this.fullKey(key)

    return this.call("HLEN", fullKey, ["HLEN", fullKey], (reply) => expectInteger(reply, "HLEN"))
  }

  async hstrlen(field: FieldName, key: HashKey): Promise<number> {
    const fullKey = this.fullKey(key)

    return this.call("HSTRLEN", fullKey, ["HSTRLEN", fullKey, field], (reply) =>
      expectInteger(reply, "HSTRLEN"),
    )
  }

  async hkeys(key: HashKey): Promise<FieldName[]> {
    const fullKey = this.fullKey(key)

    return this.call("HKEYS", fullKey, ["HKEYS", fullKey], (reply) =>
      expectArray(reply, "HKEYS").items.map((item) => expectText(item, "HKEYS")),
    )
  }

  async hvals<T>(key: HashKey, as: WireConvertible<T>): Promise<(T | undefined)[]> {
    const fullKey = this.fullKey(key)

    return this.call("HVALS", fullKey, ["HVALS", fullKey], (reply) =>
      decodeList(expectArray(reply, "HVALS").items, as),
    )
  }

  hincrby(amount: number, field: FieldName, key: HashKey): Promise<number>
  hincrby(amount: bigint, field: FieldName, key: HashKey): Promise<bigint>
  async hincrby(amount: number | bigint, field: FieldName, key: HashKey): Promise<number | bigint> {
    const fullKey = this.fullKey(key)

    if (typeof amount === "bigint") {
      if (amount < INT64_MIN || amount > INT64_MAX) {
        throw new ArgumentMisuseError("HINCRBY amount must fit in a signed 64-bit integer", {
          amount: amount.toString(),
        })
      }

      const command = ["HINCRBY", fullKey, field, amount.toString()]

      return this.call("HINCRBY", fullKey, command, (reply) => expectBigInt(reply, "HINCRBY"))
    }

    if (!Number.isSafeInteger(amount)) {
      throw new ArgumentMisuseError("HINCRBY amount must be a safe integer", { amount })
    }

    return this.call("HINCRBY", fullKey, ["HINCRBY", fullKey, field, String(amount)], (reply) =>
      expectInteger(reply, "HINCRBY"),
    )
  }

  async hincrbyfloat(amount: number, field: FieldName, key: HashKey): Promise<number> {
    if (!Number.isFinite(amount)) {
      throw new ArgumentMisuseError("HINCRBYFLOAT amount must be finite", { amount })
    }

    const fullKey = this.fullKey(key)
    const command = ["HINCRBYFLOAT", fullKey, field, String(amount)]

    return this.call("HINCRBYFLOAT", fullKey, command, (reply) => {
      const value = convert.float.fromWire(reply)

      if (value === undefined) {
        throw new MalformedReplyError("HINCRBYFLOAT: reply is not a number", {
          command: "HINCRBYFLOAT",
        })
      }

      return value
    })
  }

  async hscan<T>(
    key: HashKey,
    as: WireConvertible<T>,
    options: HashScanOptions = {},
  ): Promise<HashScanPage<T>> {
    return this.hscanCursor(key, new ScanCursor(options), as)
  }

  async hscanCursor<T>(
    key: HashKey,
    cursor: HashScanCursor,
    as: WireConvertible<T>,
  ): Promise<HashScanPage<T>> {
    if (cursor.isComplete) {
      throw new ArgumentMisuseError("Scan cursor is already complete", { key })
    }

    const fullKey = this.fullKey(key)
    const sent = cursor.position

    const page = await this.call("HSCAN", fullKey, cursor.toArguments("HSCAN", fullKey), (reply) => {
      const { nextPosition, elements } = parseScanReply(reply)

      return { nextPosition, fields: decodePairs(elements, as) }
    })

    cursor.advance(page.nextPosition)

    this.log.debug("scan page", {
      command: "HSCAN",
      key: fullKey,
      position: sent,
      nextPosition: page.nextPosition,
      fields: page.fields.size,
    })

    return page
  }

  async *hscanAll<T>(
    key: HashKey,
    as: WireConvertible<T>,
    filter: ScanFilter = {},
  ): AsyncGenerator<HashScanPage<T>, void, undefined> {
    const count = filter.count ?? this.opts.scanCount
    const cursor = new ScanCursor({
      ...(filter.pattern !== undefined && { pattern: filter.pattern }),
      ...(count !== undefined && { count }),
    })

    do {
      yield await this.hscanCursor(key, cursor, as)
    } while (!cursor.isComplete)
  }

  private fullKey(key: HashKey): string {
    return `${this.opts.keyspacePrefix ?? ""}${key}`
  }

  /**
   * Submits one request and maps its reply. Error replies become
   * {@link ServerReplyError}; shape mismatches raised by `map` are logged.
   */
  private async call<R>(
    command: string,
    key: string,
    request: WireCommand,
    map: (reply: WireValue) => R,
  ): Promise<R> {
    this.log.trace("round trip", { command, key })

    const reply = await this.deps.transport.submit(request)

    if (reply.kind === "error") {
      const err = new ServerReplyError(reply.message, { command, key })
      this.log.warn("store replied with an error", { command, key, err })
      throw err
    }

    try {
      return map(reply)
    } catch (err) {
      if (err instanceof MalformedReplyError) {
        this.log.warn("malformed reply", { command, key, err })
      }
      throw err
    }
  }
}
