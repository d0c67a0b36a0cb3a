import { utf8Decode, utf8Encode, wire } from "../../core/wire/wire"
import type { CommandTransport } from "../../ports/command-transport"
import type { WireArgument, WireCommand, WireValue } from "../../ports/wire-value"
import { compileGlob } from "./glob"

export type MemoryCommandTransportOptions = {
  /**
   * Hashes with at most this many fields are returned by `HSCAN` in a single
   * page whatever the count hint, as the store does for small hashes.
   *
   * @default 0
   */
  compactEntries?: number
}

type Hash = Map<string, Uint8Array>

type Handler = (args: readonly WireArgument[]) => WireValue

type CommandSpec = {
  /** Exact argument count including the command name, or the minimum when negative. */
  arity: number
  run: Handler
}

const DEFAULT_SCAN_COUNT = 10
const INTEGER_TEXT = /^[+-]?\d+$/
const FLOAT_TEXT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/
const INFINITY_TEXT = /^([+-]?)inf(?:inity)?$/i
const INT64_MIN = -(2n ** 63n)
const INT64_MAX = 2n ** 63n - 1n

const lenient = new TextDecoder("utf-8")

function text(arg: WireArgument | undefined): string {
  if (arg === undefined) return ""

  return typeof arg === "string" ? arg : lenient.decode(arg)
}

function bytesOf(arg: WireArgument | undefined): Uint8Array {
  if (arg === undefined) return new Uint8Array()

  return typeof arg === "string" ? utf8Encode(arg) : new Uint8Array(arg)
}

function parseInteger(value: string): number | undefined {
  if (!INTEGER_TEXT.test(value)) return undefined

  const n = Number(value)

  return Number.isSafeInteger(n) ? n : undefined
}

function parseInt64(value: string): bigint | undefined {
  if (!INTEGER_TEXT.test(value)) return undefined

  const n = BigInt(value)

  return n >= INT64_MIN && n <= INT64_MAX ? n : undefined
}

function parseFloatValue(value: string): number | undefined {
  const inf = INFINITY_TEXT.exec(value)
  if (inf) return inf[1] === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY

  return FLOAT_TEXT.test(value) ? Number(value) : undefined
}

function bulk(value: Uint8Array): WireValue {
  return wire.bulk(new Uint8Array(value))
}

/**
 * In-process stand-in for the store, limited to the hash commands plus
 * `DEL` and `EXISTS`.
 *
 * @remarks
 * - Replies use the store's shapes and error texts.
 * - Hashes that lose their last field are removed.
 * - `HSCAN` positions are offsets into insertion order; `MATCH` is applied to
 *   each page after it is cut, so pages may come back empty mid-scan.
 * - Not safe to share across tests that expect isolation; call `clear()`.
 */
export class MemoryCommandTransport implements CommandTransport {
  private readonly hashes = new Map<string, Hash>()
  private readonly commands: ReadonlyMap<string, CommandSpec>

  public constructor(private readonly opts: MemoryCommandTransportOptions = {}) {
    this.commands = new Map<string, CommandSpec>([
      ["HGET", { arity: 3, run: (a) => this.hget(a) }],
      ["HMGET", { arity: -3, run: (a) => this.hmget(a) }],
      ["HGETALL", { arity: 2, run: (a) => this.hgetall(a) }],
      ["HSET", { arity: -4, run: (a) => this.hset(a) }],
      ["HSETNX", { arity: 4, run: (a) => this.hsetnx(a) }],
      ["HMSET", { arity: -4, run: (a) => this.hmset(a) }],
      ["HDEL", { arity: -3, run: (a) => this.hdel(a) }],
      ["HEXISTS", { arity: 3, run: (a) => this.hexists(a) }],
      ["HLEN", { arity: 2, run: (a) => this.hlen(a) }],
      ["HSTRLEN", { arity: 3, run: (a) => this.hstrlen(a) }],
      ["HKEYS", { arity: 2, run: (a) => this.hkeys(a) }],
      ["HVALS", { arity: 2, run: (a) => this.hvals(a) }],
      ["HINCRBY", { arity: 4, run: (a) => this.hincrby(a) }],
      ["HINCRBYFLOAT", { arity: 4, run: (a) => this.hincrbyfloat(a) }],
      ["HSCAN", { arity: -3, run: (a) => this.hscan(a) }],
      ["DEL", { arity: -2, run: (a) => this.del(a) }],
      ["EXISTS", { arity: -2, run: (a) => this.exists(a) }],
    ])
  }

  async submit(command: WireCommand): Promise<WireValue> {
    const name = text(command[0]).toUpperCase()
    const spec = this.commands.get(name)

    if (!spec) return wire.error(`ERR unknown command '${text(command[0])}'`)

    const arityOk =
      spec.arity >= 0 ? command.length === spec.arity : command.length >= -spec.arity

    if (!arityOk) {
      return wire.error(`ERR wrong number of arguments for '${name.toLowerCase()}' command`)
    }

    return spec.run(command)
  }

  /** Removes every key. */
  clear(): void {
    this.hashes.clear()
  }

  private hget(args: readonly WireArgument[]): WireValue {
    const value = this.hashes.get(text(args[1]))?.get(text(args[2]))

    return value ? bulk(value) : wire.null()
  }

  private hmget(args: readonly WireArgument[]): WireValue {
    const hash = this.hashes.get(text(args[1]))

    return wire.array(
      args.slice(2).map((field) => {
        const value = hash?.get(text(field))

        return value ? bulk(value) : wire.null()
      }),
    )
  }

  private hgetall(args: readonly WireArgument[]): WireValue {
    const hash = this.hashes.get(text(args[1]))
    const items: WireValue[] = []

    for (const [field, value] of hash ?? []) {
      items.push(wire.bulk(field), bulk(value))
    }

    return wire.array(items)
  }

  private hset(args: readonly WireArgument[]): WireValue {
    if (args.length % 2 !== 0) {
      return wire.error("ERR wrong number of arguments for 'hset' command")
    }

    return wire.integer(this.write(text(args[1]), args.slice(2)))
  }

  private hsetnx(args: readonly WireArgument[]): WireValue {
    const key = text(args[1])
    const field = text(args[2])

    if (this.hashes.get(key)?.has(field)) return wire.integer(0)

    this.hashOf(key).set(field, bytesOf(args[3]))

    return wire.integer(1)
  }

  private hmset(args: readonly WireArgument[]): WireValue {
    if (args.length % 2 !== 0) {
      return wire.error("ERR wrong number of arguments for 'hmset' command")
    }

    this.write(text(args[1]), args.slice(2))

    return wire.status("OK")
  }

  private hdel(args: readonly WireArgument[]): WireValue {
    const key = text(args[1])
    const hash = this.hashes.get(key)
    if (!hash) return wire.integer(0)

    let removed = 0
    for (const field of args.slice(2)) {
      if (hash.delete(text(field))) removed += 1
    }

    if (hash.size === 0) this.hashes.delete(key)

    return wire.integer(removed)
  }

  private hexists(args: readonly WireArgument[]): WireValue {
    return wire.integer(this.hashes.get(text(args[1]))?.has(text(args[2])) ? 1 : 0)
  }

  private hlen(args: readonly WireArgument[]): WireValue {
    return wire.integer(this.hashes.get(text(args[1]))?.size ?? 0)
  }

  private hstrlen(args: readonly WireArgument[]): WireValue {
    return wire.integer(this.hashes.get(text(args[1]))?.get(text(args[2]))?.byteLength ?? 0)
  }

  private hkeys(args: readonly WireArgument[]): WireValue {
    const hash = this.hashes.get(text(args[1]))

    return wire.array([...(hash?.keys() ?? [])].map((field) => wire.bulk(field)))
  }

  private hvals(args: readonly WireArgument[]): WireValue {
    const hash = this.hashes.get(text(args[1]))

    return wire.array([...(hash?.values() ?? [])].map(bulk))
  }

  private hincrby(args: readonly WireArgument[]): WireValue {
    const amount = parseInt64(text(args[3]))
    if (amount === undefined) return wire.error("ERR value is not an integer or out of range")

    const key = text(args[1])
    const field = text(args[2])
    const stored = this.hashes.get(key)?.get(field)

    const current = stored === undefined ? 0n : parseInt64(utf8Decode(stored) ?? "")
    if (current === undefined) return wire.error("ERR hash value is not an integer")

    const next = current + amount
    if (next < INT64_MIN || next > INT64_MAX) {
      return wire.error("ERR increment or decrement would overflow")
    }

    this.hashOf(key).set(field, utf8Encode(String(next)))

    return wire.integer(next)
  }

  private hincrbyfloat(args: readonly WireArgument[]): WireValue {
    const amount = parseFloatValue(text(args[3]))
    if (amount === undefined) return wire.error("ERR value is not a valid float")

    const key = text(args[1])
    const field = text(args[2])
    const stored = this.hashes.get(key)?.get(field)

    const current = stored === undefined ? 0 : parseFloatValue(utf8Decode(stored) ?? "")
    if (current === undefined) return wire.error("ERR hash value is not a float")

    const next = current + amount
    if (!Number.isFinite(next)) return wire.error("ERR increment would produce NaN or Infinity")

    const rendered = String(next)
    this.hashOf(key).set(field, utf8Encode(rendered))

    return wire.bulk(rendered)
  }

  private hscan(args: readonly WireArgument[]): WireValue {
    const position = text(args[2])
    if (!/^\d+$/.test(position)) return wire.error("ERR invalid cursor")

    let pattern: RegExp | undefined
    let count = DEFAULT_SCAN_COUNT

    for (let i = 3; i < args.length; i += 2) {
      const option = text(args[i]).toUpperCase()
      const value = args[i + 1]

      if (value === undefined) return wire.error("ERR syntax error")

      if (option === "MATCH") {
        pattern = compileGlob(text(value))
      } else if (option === "COUNT") {
        const n = parseInteger(text(value))
        if (n === undefined) return wire.error("ERR value is not an integer or out of range")
        if (n < 1) return wire.error("ERR syntax error")
        count = n
      } else {
        return wire.error("ERR syntax error")
      }
    }

    const entries = [...(this.hashes.get(text(args[1])) ?? [])]
    const compact = entries.length <= (this.opts.compactEntries ?? 0)

    const from = compact ? 0 : Number(position)
    const to = compact ? entries.length : from + count
    const next = to >= entries.length ? 0 : to

    const items: WireValue[] = []
    for (const [field, value] of entries.slice(from, to)) {
      if (pattern && !pattern.test(field)) continue
      items.push(wire.bulk(field), bulk(value))
    }

    return wire.array([wire.bulk(String(next)), wire.array(items)])
  }

  private del(args: readonly WireArgument[]): WireValue {
    let removed = 0
    for (const key of args.slice(1)) {
      if (this.hashes.delete(text(key))) removed += 1
    }

    return wire.integer(removed)
  }

  private exists(args: readonly WireArgument[]): WireValue {
    return wire.integer(args.slice(1).filter((key) => this.hashes.has(text(key))).length)
  }

  private hashOf(key: string): Hash {
    let hash = this.hashes.get(key)

    if (!hash) {
      hash = new Map()
      this.hashes.set(key, hash)
    }

    return hash
  }

  /**
   * Writes `[field, value, ...]` pairs and returns how many fields were new.
   */
  private write(key: string, pairs: readonly WireArgument[]): number {
    const hash = this.hashOf(key)
    let added = 0

    for (let i = 0; i + 1 < pairs.length; i += 2) {
      const field = text(pairs[i])
      if (!hash.has(field)) added += 1
      hash.set(field, bytesOf(pairs[i + 1]))
    }

    return added
  }
}
