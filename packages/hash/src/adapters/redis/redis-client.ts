import { createClient, RESP_TYPES, type RedisClientOptions } from "redis"

/**
 * How replies are decoded for the transport: strings of either kind arrive as
 * `Buffer`, so binary values survive, and integers as decimal text, so 64-bit
 * values do.
 *
 * @remarks
 * Passed on every `sendCommand` call; a mapping set with `withTypeMapping`
 * does not reach `sendCommand`.
 */
export const REPLY_TYPE_MAPPING = {
  [RESP_TYPES.SIMPLE_STRING]: Buffer,
  [RESP_TYPES.BLOB_STRING]: Buffer,
  [RESP_TYPES.NUMBER]: String,
} as const

export type RedisSendOptions = {
  typeMapping?: typeof REPLY_TYPE_MAPPING
}

/**
 * The slice of a node-redis client the transport needs.
 */
export type RedisCommandClient = {
  sendCommand(args: readonly (string | Buffer)[], options?: RedisSendOptions): Promise<unknown>

  connect(): Promise<unknown>
  quit(): Promise<unknown>
  isOpen: boolean
}

export type RedisCommandClientOptions = { url: string } & Omit<RedisClientOptions, "url">

/**
 * Creates a RESP2 client.
 *
 * @remarks
 * Caller owns `client.connect()` / `client.quit()`.
 */
export function createRedisClient(options: RedisCommandClientOptions): RedisCommandClient {
  return createClient({ ...options, url: options.url, RESP: 2 }) as unknown as RedisCommandClient
}
