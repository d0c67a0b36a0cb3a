import { createPinoLogger, type Logger } from "@hashwire/logger"
import { createRedisClient, type RedisCommandClient } from "../adapters/redis/redis-client"
import { RedisCommandTransport } from "../adapters/redis/redis-command-transport"
import { WireHashCommands } from "../core/commands/wire-hash-commands"
import type { HashCommands } from "../ports/hash-commands"
import type { HashClientEnv } from "./hash-client-env"

export type HashClient = {
  readonly commands: HashCommands
  readonly client: RedisCommandClient
  readonly logger: Logger

  /** Opens the connection unless it is already open. */
  connect(): Promise<void>

  /** Closes the connection if it is open. */
  close(): Promise<void>
}

export type CreateHashClientDeps = {
  /** Defaults to a client for `REDIS_URL`. */
  client?: RedisCommandClient
  /** Defaults to a pino logger honouring `LOG_LEVEL` and `LOG_PRETTY`. */
  logger?: Logger
}

/**
 * Wires a Redis-backed {@link HashCommands} from validated settings.
 *
 * @example
 * ```ts
 * const env = await loadHashClientEnv()
 * const hash = createHashClient(env.value)
 *
 * await hash.connect()
 * await hash.commands.hset("name", "Ada", "user:1", convert.string)
 * await hash.close()
 * ```
 */
export function createHashClient(env: HashClientEnv, deps: CreateHashClientDeps = {}): HashClient {
  const client = deps.client ?? createRedisClient({ url: env.REDIS_URL })
  const logger =
    deps.logger ?? createPinoLogger({ level: env.LOG_LEVEL, prettify: env.LOG_PRETTY })

  const commands = new WireHashCommands(
    { transport: new RedisCommandTransport({ client }), logger },
    {
      keyspacePrefix: env.HASH_KEYSPACE_PREFIX,
      ...(env.HASH_SCAN_COUNT !== undefined && { scanCount: env.HASH_SCAN_COUNT }),
    },
  )

  return {
    commands,
    client,
    logger,
    async connect() {
      if (!client.isOpen) await client.connect()
    },
    async close() {
      if (client.isOpen) await client.quit()
    },
  }
}
