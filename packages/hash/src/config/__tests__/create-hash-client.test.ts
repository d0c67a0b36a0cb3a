import { NullLogger } from "@hashwire/logger"
import { mock } from "vitest-mock-extended"
import { convert } from "../../core/codec/convertibles"
import { REPLY_TYPE_MAPPING, type RedisCommandClient } from "../../adapters/redis/redis-client"
import type { Mock } from "../../tests/mock"
import { createHashClient } from "../create-hash-client"
import type { HashClientEnv } from "../hash-client-env"

const env: HashClientEnv = {
  REDIS_URL: "redis://localhost:6379",
  HASH_KEYSPACE_PREFIX: "app:",
  HASH_SCAN_COUNT: 50,
  LOG_LEVEL: "info",
  LOG_PRETTY: false,
}

describe("createHashClient", () => {
  let client: Mock<RedisCommandClient>

  beforeEach(() => {
    client = mock<RedisCommandClient>({ isOpen: false })
  })

  it("sends commands through the client with the keyspace prefix", async () => {
    client.sendCommand.mockResolvedValue(Buffer.from("Ada"))
    const hash = createHashClient(env, { client, logger: new NullLogger() })

    const name = await hash.commands.hget("name", "user:1", convert.string)

    expect(name).toBe("Ada")
    expect(client.sendCommand).toHaveBeenCalledExactlyOnceWith(["HGET", "app:user:1", "name"], {
      typeMapping: REPLY_TYPE_MAPPING,
    })
  })

  it("applies the configured scan count to full scans", async () => {
    client.sendCommand.mockResolvedValue([Buffer.from("0"), []])
    const hash = createHashClient(env, { client, logger: new NullLogger() })

    for await (const _page of hash.commands.hscanAll("h", convert.string)) {
      // drain
    }

    expect(client.sendCommand).toHaveBeenCalledExactlyOnceWith(
      ["HSCAN", "app:h", "0", "COUNT", "50"],
      { typeMapping: REPLY_TYPE_MAPPING },
    )
  })

  it("connects only when closed", async () => {
    const hash = createHashClient(env, { client, logger: new NullLogger() })

    await hash.connect()
    expect(client.connect).toHaveBeenCalledOnce()

    client.isOpen = true
    await hash.connect()
    expect(client.connect).toHaveBeenCalledOnce()
  })

  it("closes only when open", async () => {
    const hash = createHashClient(env, { client, logger: new NullLogger() })

    await hash.close()
    expect(client.quit).not.toHaveBeenCalled()

    client.isOpen = true
    await hash.close()
    expect(client.quit).toHaveBeenCalledOnce()
  })

  it("exposes the client and logger it was given", () => {
    const logger = new NullLogger()
    const hash = createHashClient(env, { client, logger })

    expect(hash.client).toBe(client)
    expect(hash.logger).toBe(logger)
  })
})
