import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const child = logger.child({ module: "hash" }).child({ command: "HGET" })

      child.info("round trip")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({ module: "hash", command: "HGET" })
    })

    it("child() overrides on key conflict (shallow)", () => {
      const { logger, read } = h.make({ level: "trace" })

      const child = logger.child({ command: "HGET" }).child({ command: "HSET" })

      child.info("round trip")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload.command).toBe("HSET")
    })

    it("child() does not mutate the parent", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ module: "hash" })
      const child = parent.child({ key: "users:1" })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).toMatchObject({ module: "hash" })
      expect(logs[0]?.payload).not.toHaveProperty("key")
      expect(logs[1]?.payload).toMatchObject({ module: "hash", key: "users:1" })
    })

    it("per-call meta merges with bound context", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ module: "hash" }).debug("page", { position: 17 })

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({ module: "hash", position: 17 })
    })

    it("level filtering: entries below the configured minimum are dropped", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.trace("trace")
      logger.info("info")
      logger.warn("warn")
      logger.error("error")
      logger.fatal("fatal")

      expect(read().map((l) => l.level)).toStrictEqual(["warn", "error", "fatal"])
    })

    it("clear() empties captured entries", () => {
      const { logger, read, clear } = h.make({ level: "trace" })

      logger.info("one")
      clear()
      logger.info("two")

      expect(read()).toHaveLength(1)
    })
  })
}
