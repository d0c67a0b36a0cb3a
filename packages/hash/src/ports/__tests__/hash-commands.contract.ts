import { z } from "zod"
import { convert } from "../../core/codec/convertibles"
import {
  ArgumentMisuseError,
  MalformedReplyError,
  ServerReplyError,
} from "../../core/errors/errors"
import { ScanCursor } from "../../core/scan/scan-cursor"
import { bytes, fieldNames, keys, sorted } from "../../tests/utils/hash-test-helpers"
import type { HashCommands } from "../hash-commands"
import type { FieldName } from "../hash-key"

type CreateHashCommands = () => HashCommands

export function describeHashCommandsContract(
  adapterName: string,
  createCommands: CreateHashCommands,
): void {
  describe(`HashCommands Contract Tests - ${adapterName}`, () => {
    let commands: HashCommands

    beforeEach(() => {
      commands = createCommands()
    })

    async function fillHash(count: number, prefix = "f"): Promise<FieldName[]> {
      const fields = fieldNames(count, prefix)

      await commands.hmset(
        new Map(fields.map((f, i): [FieldName, string] => [f, String(i)])),
        keys.user(),
        convert.string,
      )

      return fields
    }

    async function scanFieldNames(pattern?: string, count?: number): Promise<FieldName[]> {
      const seen = new Set<FieldName>()

      for await (const page of commands.hscanAll(keys.user(), convert.string, {
        ...(pattern !== undefined && { pattern }),
        ...(count !== undefined && { count }),
      })) {
        for (const field of page.fields.keys()) seen.add(field)
      }

      return sorted(seen)
    }

    describe("hget / hset", () => {
      it("returns undefined for a missing key", async () => {
        expect(await commands.hget("name", keys.missing(), convert.string)).toBeUndefined()
      })

      it("returns undefined for a missing field of an existing hash", async () => {
        await commands.hset("name", "Ada", keys.user(), convert.string)

        expect(await commands.hget("email", keys.user(), convert.string)).toBeUndefined()
      })

      it("round-trips a string value", async () => {
        await commands.hset("name", "Ada Lovelace", keys.user(), convert.string)

        expect(await commands.hget("name", keys.user(), convert.string)).toBe("Ada Lovelace")
      })

      it("returns true when creating a field and false when updating it", async () => {
        expect(await commands.hset("name", "Ada", keys.user(), convert.string)).toBe(true)
        expect(await commands.hset("name", "Grace", keys.user(), convert.string)).toBe(false)
        expect(await commands.hget("name", keys.user(), convert.string)).toBe("Grace")
      })

      it("round-trips binary values byte-for-byte", async () => {
        await commands.hset("blob", bytes.binary(), keys.user(), convert.bytes)

        expect(await commands.hget("blob", keys.user(), convert.bytes)).toStrictEqual(
          bytes.binary(),
        )
      })

      it("round-trips integers, floats, bigints and booleans", async () => {
        await commands.hset("int", -42, keys.user(), convert.integer)
        await commands.hset("float", 0.1, keys.user(), convert.float)
        await commands.hset("neg-inf", Number.NEGATIVE_INFINITY, keys.user(), convert.float)
        await commands.hset("big", 9223372036854775807n, keys.user(), convert.bigint)
        await commands.hset("flag", true, keys.user(), convert.boolean)

        expect(await commands.hget("int", keys.user(), convert.integer)).toBe(-42)
        expect(await commands.hget("float", keys.user(), convert.float)).toBe(0.1)
        expect(await commands.hget("neg-inf", keys.user(), convert.float)).toBe(
          Number.NEGATIVE_INFINITY,
        )
        expect(await commands.hget("big", keys.user(), convert.bigint)).toBe(9223372036854775807n)
        expect(await commands.hget("flag", keys.user(), convert.boolean)).toBe(true)
      })

      it("round-trips JSON validated by a schema", async () => {
        const profile = convert.json(z.object({ name: z.string(), age: z.number() }))

        await commands.hset("profile", { name: "Ada", age: 36 }, keys.user(), profile)

        expect(await commands.hget("profile", keys.user(), profile)).toStrictEqual({
          name: "Ada",
          age: 36,
        })
      })

      it("returns undefined when the stored value does not convert", async () => {
        await commands.hset("name", "Ada", keys.user(), convert.string)

        expect(await commands.hget("name", keys.user(), convert.integer)).toBeUndefined()
      })

      it("rejects a value with no wire form before sending anything", async () => {
        await expect(
          commands.hset("ratio", Number.NaN, keys.user(), convert.float),
        ).rejects.toBeInstanceOf(ArgumentMisuseError)

        expect(await commands.hexists("ratio", keys.user())).toBe(false)
      })
    })

    describe("hmget", () => {
      it("returns one slot per requested field in request order", async () => {
        await commands.hmset({ a: "1", c: "3" }, keys.user(), convert.string)

        const values = await commands.hmget(["c", "b", "a", "c"], keys.user(), convert.string)

        expect(values).toStrictEqual(["3", undefined, "1", "3"])
      })

      it("returns all slots absent for a missing key", async () => {
        const values = await commands.hmget(["a", "b"], keys.missing(), convert.string)

        expect(values).toStrictEqual([undefined, undefined])
      })

      it("returns an empty list for an empty request", async () => {
        expect(await commands.hmget([], keys.user(), convert.string)).toStrictEqual([])
      })
    })

    describe("hgetall", () => {
      it("returns an empty map for a missing key", async () => {
        const all = await commands.hgetall(keys.missing(), convert.string)

        expect(all.size).toBe(0)
      })

      it("returns every field and value", async () => {
        await commands.hmset({ a: "1", b: "2" }, keys.user(), convert.string)

        const all = await commands.hgetall(keys.user(), convert.integer)

        expect(all).toEqual(
          new Map([
            ["a", 1],
            ["b", 2],
          ]),
        )
      })

      it("keeps a field whose value does not convert, with an undefined value", async () => {
        await commands.hmset({ a: "1", b: "two" }, keys.user(), convert.string)

        const all = await commands.hgetall(keys.user(), convert.integer)

        expect(all.get("a")).toBe(1)
        expect(all.has("b")).toBe(true)
        expect(all.get("b")).toBeUndefined()
      })
    })

    describe("hsetnx", () => {
      it("stores the value when the field is new", async () => {
        expect(await commands.hsetnx("name", "Ada", keys.user(), convert.string)).toBe(true)
        expect(await commands.hget("name", keys.user(), convert.string)).toBe("Ada")
      })

      it("leaves an existing field unchanged", async () => {
        await commands.hset("name", "Ada", keys.user(), convert.string)

        expect(await commands.hsetnx("name", "Grace", keys.user(), convert.string)).toBe(false)
        expect(await commands.hget("name", keys.user(), convert.string)).toBe("Ada")
      })
    })

    describe("hmset", () => {
      it("accepts a Map", async () => {
        await commands.hmset(
          new Map([
            ["x", 1],
            ["y", 2],
          ]),
          keys.user(),
          convert.integer,
        )

        expect(await commands.hmget(["x", "y"], keys.user(), convert.integer)).toStrictEqual([1, 2])
      })

      it("overwrites existing fields", async () => {
        await commands.hset("x", 1, keys.user(), convert.integer)
        await commands.hmset({ x: 9 }, keys.user(), convert.integer)

        expect(await commands.hget("x", keys.user(), convert.integer)).toBe(9)
      })

      it("rejects an empty mapping", async () => {
        await expect(commands.hmset({}, keys.user(), convert.string)).rejects.toBeInstanceOf(
          ArgumentMisuseError,
        )
      })
    })

    describe("hdel / hexists / hlen", () => {
      it("counts only the fields that existed", async () => {
        await commands.hmset({ a: "1", b: "2" }, keys.user(), convert.string)

        expect(await commands.hdel(["a", "zzz"], keys.user())).toBe(1)
        expect(await commands.hexists("a", keys.user())).toBe(false)
        expect(await commands.hexists("b", keys.user())).toBe(true)
      })

      it("returns 0 for an empty field list", async () => {
        expect(await commands.hdel([], keys.user())).toBe(0)
      })

      it("removes the hash with its last field", async () => {
        await commands.hset("only", "1", keys.user(), convert.string)
        await commands.hdel(["only"], keys.user())

        expect(await commands.hlen(keys.user())).toBe(0)
        expect((await commands.hscan(keys.user(), convert.string)).nextPosition).toBe(0)
      })

      it("reports the number of fields", async () => {
        await fillHash(3)

        expect(await commands.hlen(keys.user())).toBe(3)
        expect(await commands.hlen(keys.missing())).toBe(0)
      })
    })

    describe("hstrlen", () => {
      it("returns the byte length of the value", async () => {
        await commands.hset("name", "héllo", keys.user(), convert.string)

        expect(await commands.hstrlen("name", keys.user())).toBe(6)
      })

      it("returns 0 for a missing field", async () => {
        expect(await commands.hstrlen("nope", keys.user())).toBe(0)
      })
    })

    describe("hkeys / hvals", () => {
      it("lists every field and value", async () => {
        await commands.hmset({ a: "1", b: "2", c: "3" }, keys.user(), convert.string)

        expect(sorted(await commands.hkeys(keys.user()))).toStrictEqual(["a", "b", "c"])
        expect(
          (await commands.hvals(keys.user(), convert.integer)).sort((x, y) => (x ?? 0) - (y ?? 0)),
        ).toStrictEqual([1, 2, 3])
      })

      it("returns empty lists for a missing key", async () => {
        expect(await commands.hkeys(keys.missing())).toStrictEqual([])
        expect(await commands.hvals(keys.missing(), convert.string)).toStrictEqual([])
      })
    })

    describe("hincrby / hincrbyfloat", () => {
      it("starts a missing field from zero and stores the result as text", async () => {
        expect(await commands.hincrby(5, "counter", keys.counters())).toBe(5)
        expect(await commands.hget("counter", keys.counters(), convert.string)).toBe("5")
      })

      it("accumulates increments and decrements", async () => {
        await commands.hincrby(5, "counter", keys.counters())

        expect(await commands.hincrby(-7, "counter", keys.counters())).toBe(-2)
      })

      it("rejects a value that is not an integer with a server error", async () => {
        await commands.hset("name", "Ada", keys.counters(), convert.string)

        const err = await commands.hincrby(1, "name", keys.counters()).catch((e: unknown) => e)

        expect(err).toBeInstanceOf(ServerReplyError)
        expect(err).toHaveProperty("prefix", "ERR")
      })

      it("counts across the full 64-bit range with bigint amounts", async () => {
        expect(await commands.hincrby(9007199254740992n, "counter", keys.counters())).toBe(
          9007199254740992n,
        )
        expect(await commands.hincrby(1n, "counter", keys.counters())).toBe(9007199254740993n)
        expect(await commands.hget("counter", keys.counters(), convert.bigint)).toBe(
          9007199254740993n,
        )
      })

      it("rejects a number result a number cannot hold exactly", async () => {
        await commands.hset("counter", 9007199254740992n, keys.counters(), convert.bigint)

        await expect(commands.hincrby(1, "counter", keys.counters())).rejects.toBeInstanceOf(
          MalformedReplyError,
        )
      })

      it("rejects an increment that overflows 64 bits with a server error", async () => {
        await commands.hset("counter", 9223372036854775807n, keys.counters(), convert.bigint)

        await expect(commands.hincrby(1n, "counter", keys.counters())).rejects.toBeInstanceOf(
          ServerReplyError,
        )
      })

      it("rejects a fractional integer increment before sending", async () => {
        await expect(commands.hincrby(1.5, "counter", keys.counters())).rejects.toBeInstanceOf(
          ArgumentMisuseError,
        )

        expect(await commands.hexists("counter", keys.counters())).toBe(false)
      })

      it("adds floating point amounts", async () => {
        expect(await commands.hincrbyfloat(2.5, "ratio", keys.counters())).toBe(2.5)
        expect(await commands.hincrbyfloat(-1, "ratio", keys.counters())).toBe(1.5)
      })

      it("rejects a non-finite float increment before sending", async () => {
        await expect(
          commands.hincrbyfloat(Number.POSITIVE_INFINITY, "ratio", keys.counters()),
        ).rejects.toBeInstanceOf(ArgumentMisuseError)
      })
    })

    describe("hscan", () => {
      it("returns position 0 and no fields for a missing key on the first call", async () => {
        const page = await commands.hscan(keys.missing(), convert.string)

        expect(page.nextPosition).toBe(0)
        expect(page.fields.size).toBe(0)
      })

      it("visits every field across a full scan", async () => {
        const fields = await fillHash(300)

        expect(await scanFieldNames(undefined, 7)).toStrictEqual(sorted(fields))
      })

      it("yields the same field set as hkeys", async () => {
        await fillHash(40)

        expect(await scanFieldNames()).toStrictEqual(sorted(await commands.hkeys(keys.user())))
      })

      it("returns only fields matching the pattern", async () => {
        const users = await fillHash(150, "user:")
        await fillHash(150, "team:")

        expect(await scanFieldNames("user:*", 10)).toStrictEqual(sorted(users))
      })

      it("decodes values with the requested convertible", async () => {
        await commands.hmset({ a: "1", b: "x" }, keys.user(), convert.string)

        const page = await commands.hscan(keys.user(), convert.integer, { count: 100 })

        expect(page.fields.get("a")).toBe(1)
        expect(page.fields.has("b")).toBe(true)
        expect(page.fields.get("b")).toBeUndefined()
      })

      it("continues from a caller-held position", async () => {
        const fields = await fillHash(300)
        const seen = new Set<FieldName>()

        let position = 0
        do {
          const page = await commands.hscan(keys.user(), convert.string, { position, count: 25 })
          for (const field of page.fields.keys()) seen.add(field)
          position = page.nextPosition
        } while (position !== 0)

        expect(sorted(seen)).toStrictEqual(sorted(fields))
      })

      it("advances a caller-held cursor until it completes", async () => {
        await fillHash(5)
        const cursor = new ScanCursor({ count: 100 })

        while (!cursor.isComplete) {
          await commands.hscanCursor(keys.user(), cursor, convert.string)
        }

        expect(cursor.roundTrips).toBeGreaterThanOrEqual(1)
        expect(cursor.position).toBe(0)
        await expect(
          commands.hscanCursor(keys.user(), cursor, convert.string),
        ).rejects.toBeInstanceOf(ArgumentMisuseError)
      })
    })
  })
}
