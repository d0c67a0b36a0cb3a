import type { FieldName, HashKey } from "./hash-key"
import type { HashScanOptions, HashScanPage, ScanFilter, ScanPosition } from "./hash-scan"
import type { WireConvertible } from "./wire-convertible"
import type { WireCommand } from "./wire-value"

/**
 * Caller-held scan state driven by {@link HashCommands.hscanCursor}.
 */
export interface HashScanCursor {
  readonly position: ScanPosition
  readonly pattern: string | undefined
  readonly count: number | undefined
  readonly isComplete: boolean
  toArguments(command: string, key: HashKey): WireCommand
  advance(next: ScanPosition): void
}

export type FieldValues<T> = ReadonlyMap<FieldName, T> | Readonly<Record<FieldName, T>>

/**
 * Typed commands for the store's hash data type.
 *
 * @remarks
 * - Every method performs at most one round trip, except `hscanAll`.
 * - Typed reads return `undefined` both for missing fields and for values that
 *   do not convert to the requested type. Callers cannot tell the two apart.
 * - Transport failures reject unchanged. Store error replies reject with
 *   `ServerReplyError`; replies of the wrong shape with `MalformedReplyError`.
 * - Invalid arguments reject with `ArgumentMisuseError` before anything is sent.
 */
export interface HashCommands {
  /**
   * Value of one field.
   */
  hget<T>(field: FieldName, key: HashKey, as: WireConvertible<T>): Promise<T | undefined>

  /**
   * Values of several fields, one slot per requested field in request order.
   *
   * @remarks
   * An empty `fields` list resolves to `[]` without contacting the store.
   */
  hmget<T>(
    fields: readonly FieldName[],
    key: HashKey,
    as: WireConvertible<T>,
  ): Promise<(T | undefined)[]>

  /**
   * Every field and value, in store order.
   */
  hgetall<T>(key: HashKey, as: WireConvertible<T>): Promise<Map<FieldName, T | undefined>>

  /**
   * Sets one field, overwriting any existing value.
   *
   * @returns `true` when the field was created, `false` when it was updated.
   */
  hset<T>(field: FieldName, value: T, key: HashKey, as: WireConvertible<T>): Promise<boolean>

  /**
   * Sets one field only if it does not exist yet.
   *
   * @returns `true` when the value was stored.
   */
  hsetnx<T>(field: FieldName, value: T, key: HashKey, as: WireConvertible<T>): Promise<boolean>

  /**
   * Sets several fields at once. At least one field is required.
   */
  hmset<T>(fields: FieldValues<T>, key: HashKey, as: WireConvertible<T>): Promise<void>

  /**
   * Removes fields.
   *
   * @returns How many of the fields existed and were removed.
   */
  hdel(fields: readonly FieldName[], key: HashKey): Promise<number>

  hexists(field: FieldName, key: HashKey): Promise<boolean>

  /** Number of fields; `0` for a missing key. */
  hlen(key: HashKey): Promise<number>

  /** Byte length of a field's value; `0` when the field or key is missing. */
  hstrlen(field: FieldName, key: HashKey): Promise<number>

  hkeys(key: HashKey): Promise<FieldName[]>

  hvals<T>(key: HashKey, as: WireConvertible<T>): Promise<(T | undefined)[]>

  /**
   * Adds an integer to a field, treating a missing field as `0`.
   *
   * @remarks
   * The store counts in signed 64 bits. A `number` amount must be a safe
   * integer and a result outside the safe range rejects with
   * `MalformedReplyError`; pass a `bigint` to use the full range.
   *
   * @returns The value after the increment, as the same type as `amount`.
   */
  hincrby(amount: number, field: FieldName, key: HashKey): Promise<number>
  hincrby(amount: bigint, field: FieldName, key: HashKey): Promise<bigint>

  /**
   * Adds a floating point amount to a field, treating a missing field as `0`.
   *
   * @returns The value after the increment.
   */
  hincrbyfloat(amount: number, field: FieldName, key: HashKey): Promise<number>

  /**
   * One round trip of an incremental scan.
   *
   * @remarks
   * Pattern filtering happens in the store. Pages may be empty while the scan is
   * still in progress; only `nextPosition === 0` ends it. A missing key yields
   * `{ nextPosition: 0, fields: empty }` on the first call.
   */
  hscan<T>(key: HashKey, as: WireConvertible<T>, options?: HashScanOptions): Promise<HashScanPage<T>>

  /**
   * One round trip driven by a caller-held cursor, which is advanced with the
   * position the store returns.
   *
   * @throws {ArgumentMisuseError} when the cursor is already complete.
   */
  hscanCursor<T>(key: HashKey, cursor: HashScanCursor, as: WireConvertible<T>): Promise<HashScanPage<T>>

  /**
   * Runs a complete scan from position `0`, one page per iteration.
   *
   * @remarks
   * Weakly consistent: fields may repeat across pages, and fields added or
   * removed during the scan may or may not appear.
   */
  hscanAll<T>(key: HashKey, as: WireConvertible<T>, filter?: ScanFilter): AsyncIterable<HashScanPage<T>>
}
