import type { HashKey } from "../../ports/hash-key"
import type { HashScanCursor } from "../../ports/hash-commands"
import { type HashScanOptions, type ScanPosition, type ScanState, SCAN_START } from "../../ports/hash-scan"
import type { WireArgument, WireCommand } from "../../ports/wire-value"
import { ArgumentMisuseError } from "../errors/errors"

/**
 * Filter for the scan, plus a position issued earlier to resume from.
 */
export type ScanCursorInit = HashScanOptions

/**
 * Iteration state of one logical scan.
 *
 * @remarks
 * The pattern and count are fixed for the life of the cursor. The scan is
 * complete once a round trip returns position `0`, never because a page came
 * back empty. A cursor is driven by one caller at a time.
 *
 * @example
 * ```ts
 * const cursor = new ScanCursor({ pattern: "user:*", count: 100 })
 * while (!cursor.isComplete) {
 *   const page = await commands.hscanCursor("users", cursor, convert.string)
 *   handle(page.fields)
 * }
 * ```
 */
export class ScanCursor implements HashScanCursor {
  readonly pattern: string | undefined
  readonly count: number | undefined

  private current: ScanPosition
  private status: ScanState
  private trips = 0

  constructor(init: ScanCursorInit = {}) {
    const position = init.position ?? SCAN_START

    if (!Number.isSafeInteger(position) || position < 0) {
      throw new ArgumentMisuseError("Scan position must be a non-negative safe integer", {
        position,
      })
    }

    this.pattern = init.pattern
    this.count = init.count
    this.current = position
    this.status = position === SCAN_START ? "not_started" : "in_progress"
  }

  get state(): ScanState {
    return this.status
  }

  get position(): ScanPosition {
    return this.current
  }

  get isComplete(): boolean {
    return this.status === "complete"
  }

  /** Round trips recorded since construction or the last restart. */
  get roundTrips(): number {
    return this.trips
  }

  /**
   * Request arguments for the next round trip: the position, then `MATCH` and
   * `COUNT` only when set. The count is forwarded as given.
   */
  toArguments(command: string, key: HashKey): WireCommand {
    const args: WireArgument[] = [command, key, String(this.current)]

    if (this.pattern !== undefined) args.push("MATCH", this.pattern)
    if (this.count !== undefined) args.push("COUNT", String(this.count))

    return args
  }

  /**
   * Records a round trip that returned `next`.
   *
   * @throws {ArgumentMisuseError} when the scan is already complete.
   */
  advance(next: ScanPosition): void {
    if (this.status === "complete") {
      throw new ArgumentMisuseError("Scan cursor is already complete", {
        roundTrips: this.trips,
      })
    }

    this.trips += 1
    this.current = next
    this.status = next === SCAN_START ? "complete" : "in_progress"
  }

  /**
   * Starts an unrelated enumeration with the same filter.
   */
  restart(): void {
    this.current = SCAN_START
    this.status = "not_started"
    this.trips = 0
  }
}
