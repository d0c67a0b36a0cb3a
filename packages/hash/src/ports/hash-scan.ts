import type { FieldName } from "./hash-key"

/**
 * Opaque iteration token issued by the store. `0` is both the start and the
 * end of a logical scan.
 */
export type ScanPosition = number

export const SCAN_START: ScanPosition = 0

export type ScanState = "not_started" | "in_progress" | "complete"

export type ScanFilter = {
  /** Glob-style pattern applied by the store to field names. */
  readonly pattern?: string

  /**
   * Work hint per round trip. The store may return more or fewer elements.
   * Passed through as given, including zero and negative values.
   */
  readonly count?: number
}

export type HashScanOptions = ScanFilter & {
  /** @default 0 */
  readonly position?: ScanPosition
}

export type HashScanPage<T> = {
  /** Pass back to continue; `0` means the scan is complete. */
  readonly nextPosition: ScanPosition

  /** Fields in the order the store returned them. */
  readonly fields: ReadonlyMap<FieldName, T | undefined>
}
