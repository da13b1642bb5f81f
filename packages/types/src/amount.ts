/**
 * Amount Types
 *
 * Nominals are IEEE 754 numbers. Price quotes are attached to the
 * amount they convert; there is no global exchange-rate table.
 */

/** Index of a declared unit in the unit store. */
export type UnitIndex = number;

/**
 * A conversion quote as written in source: `@ 1.25 EUR` means one unit
 * of the owning amount's currency equals 1.25 EUR.
 */
export interface ParsedPrice {
  readonly nominal: number;
  readonly currency: string;
}

/** An amount as written in source, e.g. `40 EUR @ 1.25 USD`. */
export interface ParsedAmount {
  readonly nominal: number;
  readonly currency: string;
  readonly prices: readonly ParsedPrice[];
}

/** A resolved price quote. */
export interface Price {
  readonly nominal: number;
  readonly currency: UnitIndex;
}

/** A resolved amount, referencing units by index. */
export interface Amount {
  readonly nominal: number;
  readonly currency: UnitIndex;
  readonly prices: readonly Price[];
}
