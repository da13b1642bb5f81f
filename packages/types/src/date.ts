/**
 * Calendar date in `YYYY-MM-DD` form.
 *
 * Dates are kept as strings: the fixed-width format sorts and compares
 * lexicographically in calendar order, and carries no time zone.
 */
export type LedgerDate = string;
