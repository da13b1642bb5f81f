/**
 * Tests for the unit store.
 *
 * Covers:
 * - Declaration and idempotent re-declaration
 * - Lookup of undeclared units
 * - Amount resolution including price quotes
 */

import { describe, it, expect, beforeEach } from "vitest";
import { UnitStore } from "../src/units.js";
import { catchLedgerError } from "./helpers.js";

describe("UnitStore", () => {
  let units: UnitStore;

  beforeEach(() => {
    units = new UnitStore();
  });

  it("assigns indices in declaration order", () => {
    expect(units.declare("USD")).toBe(0);
    expect(units.declare("EUR")).toBe(1);
    expect(units.getAll()).toEqual(["USD", "EUR"]);
    expect(units.count).toBe(2);
  });

  it("returns the same index when re-declared", () => {
    units.declare("USD");
    units.declare("EUR");
    expect(units.declare("USD")).toBe(0);
    expect(units.count).toBe(2);
  });

  it("rejects an undeclared unit", () => {
    const err = catchLedgerError(() => units.lookup("XYZ"));
    expect(err.code).toBe("UNDECLARED_UNIT");
    expect(err.message).toBe('unit "XYZ" is not declared');
    expect(units.has("XYZ")).toBe(false);
  });

  it("unresolves indices back to codes", () => {
    units.declare("IDR");
    expect(units.unresolve(0)).toBe("IDR");
    expect(units.unresolve(1)).toBeUndefined();
  });

  it("resolves an amount and its quotes", () => {
    units.declare("USD");
    units.declare("EUR");
    expect(
      units.resolveAmount({
        nominal: 40,
        currency: "EUR",
        prices: [{ nominal: 1.25, currency: "USD" }],
      }),
    ).toEqual({ nominal: 40, currency: 1, prices: [{ nominal: 1.25, currency: 0 }] });
  });

  it("rejects an amount quoted in an undeclared unit", () => {
    units.declare("EUR");
    const err = catchLedgerError(() =>
      units.resolveAmount({ nominal: 40, currency: "EUR", prices: [{ nominal: 1.25, currency: "USD" }] }),
    );
    expect(err.code).toBe("UNDECLARED_UNIT");
  });

  it("clones independently", () => {
    units.declare("USD");
    const copy = units.clone();
    copy.declare("EUR");
    expect(units.getAll()).toEqual(["USD"]);
    expect(copy.lookup("USD")).toBe(0);
  });
});
