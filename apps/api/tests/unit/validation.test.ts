import { describe, it, expect } from "vitest";
import { PickemError, createPickemError, toErrorSummary } from "../../src/shared/errors";
import {
  assertId,
  fromFlag,
  parseEnum,
  parseInteger,
  parseNumber,
  toFlag
} from "../../src/shared/validation";
import { captureError } from "../helpers/errors";

describe("parseInteger", () => {
  it("accepts integers and numeric strings", () => {
    expect(parseInteger("dropWeeks", 2)).toBe(2);
    expect(parseInteger("dropWeeks", "3")).toBe(3);
  });

  it("rejects fractions and values below the minimum", () => {
    expect(captureError(() => parseInteger("dropWeeks", 1.5))).toMatchObject({ code: "validation" });
    expect(captureError(() => parseInteger("dropWeeks", -1, { min: 0 }))).toMatchObject({
      code: "validation",
      message: "dropWeeks must be >= 0"
    });
  });
});

describe("parseNumber", () => {
  it("accepts half-point spreads", () => {
    expect(parseNumber("spread", -3.5)).toBe(-3.5);
    expect(parseNumber("spread", "7")).toBe(7);
  });

  it("rejects empty and non-numeric values", () => {
    expect(captureError(() => parseNumber("spread", ""))).toBeInstanceOf(PickemError);
    expect(captureError(() => parseNumber("spread", "seven"))).toBeInstanceOf(PickemError);
    expect(captureError(() => parseNumber("spread", null))).toBeInstanceOf(PickemError);
  });
});

describe("parseEnum", () => {
  it("returns the matching value or the default", () => {
    expect(parseEnum(2, [0, 1, 2, 3])).toBe(2);
    expect(parseEnum(7, [0, 1, 2, 3])).toBeUndefined();
    expect(parseEnum("x", ["a", "b"], { defaultValue: "a" })).toBe("a");
  });
});

describe("assertId", () => {
  it("accepts positive integers only", () => {
    expect(assertId("leagueId", 4)).toBe(4);
    expect(captureError(() => assertId("leagueId", 0))).toMatchObject({
      code: "validation",
      message: "Invalid leagueId"
    });
  });
});

describe("flags", () => {
  it("round-trips booleans through SQLite integers", () => {
    expect(toFlag(true)).toBe(1);
    expect(toFlag(false)).toBe(0);
    expect(fromFlag(1)).toBe(true);
    expect(fromFlag(0)).toBe(false);
    expect(fromFlag(null)).toBe(false);
  });
});

describe("toErrorSummary", () => {
  it("keeps the code and details of a PickemError", () => {
    const err = createPickemError("locked", "Picks lock at kickoff", { gameId: 3 });
    expect(toErrorSummary(err)).toEqual({
      error: "locked",
      message: "Picks lock at kickoff",
      details: { gameId: 3 }
    });
  });

  it("reports anything else as internal", () => {
    expect(toErrorSummary(new Error("boom"))).toEqual({ error: "internal", message: "boom" });
    expect(toErrorSummary("plain")).toEqual({ error: "internal", message: "plain" });
  });
});
