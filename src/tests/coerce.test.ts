import { describe, expect, it } from "vitest";

import { parseDecimal, toBool, toFloat, toOptionalText } from "@/lib/tabular/coerce";

describe("toBool", () => {
  it.each(["yes", "1", "true", "Y", "T", " TRUE "])("reads %j as true", (raw) => {
    expect(toBool(raw)).toBe(true);
  });

  it.each(["no", "0", "false", "", "N", "f"])("reads %j as false", (raw) => {
    expect(toBool(raw)).toBe(false);
  });

  it("falls back to integer coercion", () => {
    expect(toBool("2")).toBe(true);
    expect(toBool("0.0")).toBe(false);
    expect(toBool("0,4")).toBe(false);
    expect(toBool("1.5")).toBe(true);
  });

  it("falls back to the truthiness of other text", () => {
    expect(toBool("maybe")).toBe(true);
  });

  it("handles non-string cells", () => {
    expect(toBool(null)).toBe(false);
    expect(toBool(undefined)).toBe(false);
    expect(toBool(0)).toBe(false);
    expect(toBool(3)).toBe(true);
    expect(toBool(true)).toBe(true);
  });
});

describe("toFloat", () => {
  it("accepts decimal point and decimal comma alike", () => {
    expect(toFloat("53,02752")).toBe(53.02752);
    expect(toFloat("53.02752")).toBe(53.02752);
    expect(toFloat("-42,77")).toBe(-42.77);
  });

  it("uses the default for empty and unparsable cells", () => {
    expect(toFloat("", 1)).toBe(1);
    expect(toFloat("   ", 2)).toBe(2);
    expect(toFloat("n/a", 3)).toBe(3);
    expect(toFloat(undefined, 4)).toBe(4);
    expect(toFloat("abc")).toBe(0);
  });

  it("reads exponents", () => {
    expect(toFloat("1e3")).toBe(1000);
  });
});

describe("parseDecimal", () => {
  it("rejects text that only starts with a number", () => {
    expect(parseDecimal("12kg")).toBeNull();
    expect(parseDecimal("1,000.5")).toBeNull();
  });

  it("passes finite numbers through", () => {
    expect(parseDecimal(2.5)).toBe(2.5);
    expect(parseDecimal(Number.NaN)).toBeNull();
  });
});

describe("toOptionalText", () => {
  it("trims and maps empty to null", () => {
    expect(toOptionalText("  fast ")).toBe("fast");
    expect(toOptionalText("  ")).toBeNull();
  });
});
