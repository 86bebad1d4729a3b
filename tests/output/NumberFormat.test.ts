import {
  HEADER_FORMAT,
  PHOTON_FORMAT,
  RECORD_FORMAT,
  formatFixed,
  formatInteger,
  formatLine,
  integer,
  real,
} from "@/output/NumberFormat";
import { describe, expect, it } from "vitest";

describe("formatFixed", () => {
  it("should use four decimals for the header format", () => {
    expect(formatFixed(1.23456789, HEADER_FORMAT)).toBe("1.2346");
    expect(formatFixed(100, HEADER_FORMAT)).toBe("100.0000");
  });

  it("should use seven decimals for record lines", () => {
    expect(formatFixed(1, RECORD_FORMAT)).toBe("1.0000000");
    expect(formatFixed(-0.3420201433256687, RECORD_FORMAT)).toBe("-0.3420201");
  });

  it("should keep the sign of negative zero", () => {
    expect(formatFixed(-0, RECORD_FORMAT)).toBe("-0.0000000");
    expect(formatFixed(0, RECORD_FORMAT)).toBe("0.0000000");
  });

  it("should keep the sign of values that round to zero", () => {
    expect(formatFixed(-1e-12, RECORD_FORMAT)).toBe("-0.0000000");
  });

  it("should round exact ties to even", () => {
    expect(formatFixed(0.03125, HEADER_FORMAT)).toBe("0.0312");
    expect(formatFixed(0.15625, HEADER_FORMAT)).toBe("0.1562");
    expect(formatFixed(0.00390625, RECORD_FORMAT)).toBe("0.0039062");
    expect(formatFixed(0.1875, { precision: 3 })).toBe("0.188");
  });

  it("should round the exact binary value rather than its shortest decimal form", () => {
    // 0.05 is stored slightly above 0.05, 0.6 - 1ulp slightly below 0.6
    expect(formatFixed(0.05, HEADER_FORMAT)).toBe("0.0500");
    expect(formatFixed(0.5999999999999999, RECORD_FORMAT)).toBe("0.6000000");
  });

  it("should write large magnitudes without an exponent", () => {
    expect(formatFixed(1e21, RECORD_FORMAT)).toBe("1000000000000000000000.0000000");
    expect(formatFixed(-(2 ** 80), HEADER_FORMAT)).toBe("-1208925819614629174706176.0000");
  });

  it("should omit the decimal point at precision 0", () => {
    expect(formatFixed(2.5, { precision: 0 })).toBe("2");
    expect(formatFixed(3.5, { precision: 0 })).toBe("4");
  });

  it("should prefix non-negative values with + when showing signs", () => {
    expect(formatFixed(0, PHOTON_FORMAT)).toBe("+0.0000000");
    expect(formatFixed(20, PHOTON_FORMAT)).toBe("+20.0000000");
    expect(formatFixed(-2.5, PHOTON_FORMAT)).toBe("-2.5000000");
  });
});

describe("formatInteger", () => {
  it("should truncate toward zero", () => {
    expect(formatInteger(450.9)).toBe("450");
    expect(formatInteger(-3.7)).toBe("-3");
    expect(formatInteger(-0.5)).toBe("0");
  });

  it("should write large integers without an exponent", () => {
    expect(formatInteger(1e21)).toBe("1000000000000000000000");
  });

  it("should show signs on request", () => {
    expect(formatInteger(3, { showPos: true })).toBe("+3");
    expect(formatInteger(0, { showPos: true })).toBe("+0");
    expect(formatInteger(-1, { showPos: true })).toBe("-1");
  });
});

describe("formatLine", () => {
  it("should join the tag and rendered fields with spaces", () => {
    expect(formatLine("S", [real(1), real(-2.5), integer(-1)], RECORD_FORMAT)).toBe(
      "S 1.0000000 -2.5000000 -1"
    );
  });

  it("should apply sign display to every field but not the tag", () => {
    expect(formatLine("P", [real(1), integer(450.7), integer(3)], PHOTON_FORMAT)).toBe(
      "P +1.0000000 +450 +3"
    );
  });

  it("should render a tag without fields", () => {
    expect(formatLine("X", [], RECORD_FORMAT)).toBe("X");
  });
});
