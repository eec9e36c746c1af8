/**
 * Tests for admission chance prediction
 */

import { describe, it, expect } from "vitest";
import { categorize, predict } from "@/lib/admission-predictor";
import { InvalidInputError } from "@/lib/errors";
import type { ChanceCategory } from "@/lib/types";
import { COEP_COMPUTER } from "../helpers/records";

describe("predict", () => {
  it("should rate 97 against a 99.2 cutoff as Low", () => {
    expect(predict(97, COEP_COMPUTER)).toEqual({ category: "Low", delta: -2.2, record: COEP_COMPUTER });
  });

  it("should rate a percentile well above the cutoff as VeryHigh", () => {
    expect(predict(99.9, { ...COEP_COMPUTER, cutoffPercentile: 90 }).category).toBe("VeryHigh");
  });

  it("should reject percentiles outside (0, 100]", () => {
    expect(() => predict(0, COEP_COMPUTER)).toThrow(InvalidInputError);
    expect(() => predict(100.5, COEP_COMPUTER)).toThrow(InvalidInputError);
    expect(() => predict(Number.NaN, COEP_COMPUTER)).toThrow(InvalidInputError);
  });

  it("should accept exactly 100", () => {
    expect(predict(100, COEP_COMPUTER).delta).toBe(0.8);
  });

  it("should reject records without a percentile cutoff", () => {
    expect(() => predict(95, { ...COEP_COMPUTER, cutoffPercentile: null })).toThrow(InvalidInputError);
  });

  it("should place an exact 5 point gap in VeryHigh despite float error", () => {
    expect(predict(99.2, { ...COEP_COMPUTER, cutoffPercentile: 94.2 })).toMatchObject({
      delta: 5,
      category: "VeryHigh",
    });
  });
});

describe("categorize", () => {
  const bands: [number, ChanceCategory][] = [
    [5, "VeryHigh"],
    [4.9999, "High"],
    [1, "High"],
    [0.9999, "Medium"],
    [-1, "Medium"],
    [-1.0001, "Low"],
    [-5, "Low"],
    [-5.0001, "Unlikely"],
  ];

  it.each(bands)("should put delta %s in %s", (delta, expected) => {
    expect(categorize(delta)).toBe(expected);
  });

  it("should honour custom thresholds", () => {
    expect(categorize(2, { veryHigh: 2, high: 1, medium: 0, low: -1 })).toBe("VeryHigh");
  });
});
