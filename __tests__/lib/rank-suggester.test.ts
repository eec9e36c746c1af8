/**
 * Tests for rank-based suggestions
 */

import { describe, it, expect } from "vitest";
import { bucketSize, rankToPercentile, suggest } from "@/lib/rank-suggester";
import { InvalidInputError } from "@/lib/errors";
import { COEP_COMPUTER, COEP_MECHANICAL, VJTI_COMPUTER, WALCHAND_CIVIL, snapshotOf } from "../helpers/records";

describe("suggest", () => {
  const coepOnly = snapshotOf([COEP_COMPUTER]);

  it("should put a college with a cutoff at or beyond the rank in safe", () => {
    expect(suggest(coepOnly, 400, 50)).toEqual({ safe: [COEP_COMPUTER], ambitious: [] });
    expect(suggest(coepOnly, 500, 50)).toEqual({ safe: [COEP_COMPUTER], ambitious: [] });
  });

  it("should put a college within the margin in ambitious", () => {
    // 600 - 100 <= 500 < 600
    expect(suggest(coepOnly, 600, 100)).toEqual({ safe: [], ambitious: [COEP_COMPUTER] });
  });

  it("should leave out colleges tighter than the margin allows", () => {
    // 600 - 50 = 550 > 500
    expect(suggest(coepOnly, 600, 50)).toEqual({ safe: [], ambitious: [] });
  });

  it("should sort both buckets by cutoff rank", () => {
    const bucket = suggest(snapshotOf(), 400, 5000);
    expect(bucket.safe).toEqual([COEP_COMPUTER, COEP_MECHANICAL, WALCHAND_CIVIL]);
    expect(bucket.ambitious).toEqual([VJTI_COMPUTER]);
  });

  it("should keep every record safe for a larger rank safe for a smaller one", () => {
    const snapshot = snapshotOf();
    const safeForLarger = suggest(snapshot, 6000, 0).safe;
    const safeForSmaller = suggest(snapshot, 1000, 0).safe;
    for (const record of safeForLarger) {
      expect(safeForSmaller).toContain(record);
    }
  });

  it("should skip records without a cutoff rank", () => {
    const snapshot = snapshotOf([{ ...COEP_COMPUTER, cutoffRank: null }]);
    expect(bucketSize(suggest(snapshot, 100))).toBe(0);
  });

  it("should filter by seat category when asked", () => {
    const snapshot = snapshotOf([COEP_COMPUTER, { ...COEP_COMPUTER, category: "OBC", cutoffRank: 900 }]);
    expect(suggest(snapshot, 100, 0, { category: "obc" }).safe).toEqual([
      { ...COEP_COMPUTER, category: "OBC", cutoffRank: 900 },
    ]);
  });

  it("should reject non-positive and fractional ranks", () => {
    expect(() => suggest(coepOnly, 0)).toThrow(InvalidInputError);
    expect(() => suggest(coepOnly, -5)).toThrow(InvalidInputError);
    expect(() => suggest(coepOnly, 12.5)).toThrow(InvalidInputError);
  });

  it("should reject a negative margin", () => {
    expect(() => suggest(coepOnly, 100, -1)).toThrow(InvalidInputError);
  });
});

describe("rankToPercentile", () => {
  it("should estimate from the candidate pool size", () => {
    expect(rankToPercentile(3500)).toBe(99);
    expect(rankToPercentile(1000, 1000)).toBe(0);
  });

  it("should cap at 100 for non-positive ranks", () => {
    expect(rankToPercentile(0)).toBe(100);
  });
});
