/**
 * Tests for prompt building
 */

import { describe, it, expect } from "vitest";
import { buildPrompt, estimateTokens, formatRecord } from "@/lib/prompt-builder";
import { COEP_COMPUTER, COEP_MECHANICAL, bundleOf } from "../helpers/records";

describe("formatRecord", () => {
  it("should render every known field", () => {
    expect(formatRecord(COEP_COMPUTER)).toBe(
      "- College: College of Engineering, Pune (COEP) | Branch: Computer Engineering | Category: General | Location: Pune | Cutoff rank: 500 | Cutoff percentile: 99.2"
    );
  });

  it("should omit missing cutoffs and location", () => {
    expect(formatRecord({ ...COEP_COMPUTER, cutoffRank: null, location: "" })).toBe(
      "- College: College of Engineering, Pune (COEP) | Branch: Computer Engineering | Category: General | Cutoff percentile: 99.2"
    );
  });
});

describe("estimateTokens", () => {
  it("should count roughly four characters per token", () => {
    expect(estimateTokens("abcd")).toBe(1);
    expect(estimateTokens("abcde")).toBe(2);
  });
});

describe("buildPrompt", () => {
  it("should use the no-context prompt for an ungrounded bundle", () => {
    const prompt = buildPrompt(bundleOf({ rawQuery: "hostel fees" }));

    expect(prompt.systemPrompt).toContain("NO VERIFIED CONTEXT FOUND");
    expect(prompt.userPrompt).toBe("hostel fees");
    expect(prompt.contextUsed).toEqual([]);
  });

  it("should include the prediction in the verified context", () => {
    const prompt = buildPrompt(
      bundleOf({
        rawQuery: "97 for COEP",
        retrievedRecords: [COEP_COMPUTER],
        prediction: { category: "Medium", delta: -0.2, record: COEP_COMPUTER },
        grounded: true,
      })
    );

    expect(prompt.systemPrompt).toContain("- Student percentile minus cutoff percentile: -0.2");
    expect(prompt.systemPrompt).toContain("- Chance: Medium (Borderline)");
    expect(prompt.contextUsed).toEqual([COEP_COMPUTER]);
  });

  it("should list suggestions with the student's rank", () => {
    const prompt = buildPrompt(
      bundleOf({
        rawQuery: "600",
        intent: { kind: "rank", rank: 600 },
        suggestion: { safe: [COEP_MECHANICAL], ambitious: [COEP_COMPUTER] },
        estimatedPercentile: 99.8286,
        grounded: true,
      })
    );

    expect(prompt.systemPrompt).toContain("**Student rank:** 600");
    expect(prompt.systemPrompt).toContain("**Approximate percentile for that rank:** 99.8286");
    expect(prompt.systemPrompt).toContain(formatRecord(COEP_MECHANICAL));
    expect(prompt.contextUsed).toEqual([COEP_MECHANICAL, COEP_COMPUTER]);
  });

  it("should stop adding records when the token budget runs out", () => {
    const prompt = buildPrompt(
      bundleOf({
        rawQuery: "600",
        intent: { kind: "rank", rank: 600 },
        suggestion: { safe: [COEP_MECHANICAL], ambitious: [COEP_COMPUTER] },
        grounded: true,
      }),
      { maxContextTokens: 0 }
    );

    expect(prompt.contextUsed).toEqual([]);
    expect(prompt.systemPrompt).toContain("(cutoff rank at or beyond the student's rank):\n- none");
  });

  it("should label follow-up suggestions", () => {
    const prompt = buildPrompt(
      bundleOf({ suggestion: { safe: [COEP_COMPUTER], ambitious: [] }, grounded: true, followUp: true })
    );
    expect(prompt.systemPrompt).toContain("**Safe options (from the earlier suggestion in this conversation)**");
  });
});
