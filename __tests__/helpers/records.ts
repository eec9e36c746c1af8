/**
 * Shared fixtures for engine tests
 */

import { buildSnapshot, type KnowledgeSnapshot } from "@/lib/knowledge-store";
import type { CollegeRecord, ContextBundle, SessionContext } from "@/lib/types";
import { createSessionContext } from "@/lib/conversation-context";

export const COEP_COMPUTER: CollegeRecord = {
  collegeName: "College of Engineering, Pune (COEP)",
  branch: "Computer Engineering",
  cutoffRank: 500,
  cutoffPercentile: 99.2,
  category: "General",
  location: "Pune",
};

export const COEP_MECHANICAL: CollegeRecord = {
  collegeName: "College of Engineering, Pune (COEP)",
  branch: "Mechanical Engineering",
  cutoffRank: 5400,
  cutoffPercentile: 96.9,
  category: "General",
  location: "Pune",
};

export const VJTI_COMPUTER: CollegeRecord = {
  collegeName: "Veermata Jijabai Technological Institute (VJTI), Mumbai",
  branch: "Computer Engineering",
  cutoffRank: 300,
  cutoffPercentile: 99.5,
  category: "General",
  location: "Mumbai",
};

export const WALCHAND_CIVIL: CollegeRecord = {
  collegeName: "Walchand College of Engineering, Sangli",
  branch: "Civil Engineering",
  cutoffRank: 21000,
  cutoffPercentile: 91.4,
  category: "General",
  location: "Sangli",
};

export const FIXTURE_RECORDS: CollegeRecord[] = [COEP_COMPUTER, COEP_MECHANICAL, VJTI_COMPUTER, WALCHAND_CIVIL];

export function snapshotOf(records: readonly CollegeRecord[] = FIXTURE_RECORDS, version = 1): KnowledgeSnapshot {
  return buildSnapshot(records, version, new Date("2025-07-14T00:00:00Z"));
}

export function newSession(id = "11111111-1111-4111-8111-111111111111", now = 0): SessionContext {
  return createSessionContext(id, now);
}

export function bundleOf(overrides: Partial<ContextBundle> = {}): ContextBundle {
  return {
    rawQuery: "test query",
    intent: { kind: "question", text: "test query" },
    retrievedRecords: [],
    suggestion: null,
    prediction: null,
    estimatedPercentile: null,
    grounded: false,
    followUp: false,
    snapshotVersion: 1,
    ...overrides,
  };
}
