/**
 * Tests for the chat turn orchestration
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { ChatService } from "@/lib/chat-service";
import { GroundedAnswerAssembler } from "@/lib/grounded-answer";
import { KnowledgeBase } from "@/lib/knowledge-store";
import { InMemorySessionStore } from "@/lib/session-store";
import { UpstreamGenerationError } from "@/lib/errors";
import type { FeedbackRecord, FeedbackSink } from "@/lib/feedback-sink";
import type { GenerationRequest, GenerationService } from "@/lib/types";
import { COEP_COMPUTER, COEP_MECHANICAL, FIXTURE_RECORDS, WALCHAND_CIVIL } from "../helpers/records";

class MemoryFeedbackSink implements FeedbackSink {
  readonly name = "memory";
  readonly records: FeedbackRecord[] = [];
  failing = false;

  async append(record: FeedbackRecord): Promise<void> {
    if (this.failing) {
      throw new Error("sink offline");
    }
    this.records.push(record);
  }
}

describe("ChatService", () => {
  const generate = vi.fn<(request: GenerationRequest) => Promise<string>>();
  const generator: GenerationService = { generate };
  let sessions: InMemorySessionStore;
  let feedback: MemoryFeedbackSink;
  let service: ChatService;

  beforeEach(async () => {
    vi.clearAllMocks();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});

    const knowledge = new KnowledgeBase();
    await knowledge.reload({ description: "fixture", fetchRows: async () => FIXTURE_RECORDS });

    sessions = new InMemorySessionStore({ idleTtlMs: 60_000 });
    feedback = new MemoryFeedbackSink();
    service = new ChatService({
      assembler: new GroundedAnswerAssembler(knowledge, { ambitiousMargin: 100, sessionTtlMs: 60_000 }),
      generator,
      sessions,
      feedback,
      now: () => Date.parse("2025-07-14T10:00:00Z"),
    });
  });

  it("should return an approved answer with its sources", async () => {
    generate.mockResolvedValue("COEP Computer Engineering (cutoff rank 500) is a stretch for rank 600.");

    const turn = await service.respond({ message: "600" });

    expect(turn.kind).toBe("answer");
    expect(turn.answer).toBe("COEP Computer Engineering (cutoff rank 500) is a stretch for rank 600.");
    expect(turn.sources).toEqual([COEP_MECHANICAL, WALCHAND_CIVIL, COEP_COMPUTER]);
    expect(generate).toHaveBeenCalledTimes(1);
    expect(generate.mock.calls[0]?.[0].userPrompt).toBe("600");
  });

  it("should replace an answer with invented numbers by the grounded fallback", async () => {
    generate.mockResolvedValue("You will surely get COEP with cutoff 12345.");

    const turn = await service.respond({ message: "600" });

    expect(turn.kind).toBe("fallback");
    expect(turn.validation?.rejectedNumbers).toEqual(["12345"]);
    expect(turn.answer.startsWith("Based on the cutoff records for your rank:")).toBe(true);
  });

  it("should ask a clarifying question without calling the generator", async () => {
    const turn = await service.respond({ message: "97 percentile" });

    expect(turn.kind).toBe("clarification");
    expect(turn.answer).toBe("Which college should I check a percentile of 97 against?");
    expect(turn.bundle).toBeNull();
    expect(generate).not.toHaveBeenCalled();
  });

  it("should carry context across turns of one session", async () => {
    generate.mockResolvedValue("Here you go.");

    const first = await service.respond({ message: "600" });
    const second = await service.respond({ message: "what about computer there?", sessionId: first.sessionId });

    expect(second.sessionId).toBe(first.sessionId);
    expect(second.bundle?.followUp).toBe(true);
    expect(second.bundle?.suggestion).toEqual({ safe: [], ambitious: [COEP_COMPUTER] });
  });

  it("should start a new session for an unknown id", async () => {
    generate.mockResolvedValue("Here you go.");

    const turn = await service.respond({ message: "600", sessionId: "00000000-0000-4000-8000-000000000000" });
    expect(turn.sessionId).not.toBe("00000000-0000-4000-8000-000000000000");
  });

  it("should leave the stored session untouched when generation fails", async () => {
    generate.mockResolvedValueOnce("Here you go.").mockRejectedValueOnce(new Error("socket hang up"));

    const first = await service.respond({ message: "600" });
    await expect(service.respond({ message: "97 for COEP", sessionId: first.sessionId })).rejects.toBeInstanceOf(
      UpstreamGenerationError
    );

    const stored = await sessions.get(first.sessionId);
    expect(stored?.lastRankOrPercentile).toBe(600);
    expect(feedback.records).toHaveLength(1);
  });

  it("should pass generation errors it already understands through", async () => {
    const upstream = new UpstreamGenerationError("All OpenRouter API keys exhausted or failed");
    generate.mockRejectedValue(upstream);

    await expect(service.respond({ message: "600" })).rejects.toBe(upstream);
  });

  it("should record each turn without a rating", async () => {
    generate.mockResolvedValue("Here you go.");

    const turn = await service.respond({ message: "600" });

    expect(feedback.records).toEqual([
      {
        turnId: turn.turnId,
        sessionId: turn.sessionId,
        query: "600",
        answer: "Here you go.",
        rating: null,
        correction: "",
        timestamp: "2025-07-14T10:00:00.000Z",
      },
    ]);
  });

  it("should not fail the turn when feedback cannot be stored", async () => {
    generate.mockResolvedValue("Here you go.");
    feedback.failing = true;

    await expect(service.respond({ message: "600" })).resolves.toMatchObject({ kind: "answer" });
  });

  it("should store ratings", async () => {
    await service.rate({
      turnId: "turn-1",
      sessionId: "session-1",
      query: "600",
      answer: "Here you go.",
      rating: "down",
      correction: "COEP is out of reach",
    });

    expect(feedback.records[0]).toMatchObject({ turnId: "turn-1", rating: "down", correction: "COEP is out of reach" });
  });
});
