/**
 * Tests for the OpenRouter client key rotation
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { OpenRouterClient, type FetchLike } from "@/lib/openrouter-client";
import { UpstreamGenerationError } from "@/lib/errors";

function completion(content: string | null): Response {
  return new Response(
    JSON.stringify({ choices: [{ message: { role: "assistant", content }, finish_reason: "stop" }] }),
    { status: 200, headers: { "Content-Type": "application/json" } }
  );
}

function scriptedFetch(responses: Response[]) {
  const calls: RequestInit[] = [];
  const fetchImpl: FetchLike = async (_url, init) => {
    calls.push(init);
    const next = responses.shift();
    if (!next) {
      throw new Error("no scripted response left");
    }
    return next;
  };
  return { fetchImpl, calls };
}

function authorizationOf(init: RequestInit | undefined): string | null {
  return new Headers(init?.headers).get("authorization");
}

const REQUEST = { systemPrompt: "system", userPrompt: "600" };

describe("OpenRouterClient", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("should return the trimmed completion text", async () => {
    const { fetchImpl, calls } = scriptedFetch([completion("  Hello  ")]);
    const client = new OpenRouterClient({ apiKeys: ["test-key-1"], model: "test-model", fetchImpl });

    await expect(client.generate(REQUEST)).resolves.toBe("Hello");
    expect(authorizationOf(calls[0])).toBe("Bearer test-key-1");
    expect(JSON.parse(String(calls[0]?.body))).toMatchObject({
      model: "test-model",
      stream: false,
      messages: [
        { role: "system", content: "system" },
        { role: "user", content: "600" },
      ],
    });
  });

  it("should rotate to the next key when rate limited", async () => {
    const { fetchImpl, calls } = scriptedFetch([new Response("slow down", { status: 429 }), completion("Hi")]);
    const client = new OpenRouterClient({ apiKeys: ["test-key-1", "test-key-2"], model: "m", fetchImpl });

    await expect(client.generate(REQUEST)).resolves.toBe("Hi");
    expect(calls.map(authorizationOf)).toEqual(["Bearer test-key-1", "Bearer test-key-2"]);

    const [first, second] = client.getKeyStats();
    expect(first?.stats.failures).toBe(1);
    expect(second?.stats.requests).toBe(1);
  });

  it("should fail with UpstreamGenerationError when every key is rejected", async () => {
    const { fetchImpl } = scriptedFetch([new Response("", { status: 401 }), new Response("", { status: 403 })]);
    const client = new OpenRouterClient({ apiKeys: ["test-key-1", "test-key-2"], model: "m", fetchImpl });

    await expect(client.generate(REQUEST)).rejects.toThrow(
      new UpstreamGenerationError("All OpenRouter API keys exhausted or failed")
    );
  });

  it("should fail on a server error", async () => {
    const { fetchImpl } = scriptedFetch([new Response("boom", { status: 500 })]);
    const client = new OpenRouterClient({ apiKeys: ["test-key-1"], model: "m", fetchImpl });

    await expect(client.generate(REQUEST)).rejects.toBeInstanceOf(UpstreamGenerationError);
  });

  it("should fail on an unexpected response shape", async () => {
    const { fetchImpl } = scriptedFetch([new Response(JSON.stringify({ choices: [] }), { status: 200 })]);
    const client = new OpenRouterClient({ apiKeys: ["test-key-1"], model: "m", fetchImpl });

    await expect(client.generate(REQUEST)).rejects.toBeInstanceOf(UpstreamGenerationError);
  });

  it("should fail on an empty completion", async () => {
    const { fetchImpl } = scriptedFetch([completion(null)]);
    const client = new OpenRouterClient({ apiKeys: ["test-key-1"], model: "m", fetchImpl });

    await expect(client.generate(REQUEST)).rejects.toThrow("OpenRouter returned an empty completion");
  });

  it("should fail without any configured key", async () => {
    const client = new OpenRouterClient({ apiKeys: [], model: "m", fetchImpl: scriptedFetch([]).fetchImpl });
    await expect(client.generate(REQUEST)).rejects.toThrow("No OpenRouter API keys configured");
  });
});
