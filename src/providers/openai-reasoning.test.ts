// Unit tests for OpenAIReasoningProvider and the shared OpenAI helpers

import { describe, it, expect, vi } from "vitest";
import { OpenAIReasoningProvider } from "./openai-reasoning.js";
import { parseJsonObject, type OpenAIClient } from "./openai-client.js";
import { classifyProviderError } from "./provider-errors.js";
import { PermanentServiceError, TransientServiceError, ValidationError } from "../errors.js";

class FakeApiError extends Error {
  readonly status: number;
  constructor(status: number, message: string) {
    super(message);
    this.status = status;
  }
}

describe("OpenAIReasoningProvider.complete()", () => {
  it("calls JSON mode with the model and forwards the abort signal", async () => {
    const create = vi.fn().mockResolvedValue({ choices: [{ message: { content: '{"risk_score": 10}' } }] });
    const client: OpenAIClient = { chat: { completions: { create } } };
    const provider = new OpenAIReasoningProvider(client, "gpt-4o");
    const controller = new AbortController();

    const raw = await provider.complete({ system: "sys", user: "usr" }, controller.signal);

    expect(raw).toBe('{"risk_score": 10}');
    expect(create).toHaveBeenCalledWith(
      {
        model: "gpt-4o",
        messages: [
          { role: "system", content: "sys" },
          { role: "user", content: "usr" },
        ],
        response_format: { type: "json_object" },
        temperature: 0.2,
      },
      { signal: controller.signal },
    );
  });

  it("throws TransientServiceError on an empty response", async () => {
    const create = vi.fn().mockResolvedValue({ choices: [{ message: { content: null } }] });
    const provider = new OpenAIReasoningProvider({ chat: { completions: { create } } });
    await expect(provider.complete({ system: "s", user: "u" }, new AbortController().signal)).rejects.toThrow(
      "OpenAI reasoning: LLM returned empty response",
    );
  });

  it("classifies SDK errors by HTTP status", async () => {
    const create = vi.fn().mockRejectedValue(new FakeApiError(401, "Incorrect API key"));
    const provider = new OpenAIReasoningProvider({ chat: { completions: { create } } });
    await expect(provider.complete({ system: "s", user: "u" }, new AbortController().signal)).rejects.toBeInstanceOf(
      PermanentServiceError,
    );
  });
});

describe("classifyProviderError()", () => {
  it("treats 429 and 5xx as transient", () => {
    expect(classifyProviderError(new FakeApiError(429, "rate"), "X")).toBeInstanceOf(TransientServiceError);
    expect(classifyProviderError(new FakeApiError(503, "down"), "X")).toBeInstanceOf(TransientServiceError);
  });

  it("includes the provider and status in the message", () => {
    expect(classifyProviderError(new FakeApiError(400, "bad"), "OpenAI").message).toBe(
      "OpenAI request failed (HTTP 400): bad",
    );
  });

  it("passes pipeline errors through unchanged", () => {
    const err = new ValidationError("nope");
    expect(classifyProviderError(err, "X")).toBe(err);
  });
});

describe("parseJsonObject()", () => {
  it("returns null for arrays, primitives and invalid JSON", () => {
    expect(parseJsonObject("[1]")).toBeNull();
    expect(parseJsonObject("3")).toBeNull();
    expect(parseJsonObject("{")).toBeNull();
  });

  it("returns the object for valid JSON objects", () => {
    expect(parseJsonObject('{"a":1}')).toEqual({ a: 1 });
  });
});
