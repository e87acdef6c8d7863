import { describe, it, expect } from "vitest";
import { APICallError } from "ai";
import { createAiSummarizer, DEFAULT_MODELS, isProvider, isTransientAiError, parseModelRef } from "../llm";
import { SummarizationError } from "../../errors";

function apiError(statusCode: number): APICallError {
  return new APICallError({
    message: `HTTP ${statusCode}`,
    url: "https://api.example.test/v1/chat",
    requestBodyValues: {},
    statusCode,
  });
}

describe("parseModelRef", () => {
  it("uses the provider default when no model is given", () => {
    expect(parseModelRef("google")).toEqual({ provider: "google", modelId: DEFAULT_MODELS.google });
  });

  it("takes a bare model id for the configured provider", () => {
    expect(parseModelRef("openai", "gpt-4o")).toEqual({ provider: "openai", modelId: "gpt-4o" });
  });

  it("lets a prefix pick another provider", () => {
    expect(parseModelRef("openai", "anthropic:claude-3-5-haiku-latest")).toEqual({
      provider: "anthropic",
      modelId: "claude-3-5-haiku-latest",
    });
  });

  it("rejects an unknown prefix", () => {
    expect(() => parseModelRef("openai", "mystery:model")).toThrow("Unknown model provider: mystery");
  });

  it("recognises providers", () => {
    expect(isProvider("anthropic")).toBe(true);
    expect(isProvider("azure")).toBe(false);
  });
});

describe("isTransientAiError", () => {
  it("retries rate limits and server errors", () => {
    expect(isTransientAiError(apiError(429))).toBe(true);
    expect(isTransientAiError(apiError(503))).toBe(true);
  });

  it("does not retry client errors", () => {
    expect(isTransientAiError(apiError(400))).toBe(false);
    expect(isTransientAiError(apiError(401))).toBe(false);
  });

  it("follows the flag on summarization errors", () => {
    expect(isTransientAiError(new SummarizationError("timed out", { transient: true }))).toBe(true);
    expect(isTransientAiError(new SummarizationError("refused"))).toBe(false);
  });

  it("retries timeouts", () => {
    const err = new Error("The operation timed out");
    err.name = "TimeoutError";
    expect(isTransientAiError(err)).toBe(true);
    expect(isTransientAiError(new Error("other"))).toBe(false);
    expect(isTransientAiError("string error")).toBe(false);
  });
});

describe("createAiSummarizer", () => {
  it("reports the resolved model id", () => {
    const summarizer = createAiSummarizer({
      provider: "openai",
      model: "google:gemini-2.0-flash",
      pagePrompt: "page_summary",
      documentPrompt: "document_summary",
      cacheDir: null,
    });
    expect(summarizer.modelId).toBe("gemini-2.0-flash");
  });
});
