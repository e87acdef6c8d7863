/**
 * AI summarizer backed by the Vercel AI SDK.
 *
 * Calls go through the disk cache and the JSONL call log. Retry and timeout
 * policy belong to the Summarization Engine, so every call here is a single
 * attempt.
 */

import { APICallError, NoObjectGeneratedError, type LanguageModel } from "ai";
import { openai } from "@ai-sdk/openai";
import { anthropic } from "@ai-sdk/anthropic";
import { google } from "@ai-sdk/google";
import { cachedGenerateObject } from "../cache";
import { renderPrompt, PROMPTS_DIR } from "../prompt";
import { SummarizationError } from "../errors";
import type { LLMProvider } from "../types";
import type { DocumentSummaryInput, PageSummaryInput, Summarizer } from "./types";
import { documentSummarySchema, pageSummarySchema } from "../summarize/summarize-schema";

// ============================================================================
// Provider types and model resolution
// ============================================================================

export const DEFAULT_MODELS: Record<LLMProvider, string> = {
  openai: "gpt-4o-mini",
  anthropic: "claude-sonnet-4-20250514",
  google: "gemini-2.0-flash",
};

const MODEL_FACTORIES: Record<LLMProvider, (id: string) => LanguageModel> = {
  openai: (id) => openai(id),
  anthropic: (id) => anthropic(id),
  google: (id) => google(id),
};

export function isProvider(value: string): value is LLMProvider {
  return value === "openai" || value === "anthropic" || value === "google";
}

/**
 * Resolve a model reference. "provider:model-id" selects another provider;
 * a bare id uses `provider`; no id uses the provider's default.
 */
export function parseModelRef(
  provider: LLMProvider,
  modelRef?: string
): { provider: LLMProvider; modelId: string } {
  if (modelRef) {
    const colonIdx = modelRef.indexOf(":");
    if (colonIdx !== -1) {
      const prefix = modelRef.slice(0, colonIdx);
      if (!isProvider(prefix)) {
        throw new SummarizationError(`Unknown model provider: ${prefix}`);
      }
      return { provider: prefix, modelId: modelRef.slice(colonIdx + 1) };
    }
    return { provider, modelId: modelRef };
  }
  return { provider, modelId: DEFAULT_MODELS[provider] };
}

export function resolveLanguageModel(provider: LLMProvider, modelRef?: string): LanguageModel {
  const ref = parseModelRef(provider, modelRef);
  return MODEL_FACTORIES[ref.provider](ref.modelId);
}

// ============================================================================
// Error classification
// ============================================================================

/**
 * Rate limits, server errors, timeouts and malformed model output are worth
 * another attempt; everything else fails the page on the first try.
 */
export function isTransientAiError(err: unknown): boolean {
  if (err instanceof SummarizationError) return err.transient;
  if (APICallError.isInstance(err)) return err.isRetryable;
  if (NoObjectGeneratedError.isInstance(err)) return true;
  if (err instanceof Error) {
    return err.name === "TimeoutError" || err.name === "AbortError";
  }
  return false;
}

// ============================================================================
// Summarizer
// ============================================================================

export interface AiSummarizerOptions {
  provider: LLMProvider;
  model?: string;
  pagePrompt: string;
  documentPrompt: string;
  promptsDir?: string;
  cacheDir: string | null;
  logFile?: string;
  skipCache?: boolean;
}

export function createAiSummarizer(options: AiSummarizerOptions): Summarizer {
  const { modelId } = parseModelRef(options.provider, options.model);
  const model = resolveLanguageModel(options.provider, options.model);
  const promptsDir = options.promptsDir ?? PROMPTS_DIR;
  const attempts = new Map<string, number>();

  function nextAttempt(key: string): number {
    const n = (attempts.get(key) ?? 0) + 1;
    attempts.set(key, n);
    return n;
  }

  return {
    modelId,

    async summarizePage(input: PageSummaryInput, signal: AbortSignal): Promise<string> {
      const messages = await renderPrompt(
        options.pagePrompt,
        {
          file_name: input.fileName,
          page_num: input.pageNum,
          total_pages: input.totalPages,
          image_base64: input.imageBase64,
        },
        promptsDir
      );
      const { object } = await cachedGenerateObject(
        { model, modelId, schema: pageSummarySchema, messages, abortSignal: signal },
        {
          cacheDir: options.cacheDir,
          skipCache: options.skipCache,
          logFile: options.logFile,
          log: {
            taskType: "page-summary",
            docId: input.docId,
            pageNum: input.pageNum,
            promptName: options.pagePrompt,
            attempt: nextAttempt(`${input.docId}:${input.pageNum}`),
          },
        }
      );
      return requireText(object.summary);
    },

    async summarizeDocument(input: DocumentSummaryInput, signal: AbortSignal): Promise<string> {
      const messages = await renderPrompt(
        options.documentPrompt,
        {
          file_name: input.fileName,
          total_pages: input.totalPages,
          pages: input.pages.map((p) => ({ page_num: p.pageNum, summary: p.summary })),
          skipped_pages: input.skippedPages,
        },
        promptsDir
      );
      const { object } = await cachedGenerateObject(
        { model, modelId, schema: documentSummarySchema, messages, abortSignal: signal },
        {
          cacheDir: options.cacheDir,
          skipCache: options.skipCache,
          logFile: options.logFile,
          log: {
            taskType: "document-summary",
            docId: input.docId,
            promptName: options.documentPrompt,
            attempt: nextAttempt(input.docId),
          },
        }
      );
      return requireText(object.summary);
    },
  };
}

function requireText(summary: string): string {
  const text = summary.trim();
  if (!text) {
    throw new SummarizationError("model returned an empty summary", { transient: true });
  }
  return text;
}
