import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import { generateObject, type LanguageModel } from "ai";
import { z } from "zod/v4";
import { toModelMessages, type PromptMessage } from "./prompt";
import {
  appendLogEntry,
  sanitizeMessages,
  type LlmLogEntry,
  type LlmLogTokenUsage,
  type LlmTaskType,
} from "./llm-log";
import { describeError } from "./errors";

export interface LlmCallLog {
  taskType: LlmTaskType;
  docId: string;
  pageNum?: number;
  promptName: string;
  /** Attempt number assigned by the caller's retry loop. */
  attempt: number;
}

export interface CacheOptions {
  /** Directory for cached responses; null disables the cache. */
  cacheDir: string | null;
  skipCache?: boolean;
  /** JSONL file receiving one entry per call; omitted disables logging. */
  logFile?: string;
  log: LlmCallLog;
}

export interface CachedObject<T> {
  object: T;
  cached: boolean;
}

/**
 * generateObject with a disk cache in front of it. The cached value is the
 * validated object, keyed by model, prompt and schema. SDK retries are off:
 * callers decide whether a failure is worth another attempt.
 */
export async function cachedGenerateObject<T>(
  request: {
    model: LanguageModel;
    modelId: string;
    schema: z.ZodType<T>;
    messages: PromptMessage[];
    abortSignal?: AbortSignal;
  },
  opts: CacheOptions
): Promise<CachedObject<T>> {
  const { system, messages } = toModelMessages(request.messages);
  const hash = computeHash(request.modelId, system, request.messages, request.schema);
  const cacheFile = opts.cacheDir ? path.join(opts.cacheDir, `${hash}.json`) : null;
  const t0 = Date.now();

  if (cacheFile && !opts.skipCache && !process.env.RECACHE && fs.existsSync(cacheFile)) {
    const hit = request.schema.safeParse(readJson(cacheFile));
    if (hit.success) {
      writeLog(opts, request.modelId, true, Date.now() - t0, request.messages);
      return { object: hit.data, cached: true };
    }
    bustCache(cacheFile);
  }

  try {
    const generated = await generateObject({
      model: request.model,
      schema: request.schema,
      system,
      messages,
      abortSignal: request.abortSignal,
      maxRetries: 0,
    });
    const object = request.schema.parse(generated.object);

    if (cacheFile) {
      fs.mkdirSync(path.dirname(cacheFile), { recursive: true });
      fs.writeFileSync(cacheFile, JSON.stringify(object, null, 2) + "\n");
    }

    const usage: LlmLogTokenUsage = {
      inputTokens: generated.usage.inputTokens ?? 0,
      outputTokens: generated.usage.outputTokens ?? 0,
    };
    writeLog(opts, request.modelId, false, Date.now() - t0, request.messages, usage);
    return { object, cached: false };
  } catch (err) {
    writeLog(opts, request.modelId, false, Date.now() - t0, request.messages, undefined, err);
    throw err;
  }
}

function readJson(file: string): unknown {
  try {
    return JSON.parse(fs.readFileSync(file, "utf-8"));
  } catch {
    return undefined;
  }
}

function writeLog(
  opts: CacheOptions,
  modelId: string,
  cacheHit: boolean,
  durationMs: number,
  messages: PromptMessage[],
  usage?: LlmLogTokenUsage,
  error?: unknown
): void {
  if (!opts.logFile) return;
  const system = messages.find((m) => m.role === "system");
  const entry: LlmLogEntry = {
    timestamp: new Date().toISOString(),
    taskType: opts.log.taskType,
    docId: opts.log.docId,
    pageNum: opts.log.pageNum,
    promptName: opts.log.promptName,
    modelId,
    cacheHit,
    attempt: opts.log.attempt,
    durationMs,
    usage,
    error: error === undefined ? undefined : describeError(error),
    system: typeof system?.content === "string" ? system.content : undefined,
    messages: sanitizeMessages(messages.filter((m) => m.role !== "system")),
  };
  try {
    appendLogEntry(opts.logFile, entry);
  } catch (err) {
    // Logging must never break the pipeline
    console.warn(`[llm-log] failed to append entry: ${describeError(err)}`);
  }
}

function bustCache(cacheFile: string): void {
  fs.rmSync(cacheFile, { force: true });
}

export function computeHash(
  modelId: string,
  system: string | undefined,
  messages: PromptMessage[],
  schema: z.ZodType
): string {
  const keyData = {
    modelId,
    system,
    messages: messages.filter((m) => m.role !== "system"),
    schema: z.toJSONSchema(schema),
  };
  return crypto.createHash("sha256").update(JSON.stringify(keyData)).digest("hex");
}
