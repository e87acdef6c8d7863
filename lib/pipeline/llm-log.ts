import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import type { PromptMessage } from "./prompt";

export type LlmTaskType = "page-summary" | "document-summary";

export interface LlmLogTokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface LlmLogEntry {
  timestamp: string;
  taskType: LlmTaskType;
  docId: string;
  pageNum?: number;
  promptName: string;
  modelId: string;
  cacheHit: boolean;
  attempt: number;
  durationMs: number;
  usage?: LlmLogTokenUsage;
  error?: string;
  system?: string;
  messages: LlmLogMessage[];
}

export type LlmLogMessage = {
  role: string;
  content: (LlmLogTextPart | LlmLogImagePlaceholder)[];
};

type LlmLogTextPart = { type: "text"; text: string };
export type LlmLogImagePlaceholder = {
  type: "image";
  hash: string;
  byteLength: number;
  width: number;
  height: number;
};

/**
 * Strip base64 image data from prompt messages, replacing it with
 * a placeholder that records the byte length and dimensions.
 */
export function sanitizeMessages(messages: PromptMessage[]): LlmLogMessage[] {
  return messages.map((m) => {
    if (typeof m.content === "string") {
      return { role: m.role, content: [{ type: "text" as const, text: m.content }] };
    }
    const parts = m.content.map((part): LlmLogTextPart | LlmLogImagePlaceholder => {
      if (part.type === "text") {
        return { type: "text", text: part.text };
      }
      const { width, height } = pngDimensions(part.image);
      return {
        type: "image",
        hash: hashBase64(part.image),
        byteLength: Math.round((part.image.length * 3) / 4),
        width,
        height,
      };
    });
    return { role: m.role, content: parts };
  });
}

/**
 * Read PNG width and height from the IHDR chunk in a base64-encoded PNG.
 * Width is at byte offset 16, height at 20 (both big-endian uint32).
 */
export function pngDimensions(base64: string): { width: number; height: number } {
  const buf = Buffer.from(base64.slice(0, 32), "base64");
  if (buf.length < 24) return { width: 0, height: 0 };
  return { width: buf.readUInt32BE(16), height: buf.readUInt32BE(20) };
}

export function hashBase64(base64: string): string {
  return createHash("sha256").update(base64).digest("hex").slice(0, 16);
}

export const MAX_LOG_ENTRIES = 250;

/**
 * Append a log entry to the JSONL log file, keeping at most
 * MAX_LOG_ENTRIES entries (oldest are dropped).
 */
export function appendLogEntry(logFile: string, entry: LlmLogEntry): void {
  fs.mkdirSync(path.dirname(logFile), { recursive: true });
  fs.appendFileSync(logFile, JSON.stringify(entry) + "\n");

  const lines = fs.readFileSync(logFile, "utf-8").split("\n").filter(Boolean);
  if (lines.length > MAX_LOG_ENTRIES) {
    fs.writeFileSync(logFile, lines.slice(lines.length - MAX_LOG_ENTRIES).join("\n") + "\n");
  }
}
