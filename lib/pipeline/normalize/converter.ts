/**
 * Document-to-PDF conversion through a headless LibreOffice process.
 *
 * Each concurrent conversion gets its own user profile directory, since two
 * soffice processes sharing a profile contend for its lock file.
 */

import { spawn } from "node:child_process";
import fs from "node:fs";
import path from "node:path";
import { pathToFileURL } from "node:url";
import type { ConvertRequest, DocumentConverter } from "../core/types";
import { ConfigurationError, ConversionError, describeError } from "../errors";
import { pLimit } from "../parallel";
import { withRetry } from "../retry";

// ============================================================================
// Process runner
// ============================================================================

export interface ProcessResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export type ProcessRunner = (
  command: string,
  args: string[],
  options: { timeoutMs: number }
) => Promise<ProcessResult>;

/** How long output may keep draining after the child itself has exited. */
const EXIT_GRACE_MS = 250;

/**
 * Spawn a process and collect its output. The process runs in its own process
 * group; once `timeoutMs` passes the whole group is killed, so helpers that
 * soffice forks cannot hold the worker past the deadline. A missing executable
 * is a configuration problem, not a per-document one.
 */
export const spawnProcess: ProcessRunner = (command, args, { timeoutMs }) => {
  return new Promise<ProcessResult>((resolve, reject) => {
    const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"], detached: true });

    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let settled = false;

    child.stdout.on("data", (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    child.stderr.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    const killGroup = () => {
      if (child.pid === undefined) return;
      try {
        process.kill(-child.pid, "SIGKILL");
      } catch (err) {
        // ESRCH: the group is already gone
        if (!(err instanceof Error && "code" in err && err.code === "ESRCH")) throw err;
      }
    };

    const finish = (code: number | null, signal: NodeJS.Signals | null) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      child.stdout.destroy();
      child.stderr.destroy();
      resolve({ exitCode: code, signal, stdout, stderr, timedOut });
    };

    const timer = setTimeout(() => {
      timedOut = true;
      killGroup();
      finish(null, "SIGKILL");
    }, timeoutMs);

    child.on("close", (code, signal) => finish(code, signal));

    // Forked helpers can keep the pipes open after the child exits, which
    // would hold off "close" indefinitely.
    child.on("exit", (code, signal) => {
      setTimeout(() => {
        if (settled) return;
        killGroup();
        finish(code, signal);
      }, EXIT_GRACE_MS);
    });

    child.on("error", (err) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if ("code" in err && err.code === "ENOENT") {
        reject(new ConfigurationError(`Converter executable not found: ${command}`));
      } else {
        reject(new ConversionError(`Failed to start converter: ${err.message}`));
      }
    });
  });
};

// ============================================================================
// LibreOffice client
// ============================================================================

export interface LibreOfficeOptions {
  command: string;
  timeoutMs: number;
  /** Maximum simultaneous conversions; one profile directory per slot. */
  concurrency: number;
  profilesDir: string;
  workDir: string;
  /** Output matching any of these marks a failure as worth retrying. */
  busyPatterns: RegExp[];
  runProcess?: ProcessRunner;
}

export function buildConvertArgs(profileDir: string, outDir: string, sourcePath: string): string[] {
  return [
    "--headless",
    "--norestore",
    `-env:UserInstallation=${pathToFileURL(profileDir).href}`,
    "--convert-to",
    "pdf",
    "--outdir",
    outDir,
    sourcePath,
  ];
}

function firstLine(text: string): string {
  return text.split("\n").map((l) => l.trim()).find(Boolean) ?? "";
}

export function createLibreOfficeConverter(options: LibreOfficeOptions): DocumentConverter {
  const runProcess = options.runProcess ?? spawnProcess;
  const limit = pLimit(options.concurrency);
  const freeSlots = Array.from({ length: options.concurrency }, (_, i) => i);

  const isBusy = (output: string) => options.busyPatterns.some((re) => re.test(output));

  async function convertInSlot(slot: number, request: ConvertRequest): Promise<void> {
    const profileDir = path.join(options.profilesDir, `slot-${slot}`);
    const outDir = path.join(options.workDir, request.docId);
    fs.rmSync(outDir, { recursive: true, force: true });
    fs.mkdirSync(outDir, { recursive: true });
    fs.mkdirSync(profileDir, { recursive: true });

    try {
      const result = await runProcess(
        options.command,
        buildConvertArgs(profileDir, outDir, request.sourcePath),
        { timeoutMs: options.timeoutMs }
      );
      const output = `${result.stderr}\n${result.stdout}`;

      if (result.timedOut) {
        throw new ConversionError(`converter timed out after ${options.timeoutMs}ms`);
      }
      if (result.exitCode !== 0) {
        const detail = firstLine(output) || (result.signal ? `killed by ${result.signal}` : "no output");
        throw new ConversionError(`converter exited with code ${result.exitCode}: ${detail}`, {
          transient: isBusy(output),
          exitCode: result.exitCode,
        });
      }

      const produced = path.join(outDir, `${path.parse(request.sourcePath).name}.pdf`);
      if (!fs.existsSync(produced)) {
        throw new ConversionError("converter produced no PDF", {
          transient: isBusy(output),
          exitCode: 0,
        });
      }

      fs.mkdirSync(path.dirname(request.outputPath), { recursive: true });
      fs.renameSync(produced, request.outputPath);
    } finally {
      fs.rmSync(outDir, { recursive: true, force: true });
    }
  }

  return {
    convert(request) {
      return limit(async () => {
        const slot = freeSlots.pop();
        if (slot === undefined) {
          throw new ConversionError("no converter slot available");
        }
        try {
          await convertInSlot(slot, request);
        } finally {
          freeSlots.push(slot);
        }
      });
    },
  };
}

// ============================================================================
// Retrying client
// ============================================================================

export interface RetryingConverterOptions {
  /** Total attempts including the first. */
  maxAttempts: number;
  delayMs?: number;
  signal?: AbortSignal;
  onRetry?: (info: { request: ConvertRequest; attempt: number; delayMs: number; error: string }) => void;
}

/**
 * Wrap a converter so that transient failures (busy or locked converter) are
 * retried. Every other failure is returned on the first attempt.
 */
export function createRetryingConverter(
  inner: DocumentConverter,
  options: RetryingConverterOptions
): DocumentConverter {
  const delayMs = options.delayMs ?? 0;
  return {
    convert(request) {
      return withRetry(() => inner.convert(request), {
        maxAttempts: options.maxAttempts,
        baseDelayMs: delayMs,
        maxDelayMs: delayMs,
        isRetryable: (err) => err instanceof ConversionError && err.transient,
        signal: options.signal,
        onRetry: ({ attempt, delayMs: wait, error }) =>
          options.onRetry?.({ request, attempt, delayMs: wait, error: describeError(error) }),
      });
    },
  };
}
