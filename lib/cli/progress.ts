/**
 * Dynamic CLI Progress Display
 *
 * Shows per-document summarization progress with animated spinners and a
 * progress bar; every other pipeline event is printed as a plain line.
 */

import type { PipelineEvent, Progress } from "../pipeline/runner";
import { formatEvent } from "../pipeline/runner";

// ANSI escape codes
const ESC = "\x1b";
const CLEAR_LINE = `${ESC}[2K`;
const MOVE_UP = (n: number) => `${ESC}[${n}A`;
const HIDE_CURSOR = `${ESC}[?25l`;
const SHOW_CURSOR = `${ESC}[?25h`;
const DIM = `${ESC}[2m`;
const RESET = `${ESC}[0m`;
const GREEN = `${ESC}[32m`;
const YELLOW = `${ESC}[33m`;
const RED = `${ESC}[31m`;
const CYAN = `${ESC}[36m`;
const BOLD = `${ESC}[1m`;

const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
const BAR_WIDTH = 30;

// ============================================================================
// Parallel Progress Display
// ============================================================================

export type TaskStatus = "pending" | "running" | "completed" | "failed";

export interface TaskState {
  id: string;
  label: string;
  status: TaskStatus;
  step?: string;
  error?: string;
  startTime?: number;
  endTime?: number;
}

export interface ParallelProgressOptions {
  title?: string;
  unit?: string;
  stream?: NodeJS.WriteStream;
}

/**
 * Dynamic progress display for parallel task execution. Tasks are added as
 * they are first reported.
 */
export class ParallelProgress {
  private tasks = new Map<string, TaskState>();
  private completedCount = 0;
  private failedCount = 0;
  private frame = 0;
  private timer: ReturnType<typeof setInterval> | null = null;
  private renderedLines = 0;
  private stream: NodeJS.WriteStream;
  private startTime = Date.now();
  private maxVisibleTasks = 16;
  private readonly title: string;
  private readonly unit: string;

  constructor(options: ParallelProgressOptions = {}) {
    this.stream = options.stream ?? process.stderr;
    this.title = options.title ?? "Processing";
    this.unit = options.unit ?? "tasks";
  }

  start(): void {
    this.startTime = Date.now();
    this.stream.write(HIDE_CURSOR);
    this.timer = setInterval(() => {
      this.frame++;
      this.render();
    }, 80);
    this.render();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.clearDisplay();
    this.stream.write(SHOW_CURSOR);
    this.renderSummary();
  }

  updateTask(id: string, update: Partial<TaskState>): void {
    const existing = this.tasks.get(id) ?? {
      id,
      label: id,
      status: "pending" satisfies TaskStatus,
    };

    const newState: TaskState = { ...existing, ...update };

    if (existing.status !== "completed" && newState.status === "completed") {
      this.completedCount++;
      newState.endTime = Date.now();
    }
    if (existing.status !== "failed" && newState.status === "failed") {
      this.failedCount++;
      newState.endTime = Date.now();
    }
    if (newState.status === "running" && !existing.startTime) {
      newState.startTime = Date.now();
    }

    this.tasks.set(id, newState);
  }

  getStats(): { completed: number; failed: number; running: number; pending: number } {
    let running = 0;
    let pending = 0;
    for (const task of this.tasks.values()) {
      if (task.status === "running") running++;
      if (task.status === "pending") pending++;
    }
    return { completed: this.completedCount, failed: this.failedCount, running, pending };
  }

  failures(): TaskState[] {
    return [...this.tasks.values()].filter((t) => t.status === "failed");
  }

  private clearDisplay(): void {
    if (this.renderedLines > 0) {
      this.stream.write(MOVE_UP(this.renderedLines));
      for (let i = 0; i < this.renderedLines; i++) {
        this.stream.write(CLEAR_LINE + "\n");
      }
      this.stream.write(MOVE_UP(this.renderedLines));
    }
  }

  private render(): void {
    this.clearDisplay();

    const lines: string[] = [];
    const spinner = SPINNER_FRAMES[this.frame % SPINNER_FRAMES.length];
    const elapsed = formatDuration(Date.now() - this.startTime);
    const stats = this.getStats();
    const total = this.tasks.size;

    const progress = this.completedCount + this.failedCount;
    const pct = total > 0 ? Math.round((progress / total) * 100) : 0;
    const filled = Math.round((progress / Math.max(total, 1)) * BAR_WIDTH);
    const bar = `${GREEN}${"█".repeat(filled)}${RESET}${DIM}${"░".repeat(BAR_WIDTH - filled)}${RESET}`;

    lines.push("");
    lines.push(
      `${BOLD}${CYAN}${spinner}${RESET} ${this.title}  ${bar}  ${BOLD}${progress}${RESET}/${total}  ${DIM}${pct}%${RESET}  ${DIM}${elapsed}${RESET}`
    );
    lines.push("");

    const running = [...this.tasks.values()]
      .filter((t) => t.status === "running")
      .slice(0, this.maxVisibleTasks);

    running.forEach((task, i) => {
      const taskSpinner = SPINNER_FRAMES[(this.frame + i) % SPINNER_FRAMES.length];
      const taskElapsed = task.startTime ? formatDuration(Date.now() - task.startTime) : "";
      const step = task.step ? `${DIM}${task.step}${RESET}` : "";
      lines.push(`  ${YELLOW}${taskSpinner}${RESET} ${task.label}  ${step}  ${DIM}${taskElapsed}${RESET}`);
    });

    lines.push("");
    lines.push(
      `  ${DIM}Running: ${RESET}${stats.running}${DIM}  |  Pending: ${RESET}${stats.pending}${DIM}  |  Completed: ${RESET}${GREEN}${stats.completed}${RESET}${this.failedCount > 0 ? `${DIM}  |  Failed: ${RESET}${RED}${this.failedCount}${RESET}` : ""}${RESET}`
    );
    lines.push("");

    this.stream.write(lines.join("\n"));
    this.renderedLines = lines.length;
  }

  private renderSummary(): void {
    const elapsed = formatDuration(Date.now() - this.startTime);
    const success = this.completedCount;
    const failed = this.failedCount;

    this.stream.write("\n");
    if (failed === 0) {
      this.stream.write(`${GREEN}✔${RESET} ${BOLD}Completed${RESET} ${success} ${this.unit} in ${elapsed}\n`);
    } else {
      this.stream.write(
        `${YELLOW}⚠${RESET} ${BOLD}Completed${RESET} ${success} ${this.unit}, ${RED}${failed} failed${RESET} in ${elapsed}\n`
      );
    }
    for (const task of this.failures()) {
      this.stream.write(`  ${RED}✗${RESET} ${task.label}: ${task.error ?? "failed"}\n`);
    }
    this.stream.write("\n");
  }
}

// ============================================================================
// Pipeline progress for the CLI
// ============================================================================

interface DocTally {
  total: number;
  done: number;
  failed: number;
}

/**
 * Progress sink for interactive runs: summarization drives the parallel
 * display, everything else prints as lines. Without a TTY it falls back to
 * plain lines throughout.
 */
export function createCliProgress(
  stream: NodeJS.WriteStream = process.stderr
): Progress & { close(): void } {
  const interactive = stream.isTTY === true;
  let display: ParallelProgress | null = null;
  const pages = new Map<string, DocTally>();

  function printLine(event: PipelineEvent): void {
    const line = formatEvent(event);
    if (line !== null) stream.write(line + "\n");
  }

  function pageStep(docId: string): string {
    const t = pages.get(docId);
    if (!t) return "";
    return `page ${t.done + t.failed}/${t.total}` + (t.failed > 0 ? ` (${t.failed} failed)` : "");
  }

  return {
    close() {
      display?.stop();
      display = null;
    },

    emit(event) {
      if (!interactive) {
        printLine(event);
        return;
      }

      if (event.type === "stage-start" && event.stage === "summarize") {
        display = new ParallelProgress({ title: "Summarizing documents", unit: "documents", stream });
        display.start();
        return;
      }

      if (!display) {
        printLine(event);
        return;
      }

      switch (event.type) {
        case "document-start":
          pages.set(event.docId, { total: event.totalPages ?? 0, done: 0, failed: 0 });
          display.updateTask(event.docId, { status: "running", step: pageStep(event.docId) });
          break;
        case "page-complete":
        case "page-failed": {
          const t = pages.get(event.docId);
          if (t) {
            if (event.type === "page-complete") t.done++;
            else t.failed++;
          }
          display.updateTask(event.docId, { step: pageStep(event.docId) });
          break;
        }
        case "retry":
          display.updateTask(event.docId, { step: `retrying (attempt ${event.attempt + 1})` });
          break;
        case "document-complete":
          display.updateTask(event.docId, { status: "completed" });
          break;
        case "document-failed":
          display.updateTask(event.docId, { status: "failed", error: event.error });
          break;
        case "stage-complete":
          display.stop();
          display = null;
          printLine(event);
          break;
        default:
          break;
      }
    },
  };
}

// ============================================================================
// Helpers
// ============================================================================

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) return `${seconds}s`;
  const minutes = Math.floor(seconds / 60);
  const secs = seconds % 60;
  if (minutes < 60) return `${minutes}m ${secs}s`;
  const hours = Math.floor(minutes / 60);
  const mins = minutes % 60;
  return `${hours}h ${mins}m`;
}
