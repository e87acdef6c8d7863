import fs from "node:fs";
import path from "node:path";
import { createHash } from "node:crypto";
import type { DataRoomIndex, DocumentRecord } from "../core/types";
import type { Emit, PipelineContext, StageResult } from "../core/context";
import { formatDocId, PENDING, reopenFailures, resetDerivedState } from "../core/records";
import { getSupportedExtensions } from "../../config";
import { ConfigurationError, DiscoveryError, describeError } from "../errors";

export interface DiscoveredFile {
  kind: "file";
  absolutePath: string;
  relativePath: string;
  sourceHash: string;
}

export interface SkippedFile {
  kind: "skipped";
  relativePath: string;
  reason: string;
}

export type DiscoveryResult = DiscoveredFile | SkippedFile;

export interface DiscoverOptions {
  extensions: Set<string>;
  /** Absolute directories never descended into (e.g. an output root nested in the input). */
  exclude?: string[];
}

function hashFile(filePath: string): string {
  try {
    return createHash("sha256").update(fs.readFileSync(filePath)).digest("hex").slice(0, 16);
  } catch (err) {
    throw new DiscoveryError(filePath, `unreadable file: ${describeError(err)}`);
  }
}

function isIgnoredName(name: string): boolean {
  // Hidden entries and office lock files ("~$report.docx")
  return name.startsWith(".") || name.startsWith("~$");
}

/**
 * Walk the input directory and yield every supported file in sorted
 * relative-path order. The sequence is lazy and can be consumed once.
 */
export function* discoverDocuments(
  inputRoot: string,
  options: DiscoverOptions
): Generator<DiscoveryResult, void, undefined> {
  const root = path.resolve(inputRoot);
  if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
    throw new ConfigurationError(`Input directory not found: ${root}`);
  }
  const excluded = new Set((options.exclude ?? []).map((dir) => path.resolve(dir)));

  function* walk(dir: string): Generator<DiscoveryResult, void, undefined> {
    const entries = fs
      .readdirSync(dir, { withFileTypes: true })
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      if (isIgnoredName(entry.name)) continue;
      const absolutePath = path.join(dir, entry.name);
      const relativePath = path.relative(root, absolutePath).split(path.sep).join("/");

      if (entry.isDirectory()) {
        if (!excluded.has(absolutePath)) yield* walk(absolutePath);
        continue;
      }
      if (!entry.isFile()) continue;
      if (!options.extensions.has(path.extname(entry.name).toLowerCase())) continue;

      try {
        yield { kind: "file", absolutePath, relativePath, sourceHash: hashFile(absolutePath) };
      } catch (err) {
        if (!(err instanceof DiscoveryError)) throw err;
        yield { kind: "skipped", relativePath, reason: err.message };
      }
    }
  }

  yield* walk(root);
}

export interface AssignResult {
  added: DocumentRecord[];
  changed: DocumentRecord[];
  unchanged: DocumentRecord[];
}

/**
 * Attach discovered files to the index. Known relative paths keep their
 * doc_id; new files draw the next id from the persisted counter, so ids
 * are never reused even when earlier files disappear.
 */
export function assignDocuments(index: DataRoomIndex, files: DiscoveredFile[]): AssignResult {
  const byPath = new Map<string, DocumentRecord>();
  for (const doc of index.documents.values()) {
    byPath.set(doc.relativePath, doc);
  }

  const result: AssignResult = { added: [], changed: [], unchanged: [] };

  for (const file of files) {
    const existing = byPath.get(file.relativePath);
    if (existing) {
      existing.originalPath = file.absolutePath;
      if (existing.sourceHash !== file.sourceHash) {
        existing.sourceHash = file.sourceHash;
        resetDerivedState(existing);
        result.changed.push(existing);
      } else {
        result.unchanged.push(existing);
      }
      continue;
    }

    const docId = formatDocId(index.metadata.nextDocSeq++);
    const record: DocumentRecord = {
      docId,
      originalPath: file.absolutePath,
      relativePath: file.relativePath,
      sourceHash: file.sourceHash,
      canonicalPdfPath: null,
      status: { state: "discovered" },
      summary: PENDING,
      pages: [],
    };
    index.documents.set(docId, record);
    byPath.set(file.relativePath, record);
    result.added.push(record);
  }

  return result;
}

// ============================================================================
// Stage
// ============================================================================

export async function discoverStage(ctx: PipelineContext, emit: Emit): Promise<StageResult> {
  const files: DiscoveredFile[] = [];
  let skipped = 0;

  for (const result of discoverDocuments(ctx.inputRoot, {
    extensions: getSupportedExtensions(ctx.config),
    exclude: [ctx.paths.outputRoot],
  })) {
    if (result.kind === "skipped") {
      skipped++;
      emit({ type: "file-skipped", path: result.relativePath, reason: result.reason });
    } else {
      files.push(result);
    }
  }

  ctx.index.metadata.inputRoot = path.resolve(ctx.inputRoot);
  const { added, changed, unchanged } = assignDocuments(ctx.index, files);

  let reopened = 0;
  if (ctx.retryFailed) {
    for (const doc of ctx.index.documents.values()) {
      if (reopenFailures(doc)) reopened++;
    }
  }

  emit({
    type: "stage-progress",
    stage: "discover",
    message:
      `${files.length} files: ${added.length} new, ${changed.length} changed, ${unchanged.length} unchanged` +
      (reopened > 0 ? `; ${reopened} reopened` : ""),
  });

  return { completed: files.length, failed: 0, skipped };
}
