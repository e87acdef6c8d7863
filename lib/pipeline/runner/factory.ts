/**
 * Runner Factory
 *
 * Creates a fully configured PipelineContext for one indexing run: output
 * paths, the resumed (or fresh) index, the converter and the summarizer.
 */

import path from "node:path";
import type { AppConfig } from "../../config";
import { getBusyPatterns, getDataRoomRoot } from "../../config";
import type { PipelineContext } from "../core/context";
import type { DataRoomIndex, DocumentConverter, Summarizer } from "../core/types";
import { createEmptyIndex } from "../core/records";
import { createAiSummarizer } from "../core/llm";
import { createLibreOfficeConverter } from "../normalize/converter";
import { checkpointIndex } from "../index/assemble";
import { loadIndexIfExists } from "../index/index-store";
import { resolveDataRoomPaths, type LLMProvider } from "../types";

export interface PipelineOptions {
  inputRoot: string;
  config: AppConfig;
  /** Defaults to DATA_ROOM_ROOT or the configured output_dir. */
  outputRoot?: string;
  provider?: LLMProvider;
  model?: string;
  skipCache?: boolean;
  retryFailed?: boolean;
  signal?: AbortSignal;
  /** Replaces the AI summarizer (tests, alternative backends). */
  summarizer?: Summarizer;
  /** Replaces the LibreOffice converter. */
  converter?: DocumentConverter;
}

/**
 * Resume the persisted index when it was built from the same input folder.
 * An index of another folder is superseded: the run starts from an empty
 * index whose revision continues from the one on disk.
 */
export function resumeOrCreateIndex(indexFile: string, inputRoot: string, modelUsed: string): DataRoomIndex {
  const persisted = loadIndexIfExists(indexFile);
  if (persisted && persisted.metadata.inputRoot === inputRoot) return persisted;

  const index = createEmptyIndex(inputRoot, modelUsed);
  if (persisted) index.metadata.revision = persisted.metadata.revision;
  return index;
}

export function createPipelineContext(options: PipelineOptions): PipelineContext {
  const { config } = options;
  const paths = resolveDataRoomPaths(options.outputRoot ?? getDataRoomRoot(config));

  const summarizer =
    options.summarizer ??
    createAiSummarizer({
      provider: options.provider ?? config.provider ?? "openai",
      model: options.model ?? config.summarization.model ?? config.model,
      pagePrompt: config.summarization.page_prompt,
      documentPrompt: config.summarization.document_prompt,
      cacheDir: paths.cacheDir,
      logFile: paths.llmLogFile,
      skipCache: options.skipCache,
    });

  const converter =
    options.converter ??
    createLibreOfficeConverter({
      command: config.converter.command,
      timeoutMs: config.converter.timeout_ms,
      concurrency: config.converter.concurrency,
      profilesDir: paths.profilesDir,
      workDir: paths.workDir,
      busyPatterns: getBusyPatterns(config),
    });

  const index = resumeOrCreateIndex(paths.indexFile, path.resolve(options.inputRoot), summarizer.modelId);

  return {
    inputRoot: options.inputRoot,
    index,
    paths,
    config,
    converter,
    summarizer,
    signal: options.signal ?? new AbortController().signal,
    retryFailed: options.retryFailed ?? false,
    checkpoint(emit) {
      const result = checkpointIndex(index, paths, { modelUsed: summarizer.modelId });
      emit({
        type: "index-written",
        indexFile: result.indexFile,
        revision: result.revision,
        totalDocuments: result.totalDocuments,
        final: false,
      });
    },
  };
}
