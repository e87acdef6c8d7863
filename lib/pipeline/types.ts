import path from "node:path";

export interface DataRoomPaths {
  outputRoot: string;
  pdfsDir: string;
  pagesDir: string;
  workDir: string;
  profilesDir: string;
  cacheDir: string;
  indexFile: string;
  llmLogFile: string;
}

export const INDEX_FILE_NAME = "data_room_index.json";

export function resolveDataRoomPaths(outputRoot = "dataroom"): DataRoomPaths {
  const root = path.resolve(outputRoot);
  return {
    outputRoot: root,
    pdfsDir: path.join(root, "pdfs"),
    pagesDir: path.join(root, "pages"),
    workDir: path.join(root, ".work"),
    profilesDir: path.join(root, ".work", "profiles"),
    cacheDir: path.join(root, ".cache"),
    indexFile: path.join(root, INDEX_FILE_NAME),
    llmLogFile: path.join(root, "llm-log.jsonl"),
  };
}

/** Path stored in the index: relative to the output root, "/"-separated. */
export function toIndexPath(paths: DataRoomPaths, absolutePath: string): string {
  return path.relative(paths.outputRoot, absolutePath).split(path.sep).join("/");
}

export function fromIndexPath(paths: DataRoomPaths, indexPath: string): string {
  return path.resolve(paths.outputRoot, ...indexPath.split("/"));
}

export type LLMProvider = "openai" | "anthropic" | "google";

export type PipelineStage = "discover" | "normalize" | "rasterize" | "summarize" | "assemble";
