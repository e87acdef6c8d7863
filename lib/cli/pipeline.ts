#!/usr/bin/env node
/**
 * Pipeline CLI
 *
 * Build a data room index from a folder of documents and inspect it.
 *
 * Usage:
 *   npm run pipeline -- run <input_dir>        Build or resume the index
 *   npm run pipeline -- status                 Show index progress
 *   npm run pipeline -- list                   List indexed documents
 *   npm run pipeline -- show <doc_id>          Print a document's summaries
 *   npm run pipeline -- pages <doc_id> [n...]  Print pages with image paths
 */

import { loadConfigWithOverrides, getDataRoomRoot } from "../config";
import { buildIndex } from "../pipeline/runner";
import { countByState, formatStatus } from "../pipeline/core/records";
import { DataRoom, formatDocumentSummary } from "../data-room";
import { describeError } from "../pipeline/errors";
import { createCliProgress } from "./progress";

const USAGE = `Usage: npm run pipeline -- <command> [args] [options]

Commands:
  run <input_dir>           Discover, convert, rasterize and summarize documents
  status                    Show how far the index has progressed
  list                      List indexed documents
  show <doc_id>             Print the document summary and its page summaries
  pages <doc_id> [page...]  Print pages (all when none given)

Options:
  --output <dir>        Output root (default: DATA_ROOM_ROOT or output_dir)
  --config <path>       Config file (default: ./config.yaml)
  --provider <name>     openai | anthropic | google
  --model <id>          Model id, or provider:model-id
  --dpi <n>             Page image resolution
  --concurrency <n>     Max parallel AI calls
  --skip-cache          Skip the AI response cache
  --retry-failed        Reopen failed documents and summaries
  --json                Print JSON (list, show, pages)`;

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === "--help" || command === "-h") {
    console.log(USAGE);
    process.exit(0);
  }

  const flags = parseFlags(args.slice(1));
  const positional = flags.positional;

  const config = loadConfigWithOverrides(flags.config, {
    provider: flags.provider,
    model: flags.model,
    rasterize: { dpi: flags.dpi },
    summarization: { concurrency: flags.concurrency },
  });
  const outputRoot = flags.output ?? getDataRoomRoot(config);

  switch (command) {
    case "run": {
      const [inputDir] = positional;
      if (!inputDir) {
        console.error("Usage: npm run pipeline -- run <input_dir>");
        process.exit(1);
      }

      const controller = new AbortController();
      process.on("SIGINT", () => {
        if (controller.signal.aborted) process.exit(130);
        console.error("\nStopping: in-flight work will finish, nothing new starts (Ctrl-C again to quit)");
        controller.abort();
      });

      const progress = createCliProgress();
      console.log(`\nIndexing ${inputDir} into ${outputRoot}...\n`);
      try {
        const result = await buildIndex({
          inputRoot: inputDir,
          outputRoot,
          config,
          skipCache: flags.skipCache,
          retryFailed: flags.retryFailed,
          signal: controller.signal,
          progress,
        });
        const c = result.counts;
        console.log(
          `\n${result.cancelled ? "Stopped" : "Done"}: ${c.total} documents, ` +
            `${c.summarized} summarized, ${c.failed} failed, ` +
            `${c.pagesSummarized}/${c.pages} pages summarized`
        );
        console.log(`Index: ${result.indexFile}`);
      } finally {
        progress.close();
      }
      break;
    }

    case "status": {
      const room = DataRoom.open(outputRoot);
      const c = countByState(room.index);
      const meta = room.index.metadata;
      console.log(`Index:      ${room.paths.indexFile} (revision ${meta.revision})`);
      console.log(`Input:      ${meta.inputRoot}`);
      console.log(`Model:      ${meta.modelUsed}`);
      console.log(`Updated:    ${meta.updatedAt}`);
      console.log(`Documents:  ${c.total}`);
      console.log(`  discovered ${c.discovered}, normalized ${c.normalized}, rasterized ${c.rasterized}`);
      console.log(`  summarized ${c.summarized}, failed ${c.failed}`);
      console.log(`Pages:      ${c.pagesSummarized}/${c.pages} summarized`);
      break;
    }

    case "list": {
      const docs = DataRoom.open(outputRoot).listDocuments();
      if (flags.json) {
        console.log(JSON.stringify(docs, null, 2));
        break;
      }
      for (const doc of docs) {
        console.log(`${doc.docId}  ${doc.relativePath}  [${formatStatus(doc.status)}, ${doc.pageCount} pages]`);
        if (doc.summary) console.log(`    ${doc.summary.split("\n")[0]}`);
      }
      break;
    }

    case "show": {
      const [docId] = positional;
      if (!docId) {
        console.error("Usage: npm run pipeline -- show <doc_id>");
        process.exit(1);
      }
      const view = DataRoom.open(outputRoot).getDocumentSummary(docId);
      if (!view) {
        console.error(`Document not found: ${docId}`);
        process.exit(1);
      }
      console.log(flags.json ? JSON.stringify(view, null, 2) : formatDocumentSummary(view));
      break;
    }

    case "pages": {
      const [docId, ...pageArgs] = positional;
      if (!docId) {
        console.error("Usage: npm run pipeline -- pages <doc_id> [page...]");
        process.exit(1);
      }
      const pageNums = pageArgs.length > 0 ? pageArgs.map((p) => parseNumber("page", p)) : undefined;
      const pages = DataRoom.open(outputRoot).getDocumentPages(docId, pageNums);
      if (!pages) {
        console.error(`Document not found: ${docId}`);
        process.exit(1);
      }
      if (flags.json) {
        console.log(JSON.stringify(pages, null, 2));
        break;
      }
      for (const page of pages) {
        if ("error" in page) {
          console.log(`Page ${page.pageNum}: ${page.error}`);
        } else {
          console.log(`Page ${page.pageNum}: ${page.imagePath ?? `[no image: ${page.imageError ?? "unknown"}]`}`);
          console.log(`    ${page.summary ?? "[not summarized]"}`);
        }
      }
      break;
    }

    default:
      console.error(`Unknown command: ${command}\n`);
      console.log(USAGE);
      process.exit(1);
  }
}

interface ParsedFlags {
  positional: string[];
  output?: string;
  config?: string;
  provider?: string;
  model?: string;
  dpi?: number;
  concurrency?: number;
  skipCache: boolean;
  retryFailed: boolean;
  json: boolean;
}

function parseNumber(name: string, value: string): number {
  const n = parseInt(value, 10);
  if (Number.isNaN(n)) {
    console.error(`Invalid ${name}: ${value}`);
    process.exit(1);
  }
  return n;
}

function parseFlags(args: string[]): ParsedFlags {
  const flags: ParsedFlags = { positional: [], skipCache: false, retryFailed: false, json: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];
    if (arg === "--output" && next) {
      flags.output = args[++i];
    } else if (arg === "--config" && next) {
      flags.config = args[++i];
    } else if (arg === "--provider" && next) {
      flags.provider = args[++i];
    } else if (arg === "--model" && next) {
      flags.model = args[++i];
    } else if (arg === "--dpi" && next) {
      flags.dpi = parseNumber("dpi", args[++i]);
    } else if (arg === "--concurrency" && next) {
      flags.concurrency = parseNumber("concurrency", args[++i]);
    } else if (arg === "--skip-cache") {
      flags.skipCache = true;
    } else if (arg === "--retry-failed") {
      flags.retryFailed = true;
    } else if (arg === "--json") {
      flags.json = true;
    } else if (!arg.startsWith("-")) {
      flags.positional.push(arg);
    }
  }

  return flags;
}

main().catch((err: unknown) => {
  console.error("\nPipeline failed:", describeError(err));
  process.exit(1);
});
