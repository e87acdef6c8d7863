import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { DataRoom, formatDocumentSummary } from "../data-room";
import { createEmptyIndex, createPageRecord, PENDING } from "../pipeline/core/records";
import { writeIndexAtomic } from "../pipeline/index/index-store";
import { resolveDataRoomPaths } from "../pipeline/types";
import { PersistenceError } from "../pipeline/errors";
import { makeTempDir } from "../pipeline/__tests__/test-context";

describe("DataRoom", () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir("data-room-");
    const index = createEmptyIndex("/in", "gpt-4o-mini");
    index.documents.set("doc_001", {
      docId: "doc_001",
      originalPath: "/in/contracts/lease.docx",
      relativePath: "contracts/lease.docx",
      sourceHash: "h1",
      canonicalPdfPath: "pdfs/doc_001.pdf",
      status: { state: "summarized" },
      summary: { kind: "done", text: "Office lease between A and B." },
      pages: [
        { ...createPageRecord(1), imagePath: "pages/doc_001/page_001.png", summary: { kind: "done", text: "Parties." } },
        { ...createPageRecord(2), imageError: "render failed", summary: { kind: "failed", reason: "no page image: render failed" } },
        { ...createPageRecord(3), imagePath: "pages/doc_001/page_003.png" },
      ],
    });
    index.documents.set("doc_002", {
      docId: "doc_002",
      originalPath: "/in/broken.pdf",
      relativePath: "broken.pdf",
      sourceHash: "h2",
      canonicalPdfPath: "pdfs/doc_002.pdf",
      status: { state: "failed", stage: "rasterize", reason: "PDF has no pages" },
      summary: PENDING,
      pages: [],
    });
    const image = path.join(root, "pages", "doc_001", "page_001.png");
    fs.mkdirSync(path.dirname(image), { recursive: true });
    fs.writeFileSync(image, "png-bytes");
    writeIndexAtomic(resolveDataRoomPaths(root).indexFile, index);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("lists documents in index order", () => {
    expect(DataRoom.open(root).listDocuments()).toEqual([
      {
        docId: "doc_001",
        relativePath: "contracts/lease.docx",
        summary: "Office lease between A and B.",
        status: { state: "summarized" },
        pageCount: 3,
      },
      {
        docId: "doc_002",
        relativePath: "broken.pdf",
        summary: null,
        status: { state: "failed", stage: "rasterize", reason: "PDF has no pages" },
        pageCount: 0,
      },
    ]);
  });

  it("returns null for unknown documents", () => {
    const room = DataRoom.open(root);
    expect(room.getDocument("doc_404")).toBeNull();
    expect(room.getDocumentSummary("doc_404")).toBeNull();
    expect(room.getDocumentPages("doc_404")).toBeNull();
  });

  it("returns requested pages in request order with absolute image paths", () => {
    const pages = DataRoom.open(root).getDocumentPages("doc_001", [3, 1, 9]);
    expect(pages).toEqual([
      {
        pageNum: 3,
        imagePath: path.join(root, "pages", "doc_001", "page_003.png"),
        imageError: null,
        summary: null,
      },
      {
        pageNum: 1,
        imagePath: path.join(root, "pages", "doc_001", "page_001.png"),
        imageError: null,
        summary: "Parties.",
      },
      { pageNum: 9, error: "Page 9 not found in document doc_001" },
    ]);
  });

  it("embeds images on request", () => {
    const pages = DataRoom.open(root).getDocumentPages("doc_001", [1, 2], { includeImages: true });
    expect(pages?.[0]).toMatchObject({ imageBase64: Buffer.from("png-bytes").toString("base64") });
    expect(pages?.[1]).toEqual({ pageNum: 2, imagePath: null, imageError: "render failed", summary: null });
  });

  it("formats a document summary with every page slot", () => {
    const view = DataRoom.open(root).getDocumentSummary("doc_001");
    if (!view) throw new Error("doc_001 missing");
    expect(formatDocumentSummary(view)).toBe(
      [
        "Document doc_001 (contracts/lease.docx)",
        "Summary: Office lease between A and B.",
        "Page 1: Parties.",
        "Page 2: [not summarized: no page image: render failed]",
        "Page 3: [not summarized: pending]",
      ].join("\n\n")
    );
  });

  it("fails to open a room without an index", () => {
    expect(() => DataRoom.open(path.join(root, "elsewhere"))).toThrow(PersistenceError);
  });
});
