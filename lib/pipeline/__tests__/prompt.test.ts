import fs from "node:fs";
import path from "node:path";
import { afterEach, describe, it, expect } from "vitest";
import { parseMessages, renderPrompt, toModelMessages, type PromptPart } from "../prompt";
import { makeTempDir } from "./test-context";

function userParts(content: string | PromptPart[]): PromptPart[] {
  if (typeof content === "string") throw new Error("expected content parts");
  return content;
}

describe("renderPrompt", () => {
  it("renders the page_summary template with the page image", async () => {
    const messages = await renderPrompt("page_summary", {
      file_name: "lease.pdf",
      page_num: 2,
      total_pages: 7,
      image_base64: "abc123",
    });

    expect(messages.map((m) => m.role)).toEqual(["system", "user"]);
    const parts = userParts(messages[1].content);
    const text = parts.flatMap((p) => (p.type === "text" ? [p.text] : [])).join(" ");
    expect(text).toContain("Document: lease.pdf");
    expect(text).toContain("Page 2 of 7");
    expect(parts.filter((p) => p.type === "image")).toEqual([
      { type: "image", image: "abc123", mediaType: "image/png" },
    ]);
  });

  it("renders the document_summary template", async () => {
    const messages = await renderPrompt("document_summary", {
      file_name: "lease.pdf",
      total_pages: 3,
      pages: [
        { page_num: 1, summary: "Parties and term." },
        { page_num: 3, summary: "Signatures." },
      ],
      skipped_pages: [2],
    });

    const parts = userParts(messages[1].content);
    expect(parts.every((p) => p.type === "text")).toBe(true);
    const text = parts.flatMap((p) => (p.type === "text" ? [p.text] : [])).join(" ");
    expect(text).toContain("Page 1: Parties and term.");
    expect(text).toContain("Page 3: Signatures.");
    expect(text).toContain("No summary is available for page(s) 2.");
  });

  it("leaves out the skipped-pages line when nothing was skipped", async () => {
    const messages = await renderPrompt("document_summary", {
      file_name: "a.pdf",
      total_pages: 1,
      pages: [{ page_num: 1, summary: "Only page." }],
      skipped_pages: [],
    });
    const text = userParts(messages[1].content)
      .flatMap((p) => (p.type === "text" ? [p.text] : []))
      .join(" ");
    expect(text).not.toContain("No summary is available");
  });

  it("system content is a trimmed string", async () => {
    const messages = await renderPrompt("page_summary", { image_base64: "x" });
    const system = messages[0].content;
    expect(typeof system).toBe("string");
    expect(system).not.toMatch(/^\s/);
    expect(system).not.toMatch(/\s$/);
  });

  describe("custom prompt directories", () => {
    let dir: string | undefined;

    afterEach(() => {
      if (dir) fs.rmSync(dir, { recursive: true, force: true });
    });

    it("loads templates from the given directory", async () => {
      dir = makeTempDir("prompts-");
      fs.writeFileSync(
        path.join(dir, "custom.liquid"),
        '{% chat role: "user" %}Hello {{ name }}{% endchat %}'
      );
      const messages = await renderPrompt("custom", { name: "Ada" }, dir);
      expect(messages).toEqual([{ role: "user", content: [{ type: "text", text: "Hello Ada" }] }]);
    });
  });
});

describe("parseMessages", () => {
  it("splits text around image markers", () => {
    const raw = "\x01CHAT:user\x01 before \x00IMG:zzz\x00 after \x01ENDCHAT\x01";
    expect(parseMessages(raw)).toEqual([
      {
        role: "user",
        content: [
          { type: "text", text: "before" },
          { type: "image", image: "zzz", mediaType: "image/png" },
          { type: "text", text: "after" },
        ],
      },
    ]);
  });

  it("rejects unknown roles", () => {
    expect(() => parseMessages("\x01CHAT:tool\x01x\x01ENDCHAT\x01")).toThrow("Unknown chat role: tool");
  });
});

describe("toModelMessages", () => {
  it("lifts system messages out of the conversation", () => {
    const result = toModelMessages([
      { role: "system", content: "Be brief." },
      { role: "user", content: [{ type: "text", text: "Hi" }] },
      { role: "assistant", content: [{ type: "text", text: "Hello" }] },
    ]);
    expect(result).toEqual({
      system: "Be brief.",
      messages: [
        { role: "user", content: [{ type: "text", text: "Hi" }] },
        { role: "assistant", content: "Hello" },
      ],
    });
  });
});
