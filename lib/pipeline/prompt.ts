import path from "node:path";
import { fileURLToPath } from "node:url";
import { Liquid, Tag, type TagToken, type TopLevelToken, type Template } from "liquidjs";
import type { Context } from "liquidjs";
import type { Emitter } from "liquidjs";
import type { ModelMessage } from "ai";

const IMAGE_MARKER_START = "\x00IMG:";
const IMAGE_MARKER_END = "\x00";

export type PromptRole = "system" | "user" | "assistant";

export type PromptPart =
  | { type: "text"; text: string }
  | { type: "image"; image: string; mediaType: "image/png" };

export interface PromptMessage {
  role: PromptRole;
  content: string | PromptPart[];
}

function toRole(value: string): PromptRole {
  if (value === "system" || value === "user" || value === "assistant") return value;
  throw new Error(`Unknown chat role: ${value}`);
}

/**
 * Custom {% chat role: "system"|"user"|"assistant" %} ... {% endchat %} tag.
 * Emits delimiters that renderPrompt splits on to produce PromptMessage[].
 */
class ChatTag extends Tag {
  private role: PromptRole;
  private templates: Template[];

  constructor(token: TagToken, remainTokens: TopLevelToken[], liquid: Liquid) {
    super(token, remainTokens, liquid);
    const match = token.args.match(/role:\s*"(\w+)"/);
    if (!match) {
      throw new Error(`{% chat %} requires role: "system"|"user"|"assistant"`);
    }
    this.role = toRole(match[1]);
    this.templates = [];
    const stream = liquid.parser
      .parseStream(remainTokens)
      .on("tag:endchat", () => stream.stop())
      .on("template", (tpl: Template) => this.templates.push(tpl))
      .on("end", () => {
        throw new Error("{% chat %} missing {% endchat %}");
      });
    stream.start();
  }

  *render(ctx: Context, emitter: Emitter): Generator<unknown, void, unknown> {
    emitter.write(`\x01CHAT:${this.role}\x01`);
    yield this.liquid.renderer.renderTemplates(this.templates, ctx, emitter);
    emitter.write(`\x01ENDCHAT\x01`);
  }
}

/**
 * Custom {% image expr %} tag. Evaluates the expression (a base64 PNG) and
 * emits a marker that renderPrompt turns into an image content part.
 */
class ImageTag extends Tag {
  private value: string;

  constructor(token: TagToken, remainTokens: TopLevelToken[], liquid: Liquid) {
    super(token, remainTokens, liquid);
    this.value = token.args.trim();
  }

  *render(ctx: Context, emitter: Emitter): Generator<unknown, void, unknown> {
    const val = yield this.liquid.evalValue(this.value, ctx);
    emitter.write(`${IMAGE_MARKER_START}${String(val)}${IMAGE_MARKER_END}`);
  }
}

export const PROMPTS_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "../../prompts"
);

const engines = new Map<string, Liquid>();

function getEngine(promptsDir: string): Liquid {
  let engine = engines.get(promptsDir);
  if (!engine) {
    engine = new Liquid({ root: [promptsDir], extname: ".liquid", strictVariables: false });
    engine.registerTag("chat", ChatTag);
    engine.registerTag("image", ImageTag);
    engines.set(promptsDir, engine);
  }
  return engine;
}

/**
 * Render a .liquid prompt template and return structured PromptMessage[].
 * The template must use {% chat role: "..." %} blocks.
 */
export async function renderPrompt(
  templateName: string,
  context: Record<string, unknown>,
  promptsDir: string = PROMPTS_DIR
): Promise<PromptMessage[]> {
  const raw: unknown = await getEngine(promptsDir).renderFile(templateName, context);
  return parseMessages(String(raw));
}

export function parseMessages(raw: string): PromptMessage[] {
  const messages: PromptMessage[] = [];
  const chatRegex = /\x01CHAT:(\w+)\x01([\s\S]*?)\x01ENDCHAT\x01/g;
  let match;

  while ((match = chatRegex.exec(raw)) !== null) {
    const role = toRole(match[1]);
    const body = match[2];

    if (role === "system") {
      messages.push({ role, content: body.trim() });
    } else {
      messages.push({ role, content: parseContentParts(body) });
    }
  }

  return messages;
}

function parseContentParts(body: string): PromptPart[] {
  const parts: PromptPart[] = [];
  const imageRegex = new RegExp(
    `${escapeRegex(IMAGE_MARKER_START)}(.*?)${escapeRegex(IMAGE_MARKER_END)}`,
    "g"
  );

  let lastIndex = 0;
  let match;

  while ((match = imageRegex.exec(body)) !== null) {
    const textBefore = body.slice(lastIndex, match.index);
    if (textBefore.trim()) {
      parts.push({ type: "text", text: textBefore.trim() });
    }
    parts.push({ type: "image", image: match[1], mediaType: "image/png" });
    lastIndex = match.index + match[0].length;
  }

  const remaining = body.slice(lastIndex).trim();
  if (remaining) {
    parts.push({ type: "text", text: remaining });
  }

  return parts;
}

function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Split rendered messages into the system prompt and the conversation the
 * AI SDK expects. Assistant turns carry text only.
 */
export function toModelMessages(messages: PromptMessage[]): {
  system: string | undefined;
  messages: ModelMessage[];
} {
  let system: string | undefined;
  const out: ModelMessage[] = [];

  for (const m of messages) {
    if (m.role === "system") {
      const text = typeof m.content === "string" ? m.content : partsToText(m.content);
      system = system ? `${system}\n\n${text}` : text;
    } else if (m.role === "user") {
      out.push({ role: "user", content: m.content });
    } else {
      out.push({
        role: "assistant",
        content: typeof m.content === "string" ? m.content : partsToText(m.content),
      });
    }
  }

  return { system, messages: out };
}

function partsToText(parts: PromptPart[]): string {
  return parts
    .flatMap((p) => (p.type === "text" ? [p.text] : []))
    .join("\n");
}
