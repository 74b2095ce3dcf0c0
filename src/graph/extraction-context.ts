import { readFile } from "node:fs/promises";
import { log } from "../logger.js";

export const DEFAULT_BASE_CONTEXT = `You are extracting a knowledge graph from an ongoing relationship between a conversational agent and the people it works with.
Prefer entities that recur: people, shared places, meaningful objects, projects and tools, ideas that keep coming back.
Skip transient chatter, greetings, tool output and stack traces.
State facts as durable relationships, not as one-off events, unless the event itself matters.`;

const CHANNEL_OVERLAYS: Array<{ match: string; text: string }> = [
  {
    match: "discord",
    text: `Channel: group chat. Several people may speak; attribute facts to the named speaker of each message.
Nicknames and @-mentions refer to people; resolve them to full names when known.`,
  },
  {
    match: "terminal",
    text: `Channel: terminal session. Conversation is mostly technical.
Favor TechnicalArtifact entities (files, services, repositories) and WORKS_ON / USES / DEPENDS_ON relationships.
Ignore command output, diffs and logs.`,
  },
  {
    match: "reflection",
    text: `Channel: reflection. The agent is writing to itself.
Capture realizations, decisions and changes of feeling; these are first-person statements by the primary entity.`,
  },
];

const SECTION_LIMIT = 1500;

export interface ExtractionContextInput {
  channel: string;
  entityName: string;
  baseContext: string;
  sceneContext?: string | null;
  crystalContext?: string | null;
  additionalHints?: string | null;
}

function clip(text: string): string {
  const t = text.trim();
  return t.length > SECTION_LIMIT ? `${t.slice(0, SECTION_LIMIT)}...` : t;
}

export function channelOverlay(channel: string): string | null {
  const lower = channel.toLowerCase();
  return CHANNEL_OVERLAYS.find((o) => lower.includes(o.match))?.text ?? null;
}

/**
 * Assemble extraction guidance in a fixed order: resolution rule, base
 * context, channel overlay, then the optional scene, crystal and hint
 * sections. The same inputs always produce the same text.
 */
export function buildExtractionInstructions(input: ExtractionContextInput): string {
  const parts = [
    `The primary entity is "${input.entityName}". Resolve "I", "me" and "my" in the primary entity's messages to "${input.entityName}".`,
    "Never create entities for pronouns, articles, placeholders or single characters.",
    "",
    input.baseContext.trim(),
  ];

  const overlay = channelOverlay(input.channel);
  if (overlay) parts.push("", overlay);

  if (input.sceneContext && input.sceneContext.trim()) {
    parts.push("", "## Current Scene", clip(input.sceneContext));
  }
  if (input.crystalContext && input.crystalContext.trim()) {
    parts.push("", "## Recent Continuity", clip(input.crystalContext));
  }
  if (input.additionalHints && input.additionalHints.trim()) {
    parts.push("", "## Additional Hints", input.additionalHints.trim());
  }
  return parts.join("\n");
}

/** Speaker name from a "Name: message" prefix, or null. */
export function speakerFromContent(content: string): string | null {
  const idx = content.indexOf(":");
  if (idx <= 0 || idx >= 50) return null;
  const name = content.slice(0, idx).trim();
  if (!name || !/^[A-Za-z0-9][A-Za-z0-9 _.-]*$/.test(name)) return null;
  return name;
}

export interface ExtractionContextSources {
  entityName: string;
  baseContextPath?: string;
  scenePath?: string;
  latestCrystal?: () => Promise<string | null>;
}

/** Reads the dynamic inputs (base context file, scene, latest crystal) and composes guidance. */
export class ExtractionContextProvider {
  private baseContext: string | null = null;

  constructor(private readonly sources: ExtractionContextSources) {}

  async compose(channel: string, additionalHints?: string | null): Promise<string> {
    const [baseContext, sceneContext, crystalContext] = await Promise.all([
      this.loadBaseContext(),
      this.readOptional(this.sources.scenePath),
      this.latestCrystal(),
    ]);
    return buildExtractionInstructions({
      channel,
      entityName: this.sources.entityName,
      baseContext,
      sceneContext,
      crystalContext,
      additionalHints,
    });
  }

  private async loadBaseContext(): Promise<string> {
    if (this.baseContext !== null) return this.baseContext;
    const fromFile = await this.readOptional(this.sources.baseContextPath);
    this.baseContext = fromFile && fromFile.trim() ? fromFile : DEFAULT_BASE_CONTEXT;
    return this.baseContext;
  }

  private async latestCrystal(): Promise<string | null> {
    if (!this.sources.latestCrystal) return null;
    try {
      return await this.sources.latestCrystal();
    } catch (err) {
      log.warn("extraction context: latest crystal unavailable", err);
      return null;
    }
  }

  private async readOptional(filePath: string | undefined): Promise<string | null> {
    if (!filePath) return null;
    try {
      return await readFile(filePath, "utf-8");
    } catch (err) {
      log.debug(`extraction context: ${filePath} not readable (${String(err)})`);
      return null;
    }
  }
}
