import { bulletList, firstLine, parseBullets, parseFrontmatter, serializeFrontmatter, splitSections } from "../markdown.js";
import type { Crystal, CrystalMeta, CrystalMode, CrystalSections } from "../types.js";

export const CHARS_PER_TOKEN = 4;

const SECTION_HEADERS = {
  fieldState: "Field State",
  keyEvents: "Key Events",
  decisions: "Decisions",
  internalArc: "Internal Arc",
  continuitySeeds: "Continuity Seeds",
} as const;

export function crystalFilename(sequence: number): string {
  return `crystal_${String(sequence).padStart(3, "0")}.md`;
}

export function crystalNumber(filename: string): number | null {
  const m = filename.match(/^crystal_(\d+)\.md$/);
  return m ? parseInt(m[1], 10) : null;
}

export function renderCrystalBody(sequence: number, sections: CrystalSections): string {
  return [
    `# Crystal ${String(sequence).padStart(3, "0")}`,
    "",
    `## ${SECTION_HEADERS.fieldState}`,
    "",
    sections.fieldState.trim() || "(unchanged)",
    "",
    `## ${SECTION_HEADERS.keyEvents}`,
    "",
    bulletList(sections.keyEvents),
    "",
    `## ${SECTION_HEADERS.decisions}`,
    "",
    bulletList(sections.decisions),
    "",
    `## ${SECTION_HEADERS.internalArc}`,
    "",
    sections.internalArc.trim() || "(unchanged)",
    "",
    `## ${SECTION_HEADERS.continuitySeeds}`,
    "",
    bulletList(sections.continuitySeeds),
  ].join("\n");
}

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

export function renderCrystal(meta: CrystalMeta, sections: CrystalSections): string {
  const fm = serializeFrontmatter([
    ["sequence", meta.sequence],
    ["created", meta.created],
    ["timespanStart", meta.timespanStart],
    ["timespanEnd", meta.timespanEnd],
    ["startTurnId", meta.startTurnId],
    ["endTurnId", meta.endTurnId],
    ["tokenEstimate", meta.tokenEstimate],
    ["mode", meta.mode],
  ]);
  return `${fm}\n\n${renderCrystalBody(meta.sequence, sections)}\n`;
}

function optionalInt(value: string | undefined): number | null {
  if (!value || !/^\d+$/.test(value)) return null;
  return parseInt(value, 10);
}

function stripPlaceholder(text: string | undefined): string {
  const t = (text ?? "").trim();
  return t === "(unchanged)" ? "" : t;
}

export function parseCrystal(
  filename: string,
  raw: string,
  archived: boolean,
  fallbackCreated: string,
): Crystal {
  const parsed = parseFrontmatter(raw);
  const fm = parsed?.frontmatter ?? {};
  const body = parsed ? parsed.body : raw.trim();
  const sections = splitSections(body, Object.values(SECTION_HEADERS));
  const mode: CrystalMode = fm.mode === "manual" ? "manual" : "auto";

  return {
    filename,
    archived,
    raw,
    meta: {
      sequence: optionalInt(fm.sequence) ?? crystalNumber(filename) ?? 0,
      created: fm.created || fallbackCreated,
      timespanStart: fm.timespanStart || null,
      timespanEnd: fm.timespanEnd || null,
      startTurnId: optionalInt(fm.startTurnId),
      endTurnId: optionalInt(fm.endTurnId),
      tokenEstimate: optionalInt(fm.tokenEstimate) ?? estimateTokens(body),
      mode,
    },
    sections: {
      fieldState: stripPlaceholder(sections.get("field state")),
      keyEvents: parseBullets(sections.get("key events")),
      decisions: parseBullets(sections.get("decisions")),
      internalArc: stripPlaceholder(sections.get("internal arc")),
      continuitySeeds: parseBullets(sections.get("continuity seeds")),
    },
  };
}

export function crystalPreview(crystal: Crystal): string {
  return firstLine(crystal.sections.fieldState || crystal.raw, 80);
}

/** The section text without frontmatter, for prompts and recall. */
export function crystalText(crystal: Crystal): string {
  return renderCrystalBody(crystal.meta.sequence, crystal.sections);
}
