export type FrontmatterValue = string | number | null | undefined;

export function serializeFrontmatter(fields: Array<[string, FrontmatterValue]>): string {
  const lines = ["---"];
  for (const [key, value] of fields) {
    if (value === undefined || value === null || value === "") continue;
    lines.push(`${key}: ${String(value).replace(/\n/g, " ")}`);
  }
  lines.push("---");
  return lines.join("\n");
}

export function parseFrontmatter(
  raw: string,
): { frontmatter: Record<string, string>; body: string } | null {
  const match = raw.match(/^---\n([\s\S]*?)\n---\n?([\s\S]*)$/);
  if (!match) return null;

  const frontmatter: Record<string, string> = {};
  for (const line of match[1].split("\n")) {
    const colonIdx = line.indexOf(":");
    if (colonIdx === -1) continue;
    const key = line.slice(0, colonIdx).trim();
    const value = line.slice(colonIdx + 1).trim();
    if (key) frontmatter[key] = value;
  }
  return { frontmatter, body: match[2].trim() };
}

/**
 * Split a markdown body on the given `## ` headings, matched
 * case-insensitively and each at most once. Any other `##` line stays in the
 * surrounding text. Text before the first heading is returned under the
 * empty key; keys are the lowercased heading names.
 */
export function splitSections(body: string, headings: readonly string[]): Map<string, string> {
  const pending = new Set(headings.map((h) => h.toLowerCase()));
  const sections = new Map<string, string>();
  let current = "";
  let buf: string[] = [];
  for (const line of body.split("\n")) {
    const name = line.match(/^##\s+(.+?)\s*$/)?.[1]?.toLowerCase();
    if (name !== undefined && pending.has(name)) {
      pending.delete(name);
      sections.set(current, buf.join("\n").trim());
      current = name;
      buf = [];
    } else {
      buf.push(line);
    }
  }
  sections.set(current, buf.join("\n").trim());
  return sections;
}

/** Items of a `- ` list. Indented lines continue the item above them. */
export function parseBullets(text: string | undefined): string[] {
  if (!text) return [];
  const items: string[][] = [];
  for (const line of text.split("\n")) {
    const bullet = line.match(/^\s*[-*]\s+(.*)$/);
    if (bullet) {
      items.push([bullet[1]]);
    } else if (items.length > 0 && (line.startsWith("  ") || line.trim() === "")) {
      items[items.length - 1].push(line.replace(/^ {2}/, ""));
    }
  }
  return items
    .map((lines) => lines.join("\n").trim())
    .filter((item) => item.length > 0 && item !== "(none)");
}

export function bulletList(items: string[], empty = "- (none)"): string {
  return items.length > 0 ? items.map((i) => `- ${i.trim().replace(/\n/g, "\n  ")}`).join("\n") : empty;
}

export function firstLine(text: string, max: number): string {
  const line = text
    .split("\n")
    .map((l) => l.trim())
    .find((l) => l.length > 0 && l !== "---");
  return (line ?? "").slice(0, max);
}
