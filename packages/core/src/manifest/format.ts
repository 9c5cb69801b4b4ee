import { sortUnique } from "../utils/markdown.ts";

export interface ManifestRow {
  title: string;
  /** Undefined when the manifest predates the Tags column. */
  tags?: string[];
  /** Written by an external agent; carried through verbatim. */
  description: string;
}

export type ParsedManifest =
  | { status: "parsed"; rows: ManifestRow[] }
  | { status: "unparsed"; reason: string };

export const MANIFEST_HEADING = "# Knowledge Manifest";
const HEADER = ["File", "Tags", "Description"];
const SEPARATOR = "|------|------|-------------|";
const EMPTY_ROW = ["*(empty)*", "", "Add notes to this folder"];

const LINK_CELL = /\[\[([^\]|]+)(?:\|[^\]]*)?\]\]/;
const SEPARATOR_CELL = /^:?-+:?$/;

/** Case-insensitive order, with an ordinal tie-break so the result is total. */
export function compareTitles(a: string, b: string): number {
  const la = a.toLowerCase();
  const lb = b.toLowerCase();
  if (la !== lb) return la < lb ? -1 : 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

export function splitRow(line: string): string[] {
  let body = line.trim();
  if (body.startsWith("|")) body = body.slice(1);
  if (body.endsWith("|") && !body.endsWith("\\|")) body = body.slice(0, -1);

  const cells: string[] = [];
  let cell = "";
  for (let i = 0; i < body.length; i++) {
    const ch = body.charAt(i);
    if (ch === "\\" && body.charAt(i + 1) === "|") {
      cell += "|";
      i++;
    } else if (ch === "|") {
      cells.push(cell.trim());
      cell = "";
    } else {
      cell += ch;
    }
  }
  cells.push(cell.trim());
  return cells;
}

function escapeCell(value: string): string {
  return value.replace(/\r?\n/g, " ").replace(/\|/g, "\\|");
}

function renderRow(cells: string[]): string {
  return `| ${cells.join(" | ")} |`;
}

export function parseTagCell(cell: string): string[] {
  return sortUnique(
    cell
      .split(/\s+/)
      .map((t) => t.replace(/^#/, ""))
      .filter((t) => t.length > 0),
  );
}

export function parseManifest(content: string): ParsedManifest {
  let columns: { file: number; tags: number; description: number } | undefined;
  const rows: ManifestRow[] = [];
  const seen = new Set<string>();

  for (const raw of content.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line.startsWith("|")) {
      if (columns) break;
      continue;
    }

    const cells = splitRow(line);
    if (!columns) {
      const names = cells.map((c) => c.toLowerCase());
      const file = names.indexOf("file");
      if (file === -1) {
        return { status: "unparsed", reason: "manifest table has no File column" };
      }
      columns = { file, tags: names.indexOf("tags"), description: names.indexOf("description") };
      continue;
    }
    if (cells.every((c) => SEPARATOR_CELL.test(c))) continue;

    const title = LINK_CELL.exec(cells[columns.file] ?? "")?.[1]?.trim();
    if (!title || seen.has(title)) continue;
    seen.add(title);

    rows.push({
      title,
      tags: columns.tags === -1 ? undefined : parseTagCell(cells[columns.tags] ?? ""),
      description: columns.description === -1 ? "" : (cells[columns.description] ?? ""),
    });
  }

  if (!columns) return { status: "unparsed", reason: "no manifest table found" };
  return { status: "parsed", rows };
}

/** Canonical manifest text; the same rows always render to the same bytes. */
export function renderManifest(rows: ManifestRow[]): string {
  const lines = [MANIFEST_HEADING, "", renderRow(HEADER), SEPARATOR];

  if (rows.length === 0) {
    lines.push(renderRow(EMPTY_ROW));
  } else {
    for (const row of [...rows].sort((a, b) => compareTitles(a.title, b.title))) {
      lines.push(
        renderRow([
          `[[${escapeCell(row.title)}]]`,
          escapeCell((row.tags ?? []).map((t) => `#${t}`).join(" ")),
          escapeCell(row.description),
        ]),
      );
    }
  }

  lines.push("");
  return lines.join("\n");
}
