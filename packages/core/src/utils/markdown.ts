import matter from "gray-matter";
import { z } from "zod";
import type { NoteFrontmatter, NoteMetadata } from "../types/vault.ts";

const frontmatterSchema = z
  .object({
    tags: z
      .union([z.array(z.union([z.string(), z.number()])), z.string(), z.null()])
      .optional()
      .catch(undefined),
    created: z.union([z.date(), z.string(), z.null()]).optional().catch(undefined),
    date: z.union([z.date(), z.string(), z.null()]).optional().catch(undefined),
  })
  .passthrough();

export function parseFrontmatter(content: string): {
  data: NoteFrontmatter;
  body: string;
} {
  // Passing options bypasses gray-matter's cache, which would otherwise hand
  // back empty data for a block that failed to parse the first time.
  const { data, content: body } = matter(content, {});
  const parsed = frontmatterSchema.parse(data);
  return {
    data: {
      ...parsed,
      tags: typeof parsed.tags === "string" ? parsed.tags : parsed.tags?.map(String),
      created: parsed.created ?? undefined,
      date: parsed.date ?? undefined,
    },
    body,
  };
}

export function extractWikilinks(content: string): string[] {
  const regex = /\[\[([^\]|]+)(?:\|[^\]]+)?\]\]/g;
  const links: string[] = [];
  let match: RegExpExecArray | null;

  while ((match = regex.exec(content)) !== null) {
    if (match[1]) links.push(match[1].trim());
  }

  return [...new Set(links)];
}

export function extractTags(content: string): string[] {
  const regex = /(?:^|\s)#([a-zA-Z][\w/-]*)/g;
  const tags: string[] = [];
  let match: RegExpExecArray | null;

  while ((match = regex.exec(content)) !== null) {
    if (match[1]) tags.push(match[1]);
  }

  return [...new Set(tags)];
}

/** Front-matter tags may be a YAML list or a comma/space separated string. */
export function normalizeTags(tags: NoteFrontmatter["tags"]): string[] {
  if (tags === undefined) return [];
  const raw = typeof tags === "string" ? tags.split(/[,\s]+/) : tags;
  return raw.map((t) => t.trim().replace(/^#/, "")).filter((t) => t.length > 0);
}

export function parseExplicitDate(value: string | Date | undefined): Date | undefined {
  if (value === undefined) return undefined;
  const date = value instanceof Date ? value : new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

export function sortUnique(values: Iterable<string>): string[] {
  return [...new Set(values)].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Never throws: a front-matter block that YAML rejects, or that is not a
 * key/value mapping, comes back as `unparsed`. A known field of the wrong
 * type is ignored.
 */
export function extractMetadata(content: string): NoteMetadata {
  let parsed: ReturnType<typeof parseFrontmatter>;
  try {
    parsed = parseFrontmatter(content);
  } catch (e) {
    return {
      status: "unparsed",
      reason: e instanceof Error ? e.message.split("\n")[0] ?? e.name : String(e),
    };
  }

  const { data, body } = parsed;
  return {
    status: "parsed",
    tags: sortUnique([...normalizeTags(data.tags), ...extractTags(body)]),
    links: sortUnique(extractWikilinks(body)),
    date: parseExplicitDate(data.created ?? data.date),
  };
}
