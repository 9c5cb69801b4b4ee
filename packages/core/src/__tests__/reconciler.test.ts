import { describe, it, expect } from "vitest";
import { compareManifest } from "../manifest/reconciler.ts";
import { renderManifest } from "../manifest/format.ts";
import type { NoteRecord } from "../types/vault.ts";

function record(title: string, tags: string[] = []): NoteRecord {
  return {
    path: `Work/Knowledge/${title}.md`,
    title,
    modifiedAt: new Date("2026-10-01T00:00:00Z"),
    tags,
    links: [],
  };
}

function manifest(...rows: string[]): { kind: "present"; content: string } {
  return {
    kind: "present",
    content: ["# Knowledge Manifest", "", "| File | Tags | Description |", "|------|------|-------------|", ...rows, ""].join("\n"),
  };
}

describe("compareManifest", () => {
  it("reports a note without a row as missing", () => {
    const result = compareManifest({
      records: [record("Alpha"), record("Beta")],
      manifest: manifest("| [[Alpha]] |  |  |"),
    });
    expect(result).toMatchObject({ status: "drift", manifestState: "parsed", missing: ["Beta"], orphaned: [], changed: [] });
  });

  it("reports a row without a note as orphaned", () => {
    const result = compareManifest({
      records: [record("Alpha")],
      manifest: manifest("| [[Alpha]] |  |  |", "| [[Gamma]] |  |  |"),
    });
    expect(result).toMatchObject({ status: "drift", missing: [], orphaned: ["Gamma"], changed: [] });
    expect(result.content).not.toContain("Gamma");
  });

  it("is in sync when the stored bytes are canonical", () => {
    const result = compareManifest({
      records: [record("Beta", ["x"]), record("Alpha")],
      manifest: manifest("| [[Alpha]] |  | First |", "| [[Beta]] | #x | Second |"),
    });
    expect(result.status).toBe("in_sync");
  });

  it("flags tag disagreement as changed and takes the note's tags", () => {
    const result = compareManifest({
      records: [record("Alpha", ["new"])],
      manifest: manifest("| [[Alpha]] | #old | Kept text |"),
    });
    expect(result).toMatchObject({ status: "drift", missing: [], orphaned: [], changed: ["Alpha"] });
    expect(result.content).toContain("| [[Alpha]] | #new | Kept text |");
  });

  it("preserves descriptions verbatim and leaves new rows blank", () => {
    const result = compareManifest({
      records: [record("Alpha"), record("Beta")],
      manifest: manifest("| [[Alpha]] |  | Written by *an agent* |"),
    });
    expect(result.content).toBe(
      renderManifest([
        { title: "Alpha", tags: [], description: "Written by *an agent*" },
        { title: "Beta", tags: [], description: "" },
      ]),
    );
  });

  it("treats an unparsable manifest as fully out of sync", () => {
    const result = compareManifest({
      records: [record("Beta"), record("Alpha")],
      manifest: { kind: "present", content: "garbage without a table" },
    });
    expect(result).toMatchObject({ status: "drift", manifestState: "unparsed", missing: ["Alpha", "Beta"], orphaned: [] });
  });

  it("treats an absent or unreadable manifest the same way", () => {
    expect(compareManifest({ records: [record("A")], manifest: { kind: "absent" } })).toMatchObject({
      status: "drift",
      manifestState: "absent",
      missing: ["A"],
    });
    expect(
      compareManifest({ records: [record("A")], manifest: { kind: "unreadable", reason: "EACCES" } }),
    ).toMatchObject({ status: "drift", manifestState: "unparsed", missing: ["A"] });
  });

  it("keeps rows of skipped notes instead of orphaning them", () => {
    const result = compareManifest({
      records: [record("Alpha")],
      skipped: ["Broken"],
      manifest: manifest("| [[Alpha]] |  |  |", "| [[Broken]] | #t | still here |"),
    });
    expect(result.status).toBe("in_sync");
  });

  it("does not invent rows for skipped notes", () => {
    const result = compareManifest({
      records: [record("Alpha")],
      skipped: ["Broken"],
      manifest: manifest("| [[Alpha]] |  |  |"),
    });
    expect(result.status).toBe("in_sync");
  });

  it("reports layout-only drift for a legacy two-column manifest", () => {
    const result = compareManifest({
      records: [record("Alpha", ["x"])],
      manifest: {
        kind: "present",
        content: "# Knowledge Manifest\n\n| File | Description |\n|------|-------------|\n| [[Alpha]] | Old |\n",
      },
    });
    expect(result).toMatchObject({ status: "drift", missing: [], orphaned: [], changed: [] });
    expect(result.content).toContain("| [[Alpha]] | #x | Old |");
  });

  it("produces identical content for the same input", () => {
    const input = { records: [record("b"), record("A"), record("c")], manifest: { kind: "absent" as const } };
    expect(compareManifest(input).content).toBe(compareManifest(input).content);
  });
});
