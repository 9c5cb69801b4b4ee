import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFile } from "fs/promises";
import { join } from "path";
import { runVaultCheck, syncManifestFor, syncManifests } from "../run.ts";
import { handleHookPayload } from "../hook.ts";
import { VaultAccessError } from "../errors.ts";
import { NOW, daysBefore, makeVault, removeVault, writeNote } from "./helpers.ts";

function manifestOf(...titles: string[]): string {
  return [
    "# Knowledge Manifest",
    "",
    "| File | Tags | Description |",
    "|------|------|-------------|",
    ...titles.map((t) => `| [[${t}]] |  |  |`),
    "",
  ].join("\n");
}

async function buildVault(root: string): Promise<void> {
  await writeNote(root, "Work/Knowledge/Alpha.md", "# Alpha\n");
  await writeNote(root, "Work/Knowledge/Beta.md", "# Beta\n");
  await writeNote(root, "Work/Knowledge/MANIFEST.md", manifestOf("Alpha"));
  await writeNote(root, "Work/Inbox/old.md", "", daysBefore(NOW, 4));
  await writeNote(root, "Work/Inbox/edge.md", "", daysBefore(NOW, 3));
  await writeNote(root, "Work/Projects/proj.md", "", daysBefore(NOW, 31));
  await writeNote(root, "Home/Knowledge/Solo.md", "just text\n");
  await writeNote(root, "Home/Knowledge/MANIFEST.md", manifestOf("Solo"));
}

describe("runVaultCheck", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeVault();
    await buildVault(root);
  });

  afterEach(async () => {
    await removeVault(root);
  });

  it("produces one ordered report across pillars", async () => {
    const report = await runVaultCheck({ root, now: NOW });

    expect(report.pillars).toEqual(["Home", "Work"]);
    expect(report.thresholds).toEqual({ captureDays: 3, activeDays: 30 });
    expect(report.findings).toEqual([
      {
        kind: "manifest_drift",
        pillar: "Work",
        manifestPath: "Work/Knowledge/MANIFEST.md",
        manifestState: "parsed",
        missing: ["Beta"],
        orphaned: [],
        changed: [],
      },
      { kind: "stale_project", pillar: "Work", path: "Work/Projects/proj.md", ageDays: 31 },
      { kind: "stale_capture", pillar: "Work", path: "Work/Inbox/old.md", ageDays: 4 },
    ]);
  });

  it("honours overridden thresholds", async () => {
    const report = await runVaultCheck({ root, now: NOW, thresholds: { captureDays: 2, activeDays: 31 } });
    expect(report.findings.filter((f) => f.kind !== "manifest_drift").map((f) => ("path" in f ? f.path : ""))).toEqual([
      "Work/Inbox/edge.md",
      "Work/Inbox/old.md",
    ]);
  });

  it("gives identical reports for an unchanged vault", async () => {
    expect(await runVaultCheck({ root, now: NOW })).toEqual(await runVaultCheck({ root, now: NOW }));
  });

  it("keeps warning about a malformed note on every run", async () => {
    await writeNote(root, "Work/Knowledge/Broken.md", "---\ntitle: [zz\n---\nBody\n");

    for (const report of [await runVaultCheck({ root, now: NOW }), await runVaultCheck({ root, now: NOW })]) {
      expect(report.warnings.map((w) => w.path)).toEqual(["Work/Knowledge/Broken.md"]);
      expect(report.findings[0]).toMatchObject({ kind: "manifest_drift", pillar: "Work", missing: ["Beta"] });
    }
  });

  it("does not write any manifest", async () => {
    await runVaultCheck({ root, now: NOW });
    expect(await readFile(join(root, "Work/Knowledge/MANIFEST.md"), "utf-8")).toBe(manifestOf("Alpha"));
  });

  it("fails without a partial report when the root is missing", async () => {
    await expect(runVaultCheck({ root: join(root, "nope"), now: NOW })).rejects.toBeInstanceOf(VaultAccessError);
  });
});

describe("syncManifests", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeVault();
    await buildVault(root);
  });

  afterEach(async () => {
    await removeVault(root);
  });

  it("reports drift in check mode without writing", async () => {
    const { outcomes } = await syncManifests({ root, check: true });
    expect(outcomes).toEqual([
      { pillar: "Home", manifestPath: "Home/Knowledge/MANIFEST.md", status: "in_sync" },
      {
        pillar: "Work",
        manifestPath: "Work/Knowledge/MANIFEST.md",
        status: "out_of_sync",
        manifestState: "parsed",
        missing: ["Beta"],
        orphaned: [],
        changed: [],
      },
    ]);
    expect(await readFile(join(root, "Work/Knowledge/MANIFEST.md"), "utf-8")).toBe(manifestOf("Alpha"));
  });

  it("writes drifted manifests and is then in sync", async () => {
    const applied = await syncManifests({ root });
    expect(applied.outcomes.map((o) => o.status)).toEqual(["in_sync", "written"]);
    expect(await readFile(join(root, "Work/Knowledge/MANIFEST.md"), "utf-8")).toBe(manifestOf("Alpha", "Beta"));

    const checked = await syncManifests({ root, check: true });
    expect(checked.outcomes.map((o) => o.status)).toEqual(["in_sync", "in_sync"]);
  });

  it("settles after writing a tag that contains a pipe", async () => {
    await writeNote(root, "Work/Knowledge/Piped.md", '---\ntags: ["a|b"]\n---\n');
    await syncManifests({ root });

    const checked = await syncManifests({ root, check: true });
    expect(checked.outcomes.map((o) => o.status)).toEqual(["in_sync", "in_sync"]);
  });

  it("reports a reference folder that is not a directory", async () => {
    await writeNote(root, "Broken/Knowledge", "file");
    const { outcomes } = await syncManifests({ root, check: true });
    expect(outcomes[0]).toEqual({
      pillar: "Broken",
      manifestPath: "Broken/Knowledge",
      status: "error",
      message: "Knowledge is not a directory",
    });
  });
});

describe("syncManifestFor", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeVault();
    await buildVault(root);
  });

  afterEach(async () => {
    await removeVault(root);
  });

  it("regenerates only the containing folder", async () => {
    const result = await syncManifestFor(join(root, "Work/Knowledge/Beta.md"), { root });
    expect(result?.outcomes.map((o) => [o.pillar, o.status])).toEqual([["Work", "written"]]);
  });

  it("ignores files outside reference folders", async () => {
    expect(await syncManifestFor(join(root, "Work/Inbox/old.md"), { root })).toBeUndefined();
  });
});

describe("handleHookPayload", () => {
  let root: string;
  const workManifest = () => readFile(join(root, "Work/Knowledge/MANIFEST.md"), "utf-8");

  beforeEach(async () => {
    root = await makeVault();
    await buildVault(root);
  });

  afterEach(async () => {
    await removeVault(root);
  });

  it("ignores invalid JSON and empty input", async () => {
    expect(await handleHookPayload("not valid json", { root })).toEqual([]);
    expect(await handleHookPayload("", { root })).toEqual([]);
  });

  it("updates the manifest after a write into Knowledge", async () => {
    const payload = { tool_name: "Write", tool_input: { file_path: join(root, "Work/Knowledge/Beta.md") } };
    const outcomes = await handleHookPayload(JSON.stringify(payload), { root });
    expect(outcomes.map((o) => o.status)).toEqual(["written"]);
    expect(await workManifest()).toContain("| [[Beta]] |  |  |");
  });

  it("resolves relative paths against the vault root", async () => {
    const payload = { tool_name: "Edit", tool_input: { file_path: "Work/Knowledge/Alpha.md" } };
    expect((await handleHookPayload(JSON.stringify(payload), { root })).map((o) => o.status)).toEqual(["written"]);
  });

  it("leaves manifests alone for writes elsewhere", async () => {
    const payload = { tool_name: "Write", tool_input: { file_path: join(root, "Work/Inbox/todo.md") } };
    expect(await handleHookPayload(JSON.stringify(payload), { root })).toEqual([]);
    expect(await workManifest()).toBe(manifestOf("Alpha"));
  });

  it("syncs every manifest when a shell command mentions Knowledge", async () => {
    const payload = { tool_name: "Bash", tool_input: { command: "cp something.md Work/Knowledge/" } };
    const outcomes = await handleHookPayload(JSON.stringify(payload), { root });
    expect(outcomes.map((o) => [o.pillar, o.status])).toEqual([
      ["Home", "in_sync"],
      ["Work", "written"],
    ]);
  });

  it("ignores other shell commands, unknown tools and missing input", async () => {
    for (const payload of [
      { tool_name: "Bash", tool_input: { command: "ls -la" } },
      { tool_name: "UnknownTool", tool_input: {} },
      { tool_name: "Write", tool_input: {} },
      { tool_name: "Write" },
    ]) {
      expect(await handleHookPayload(JSON.stringify(payload), { root })).toEqual([]);
    }
    expect(await workManifest()).toBe(manifestOf("Alpha"));
  });
});
