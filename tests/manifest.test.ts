import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("@clack/prompts", () => ({
  log: {
    error: vi.fn(),
  },
}));

import * as p from "@clack/prompts";
import { ManifestError } from "../src/errors.js";
import { ExitSignal } from "../src/exit-signal.js";
import type { Manifest } from "../src/manifest.js";
import {
  diffManifestFiles,
  MANIFEST_FILE,
  manifestFiles,
  readManifest,
  readManifestOrExit,
  removeManifest,
  validateManifest,
  writeManifest,
} from "../src/manifest.js";

function makeManifest(overrides: Partial<Manifest> = {}): Manifest {
  return {
    version: "1.0.0",
    target: "claude",
    scope: "full",
    installed_at: "2026-03-01T09:00:00.000Z",
    source: "/opt/skillrig/bundle",
    skills: ["alpha", "beta"],
    agents: ["planner"],
    hooks: true,
    plugin_files: ["hooks/skillrig-hook.mjs"],
    ...overrides,
  };
}

let testDir: string;

beforeEach(async () => {
  vi.clearAllMocks();
  testDir = await mkdtemp(join(tmpdir(), "skillrig-manifest-"));
});

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true });
});

describe("readManifest / writeManifest", () => {
  it("returns null when nothing is installed", async () => {
    expect(await readManifest(testDir)).toBeNull();
  });

  it("round-trips a manifest", async () => {
    const manifest = makeManifest();

    await writeManifest(testDir, manifest);

    expect(await readManifest(testDir)).toEqual(manifest);
  });

  it("writes pretty JSON with a trailing newline and no temp files", async () => {
    await writeManifest(testDir, makeManifest({ skills: [], agents: [], plugin_files: [] }));

    const raw = await readFile(join(testDir, MANIFEST_FILE), "utf-8");
    expect(raw.endsWith("}\n")).toBe(true);
    expect(raw).toContain('\n  "target": "claude",\n');
    expect(await readdir(testDir)).toEqual([MANIFEST_FILE]);
  });

  it("throws ManifestError for unparseable content", async () => {
    await writeFile(join(testDir, MANIFEST_FILE), "{ truncated");

    await expect(readManifest(testDir)).rejects.toThrow(ManifestError);
  });

  it("removes the manifest file", async () => {
    await writeManifest(testDir, makeManifest());

    await removeManifest(testDir);

    expect(await readdir(testDir)).toEqual([]);
  });
});

describe("validateManifest", () => {
  it("rejects unknown targets", () => {
    expect(() => validateManifest({ target: "cursor" })).toThrow(
      "Unknown target in manifest: cursor",
    );
  });

  it("rejects non-objects", () => {
    expect(() => validateManifest([])).toThrow("Manifest must be a JSON object");
  });

  it.each([
    ["skills", ["../escape"]],
    ["agents", ["nested/name"]],
    ["plugin_files", ["/etc/passwd"]],
    ["plugin_files", ["hooks/../../x"]],
  ])("rejects unsafe %s entries", (key, value) => {
    expect(() => validateManifest({ target: "claude", [key]: value })).toThrow(
      `Manifest field "${key}" has an invalid entry: ${value[0]}`,
    );
  });

  it("rejects list fields that are not lists", () => {
    expect(() => validateManifest({ target: "claude", skills: "alpha" })).toThrow(
      'Manifest field "skills" must be a list',
    );
  });

  it.each([
    [{ skills: ["a"], agents: ["b"], hooks: true }, "full"],
    [{ skills: ["a"], agents: [], hooks: false }, "skills-only"],
    [{ skills: [], agents: ["b"], hooks: false }, "agents-only"],
    [{ skills: [], agents: [], hooks: true, plugin_files: ["hooks/skillrig-hook.mjs"] }, "hooks-only"],
  ])("derives the scope of %j as %s", (fields, scope) => {
    expect(validateManifest({ target: "claude", ...fields }).scope).toBe(scope);
  });

  it("fills optional strings with empty values", () => {
    expect(validateManifest({ target: "codex" })).toEqual({
      version: "",
      target: "codex",
      scope: "full",
      installed_at: "",
      source: "",
      skills: [],
      agents: [],
      hooks: false,
      plugin_files: [],
    });
  });
});

describe("manifestFiles", () => {
  it("maps directory targets to skill dirs, agent files and plugin files", () => {
    expect(manifestFiles(makeManifest())).toEqual([
      "skills/alpha/",
      "skills/beta/",
      "agents/planner.md",
      "hooks/skillrig-hook.mjs",
    ]);
  });

  it("maps codex-md to its single document", () => {
    const manifest = makeManifest({
      target: "codex-md",
      hooks: false,
      plugin_files: [],
    });

    expect(manifestFiles(manifest)).toEqual(["codex.md"]);
  });

  it("has no document when codex-md has no units", () => {
    const manifest = makeManifest({
      target: "codex-md",
      skills: [],
      agents: [],
      hooks: false,
      plugin_files: [],
    });

    expect(manifestFiles(manifest)).toEqual([]);
  });
});

describe("diffManifestFiles", () => {
  it("adds everything on first install", () => {
    expect(diffManifestFiles(null, makeManifest({ agents: [], plugin_files: [] }))).toEqual({
      toAdd: ["skills/alpha/", "skills/beta/"],
      toRemove: [],
    });
  });

  it("reports dropped and new references in sorted order", () => {
    const before = makeManifest();
    const after = makeManifest({ skills: ["beta", "gamma"], hooks: false, plugin_files: [] });

    expect(diffManifestFiles(before, after)).toEqual({
      toAdd: ["skills/gamma/"],
      toRemove: ["hooks/skillrig-hook.mjs", "skills/alpha/"],
    });
  });

  it("is empty when nothing changed", () => {
    expect(diffManifestFiles(makeManifest(), makeManifest())).toEqual({
      toAdd: [],
      toRemove: [],
    });
  });
});

describe("readManifestOrExit", () => {
  it("reports a broken manifest and exits 1", async () => {
    await writeFile(join(testDir, MANIFEST_FILE), JSON.stringify({ target: "vim" }));

    const err = await readManifestOrExit(testDir).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ExitSignal);
    expect(err).toMatchObject({ code: 1 });
    expect(p.log.error).toHaveBeenCalledWith(
      "Failed to read manifest: Unknown target in manifest: vim",
    );
  });
});
