import { mkdtemp, readdir, readFile, rm, writeFile, mkdir } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadBundle } from "../src/bundle.js";
import type { ApplyResult } from "../src/deploy.js";
import {
	applyDeployment,
	planDeployment,
	removeDeployment,
	validateScope,
} from "../src/deploy.js";
import { BundleError, InvalidSettingsError } from "../src/errors.js";
import { pathExists } from "../src/fs-utils.js";
import type { InstallScope, Manifest } from "../src/manifest.js";
import { readManifest } from "../src/manifest.js";
import { readSettings } from "../src/settings-merge.js";
import { claudeHooksFragment } from "../src/targets/claude.js";
import { getTargetSchema } from "../src/targets/registry.js";
import type { TargetId } from "../src/targets/types.js";
import { isNoop } from "../src/summary.js";
import { defaultBundleFiles, writeBundle } from "./fixtures/bundle.js";

let testDir: string;
let bundleDir: string;
let root: string;

beforeEach(async () => {
	testDir = await mkdtemp(join(tmpdir(), "skillrig-deploy-"));
	bundleDir = await writeBundle(join(testDir, "bundle"));
	root = join(testDir, "project", ".claude");
});

afterEach(async () => {
	await rm(testDir, { recursive: true, force: true });
});

async function deploy(
	target: TargetId,
	scope: InstallScope = "full",
	now?: Date,
): Promise<{ manifest: Manifest; result: ApplyResult }> {
	const bundle = await loadBundle(bundleDir);
	const previous = await readManifest(root);
	const plan = planDeployment({
		bundle,
		schema: getTargetSchema(target),
		scope,
		root,
		previous,
		now,
	});
	const result = await applyDeployment(root, plan, previous);
	return { manifest: plan.manifest, result };
}

async function sortedEntries(dir: string): Promise<string[]> {
	return (await readdir(dir)).sort();
}

describe("first install", () => {
	it("writes every converted file, the settings fragment and the manifest", async () => {
		const { manifest, result } = await deploy("claude", "full", new Date("2026-01-05T10:00:00Z"));

		expect(result).toEqual({
			written: [
				"skills/alpha/SKILL.md",
				"skills/alpha/references/guide.md",
				"skills/beta/SKILL.md",
				"agents/planner.md",
				"agents/reviewer.md",
				"hooks/skillrig-hook.mjs",
			],
			removed: [],
			pruned: [],
			settingsChanged: true,
			manifestChanged: true,
		});
		expect(manifest).toEqual({
			version: "1.0.0",
			target: "claude",
			scope: "full",
			installed_at: "2026-01-05T10:00:00.000Z",
			source: bundleDir,
			skills: ["alpha", "beta"],
			agents: ["planner", "reviewer"],
			hooks: true,
			plugin_files: ["hooks/skillrig-hook.mjs"],
		});
		expect(await readManifest(root)).toEqual(manifest);
		expect(await readSettings(join(root, "settings.json"))).toEqual(
			claudeHooksFragment(join(root, "hooks/skillrig-hook.mjs")),
		);
	});

	it("installs only the units the scope selects", async () => {
		const { manifest, result } = await deploy("claude", "skills-only");

		expect(result.written).toEqual([
			"skills/alpha/SKILL.md",
			"skills/alpha/references/guide.md",
			"skills/beta/SKILL.md",
		]);
		expect(manifest).toMatchObject({ agents: [], hooks: false, plugin_files: [] });
		expect(await sortedEntries(root)).toEqual([".skillrig-manifest.json", "skills"]);
	});

	it("installs only the hook bridge and keeps existing settings for hooks-only", async () => {
		await mkdir(root, { recursive: true });
		await writeFile(
			join(root, "settings.json"),
			JSON.stringify({ permissions: { allow: ["Bash(echo:*)"] } }),
		);

		const { manifest, result } = await deploy("claude", "hooks-only");

		expect(manifest).toMatchObject({
			scope: "hooks-only",
			skills: [],
			agents: [],
			hooks: true,
			plugin_files: ["hooks/skillrig-hook.mjs"],
		});
		expect(result.written).toEqual(["hooks/skillrig-hook.mjs"]);
		expect(result.settingsChanged).toBe(true);
		expect(await readSettings(join(root, "settings.json"))).toEqual({
			permissions: { allow: ["Bash(echo:*)"] },
			...claudeHooksFragment(join(root, "hooks/skillrig-hook.mjs")),
		});
	});

	it("installs the OpenCode plugin without a settings file", async () => {
		root = join(testDir, "project", ".opencode");

		const { manifest, result } = await deploy("opencode");

		expect(manifest.plugin_files).toEqual(["plugins/skillrig-hooks.js"]);
		expect(result.settingsChanged).toBe(false);
		expect(await readFile(join(root, "plugins/skillrig-hooks.js"), "utf-8")).toBe(
			"// opencode plugin bridge\n",
		);
	});

	it("writes a single codex.md and skips hooks", async () => {
		root = join(testDir, "project");
		const bundle = await loadBundle(bundleDir);

		const plan = planDeployment({
			bundle,
			schema: getTargetSchema("codex-md"),
			scope: "full",
			root,
			previous: null,
		});
		const result = await applyDeployment(root, plan, null);

		expect(plan.hooksSkipped).toBe(true);
		expect(result.written).toEqual(["codex.md"]);
		expect(plan.manifest).toMatchObject({
			skills: ["alpha", "beta"],
			agents: ["planner", "reviewer"],
			hooks: false,
		});
		const doc = await readFile(join(root, "codex.md"), "utf-8");
		expect(doc.startsWith("# Fixture Bundle\n\n> 2 skills + 2 agents.\n")).toBe(true);
	});

	it("leaves over-long Codex descriptions out and reports them", async () => {
		await writeBundle(bundleDir, {
			"skills/wordy/SKILL.md": `---\ndescription: ${"x".repeat(1025)}\n---\n`,
		});
		root = join(testDir, "project", ".codex");

		const bundle = await loadBundle(bundleDir);
		const plan = planDeployment({
			bundle,
			schema: getTargetSchema("codex"),
			scope: "full",
			root,
			previous: null,
		});

		expect(plan.violations.map((v) => [v.unit, v.constraint])).toEqual([
			["wordy", "description is 1025 characters after folding (limit 1024)"],
		]);
		expect(plan.manifest.skills).toEqual(["alpha", "beta"]);
		expect(plan.files.some((f) => f.path.startsWith("skills/wordy/"))).toBe(false);
	});

	it("fails when the bundle has no built hook bridge", async () => {
		const files = defaultBundleFiles();
		delete files["hooks/skillrig-hook.mjs"];
		delete files["hooks/skillrig-hooks.js"];
		const bare = await writeBundle(join(testDir, "bare"), files);
		const bundle = await loadBundle(bare);

		expect(() =>
			planDeployment({
				bundle,
				schema: getTargetSchema("claude"),
				scope: "full",
				root,
				previous: null,
			}),
		).toThrow(new BundleError(`Bundle ${bare} has no hooks/skillrig-hook.mjs (build the hook bridge first)`));
	});

	it("aborts before writing anything when settings cannot be parsed", async () => {
		await mkdir(root, { recursive: true });
		await writeFile(join(root, "settings.json"), "[1]");

		await expect(deploy("claude")).rejects.toThrow(InvalidSettingsError);
		expect(await sortedEntries(root)).toEqual(["settings.json"]);
	});
});

describe("update", () => {
	it("is a no-op when nothing changed", async () => {
		await deploy("claude");

		const { result } = await deploy("claude");

		expect(isNoop(result)).toBe(true);
	});

	it("keeps the original install time", async () => {
		await deploy("claude", "full", new Date("2026-01-05T10:00:00Z"));

		const { manifest } = await deploy("claude", "full", new Date("2026-02-01T08:30:00Z"));

		expect(manifest.installed_at).toBe("2026-01-05T10:00:00.000Z");
	});

	it("prunes files a skill no longer ships", async () => {
		await deploy("claude");
		await rm(join(bundleDir, "skills/alpha/references/guide.md"));

		const { result } = await deploy("claude");

		expect(result.pruned).toEqual(["skills/alpha/references/guide.md"]);
		expect(result.written).toEqual([]);
		expect(result.manifestChanged).toBe(false);
		expect(await pathExists(join(root, "skills/alpha/references/guide.md"))).toBe(false);
	});

	it("removes units dropped from the bundle", async () => {
		await deploy("claude");
		await rm(join(bundleDir, "skills/beta"), { recursive: true });
		await rm(join(bundleDir, "agents/reviewer.md"));

		const { manifest, result } = await deploy("claude");

		expect(result.removed).toEqual(["agents/reviewer.md", "skills/beta/"]);
		expect(manifest.skills).toEqual(["alpha"]);
		expect(manifest.agents).toEqual(["planner"]);
	});

	it("strips the settings fragment when narrowing to skills", async () => {
		await mkdir(root, { recursive: true });
		await writeFile(join(root, "settings.json"), JSON.stringify({ model: "opus" }));
		await deploy("claude");

		const { result } = await deploy("claude", "skills-only");

		expect(result.removed).toEqual([
			"agents/planner.md",
			"agents/reviewer.md",
			"hooks/skillrig-hook.mjs",
		]);
		expect(result.settingsChanged).toBe(true);
		expect(await readSettings(join(root, "settings.json"))).toEqual({ model: "opus" });
		expect(await sortedEntries(root)).toEqual([
			".skillrig-manifest.json",
			"settings.json",
			"skills",
		]);
	});
});

describe("removeDeployment", () => {
	it("removes exactly what was installed", async () => {
		await mkdir(join(root, "skills", "mine"), { recursive: true });
		await writeFile(join(root, "skills", "mine", "SKILL.md"), "user skill");
		await writeFile(join(root, "settings.json"), JSON.stringify({ model: "opus" }));
		const { manifest } = await deploy("claude", "full");

		const result = await removeDeployment(root, manifest);

		expect(result).toEqual({
			removed: [
				"skills/alpha/",
				"skills/beta/",
				"agents/planner.md",
				"agents/reviewer.md",
				"hooks/skillrig-hook.mjs",
			],
			skipped: [],
			settingsChanged: true,
		});
		expect(await sortedEntries(root)).toEqual(["settings.json", "skills"]);
		expect(await readdir(join(root, "skills"))).toEqual(["mine"]);
		expect(await readSettings(join(root, "settings.json"))).toEqual({ model: "opus" });
	});

	it("reports entries that were already deleted", async () => {
		const { manifest } = await deploy("claude", "agents-only");
		await rm(join(root, "agents/planner.md"));

		const result = await removeDeployment(root, manifest);

		expect(result.removed).toEqual(["agents/reviewer.md"]);
		expect(result.skipped).toEqual(["agents/planner.md"]);
		expect(await readManifest(root)).toBeNull();
	});
});

describe("validateScope", () => {
	it("rejects hooks-only where the host has no hooks", () => {
		expect(validateScope(getTargetSchema("codex"), "hooks-only")).toBe(
			"Codex CLI does not support hooks",
		);
		expect(validateScope(getTargetSchema("claude"), "hooks-only")).toBeNull();
		expect(validateScope(getTargetSchema("codex"), "full")).toBeNull();
	});
});
