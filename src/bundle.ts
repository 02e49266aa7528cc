import { readFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { existsSync } from "node:fs";
import type { BundleConfig, ReadConfigOptions } from "./config.js";
import { readConfig } from "./config.js";
import { BundleError } from "./errors.js";
import {
	listFilesRecursive,
	pathExists,
	readDirEntries,
	validateLocalSourcePath,
} from "./fs-utils.js";
import type { HookHost } from "./targets/types.js";

export interface SkillFile {
	/** Path relative to the skill directory, `/`-separated. */
	path: string;
	content: Buffer;
}

export interface SkillUnit {
	name: string;
	sourceDir: string;
	files: SkillFile[];
}

export interface AgentUnit {
	name: string;
	sourcePath: string;
	raw: string;
}

export interface HookArtifact {
	host: HookHost;
	fileName: string;
	content: Buffer;
}

export interface SourceBundle {
	root: string;
	config: BundleConfig;
	skills: SkillUnit[];
	agents: AgentUnit[];
	hookArtifacts: Partial<Record<HookHost, HookArtifact>>;
}

export const SKILL_ENTRY_FILE = "SKILL.md";

export const HOOK_ARTIFACT_FILES: Record<HookHost, string> = {
	claude: "skillrig-hook.mjs",
	opencode: "skillrig-hooks.js",
};

/**
 * Locates the bundle shipped with this package by walking up from the
 * running module to the directory holding package.json. Works both from
 * src/ and from the built dist/cli.js.
 */
export function defaultBundleRoot(): string {
	let dir = dirname(fileURLToPath(import.meta.url));
	for (;;) {
		if (existsSync(join(dir, "package.json"))) {
			return join(dir, "bundle");
		}
		const parent = dirname(dir);
		if (parent === dir) {
			throw new BundleError("Could not locate the skillrig package root");
		}
		dir = parent;
	}
}

/**
 * Accepts either a bundle root (has skills/) or a checkout of this tool
 * (has bundle/skills/).
 */
export async function resolveBundleRoot(dir: string): Promise<string> {
	const absolute = resolve(dir);
	const check = await validateLocalSourcePath(absolute);
	if (!check.valid) {
		throw new BundleError(`Invalid source ${dir}: ${check.reason}`);
	}

	if (await pathExists(join(absolute, "skills"))) {
		return absolute;
	}
	if (await pathExists(join(absolute, "bundle", "skills"))) {
		return join(absolute, "bundle");
	}
	throw new BundleError(
		`Invalid source ${dir}: no skills/ directory found`,
	);
}

export async function loadBundle(
	root: string,
	options?: ReadConfigOptions,
): Promise<SourceBundle> {
	if (!(await pathExists(join(root, "skills")))) {
		throw new BundleError(`Cannot find skills/ directory in ${root}`);
	}
	if (!(await pathExists(join(root, "agents")))) {
		throw new BundleError(`Cannot find agents/ directory in ${root}`);
	}

	const config = await readConfig(root, options);
	const skills = await loadSkills(join(root, "skills"));
	const agents = await loadAgents(join(root, "agents"));
	const hookArtifacts = await loadHookArtifacts(join(root, "hooks"));

	return { root, config, skills, agents, hookArtifacts };
}

async function loadSkills(skillsDir: string): Promise<SkillUnit[]> {
	const units: SkillUnit[] = [];

	for (const entry of await readDirEntries(skillsDir)) {
		if (!entry.isDirectory || entry.name.startsWith(".")) continue;

		const sourceDir = join(skillsDir, entry.name);
		if (!(await pathExists(join(sourceDir, SKILL_ENTRY_FILE)))) continue;

		const files: SkillFile[] = [];
		for (const path of await listFilesRecursive(sourceDir)) {
			files.push({ path, content: await readFile(join(sourceDir, path)) });
		}
		units.push({ name: entry.name, sourceDir, files });
	}

	return units;
}

async function loadAgents(agentsDir: string): Promise<AgentUnit[]> {
	const units: AgentUnit[] = [];

	for (const entry of await readDirEntries(agentsDir)) {
		if (entry.isDirectory || !entry.name.endsWith(".md")) continue;

		const sourcePath = join(agentsDir, entry.name);
		units.push({
			name: entry.name.slice(0, -".md".length),
			sourcePath,
			raw: await readFile(sourcePath, "utf-8"),
		});
	}

	return units;
}

export async function loadHookArtifacts(
	hooksDir: string,
): Promise<Partial<Record<HookHost, HookArtifact>>> {
	const artifacts: Partial<Record<HookHost, HookArtifact>> = {};
	const hosts: HookHost[] = ["claude", "opencode"];

	for (const host of hosts) {
		const fileName = HOOK_ARTIFACT_FILES[host];
		const filePath = join(hooksDir, fileName);
		if (await pathExists(filePath)) {
			artifacts[host] = { host, fileName, content: await readFile(filePath) };
		}
	}

	return artifacts;
}

export function findSkillEntry(unit: SkillUnit): SkillFile | undefined {
	return unit.files.find((f) => f.path === SKILL_ENTRY_FILE);
}
