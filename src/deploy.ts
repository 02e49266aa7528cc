import { join } from "node:path";
import { isDeepStrictEqual } from "node:util";
import type { SourceBundle } from "./bundle.js";
import { HOOK_ARTIFACT_FILES } from "./bundle.js";
import {
	BundleError,
	errorMessage,
	InvalidSettingsError,
	isNodeError,
	SchemaViolation,
} from "./errors.js";
import { listFilesRecursive, writeFileIfChanged } from "./fs-utils.js";
import type { InstallScope, Manifest } from "./manifest.js";
import {
	diffManifestFiles,
	manifestFiles,
	removeManifest,
	serializeManifest,
	writeManifest,
} from "./manifest.js";
import { nukeManifestFiles, removeEmptyParents } from "./nuke-files.js";
import type { JsonObject } from "./settings-merge.js";
import {
	mergeSettings,
	readSettings,
	removeGoverned,
	writeSettings,
} from "./settings-merge.js";
import { claudeHooksFragment } from "./targets/claude.js";
import { convertCodexDocument } from "./targets/codex-md.js";
import { convertAgent, convertSkill } from "./targets/convert.js";
import { getTargetSchema, isDirectoryTarget } from "./targets/registry.js";
import type { HostFile, TargetId, TargetSchema } from "./targets/types.js";
import { VERSION } from "./version.js";

export type AssetKind = "skills" | "agents" | "hooks";

const SCOPE_ASSETS: Record<InstallScope, AssetKind[]> = {
	full: ["skills", "agents", "hooks"],
	"skills-only": ["skills"],
	"agents-only": ["agents"],
	"hooks-only": ["hooks"],
};

export function scopeIncludes(scope: InstallScope, kind: AssetKind): boolean {
	return SCOPE_ASSETS[scope].includes(kind);
}

/**
 * @returns a message describing why the combination cannot be installed,
 * or null when it can
 */
export function validateScope(
	schema: TargetSchema,
	scope: InstallScope,
): string | null {
	if (scope === "hooks-only" && schema.hooks === null) {
		return `${schema.label} does not support hooks`;
	}
	return null;
}

export interface SettingsPlan {
	filePath: string;
	fragment: JsonObject;
	token: string;
}

export interface DeploymentPlan {
	manifest: Manifest;
	files: HostFile[];
	violations: SchemaViolation[];
	settings: SettingsPlan | null;
	hooksSkipped: boolean;
}

export interface PlanInput {
	bundle: SourceBundle;
	schema: TargetSchema;
	scope: InstallScope;
	/** Absolute target root. */
	root: string;
	previous: Manifest | null;
	/** Recorded in the manifest; defaults to the bundle root. */
	source?: string;
	now?: Date;
}

function collect<T, R>(
	units: T[],
	convert: (unit: T) => R,
	violations: SchemaViolation[],
): { unit: T; result: R }[] {
	const converted: { unit: T; result: R }[] = [];
	for (const unit of units) {
		try {
			converted.push({ unit, result: convert(unit) });
		} catch (err) {
			if (!(err instanceof SchemaViolation)) {
				throw err;
			}
			violations.push(err);
		}
	}
	return converted;
}

export function settingsPathFor(root: string, target: TargetId): string | null {
	const schema = getTargetSchema(target);
	if (schema.hooks === null || schema.hooks.settingsFile === null) {
		return null;
	}
	return join(root, schema.hooks.settingsFile);
}

/**
 * Computes everything an install or update would put under `root`, without
 * touching the disk. Units that violate the target schema are left out and
 * reported in `violations`.
 */
export function planDeployment(input: PlanInput): DeploymentPlan {
	const { bundle, schema, scope, root, previous } = input;
	const files: HostFile[] = [];
	const violations: SchemaViolation[] = [];
	let skills: string[] = [];
	let agents: string[] = [];

	const wantSkills = scopeIncludes(scope, "skills");
	const wantAgents = scopeIncludes(scope, "agents");

	if (isDirectoryTarget(schema)) {
		const convertedSkills = wantSkills
			? collect(bundle.skills, (u) => convertSkill(u, schema), violations)
			: [];
		const convertedAgents = wantAgents
			? collect(bundle.agents, (u) => convertAgent(u, schema), violations)
			: [];

		for (const { result } of convertedSkills) files.push(...result);
		for (const { result } of convertedAgents) files.push(result);
		skills = convertedSkills.map(({ unit }) => unit.name);
		agents = convertedAgents.map(({ unit }) => unit.name);
	} else {
		const includedSkills = wantSkills ? bundle.skills : [];
		const includedAgents = wantAgents ? bundle.agents : [];
		if (includedSkills.length + includedAgents.length > 0) {
			files.push(
				convertCodexDocument(
					bundle.config.title,
					includedSkills,
					includedAgents,
					schema,
				),
			);
		}
		skills = includedSkills.map((u) => u.name);
		agents = includedAgents.map((u) => u.name);
	}

	const pluginFiles: string[] = [];
	let settings: SettingsPlan | null = null;
	const wantHooks = scopeIncludes(scope, "hooks");

	if (wantHooks && schema.hooks !== null) {
		const { host, artifactDir } = schema.hooks;
		const artifact = bundle.hookArtifacts[host];
		if (artifact === undefined) {
			throw new BundleError(
				`Bundle ${bundle.root} has no hooks/${HOOK_ARTIFACT_FILES[host]} (build the hook bridge first)`,
			);
		}

		const ref = `${artifactDir}/${artifact.fileName}`;
		files.push({ path: ref, content: artifact.content });
		pluginFiles.push(ref);

		const settingsPath = settingsPathFor(root, schema.kind);
		if (schema.kind === "claude" && settingsPath !== null) {
			settings = {
				filePath: settingsPath,
				fragment: claudeHooksFragment(join(root, ref)),
				token: artifact.fileName,
			};
		}
	}

	const manifest: Manifest = {
		version: VERSION,
		target: schema.kind,
		scope,
		installed_at:
			previous !== null && previous.installed_at !== ""
				? previous.installed_at
				: (input.now ?? new Date()).toISOString(),
		source: input.source ?? bundle.root,
		skills,
		agents,
		hooks: pluginFiles.length > 0,
		plugin_files: pluginFiles,
	};

	return {
		manifest,
		files,
		violations,
		settings,
		hooksSkipped: wantHooks && schema.hooks === null,
	};
}

export interface ApplyResult {
	written: string[];
	removed: string[];
	pruned: string[];
	settingsChanged: boolean;
	manifestChanged: boolean;
}

interface SettingsChange {
	filePath: string;
	before: JsonObject;
	after: JsonObject;
}

function tokenFor(manifest: Manifest): string | null {
	const file = manifest.plugin_files[0];
	return file === undefined ? null : file.slice(file.lastIndexOf("/") + 1);
}

/**
 * Reads and transforms the governed settings file before anything is
 * written, so an unparseable document aborts the whole operation.
 */
async function prepareSettingsChange(
	root: string,
	plan: DeploymentPlan | null,
	previous: Manifest | null,
): Promise<SettingsChange | null> {
	if (plan !== null && plan.settings !== null) {
		const { filePath, fragment, token } = plan.settings;
		const before = await readSettings(filePath);
		const previousToken = previous === null ? null : tokenFor(previous);
		const base =
			previousToken !== null && previousToken !== token
				? removeGoverned(before, previousToken)
				: before;
		try {
			return { filePath, before, after: mergeSettings(base, fragment, token) };
		} catch (err) {
			throw new InvalidSettingsError(filePath, errorMessage(err));
		}
	}

	if (previous === null || !previous.hooks) {
		return null;
	}
	const filePath = settingsPathFor(root, previous.target);
	const token = tokenFor(previous);
	if (filePath === null || token === null) {
		return null;
	}
	const before = await readSettings(filePath);
	return { filePath, before, after: removeGoverned(before, token) };
}

async function commitSettingsChange(change: SettingsChange | null): Promise<boolean> {
	if (change === null || isDeepStrictEqual(change.before, change.after)) {
		return false;
	}
	await writeSettings(change.filePath, change.after);
	return true;
}

export interface SettingsPreview {
	filePath: string;
	/** False when the change only strips the governed entries. */
	registers: boolean;
}

/** The settings file `applyDeployment` would rewrite, without writing it. */
export async function previewSettingsChange(
	root: string,
	plan: DeploymentPlan,
	previous: Manifest | null,
): Promise<SettingsPreview | null> {
	const change = await prepareSettingsChange(root, plan, previous);
	if (change === null || isDeepStrictEqual(change.before, change.after)) {
		return null;
	}
	return { filePath: change.filePath, registers: plan.settings !== null };
}

async function pruneDirectoryRefs(
	root: string,
	plan: DeploymentPlan,
): Promise<string[]> {
	const planned = new Set(plan.files.map((f) => f.path));
	const pruned: string[] = [];

	for (const ref of manifestFiles(plan.manifest)) {
		if (!ref.endsWith("/")) continue;

		let existing: string[];
		try {
			existing = await listFilesRecursive(join(root, ref));
		} catch (err: unknown) {
			if (isNodeError(err) && err.code === "ENOENT") continue;
			throw err;
		}

		const stale = existing.map((rel) => ref + rel).filter((f) => !planned.has(f));
		const { removed } = await nukeManifestFiles(root, stale);
		pruned.push(...removed);
	}

	return pruned;
}

/**
 * Brings `root` in line with `plan`: removes references the previous
 * manifest had and the plan drops, writes files whose content differs,
 * merges the settings fragment and records the manifest last. Nothing is
 * written when the tree already matches.
 */
export async function applyDeployment(
	root: string,
	plan: DeploymentPlan,
	previous: Manifest | null,
): Promise<ApplyResult> {
	const settingsChange = await prepareSettingsChange(root, plan, previous);

	const diff = diffManifestFiles(previous, plan.manifest);
	const { removed } = await nukeManifestFiles(root, diff.toRemove);
	await removeEmptyParents(root, diff.toRemove);

	const pruned = await pruneDirectoryRefs(root, plan);

	const written: string[] = [];
	for (const file of plan.files) {
		if (await writeFileIfChanged(join(root, file.path), file.content)) {
			written.push(file.path);
		}
	}

	const settingsChanged = await commitSettingsChange(settingsChange);

	const manifestChanged =
		previous === null ||
		serializeManifest(previous) !== serializeManifest(plan.manifest);
	if (manifestChanged) {
		await writeManifest(root, plan.manifest);
	}

	return { written, removed, pruned, settingsChanged, manifestChanged };
}

export interface RemoveResult {
	removed: string[];
	skipped: string[];
	settingsChanged: boolean;
}

/**
 * Removes exactly what `manifest` references plus the governed settings
 * entries, then the manifest itself.
 */
export async function removeDeployment(
	root: string,
	manifest: Manifest,
): Promise<RemoveResult> {
	const settingsChange = await prepareSettingsChange(root, null, manifest);

	const files = manifestFiles(manifest);
	const { removed, skipped } = await nukeManifestFiles(root, files);
	await removeEmptyParents(root, files);

	const settingsChanged = await commitSettingsChange(settingsChange);
	await removeManifest(root);

	return { removed, skipped, settingsChanged };
}
