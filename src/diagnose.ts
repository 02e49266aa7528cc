import { join } from "node:path";
import type { SourceBundle } from "./bundle.js";
import { HOOK_ARTIFACT_FILES, SKILL_ENTRY_FILE } from "./bundle.js";
import { settingsPathFor } from "./deploy.js";
import { errorMessage } from "./errors.js";
import { pathExists } from "./fs-utils.js";
import type { Manifest } from "./manifest.js";
import { manifestFiles } from "./manifest.js";
import { hasGovernedFragment, readSettings } from "./settings-merge.js";
import { claudeHooksFragment } from "./targets/claude.js";
import { getTargetSchema, isDirectoryTarget } from "./targets/registry.js";
import { agentFileRef, skillDirRef } from "./targets/skill-copy.js";
import type { TargetSchema } from "./targets/types.js";

export interface CheckResult {
	name: string;
	ok: boolean;
	detail: string;
}

export interface CheckSummary {
	pass: number;
	fail: number;
}

/**
 * Every root-relative reference the bundle could produce for `schema`,
 * whatever the scope.
 */
export function candidateReferences(
	bundle: SourceBundle,
	schema: TargetSchema,
): string[] {
	if (!isDirectoryTarget(schema)) {
		return [schema.documentName];
	}

	const refs = [
		...bundle.skills.map((s) => skillDirRef(schema.layout, s.name)),
		...bundle.agents.map((a) => agentFileRef(schema.layout, a.name)),
	];
	if (schema.hooks !== null) {
		refs.push(`${schema.hooks.artifactDir}/${HOOK_ARTIFACT_FILES[schema.hooks.host]}`);
	}
	return refs;
}

/** Files a skill directory reference must contain, relative to the root. */
function expectedSkillFiles(ref: string, bundle: SourceBundle, schema: TargetSchema): string[] {
	const unit = isDirectoryTarget(schema)
		? bundle.skills.find((s) => skillDirRef(schema.layout, s.name) === ref)
		: undefined;
	const paths = new Set([SKILL_ENTRY_FILE, ...(unit?.files.map((f) => f.path) ?? [])]);
	return [...paths].map((path) => ref + path);
}

async function checkReferences(
	root: string,
	refs: string[],
	bundle: SourceBundle,
	schema: TargetSchema,
): Promise<CheckResult[]> {
	const results: CheckResult[] = [];
	for (const ref of refs) {
		if (!(await pathExists(join(root, ref)))) {
			results.push({ name: "reference", ok: false, detail: `missing: ${ref}` });
			continue;
		}
		if (!ref.endsWith("/")) {
			results.push({ name: "reference", ok: true, detail: `present: ${ref}` });
			continue;
		}

		const missing: string[] = [];
		for (const file of expectedSkillFiles(ref, bundle, schema)) {
			if (!(await pathExists(join(root, file)))) missing.push(file);
		}
		if (missing.length === 0) {
			results.push({ name: "reference", ok: true, detail: `present: ${ref}` });
		}
		for (const file of missing) {
			results.push({ name: "reference", ok: false, detail: `missing: ${file}` });
		}
	}
	return results;
}

async function checkUntracked(
	root: string,
	tracked: Set<string>,
	candidates: string[],
): Promise<CheckResult[]> {
	const results: CheckResult[] = [];
	for (const ref of candidates) {
		if (tracked.has(ref)) continue;
		if (await pathExists(join(root, ref))) {
			results.push({ name: "untracked", ok: false, detail: `untracked: ${ref}` });
		}
	}
	if (results.length === 0) {
		results.push({ name: "untracked", ok: true, detail: "no untracked bundle files" });
	}
	return results;
}

async function checkSettings(root: string, manifest: Manifest): Promise<CheckResult[]> {
	const settingsPath = settingsPathFor(root, manifest.target);
	const artifact = manifest.plugin_files[0];
	if (!manifest.hooks || settingsPath === null || artifact === undefined) {
		return [];
	}

	try {
		const doc = await readSettings(settingsPath);
		const ok = hasGovernedFragment(doc, claudeHooksFragment(join(root, artifact)));
		return [
			{
				name: "settings",
				ok,
				detail: ok
					? `hooks registered in ${settingsPath}`
					: `hooks not registered in ${settingsPath}`,
			},
		];
	} catch (err) {
		return [{ name: "settings", ok: false, detail: errorMessage(err) }];
	}
}

/**
 * Read-only health check of one installed root. Results are collected per
 * call and returned; nothing is written.
 */
export async function diagnoseRoot(
	root: string,
	manifest: Manifest,
	bundle: SourceBundle,
): Promise<CheckResult[]> {
	const refs = manifestFiles(manifest);
	const schema = getTargetSchema(manifest.target);

	return [
		...(await checkReferences(root, refs, bundle, schema)),
		...(await checkUntracked(root, new Set(refs), candidateReferences(bundle, schema))),
		...(await checkSettings(root, manifest)),
	];
}

export function summarizeChecks(results: CheckResult[]): CheckSummary {
	const pass = results.filter((r) => r.ok).length;
	return { pass, fail: results.length - pass };
}
