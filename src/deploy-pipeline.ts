import { join } from "node:path";
import * as p from "@clack/prompts";
import {
	defaultBundleRoot,
	loadBundle,
	loadHookArtifacts,
	resolveBundleRoot,
} from "./bundle.js";
import type { SourceBundle } from "./bundle.js";
import { ConfigError } from "./config.js";
import type { ApplyResult, DeploymentPlan, PlanInput, SettingsPreview } from "./deploy.js";
import { applyDeployment, planDeployment, previewSettingsChange } from "./deploy.js";
import { BundleError, InvalidSettingsError } from "./errors.js";
import { ExitSignal } from "./exit-signal.js";
import type { Manifest } from "./manifest.js";
import { diffManifestFiles } from "./manifest.js";
import { checkUnmanagedConflicts } from "./unmanaged-check.js";
import { resolveUnmanagedConflicts } from "./unmanaged-resolve.js";

/**
 * Loads the bundle at `source` (a bundle root or a checkout containing
 * `bundle/`), or the one shipped with this package. Load failures are
 * reported and end the command.
 */
export async function loadSourceBundle(source?: string): Promise<SourceBundle> {
	try {
		if (source === undefined) {
			return await loadBundle(defaultBundleRoot(), {
				onWarn: (message) => p.log.warn(message),
			});
		}

		const bundle = await loadBundle(await resolveBundleRoot(source), {
			onWarn: (message) => p.log.warn(message),
		});
		// A checkout carries no built bridge; fall back to this package's.
		const packaged = await loadHookArtifacts(join(defaultBundleRoot(), "hooks"));
		return {
			...bundle,
			hookArtifacts: { ...packaged, ...bundle.hookArtifacts },
		};
	} catch (err) {
		if (err instanceof BundleError || err instanceof ConfigError) {
			p.log.error(err.message);
			throw new ExitSignal(1);
		}
		throw err;
	}
}

export interface PipelineInput extends PlanInput {
	force: boolean;
	/** Report what would change and stop before writing. */
	dryRun?: boolean;
}

export interface PipelineResult {
	manifest: Manifest;
	result: ApplyResult;
}

export interface DryRunReport {
	toAdd: string[];
	toRemove: string[];
	conflicts: string[];
	settings: SettingsPreview | null;
	force: boolean;
}

function listing(heading: string, marker: string, entries: string[]): string {
	return [heading, ...entries.map((entry) => `  ${marker} ${entry}`)].join("\n");
}

export function renderDryRun(report: DryRunReport): string[] {
	const lines = [
		report.toAdd.length > 0
			? listing("Would add:", "+", report.toAdd)
			: "Would add: nothing",
		report.toRemove.length > 0
			? listing("Would remove:", "-", report.toRemove)
			: "Would remove: nothing",
	];
	if (report.conflicts.length > 0) {
		const heading = report.force
			? "Would replace files skillrig did not install:"
			: "Would need --force to replace files skillrig did not install:";
		lines.push(listing(heading, "!", report.conflicts));
	}
	if (report.settings === null) {
		lines.push("Settings: no change");
	} else if (report.settings.registers) {
		lines.push(`Settings: would register hooks in ${report.settings.filePath}`);
	} else {
		lines.push(`Settings: would remove hooks from ${report.settings.filePath}`);
	}
	return lines;
}

function settingsErrorExit(err: unknown): never {
	if (err instanceof InvalidSettingsError) {
		p.log.error(`${err.message}. Fix or remove the file and try again.`);
		throw new ExitSignal(1);
	}
	throw err;
}

function planOrExit(input: PlanInput): DeploymentPlan {
	try {
		return planDeployment(input);
	} catch (err) {
		if (err instanceof BundleError) {
			p.log.error(err.message);
			throw new ExitSignal(1);
		}
		throw err;
	}
}

/**
 * Shared by install, update and self-update: plan, resolve conflicts with
 * files the manager does not track, then apply. A dry run reports the plan
 * and ends with exit 0 instead.
 */
export async function runDeployPipeline(
	input: PipelineInput,
): Promise<PipelineResult> {
	const { bundle, schema, root, previous } = input;

	if (!bundle.config.targets.includes(schema.kind)) {
		p.log.error(`This bundle does not support the ${schema.kind} target`);
		throw new ExitSignal(1);
	}

	const plan = planOrExit(input);

	for (const violation of plan.violations) {
		p.log.warn(`Skipped ${violation.unit}: ${violation.constraint}`);
	}
	if (plan.hooksSkipped) {
		p.log.warn(`Hooks skipped: ${schema.label} does not support hooks`);
	}

	const { toAdd, toRemove } = diffManifestFiles(previous, plan.manifest);
	const conflicts = await checkUnmanagedConflicts(toAdd, previous, root);

	if (input.dryRun === true) {
		const settings = await previewSettingsChange(root, plan, previous).catch(settingsErrorExit);
		const report = { toAdd, toRemove, conflicts, settings, force: input.force };
		for (const line of renderDryRun(report)) {
			p.log.message(line);
		}
		p.outro(`Dry run: no changes made to ${root}`);
		throw new ExitSignal(0);
	}

	const decision = await resolveUnmanagedConflicts(conflicts, input.force);

	if (decision === "needs-force") {
		const fileList = conflicts.map((f) => `  - ${f}`).join("\n");
		p.log.error(
			`These files exist but were not installed by skillrig:\n${fileList}\nRe-run with --force to replace them.`,
		);
		throw new ExitSignal(1);
	}
	if (decision === "declined") {
		p.cancel("Cancelled");
		throw new ExitSignal(0);
	}

	try {
		const result = await applyDeployment(root, plan, previous);
		return { manifest: plan.manifest, result };
	} catch (err) {
		return settingsErrorExit(err);
	}
}
