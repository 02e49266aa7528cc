import { resolve } from "node:path";
import * as p from "@clack/prompts";
import { Command } from "commander";
import { validateScope } from "../deploy.js";
import { loadSourceBundle, runDeployPipeline } from "../deploy-pipeline.js";
import { ExitSignal, withExitSignal } from "../exit-signal.js";
import type { InstallScope } from "../manifest.js";
import { readManifestOrExit } from "../manifest.js";
import { renderDeploySummary } from "../summary.js";
import { getTargetSchema } from "../targets/registry.js";
import type { TargetId } from "../targets/types.js";

export interface InstallOptions {
	claude?: boolean;
	opencode?: boolean;
	codex?: boolean;
	codexMd?: boolean;
	skillsOnly?: boolean;
	agentsOnly?: boolean;
	hooksOnly?: boolean;
	force?: boolean;
	dryRun?: boolean;
	path?: string;
	source?: string;
}

type Resolved<T> = { ok: true; value: T } | { ok: false; error: string };

export function resolveTarget(options: InstallOptions): Resolved<TargetId> {
	const flags: [TargetId, boolean | undefined][] = [
		["claude", options.claude],
		["opencode", options.opencode],
		["codex", options.codex],
		["codex-md", options.codexMd],
	];
	const chosen = flags.filter(([, set]) => set === true).map(([id]) => id);

	if (chosen.length > 1) {
		return {
			ok: false,
			error: `Choose one target, got ${chosen.map((id) => `--${id}`).join(" and ")}`,
		};
	}
	return { ok: true, value: chosen[0] ?? "claude" };
}

export function resolveScope(options: InstallOptions): Resolved<InstallScope> {
	const flags: [InstallScope, boolean | undefined][] = [
		["skills-only", options.skillsOnly],
		["agents-only", options.agentsOnly],
		["hooks-only", options.hooksOnly],
	];
	const chosen = flags.filter(([, set]) => set === true).map(([scope]) => scope);

	if (chosen.length > 1) {
		return {
			ok: false,
			error: `Choose one scope, got ${chosen.map((s) => `--${s}`).join(" and ")}`,
		};
	}
	return { ok: true, value: chosen[0] ?? "full" };
}

function valueOrExit<T>(resolved: Resolved<T>): T {
	if (!resolved.ok) {
		p.log.error(resolved.error);
		throw new ExitSignal(1);
	}
	return resolved.value;
}

export async function runInstall(options: InstallOptions): Promise<void> {
	p.intro("skillrig install");

	const target = valueOrExit(resolveTarget(options));
	const scope = valueOrExit(resolveScope(options));
	const schema = getTargetSchema(target);

	const scopeError = validateScope(schema, scope);
	if (scopeError !== null) {
		p.log.error(`Cannot use --${scope} with --${target}: ${scopeError}`);
		throw new ExitSignal(1);
	}

	const root = resolve(options.path ?? schema.defaultRoot);
	const bundle = await loadSourceBundle(options.source);
	const previous = await readManifestOrExit(root);

	const { manifest, result } = await runDeployPipeline({
		bundle,
		schema,
		scope,
		root,
		previous,
		force: options.force === true,
		dryRun: options.dryRun === true,
	});

	p.outro(
		renderDeploySummary({
			verb: previous === null ? "Installed" : "Updated",
			manifest,
			root,
			result,
		}),
	);
}

export const installCommand = new Command("install")
	.description("Install the bundle into a target root")
	.option("--claude", "Install for Claude Code (default)")
	.option("--opencode", "Install for OpenCode")
	.option("--codex", "Install for Codex CLI")
	.option("--codex-md", "Install as a single codex.md document")
	.option("--skills-only", "Install skills only")
	.option("--agents-only", "Install agents only")
	.option("--hooks-only", "Install the hook bridge only")
	.option("--force", "Replace files skillrig did not install")
	.option("--dry-run", "Show what would change without writing")
	.option("--path <dir>", "Target root (defaults to the target's directory)")
	.option("--source <dir>", "Bundle to install instead of the packaged one")
	.action(
		withExitSignal(async (options: InstallOptions) => {
			await runInstall(options);
		}),
	);
