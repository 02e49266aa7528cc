import { resolve } from "node:path";
import * as p from "@clack/prompts";
import { Command } from "commander";
import type { SourceBundle } from "../bundle.js";
import { loadSourceBundle, runDeployPipeline } from "../deploy-pipeline.js";
import { ExitSignal, withExitSignal } from "../exit-signal.js";
import type { Manifest } from "../manifest.js";
import { readManifestOrExit } from "../manifest.js";
import { isNoop, renderDeploySummary } from "../summary.js";
import { getTargetSchema } from "../targets/registry.js";

export interface UpdateOptions {
	path: string;
	force?: boolean;
	dryRun?: boolean;
}

export async function readInstalledOrExit(root: string): Promise<Manifest> {
	const manifest = await readManifestOrExit(root);
	if (manifest === null) {
		p.log.error(`No skillrig installation found at ${root}`);
		throw new ExitSignal(1);
	}
	return manifest;
}

/**
 * Redeploys `bundle` into an installed root with the recorded target and
 * scope.
 */
export async function updateRoot(opts: {
	root: string;
	manifest: Manifest;
	bundle: SourceBundle;
	force: boolean;
	dryRun?: boolean;
	source?: string;
}): Promise<void> {
	const { root, manifest: previous } = opts;

	const { manifest, result } = await runDeployPipeline({
		bundle: opts.bundle,
		schema: getTargetSchema(previous.target),
		scope: previous.scope,
		root,
		previous,
		source: opts.source,
		force: opts.force,
		dryRun: opts.dryRun,
	});

	if (isNoop(result)) {
		p.outro(`Already up to date: ${root}`);
		return;
	}
	p.outro(renderDeploySummary({ verb: "Updated", manifest, root, result }));
}

export async function runUpdate(options: UpdateOptions): Promise<void> {
	p.intro("skillrig update");

	const root = resolve(options.path);
	const manifest = await readInstalledOrExit(root);
	const bundle = await loadSourceBundle();

	await updateRoot({
		root,
		manifest,
		bundle,
		force: options.force === true,
		dryRun: options.dryRun === true,
	});
}

export const updateCommand = new Command("update")
	.description("Redeploy the packaged bundle into an installed root")
	.requiredOption("--path <dir>", "Installed target root")
	.option("--force", "Replace files skillrig did not install")
	.option("--dry-run", "Show what would change without writing")
	.action(
		withExitSignal(async (options: UpdateOptions) => {
			await runUpdate(options);
		}),
	);
