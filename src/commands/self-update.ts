import { resolve } from "node:path";
import * as p from "@clack/prompts";
import { Command } from "commander";
import { loadSourceBundle } from "../deploy-pipeline.js";
import { ExitSignal, withExitSignal } from "../exit-signal.js";
import { cleanupTempDir, cloneSource, isGitUrl } from "../git-clone.js";
import { isInteractive } from "../interactive.js";
import { errorMessage } from "../errors.js";
import { readInstalledOrExit, updateRoot } from "./update.js";

export interface SelfUpdateOptions {
	source: string;
	path: string;
	ref?: string;
	yes?: boolean;
	force?: boolean;
	dryRun?: boolean;
}

async function confirmOrExit(message: string): Promise<void> {
	const confirmed = await p.confirm({ message });
	if (p.isCancel(confirmed) || confirmed !== true) {
		p.cancel("Cancelled");
		throw new ExitSignal(0);
	}
}

export async function runSelfUpdate(options: SelfUpdateOptions): Promise<void> {
	p.intro("skillrig self-update");

	const root = resolve(options.path);
	const manifest = await readInstalledOrExit(root);

	if (options.yes !== true && options.dryRun !== true && isInteractive()) {
		await confirmOrExit(`Update ${root} from ${options.source}?`);
	}

	let tempDir: string | undefined;
	try {
		let bundleSource = options.source;
		let recordedSource = resolve(options.source);

		if (isGitUrl(options.source)) {
			const spin = p.spinner();
			spin.start("Cloning repository...");
			try {
				const clone = await cloneSource(options.source, options.ref ?? null);
				tempDir = clone.tempDir;
				spin.stop(`Cloned ${clone.commit.slice(0, 7)}`);
			} catch (err) {
				spin.stop("Clone failed");
				p.log.error(errorMessage(err));
				throw new ExitSignal(1);
			}
			bundleSource = tempDir;
			recordedSource = options.source;
		} else if (options.ref !== undefined) {
			p.log.warn("--ref applies to git sources only; ignoring it");
		}

		const bundle = await loadSourceBundle(bundleSource);
		await updateRoot({
			root,
			manifest,
			bundle,
			force: options.force === true,
			dryRun: options.dryRun === true,
			source: recordedSource,
		});
	} finally {
		if (tempDir !== undefined) {
			await cleanupTempDir(tempDir);
		}
	}
}

export const selfUpdateCommand = new Command("self-update")
	.description("Redeploy an installed root from another bundle source")
	.requiredOption("--source <dir|url>", "Bundle directory, checkout or git URL")
	.requiredOption("--path <dir>", "Installed target root")
	.option("--ref <ref>", "Branch or tag to clone (git sources)")
	.option("--yes", "Do not ask for confirmation")
	.option("--force", "Replace files skillrig did not install")
	.option("--dry-run", "Show what would change without writing")
	.action(
		withExitSignal(async (options: SelfUpdateOptions) => {
			await runSelfUpdate(options);
		}),
	);
