import { resolve } from "node:path";
import * as p from "@clack/prompts";
import { Command } from "commander";
import { withExitSignal } from "../exit-signal.js";
import { readManifestOrExit } from "../manifest.js";
import { renderStatus } from "../summary.js";

export interface StatusOptions {
	path: string;
}

export async function runStatus(options: StatusOptions): Promise<void> {
	const root = resolve(options.path);
	const manifest = await readManifestOrExit(root);

	if (manifest === null) {
		p.log.info(`Not installed: ${root}`);
		return;
	}
	p.log.message(renderStatus(root, manifest));
}

export const statusCommand = new Command("status")
	.description("Show what is installed under a root")
	.requiredOption("--path <dir>", "Target root")
	.action(
		withExitSignal(async (options: StatusOptions) => {
			await runStatus(options);
		}),
	);
