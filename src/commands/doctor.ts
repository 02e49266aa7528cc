import { resolve } from "node:path";
import * as p from "@clack/prompts";
import { Command } from "commander";
import { loadSourceBundle } from "../deploy-pipeline.js";
import { diagnoseRoot, summarizeChecks } from "../diagnose.js";
import { ExitSignal, withExitSignal } from "../exit-signal.js";
import { readManifestOrExit } from "../manifest.js";

export interface DoctorOptions {
	path: string;
}

export async function runDoctor(options: DoctorOptions): Promise<void> {
	p.intro("skillrig doctor");

	const root = resolve(options.path);
	const manifest = await readManifestOrExit(root);
	if (manifest === null) {
		p.outro(`Not installed: ${root}`);
		return;
	}

	const bundle = await loadSourceBundle();
	const results = await diagnoseRoot(root, manifest, bundle);

	for (const result of results) {
		if (!result.ok) {
			p.log.error(result.detail);
		}
	}

	const { pass, fail } = summarizeChecks(results);
	const summary = `Doctor summary: pass=${pass} fail=${fail}`;
	if (fail > 0) {
		p.log.error(summary);
		throw new ExitSignal(1);
	}
	p.outro(summary);
}

export const doctorCommand = new Command("doctor")
	.description("Check an installed root against its manifest")
	.requiredOption("--path <dir>", "Installed target root")
	.action(
		withExitSignal(async (options: DoctorOptions) => {
			await runDoctor(options);
		}),
	);
