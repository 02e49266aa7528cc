import { errorMessage } from "../errors.js";
import { appendFailureLog } from "./failure-log.js";
import { crashOutcome, isClaudeHookMode, runClaudeHook } from "./claude-hook.js";

async function readStdin(): Promise<string> {
	const chunks: Buffer[] = [];
	for await (const chunk of process.stdin) {
		chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
	}
	return Buffer.concat(chunks).toString("utf-8");
}

async function main(): Promise<void> {
	const mode = process.argv[2];
	if (!isClaudeHookMode(mode)) {
		process.stderr.write(`skillrig-hook: unknown mode ${String(mode)}\n`);
		return;
	}

	const outcome = await runClaudeHook(mode, await readStdin(), {
		directory: process.cwd(),
	});
	process.stdout.write(outcome.stdout);
	process.stderr.write(outcome.stderr);
	process.exitCode = outcome.exitCode;
}

// Crash details go to the log file; a crashed guard still blocks.
void main().catch(async (err: unknown) => {
	await appendFailureLog(process.cwd(), ".claude", {
		type: "skillrig.hook_failed",
		properties: { message: errorMessage(err) },
	});
	const outcome = crashOutcome(process.argv[2]);
	process.stderr.write(outcome.stderr);
	process.exitCode = outcome.exitCode;
});
