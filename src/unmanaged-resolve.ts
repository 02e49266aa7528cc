import { confirm, isCancel } from "@clack/prompts";
import { isInteractive } from "./interactive.js";

export type OverwriteDecision = "overwrite" | "declined" | "needs-force";

/**
 * Decides whether files the manager does not track may be replaced.
 * `force` skips the question; without a terminal there is nobody to ask.
 */
export async function resolveUnmanagedConflicts(
	conflicts: string[],
	force: boolean,
): Promise<OverwriteDecision> {
	if (conflicts.length === 0 || force) {
		return "overwrite";
	}

	if (!isInteractive()) {
		return "needs-force";
	}

	const fileList = conflicts.map((f) => `  - ${f}`).join("\n");
	const confirmed = await confirm({
		message: `These files exist but were not installed by skillrig:\n${fileList}\nReplace them?`,
		initialValue: false,
	});

	if (isCancel(confirmed) || confirmed !== true) {
		return "declined";
	}
	return "overwrite";
}
