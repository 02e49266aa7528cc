import { rm } from "node:fs/promises";
import { dirname, join } from "node:path";
import { isNodeError } from "./errors.js";
import { removeDirIfEmpty } from "./fs-utils.js";

export interface NukeResult {
	removed: string[];
	skipped: string[];
}

/**
 * Removes root-relative references recorded in a manifest. Entries ending in
 * "/" are directories and go recursively; missing entries are skipped.
 */
export async function nukeManifestFiles(
	root: string,
	files: string[],
): Promise<NukeResult> {
	const removed: string[] = [];
	const skipped: string[] = [];

	for (const entry of files) {
		const fullPath = join(root, entry);
		const isDir = entry.endsWith("/");

		try {
			await rm(fullPath, { recursive: isDir, force: false });
			removed.push(entry);
		} catch (err: unknown) {
			if (isNodeError(err) && err.code === "ENOENT") {
				skipped.push(entry);
				continue;
			}
			throw err;
		}
	}

	return { removed, skipped };
}

/**
 * Removes the containing directories of `files` (e.g. `skills/`, `agents/`)
 * when the removal left them empty. Never climbs above `root`.
 */
export async function removeEmptyParents(
	root: string,
	files: string[],
): Promise<void> {
	const parents = new Set<string>();
	for (const entry of files) {
		const parent = dirname(entry.replace(/\/$/, ""));
		if (parent !== "." && parent !== "") {
			parents.add(parent);
		}
	}

	const deepestFirst = [...parents].sort((a, b) => b.length - a.length);
	for (const parent of deepestFirst) {
		await removeDirIfEmpty(join(root, parent));
	}
}
