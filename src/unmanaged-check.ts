import { stat } from "node:fs/promises";
import { join } from "node:path";
import type { Manifest } from "./manifest.js";
import { manifestFiles } from "./manifest.js";

/**
 * Checks incoming references against disk for unmanaged conflicts.
 * A reference is an "unmanaged conflict" if it exists under the root but
 * the previous manifest (if any) does not account for it.
 *
 * @param incomingFiles - Root-relative references about to be installed
 * @param previous - Manifest currently installed under the root, or null
 * @returns Conflicting references, in input order
 */
export async function checkUnmanagedConflicts(
	incomingFiles: string[],
	previous: Manifest | null,
	root: string,
): Promise<string[]> {
	if (incomingFiles.length === 0) {
		return [];
	}

	const trackedFiles = new Set(previous === null ? [] : manifestFiles(previous));
	const conflicts: string[] = [];

	for (const file of incomingFiles) {
		if (trackedFiles.has(file)) {
			continue;
		}

		try {
			await stat(join(root, file));
			conflicts.push(file);
		} catch {
			// Not on disk, nothing to overwrite
		}
	}

	return conflicts;
}
