import { randomUUID } from "node:crypto";
import {
	access,
	mkdir,
	readFile,
	readdir,
	rename,
	rm,
	rmdir,
	stat,
	writeFile,
} from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { isNodeError } from "./errors.js";

export interface DirEntry {
	name: string;
	isDirectory: boolean;
}

export type LocalSourcePathResult =
	| { valid: true }
	| { valid: false; reason: string };

export async function validateLocalSourcePath(
	path: string,
): Promise<LocalSourcePathResult> {
	try {
		const stats = await stat(path);
		if (!stats.isDirectory()) {
			return { valid: false, reason: "path is not a directory" };
		}
		return { valid: true };
	} catch {
		return { valid: false, reason: "path does not exist" };
	}
}

export async function readDirEntries(dirPath: string): Promise<DirEntry[]> {
	try {
		const entries = await readdir(dirPath, { withFileTypes: true });
		return entries
			.map((e) => ({ name: e.name, isDirectory: e.isDirectory() }))
			.sort((a, b) => compareNames(a.name, b.name));
	} catch {
		return [];
	}
}

export async function pathExists(path: string): Promise<boolean> {
	try {
		await access(path);
		return true;
	} catch {
		return false;
	}
}

/**
 * Lists every file below `dir` as a `/`-separated path relative to `dir`,
 * sorted so that callers see the same order on every platform.
 */
export async function listFilesRecursive(dir: string): Promise<string[]> {
	const files: string[] = [];

	async function walk(current: string, prefix: string): Promise<void> {
		const entries = await readdir(current, { withFileTypes: true });
		for (const entry of entries) {
			const rel = prefix === "" ? entry.name : `${prefix}/${entry.name}`;
			if (entry.isDirectory()) {
				await walk(join(current, entry.name), rel);
			} else if (entry.isFile()) {
				files.push(rel);
			}
		}
	}

	await walk(dir, "");
	return files.sort(compareNames);
}

export function compareNames(a: string, b: string): number {
	if (a < b) return -1;
	if (a > b) return 1;
	return 0;
}

export async function writeFileAtomic(
	filePath: string,
	content: string | Buffer,
): Promise<void> {
	const dir = dirname(filePath);
	await mkdir(dir, { recursive: true });

	const tempPath = join(dir, `.${basename(filePath)}-${randomUUID()}.tmp`);
	try {
		await writeFile(tempPath, content);
		await rename(tempPath, filePath);
	} catch (err) {
		await rm(tempPath, { force: true });
		throw err;
	}
}

/**
 * Writes `content` only when the file is missing or differs, so that an
 * unchanged deployment leaves the tree untouched.
 *
 * @returns true when the file was written
 */
export async function writeFileIfChanged(
	filePath: string,
	content: string | Buffer,
): Promise<boolean> {
	const next = typeof content === "string" ? Buffer.from(content) : content;

	try {
		const current = await readFile(filePath);
		if (current.equals(next)) {
			return false;
		}
	} catch (err: unknown) {
		if (!isNodeError(err) || err.code !== "ENOENT") {
			throw err;
		}
	}

	await writeFileAtomic(filePath, next);
	return true;
}

export async function removeDirIfEmpty(dirPath: string): Promise<boolean> {
	try {
		await rmdir(dirPath);
		return true;
	} catch (err: unknown) {
		if (
			isNodeError(err) &&
			(err.code === "ENOENT" ||
				err.code === "ENOTEMPTY" ||
				err.code === "EEXIST" ||
				err.code === "ENOTDIR")
		) {
			return false;
		}
		throw err;
	}
}
