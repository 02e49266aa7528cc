import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { pathExists, readDirEntries } from "../fs-utils.js";
import { execGit } from "../git-utils.js";

export const CONTEXT_HEAD_LIMIT = 500;

export type GitRunner = (args: string[], cwd: string) => Promise<string>;

export interface SessionContextOptions {
	/** Project directory the host session runs in. */
	directory: string;
	/** The host's own directory under `directory`, e.g. `.opencode`. */
	hostDir: string;
	now?: Date;
	git?: GitRunner;
}

const runGit: GitRunner = async (args, cwd) =>
	(await execGit(args, { cwd, timeout: 5_000 })).stdout;

async function readHead(filePath: string): Promise<string> {
	try {
		const text = await readFile(filePath, "utf-8");
		return text.slice(0, CONTEXT_HEAD_LIMIT).trim();
	} catch {
		return "";
	}
}

async function firstExisting(candidates: string[]): Promise<string | null> {
	for (const candidate of candidates) {
		if (await pathExists(candidate)) return candidate;
	}
	return null;
}

async function gitSummary(directory: string, git: GitRunner): Promise<string | null> {
	try {
		const branch = (await git(["branch", "--show-current"], directory)).trim() || "detached";
		const status = await git(["status", "--porcelain"], directory);
		const uncommitted = status.split("\n").filter(Boolean).length;
		return `Git: branch=${branch}, uncommitted_files=${uncommitted}`;
	} catch {
		return null;
	}
}

async function noteFile(
	options: SessionContextOptions,
	fileName: string,
): Promise<string | null> {
	const found = await firstExisting([
		join(options.directory, ".claude", fileName),
		join(options.directory, options.hostDir, fileName),
	]);
	if (found === null) return null;

	const head = await readHead(found);
	return head === "" ? null : `${fileName}: ${head}`;
}

export async function buildSessionStartContext(
	options: SessionContextOptions,
): Promise<string> {
	const now = options.now ?? new Date();
	const parts = [`Date: ${now.toISOString().slice(0, 10)}`];

	const git = await gitSummary(options.directory, options.git ?? runGit);
	if (git !== null) parts.push(git);

	for (const fileName of ["CONTEXT.md", "TODO.md"]) {
		const note = await noteFile(options, fileName);
		if (note !== null) parts.push(note);
	}

	return parts.join("\n").trim();
}

async function listNames(
	options: SessionContextOptions,
	subdir: string,
	kind: "dirs" | "markdown",
): Promise<string[]> {
	const dir = await firstExisting([
		join(options.directory, options.hostDir, subdir),
		join(options.directory, ".claude", subdir),
	]);
	if (dir === null) return [];

	const entries = await readDirEntries(dir);
	return kind === "dirs"
		? entries.filter((e) => e.isDirectory).map((e) => e.name)
		: entries
				.filter((e) => !e.isDirectory && e.name.endsWith(".md"))
				.map((e) => e.name.slice(0, -".md".length));
}

function rosterLine(label: string, names: string[]): string {
	return names.length > 0
		? `${label} (${names.length}): ${names.join(", ")}`
		: `${label}: none found`;
}

export async function buildCompactContext(
	options: SessionContextOptions,
): Promise<string> {
	const skills = await listNames(options, "skills", "dirs");
	const agents = await listNames(options, "agents", "markdown");

	return [
		"CRITICAL CONTEXT TO PRESERVE AFTER COMPACTION:",
		rosterLine("Skills", skills),
		rosterLine("Agents", agents),
		"Always use relevant skills for the task at hand.",
	].join("\n");
}
