import { execFile } from "node:child_process";

export interface ExecGitOptions {
	timeout?: number;
	cwd?: string;
}

const DEFAULT_TIMEOUT = 30_000;

export class GitError extends Error {
	readonly stderr: string;

	constructor(message: string, stderr: string) {
		super(message);
		this.name = "GitError";
		this.stderr = stderr;
	}
}

export function execGit(
	args: string[],
	options?: ExecGitOptions,
): Promise<{ stdout: string; stderr: string }> {
	const { timeout = DEFAULT_TIMEOUT, cwd } = options ?? {};
	return new Promise((resolve, reject) => {
		execFile("git", args, { cwd, timeout }, (error, stdout, stderr) => {
			if (error) {
				reject(new GitError(stderr || error.message, stderr || ""));
				return;
			}
			resolve({ stdout, stderr });
		});
	});
}
