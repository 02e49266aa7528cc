import type { ClaudeHookMode } from "../targets/claude.js";
import { evaluateCommand, extractCommand, isGuardedTool, isToolArgs } from "./command-guard.js";
import type { GitRunner } from "./session-context.js";
import { buildCompactContext, buildSessionStartContext } from "./session-context.js";

const HOST_DIR = ".claude";

export const CLAUDE_HOOK_MODES: readonly ClaudeHookMode[] = [
	"pre-tool-use",
	"session-start",
	"session-compact",
];

export interface HookOutcome {
	exitCode: number;
	stdout: string;
	stderr: string;
}

export interface ClaudeHookOptions {
	/** Used when the hook payload carries no `cwd`. */
	directory: string;
	now?: Date;
	git?: GitRunner;
}

export function isClaudeHookMode(value: unknown): value is ClaudeHookMode {
	return CLAUDE_HOOK_MODES.some((mode) => mode === value);
}

function parsePayload(stdinText: string): Record<string, unknown> {
	try {
		const parsed: unknown = JSON.parse(stdinText);
		return isToolArgs(parsed) ? parsed : {};
	} catch {
		return {};
	}
}

const PASS: HookOutcome = { exitCode: 0, stdout: "", stderr: "" };

export const GUARD_FAILED_REASON = "BLOCKED: command guard failed; refusing to run the command.";

/** What the host sees when a hook invocation crashes: only the guard fails closed. */
export function crashOutcome(mode: unknown): HookOutcome {
	return mode === "pre-tool-use"
		? { exitCode: 2, stdout: "", stderr: `${GUARD_FAILED_REASON}\n` }
		: PASS;
}

/**
 * Handles one Claude Code hook invocation. A blocked command exits 2 with
 * the reason on stderr, which Claude Code feeds back to the model; context
 * modes print to stdout.
 */
export async function runClaudeHook(
	mode: ClaudeHookMode,
	stdinText: string,
	options: ClaudeHookOptions,
): Promise<HookOutcome> {
	const payload = parsePayload(stdinText);
	const directory = typeof payload.cwd === "string" && payload.cwd !== "" ? payload.cwd : options.directory;
	const contextOptions = { directory, hostDir: HOST_DIR, now: options.now, git: options.git };

	switch (mode) {
		case "pre-tool-use": {
			if (!isGuardedTool(payload.tool_name)) return PASS;
			const verdict = evaluateCommand(extractCommand(payload.tool_input));
			return verdict === null
				? PASS
				: { exitCode: 2, stdout: "", stderr: `${verdict.reason}\n` };
		}
		case "session-start":
			return { ...PASS, stdout: `${await buildSessionStartContext(contextOptions)}\n` };
		case "session-compact":
			return { ...PASS, stdout: `${await buildCompactContext(contextOptions)}\n` };
		default: {
			const unreachable: never = mode;
			throw new Error(`Unhandled hook mode: ${String(unreachable)}`);
		}
	}
}
