/**
 * Shell command guard shared by every host adapter. Pure and synchronous:
 * it only inspects and rewrites tool arguments.
 */

export type ToolArgs = Record<string, unknown>;

/** `matches` sees the command as written; `reason` gets the normalized form. */
export interface HookRule {
	name: string;
	matches: (command: string) => boolean;
	reason: (command: string) => string;
}

export interface GuardVerdict {
	rule: string;
	reason: string;
}

const COMMAND_FIELDS = ["command", "cmd", "script"] as const;
const WRAPPER_FIELDS = ["input", "payload"] as const;

type CommandField = (typeof COMMAND_FIELDS)[number];

interface CommandLocation {
	holder: ToolArgs;
	field: CommandField;
	command: string;
}

const SEGMENT_SEPARATOR = /\|\||&&|[;|&\n]/;

// Operands compared after trailing slashes and a trailing `/*` are dropped.
const ROOT_TARGETS = new Set(["/", "~", "$HOME", "${HOME}", ".", "*"]);

const READ_COMMANDS = new Set(["cat", "less", "more", "head", "tail", "source", "."]);
const ENV_FILE = /(^|\/)\.env(\.[\w.-]+)?$/i;
const ENV_ALLOWED = new Set([
	".env.example",
	".env.sample",
	".env.template",
	".env.test",
	".env.development.local",
	".env.local.example",
]);

export function isToolArgs(value: unknown): value is ToolArgs {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function commandField(holder: ToolArgs): CommandLocation | null {
	for (const field of COMMAND_FIELDS) {
		const value = holder[field];
		if (typeof value === "string") {
			return { holder, field, command: value };
		}
	}
	return null;
}

// Top-level fields first, then one level of wrapper.
function locateCommand(args: ToolArgs): CommandLocation | null {
	const direct = commandField(args);
	if (direct !== null) return direct;

	for (const wrapper of WRAPPER_FIELDS) {
		const inner = args[wrapper];
		if (isToolArgs(inner)) {
			return commandField(inner);
		}
	}
	return null;
}

export function extractCommand(args: unknown): string {
	if (!isToolArgs(args)) return "";
	return locateCommand(args)?.command ?? "";
}

export function normalizeCommand(command: string): string {
	return command.replace(/\s+/g, " ").trim();
}

/** Splits a command on `;`, `&&`, `||`, `|`, `&` and newlines. */
export function splitSegments(command: string): string[] {
	return command
		.split(SEGMENT_SEPARATOR)
		.map(normalizeCommand)
		.filter((segment) => segment !== "");
}

function unquote(token: string): string {
	return token.replace(/^(\$\(|[("'`])+/, "").replace(/[)"'`]+$/, "");
}

function tokens(segment: string): string[] {
	return segment.split(" ").map(unquote).filter((token) => token !== "");
}

function isRootTarget(operand: string): boolean {
	let target = operand.endsWith("/*") ? operand.slice(0, -2) : operand;
	target = target.replace(/\/+$/, "");
	return ROOT_TARGETS.has(target === "" ? "/" : target);
}

function isDangerousRmSegment(segment: string): boolean {
	const words = tokens(segment);
	const start = words.findIndex((word) => word === "rm" || word.endsWith("/rm"));
	if (start === -1) return false;

	let recursive = false;
	let force = false;
	let flagsDone = false;
	const operands: string[] = [];

	for (const word of words.slice(start + 1)) {
		if (flagsDone || !word.startsWith("-") || word === "-") {
			operands.push(word);
		} else if (word === "--") {
			flagsDone = true;
		} else if (word === "--no-preserve-root") {
			return true;
		} else if (word.startsWith("--")) {
			recursive = recursive || word === "--recursive";
			force = force || word === "--force";
		} else {
			recursive = recursive || /[rR]/.test(word);
			force = force || word.includes("f");
		}
	}

	return recursive && force && operands.some(isRootTarget);
}

function isSecretPath(operand: string): boolean {
	if (!ENV_FILE.test(operand)) return false;
	const name = operand.slice(operand.lastIndexOf("/") + 1).toLowerCase();
	return !ENV_ALLOWED.has(name);
}

function isDotEnvReadSegment(segment: string): boolean {
	const words = tokens(segment);
	const start = words.findIndex((word) => READ_COMMANDS.has(word.toLowerCase()));
	if (start === -1) return false;

	return words
		.slice(start + 1)
		.filter((word) => !word.startsWith("-"))
		.some(isSecretPath);
}

export function isDangerousRm(command: string): boolean {
	return splitSegments(command).some(isDangerousRmSegment);
}

export function isDotEnvRead(command: string): boolean {
	return splitSegments(command).some(isDotEnvReadSegment);
}

/** Order matters: the first matching rule decides the reason. */
export const HOOK_RULES: readonly HookRule[] = [
	{
		name: "dangerous-rm",
		matches: isDangerousRm,
		reason: (command) => `BLOCKED: Dangerous rm -rf pattern detected: ${command}`,
	},
	{
		name: "dotenv-read",
		matches: isDotEnvRead,
		reason: () =>
			"BLOCKED: Direct .env file access detected. Use environment variables instead.",
	},
];

export function evaluateCommand(
	command: string,
	rules: readonly HookRule[] = HOOK_RULES,
): GuardVerdict | null {
	const normalized = normalizeCommand(command);
	if (normalized === "") return null;

	for (const rule of rules) {
		if (rule.matches(command)) {
			return { rule: rule.name, reason: rule.reason(normalized) };
		}
	}
	return null;
}

function escapeSingleQuotes(value: string): string {
	return value.replace(/'/g, `'"'"'`);
}

/** A replacement command that prints `reason` to stderr and exits 2. */
export function blockCommand(reason: string): string {
	return `printf '%s\\n' '${escapeSingleQuotes(reason)}' >&2; exit 2`;
}

export function isGuardedTool(tool: unknown): boolean {
	const name = typeof tool === "string" ? tool.toLowerCase() : "";
	return name === "bash" || name === "shell";
}

/**
 * Rewrites the command inside `args` in place when a rule matches, writing
 * the blocking command back into the field the original came from.
 *
 * @returns the verdict, or null when the command may run
 */
export function guardArgs(
	args: unknown,
	rules: readonly HookRule[] = HOOK_RULES,
): GuardVerdict | null {
	if (!isToolArgs(args)) return null;

	const location = locateCommand(args);
	if (location === null) return null;

	const verdict = evaluateCommand(location.command, rules);
	if (verdict !== null) {
		location.holder[location.field] = blockCommand(verdict.reason);
	}
	return verdict;
}
