import { describe, expect, it } from "vitest";
import type { HookRule } from "../../src/bridge/command-guard.js";
import {
	blockCommand,
	evaluateCommand,
	extractCommand,
	guardArgs,
	isGuardedTool,
	normalizeCommand,
	splitSegments,
} from "../../src/bridge/command-guard.js";

const ENV_REASON = "BLOCKED: Direct .env file access detected. Use environment variables instead.";

describe("evaluateCommand", () => {
	it.each([
		"rm -rf /",
		"rm -fr ~",
		"rm -Rf *",
		"rm --recursive --force ./",
		"sudo rm -rf /*",
		"rm -r --no-preserve-root /tmp/x",
		"rm -r -f /",
		"rm -rf / && echo done",
		"rm -rf /; ls",
		"rm --force --recursive /",
		"rm -rf -- /",
		"rm -rf $HOME",
		"rm -rf ~/ && true",
		"echo start\nrm -rf ${HOME}/",
	])("blocks %s", (command) => {
		expect(evaluateCommand(command)?.rule).toBe("dangerous-rm");
	});

	it.each([
		"rm -rf ./build",
		"rm -rf node_modules",
		"rm notes.txt",
		"ls -la /",
		"rm -r ./",
		"rm -rf build/ && ls /",
	])("allows %s", (command) => {
		expect(evaluateCommand(command)).toBeNull();
	});

	it("quotes the normalized command in the rm reason", () => {
		expect(evaluateCommand("rm   -rf\t/")).toEqual({
			rule: "dangerous-rm",
			reason: "BLOCKED: Dangerous rm -rf pattern detected: rm -rf /",
		});
	});

	it.each([
		"cat .env",
		"source config/.env && npm start",
		"tail app/.env",
		"tail -n 5 app/.env",
		"cat .env.production",
		"cat .env.local",
		"cat .env.example .env",
		"cat .env;",
		"cat .env|grep KEY",
	])(
		"blocks reading a dotenv file: %s",
		(command) => {
			expect(evaluateCommand(command)).toEqual({ rule: "dotenv-read", reason: ENV_REASON });
		},
	);

	it.each([
		"cat .env.example",
		"cat .env.sample",
		"head .env.local.example",
		"cat .env.test && cat README.md",
		"cat .environment",
	])(
		"allows template dotenv files: %s",
		(command) => {
			expect(evaluateCommand(command)).toBeNull();
		},
	);

	it("ignores empty commands", () => {
		expect(evaluateCommand("   ")).toBeNull();
	});

	it("applies custom rules in order", () => {
		const rules: HookRule[] = [
			{ name: "no-curl", matches: (c) => c.startsWith("curl "), reason: () => "no network" },
		];

		expect(evaluateCommand("curl  https://example.com", rules)).toEqual({
			rule: "no-curl",
			reason: "no network",
		});
		expect(evaluateCommand("rm -rf /", rules)).toBeNull();
	});
});

describe("splitSegments", () => {
	it("splits on command separators and line breaks", () => {
		expect(splitSegments("a ; b && c || d | e & f\n  g  h")).toEqual([
			"a",
			"b",
			"c",
			"d",
			"e",
			"f",
			"g h",
		]);
	});
});

describe("normalizeCommand", () => {
	it("collapses whitespace", () => {
		expect(normalizeCommand("  git \n status\t-s ")).toBe("git status -s");
	});
});

describe("extractCommand", () => {
	it.each([
		[{ command: "ls" }, "ls"],
		[{ cmd: "pwd" }, "pwd"],
		[{ script: "make" }, "make"],
		[{ payload: { command: "whoami" } }, "whoami"],
		[{ input: { payload: { command: "whoami" } } }, ""],
		[{ command: 42 }, ""],
		["ls", ""],
		[null, ""],
	])("reads %j as %j", (args, expected) => {
		expect(extractCommand(args)).toBe(expected);
	});
});

describe("blockCommand", () => {
	it("prints the reason to stderr and exits 2", () => {
		expect(blockCommand("no")).toBe("printf '%s\\n' 'no' >&2; exit 2");
	});

	it("escapes single quotes", () => {
		expect(blockCommand("it's")).toBe(`printf '%s\\n' 'it'"'"'s' >&2; exit 2`);
	});
});

describe("guardArgs", () => {
	it("rewrites the field the command came from", () => {
		const args: Record<string, unknown> = { cmd: "cat .env", description: "peek" };

		const verdict = guardArgs(args);

		expect(verdict?.rule).toBe("dotenv-read");
		expect(args).toEqual({ cmd: blockCommand(ENV_REASON), description: "peek" });
	});

	it("rewrites nested commands in place", () => {
		const args = { input: { command: "rm -rf /" } };

		guardArgs(args);

		expect(args).toEqual({
			input: {
				command: blockCommand("BLOCKED: Dangerous rm -rf pattern detected: rm -rf /"),
			},
		});
	});

	it("leaves allowed commands untouched", () => {
		const args = { command: "npm test" };

		expect(guardArgs(args)).toBeNull();
		expect(args).toEqual({ command: "npm test" });
	});

	it("ignores arguments without a command", () => {
		expect(guardArgs({ path: "/tmp" })).toBeNull();
		expect(guardArgs(undefined)).toBeNull();
	});
});

describe("isGuardedTool", () => {
	it.each([
		["bash", true],
		["Bash", true],
		["SHELL", true],
		["edit", false],
		[undefined, false],
	])("%s -> %s", (tool, expected) => {
		expect(isGuardedTool(tool)).toBe(expected);
	});
});
