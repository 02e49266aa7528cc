import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Mock } from "vitest";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { blockCommand } from "../../src/bridge/command-guard.js";
import { failureLogPath } from "../../src/bridge/failure-log.js";
import type { HostClient, PromptRequest } from "../../src/bridge/opencode-plugin.js";
import { getSessionId, SkillrigHooksPlugin } from "../../src/bridge/opencode-plugin.js";
import { writeTree } from "../fixtures/bundle.js";

let directory: string;
let prompt: Mock<(request: PromptRequest) => Promise<unknown>>;
let client: HostClient;

beforeEach(async () => {
	directory = await mkdtemp(join(tmpdir(), "skillrig-plugin-"));
	prompt = vi.fn<(request: PromptRequest) => Promise<unknown>>().mockResolvedValue({});
	client = { session: { prompt } };
});

afterEach(async () => {
	await rm(directory, { recursive: true, force: true });
});

function plugin() {
	return SkillrigHooksPlugin({
		client,
		directory,
		git: async (args) => (args[0] === "branch" ? "main\n" : ""),
	});
}

describe("getSessionId", () => {
	it.each([
		[{ properties: { info: { id: "ses_info" }, sessionID: "ses_prop" } }, "ses_info"],
		[{ properties: { sessionID: "ses_prop" } }, "ses_prop"],
		[{ session: { id: "ses_top" } }, "ses_top"],
		[{ properties: { info: { id: "" } } }, null],
		[undefined, null],
	])("reads %j", (event, expected) => {
		expect(getSessionId(event)).toBe(expected);
	});
});

describe("tool.execute.before", () => {
	it("replaces a blocked bash command", async () => {
		const hooks = await plugin();
		const output = { args: { command: "cat .env" } };

		await hooks["tool.execute.before"]({ tool: "bash" }, output);

		expect(output.args.command).toBe(
			blockCommand("BLOCKED: Direct .env file access detected. Use environment variables instead."),
		);
	});

	it("leaves other tools alone", async () => {
		const hooks = await plugin();
		const output = { args: { command: "cat .env" } };

		await hooks["tool.execute.before"]({ tool: "read" }, output);

		expect(output.args.command).toBe("cat .env");
	});
});

describe("event", () => {
	it("injects the start context into a new session", async () => {
		const hooks = await plugin();

		await hooks.event({ event: { type: "session.created", properties: { info: { id: "ses_1" } } } });

		expect(prompt).toHaveBeenCalledTimes(1);
		const request = prompt.mock.calls[0][0];
		expect(request.path).toEqual({ id: "ses_1" });
		expect(request.body.noReply).toBe(true);
		expect(request.body.parts).toHaveLength(1);
		expect(request.body.parts[0].synthetic).toBe(true);
		expect(request.body.parts[0].text.split("\n")[1]).toBe("Git: branch=main, uncommitted_files=0");
	});

	it("injects the roster after compaction", async () => {
		await writeTree(directory, { ".opencode/skills/alpha/SKILL.md": "a" });
		const hooks = await plugin();

		await hooks.event({ event: { type: "session.compacted", properties: { sessionID: "ses_2" } } });

		expect(prompt.mock.calls[0][0].body.parts[0].text).toBe(
			[
				"CRITICAL CONTEXT TO PRESERVE AFTER COMPACTION:",
				"Skills (1): alpha",
				"Agents: none found",
				"Always use relevant skills for the task at hand.",
			].join("\n"),
		);
	});

	it("does nothing without a session id", async () => {
		const hooks = await plugin();

		await hooks.event({ event: { type: "session.created" } });

		expect(prompt).not.toHaveBeenCalled();
	});

	it("logs session errors", async () => {
		const hooks = await plugin();

		await hooks.event({ event: { type: "session.error", properties: { error: "boom" } } });

		const line: unknown = JSON.parse(await readFile(failureLogPath(directory, ".opencode"), "utf-8"));
		expect(line).toMatchObject({ type: "session.error", properties: { error: "boom" } });
	});

	it("logs injection failures instead of throwing", async () => {
		prompt.mockRejectedValue(new Error("server gone"));
		const hooks = await plugin();

		await hooks.event({ event: { type: "session.compacted", properties: { sessionID: "ses_3" } } });

		const line: unknown = JSON.parse(await readFile(failureLogPath(directory, ".opencode"), "utf-8"));
		expect(line).toMatchObject({
			type: "skillrig.inject_failed",
			properties: { sessionID: "ses_3", message: "server gone" },
		});
	});
});
