import { errorMessage } from "../errors.js";
import { guardArgs, isGuardedTool, isToolArgs } from "./command-guard.js";
import type { HostEvent } from "./failure-log.js";
import { appendFailureLog } from "./failure-log.js";
import type { GitRunner } from "./session-context.js";
import { buildCompactContext, buildSessionStartContext } from "./session-context.js";

const HOST_DIR = ".opencode";

export interface PromptRequest {
	path: { id: string };
	body: {
		noReply: boolean;
		parts: { type: "text"; text: string; synthetic: boolean }[];
	};
}

/** The slice of the OpenCode SDK client the plugin talks to. */
export interface HostClient {
	session: {
		prompt(request: PromptRequest): Promise<unknown>;
	};
}

export interface PluginInput {
	client: HostClient;
	directory: string;
	/** Test seam for the session-start git summary. */
	git?: GitRunner;
}

export interface ToolExecuteInput {
	tool?: unknown;
}

export interface ToolExecuteOutput {
	args?: unknown;
}

export interface PluginHooks {
	"tool.execute.before": (
		input: ToolExecuteInput,
		output: ToolExecuteOutput,
	) => Promise<void>;
	event: (input: { event?: unknown }) => Promise<void>;
}

function child(value: unknown, key: string): unknown {
	return isToolArgs(value) ? value[key] : undefined;
}

function nonEmpty(value: unknown): string | null {
	return typeof value === "string" && value !== "" ? value : null;
}

export function getSessionId(event: unknown): string | null {
	const properties = child(event, "properties");
	return (
		nonEmpty(child(child(properties, "info"), "id")) ??
		nonEmpty(child(properties, "sessionID")) ??
		nonEmpty(child(child(event, "session"), "id"))
	);
}

function toHostEvent(event: unknown): HostEvent {
	return { type: child(event, "type"), properties: child(event, "properties") };
}

export const SkillrigHooksPlugin = async ({
	client,
	directory,
	git,
}: PluginInput): Promise<PluginHooks> => {
	const contextOptions = { directory, hostDir: HOST_DIR, git };

	async function inject(sessionId: string, text: string): Promise<void> {
		if (text === "") return;
		try {
			await client.session.prompt({
				path: { id: sessionId },
				body: {
					noReply: true,
					parts: [{ type: "text", text, synthetic: true }],
				},
			});
		} catch (err) {
			await appendFailureLog(directory, HOST_DIR, {
				type: "skillrig.inject_failed",
				properties: { sessionID: sessionId, message: errorMessage(err) },
			});
		}
	}

	return {
		"tool.execute.before": async (input, output) => {
			if (!isGuardedTool(input.tool)) return;
			guardArgs(output.args);
		},

		event: async ({ event }) => {
			const type = child(event, "type");
			const sessionId = getSessionId(event);

			if (type === "session.created" && sessionId !== null) {
				await inject(sessionId, await buildSessionStartContext(contextOptions));
			}
			if (type === "session.compacted" && sessionId !== null) {
				await inject(sessionId, await buildCompactContext(contextOptions));
			}
			if (type === "session.error") {
				await appendFailureLog(directory, HOST_DIR, toHostEvent(event));
			}
		},
	};
};

export default SkillrigHooksPlugin;
