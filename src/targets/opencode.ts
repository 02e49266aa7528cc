import type { AgentUnit, SkillUnit } from "../bundle.js";
import { readAgentDefinition } from "../agent-definition.js";
import { foldLine, renderFrontmatter } from "../frontmatter.js";
import { agentFileRef, copySkillFiles } from "./skill-copy.js";
import type { DirectoryTargetSchema, HostFile } from "./types.js";

type OpenCodeSchema = Extract<DirectoryTargetSchema, { kind: "opencode" }>;

export type OpenCodeTool =
	| "read"
	| "write"
	| "edit"
	| "bash"
	| "grep"
	| "glob"
	| "list"
	| "webfetch";

const TOOL_ALIASES: Record<string, OpenCodeTool> = {
	ls: "list",
	multiedit: "edit",
};

/**
 * Maps a tool list onto OpenCode's fixed tool switches. An empty list means
 * the agent inherits every tool, so every switch is on.
 */
export function buildToolMap(tools: string[]): Record<OpenCodeTool, boolean> {
	const enabled = new Set<string>();
	for (const tool of tools) {
		const key = tool.toLowerCase();
		enabled.add(TOOL_ALIASES[key] ?? key);
	}

	const on = (tool: OpenCodeTool): boolean =>
		tools.length === 0 || enabled.has(tool);

	return {
		read: on("read"),
		write: on("write"),
		edit: on("edit"),
		bash: on("bash"),
		grep: on("grep"),
		glob: on("glob"),
		list: on("list"),
		webfetch: on("webfetch"),
	};
}

export function convertOpenCodeSkill(
	unit: SkillUnit,
	schema: OpenCodeSchema,
): HostFile[] {
	return copySkillFiles(unit, schema.layout);
}

export function convertOpenCodeAgent(
	unit: AgentUnit,
	schema: OpenCodeSchema,
): HostFile {
	const def = readAgentDefinition(unit);

	const data: Record<string, unknown> = {
		description: foldLine(def.description),
		mode: "subagent",
	};
	// OpenCode wants provider/model ids; aliases such as "sonnet" are dropped
	// so the host falls back to its default model.
	if (def.model !== null && def.model.includes("/")) {
		data.model = def.model;
	}
	data.tools = buildToolMap(def.tools);

	return {
		path: agentFileRef(schema.layout, unit.name),
		content: renderFrontmatter(data, def.body),
	};
}
