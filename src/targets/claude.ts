import type { AgentUnit, SkillUnit } from "../bundle.js";
import { readAgentDefinition } from "../agent-definition.js";
import { renderFrontmatter } from "../frontmatter.js";
import type { JsonObject } from "../settings-merge.js";
import { agentFileRef, copySkillFiles } from "./skill-copy.js";
import type { DirectoryTargetSchema, HostFile } from "./types.js";

type ClaudeSchema = Extract<DirectoryTargetSchema, { kind: "claude" }>;

export function convertClaudeSkill(
	unit: SkillUnit,
	schema: ClaudeSchema,
): HostFile[] {
	return copySkillFiles(unit, schema.layout);
}

/**
 * Claude Code reads the bundle's own agent format. The known keys are
 * normalized (`tools` as a comma-separated list) and put first; any other
 * frontmatter keys follow in source order.
 */
export function convertClaudeAgent(
	unit: AgentUnit,
	schema: ClaudeSchema,
): HostFile {
	const def = readAgentDefinition(unit);

	const data: Record<string, unknown> = {
		name: def.name,
		description: def.description,
	};
	if (def.model !== null) {
		data.model = def.model;
	}
	if (def.tools.length > 0) {
		data.tools = def.tools.join(", ");
	}

	Object.assign(data, def.extra);

	return {
		path: agentFileRef(schema.layout, unit.name),
		content: renderFrontmatter(data, def.body),
	};
}

export type ClaudeHookMode = "pre-tool-use" | "session-start" | "session-compact";

function hookCommand(artifactPath: string, mode: ClaudeHookMode) {
	return {
		type: "command",
		command: `node ${JSON.stringify(artifactPath)} ${mode}`,
	};
}

/**
 * The `hooks` sub-tree that registers the deployed command hook in Claude
 * Code's settings.json. `artifactPath` is absolute so the registration works
 * for global roots as well as project ones.
 */
export function claudeHooksFragment(artifactPath: string): JsonObject {
	return {
		hooks: {
			PreToolUse: [
				{ matcher: "Bash", hooks: [hookCommand(artifactPath, "pre-tool-use")] },
			],
			SessionStart: [
				{ matcher: "startup", hooks: [hookCommand(artifactPath, "session-start")] },
				{ matcher: "compact", hooks: [hookCommand(artifactPath, "session-compact")] },
			],
		},
	};
}
