import type { AgentUnit, SkillUnit } from "../bundle.js";
import { convertClaudeAgent, convertClaudeSkill } from "./claude.js";
import { convertCodexAgent, convertCodexSkill } from "./codex.js";
import { convertOpenCodeAgent, convertOpenCodeSkill } from "./opencode.js";
import type { DirectoryTargetSchema, HostFile } from "./types.js";

export function convertSkill(
	unit: SkillUnit,
	schema: DirectoryTargetSchema,
): HostFile[] {
	switch (schema.kind) {
		case "claude":
			return convertClaudeSkill(unit, schema);
		case "opencode":
			return convertOpenCodeSkill(unit, schema);
		case "codex":
			return convertCodexSkill(unit, schema);
		default: {
			const unreachable: never = schema;
			throw new Error(`Unhandled target schema: ${String(unreachable)}`);
		}
	}
}

export function convertAgent(
	unit: AgentUnit,
	schema: DirectoryTargetSchema,
): HostFile {
	switch (schema.kind) {
		case "claude":
			return convertClaudeAgent(unit, schema);
		case "opencode":
			return convertOpenCodeAgent(unit, schema);
		case "codex":
			return convertCodexAgent(unit, schema);
		default: {
			const unreachable: never = schema;
			throw new Error(`Unhandled target schema: ${String(unreachable)}`);
		}
	}
}
