import type { AgentUnit, SkillUnit } from "../bundle.js";
import { findSkillEntry } from "../bundle.js";
import { readAgentDefinition } from "../agent-definition.js";
import { errorMessage, SchemaViolation } from "../errors.js";
import { foldLine, renderFrontmatter, splitFrontmatter } from "../frontmatter.js";
import { agentFileRef, copySkillFiles } from "./skill-copy.js";
import type { DirectoryTargetSchema, HostFile } from "./types.js";

type CodexSchema = Extract<DirectoryTargetSchema, { kind: "codex" }>;

/**
 * Folds a description to one line and enforces the schema ceiling. Over-long
 * descriptions are rejected, never truncated.
 */
export function foldDescription(
	unitName: string,
	description: string,
	limit: number,
): string {
	const folded = foldLine(description);
	const length = [...folded].length;
	if (length > limit) {
		throw new SchemaViolation(
			unitName,
			`description is ${length} characters after folding (limit ${limit})`,
		);
	}
	return folded;
}

export function convertCodexSkill(
	unit: SkillUnit,
	schema: CodexSchema,
): HostFile[] {
	const entry = findSkillEntry(unit);
	if (entry === undefined) {
		throw new SchemaViolation(unit.name, "SKILL.md is missing");
	}

	let doc: ReturnType<typeof splitFrontmatter>;
	try {
		doc = splitFrontmatter(entry.content.toString("utf-8"));
	} catch (err) {
		throw new SchemaViolation(unit.name, `invalid frontmatter: ${errorMessage(err)}`);
	}
	const description = doc?.data.description;
	if (typeof description !== "string" || foldLine(description) === "") {
		throw new SchemaViolation(unit.name, "SKILL.md has no description");
	}
	foldDescription(unit.name, description, schema.descriptionLimit);

	return copySkillFiles(unit, schema.layout);
}

export function convertCodexAgent(
	unit: AgentUnit,
	schema: CodexSchema,
): HostFile {
	const def = readAgentDefinition(unit);

	const data: Record<string, unknown> = {
		name: def.name,
		description: foldDescription(
			unit.name,
			def.description,
			schema.descriptionLimit,
		),
	};
	if (def.model !== null) {
		data.model = def.model;
	}
	if (def.tools.length > 0) {
		data.tools = def.tools.join(", ");
	}

	return {
		path: agentFileRef(schema.layout, unit.name),
		content: renderFrontmatter(data, def.body),
	};
}
