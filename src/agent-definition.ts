import type { AgentUnit } from "./bundle.js";
import { errorMessage, SchemaViolation } from "./errors.js";
import { foldLine, splitFrontmatter } from "./frontmatter.js";

export interface AgentDefinition {
	name: string;
	description: string;
	model: string | null;
	tools: string[];
	/** Frontmatter keys other than the four above, in source order. */
	extra: Record<string, unknown>;
	body: string;
}

const KNOWN_KEYS = new Set(["name", "description", "model", "tools"]);

export function readAgentDefinition(unit: AgentUnit): AgentDefinition {
	let doc: ReturnType<typeof splitFrontmatter>;
	try {
		doc = splitFrontmatter(unit.raw);
	} catch (err) {
		throw new SchemaViolation(
			unit.name,
			`invalid frontmatter: ${errorMessage(err)}`,
		);
	}
	if (doc === null) {
		throw new SchemaViolation(unit.name, "missing frontmatter block");
	}

	const { data, body } = doc;
	const description = data.description;
	if (typeof description !== "string" || foldLine(description) === "") {
		throw new SchemaViolation(unit.name, "description is required");
	}

	return {
		name: nonEmptyString(data.name) ?? unit.name,
		description,
		model: nonEmptyString(data.model),
		tools: parseTools(data.tools),
		extra: Object.fromEntries(
			Object.entries(data).filter(([key]) => !KNOWN_KEYS.has(key)),
		),
		body,
	};
}

/** Accepts `Read, Grep, Bash` as well as a YAML list. */
export function parseTools(value: unknown): string[] {
	const items =
		typeof value === "string"
			? value.split(",")
			: Array.isArray(value)
				? value.filter((v): v is string => typeof v === "string")
				: [];

	return items.map((t) => t.trim()).filter((t) => t.length > 0);
}

function nonEmptyString(value: unknown): string | null {
	if (typeof value !== "string") return null;
	const trimmed = value.trim();
	return trimmed === "" ? null : trimmed;
}
