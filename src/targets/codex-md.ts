import type { AgentUnit, SkillUnit } from "../bundle.js";
import { findSkillEntry } from "../bundle.js";
import type { HostFile, TargetSchema } from "./types.js";

type CodexDocumentSchema = Extract<TargetSchema, { kind: "codex-md" }>;

function pluralize(count: number, singular: string): string {
	return count === 1 ? `${count} ${singular}` : `${count} ${singular}s`;
}

/** The roster is recomputed from the units passed in on every call. */
export function renderRoster(skillCount: number, agentCount: number): string {
	return `> ${pluralize(skillCount, "skill")} + ${pluralize(agentCount, "agent")}.`;
}

function section(kind: "Skill" | "Agent", name: string, text: string): string {
	return `---\n\n## ${kind}: ${name}\n\n${text.trimEnd()}\n`;
}

export function convertCodexDocument(
	title: string,
	skills: SkillUnit[],
	agents: AgentUnit[],
	schema: CodexDocumentSchema,
): HostFile {
	const parts = [`# ${title}\n`, `${renderRoster(skills.length, agents.length)}\n`];

	for (const skill of skills) {
		const entry = findSkillEntry(skill);
		parts.push(
			section("Skill", skill.name, entry ? entry.content.toString("utf-8") : ""),
		);
	}
	for (const agent of agents) {
		parts.push(section("Agent", agent.name, agent.raw));
	}

	return { path: schema.documentName, content: parts.join("\n") };
}
