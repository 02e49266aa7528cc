import { parse, stringify } from "yaml";

const FRONTMATTER_PATTERN = /^---\r?\n([\s\S]*?)\r?\n---(?:\r?\n|$)([\s\S]*)$/;

export interface FrontmatterDocument {
	data: Record<string, unknown>;
	body: string;
}

/**
 * Splits a markdown document into its YAML frontmatter and body.
 * Returns null when there is no frontmatter block; throws when the block
 * is not a YAML mapping.
 */
export function splitFrontmatter(text: string): FrontmatterDocument | null {
	const match = FRONTMATTER_PATTERN.exec(text);
	if (!match) {
		return null;
	}

	const [, yamlText = "", body = ""] = match;
	const data: unknown = yamlText.trim() === "" ? {} : parse(yamlText);
	if (typeof data !== "object" || data === null || Array.isArray(data)) {
		throw new Error("frontmatter is not a mapping");
	}

	return { data: { ...data }, body };
}

export function renderFrontmatter(
	data: Record<string, unknown>,
	body: string,
): string {
	return `---\n${stringify(data, { lineWidth: 0 })}---\n${body}`;
}

/** Collapses every whitespace run (newlines included) into one space. */
export function foldLine(text: string): string {
	return text.replace(/\s+/g, " ").trim();
}
