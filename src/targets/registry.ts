import type { DirectoryTargetSchema, TargetId, TargetSchema } from "./types.js";
import { TARGET_IDS } from "./types.js";

const DEFAULT_LAYOUT = { skillsDir: "skills", agentsDir: "agents" };

const TARGET_REGISTRY: Record<TargetId, TargetSchema> = {
	claude: {
		kind: "claude",
		label: "Claude Code",
		defaultRoot: ".claude",
		layout: DEFAULT_LAYOUT,
		hooks: { host: "claude", artifactDir: "hooks", settingsFile: "settings.json" },
	},
	opencode: {
		kind: "opencode",
		label: "OpenCode",
		defaultRoot: ".opencode",
		layout: DEFAULT_LAYOUT,
		hooks: { host: "opencode", artifactDir: "plugins", settingsFile: null },
	},
	codex: {
		kind: "codex",
		label: "Codex CLI",
		defaultRoot: ".codex",
		layout: DEFAULT_LAYOUT,
		hooks: null,
		descriptionLimit: 1024,
	},
	"codex-md": {
		kind: "codex-md",
		label: "Codex CLI (codex.md)",
		defaultRoot: ".",
		documentName: "codex.md",
		hooks: null,
	},
};

export function getTargetSchema(id: TargetId): TargetSchema {
	return TARGET_REGISTRY[id];
}

export function isTargetId(value: unknown): value is TargetId {
	return (
		typeof value === "string" &&
		(TARGET_IDS as readonly string[]).includes(value)
	);
}

export function isDirectoryTarget(
	schema: TargetSchema,
): schema is DirectoryTargetSchema {
	return schema.kind !== "codex-md";
}
