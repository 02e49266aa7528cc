export const TARGET_IDS = ["claude", "opencode", "codex", "codex-md"] as const;

export type TargetId = (typeof TARGET_IDS)[number];

export type HookHost = "claude" | "opencode";

export interface DirectoryLayout {
	skillsDir: string;
	agentsDir: string;
}

export interface HookLayout {
	host: HookHost;
	/** Directory under the target root that receives the bridge artifact. */
	artifactDir: string;
	/** Settings file that registers the artifact, when the host needs one. */
	settingsFile: string | null;
}

export type TargetSchema =
	| {
			kind: "claude";
			label: string;
			defaultRoot: string;
			layout: DirectoryLayout;
			hooks: HookLayout;
	  }
	| {
			kind: "opencode";
			label: string;
			defaultRoot: string;
			layout: DirectoryLayout;
			hooks: HookLayout;
	  }
	| {
			kind: "codex";
			label: string;
			defaultRoot: string;
			layout: DirectoryLayout;
			hooks: null;
			descriptionLimit: number;
	  }
	| {
			kind: "codex-md";
			label: string;
			defaultRoot: string;
			documentName: string;
			hooks: null;
	  };

export type DirectoryTargetSchema = Extract<TargetSchema, { layout: DirectoryLayout }>;

/** A file as it will exist under a target root; `path` is root-relative. */
export interface HostFile {
	path: string;
	content: string | Buffer;
}
