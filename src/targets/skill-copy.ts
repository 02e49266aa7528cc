import type { SkillUnit } from "../bundle.js";
import type { DirectoryLayout, HostFile } from "./types.js";

export function skillDirRef(layout: DirectoryLayout, name: string): string {
	return `${layout.skillsDir}/${name}/`;
}

export function agentFileRef(layout: DirectoryLayout, name: string): string {
	return `${layout.agentsDir}/${name}.md`;
}

export function copySkillFiles(
	unit: SkillUnit,
	layout: DirectoryLayout,
): HostFile[] {
	const prefix = skillDirRef(layout, unit.name);
	return unit.files.map((file) => ({
		path: prefix + file.path,
		content: file.content,
	}));
}
