import type { ApplyResult, RemoveResult } from "./deploy.js";
import type { Manifest } from "./manifest.js";
import { getTargetSchema } from "./targets/registry.js";

function pluralize(count: number, singular: string, plural = `${singular}s`): string {
	return count === 1 ? `${count} ${singular}` : `${count} ${plural}`;
}

export function formatComponents(manifest: Manifest): string {
	return `Components: skills=${manifest.skills.length} agents=${manifest.agents.length} hooks=${manifest.hooks}`;
}

export function isNoop(result: ApplyResult): boolean {
	return (
		result.written.length === 0 &&
		result.removed.length === 0 &&
		result.pruned.length === 0 &&
		!result.settingsChanged &&
		!result.manifestChanged
	);
}

interface DeploySummaryInput {
	verb: "Installed" | "Updated";
	manifest: Manifest;
	root: string;
	result: ApplyResult;
}

export function renderDeploySummary(input: DeploySummaryInput): string {
	const { manifest, result } = input;
	const label = getTargetSchema(manifest.target).label;

	const parts = [
		pluralize(manifest.skills.length, "skill"),
		pluralize(manifest.agents.length, "agent"),
	];
	if (manifest.hooks) parts.push("hooks");

	const changes = [`${pluralize(result.written.length, "file")} written`];
	const removedCount = result.removed.length + result.pruned.length;
	if (removedCount > 0) {
		changes.push(`${removedCount} removed`);
	}
	if (result.settingsChanged) {
		changes.push("settings merged");
	}

	return `${input.verb} ${parts.join(", ")} for ${label} at ${input.root} (${changes.join(", ")})`;
}

export function renderRemoveSummary(root: string, result: RemoveResult): string {
	const skippedSuffix =
		result.skipped.length > 0 ? `, ${result.skipped.length} already missing` : "";
	return `Removed ${pluralize(result.removed.length, "entry", "entries")} from ${root}${skippedSuffix}`;
}

export function renderStatus(root: string, manifest: Manifest): string {
	return [
		`Target: ${manifest.target}`,
		`Path: ${root}`,
		`Version: ${manifest.version}`,
		`Installed: ${manifest.installed_at}`,
		formatComponents(manifest),
	].join("\n");
}
