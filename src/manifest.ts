import { readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import * as p from "@clack/prompts";
import { errorMessage, isNodeError, ManifestError } from "./errors.js";
import { ExitSignal } from "./exit-signal.js";
import { compareNames, writeFileAtomic } from "./fs-utils.js";
import { getTargetSchema, isDirectoryTarget, isTargetId } from "./targets/registry.js";
import { agentFileRef, skillDirRef } from "./targets/skill-copy.js";
import type { TargetId } from "./targets/types.js";

export const INSTALL_SCOPES = [
  "full",
  "skills-only",
  "agents-only",
  "hooks-only",
] as const;

export type InstallScope = (typeof INSTALL_SCOPES)[number];

export interface Manifest {
  version: string;
  target: TargetId;
  scope: InstallScope;
  installed_at: string;
  source: string;
  skills: string[];
  agents: string[];
  hooks: boolean;
  plugin_files: string[];
}

export interface ManifestDiff {
  toAdd: string[];
  toRemove: string[];
}

export const MANIFEST_FILE = ".skillrig-manifest.json";

export function manifestPath(root: string): string {
  return join(root, MANIFEST_FILE);
}

/**
 * @returns the manifest, or null when nothing is installed under `root`
 */
export async function readManifest(root: string): Promise<Manifest | null> {
  let raw: string;
  try {
    raw = await readFile(manifestPath(root), "utf-8");
  } catch (err: unknown) {
    if (isNodeError(err) && err.code === "ENOENT") {
      return null;
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    throw new ManifestError(`Invalid manifest ${manifestPath(root)}: ${errorMessage(err)}`);
  }

  return validateManifest(parsed);
}

function isSafeName(value: string): boolean {
  return value !== "" && value !== "." && value !== ".." && !/[\\/]/.test(value);
}

function isSafeRelativePath(value: string): boolean {
  return (
    value !== "" &&
    !value.startsWith("/") &&
    value.split(/[\\/]/).every((segment) => segment !== ".." && segment !== "")
  );
}

function stringList(
  record: Record<string, unknown>,
  key: string,
  check: (value: string) => boolean,
): string[] {
  const value = record[key] ?? [];
  if (!Array.isArray(value)) {
    throw new ManifestError(`Manifest field "${key}" must be a list`);
  }
  return value.map((item: unknown) => {
    if (typeof item !== "string" || !check(item)) {
      throw new ManifestError(`Manifest field "${key}" has an invalid entry: ${String(item)}`);
    }
    return item;
  });
}

function optionalString(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  return typeof value === "string" ? value : "";
}

export function validateManifest(value: unknown): Manifest {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new ManifestError("Manifest must be a JSON object");
  }
  const record: Record<string, unknown> = { ...value };

  const target = record.target;
  if (!isTargetId(target)) {
    throw new ManifestError(`Unknown target in manifest: ${String(target)}`);
  }

  const skills = stringList(record, "skills", isSafeName);
  const agents = stringList(record, "agents", isSafeName);
  const pluginFiles = stringList(record, "plugin_files", isSafeRelativePath);
  const hooks = record.hooks === true;

  const scope = INSTALL_SCOPES.find((s) => s === record.scope) ??
    deriveScope(skills.length > 0, agents.length > 0, hooks);

  return {
    version: optionalString(record, "version"),
    target,
    scope,
    installed_at: optionalString(record, "installed_at"),
    source: optionalString(record, "source"),
    skills,
    agents,
    hooks,
    plugin_files: pluginFiles,
  };
}

// Manifests written before `scope` was recorded.
function deriveScope(
  hasSkills: boolean,
  hasAgents: boolean,
  hooks: boolean,
): InstallScope {
  if (hooks && !hasSkills && !hasAgents) return "hooks-only";
  if (!hooks && hasSkills && !hasAgents) return "skills-only";
  if (!hooks && !hasSkills && hasAgents) return "agents-only";
  return "full";
}

export function serializeManifest(manifest: Manifest): string {
  return JSON.stringify(manifest, null, 2) + "\n";
}

export async function writeManifest(root: string, manifest: Manifest): Promise<void> {
  await writeFileAtomic(manifestPath(root), serializeManifest(manifest));
}

export async function removeManifest(root: string): Promise<void> {
  await rm(manifestPath(root), { force: true });
}

/**
 * Root-relative references the manifest accounts for. Directories end in
 * "/"; every other entry is a single file.
 */
export function manifestFiles(manifest: Manifest): string[] {
  const schema = getTargetSchema(manifest.target);

  if (!isDirectoryTarget(schema)) {
    const hasContent = manifest.skills.length > 0 || manifest.agents.length > 0;
    return hasContent ? [schema.documentName, ...manifest.plugin_files] : [...manifest.plugin_files];
  }

  return [
    ...manifest.skills.map((name) => skillDirRef(schema.layout, name)),
    ...manifest.agents.map((name) => agentFileRef(schema.layout, name)),
    ...manifest.plugin_files,
  ];
}

export function diffManifestFiles(
  previous: Manifest | null,
  next: Manifest,
): ManifestDiff {
  const before = new Set(previous === null ? [] : manifestFiles(previous));
  const after = new Set(manifestFiles(next));

  return {
    toAdd: [...after].filter((f) => !before.has(f)).sort(compareNames),
    toRemove: [...before].filter((f) => !after.has(f)).sort(compareNames),
  };
}

export async function readManifestOrExit(root: string): Promise<Manifest | null> {
  return readManifest(root).catch((err: unknown) => {
    p.log.error(`Failed to read manifest: ${errorMessage(err)}`);
    throw new ExitSignal(1);
  });
}
