import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { isNodeError } from "./errors.js";
import type { TargetId } from "./targets/types.js";
import { TARGET_IDS } from "./targets/types.js";
import { isTargetId } from "./targets/registry.js";

export interface BundleConfig {
  title: string;
  targets: TargetId[];
}

export const CONFIG_FILE = "skillrig.json";

export const DEFAULT_CONFIG: BundleConfig = {
  title: "Skillrig",
  targets: [...TARGET_IDS],
};

export interface ReadConfigOptions {
  onWarn?: (message: string) => void;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export async function readConfig(
  bundleRoot: string,
  options?: ReadConfigOptions,
): Promise<BundleConfig> {
  const filePath = join(bundleRoot, CONFIG_FILE);

  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err: unknown) {
    if (isNodeError(err) && err.code === "ENOENT") {
      return { ...DEFAULT_CONFIG, targets: [...DEFAULT_CONFIG.targets] };
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid ${CONFIG_FILE}: ${detail}`);
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`${CONFIG_FILE} must contain a JSON object`);
  }

  const title = "title" in parsed ? parsed.title : undefined;
  if (title !== undefined && (typeof title !== "string" || title.trim() === "")) {
    throw new ConfigError("title must be a non-empty string");
  }
  const resolvedTitle =
    typeof title === "string" ? title : DEFAULT_CONFIG.title;

  const targets = "targets" in parsed ? parsed.targets : undefined;
  if (targets === undefined) {
    return {
      title: resolvedTitle,
      targets: [...DEFAULT_CONFIG.targets],
    };
  }

  if (!Array.isArray(targets) || targets.length === 0) {
    throw new ConfigError("targets must not be empty");
  }

  const filtered: TargetId[] = [];
  for (const target of targets) {
    if (isTargetId(target)) {
      filtered.push(target);
    } else if (typeof target === "string") {
      options?.onWarn?.(`Unknown target "${target}" — skipping`);
    }
  }

  return { title: resolvedTitle, targets: filtered };
}
