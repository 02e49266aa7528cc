import { resolve } from "node:path";
import * as p from "@clack/prompts";
import { Command } from "commander";
import { removeDeployment } from "../deploy.js";
import { InvalidSettingsError } from "../errors.js";
import { ExitSignal, withExitSignal } from "../exit-signal.js";
import { isInteractive } from "../interactive.js";
import type { Manifest } from "../manifest.js";
import { manifestFiles, readManifestOrExit } from "../manifest.js";
import { renderRemoveSummary } from "../summary.js";

export interface UninstallOptions {
  path: string;
  force?: boolean;
}

function classifyRef(ref: string): string {
  if (ref.startsWith("skills/")) return "Skills";
  if (ref.startsWith("agents/")) return "Agents";
  if (ref.startsWith("hooks/") || ref.startsWith("plugins/")) return "Hooks";
  return "Other";
}

function listRefsByType(manifest: Manifest): void {
  const order = ["Skills", "Agents", "Hooks", "Other"];
  const groups = new Map<string, string[]>();

  for (const ref of manifestFiles(manifest)) {
    const type = classifyRef(ref);
    groups.set(type, [...(groups.get(type) ?? []), ref]);
  }

  for (const type of order) {
    const refs = groups.get(type);
    if (refs === undefined) continue;
    p.log.message(type);
    for (const ref of refs) {
      p.log.message(`  ${ref}`);
    }
  }
}

export async function runUninstall(options: UninstallOptions): Promise<void> {
  p.intro("skillrig uninstall");

  const root = resolve(options.path);
  const manifest = await readManifestOrExit(root);
  if (manifest === null) {
    p.outro(`Nothing installed at ${root}`);
    return;
  }

  listRefsByType(manifest);

  if (options.force !== true && isInteractive()) {
    const confirmed = await p.confirm({
      message: `Remove the ${manifest.target} installation at ${root}?`,
    });
    if (p.isCancel(confirmed) || confirmed !== true) {
      p.cancel("Cancelled");
      throw new ExitSignal(0);
    }
  }

  try {
    const result = await removeDeployment(root, manifest);
    p.outro(renderRemoveSummary(root, result));
  } catch (err) {
    if (err instanceof InvalidSettingsError) {
      p.log.error(`${err.message}. Fix or remove the file and try again.`);
      throw new ExitSignal(1);
    }
    throw err;
  }
}

export const uninstallCommand = new Command("uninstall")
  .description("Remove everything skillrig installed under a root")
  .requiredOption("--path <dir>", "Installed target root")
  .option("--force", "Do not ask for confirmation")
  .action(
    withExitSignal(async (options: UninstallOptions) => {
      await runUninstall(options);
    }),
  );
