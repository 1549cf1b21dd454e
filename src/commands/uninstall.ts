import { existsSync, rmSync } from "fs";
import { join } from "path";
import { openBackend } from "../lib/backend.js";
import { createBackup } from "../lib/backup.js";
import { usageError } from "../lib/errors.js";
import { scanLocalPackages } from "../lib/flake/local-packages.js";
import { removePackageEdit } from "../lib/flake/marker-edits.js";
import { info, success } from "../lib/output.js";
import { applyPackageChange } from "../lib/package-change.js";
import { hasPackage, removePackage } from "../lib/package-state.js";
import type { CommandContext } from "./context.js";

/** The file or flake directory defining `name` in the packages directory, if any. */
export function findLocalDefinition(packagesDir: string, name: string): string | null {
  const scan = scanLocalPackages(packagesDir);
  const pkg = scan.packages.find((candidate) => candidate.name === name);
  if (pkg) {
    return join(packagesDir, pkg.file);
  }
  if (scan.flakes.some((flake) => flake.name === name)) {
    return join(packagesDir, name);
  }
  return null;
}

export async function uninstall(context: CommandContext, name: string | undefined): Promise<void> {
  if (!name) {
    throw usageError("Usage: nixy uninstall <package>");
  }

  const backend = openBackend(context.paths, context.settings);
  const { profile } = backend;
  const local = findLocalDefinition(profile.localPackagesDirectory, name);
  if (!local && !hasPackage(backend.load(), name)) {
    throw usageError(`Package '${name}' is not installed`);
  }

  info(`Uninstalling ${name}...`);
  await applyPackageChange(context, backend, {
    description: `uninstall ${name}`,
    prepare: (progress) => {
      if (!local || !existsSync(local)) return;
      const backupPath = createBackup(context.paths.backupsDir, local, profile.name);
      if (backupPath === null) return;
      info(`Removing local package definition: ${local}`);
      rmSync(local, { recursive: true, force: true });
      progress.removed(local, backupPath);
    },
    mutate: (state) => {
      removePackage(state, name);
    },
    edit: (text) => removePackageEdit(text, name),
  });
  success(`Removed ${name}`);
}
