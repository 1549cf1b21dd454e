import { existsSync } from "fs";
import { openBackend } from "../lib/backend.js";
import { errorMessage, usageError } from "../lib/errors.js";
import { addResolvedPackageEdit, removePackageEdit } from "../lib/flake/marker-edits.js";
import { readFlakeInputs } from "../lib/nix.js";
import { info, success, warn } from "../lib/output.js";
import { applyPackageChange, flakeLockPath } from "../lib/package-change.js";
import { addResolvedPackage } from "../lib/package-state.js";
import type { PackageState, ResolvedPackage } from "../lib/types.js";
import type { CommandContext } from "./context.js";

/**
 * Re-resolve resolved packages against the registry. Packages that fail to
 * resolve keep their current pin; only changed releases are returned.
 */
export async function reresolvePackages(
  context: CommandContext,
  state: PackageState,
  names: readonly string[],
): Promise<ResolvedPackage[]> {
  const system = await context.builder.currentSystem();
  const updated: ResolvedPackage[] = [];

  for (const name of names) {
    const existing = state.resolved_packages.find((pkg) => pkg.name === name);
    if (!existing) continue;

    const version = existing.version_spec ?? "latest";
    info(`Resolving ${name}@${version}...`);
    try {
      const release = await context.registry.resolve(name, version, system);
      if (release.version === existing.resolved_version && release.commit_hash === existing.commit_hash) {
        info(`  ${name} is already at the latest version`);
        continue;
      }
      info(`  ${existing.resolved_version} -> ${release.version} (commit ${release.commit_hash.slice(0, 8)})`);
      updated.push({
        ...existing,
        resolved_version: release.version,
        attribute_path: release.attribute_path,
        commit_hash: release.commit_hash,
      });
    } catch (error) {
      warn(`  Failed to resolve ${name}: ${errorMessage(error)}`);
    }
  }

  return updated;
}

interface UpgradePlan {
  packages: string[];
  /** Flake inputs to update; null means all of them. */
  inputs: string[] | null;
}

function planUpgrade(state: PackageState, lockPath: string, targets: readonly string[]): UpgradePlan | null {
  const allResolved = state.resolved_packages.map((pkg) => pkg.name);
  if (targets.length === 0) {
    return { packages: allResolved, inputs: null };
  }

  const packages = targets.filter((target) => allResolved.includes(target));
  const inputs = targets.filter((target) => !allResolved.includes(target));
  if (inputs.length === 0) {
    return { packages, inputs: [] };
  }

  if (!existsSync(lockPath)) {
    throw usageError("No flake.lock found. Run 'nixy sync' first.");
  }
  const available = readFlakeInputs(lockPath);
  const unknown = inputs.filter((input) => !available.includes(input));
  const unpinned = unknown.filter(
    (input) => state.packages.includes(input) || state.custom_packages.some((pkg) => pkg.name === input),
  );
  if (unpinned.length > 0) {
    warn("Per-package upgrade is only supported for versioned packages (installed with @version).");
    warn(`Other packages (${unpinned.join(", ")}) are upgraded when you run 'nixy upgrade' without arguments.`);
    return null;
  }
  if (unknown.length > 0) {
    throw usageError(`Unknown input(s): ${unknown.join(", ")}. Available inputs: ${available.join(" ")}`);
  }
  return { packages, inputs };
}

export async function upgrade(context: CommandContext, targets: readonly string[]): Promise<void> {
  const backend = openBackend(context.paths, context.settings);
  const lockPath = flakeLockPath(backend);
  const plan = planUpgrade(backend.load(), lockPath, targets);
  if (!plan) return;

  const updated = await reresolvePackages(context, backend.load(), plan.packages);
  const { inputs } = plan;

  await applyPackageChange(context, backend, {
    description: "upgrade packages",
    extraFiles: [lockPath],
    mutate: (state) => updated.forEach((pkg) => addResolvedPackage(state, pkg)),
    edit: (text) => updated.reduce((current, pkg) => addResolvedPackageEdit(removePackageEdit(current, pkg.name), pkg), text),
    beforeBuild: async () => {
      if (inputs === null) {
        info("Updating all flake inputs...");
        await context.builder.updateAllInputs(backend.profile.directory);
      } else if (inputs.length > 0) {
        info(`Updating inputs: ${inputs.join(", ")}...`);
        await context.builder.updateInputs(backend.profile.directory, inputs);
      }
    },
  });

  success(targets.length > 0 ? `Upgraded: ${targets.join(", ")}` : "All packages upgraded");
}
