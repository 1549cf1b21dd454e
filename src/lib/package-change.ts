import { join } from "path";
import type { StateBackend } from "./backend.js";
import { createBackup, pruneBackups } from "./backup.js";
import type { NixyPaths } from "./config/path.js";
import { computeDiffCounts, computeUnifiedDiff, describeDrift, formatHunks } from "./diff.js";
import { consistencyError } from "./errors.js";
import { hasAnyMarker } from "./flake/editor.js";
import { isManagedFlake } from "./flake/generator.js";
import { retrofitMarkers } from "./flake/marker-edits.js";
import { atomicWriteFileSync, readTextIfExists } from "./fs-utils.js";
import type { Builder } from "./nix.js";
import { detail, warn } from "./output.js";
import { createRollbackContext, type RollbackController } from "./rollback.js";
import { runTransaction, type TransactionProgress } from "./transaction.js";
import type { PackageState, Settings } from "./types.js";

/** What a mutating command needs from its surroundings. */
export interface ChangeContext {
  paths: NixyPaths;
  settings: Settings;
  builder: Builder;
  controller: RollbackController;
  /** Overwrite a hand-edited flake.nix after backing it up. */
  force: boolean;
}

export interface PackageChange {
  /** Lower-case verb phrase used in messages, e.g. `install ripgrep`. */
  description: string;
  mutate(state: PackageState): void;
  /** In-place edit for a marker-based flake.nix; without it the file is regenerated. */
  edit?(text: string): string;
  /** Files beyond the state file and flake.nix that the change may rewrite. */
  extraFiles?: readonly string[];
  /** File operations done before the state changes; register them on `progress`. */
  prepare?(progress: TransactionProgress): void;
  /** Runs once flake.nix is written, before the build (e.g. `nix flake update`). */
  beforeBuild?(): Promise<void>;
}

export function backupFlake(context: ChangeContext, backend: StateBackend): string | null {
  const owner = backend.profile.name;
  const backupPath = createBackup(context.paths.backupsDir, backend.profile.configFilePath, owner);
  pruneBackups(context.paths.backupsDir, owner, context.settings.backup_retention);
  if (backupPath) {
    warn(`Backed up the previous flake.nix to ${backupPath}`);
  }
  return backupPath;
}

/**
 * Refuse to overwrite a marker-free flake.nix that no longer matches what the
 * state renders to. With `force`, a hand-edited (but nixy-generated) file is
 * backed up and the change goes ahead.
 */
export function checkFlakeConsistency(context: ChangeContext, backend: StateBackend, state: PackageState): void {
  const flakePath = backend.profile.configFilePath;
  const existing = readTextIfExists(flakePath);
  if (existing === null || hasAnyMarker(existing)) return;

  const rendered = backend.render(state);
  if (existing === rendered) return;

  const drift = describeDrift(computeDiffCounts(existing, rendered));
  if (!isManagedFlake(existing)) {
    throw consistencyError(`${flakePath} is not managed by nixy (${drift}). Move it aside and run 'nixy sync --regenerate'.`);
  }
  if (!context.force) {
    formatHunks(computeUnifiedDiff(existing, rendered, flakePath, "rendered")).forEach((line) => detail(line));
    throw consistencyError(
      `${flakePath} was modified outside nixy (${drift}). Re-run with --force to overwrite it; a backup is kept.`,
    );
  }
  backupFlake(context, backend);
}

function hasPlatformRestrictions(state: PackageState): boolean {
  return [...state.resolved_packages, ...state.custom_packages].some((pkg) => (pkg.platforms ?? []).length > 0);
}

/**
 * A marker-based legacy flake takes the change as an edit. A marker-free
 * legacy flake that is still exactly the generated text gets its markers back
 * first, unless the new state has platform restrictions the edits cannot express.
 * Everything else is regenerated.
 */
function nextFlakeText(backend: StateBackend, change: PackageChange, state: PackageState, generated: boolean): string {
  const existing = readTextIfExists(backend.profile.configFilePath);
  if (!backend.editsMarkers || existing === null || !change.edit) {
    return backend.render(state);
  }
  if (hasAnyMarker(existing)) {
    return change.edit(existing);
  }
  if (generated && !hasPlatformRestrictions(state)) {
    return change.edit(retrofitMarkers(existing));
  }
  return backend.render(state);
}

/**
 * The mutating flow shared by install, uninstall and upgrade: check the flake,
 * snapshot, change the state, write the flake, build. Any failure restores
 * the snapshot.
 */
export async function applyPackageChange(
  context: ChangeContext,
  backend: StateBackend,
  change: PackageChange,
): Promise<PackageState> {
  const { profile } = backend;
  const state = backend.load();
  checkFlakeConsistency(context, backend, state);
  const existing = readTextIfExists(profile.configFilePath);
  const generated = existing !== null && !hasAnyMarker(existing) && existing === backend.render(state);

  const snapshot = createRollbackContext(backend.format, profile.name, profile.directory, [
    backend.statePath,
    profile.configFilePath,
    ...(change.extraFiles ?? []),
  ]);

  return runTransaction(context.controller, snapshot, change.description, async (progress) => {
    if (change.prepare) {
      progress.step("preparing files");
      change.prepare(progress);
    }

    progress.step("saving package state");
    change.mutate(state);
    backend.save(state);

    progress.step("writing flake.nix");
    atomicWriteFileSync(profile.configFilePath, nextFlakeText(backend, change, state, generated));

    if (change.beforeBuild) {
      progress.step("updating flake inputs");
      await change.beforeBuild();
    }

    progress.step("building environment");
    await context.builder.build(profile.directory, "default", context.paths.envLink);
    return state;
  });
}

export function flakeLockPath(backend: StateBackend): string {
  return join(backend.profile.directory, "flake.lock");
}
