import { existsSync, rmSync } from "fs";
import { join } from "path";
import { openBackend, ProfileStoreBackend, usesLegacyLayout } from "../lib/backend.js";
import { createBackup } from "../lib/backup.js";
import { usageError, validationError } from "../lib/errors.js";
import { hasAnyMarker } from "../lib/flake/editor.js";
import { atomicWriteFileSync, readTextIfExists } from "../lib/fs-utils.js";
import {
  createProfile,
  deleteProfile,
  getProfileState,
  listProfiles,
  loadNixyConfig,
  profileExists,
  setActiveProfile,
  updateNixyConfig,
} from "../lib/nixy-config.js";
import { info, showProfiles, success, warn } from "../lib/output.js";
import { getProfile, validateProfileName } from "../lib/profile.js";
import { createRollbackContext } from "../lib/rollback.js";
import { runTransaction } from "../lib/transaction.js";
import type { NixyConfig } from "../lib/types.js";
import type { CommandContext } from "./context.js";

/** Profile commands work on nixy.json; a legacy layout is migrated first, or refused. */
function openProfileStore(context: CommandContext): NixyConfig {
  if (usesLegacyLayout(context.paths, context.settings)) {
    throw usageError("Profile management needs the nixy.json layout. Run 'nixy migrate' first.");
  }
  openBackend(context.paths, context.settings);
  return loadNixyConfig(context.paths.storeFile);
}

export function showActiveProfile(context: CommandContext): void {
  info(`Active profile: ${openProfileStore(context).active_profile}`);
}

export function listProfilesCommand(context: CommandContext): void {
  const config = openProfileStore(context);
  showProfiles(listProfiles(config), config.active_profile);
}

export interface SwitchOptions {
  create: boolean;
}

export async function switchProfile(context: CommandContext, name: string | undefined, options: SwitchOptions): Promise<void> {
  if (!name) {
    throw usageError("Usage: nixy profile switch [-c] <name>");
  }
  validateProfileName(name);
  const config = openProfileStore(context);
  const exists = profileExists(config, name);
  if (!exists && !options.create) {
    throw usageError(`Profile '${name}' does not exist. Use -c to create it: nixy profile switch -c ${name}`);
  }

  const profile = getProfile(context.paths, name);
  const snapshot = createRollbackContext("profiles", name, profile.directory, [
    context.paths.storeFile,
    profile.configFilePath,
    join(profile.directory, "flake.lock"),
  ]);

  await runTransaction(context.controller, snapshot, `switch to profile '${name}'`, async (progress) => {
    progress.step("saving profile store");
    if (!exists) {
      info(`Creating profile '${name}'...`);
    }
    info(`Switching to profile '${name}'...`);
    const saved = updateNixyConfig(context.paths.storeFile, (current) => {
      if (!exists) {
        createProfile(current, name);
      }
      setActiveProfile(current, name);
    });

    progress.step("writing flake.nix");
    if (!existsSync(profile.directory)) {
      progress.created(profile.directory);
    }
    const backend = new ProfileStoreBackend(context.paths, context.settings, name);
    const existing = readTextIfExists(profile.configFilePath);
    if (existing === null || hasAnyMarker(existing)) {
      atomicWriteFileSync(profile.configFilePath, backend.render(getProfileState(saved, name)));
    }

    progress.step("building environment");
    info(`Building environment for profile '${name}'...`);
    await context.builder.build(profile.directory, "default", context.paths.envLink);
  });
  success(`Switched to profile '${name}'`);
}

export interface DeleteOptions {
  force: boolean;
}

export function deleteProfileCommand(context: CommandContext, name: string | undefined, options: DeleteOptions): void {
  if (!name) {
    throw usageError("Usage: nixy profile delete <name> --force");
  }
  validateProfileName(name);
  const config = openProfileStore(context);
  if (!profileExists(config, name)) {
    throw usageError(`Profile '${name}' does not exist`);
  }
  if (config.active_profile === name) {
    throw validationError("Cannot delete the active profile. Switch to another profile first.");
  }
  if (!options.force) {
    warn(`This will delete profile '${name}' and all its packages.`);
    throw usageError("Use --force to confirm deletion.");
  }

  info(`Deleting profile '${name}'...`);
  updateNixyConfig(context.paths.storeFile, (current) => {
    deleteProfile(current, name);
  });
  const { directory } = getProfile(context.paths, name);
  if (existsSync(directory)) {
    const backupPath = createBackup(context.paths.backupsDir, directory, name);
    rmSync(directory, { recursive: true, force: true });
    if (backupPath) {
      info(`Kept a copy of its generated files in ${backupPath}`);
    }
  }
  success(`Deleted profile '${name}'`);
}
