/**
 * Folding the pre-nixy.json layouts into the profile store.
 *
 * Legacy layout: `<config>/profiles/<name>/{flake.nix,flake.lock,packages.json,packages/}`
 * plus an `<config>/active` pointer. Older still: a single `<config>/flake.nix`
 * with its state kept only in marker sections.
 */

import { copyFileSync, cpSync, existsSync, mkdirSync, readFileSync, readdirSync, statSync } from "fs";
import { join, resolve } from "path";
import type { NixyPaths } from "./config/path.js";
import { hasAnyMarker } from "./flake/editor.js";
import { recoverStateFromMarkers } from "./flake/legacy-recovery.js";
import { DEFAULT_PROFILE, STORE_VERSION, normalizeNixyConfig, saveNixyConfig } from "./nixy-config.js";
import { info, success, warn } from "./output.js";
import { createPackageState, loadPackageState } from "./package-state.js";
import { PROFILE_NAME_PATTERN, getLegacyProfile, legacyStatePath, readLegacyActiveProfile } from "./profile.js";
import type { NixyConfig, PackageState } from "./types.js";

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

function legacyProfileNames(paths: NixyPaths): string[] {
  if (!isDirectory(paths.legacyProfilesDir)) return [];
  return readdirSync(paths.legacyProfilesDir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
}

export function hasLegacyLayout(paths: NixyPaths): boolean {
  return (
    legacyProfileNames(paths).length > 0 || existsSync(paths.legacyActiveFile) || existsSync(paths.legacyFlake)
  );
}

export function needsMigration(paths: NixyPaths): boolean {
  return !existsSync(paths.storeFile) && hasLegacyLayout(paths);
}

/** State for a legacy flake directory: packages.json first, then its marker sections. */
export function recoverProfileState(label: string, statePath: string, flakePath: string): PackageState {
  if (existsSync(statePath)) {
    return loadPackageState(statePath);
  }
  if (existsSync(flakePath)) {
    const text = readFileSync(flakePath, "utf-8");
    if (hasAnyMarker(text)) {
      const { state, warnings } = recoverStateFromMarkers(text);
      for (const message of warnings) {
        warn(`Profile '${label}': ${message}`);
      }
      return state;
    }
  }
  return createPackageState();
}

function copyIfExists(from: string, to: string): void {
  if (existsSync(from)) {
    copyFileSync(from, to);
  }
}

/** Copy entries of `sourceDir` into `targetDir`, never overwriting. */
export function mergeLocalPackages(sourceDir: string, targetDir: string): string[] {
  if (!isDirectory(sourceDir) || resolve(sourceDir) === resolve(targetDir)) return [];
  mkdirSync(targetDir, { recursive: true });
  const skipped: string[] = [];
  for (const entry of readdirSync(sourceDir)) {
    const target = join(targetDir, entry);
    if (existsSync(target)) {
      skipped.push(entry);
      continue;
    }
    cpSync(join(sourceDir, entry), target, { recursive: true });
  }
  return skipped;
}

function migrateFlakeFiles(paths: NixyPaths, name: string, flakeDir: string, packagesDir: string): void {
  const target = join(paths.profilesStateDir, name);
  mkdirSync(target, { recursive: true });
  copyIfExists(join(flakeDir, "flake.nix"), join(target, "flake.nix"));
  copyIfExists(join(flakeDir, "flake.lock"), join(target, "flake.lock"));
  for (const entry of mergeLocalPackages(packagesDir, paths.packagesDir)) {
    warn(`Local package '${entry}' from profile '${name}' already exists in ${paths.packagesDir}; kept the existing one.`);
  }
}

/**
 * Build a profile store from the legacy layout and copy each profile's flake
 * files to the state directory. Nothing is written to nixy.json here.
 */
export function migrateToNixyConfig(paths: NixyPaths): NixyConfig {
  const config: NixyConfig = { version: STORE_VERSION, active_profile: DEFAULT_PROFILE, profiles: {} };

  for (const name of legacyProfileNames(paths)) {
    if (!PROFILE_NAME_PATTERN.test(name)) {
      warn(`Skipping legacy profile directory '${name}': not a valid profile name.`);
      continue;
    }
    const profile = getLegacyProfile(paths, name);
    config.profiles[name] = recoverProfileState(name, legacyStatePath(profile), profile.configFilePath);
    migrateFlakeFiles(paths, name, profile.directory, profile.localPackagesDirectory);
  }

  if (existsSync(paths.legacyFlake) && !Object.hasOwn(config.profiles, DEFAULT_PROFILE)) {
    config.profiles[DEFAULT_PROFILE] = recoverProfileState(
      DEFAULT_PROFILE,
      join(paths.configDir, "packages.json"),
      paths.legacyFlake,
    );
    migrateFlakeFiles(paths, DEFAULT_PROFILE, paths.configDir, join(paths.configDir, "packages"));
  }

  config.active_profile = readLegacyActiveProfile(paths);
  normalizeNixyConfig(config);
  return config;
}

export function runMigration(paths: NixyPaths): NixyConfig {
  info("Migrating to the nixy.json configuration format...");
  const config = migrateToNixyConfig(paths);
  saveNixyConfig(paths.storeFile, config);
  success("Migration complete! Your configuration has been updated.");
  info(`Configuration is now stored in: ${paths.storeFile}`);
  info(`Generated files are now in: ${paths.profilesStateDir}`);
  return config;
}
