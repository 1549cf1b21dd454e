import { existsSync, readFileSync } from "fs";
import { join } from "path";
import type { NixyPaths } from "./config/path.js";
import { validationError } from "./errors.js";
import type { Profile } from "./types.js";

export const PROFILE_NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

export function validateProfileName(name: string): void {
  if (!PROFILE_NAME_PATTERN.test(name)) {
    throw validationError(
      `Invalid profile name '${name}'. Use only letters, numbers, dashes and underscores.`,
    );
  }
}

/** A profile from nixy.json: its flake lives in the state directory. */
export function getProfile(paths: NixyPaths, name: string): Profile {
  validateProfileName(name);
  const directory = join(paths.profilesStateDir, name);
  return {
    name,
    directory,
    configFilePath: join(directory, "flake.nix"),
    localPackagesDirectory: paths.packagesDir,
  };
}

/** A profile of the pre-nixy.json layout, with everything under one directory. */
export function getLegacyProfile(paths: NixyPaths, name: string): Profile {
  validateProfileName(name);
  const directory = join(paths.legacyProfilesDir, name);
  return {
    name,
    directory,
    configFilePath: join(directory, "flake.nix"),
    localPackagesDirectory: join(directory, "packages"),
  };
}

/** The oldest layout: one flake.nix directly in the configuration directory. */
export function singleFileProfile(paths: NixyPaths): Profile {
  return {
    name: "default",
    directory: paths.configDir,
    configFilePath: paths.legacyFlake,
    localPackagesDirectory: paths.packagesDir,
  };
}

export function legacyStatePath(profile: Profile): string {
  return join(profile.directory, "packages.json");
}

export function readLegacyActiveProfile(paths: NixyPaths): string {
  if (!existsSync(paths.legacyActiveFile)) {
    return "default";
  }
  const name = readFileSync(paths.legacyActiveFile, "utf-8").trim();
  return name.length > 0 && PROFILE_NAME_PATTERN.test(name) ? name : "default";
}
