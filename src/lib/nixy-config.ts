import { NixyConfigSchema } from "./config/schema.js";
import { NixyError, ExitCodes, usageError, validationError } from "./errors.js";
import { atomicWriteFileSync, readTextIfExists, withFileLockSync } from "./fs-utils.js";
import { createPackageState, parseJsonFile, serializeJson, upgradePackageState } from "./package-state.js";
import { validateProfileName } from "./profile.js";
import type { NixyConfig, PackageState } from "./types.js";

/** Schema version of nixy.json. */
export const STORE_VERSION = 3;
export const DEFAULT_PROFILE = "default";

export function createNixyConfig(): NixyConfig {
  return {
    version: STORE_VERSION,
    active_profile: DEFAULT_PROFILE,
    profiles: { [DEFAULT_PROFILE]: createPackageState() },
  };
}

/**
 * Re-establish the store invariants: a default profile exists and the active
 * pointer names an existing profile. The file is hand-editable, so this runs
 * on every load.
 */
export function normalizeNixyConfig(config: NixyConfig): void {
  if (!profileExists(config, DEFAULT_PROFILE)) {
    config.profiles[DEFAULT_PROFILE] = createPackageState();
  }
  if (!profileExists(config, config.active_profile)) {
    config.active_profile = DEFAULT_PROFILE;
  }
}

export function parseNixyConfig(value: unknown, source: string): NixyConfig {
  const result = NixyConfigSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.map(String).join(".")}` : "";
    throw new NixyError(`Invalid profile store ${source}${where}: ${issue?.message ?? "unknown error"}`, ExitCodes.State);
  }
  const config = result.data;
  // Profiles go through the same upgrade as a standalone packages.json.
  Object.values(config.profiles).forEach(upgradePackageState);
  if (config.version < STORE_VERSION) {
    config.version = STORE_VERSION;
  }
  normalizeNixyConfig(config);
  return config;
}

export function loadNixyConfig(path: string): NixyConfig {
  const raw = readTextIfExists(path);
  if (raw === null) {
    return createNixyConfig();
  }
  return parseNixyConfig(parseJsonFile(raw, path), path);
}

export function serializeNixyConfig(config: NixyConfig): string {
  const profiles: Record<string, PackageState> = {};
  for (const name of Object.keys(config.profiles).sort()) {
    profiles[name] = config.profiles[name];
  }
  return serializeJson({ version: config.version, active_profile: config.active_profile, profiles });
}

function writeNixyConfig(path: string, config: NixyConfig): void {
  normalizeNixyConfig(config);
  atomicWriteFileSync(path, serializeNixyConfig(config));
}

export function saveNixyConfig(path: string, config: NixyConfig): void {
  withFileLockSync(path, () => {
    writeNixyConfig(path, config);
  });
}

/** Load, change and save the store under one lock, so writers to other profiles are not lost. */
export function updateNixyConfig(path: string, mutate: (config: NixyConfig) => void): NixyConfig {
  return withFileLockSync(path, () => {
    const config = loadNixyConfig(path);
    mutate(config);
    writeNixyConfig(path, config);
    return config;
  });
}

export function profileExists(config: NixyConfig, name: string): boolean {
  return Object.hasOwn(config.profiles, name);
}

export function listProfiles(config: NixyConfig): string[] {
  return Object.keys(config.profiles).sort();
}

export function getProfileState(config: NixyConfig, name: string): PackageState {
  if (!profileExists(config, name)) {
    throw usageError(`Profile '${name}' does not exist`);
  }
  return config.profiles[name];
}

export function getActiveProfileState(config: NixyConfig): PackageState {
  return getProfileState(config, config.active_profile);
}

/** Returns false when the profile already existed. */
export function createProfile(config: NixyConfig, name: string): boolean {
  validateProfileName(name);
  if (profileExists(config, name)) {
    return false;
  }
  config.profiles[name] = createPackageState();
  return true;
}

export function setActiveProfile(config: NixyConfig, name: string): void {
  validateProfileName(name);
  if (!profileExists(config, name)) {
    throw usageError(`Profile '${name}' does not exist. Use -c to create it.`);
  }
  config.active_profile = name;
}

export function deleteProfile(config: NixyConfig, name: string): void {
  validateProfileName(name);
  if (!profileExists(config, name)) {
    throw usageError(`Profile '${name}' does not exist`);
  }
  if (config.active_profile === name) {
    throw validationError("Cannot delete the active profile. Switch to another profile first.");
  }
  delete config.profiles[name];
}
