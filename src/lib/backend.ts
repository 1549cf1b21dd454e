import { existsSync } from "fs";
import type { NixyPaths } from "./config/path.js";
import { renderFlake, type RenderOptions } from "./flake/generator.js";
import { hasLegacyLayout, recoverProfileState, runMigration } from "./migration.js";
import { getProfileState, loadNixyConfig, updateNixyConfig } from "./nixy-config.js";
import { savePackageState } from "./package-state.js";
import { getLegacyProfile, getProfile, legacyStatePath, readLegacyActiveProfile, singleFileProfile } from "./profile.js";
import type { StateFormat } from "./rollback.js";
import type { PackageState, Profile, Settings } from "./types.js";

/** Where one profile's package state is persisted, and how its flake is laid out. */
export interface StateBackend {
  readonly format: StateFormat;
  readonly profile: Profile;
  /** The file holding the state; snapshotted before every change. */
  readonly statePath: string;
  /** Whether a marker-based flake.nix is edited in place rather than regenerated. */
  readonly editsMarkers: boolean;
  load(): PackageState;
  save(state: PackageState): void;
  render(state: PackageState): string;
}

function renderOptions(settings: Settings, localPaths: RenderOptions["localPaths"]): RenderOptions {
  return { nixpkgsUrl: settings.nixpkgs_url, systems: settings.systems, localPaths };
}

/** A profile inside nixy.json; its flake lives in the state directory. */
export class ProfileStoreBackend implements StateBackend {
  readonly format = "profiles";
  readonly editsMarkers = false;
  readonly profile: Profile;

  constructor(
    private readonly paths: NixyPaths,
    private readonly settings: Settings,
    profileName: string,
  ) {
    this.profile = getProfile(paths, profileName);
  }

  get statePath(): string {
    return this.paths.storeFile;
  }

  load(): PackageState {
    return getProfileState(loadNixyConfig(this.paths.storeFile), this.profile.name);
  }

  save(state: PackageState): void {
    updateNixyConfig(this.paths.storeFile, (config) => {
      config.profiles[this.profile.name] = state;
    });
  }

  render(state: PackageState): string {
    return renderFlake(
      state,
      this.profile.localPackagesDirectory,
      renderOptions(this.settings, "absolute"),
    );
  }
}

/** A profile of the pre-nixy.json layout: packages.json beside its flake. */
export class LegacyBackend implements StateBackend {
  readonly format = "legacy";
  readonly editsMarkers = true;

  constructor(
    readonly profile: Profile,
    private readonly settings: Settings,
  ) {}

  get statePath(): string {
    return legacyStatePath(this.profile);
  }

  /** Without a packages.json, the state is read back from the flake's marker sections. */
  load(): PackageState {
    return recoverProfileState(this.profile.name, this.statePath, this.profile.configFilePath);
  }

  save(state: PackageState): void {
    savePackageState(this.statePath, state);
  }

  render(state: PackageState): string {
    return renderFlake(state, this.profile.localPackagesDirectory, renderOptions(this.settings, "relative"));
  }
}

/** The active legacy profile, or the single-file layout when there are no profile directories. */
export function activeLegacyProfile(paths: NixyPaths): Profile {
  const profile = getLegacyProfile(paths, readLegacyActiveProfile(paths));
  if (!existsSync(profile.directory) && existsSync(paths.legacyFlake)) {
    return singleFileProfile(paths);
  }
  return profile;
}

/**
 * Open the state backend for the active profile. A legacy layout is migrated
 * first when `auto_migrate` is on, and used in place when it is off.
 */
export function openBackend(paths: NixyPaths, settings: Settings): StateBackend {
  if (!existsSync(paths.storeFile) && hasLegacyLayout(paths)) {
    if (!settings.auto_migrate) {
      return new LegacyBackend(activeLegacyProfile(paths), settings);
    }
    runMigration(paths);
  }
  const config = loadNixyConfig(paths.storeFile);
  return new ProfileStoreBackend(paths, settings, config.active_profile);
}

export function usesLegacyLayout(paths: NixyPaths, settings: Settings): boolean {
  return !settings.auto_migrate && !existsSync(paths.storeFile) && hasLegacyLayout(paths);
}
