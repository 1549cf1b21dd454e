import { homedir } from "os";
import { join, resolve } from "path";

export function expandPath(pathValue: string): string {
  if (pathValue === "~") return homedir();
  if (pathValue.startsWith("~/")) return join(homedir(), pathValue.slice(2));
  return resolve(pathValue);
}

export interface NixyPaths {
  configDir: string;
  stateDir: string;
  /** nixy.json, the multi-profile store. */
  storeFile: string;
  settingsFile: string;
  /** Local package definitions shared by every profile. */
  packagesDir: string;
  profilesStateDir: string;
  envLink: string;
  backupsDir: string;
  legacyProfilesDir: string;
  legacyActiveFile: string;
  legacyFlake: string;
}

export function getConfigDir(): string {
  const override = process.env.NIXY_CONFIG_DIR;
  if (override) return expandPath(override);
  const base = process.env.XDG_CONFIG_HOME || join(homedir(), ".config");
  return join(base, "nixy");
}

export function getStateDir(): string {
  const override = process.env.NIXY_STATE_DIR;
  if (override) return expandPath(override);
  const base = process.env.XDG_STATE_HOME || join(homedir(), ".local", "state");
  return join(base, "nixy");
}

export function resolvePaths(): NixyPaths {
  const configDir = getConfigDir();
  const stateDir = getStateDir();
  const envOverride = process.env.NIXY_ENV;
  return {
    configDir,
    stateDir,
    storeFile: join(configDir, "nixy.json"),
    settingsFile: join(configDir, "settings.yaml"),
    packagesDir: join(configDir, "packages"),
    profilesStateDir: join(stateDir, "profiles"),
    envLink: envOverride ? expandPath(envOverride) : join(stateDir, "env"),
    backupsDir: join(stateDir, "backups"),
    legacyProfilesDir: join(configDir, "profiles"),
    legacyActiveFile: join(configDir, "active"),
    legacyFlake: join(configDir, "flake.nix"),
  };
}
