import { PackageStateSchema } from "./config/schema.js";
import { NixyError, ExitCodes, errorMessage } from "./errors.js";
import { atomicWriteFileSync, readTextIfExists } from "./fs-utils.js";
import type { CustomPackage, InstalledPackage, PackageState, ResolvedPackage } from "./types.js";

/** Schema version of packages.json; v1 predates resolved packages. */
export const STATE_VERSION = 2;

export function createPackageState(): PackageState {
  return { version: STATE_VERSION, packages: [], resolved_packages: [], custom_packages: [] };
}

function byName(a: { name: string }, b: { name: string }): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

function sortState(state: PackageState): void {
  state.packages = [...new Set(state.packages)].sort();
  state.resolved_packages.sort(byName);
  state.custom_packages.sort(byName);
}

function evict(state: PackageState, name: string): boolean {
  const before = state.packages.length + state.resolved_packages.length + state.custom_packages.length;
  state.packages = state.packages.filter((existing) => existing !== name);
  state.resolved_packages = state.resolved_packages.filter((pkg) => pkg.name !== name);
  state.custom_packages = state.custom_packages.filter((pkg) => pkg.name !== name);
  const after = state.packages.length + state.resolved_packages.length + state.custom_packages.length;
  return after < before;
}

// Every add goes through evict() first, so a name lives in one category only.

export function addLegacyPackage(state: PackageState, name: string): void {
  evict(state, name);
  state.packages.push(name);
  sortState(state);
}

export function addResolvedPackage(state: PackageState, pkg: ResolvedPackage): void {
  evict(state, pkg.name);
  state.resolved_packages.push(pkg);
  sortState(state);
}

export function addCustomPackage(state: PackageState, pkg: CustomPackage): void {
  evict(state, pkg.name);
  state.custom_packages.push(pkg);
  sortState(state);
}

export function removePackage(state: PackageState, name: string): boolean {
  return evict(state, name);
}

export function hasPackage(state: PackageState, name: string): boolean {
  return findPackage(state, name) !== undefined;
}

export function findPackage(state: PackageState, name: string): InstalledPackage | undefined {
  if (state.packages.includes(name)) {
    return { kind: "plain", name };
  }
  const resolved = state.resolved_packages.find((pkg) => pkg.name === name);
  if (resolved) {
    return { kind: "resolved", name, package: resolved };
  }
  const custom = state.custom_packages.find((pkg) => pkg.name === name);
  if (custom) {
    return { kind: "custom", name, package: custom };
  }
  return undefined;
}

export function allPackageNames(state: PackageState): string[] {
  return [
    ...state.packages,
    ...state.resolved_packages.map((pkg) => pkg.name),
    ...state.custom_packages.map((pkg) => pkg.name),
  ].sort();
}

/**
 * Validate an already-parsed value and bring it up to the current shape.
 * Legacy plain packages stay where they are; only the version moves.
 */
export function migratePackageState(value: unknown, source: string): PackageState {
  const result = PackageStateSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.map(String).join(".")}` : "";
    throw new NixyError(`Invalid package state in ${source}${where}: ${issue?.message ?? "unknown error"}`, ExitCodes.State);
  }
  return upgradePackageState(result.data);
}

export function upgradePackageState(state: PackageState): PackageState {
  if (state.version < STATE_VERSION) {
    state.version = STATE_VERSION;
  }
  sortState(state);
  return state;
}

export function parseJsonFile(raw: string, path: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new NixyError(`Failed to parse ${path}: ${errorMessage(error)}`, ExitCodes.State, { cause: error });
  }
}

export function loadPackageState(path: string): PackageState {
  const raw = readTextIfExists(path);
  if (raw === null) {
    return createPackageState();
  }
  return migratePackageState(parseJsonFile(raw, path), path);
}

export function serializeJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

export function savePackageState(path: string, state: PackageState): void {
  sortState(state);
  atomicWriteFileSync(path, serializeJson(state));
}
