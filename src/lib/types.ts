import type { CustomPackage, ResolvedPackage } from "./config/schema.js";

export type {
  CustomPackage,
  NixyConfig,
  PackageState,
  ResolvedPackage,
  Settings,
} from "./config/schema.js";

/** A `.nix` file in the packages directory. Derived on every scan, never persisted. */
export interface LocalPackage {
  name: string;
  /** File name inside the packages directory. */
  file: string;
  input_name?: string;
  input_url?: string;
  overlay?: string;
  package_expr?: string;
}

/** A packages subdirectory holding its own flake.nix. */
export interface LocalFlake {
  name: string;
}

export interface LocalScan {
  packages: LocalPackage[];
  flakes: LocalFlake[];
}

export type InstalledPackage =
  | { kind: "plain"; name: string }
  | { kind: "resolved"; name: string; package: ResolvedPackage }
  | { kind: "custom"; name: string; package: CustomPackage }
  | { kind: "local"; name: string; package: LocalPackage }
  | { kind: "local-flake"; name: string };

export type PackageKind = InstalledPackage["kind"];

export interface Profile {
  name: string;
  /** Directory holding the profile's flake.nix and flake.lock. */
  directory: string;
  configFilePath: string;
  localPackagesDirectory: string;
}

export type MessageLevel = "info" | "success" | "warning" | "error";

export interface PackageRow {
  name: string;
  kind: PackageKind;
  detail: string;
  platforms?: string[];
}

export interface SearchResult {
  name: string;
  summary: string;
  lastUpdated?: string;
}

export interface ResolvedRelease {
  name: string;
  version: string;
  attribute_path: string;
  commit_hash: string;
}
