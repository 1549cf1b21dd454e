import { z } from "zod";
import { ALL_SYSTEMS } from "../platforms.js";

export const DEFAULT_NIXPKGS_URL = "github:NixOS/nixpkgs/nixos-unstable";
export const DEFAULT_SEARCH_ENDPOINT = "https://search.devbox.sh";

// Files written by older releases carry `null` for absent optionals.
const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined)
  .optional();

const optionalPlatforms = z
  .array(z.string())
  .nullish()
  .transform((value) => value ?? undefined)
  .optional();

// ─────────────────────────────────────────────────────────────────────────────
// Package state (packages.json, and each profile inside nixy.json)
// ─────────────────────────────────────────────────────────────────────────────

export const ResolvedPackageSchema = z.object({
  name: z.string().min(1),
  version_spec: optionalString,
  resolved_version: z.string(),
  attribute_path: z.string().min(1),
  commit_hash: z.string().min(1),
  platforms: optionalPlatforms,
});

export type ResolvedPackage = z.infer<typeof ResolvedPackageSchema>;

export const CustomPackageSchema = z.object({
  name: z.string().min(1),
  input_name: z.string().min(1),
  input_url: z.string().min(1),
  package_output: z.string().default("packages"),
  source_name: optionalString,
  platforms: optionalPlatforms,
});

export type CustomPackage = z.infer<typeof CustomPackageSchema>;

export const PackageStateSchema = z.object({
  version: z.number().int().nonnegative().default(1),
  packages: z.array(z.string()).default([]),
  resolved_packages: z.array(ResolvedPackageSchema).default([]),
  custom_packages: z.array(CustomPackageSchema).default([]),
});

export type PackageState = z.infer<typeof PackageStateSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Profile store (nixy.json)
// ─────────────────────────────────────────────────────────────────────────────

export const NixyConfigSchema = z.object({
  version: z.number().int().nonnegative().default(1),
  active_profile: z.string().default("default"),
  profiles: z.record(z.string(), PackageStateSchema).default({}),
});

export type NixyConfig = z.infer<typeof NixyConfigSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// User settings (settings.yaml)
// ─────────────────────────────────────────────────────────────────────────────

export const SettingsSchema = z.object({
  nixpkgs_url: z.string().min(1).default(DEFAULT_NIXPKGS_URL),
  systems: z.array(z.string().min(1)).min(1).default([...ALL_SYSTEMS]),
  search_endpoint: z.url().default(DEFAULT_SEARCH_ENDPOINT),
  allow_unfree: z.boolean().default(true),
  auto_migrate: z.boolean().default(true),
  backup_retention: z.number().int().min(1).max(100).default(3),
});

export type Settings = z.infer<typeof SettingsSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// flake.lock (only the parts we read)
// ─────────────────────────────────────────────────────────────────────────────

export const FlakeLockSchema = z.object({
  root: z.string().default("root"),
  nodes: z.record(
    z.string(),
    z.object({
      inputs: z.record(z.string(), z.unknown()).optional(),
    }),
  ),
});

export type FlakeLock = z.infer<typeof FlakeLockSchema>;

/** The part of `nix flake prefetch --json` output nixy reads. */
export const FlakePrefetchSchema = z.object({
  storePath: z.string().min(1),
});
