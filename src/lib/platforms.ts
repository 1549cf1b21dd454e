import { usageError } from "./errors.js";

export const ALL_SYSTEMS = [
  "x86_64-linux",
  "aarch64-linux",
  "x86_64-darwin",
  "aarch64-darwin",
] as const;

export type System = (typeof ALL_SYSTEMS)[number];

const ALIASES = new Map<string, readonly System[]>([
  ["darwin", ["aarch64-darwin", "x86_64-darwin"]],
  ["macos", ["aarch64-darwin", "x86_64-darwin"]],
  ["linux", ["aarch64-linux", "x86_64-linux"]],
]);

function isSystem(value: string): value is System {
  return ALL_SYSTEMS.some((system) => system === value);
}

/**
 * Expand aliases and full system names into a sorted, duplicate-free list.
 * Matching is case-insensitive.
 */
export function normalizePlatforms(platforms: readonly string[]): string[] {
  const result = new Set<string>();
  for (const raw of platforms) {
    const value = raw.trim().toLowerCase();
    const alias = ALIASES.get(value);
    if (alias) {
      alias.forEach((system) => result.add(system));
    } else if (isSystem(value)) {
      result.add(value);
    } else {
      const valid = [...ALIASES.keys(), ...ALL_SYSTEMS].join(", ");
      throw usageError(`Invalid platform '${raw}'. Valid platforms: ${valid}`);
    }
  }
  return [...result].sort();
}
