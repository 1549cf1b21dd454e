import type { PackageState } from "./types.js";

/** Anything with a scheme (`github:`, `path:`, `git+https:`) is a flake reference. */
export function isFlakeReference(spec: string): boolean {
  return spec.includes(":");
}

/** Replace everything but letters, digits and dashes, then trim dashes. */
export function sanitizeInputName(value: string): string {
  return value.replace(/[^A-Za-z0-9-]/g, "-").replace(/^-+|-+$/g, "");
}

/** `github:user/repo` → `repo`, `path:./foo/bar` → `bar`. */
export function derivePackageNameFromUrl(url: string): string {
  const colon = url.indexOf(":");
  const path = colon === -1 ? url : url.slice(colon + 1);
  const last = path.replace(/\/+$/, "").split("/").pop() ?? "";
  const name = last.replace(/\.git$/, "");
  return name.length === 0 ? "default" : sanitizeInputName(name);
}

/** `github:NixOS/nixpkgs` → `github-NixOS-nixpkgs`; a bare registry name is used as is. */
export function deriveInputNameFromUrl(url: string): string {
  const parts = url.split("/");
  if (parts.length < 2) {
    return sanitizeInputName(url) || "custom-flake";
  }
  const owner = parts[parts.length - 2];
  const repo = parts[parts.length - 1].replace(/\.git$/, "");
  return sanitizeInputName(`${owner}-${repo}`) || "custom-flake";
}

export interface FlakeTarget {
  url: string;
  packageName: string;
}

/** Split `url#pkg`; without a fragment the package is named after the repository. */
export function splitFlakeReference(spec: string): FlakeTarget {
  const hash = spec.indexOf("#");
  if (hash === -1) {
    return { url: spec, packageName: derivePackageNameFromUrl(spec) };
  }
  return { url: spec.slice(0, hash), packageName: spec.slice(hash + 1) };
}

const RESERVED_INPUTS = new Set(["self", "nixpkgs"]);

/**
 * Input name for `url` that clashes with neither the generated inputs nor a
 * custom package pulling a different URL under the same name.
 */
export function uniqueInputName(state: PackageState, base: string, url: string): string {
  const taken = (name: string) =>
    RESERVED_INPUTS.has(name) ||
    name.startsWith("nixpkgs-") ||
    state.custom_packages.some((pkg) => pkg.input_name === name && pkg.input_url !== url);

  const seed = RESERVED_INPUTS.has(base) || base.startsWith("nixpkgs-") ? `custom-${base}` : base;
  let candidate = seed;
  for (let suffix = 2; taken(candidate); suffix += 1) {
    candidate = `${seed}-${suffix}`;
  }
  return candidate;
}
