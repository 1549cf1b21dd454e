import { consistencyError, usageError } from "../errors.js";
import type { CustomPackage, ResolvedPackage } from "../types.js";
import {
  MARKERS,
  closeToken,
  extractSectionContent,
  hasMarker,
  insertAfterMarker,
  openToken,
  removeFromMarkerSection,
} from "./editor.js";
import { isDefaultRepository, resolvedInputName } from "./generator.js";

const SYSTEM = "${system}";

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function requireMarker(text: string, name: string): void {
  if (!hasMarker(text, name)) {
    throw consistencyError(
      `flake.nix has no '${openToken(name)}' marker. Run 'nixy sync --regenerate' to rewrite it.`,
    );
  }
}

/**
 * Add `name` to the `outputs = { self, nixpkgs, ... }` parameter list when it
 * is not there yet. Text without such a signature is returned unchanged.
 */
export function addInputParameter(text: string, name: string): string {
  const signature = /outputs\s*=\s*\{([^}]*)\}/;
  const match = signature.exec(text);
  if (!match) return text;
  const params = match[1]
    .split(",")
    .map((param) => param.trim())
    .filter((param) => param.length > 0);
  if (params.includes(name)) return text;
  const ellipsis = params.indexOf("...");
  if (ellipsis === -1) {
    params.push(name);
  } else {
    params.splice(ellipsis, 0, name);
  }
  return text.replace(signature, `outputs = { ${params.join(", ")} }`);
}

function inputUrls(text: string): Map<string, string> {
  const urls = new Map<string, string>();
  for (const match of text.matchAll(/^\s*([A-Za-z_][A-Za-z0-9_'-]*)\.url\s*=\s*"([^"]*)"\s*;/gm)) {
    urls.set(match[1], match[2]);
  }
  return urls;
}

type EntrySection = "packages" | "local" | "custom";

function classifyEntry(line: string, urls: Map<string, string>): EntrySection {
  if (/=\s*pkgs\.[A-Za-z_][A-Za-z0-9_'-]*\s*;\s*$/.test(line)) {
    return "packages";
  }
  const input = /=\s*inputs\.([A-Za-z_][A-Za-z0-9_'-]*)\./.exec(line);
  if (input) {
    const url = urls.get(input[1]) ?? "";
    return url.startsWith("path:") ? "local" : "custom";
  }
  return "local";
}

/**
 * Put marker pairs around the managed regions of a generated, marker-free
 * flake so it can take incremental edits. A file that already has markers is
 * returned unchanged.
 */
export function retrofitMarkers(text: string): string {
  if (hasMarker(text, MARKERS.packages)) return text;

  const lines = text.split("\n");
  const urls = inputUrls(text);
  const out: string[] = [];
  let i = 0;

  const nixpkgsLine = lines.findIndex((line) => /^\s*nixpkgs\.url\s*=/.test(line));
  const entriesStart = lines.findIndex((line) => line.includes("in rec {"));
  const entriesEnd = lines.findIndex((line) => line.includes("default = pkgs.buildEnv {"));
  const pathsStart = lines.findIndex((line) => line.trim() === "paths = [");
  if (nixpkgsLine === -1 || entriesStart === -1 || entriesEnd <= entriesStart || pathsStart <= entriesEnd) {
    throw consistencyError("flake.nix does not have the generated layout; markers cannot be added.");
  }

  for (; i <= nixpkgsLine; i += 1) out.push(lines[i]);
  out.push(`    ${openToken(MARKERS.customInputs)}`);
  for (; i < lines.length && lines[i].trim() !== "};"; i += 1) out.push(lines[i]);
  out.push(`    ${closeToken(MARKERS.customInputs)}`);
  out.push(`    ${openToken(MARKERS.localInputs)}`);
  out.push(`    ${closeToken(MARKERS.localInputs)}`);

  for (; i <= entriesStart; i += 1) out.push(lines[i]);
  const sections: Record<EntrySection, string[]> = { packages: [], local: [], custom: [] };
  for (; i < entriesEnd; i += 1) {
    if (lines[i].trim() === "") continue;
    sections[classifyEntry(lines[i], urls)].push(lines[i]);
  }
  const wrap = (name: string, body: string[]) => [
    `          ${openToken(name)}`,
    ...body,
    `          ${closeToken(name)}`,
  ];
  out.push(
    ...wrap(MARKERS.packages, sections.packages),
    ...wrap(MARKERS.localPackages, sections.local),
    ...wrap(MARKERS.customPackages, sections.custom),
    "",
  );

  for (; i <= pathsStart; i += 1) out.push(lines[i]);
  out.push(`              ${openToken(MARKERS.envPaths)}`);
  for (; i < lines.length && !lines[i].trim().startsWith("]"); i += 1) out.push(lines[i]);
  out.push(`              ${closeToken(MARKERS.envPaths)}`);
  for (; i < lines.length; i += 1) out.push(lines[i]);

  return out.join("\n");
}

export function rejectPlatforms(platforms: readonly string[] | undefined): void {
  if (platforms && platforms.length > 0) {
    throw usageError(
      "Platform-restricted packages need a generated flake.nix. Run 'nixy sync --regenerate' first.",
    );
  }
}

function addEnvPath(text: string, name: string): string {
  // Older marker files have no env-paths section; their environment is assembled elsewhere.
  if (!hasMarker(text, MARKERS.envPaths)) return text;
  return insertAfterMarker(text, MARKERS.envPaths, `              ${name}`);
}

function declareInput(text: string, name: string, url: string): string {
  requireMarker(text, MARKERS.customInputs);
  const declared = new RegExp(`^\\s*${escapeRegExp(name)}\\.url\\s*=`, "m");
  const existing = extractSectionContent(text, MARKERS.customInputs) + extractSectionContent(text, MARKERS.localInputs);
  if (declared.test(existing)) return text;
  const withInput = insertAfterMarker(text, MARKERS.customInputs, `    ${name}.url = "${url}";`);
  return addInputParameter(withInput, name);
}

export function addPlainPackageEdit(text: string, name: string): string {
  requireMarker(text, MARKERS.packages);
  const withEntry = insertAfterMarker(text, MARKERS.packages, `          ${name} = pkgs.${name};`);
  return addEnvPath(withEntry, name);
}

export function addResolvedPackageEdit(text: string, pkg: ResolvedPackage): string {
  rejectPlatforms(pkg.platforms);
  requireMarker(text, MARKERS.customPackages);
  const input = resolvedInputName(pkg.commit_hash);
  const withInput = declareInput(text, input, `github:NixOS/nixpkgs/${pkg.commit_hash}`);
  const withEntry = insertAfterMarker(
    withInput,
    MARKERS.customPackages,
    `          ${pkg.name} = inputs.${input}.legacyPackages.${SYSTEM}.${pkg.attribute_path};`,
  );
  return addEnvPath(withEntry, pkg.name);
}

export function addCustomPackageEdit(text: string, pkg: CustomPackage, nixpkgsUrl?: string): string {
  rejectPlatforms(pkg.platforms);
  requireMarker(text, MARKERS.customPackages);
  const reuse = isDefaultRepository(pkg.input_url, nixpkgsUrl);
  const input = reuse ? "nixpkgs" : pkg.input_name;
  const withInput = reuse ? text : declareInput(text, input, pkg.input_url);
  const withEntry = insertAfterMarker(
    withInput,
    MARKERS.customPackages,
    `          ${pkg.name} = inputs.${input}.${pkg.package_output}.${SYSTEM}.${pkg.source_name ?? pkg.name};`,
  );
  return addEnvPath(withEntry, pkg.name);
}

export function addLocalPackageEdit(text: string, name: string, expression: string): string {
  requireMarker(text, MARKERS.localPackages);
  const withEntry = insertAfterMarker(text, MARKERS.localPackages, `          ${name} = ${expression};`);
  return addEnvPath(withEntry, name);
}

/** Remove every binding and env path for `name` from the managed sections. */
export function removePackageEdit(text: string, name: string): string {
  const binding = new RegExp(`^\\s*${escapeRegExp(name)}\\s*=`);
  const pathLine = new RegExp(`^\\s*${escapeRegExp(name)}\\s*$`);
  let result = text;
  for (const marker of [MARKERS.packages, MARKERS.localPackages, MARKERS.customPackages]) {
    result = removeFromMarkerSection(result, marker, binding);
  }
  return removeFromMarkerSection(result, MARKERS.envPaths, pathLine);
}
