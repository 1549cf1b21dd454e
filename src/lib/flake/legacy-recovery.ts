import { addCustomPackage, addLegacyPackage, createPackageState } from "../package-state.js";
import type { PackageState } from "../types.js";
import { MARKERS, extractSectionContent } from "./editor.js";

const PLAIN_BINDING = /^\s*([A-Za-z_][A-Za-z0-9_'-]*)\s*=\s*pkgs\.([A-Za-z_][A-Za-z0-9_'-]*)\s*;\s*$/;
const CUSTOM_BINDING =
  /^\s*([A-Za-z_][A-Za-z0-9_'-]*)\s*=\s*inputs\.([A-Za-z_][A-Za-z0-9_'-]*)\.([A-Za-z_][A-Za-z0-9_'-]*)\.\$\{system\}\.([A-Za-z_][A-Za-z0-9_'.-]*)\s*;\s*$/;

export interface RecoveryResult {
  state: PackageState;
  warnings: string[];
}

function findInputUrl(text: string, input: string): string | undefined {
  const escaped = input.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  const pattern = new RegExp(`^\\s*${escaped}\\.url\\s*=\\s*"([^"]*)"\\s*;`, "m");
  for (const section of [MARKERS.customInputs, MARKERS.localInputs]) {
    const match = pattern.exec(extractSectionContent(text, section));
    if (match) return match[1];
  }
  return undefined;
}

/**
 * Rebuild a package state from the managed sections of a marker-based flake.
 * Entries that cannot be recovered are skipped with a warning; the rest of
 * the file still comes through.
 */
export function recoverStateFromMarkers(text: string): RecoveryResult {
  const state = createPackageState();
  const warnings: string[] = [];

  for (const line of extractSectionContent(text, MARKERS.packages).split("\n")) {
    const match = PLAIN_BINDING.exec(line);
    // Only the canonical `name = pkgs.name;` shape is a plain package.
    if (match && match[1] === match[2]) {
      addLegacyPackage(state, match[1]);
    }
  }

  for (const line of extractSectionContent(text, MARKERS.customPackages).split("\n")) {
    const match = CUSTOM_BINDING.exec(line);
    if (!match) continue;
    const [, name, inputName, output, source] = match;
    const url = findInputUrl(text, inputName);
    if (url === undefined) {
      warnings.push(`Skipping '${name}': no URL found for input '${inputName}'`);
      continue;
    }
    if (source !== name) {
      warnings.push(`'${name}' is an alias for '${source}' from input '${inputName}'`);
    }
    addCustomPackage(state, {
      name,
      input_name: inputName,
      input_url: url,
      package_output: output,
      source_name: source !== name ? source : undefined,
    });
  }

  return { state, warnings };
}
