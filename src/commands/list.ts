import { openBackend } from "../lib/backend.js";
import { scanLocalPackages } from "../lib/flake/local-packages.js";
import { showPackages } from "../lib/output.js";
import type { LocalScan, PackageRow, PackageState } from "../lib/types.js";
import type { CommandContext } from "./context.js";

/** One row per installed package; local definitions replace state entries of the same name. */
export function packageRows(state: PackageState, scan: LocalScan): PackageRow[] {
  const rows = new Map<string, PackageRow>();

  for (const name of state.packages) {
    rows.set(name, { name, kind: "plain", detail: "nixpkgs" });
  }
  for (const pkg of state.resolved_packages) {
    rows.set(pkg.name, {
      name: pkg.name,
      kind: "resolved",
      detail: `${pkg.resolved_version} (${pkg.commit_hash.slice(0, 8)})`,
      platforms: pkg.platforms,
    });
  }
  for (const pkg of state.custom_packages) {
    rows.set(pkg.name, { name: pkg.name, kind: "custom", detail: pkg.input_url, platforms: pkg.platforms });
  }
  for (const pkg of scan.packages) {
    rows.set(pkg.name, { name: pkg.name, kind: "local", detail: `packages/${pkg.file}` });
  }
  for (const flake of scan.flakes) {
    rows.set(flake.name, { name: flake.name, kind: "local-flake", detail: `packages/${flake.name}/flake.nix` });
  }

  return [...rows.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

export function list(context: CommandContext): void {
  const backend = openBackend(context.paths, context.settings);
  const rows = packageRows(backend.load(), scanLocalPackages(backend.profile.localPackagesDirectory));
  showPackages(backend.profile.name, rows);
}
