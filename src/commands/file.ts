import { join } from "path";
import { openBackend } from "../lib/backend.js";
import { usageError } from "../lib/errors.js";
import { scanLocalPackages } from "../lib/flake/local-packages.js";
import { findPackage } from "../lib/package-state.js";
import type { CommandContext } from "./context.js";

/**
 * The file that defines an installed package: the local definition when one
 * exists, otherwise a file in the store that nix locates for us.
 */
export async function packageSourceFile(context: CommandContext, name: string): Promise<string> {
  const backend = openBackend(context.paths, context.settings);
  const packagesDir = backend.profile.localPackagesDirectory;

  const scan = scanLocalPackages(packagesDir);
  const local = scan.packages.find((pkg) => pkg.name === name);
  if (local) {
    return join(packagesDir, local.file);
  }
  if (scan.flakes.some((flake) => flake.name === name)) {
    return join(packagesDir, name, "flake.nix");
  }

  const installed = findPackage(backend.load(), name);
  if (!installed) {
    throw usageError(`Package '${name}' is not installed`);
  }
  switch (installed.kind) {
    case "custom":
      return join(await context.builder.prefetchFlake(installed.package.input_url), "flake.nix");
    case "resolved":
      return context.builder.packageSourcePath(
        `github:NixOS/nixpkgs/${installed.package.commit_hash}`,
        installed.package.attribute_path,
      );
    case "plain":
      return context.builder.packageSourcePath(context.settings.nixpkgs_url, name);
    default:
      throw usageError(`Package '${name}' has no source file nix can locate`);
  }
}

export async function file(context: CommandContext, name: string | undefined): Promise<void> {
  if (!name) {
    throw usageError("Usage: nixy file <package>");
  }
  context.write(`${await packageSourceFile(context, name)}\n`);
}
