import { copyFileSync, existsSync, mkdirSync, readFileSync } from "fs";
import { basename, join } from "path";
import { openBackend, type StateBackend } from "../lib/backend.js";
import { usageError, validationError } from "../lib/errors.js";
import {
  addCustomPackageEdit,
  addLocalPackageEdit,
  addResolvedPackageEdit,
  rejectPlatforms,
} from "../lib/flake/marker-edits.js";
import { localNames, parseLocalPackageSource, scanLocalPackages } from "../lib/flake/local-packages.js";
import {
  deriveInputNameFromUrl,
  isFlakeReference,
  splitFlakeReference,
  uniqueInputName,
} from "../lib/flake-ref.js";
import { parsePackageSpec, type PackageSpec } from "../lib/nixhub.js";
import { info, success } from "../lib/output.js";
import { applyPackageChange } from "../lib/package-change.js";
import { addCustomPackage, addResolvedPackage, hasPackage } from "../lib/package-state.js";
import { normalizePlatforms } from "../lib/platforms.js";
import type { CustomPackage, ResolvedPackage } from "../lib/types.js";
import { editsInPlace, type CommandContext } from "./context.js";

export const INSTALL_USAGE = "Usage: nixy install <package>[@version] or nixy install <flake-ref>";

export interface InstallOptions {
  spec?: string;
  /** Flake to take `spec` from. */
  from?: string;
  /** Local package definition to copy into the packages directory. */
  file?: string;
  platforms: string[];
}

function isInstalled(backend: StateBackend, name: string): boolean {
  if (hasPackage(backend.load(), name)) {
    return true;
  }
  return localNames(scanLocalPackages(backend.profile.localPackagesDirectory)).has(name);
}

function checkPlatforms(backend: StateBackend, platforms: string[] | undefined): void {
  if (editsInPlace(backend)) {
    rejectPlatforms(platforms);
  }
}

async function installFromRegistry(
  context: CommandContext,
  spec: PackageSpec,
  platforms: string[] | undefined,
): Promise<void> {
  const backend = openBackend(context.paths, context.settings);
  const { name } = spec;
  if (isInstalled(backend, name)) {
    success(`Package '${name}' is already installed`);
    return;
  }
  checkPlatforms(backend, platforms);

  const version = spec.version ?? "latest";
  info(`Resolving ${name}@${version} via Nixhub...`);
  const system = await context.builder.currentSystem();
  const release = await context.registry.resolve(name, version, system);
  info(`Found ${release.name} version ${release.version} (commit ${release.commit_hash.slice(0, 8)})`);

  const pkg: ResolvedPackage = {
    name,
    version_spec: spec.version,
    resolved_version: release.version,
    attribute_path: release.attribute_path,
    commit_hash: release.commit_hash,
    platforms,
  };

  info(`Installing ${name}...`);
  await applyPackageChange(context, backend, {
    description: `install ${name}`,
    mutate: (state) => addResolvedPackage(state, pkg),
    edit: (text) => addResolvedPackageEdit(text, pkg),
  });
  success(`Installed ${name} ${release.version}`);
}

async function installFromFlake(
  context: CommandContext,
  url: string,
  packageName: string,
  platforms: string[] | undefined,
): Promise<void> {
  const backend = openBackend(context.paths, context.settings);
  if (isInstalled(backend, packageName)) {
    success(`Package '${packageName}' is already installed`);
    return;
  }
  checkPlatforms(backend, platforms);

  info(`Using flake URL: ${url}`);
  const inputName = uniqueInputName(backend.load(), deriveInputNameFromUrl(url), url);

  info(`Validating package '${packageName}' in ${inputName}...`);
  const output = await context.builder.validateFlakePackage(url, packageName);
  if (output === null) {
    const available = (await context.builder.listFlakePackages(url)).slice(0, 10);
    if (available.length === 0) {
      throw usageError(`Package '${packageName}' not found in '${inputName}'`);
    }
    throw usageError(
      `Package '${packageName}' not found in '${inputName}'. Available packages: ${available.join(" ")}...`,
    );
  }

  const pkg: CustomPackage = {
    name: packageName,
    input_name: inputName,
    input_url: url,
    package_output: output,
    platforms,
  };

  info(`Installing ${packageName} from ${inputName}...`);
  await applyPackageChange(context, backend, {
    description: `install ${packageName}`,
    mutate: (state) => addCustomPackage(state, pkg),
    edit: (text) => addCustomPackageEdit(text, pkg, context.settings.nixpkgs_url),
  });
  success(`Installed ${packageName} from ${url}`);
}

async function installFromFile(context: CommandContext, file: string): Promise<void> {
  if (!existsSync(file)) {
    throw usageError(`File not found: ${file}`);
  }
  const parsed = parseLocalPackageSource(readFileSync(file, "utf-8"), basename(file));
  if (!parsed) {
    throw validationError(`Could not find 'name' or 'pname' attribute in ${file}`);
  }

  const backend = openBackend(context.paths, context.settings);
  const { name } = parsed;
  if (isInstalled(backend, name)) {
    success(`Package '${name}' is already installed`);
    return;
  }
  if (editsInPlace(backend) && (parsed.input_name || parsed.overlay)) {
    throw usageError(
      "Local packages with their own inputs or overlays need a generated flake.nix. Run 'nixy sync --regenerate' first.",
    );
  }

  const packagesDir = backend.profile.localPackagesDirectory;
  const target = join(packagesDir, `${name}.nix`);
  if (existsSync(target)) {
    throw usageError(`${target} already exists`);
  }
  const expression = parsed.package_expr ?? `pkgs.callPackage ./packages/${name}.nix {}`;

  info(`Installing ${name} from ${file}...`);
  await applyPackageChange(context, backend, {
    description: `install ${name}`,
    prepare: (progress) => {
      mkdirSync(packagesDir, { recursive: true });
      copyFileSync(file, target);
      progress.created(target);
    },
    // Local packages are found by scanning the packages directory, not recorded in state.
    mutate: () => {},
    edit: (text) => addLocalPackageEdit(text, name, expression),
  });
  success(`Installed ${name} from ${target}`);
}

export async function install(context: CommandContext, options: InstallOptions): Promise<void> {
  const platforms = options.platforms.length > 0 ? normalizePlatforms(options.platforms) : undefined;

  if (options.file) {
    if (platforms) {
      throw usageError("--platform cannot be combined with --file");
    }
    await installFromFile(context, options.file);
    return;
  }

  const spec = options.spec;
  if (!spec) {
    throw usageError(INSTALL_USAGE);
  }

  if (options.from) {
    await installFromFlake(context, options.from, spec, platforms);
    return;
  }

  if (isFlakeReference(spec)) {
    const { url, packageName } = splitFlakeReference(spec);
    await installFromFlake(context, url, packageName, platforms);
    return;
  }

  await installFromRegistry(context, parsePackageSpec(spec), platforms);
}
