import { join } from "path";
import { DEFAULT_NIXPKGS_URL } from "../config/schema.js";
import { atomicWriteFileSync } from "../fs-utils.js";
import { ALL_SYSTEMS } from "../platforms.js";
import type { CustomPackage, LocalFlake, LocalPackage, PackageState, ResolvedPackage } from "../types.js";
import { localNames, scanLocalPackages } from "./local-packages.js";

export const MANAGED_DESCRIPTION = 'description = "nixy managed packages";';

export type LocalPathMode = "relative" | "absolute";

export interface RenderOptions {
  nixpkgsUrl?: string;
  systems?: readonly string[];
  /**
   * "relative" points local packages at ./packages beside the flake (legacy
   * per-profile layout); "absolute" at the packages directory itself.
   */
  localPaths?: LocalPathMode;
}

interface PathEntry {
  name: string;
  platforms?: string[];
}

const SYSTEM = "${system}";

export function resolvedInputName(commitHash: string): string {
  return `nixpkgs-${commitHash.slice(0, 8)}`;
}

function inputLine(name: string, url: string): string {
  return `    ${name}.url = "${url}";\n`;
}

function entryLine(name: string, expression: string): string {
  return `          ${name} = ${expression};\n`;
}

interface RepositoryRef {
  repository: string;
  ref?: string;
}

function parseRepositoryRef(url: string): RepositoryRef | null {
  if (url === "nixpkgs" || url === "flake:nixpkgs") {
    return { repository: "nixos/nixpkgs" };
  }
  const match = /^github:([^/]+)\/([^/?#]+)(?:\/([^?#]+))?/.exec(url);
  if (!match) return null;
  return { repository: `${match[1]}/${match[2]}`.toLowerCase(), ref: match[3] };
}

/**
 * Whether `url` names the default package repository at its default ref (or
 * with no ref at all), so the existing `nixpkgs` input can serve it.
 */
export function isDefaultRepository(url: string, nixpkgsUrl: string = DEFAULT_NIXPKGS_URL): boolean {
  const candidate = parseRepositoryRef(url);
  const base = parseRepositoryRef(nixpkgsUrl);
  if (!candidate || !base || candidate.repository !== base.repository) {
    return false;
  }
  return candidate.ref === undefined || candidate.ref === base.ref;
}

function compareLists(a: readonly string[], b: readonly string[]): number {
  for (let i = 0; i < Math.min(a.length, b.length); i += 1) {
    if (a[i] !== b[i]) return a[i] < b[i] ? -1 : 1;
  }
  return a.length - b.length;
}

function nixPathLiteral(path: string): string {
  return path.includes(" ") ? `(/. + "${path}")` : path;
}

class FlakeBuilder {
  private inputs = "";
  private readonly seenInputs = new Set<string>();
  private overlays = "";
  private standardEntries = "";
  private resolvedEntries = "";
  private localEntries = "";
  private customEntries = "";
  private readonly paths: PathEntry[] = [];

  constructor(
    private readonly nixpkgsUrl: string,
    private readonly systems: readonly string[],
    private readonly localPaths: LocalPathMode,
    private readonly packagesDir: string | null,
  ) {}

  private declareInput(name: string, url: string): void {
    if (this.seenInputs.has(name)) return;
    this.seenInputs.add(name);
    this.inputs += inputLine(name, url);
  }

  addStandardPackages(names: readonly string[]): void {
    for (const name of names) {
      this.standardEntries += entryLine(name, `pkgs.${name}`);
      this.paths.push({ name });
    }
  }

  addResolvedPackages(packages: readonly ResolvedPackage[]): void {
    // Grouped by commit in order of first appearance; one input per commit.
    const byCommit = new Map<string, ResolvedPackage[]>();
    for (const pkg of packages) {
      const group = byCommit.get(pkg.commit_hash) ?? [];
      group.push(pkg);
      byCommit.set(pkg.commit_hash, group);
    }
    for (const [commit, group] of byCommit) {
      const input = resolvedInputName(commit);
      this.declareInput(input, `github:NixOS/nixpkgs/${commit}`);
      for (const pkg of group) {
        this.resolvedEntries += entryLine(pkg.name, `inputs.${input}.legacyPackages.${SYSTEM}.${pkg.attribute_path}`);
        this.paths.push({ name: pkg.name, platforms: pkg.platforms });
      }
    }
  }

  addLocalFlakes(flakes: readonly LocalFlake[]): void {
    for (const flake of flakes) {
      const url =
        this.localPaths === "absolute" && this.packagesDir
          ? `path:${join(this.packagesDir, flake.name).replace(/ /g, "%20")}`
          : `path:./packages/${flake.name}`;
      this.declareInput(flake.name, url);
      this.localEntries += entryLine(flake.name, `inputs.${flake.name}.packages.${SYSTEM}.default`);
      this.paths.push({ name: flake.name });
    }
  }

  addLocalPackages(packages: readonly LocalPackage[]): void {
    for (const pkg of packages) {
      if (pkg.input_name && pkg.input_url) {
        this.declareInput(pkg.input_name, pkg.input_url);
      }
      if (pkg.overlay) {
        this.overlays += `          ${pkg.overlay}\n`;
      }
      this.localEntries += entryLine(pkg.name, pkg.package_expr ?? this.callPackageExpression(pkg));
      this.paths.push({ name: pkg.name });
    }
  }

  private callPackageExpression(pkg: LocalPackage): string {
    if (this.localPaths === "absolute" && this.packagesDir) {
      return `pkgs.callPackage ${nixPathLiteral(join(this.packagesDir, pkg.file))} {}`;
    }
    return `pkgs.callPackage ./packages/${pkg.file} {}`;
  }

  addCustomPackages(packages: readonly CustomPackage[]): void {
    for (const pkg of packages) {
      const input = isDefaultRepository(pkg.input_url, this.nixpkgsUrl) ? "nixpkgs" : pkg.input_name;
      if (input !== "nixpkgs") {
        this.declareInput(input, pkg.input_url);
      }
      const source = pkg.source_name ?? pkg.name;
      this.customEntries += entryLine(pkg.name, `inputs.${input}.${pkg.package_output}.${SYSTEM}.${source}`);
      this.paths.push({ name: pkg.name, platforms: pkg.platforms });
    }
  }

  private outputParams(): string {
    return ["self", "nixpkgs", ...[...this.seenInputs].sort()].join(", ");
  }

  private pkgsDefinition(): { definition: string; binding: string } {
    if (!this.overlays) {
      return { definition: "", binding: `let pkgs = nixpkgs.legacyPackages.${SYSTEM};` };
    }
    const definition =
      "      pkgsFor = system: import nixpkgs {\n" +
      "        inherit system;\n" +
      "        overlays = [\n" +
      this.overlays +
      "        ];\n" +
      "      };\n";
    return { definition, binding: "let pkgs = pkgsFor system;" };
  }

  private pathsSection(): string {
    const universal: string[] = [];
    const groups = new Map<string, { platforms: string[]; names: string[] }>();
    for (const entry of this.paths) {
      if (!entry.platforms) {
        universal.push(entry.name);
        continue;
      }
      const platforms = [...entry.platforms].sort();
      const key = platforms.join(" ");
      const group = groups.get(key) ?? { platforms, names: [] };
      group.names.push(entry.name);
      groups.set(key, group);
    }

    let section = universal.map((name) => `              ${name}\n`).join("");
    const sorted = [...groups.values()].sort((a, b) => compareLists(a.platforms, b.platforms));
    for (const group of sorted) {
      const platforms = group.platforms.map((p) => `"${p}"`).join(" ");
      const names = group.names.map((name) => `\n                ${name}`).join("");
      section += `            ] ++ pkgs.lib.optionals (builtins.elem system [ ${platforms} ]) [${names}\n`;
    }
    return section;
  }

  build(): string {
    const { definition, binding } = this.pkgsDefinition();
    const systems = this.systems.map((system) => `"${system}"`).join(" ");
    return `{
  ${MANAGED_DESCRIPTION}

  inputs = {
    nixpkgs.url = "${this.nixpkgsUrl}";
${this.inputs}  };

  outputs = { ${this.outputParams()} }@inputs:
    let
      systems = [ ${systems} ];
      forAllSystems = f: nixpkgs.lib.genAttrs systems (system: f system);
${definition}    in {
      packages = forAllSystems (system:
        ${binding}
        in rec {
${this.standardEntries}${this.resolvedEntries}${this.localEntries}${this.customEntries}
          default = pkgs.buildEnv {
            name = "nixy-env";
            paths = [
${this.pathsSection()}            ];
            extraOutputsToInstall = [ "man" "doc" "info" ];
          };
        });
    };
}
`;
  }
}

/**
 * Render the complete, marker-free flake.nix for a package state. Local
 * packages are rescanned from `packagesDir` on every call and shadow plain
 * and resolved packages of the same name.
 */
export function renderFlake(state: PackageState, packagesDir?: string | null, options: RenderOptions = {}): string {
  const scan = scanLocalPackages(packagesDir);
  const local = localNames(scan);

  const builder = new FlakeBuilder(
    options.nixpkgsUrl ?? DEFAULT_NIXPKGS_URL,
    options.systems ?? ALL_SYSTEMS,
    options.localPaths ?? "relative",
    packagesDir ?? null,
  );
  builder.addStandardPackages(state.packages.filter((name) => !local.has(name)));
  builder.addResolvedPackages(state.resolved_packages.filter((pkg) => !local.has(pkg.name)));
  builder.addLocalFlakes(scan.flakes);
  builder.addLocalPackages(scan.packages);
  builder.addCustomPackages(state.custom_packages);
  return builder.build();
}

export function regenerateFlake(
  flakeDir: string,
  state: PackageState,
  packagesDir?: string | null,
  options: RenderOptions = {},
): string {
  const content = renderFlake(state, packagesDir, options);
  atomicWriteFileSync(join(flakeDir, "flake.nix"), content);
  return content;
}

export function isManagedFlake(text: string): boolean {
  return text.includes(MANAGED_DESCRIPTION);
}
