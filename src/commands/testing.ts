import { join } from "path";
import type { NixyPaths } from "../lib/config/path.js";
import { defaultSettings } from "../lib/config/loader.js";
import { externalError } from "../lib/errors.js";
import type { Builder, PackageOutput } from "../lib/nix.js";
import type { Registry } from "../lib/nixhub.js";
import { RollbackController } from "../lib/rollback.js";
import type { ResolvedRelease, SearchResult, Settings } from "../lib/types.js";
import type { CommandContext } from "./context.js";

// In-process stand-ins for the nix CLI and Nixhub, shared by the command tests.

export function pathsUnder(root: string): NixyPaths {
  const configDir = join(root, "config");
  const stateDir = join(root, "state");
  return {
    configDir,
    stateDir,
    storeFile: join(configDir, "nixy.json"),
    settingsFile: join(configDir, "settings.yaml"),
    packagesDir: join(configDir, "packages"),
    profilesStateDir: join(stateDir, "profiles"),
    envLink: join(stateDir, "env"),
    backupsDir: join(stateDir, "backups"),
    legacyProfilesDir: join(configDir, "profiles"),
    legacyActiveFile: join(configDir, "active"),
    legacyFlake: join(configDir, "flake.nix"),
  };
}

export interface BuildCall {
  flakeDir: string;
  output: string;
  outLink: string;
}

export interface FakeFlake {
  output: PackageOutput;
  packages: string[];
}

export class FakeBuilder implements Builder {
  system = "x86_64-linux";
  builds: BuildCall[] = [];
  /** `null` records an update of every input. */
  updates: Array<string[] | null> = [];
  garbageCollections = 0;
  flakes: Record<string, FakeFlake> = {};
  /** Store paths by flake URL, for prefetches. */
  storePaths: Record<string, string> = {};
  /** Source files keyed by `nixpkgsUrl#attr`. */
  sources: Record<string, string> = {};
  failBuild = false;
  /** Called before a build resolves, e.g. to look at files mid-transaction. */
  onBuild?: (call: BuildCall) => void;

  async build(flakeDir: string, output: string, outLink: string): Promise<void> {
    const call = { flakeDir, output, outLink };
    this.builds.push(call);
    this.onBuild?.(call);
    if (this.failBuild) {
      throw externalError("Failed to build environment. See output above for details.");
    }
  }

  async currentSystem(): Promise<string> {
    return this.system;
  }

  async updateInputs(_flakeDir: string, inputs: readonly string[]): Promise<void> {
    this.updates.push([...inputs]);
  }

  async updateAllInputs(_flakeDir: string): Promise<void> {
    this.updates.push(null);
  }

  async validateFlakePackage(url: string, name: string): Promise<PackageOutput | null> {
    const flake = this.flakes[url];
    return flake && flake.packages.includes(name) ? flake.output : null;
  }

  async listFlakePackages(url: string): Promise<string[]> {
    return this.flakes[url]?.packages ?? [];
  }

  async prefetchFlake(url: string): Promise<string> {
    const storePath = this.storePaths[url];
    if (storePath === undefined) {
      throw externalError(`Failed to prefetch flake '${url}': error: unable to download`);
    }
    return storePath;
  }

  async packageSourcePath(nixpkgsUrl: string, attr: string): Promise<string> {
    const source = this.sources[`${nixpkgsUrl}#${attr}`];
    if (source === undefined) {
      throw externalError(`Failed to get source path for '${attr}': error: attribute '${attr}' missing`);
    }
    return source;
  }

  async collectGarbage(): Promise<void> {
    this.garbageCollections += 1;
  }
}

export class FakeRegistry implements Registry {
  /** Keyed by `name@version`, with `latest` for unversioned requests. */
  releases: Record<string, ResolvedRelease> = {};
  results: SearchResult[] = [];
  queries: string[] = [];
  resolutions: string[] = [];

  async search(query: string): Promise<SearchResult[]> {
    this.queries.push(query);
    return this.results;
  }

  async resolve(name: string, version: string, system: string): Promise<ResolvedRelease> {
    this.resolutions.push(`${name}@${version}/${system}`);
    const release = this.releases[`${name}@${version}`];
    if (!release) {
      throw externalError(`Version '${version}' of package '${name}' not found on Nixhub`);
    }
    return release;
  }
}

export interface TestContext extends CommandContext {
  builder: FakeBuilder;
  registry: FakeRegistry;
  controller: RollbackController;
  written: string[];
}

export function createTestContext(root: string, settings: Partial<Settings> = {}): TestContext {
  const written: string[] = [];
  return {
    paths: pathsUnder(root),
    settings: { ...defaultSettings(), ...settings },
    builder: new FakeBuilder(),
    registry: new FakeRegistry(),
    controller: new RollbackController(),
    force: false,
    written,
    write: (text) => {
      written.push(text);
    },
  };
}
