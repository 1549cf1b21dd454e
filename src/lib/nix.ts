import { execFile, spawn } from "child_process";
import { promisify } from "util";
import { FlakeLockSchema, FlakePrefetchSchema } from "./config/schema.js";
import { NixyError, ExitCodes, errorMessage, externalError } from "./errors.js";
import { readTextIfExists } from "./fs-utils.js";
import { detail } from "./output.js";
import { parseJsonFile } from "./package-state.js";

const execFileAsync = promisify(execFile);

export const NIX_FLAGS = [
  "--extra-experimental-features",
  "nix-command",
  "--extra-experimental-features",
  "flakes",
] as const;

const EVAL_MAX_BUFFER = 16 * 1024 * 1024;

export type ProgressEvent =
  | { type: "stdout"; data: string }
  | { type: "stderr"; data: string }
  | { type: "done"; exitCode: number }
  | { type: "error"; message: string };

export type PackageOutput = "packages" | "legacyPackages";

/** The external build tool, as the rest of nixy sees it. */
export interface Builder {
  build(flakeDir: string, output: string, outLink: string): Promise<void>;
  currentSystem(): Promise<string>;
  updateInputs(flakeDir: string, inputs: readonly string[]): Promise<void>;
  updateAllInputs(flakeDir: string): Promise<void>;
  /** Which output of the flake at `url` holds `name` for this system, if any. */
  validateFlakePackage(url: string, name: string): Promise<PackageOutput | null>;
  listFlakePackages(url: string, output?: PackageOutput): Promise<string[]>;
  /** Fetch the flake at `url` into the store and return its store path. */
  prefetchFlake(url: string): Promise<string>;
  /** The file defining `attr` in the nixpkgs flake at `nixpkgsUrl`, from `meta.position`. */
  packageSourcePath(nixpkgsUrl: string, attr: string): Promise<string>;
  collectGarbage(): Promise<void>;
}

/** `meta.position` is `path:line`; store paths hold no colon, so the last one splits. */
export function positionFile(position: string): string {
  const trimmed = position.trim();
  const colon = trimmed.lastIndexOf(":");
  return colon === -1 ? trimmed : trimmed.slice(0, colon);
}

/** A flake reference for a local directory; spaces are percent-encoded. */
export function flakeRef(path: string, output?: string): string {
  const encoded = path.replace(/ /g, "%20");
  return output ? `${encoded}#${output}` : encoded;
}

/** Root input names recorded in a flake.lock, or [] when there is no lock. */
export function readFlakeInputs(lockPath: string): string[] {
  const raw = readTextIfExists(lockPath);
  if (raw === null) return [];
  const result = FlakeLockSchema.safeParse(parseJsonFile(raw, lockPath));
  if (!result.success) {
    throw new NixyError(`Invalid flake.lock at ${lockPath}`, ExitCodes.State);
  }
  const lock = result.data;
  return Object.keys(lock.nodes[lock.root]?.inputs ?? {}).sort();
}

/** Forward each non-empty output line to the output log. */
export function logProgress(event: ProgressEvent): void {
  if (event.type === "stdout" || event.type === "stderr") {
    for (const line of event.data.split("\n")) {
      if (line.trim().length > 0) detail(line.trimEnd());
    }
  } else if (event.type === "error") {
    detail(event.message);
  }
}

export interface NixBuilderOptions {
  allowUnfree?: boolean;
  onProgress?: (event: ProgressEvent) => void;
}

export class NixBuilder implements Builder {
  private readonly allowUnfree: boolean;
  private readonly onProgress: (event: ProgressEvent) => void;
  private system: string | null = null;

  constructor(options: NixBuilderOptions = {}) {
    this.allowUnfree = options.allowUnfree ?? true;
    this.onProgress = options.onProgress ?? logProgress;
  }

  private env(): NodeJS.ProcessEnv {
    return this.allowUnfree ? { ...process.env, NIXPKGS_ALLOW_UNFREE: "1" } : { ...process.env };
  }

  /** Run a command, streaming its output. Resolves with the exit code. */
  private run(cmd: string, args: readonly string[]): Promise<number> {
    return new Promise<number>((resolve, reject) => {
      const child = spawn(cmd, [...args], { stdio: ["inherit", "pipe", "pipe"], env: this.env() });
      let finished = false;

      // Decoded per stream so a character split across chunks stays whole.
      child.stdout.setEncoding("utf8");
      child.stderr.setEncoding("utf8");

      child.stdout.on("data", (chunk: string) => {
        this.onProgress({ type: "stdout", data: chunk });
      });

      child.stderr.on("data", (chunk: string) => {
        this.onProgress({ type: "stderr", data: chunk });
      });

      child.on("error", (error) => {
        if (finished) return;
        finished = true;
        this.onProgress({ type: "error", message: error.message });
        reject(externalError(`Failed to run ${cmd}: ${error.message}`, error));
      });

      child.on("close", (code) => {
        if (finished) return;
        finished = true;
        const exitCode = code ?? 1;
        this.onProgress({ type: "done", exitCode });
        resolve(exitCode);
      });
    });
  }

  private async runNix(args: readonly string[], failure: string): Promise<void> {
    const exitCode = await this.run("nix", [...NIX_FLAGS, ...args]);
    if (exitCode !== 0) {
      throw externalError(`${failure} See output above for details.`);
    }
  }

  private async capture(args: readonly string[]): Promise<string> {
    const { stdout } = await execFileAsync("nix", [...NIX_FLAGS, ...args], {
      env: this.env(),
      maxBuffer: EVAL_MAX_BUFFER,
    });
    return stdout;
  }

  private evalRaw(args: readonly string[]): Promise<string> {
    return this.capture(["eval", ...args]);
  }

  async build(flakeDir: string, output: string, outLink: string): Promise<void> {
    await this.runNix(
      ["build", flakeRef(flakeDir, output), "--out-link", outLink, "--impure"],
      "Failed to build environment.",
    );
  }

  async currentSystem(): Promise<string> {
    if (this.system) return this.system;
    try {
      this.system = (await this.evalRaw(["--impure", "--expr", "builtins.currentSystem", "--raw"])).trim();
    } catch (error) {
      throw externalError(`Failed to get current system: ${errorMessage(error)}`, error);
    }
    return this.system;
  }

  async updateInputs(flakeDir: string, inputs: readonly string[]): Promise<void> {
    await this.runNix(["flake", "update", ...inputs, "--flake", flakeRef(flakeDir)], "Failed to update flake.");
  }

  async updateAllInputs(flakeDir: string): Promise<void> {
    await this.runNix(["flake", "update", "--flake", flakeRef(flakeDir)], "Failed to update flake.");
  }

  private async isDerivation(attr: string): Promise<boolean> {
    try {
      return (await this.evalRaw([attr])).includes("derivation");
    } catch (error) {
      this.onProgress({ type: "stderr", data: errorMessage(error) });
      return false;
    }
  }

  async validateFlakePackage(url: string, name: string): Promise<PackageOutput | null> {
    const system = await this.currentSystem();
    for (const output of ["packages", "legacyPackages"] as const) {
      if (await this.isDerivation(`${url}#${output}.${system}.${name}.type`)) {
        return output;
      }
    }
    return null;
  }

  async listFlakePackages(url: string, output?: PackageOutput): Promise<string[]> {
    const system = await this.currentSystem();
    const candidates: PackageOutput[] = output ? [output] : ["packages", "legacyPackages"];
    for (const candidate of candidates) {
      try {
        const stdout = await this.evalRaw([
          `${url}#${candidate}.${system}`,
          "--apply",
          'pkgs: builtins.concatStringsSep "\\n" (builtins.attrNames pkgs)',
          "--raw",
        ]);
        return stdout.split("\n").filter((line) => line.length > 0);
      } catch (error) {
        this.onProgress({ type: "stderr", data: errorMessage(error) });
      }
    }
    return [];
  }

  async prefetchFlake(url: string): Promise<string> {
    let stdout: string;
    try {
      stdout = await this.capture(["flake", "prefetch", "--json", url]);
    } catch (error) {
      throw externalError(`Failed to prefetch flake '${url}': ${errorMessage(error)}`, error);
    }
    const result = FlakePrefetchSchema.safeParse(parseJsonFile(stdout, `flake prefetch output for '${url}'`));
    if (!result.success) {
      throw externalError(`Missing storePath in flake prefetch output for '${url}'`);
    }
    return result.data.storePath;
  }

  async packageSourcePath(nixpkgsUrl: string, attr: string): Promise<string> {
    const system = await this.currentSystem();
    try {
      return positionFile(await this.evalRaw(["--raw", `${nixpkgsUrl}#legacyPackages.${system}.${attr}.meta.position`]));
    } catch (error) {
      throw externalError(`Failed to get source path for '${attr}': ${errorMessage(error)}`, error);
    }
  }

  async collectGarbage(): Promise<void> {
    await this.runNix(["store", "gc"], "Garbage collection failed.");
  }
}
