import { describe, it, expect, beforeEach, afterAll } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import type { NixyPaths } from "./config/path.js";
import { loadNixyConfig } from "./nixy-config.js";
import { messagesAt, useOutputStore } from "./output.js";
import { mergeLocalPackages, migrateToNixyConfig, needsMigration, runMigration } from "./migration.js";

const TMP = mkdtempSync(join(tmpdir(), "nixy-migration-test-"));
let paths: NixyPaths;
let counter = 0;

afterAll(() => {
  rmSync(TMP, { recursive: true, force: true });
});

function pathsUnder(root: string): NixyPaths {
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

function legacyProfile(name: string, files: Record<string, string>): string {
  const dir = join(paths.legacyProfilesDir, name);
  for (const [file, content] of Object.entries(files)) {
    mkdirSync(join(dir, file, ".."), { recursive: true });
    writeFileSync(join(dir, file), content);
  }
  mkdirSync(dir, { recursive: true });
  return dir;
}

const MARKER_FLAKE = [
  "{",
  "  inputs = {",
  "    # [nixy:custom-inputs]",
  '    fenix.url = "github:nix-community/fenix";',
  "    # [/nixy:custom-inputs]",
  "  };",
  "          # [nixy:packages]",
  "          jq = pkgs.jq;",
  "          # [/nixy:packages]",
  "          # [nixy:custom-packages]",
  "          rust = inputs.fenix.packages.${system}.stable;",
  "          # [/nixy:custom-packages]",
  "}",
  "",
].join("\n");

beforeEach(() => {
  counter += 1;
  paths = pathsUnder(join(TMP, `case-${counter}`));
  useOutputStore.getState().clear();
});

describe("needsMigration", () => {
  it("is false for a fresh setup", () => {
    expect(needsMigration(paths)).toBe(false);
  });

  it("is true when a legacy profile directory exists", () => {
    legacyProfile("default", {});
    expect(needsMigration(paths)).toBe(true);
  });

  it("is true for the single-file layout", () => {
    mkdirSync(paths.configDir, { recursive: true });
    writeFileSync(paths.legacyFlake, "{ }\n");
    expect(needsMigration(paths)).toBe(true);
  });

  it("is false once nixy.json exists", () => {
    legacyProfile("default", {});
    writeFileSync(paths.storeFile, "{}");
    expect(needsMigration(paths)).toBe(false);
  });
});

describe("migrateToNixyConfig", () => {
  it("reads each profile's packages.json and the active pointer", () => {
    legacyProfile("default", { "packages.json": JSON.stringify({ version: 1, packages: ["git"] }) });
    legacyProfile("work", {
      "packages.json": JSON.stringify({ version: 2, packages: ["kubectl"] }),
      "flake.nix": "{ }\n",
      "flake.lock": '{"nodes":{}}',
    });
    writeFileSync(paths.legacyActiveFile, "work\n");

    const config = migrateToNixyConfig(paths);
    expect(config.active_profile).toBe("work");
    expect(Object.keys(config.profiles).sort()).toEqual(["default", "work"]);
    expect(config.profiles.default.packages).toEqual(["git"]);
    expect(config.profiles.work.packages).toEqual(["kubectl"]);
    expect(readFileSync(join(paths.profilesStateDir, "work", "flake.lock"), "utf-8")).toBe('{"nodes":{}}');
    expect(existsSync(join(paths.profilesStateDir, "default", "flake.nix"))).toBe(false);
  });

  it("recovers state from markers when packages.json is missing", () => {
    legacyProfile("default", { "flake.nix": MARKER_FLAKE });
    const config = migrateToNixyConfig(paths);
    expect(config.profiles.default.packages).toEqual(["jq"]);
    expect(config.profiles.default.custom_packages.map((pkg) => pkg.name)).toEqual(["rust"]);
    expect(messagesAt("warning")).toEqual(["Profile 'default': 'rust' is an alias for 'stable' from input 'fenix'"]);
  });

  it("merges local packages without overwriting", () => {
    legacyProfile("a", { "packages/tool.nix": "from a", "packages/only-a.nix": "only a" });
    legacyProfile("b", { "packages/tool.nix": "from b" });
    migrateToNixyConfig(paths);
    expect(readFileSync(join(paths.packagesDir, "tool.nix"), "utf-8")).toBe("from a");
    expect(readFileSync(join(paths.packagesDir, "only-a.nix"), "utf-8")).toBe("only a");
    expect(messagesAt("warning")).toEqual([
      `Local package 'tool.nix' from profile 'b' already exists in ${paths.packagesDir}; kept the existing one.`,
    ]);
  });

  it("turns the single-file layout into the default profile", () => {
    mkdirSync(paths.configDir, { recursive: true });
    writeFileSync(paths.legacyFlake, MARKER_FLAKE);
    const config = migrateToNixyConfig(paths);
    expect(config.profiles.default.packages).toEqual(["jq"]);
    expect(readFileSync(join(paths.profilesStateDir, "default", "flake.nix"), "utf-8")).toBe(MARKER_FLAKE);
  });

  it("falls back to the default profile for a dangling active pointer", () => {
    legacyProfile("work", {});
    mkdirSync(paths.configDir, { recursive: true });
    writeFileSync(paths.legacyActiveFile, "gone");
    const config = migrateToNixyConfig(paths);
    expect(config.active_profile).toBe("default");
    expect(Object.keys(config.profiles).sort()).toEqual(["default", "work"]);
  });
});

describe("runMigration", () => {
  it("writes nixy.json", () => {
    legacyProfile("default", { "packages.json": JSON.stringify({ version: 2, packages: ["ripgrep"] }) });
    runMigration(paths);
    expect(loadNixyConfig(paths.storeFile).profiles.default.packages).toEqual(["ripgrep"]);
    expect(needsMigration(paths)).toBe(false);
  });
});

describe("mergeLocalPackages", () => {
  it("does nothing when source and target are the same directory", () => {
    mkdirSync(paths.packagesDir, { recursive: true });
    writeFileSync(join(paths.packagesDir, "x.nix"), "x");
    expect(mergeLocalPackages(paths.packagesDir, paths.packagesDir)).toEqual([]);
  });
});
