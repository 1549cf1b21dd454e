import { describe, it, expect, beforeEach, afterAll } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { ExitCodes, NixyError } from "../lib/errors.js";
import { MARKERS, extractSectionContent } from "../lib/flake/editor.js";
import { MANAGED_DESCRIPTION, renderFlake } from "../lib/flake/generator.js";
import { retrofitMarkers } from "../lib/flake/marker-edits.js";
import { createNixyConfig, loadNixyConfig, saveNixyConfig } from "../lib/nixy-config.js";
import { messagesAt, useOutputStore } from "../lib/output.js";
import { addLegacyPackage, addResolvedPackage, createPackageState, loadPackageState } from "../lib/package-state.js";
import { createTestContext, type TestContext } from "./testing.js";
import { findLocalDefinition, uninstall } from "./uninstall.js";

const TMP = mkdtempSync(join(tmpdir(), "nixy-uninstall-test-"));
let context: TestContext;
let counter = 0;

afterAll(() => {
  rmSync(TMP, { recursive: true, force: true });
});

beforeEach(() => {
  counter += 1;
  context = createTestContext(join(TMP, `case-${counter}`));
  useOutputStore.getState().clear();

  const config = createNixyConfig();
  addLegacyPackage(config.profiles.default, "jq");
  addResolvedPackage(config.profiles.default, {
    name: "ripgrep",
    resolved_version: "14.1.0",
    attribute_path: "ripgrep",
    commit_hash: "abcdef1234567890",
  });
  saveNixyConfig(context.paths.storeFile, config);
});

const GREET = '{ stdenv }:\nstdenv.mkDerivation { pname = "greet"; version = "1.0"; }\n';

function writeLocalPackage(): string {
  mkdirSync(context.paths.packagesDir, { recursive: true });
  const file = join(context.paths.packagesDir, "greet.nix");
  writeFileSync(file, GREET);
  return file;
}

function profileFlake(): string {
  return join(context.paths.profilesStateDir, "default", "flake.nix");
}

async function failure(promise: Promise<unknown>): Promise<NixyError> {
  const error = await promise.catch((e: unknown) => e);
  if (!(error instanceof NixyError)) {
    throw new Error(`expected a NixyError, got ${String(error)}`);
  }
  return error;
}

describe("findLocalDefinition", () => {
  it("finds .nix files by declared name and flake directories by directory name", () => {
    const file = writeLocalPackage();
    mkdirSync(join(context.paths.packagesDir, "tool"));
    writeFileSync(join(context.paths.packagesDir, "tool", "flake.nix"), "{ }\n");

    expect(findLocalDefinition(context.paths.packagesDir, "greet")).toBe(file);
    expect(findLocalDefinition(context.paths.packagesDir, "tool")).toBe(join(context.paths.packagesDir, "tool"));
    expect(findLocalDefinition(context.paths.packagesDir, "missing")).toBeNull();
  });
});

describe("uninstall", () => {
  it("removes the package from the state and the generated flake", async () => {
    await uninstall(context, "ripgrep");

    const state = loadNixyConfig(context.paths.storeFile).profiles.default;
    expect(state.resolved_packages).toEqual([]);
    expect(state.packages).toEqual(["jq"]);
    const flake = readFileSync(profileFlake(), "utf-8");
    expect(flake).toContain("          jq = pkgs.jq;\n");
    expect(flake).not.toContain("ripgrep");
    expect(messagesAt("success")).toEqual(["Removed ripgrep"]);
    expect(context.builder.builds).toHaveLength(1);
  });

  it("deletes a local definition and keeps a backup", async () => {
    const file = writeLocalPackage();

    await uninstall(context, "greet");

    expect(existsSync(file)).toBe(false);
    const backups = readdirSync(join(context.paths.backupsDir, "default"));
    expect(backups).toHaveLength(1);
    expect(readFileSync(join(context.paths.backupsDir, "default", backups[0], "greet.nix"), "utf-8")).toBe(GREET);
    expect(messagesAt("info")).toEqual(["Uninstalling greet...", `Removing local package definition: ${file}`]);
  });

  it("puts a deleted local definition back when the build fails", async () => {
    const file = writeLocalPackage();
    context.builder.failBuild = true;

    await expect(uninstall(context, "greet")).rejects.toThrow(/^Failed to uninstall greet \(while building environment\)/);

    expect(readFileSync(file, "utf-8")).toBe(GREET);
    expect(messagesAt("warning")).toEqual(["Uninstall greet failed. Reverted changes."]);
  });

  it("removes a package that only a legacy marker flake records", async () => {
    context = createTestContext(join(TMP, `case-${counter}-legacy`), { auto_migrate: false });
    const profileDir = join(context.paths.legacyProfilesDir, "default");
    mkdirSync(profileDir, { recursive: true });
    const before = createPackageState();
    addLegacyPackage(before, "fzf");
    addLegacyPackage(before, "jq");
    writeFileSync(join(profileDir, "flake.nix"), retrofitMarkers(renderFlake(before)));

    await uninstall(context, "jq");

    expect(loadPackageState(join(profileDir, "packages.json")).packages).toEqual(["fzf"]);
    const flake = readFileSync(join(profileDir, "flake.nix"), "utf-8");
    expect(extractSectionContent(flake, MARKERS.packages)).toBe("          fzf = pkgs.fzf;\n");
    expect(extractSectionContent(flake, MARKERS.envPaths)).toBe("              fzf\n");
  });

  it("rejects a package that is not installed", async () => {
    const error = await failure(uninstall(context, "ghost"));

    expect(error.message).toBe("Package 'ghost' is not installed");
    expect(error.code).toBe(ExitCodes.Usage);
  });

  it("refuses to overwrite a flake.nix edited by hand unless forced", async () => {
    mkdirSync(join(context.paths.profilesStateDir, "default"), { recursive: true });
    const edited = `{\n  ${MANAGED_DESCRIPTION}\n  # my own tweak\n}\n`;
    writeFileSync(profileFlake(), edited);

    const error = await failure(uninstall(context, "jq"));
    expect(error.code).toBe(ExitCodes.Consistency);
    expect(error.message).toMatch(/ was modified outside nixy \(\+\d+ -\d+ lines\)\. Re-run with --force/);
    expect(readFileSync(profileFlake(), "utf-8")).toBe(edited);
    const hunks = useOutputStore.getState().entries.flatMap((entry) => (entry.kind === "detail" ? [entry.text] : []));
    expect(hunks[0]).toMatch(/^@@ -1,4 \+1,\d+ @@$/);
    expect(hunks).toContain("-  # my own tweak");

    context.force = true;
    await uninstall(context, "jq");
    const [warning] = messagesAt("warning");
    expect(warning).toMatch(/^Backed up the previous flake\.nix to /);
    expect(readFileSync(warning.replace("Backed up the previous flake.nix to ", ""), "utf-8")).toBe(edited);
  });

  it("refuses a flake.nix that nixy did not generate", async () => {
    mkdirSync(join(context.paths.profilesStateDir, "default"), { recursive: true });
    writeFileSync(profileFlake(), '{ description = "mine"; }\n');

    const error = await failure(uninstall(context, "jq"));

    expect(error.code).toBe(ExitCodes.Consistency);
    expect(error.message).toMatch(/ is not managed by nixy \(.*\)\. Move it aside and run 'nixy sync --regenerate'\.$/);
  });
});
