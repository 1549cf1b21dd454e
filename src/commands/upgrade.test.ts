import { describe, it, expect, beforeEach, afterAll } from "vitest";
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { ExitCodes, NixyError } from "../lib/errors.js";
import { createNixyConfig, loadNixyConfig, saveNixyConfig } from "../lib/nixy-config.js";
import { messagesAt, useOutputStore } from "../lib/output.js";
import { addLegacyPackage, addResolvedPackage } from "../lib/package-state.js";
import { createTestContext, type TestContext } from "./testing.js";
import { upgrade } from "./upgrade.js";

const TMP = mkdtempSync(join(tmpdir(), "nixy-upgrade-test-"));
let context: TestContext;
let counter = 0;

const LOCK = JSON.stringify({
  root: "root",
  nodes: { root: { inputs: { nixpkgs: "nixpkgs", fenix: "fenix" } }, nixpkgs: {}, fenix: {} },
  version: 7,
});

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
    resolved_version: "14.0.0",
    attribute_path: "ripgrep",
    commit_hash: "0000000011111111",
  });
  saveNixyConfig(context.paths.storeFile, config);
});

function lockPath(): string {
  return join(context.paths.profilesStateDir, "default", "flake.lock");
}

function writeLock(): void {
  mkdirSync(join(context.paths.profilesStateDir, "default"), { recursive: true });
  writeFileSync(lockPath(), LOCK);
}

function resolvedPackages() {
  return loadNixyConfig(context.paths.storeFile).profiles.default.resolved_packages;
}

describe("upgrade", () => {
  it("re-resolves every pinned package and updates all inputs", async () => {
    context.registry.releases["ripgrep@latest"] = {
      name: "ripgrep",
      version: "14.1.0",
      attribute_path: "ripgrep",
      commit_hash: "abcdef1234567890",
    };

    await upgrade(context, []);

    expect(resolvedPackages()).toEqual([
      { name: "ripgrep", resolved_version: "14.1.0", attribute_path: "ripgrep", commit_hash: "abcdef1234567890" },
    ]);
    expect(context.builder.updates).toEqual([null]);
    expect(messagesAt("info")).toEqual([
      "Resolving ripgrep@latest...",
      "  14.0.0 -> 14.1.0 (commit abcdef12)",
      "Updating all flake inputs...",
    ]);
    expect(messagesAt("success")).toEqual(["All packages upgraded"]);
    expect(readFileSync(join(context.paths.profilesStateDir, "default", "flake.nix"), "utf-8")).toContain(
      "          ripgrep = inputs.nixpkgs-abcdef12.legacyPackages.${system}.ripgrep;\n",
    );
  });

  it("leaves a package at its pin when the release is unchanged", async () => {
    context.registry.releases["ripgrep@latest"] = {
      name: "ripgrep",
      version: "14.0.0",
      attribute_path: "ripgrep",
      commit_hash: "0000000011111111",
    };

    await upgrade(context, ["ripgrep"]);

    expect(messagesAt("info")).toContain("  ripgrep is already at the latest version");
    expect(resolvedPackages()[0].commit_hash).toBe("0000000011111111");
    expect(context.builder.updates).toEqual([]);
    expect(messagesAt("success")).toEqual(["Upgraded: ripgrep"]);
  });

  it("keeps the pin and warns when a package cannot be resolved", async () => {
    await upgrade(context, ["ripgrep"]);

    expect(messagesAt("warning")).toEqual([
      "  Failed to resolve ripgrep: Version 'latest' of package 'ripgrep' not found on Nixhub",
    ]);
    expect(resolvedPackages()[0].resolved_version).toBe("14.0.0");
  });

  it("updates only the named flake inputs", async () => {
    writeLock();

    await upgrade(context, ["fenix"]);

    expect(context.builder.updates).toEqual([["fenix"]]);
    expect(messagesAt("info")).toEqual(["Updating inputs: fenix..."]);
  });

  it("rejects inputs the lock file does not know", async () => {
    writeLock();

    const error = await upgrade(context, ["nope"]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NixyError);
    expect(error instanceof NixyError && error.code).toBe(ExitCodes.Usage);
    expect(error instanceof Error && error.message).toBe("Unknown input(s): nope. Available inputs: fenix nixpkgs");
  });

  it("explains that unpinned packages are upgraded as a whole", async () => {
    writeLock();

    await upgrade(context, ["jq"]);

    expect(messagesAt("warning")).toEqual([
      "Per-package upgrade is only supported for versioned packages (installed with @version).",
      "Other packages (jq) are upgraded when you run 'nixy upgrade' without arguments.",
    ]);
    expect(context.builder.builds).toEqual([]);
  });

  it("needs a lock file to update named inputs", async () => {
    await expect(upgrade(context, ["fenix"])).rejects.toThrow("No flake.lock found. Run 'nixy sync' first.");
  });

  it("restores flake.lock when the build fails", async () => {
    writeLock();
    context.builder.onBuild = () => {
      writeFileSync(lockPath(), "{}");
    };
    context.builder.failBuild = true;

    await expect(upgrade(context, [])).rejects.toThrow(/^Failed to upgrade packages \(while building environment\)/);

    expect(readFileSync(lockPath(), "utf-8")).toBe(LOCK);
    expect(messagesAt("warning")).toContain("Upgrade packages failed. Reverted changes.");
  });
});
