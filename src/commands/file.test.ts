import { describe, it, expect, afterAll } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { DEFAULT_NIXPKGS_URL } from "../lib/config/schema.js";
import { createNixyConfig, saveNixyConfig } from "../lib/nixy-config.js";
import { addCustomPackage, addLegacyPackage, addResolvedPackage } from "../lib/package-state.js";
import { file } from "./file.js";
import { createTestContext, type TestContext } from "./testing.js";

const TMP = mkdtempSync(join(tmpdir(), "nixy-file-test-"));
let counter = 0;

afterAll(() => {
  rmSync(TMP, { recursive: true, force: true });
});

function contextWithPackages(): TestContext {
  counter += 1;
  const context = createTestContext(join(TMP, `case-${counter}`));
  const config = createNixyConfig();
  const state = config.profiles.default;
  addLegacyPackage(state, "jq");
  addResolvedPackage(state, {
    name: "nodejs",
    version_spec: "20",
    resolved_version: "20.11.1",
    attribute_path: "nodejs_20",
    commit_hash: "1111111122222222",
  });
  addCustomPackage(state, {
    name: "neovim",
    input_name: "neovim-nightly",
    input_url: "github:nix-community/neovim-nightly-overlay",
    package_output: "packages",
  });
  saveNixyConfig(context.paths.storeFile, config);
  return context;
}

describe("file", () => {
  it("prints the flake.nix of a custom package's fetched flake", async () => {
    const context = contextWithPackages();
    context.builder.storePaths["github:nix-community/neovim-nightly-overlay"] = "/nix/store/abc-source";

    await file(context, "neovim");

    expect(context.written).toEqual(["/nix/store/abc-source/flake.nix\n"]);
  });

  it("looks a resolved package up at its pinned nixpkgs commit", async () => {
    const context = contextWithPackages();
    context.builder.sources["github:NixOS/nixpkgs/1111111122222222#nodejs_20"] =
      "/nix/store/def-source/pkgs/development/web/nodejs/v20.nix";

    await file(context, "nodejs");

    expect(context.written).toEqual(["/nix/store/def-source/pkgs/development/web/nodejs/v20.nix\n"]);
  });

  it("looks a plain package up in the configured nixpkgs", async () => {
    const context = contextWithPackages();
    context.builder.sources[`${DEFAULT_NIXPKGS_URL}#jq`] = "/nix/store/ghi-source/pkgs/by-name/jq/jq/package.nix";

    await file(context, "jq");

    expect(context.written).toEqual(["/nix/store/ghi-source/pkgs/by-name/jq/jq/package.nix\n"]);
  });

  it("prints local definitions without asking nix", async () => {
    const context = contextWithPackages();
    const packagesDir = context.paths.packagesDir;
    mkdirSync(join(packagesDir, "tool"), { recursive: true });
    writeFileSync(join(packagesDir, "greet.nix"), '{ stdenv }: stdenv.mkDerivation { pname = "greet"; }\n');
    writeFileSync(join(packagesDir, "tool", "flake.nix"), "{ outputs = { self }: { }; }\n");

    await file(context, "greet");
    await file(context, "tool");

    expect(context.written).toEqual([`${join(packagesDir, "greet.nix")}\n`, `${join(packagesDir, "tool", "flake.nix")}\n`]);
  });

  it("rejects a package that is not installed", async () => {
    const context = contextWithPackages();
    await expect(file(context, "htop")).rejects.toThrow("Package 'htop' is not installed");
    expect(context.written).toEqual([]);
  });

  it("requires a package name", async () => {
    await expect(file(contextWithPackages(), undefined)).rejects.toThrow("Usage: nixy file <package>");
  });

  it("passes prefetch failures on", async () => {
    const context = contextWithPackages();
    await expect(file(context, "neovim")).rejects.toThrow(
      "Failed to prefetch flake 'github:nix-community/neovim-nightly-overlay': error: unable to download",
    );
  });
});
