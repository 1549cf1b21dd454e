import { describe, it, expect } from "vitest";
import { ExitCodes, NixyError } from "../errors.js";
import { addCustomPackage, addLegacyPackage, createPackageState } from "../package-state.js";
import type { CustomPackage, ResolvedPackage } from "../types.js";
import { MARKERS, extractSectionContent, hasMarker } from "./editor.js";
import { renderFlake } from "./generator.js";
import {
  addCustomPackageEdit,
  addInputParameter,
  addLocalPackageEdit,
  addPlainPackageEdit,
  addResolvedPackageEdit,
  removePackageEdit,
  retrofitMarkers,
} from "./marker-edits.js";

const COMMIT = "0123456789abcdef0123456789abcdef01234567";

const NEOVIM: CustomPackage = {
  name: "neovim",
  input_name: "neovim-nightly",
  input_url: "github:nix-community/neovim-nightly-overlay",
  package_output: "packages",
};

function resolved(name: string, platforms?: string[]): ResolvedPackage {
  return { name, resolved_version: "20.1.0", attribute_path: name, commit_hash: COMMIT, platforms };
}

function markerFlake(): string {
  return retrofitMarkers(renderFlake(createPackageState()));
}

function codeOf(fn: () => unknown): number | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof NixyError ? error.code : undefined;
  }
  return undefined;
}

describe("addInputParameter", () => {
  it("appends to the parameter list", () => {
    expect(addInputParameter("outputs = { self, nixpkgs }@inputs:", "fenix")).toBe(
      "outputs = { self, nixpkgs, fenix }@inputs:",
    );
  });

  it("inserts before an ellipsis", () => {
    expect(addInputParameter("outputs = { self, nixpkgs, ... }@inputs:", "fenix")).toBe(
      "outputs = { self, nixpkgs, fenix, ... }@inputs:",
    );
  });

  it("leaves the text alone when the name is present or there is no signature", () => {
    const text = "outputs = { self, nixpkgs, fenix }@inputs:";
    expect(addInputParameter(text, "fenix")).toBe(text);
    expect(addInputParameter("{ }", "fenix")).toBe("{ }");
  });
});

describe("retrofitMarkers", () => {
  it("adds every managed section to a generated flake", () => {
    const text = markerFlake();
    for (const name of Object.values(MARKERS)) {
      expect(hasMarker(text, name)).toBe(true);
    }
    expect(text).toContain(
      [
        '    nixpkgs.url = "github:NixOS/nixpkgs/nixos-unstable";',
        "    # [nixy:custom-inputs]",
        "    # [/nixy:custom-inputs]",
        "    # [nixy:local-inputs]",
        "    # [/nixy:local-inputs]",
        "  };",
      ].join("\n"),
    );
    expect(text).toContain(
      ["            paths = [", "              # [nixy:env-paths]", "              # [/nixy:env-paths]", "            ];"].join(
        "\n",
      ),
    );
  });

  it("sorts existing entries into sections", () => {
    const state = createPackageState();
    addLegacyPackage(state, "ripgrep");
    addCustomPackage(state, NEOVIM);
    const text = retrofitMarkers(renderFlake(state));
    expect(extractSectionContent(text, MARKERS.packages)).toBe("          ripgrep = pkgs.ripgrep;\n");
    expect(extractSectionContent(text, MARKERS.customPackages)).toBe(
      "          neovim = inputs.neovim-nightly.packages.${system}.neovim;\n",
    );
    expect(extractSectionContent(text, MARKERS.customInputs)).toBe(
      '    neovim-nightly.url = "github:nix-community/neovim-nightly-overlay";\n',
    );
    expect(extractSectionContent(text, MARKERS.envPaths)).toBe("              ripgrep\n              neovim\n");
  });

  it("returns a marker file unchanged", () => {
    const text = markerFlake();
    expect(retrofitMarkers(text)).toBe(text);
  });

  it("refuses text without the generated layout", () => {
    expect(codeOf(() => retrofitMarkers("{ outputs = _: { }; }\n"))).toBe(ExitCodes.Consistency);
  });
});

describe("incremental edits", () => {
  it("adds and removes a plain package without disturbing anything else", () => {
    const text = markerFlake();
    const added = addPlainPackageEdit(text, "hello");
    expect(extractSectionContent(added, MARKERS.packages)).toBe("          hello = pkgs.hello;\n");
    expect(extractSectionContent(added, MARKERS.envPaths)).toBe("              hello\n");
    expect(removePackageEdit(added, "hello")).toBe(text);
  });

  it("declares a custom input once and widens the outputs parameters", () => {
    const once = addCustomPackageEdit(markerFlake(), NEOVIM);
    const twice = addCustomPackageEdit(once, { ...NEOVIM, name: "nvim-qt", source_name: "neovim-qt" });
    expect(extractSectionContent(twice, MARKERS.customInputs)).toBe(
      '    neovim-nightly.url = "github:nix-community/neovim-nightly-overlay";\n',
    );
    expect(twice).toContain("  outputs = { self, nixpkgs, neovim-nightly }@inputs:\n");
    expect(extractSectionContent(twice, MARKERS.customPackages)).toBe(
      [
        "          nvim-qt = inputs.neovim-nightly.packages.${system}.neovim-qt;",
        "          neovim = inputs.neovim-nightly.packages.${system}.neovim;",
        "",
      ].join("\n"),
    );
  });

  it("reuses nixpkgs for custom packages from the default repository", () => {
    const text = addCustomPackageEdit(markerFlake(), {
      ...NEOVIM,
      name: "hello",
      input_name: "nixpkgs-hello",
      input_url: "github:NixOS/nixpkgs",
    });
    expect(extractSectionContent(text, MARKERS.customInputs)).toBe("");
    expect(extractSectionContent(text, MARKERS.customPackages)).toBe(
      "          hello = inputs.nixpkgs.packages.${system}.hello;\n",
    );
  });

  it("pins resolved packages to their commit input", () => {
    const text = addResolvedPackageEdit(markerFlake(), resolved("nodejs"));
    expect(extractSectionContent(text, MARKERS.customInputs)).toBe(
      `    nixpkgs-01234567.url = "github:NixOS/nixpkgs/${COMMIT}";\n`,
    );
    expect(extractSectionContent(text, MARKERS.customPackages)).toBe(
      "          nodejs = inputs.nixpkgs-01234567.legacyPackages.${system}.nodejs;\n",
    );
  });

  it("adds local package expressions", () => {
    const text = addLocalPackageEdit(markerFlake(), "hello", "pkgs.callPackage ./packages/hello.nix {}");
    expect(extractSectionContent(text, MARKERS.localPackages)).toBe(
      "          hello = pkgs.callPackage ./packages/hello.nix {};\n",
    );
  });

  it("removes only exact names", () => {
    const text = addPlainPackageEdit(addPlainPackageEdit(markerFlake(), "hello-world"), "hello");
    const removed = removePackageEdit(text, "hello");
    expect(extractSectionContent(removed, MARKERS.packages)).toBe("          hello-world = pkgs.hello-world;\n");
    expect(extractSectionContent(removed, MARKERS.envPaths)).toBe("              hello-world\n");
  });

  it("skips env paths on files without that section", () => {
    const text = "# [nixy:packages]\n# [/nixy:packages]\n";
    expect(addPlainPackageEdit(text, "hello")).toBe("# [nixy:packages]\n          hello = pkgs.hello;\n# [/nixy:packages]\n");
  });

  it("rejects platform restrictions and missing sections", () => {
    expect(codeOf(() => addResolvedPackageEdit(markerFlake(), resolved("strace", ["x86_64-linux"])))).toBe(
      ExitCodes.Usage,
    );
    expect(codeOf(() => addPlainPackageEdit(renderFlake(createPackageState()), "hello"))).toBe(ExitCodes.Consistency);
  });
});
