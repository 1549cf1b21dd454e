import { existsSync, readFileSync, statSync } from "fs";
import { basename, dirname, join } from "path";
import fg from "fast-glob";
import type { LocalFlake, LocalPackage, LocalScan } from "../types.js";

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_'-]*$/;

export function isNixIdentifier(value: string): boolean {
  return IDENTIFIER.test(value);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Drop `#` comments that start a line or follow whitespace outside a string. */
function stripComments(content: string): string {
  return content
    .split("\n")
    .map((line) => {
      let inString = false;
      for (let i = 0; i < line.length; i += 1) {
        const ch = line[i];
        if (ch === "\\" && inString) {
          i += 1;
        } else if (ch === '"') {
          inString = !inString;
        } else if (ch === "#" && !inString && (i === 0 || /\s/.test(line[i - 1]))) {
          return line.slice(0, i);
        }
      }
      return line;
    })
    .join("\n");
}

function unescapeNixString(value: string): string {
  return value.replace(/\\(.)/g, (_, ch: string) => {
    if (ch === "n") return "\n";
    if (ch === "t") return "\t";
    if (ch === "r") return "\r";
    return ch;
  });
}

/**
 * Value of the first single-component binding `attr = value;` in the file,
 * at any nesting depth. Quoted strings, identifiers and literals are read;
 * interpolated strings and compound expressions are not.
 */
export function parseLocalPackageAttr(content: string, attr: string): string | undefined {
  const pattern = new RegExp(
    `(?:^|[\\s{;])${escapeRegExp(attr)}\\s*=\\s*(?:"((?:[^"\\\\]|\\\\.)*)"|([A-Za-z0-9_][A-Za-z0-9_'.:/-]*))\\s*;`,
    "m",
  );
  const match = pattern.exec(stripComments(content));
  if (!match) return undefined;
  const [, quoted, bare] = match;
  if (quoted !== undefined) {
    return quoted.includes("${") ? undefined : unescapeNixString(quoted);
  }
  return bare;
}

/** The first two-component `name.url = "...";` binding. */
export function parseLocalPackageInput(content: string): { name: string; url: string } | undefined {
  const match = /(?:^|[\s{;])([A-Za-z_][A-Za-z0-9_'-]*)\.url\s*=\s*"([^"$]*)"\s*;/m.exec(stripComments(content));
  if (!match) return undefined;
  return { name: match[1], url: match[2] };
}

export function parseLocalPackageSource(content: string, file: string): LocalPackage | undefined {
  const name = parseLocalPackageAttr(content, "pname") ?? parseLocalPackageAttr(content, "name");
  if (!name || !isNixIdentifier(name)) {
    return undefined;
  }
  const input = parseLocalPackageInput(content);
  return {
    name,
    file,
    input_name: input?.name,
    input_url: input?.url,
    overlay: parseLocalPackageAttr(content, "overlay"),
    package_expr: parseLocalPackageAttr(content, "packageExpr"),
  };
}

function byName(a: { name: string }, b: { name: string }): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/**
 * Scan a packages directory: `*.nix` files that declare a name, and
 * subdirectories holding their own flake.nix. Results are sorted by name.
 */
export function scanLocalPackages(packagesDir: string | null | undefined): LocalScan {
  if (!packagesDir || !existsSync(packagesDir) || !statSync(packagesDir).isDirectory()) {
    return { packages: [], flakes: [] };
  }

  const packages: LocalPackage[] = [];
  for (const file of fg.sync("*.nix", { cwd: packagesDir, onlyFiles: true })) {
    const pkg = parseLocalPackageSource(readFileSync(join(packagesDir, file), "utf-8"), file);
    if (pkg) packages.push(pkg);
  }

  const flakes: LocalFlake[] = fg
    .sync("*/flake.nix", { cwd: packagesDir, onlyFiles: true })
    .map((file) => ({ name: basename(dirname(file)) }))
    .filter((flake) => isNixIdentifier(flake.name));

  return { packages: packages.sort(byName), flakes: flakes.sort(byName) };
}

export function localNames(scan: LocalScan): Set<string> {
  return new Set([...scan.packages.map((pkg) => pkg.name), ...scan.flakes.map((flake) => flake.name)]);
}
