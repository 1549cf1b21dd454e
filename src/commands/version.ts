import { readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { info } from "../lib/output.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

const PackageJsonSchema = z.object({ version: z.string() });

/** Version from the package manifest two levels up (src/ or dist/). */
export function readVersion(manifestPath: string = join(__dirname, "..", "..", "package.json")): string {
  return PackageJsonSchema.parse(JSON.parse(readFileSync(manifestPath, "utf-8"))).version;
}

export function version(): void {
  info(`nixy ${readVersion()}`);
}
