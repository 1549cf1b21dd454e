import { existsSync } from "fs";
import { hasLegacyLayout, runMigration } from "../lib/migration.js";
import { info } from "../lib/output.js";
import type { CommandContext } from "./context.js";

export function migrate(context: CommandContext): void {
  const { paths } = context;
  if (existsSync(paths.storeFile)) {
    info(`Already using ${paths.storeFile}; nothing to migrate.`);
    return;
  }
  if (!hasLegacyLayout(paths)) {
    info("No legacy configuration found; nothing to migrate.");
    return;
  }
  runMigration(paths);
}
