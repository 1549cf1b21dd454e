import { openBackend } from "../lib/backend.js";
import { hasAnyMarker } from "../lib/flake/editor.js";
import { atomicWriteFileSync, readTextIfExists } from "../lib/fs-utils.js";
import { info, success } from "../lib/output.js";
import { backupFlake } from "../lib/package-change.js";
import { createRollbackContext } from "../lib/rollback.js";
import { runTransaction } from "../lib/transaction.js";
import type { CommandContext } from "./context.js";

export interface SyncOptions {
  regenerate: boolean;
}

/**
 * Build the active profile. flake.nix is rendered from the package state when
 * it is missing, when asked to, or when a marker-based file sits where a
 * generated one belongs.
 */
export async function sync(context: CommandContext, options: SyncOptions): Promise<void> {
  const backend = openBackend(context.paths, context.settings);
  const { profile } = backend;
  const existing = readTextIfExists(profile.configFilePath);
  const regenerate =
    options.regenerate || existing === null || (!backend.editsMarkers && hasAnyMarker(existing));

  const snapshot = createRollbackContext(backend.format, profile.name, profile.directory, [profile.configFilePath]);
  await runTransaction(context.controller, snapshot, "sync", async (progress) => {
    if (regenerate) {
      progress.step("writing flake.nix");
      const rendered = backend.render(backend.load());
      if (existing === null) {
        info("Regenerating flake.nix from package state...");
      } else if (existing !== rendered) {
        info("Regenerating flake.nix...");
        backupFlake(context, backend);
      }
      atomicWriteFileSync(profile.configFilePath, rendered);
    }

    info(`Syncing packages with ${profile.configFilePath}...`);
    progress.step("building environment");
    info("Building nixy environment...");
    await context.builder.build(profile.directory, "default", context.paths.envLink);
  });
  success("Sync complete");
}
