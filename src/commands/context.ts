import { loadSettingsStrict } from "../lib/config/loader.js";
import { resolvePaths } from "../lib/config/path.js";
import type { StateBackend } from "../lib/backend.js";
import { hasAnyMarker } from "../lib/flake/editor.js";
import { NixBuilder } from "../lib/nix.js";
import { NixhubClient, type Registry } from "../lib/nixhub.js";
import type { ChangeContext } from "../lib/package-change.js";
import { readTextIfExists } from "../lib/fs-utils.js";
import { rollbackController } from "../lib/rollback.js";

export interface CommandContext extends ChangeContext {
  registry: Registry;
  /** Raw stdout, for output meant to be piped or eval'd. */
  write(text: string): void;
}

export interface CommandContextOptions {
  force?: boolean;
}

export function createCommandContext(options: CommandContextOptions = {}): CommandContext {
  const paths = resolvePaths();
  const settings = loadSettingsStrict(paths.settingsFile);
  return {
    paths,
    settings,
    builder: new NixBuilder({ allowUnfree: settings.allow_unfree }),
    registry: new NixhubClient(settings.search_endpoint),
    controller: rollbackController,
    force: options.force ?? false,
    write: (text) => {
      process.stdout.write(text);
    },
  };
}

/** Whether changes to this backend's flake.nix go through the marker editor. */
export function editsInPlace(backend: StateBackend): boolean {
  if (!backend.editsMarkers) {
    return false;
  }
  const text = readTextIfExists(backend.profile.configFilePath);
  return text !== null && hasAnyMarker(text);
}
