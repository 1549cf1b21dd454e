import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { SettingsSchema, type Settings } from "./schema.js";
import { resolvePaths } from "./path.js";
import { NixyError, ExitCodes, errorMessage } from "../errors.js";

export interface LoadSettingsResult {
  settings: Settings;
  settingsPath: string;
  errors: SettingsLoadError[];
}

export interface SettingsLoadError {
  source: string;
  message: string;
  path?: string[];
}

export function defaultSettings(): Settings {
  return SettingsSchema.parse({});
}

function parseYamlFile(filePath: string): { data: unknown; errors: SettingsLoadError[] } {
  try {
    const data: unknown = parseYaml(readFileSync(filePath, "utf-8"));
    if (data === null || data === undefined) {
      return { data: {}, errors: [] };
    }
    if (typeof data !== "object" || Array.isArray(data)) {
      return {
        data: {},
        errors: [{ source: filePath, message: "Settings must be a YAML mapping, not a scalar or sequence" }],
      };
    }
    return { data, errors: [] };
  } catch (error) {
    return { data: {}, errors: [{ source: filePath, message: errorMessage(error) }] };
  }
}

/**
 * Load settings.yaml. A missing file yields defaults; an invalid one yields
 * defaults plus the errors found, so callers can decide whether to go on.
 */
export function loadSettings(settingsPath?: string): LoadSettingsResult {
  const path = settingsPath || resolvePaths().settingsFile;

  if (!existsSync(path)) {
    return { settings: defaultSettings(), settingsPath: path, errors: [] };
  }

  const parsed = parseYamlFile(path);
  if (parsed.errors.length > 0) {
    return { settings: defaultSettings(), settingsPath: path, errors: parsed.errors };
  }

  const result = SettingsSchema.safeParse(parsed.data);
  if (!result.success) {
    const errors = result.error.issues.map((issue) => ({
      source: path,
      message: issue.message,
      path: issue.path.map(String),
    }));
    return { settings: defaultSettings(), settingsPath: path, errors };
  }

  return { settings: result.data, settingsPath: path, errors: [] };
}

export function loadSettingsStrict(settingsPath?: string): Settings {
  const { settings, errors } = loadSettings(settingsPath);
  if (errors.length > 0) {
    const messages = errors.map((e) =>
      e.path && e.path.length > 0 ? `${e.source}: ${e.path.join(".")}: ${e.message}` : `${e.source}: ${e.message}`
    );
    throw new NixyError(`Settings validation failed:\n${messages.join("\n")}`, ExitCodes.Validation);
  }
  return settings;
}
