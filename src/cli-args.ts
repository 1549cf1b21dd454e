import { usageError } from "./lib/errors.js";

export const COMMANDS = [
  "install",
  "uninstall",
  "list",
  "search",
  "file",
  "upgrade",
  "sync",
  "profile",
  "config",
  "gc",
  "migrate",
  "version",
  "help",
] as const;

export type Command = (typeof COMMANDS)[number];

const ALIASES = new Map<string, Command>([
  ["add", "install"],
  ["remove", "uninstall"],
  ["ls", "list"],
]);

export interface ParsedArgs {
  command: Command | null;
  positionals: string[];
  from?: string;
  file?: string;
  platforms: string[];
  regenerate: boolean;
  create: boolean;
  force: boolean;
  help: boolean;
}

function toCommand(word: string): Command {
  const alias = ALIASES.get(word);
  if (alias) return alias;
  const command = COMMANDS.find((candidate) => candidate === word);
  if (!command) {
    throw usageError(`Unknown command: ${word}. Run 'nixy help' for a list of commands.`);
  }
  return command;
}

/** Arguments after the script path, e.g. `process.argv.slice(2)`. */
export function parseArgs(args: readonly string[]): ParsedArgs {
  const result: ParsedArgs = {
    command: null,
    positionals: [],
    platforms: [],
    regenerate: false,
    create: false,
    force: false,
    help: false,
  };

  const takeValue = (index: number, option: string): string => {
    const value = args[index + 1];
    if (value === undefined || value.startsWith("-")) {
      throw usageError(`Option ${option} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i += 1) {
    const raw = args[i];
    const eq = raw.startsWith("--") ? raw.indexOf("=") : -1;
    const arg = eq === -1 ? raw : raw.slice(0, eq);
    const inline = eq === -1 ? undefined : raw.slice(eq + 1);

    if (!arg.startsWith("-")) {
      if (result.command === null) {
        result.command = toCommand(arg);
      } else {
        result.positionals.push(arg);
      }
      continue;
    }
    if (arg === "--from") {
      result.from = inline ?? takeValue(i, arg);
      if (inline === undefined) i += 1;
      continue;
    }
    if (arg === "--file" || arg === "-f") {
      result.file = inline ?? takeValue(i, arg);
      if (inline === undefined) i += 1;
      continue;
    }
    if (arg === "--platform" || arg === "-p") {
      result.platforms.push(inline ?? takeValue(i, arg));
      if (inline === undefined) i += 1;
      continue;
    }
    if (arg === "--regenerate") {
      result.regenerate = true;
      continue;
    }
    if (arg === "-c" || arg === "--create") {
      result.create = true;
      continue;
    }
    if (arg === "--force") {
      result.force = true;
      continue;
    }
    if (arg === "--help" || arg === "-h") {
      result.help = true;
      continue;
    }
    if (arg === "--version" || arg === "-V") {
      result.command = "version";
      continue;
    }
    throw usageError(`Unknown option: ${raw}`);
  }

  return result;
}

export const HELP_TEXT = [
  "nixy <command> [options]",
  "",
  "Declarative package management on top of Nix flakes, one profile at a time.",
  "",
  "Commands:",
  "  install <pkg>[@version]        Install a package resolved through Nixhub (alias: add)",
  "  install <flake-ref>[#pkg]      Install a package from a flake",
  "  install <pkg> --from <flake>   Install a package from the given flake",
  "  install --file <path.nix>      Install a local package definition",
  "  uninstall <pkg>                Remove a package (alias: remove)",
  "  list                           List installed packages (alias: ls)",
  "  search <query>                 Search Nixhub for packages",
  "  file <pkg>                     Print the path of the file defining a package",
  "  upgrade [pkg|input...]         Re-resolve versioned packages and update flake inputs",
  "  sync [--regenerate]            Build the active profile",
  "  profile                        Show the active profile",
  "  profile list                   List profiles",
  "  profile switch [-c] <name>     Switch profile, creating it with -c",
  "  profile delete <name> --force  Delete a profile",
  "  config <bash|zsh|fish>         Print shell configuration",
  "  gc                             Collect garbage in the Nix store",
  "  migrate                        Move a legacy layout into nixy.json",
  "  version                        Show the nixy version",
  "",
  "Options:",
  "  -p, --platform <name>  Restrict a package to a platform (repeatable)",
  "  -f, --file <path>      Local package definition to install",
  "  --from <flake>         Flake to install from",
  "  --force                Overwrite a hand-edited flake.nix (a backup is kept)",
  "  -h, --help             Show help",
].join("\n");
