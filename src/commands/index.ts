import { HELP_TEXT, type ParsedArgs } from "../cli-args.js";
import { usageError } from "../lib/errors.js";
import { detail } from "../lib/output.js";
import type { CommandContext } from "./context.js";
import { file } from "./file.js";
import { gc } from "./gc.js";
import { install } from "./install.js";
import { list } from "./list.js";
import { migrate } from "./migrate.js";
import { deleteProfileCommand, listProfilesCommand, showActiveProfile, switchProfile } from "./profile.js";
import { search } from "./search.js";
import { shellConfig } from "./shell-config.js";
import { sync } from "./sync.js";
import { uninstall } from "./uninstall.js";
import { upgrade } from "./upgrade.js";
import { version } from "./version.js";

export function showHelp(): void {
  HELP_TEXT.split("\n").forEach((line) => detail(line));
}

async function runProfileCommand(context: CommandContext, args: ParsedArgs): Promise<void> {
  const [sub, name] = args.positionals;
  switch (sub) {
    case undefined:
      showActiveProfile(context);
      return;
    case "list":
    case "ls":
      listProfilesCommand(context);
      return;
    case "switch":
    case "use":
      await switchProfile(context, name, { create: args.create });
      return;
    case "delete":
    case "rm":
      deleteProfileCommand(context, name, { force: args.force });
      return;
    default:
      throw usageError(`Unknown profile command: ${sub}. Use list, switch or delete.`);
  }
}

export async function runCommand(context: CommandContext, args: ParsedArgs): Promise<void> {
  if (args.help || args.command === null || args.command === "help") {
    showHelp();
    return;
  }

  const [first] = args.positionals;
  switch (args.command) {
    case "install":
      await install(context, { spec: first, from: args.from, file: args.file, platforms: args.platforms });
      return;
    case "uninstall":
      await uninstall(context, first);
      return;
    case "list":
      list(context);
      return;
    case "search":
      await search(context, args.positionals.join(" ") || undefined);
      return;
    case "file":
      await file(context, first);
      return;
    case "upgrade":
      await upgrade(context, args.positionals);
      return;
    case "sync":
      await sync(context, { regenerate: args.regenerate });
      return;
    case "profile":
      await runProfileCommand(context, args);
      return;
    case "config":
      shellConfig(context, first);
      return;
    case "gc":
      await gc(context);
      return;
    case "migrate":
      migrate(context);
      return;
    case "version":
      version();
      return;
  }
}
