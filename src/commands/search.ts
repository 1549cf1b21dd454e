import { usageError } from "../lib/errors.js";
import { info, showSearchResults } from "../lib/output.js";
import type { CommandContext } from "./context.js";

export async function search(context: CommandContext, query: string | undefined): Promise<void> {
  if (!query) {
    throw usageError("Usage: nixy search <query>");
  }
  info(`Searching for ${query}...`);
  showSearchResults(query, await context.registry.search(query));
}
