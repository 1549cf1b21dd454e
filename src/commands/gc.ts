import { info, success } from "../lib/output.js";
import type { CommandContext } from "./context.js";

export async function gc(context: CommandContext): Promise<void> {
  info("Running garbage collection...");
  await context.builder.collectGarbage();
  success("Garbage collection complete");
}
