import { join } from "path";
import { usageError } from "../lib/errors.js";
import type { CommandContext } from "./context.js";

const USAGE = `Usage: nixy config <shell>
Supported shells: bash, zsh, fish

Add to your shell config:
  bash/zsh: eval "$(nixy config zsh)"
  fish:     nixy config fish | source`;

export function shellSnippet(shell: string, envLink: string): string {
  const bin = join(envLink, "bin");
  switch (shell) {
    case "bash":
    case "zsh":
    case "sh":
      return `# nixy shell configuration\nexport PATH="${bin}:$PATH"\n`;
    case "fish":
      return `# nixy shell configuration\nset -gx PATH "${bin}" $PATH\n`;
    default:
      throw usageError(`Unknown shell: ${shell}. Supported: bash, zsh, fish`);
  }
}

export function shellConfig(context: CommandContext, shell: string | undefined): void {
  if (!shell) {
    throw usageError(USAGE);
  }
  context.write(shellSnippet(shell, context.paths.envLink));
}
