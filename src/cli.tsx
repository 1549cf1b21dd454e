#!/usr/bin/env node
import React from "react";
import { render } from "ink";
import { App } from "./App.js";
import { parseArgs, type ParsedArgs } from "./cli-args.js";
import { createCommandContext } from "./commands/context.js";
import { runCommand } from "./commands/index.js";
import { ExitCodes, NixyError, errorMessage, type ExitCode } from "./lib/errors.js";
import { detail, error } from "./lib/output.js";
import { rollbackController } from "./lib/rollback.js";

function report(err: unknown): ExitCode {
  if (err instanceof NixyError) {
    if (err.code === ExitCodes.Usage) {
      detail(err.message);
    } else {
      error(err.message);
    }
    return err.code;
  }
  error(errorMessage(err));
  return ExitCodes.Failure;
}

async function execute(argv: readonly string[]): Promise<ExitCode> {
  let args: ParsedArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    return report(err);
  }
  try {
    await runCommand(createCommandContext({ force: args.force }), args);
    return ExitCodes.Success;
  } catch (err) {
    return report(err);
  }
}

// `config` prints a snippet for `eval`, so its messages go to stderr.
const app = render(<App />, { stdout: process.argv[2] === "config" ? process.stderr : process.stdout });

function finish(code: ExitCode): void {
  process.exitCode = code;
  app.unmount();
}

process.on("SIGINT", () => {
  rollbackController.handleInterrupt();
  app.unmount();
  process.exit(ExitCodes.Interrupted);
});

execute(process.argv.slice(2)).then(finish, (err: unknown) => finish(report(err)));
