import { cpSync, readFileSync, rmSync, statSync } from "fs";
import { errorMessage, isErrnoException } from "./errors.js";
import { atomicWriteFileSync } from "./fs-utils.js";
import { info, warn } from "./output.js";

/** Which state file layout a snapshot belongs to. */
export type StateFormat = "legacy" | "profiles";

export interface FileSnapshot {
  path: string;
  /** Raw bytes before the operation; null when the file did not exist. */
  contents: Buffer | null;
}

export interface RemovedPath {
  path: string;
  backupPath: string;
}

export interface RollbackContext {
  format: StateFormat;
  /** Profile the operation acts on, for messages. */
  label: string;
  flakeDir: string;
  files: FileSnapshot[];
  createdPaths: string[];
  removedPaths: RemovedPath[];
}

export type InterruptOutcome = "committed" | "idle" | "rolled-back";

function readBytesIfExists(path: string): Buffer | null {
  try {
    return readFileSync(path);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

export function snapshotFiles(paths: readonly string[]): FileSnapshot[] {
  const unique = [...new Set(paths)];
  return unique.map((path) => ({ path, contents: readBytesIfExists(path) }));
}

export function createRollbackContext(
  format: StateFormat,
  label: string,
  flakeDir: string,
  paths: readonly string[],
): RollbackContext {
  return { format, label, flakeDir, files: snapshotFiles(paths), createdPaths: [], removedPaths: [] };
}

function attempt(what: string, step: () => void): boolean {
  try {
    step();
    return true;
  } catch (error) {
    warn(`Failed to restore ${what}: ${errorMessage(error)}`);
    return false;
  }
}

/**
 * Put every path in the context back the way it was. Steps run independently;
 * a failing step is reported and the others still run. Returns whether all
 * of them succeeded.
 */
export function restoreContext(context: RollbackContext): boolean {
  let ok = true;

  for (const path of [...context.createdPaths].reverse()) {
    ok = attempt(path, () => rmSync(path, { recursive: true, force: true })) && ok;
  }

  for (const { path, backupPath } of context.removedPaths) {
    ok =
      attempt(path, () => {
        rmSync(path, { recursive: true, force: true });
        cpSync(backupPath, path, { recursive: statSync(backupPath).isDirectory() });
      }) && ok;
  }

  for (const { path, contents } of context.files) {
    ok =
      attempt(path, () => {
        if (contents === null) {
          rmSync(path, { force: true });
        } else {
          atomicWriteFileSync(path, contents);
        }
      }) && ok;
  }

  return ok;
}

/**
 * Holds the snapshot of the one mutating operation in flight. Both the
 * operation's own failure path and the SIGINT handler go through take(), so
 * exactly one of them restores.
 */
export class RollbackController {
  private context: RollbackContext | null = null;
  private completed = false;

  arm(context: RollbackContext): void {
    this.context = context;
    this.completed = false;
  }

  /** Clear the context, then mark the operation complete. */
  commit(): void {
    this.context = null;
    this.completed = true;
  }

  take(): RollbackContext | null {
    const context = this.context;
    this.context = null;
    return context;
  }

  get armed(): boolean {
    return this.context !== null;
  }

  get isCompleted(): boolean {
    return this.completed;
  }

  recordCreated(path: string): void {
    this.context?.createdPaths.push(path);
  }

  recordRemoved(path: string, backupPath: string): void {
    this.context?.removedPaths.push({ path, backupPath });
  }

  handleInterrupt(): InterruptOutcome {
    if (this.completed) {
      return "committed";
    }
    const context = this.take();
    if (!context) {
      return "idle";
    }
    warn("Interrupted. Rolling back changes...");
    if (restoreContext(context)) {
      info(`Rollback complete. Profile '${context.label}' is unchanged.`);
    }
    return "rolled-back";
  }
}

export const rollbackController = new RollbackController();
