import {
  closeSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  rmSync,
  statSync,
  writeFileSync,
} from "fs";
import { dirname } from "path";
import { isErrnoException } from "./errors.js";

const LOCK_RETRY_COUNT = 5;
const LOCK_RETRY_DELAY_MS = 50;
const LOCK_STALE_MS = 30_000;

function sleepSync(ms: number): void {
  const buffer = new SharedArrayBuffer(4);
  const view = new Int32Array(buffer);
  Atomics.wait(view, 0, 0, ms);
}

/**
 * Write through a sibling temp file and rename it over the target. The temp
 * file never outlives a failed write.
 */
export function atomicWriteFileSync(path: string, content: string | Uint8Array): void {
  mkdirSync(dirname(path), { recursive: true });
  const tempPath = `${path}.tmp`;
  try {
    const fd = openSync(tempPath, "w");
    try {
      writeFileSync(fd, content);
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    renameSync(tempPath, path);
  } catch (error) {
    rmSync(tempPath, { force: true });
    throw error;
  }
}

export function readTextIfExists(path: string): string | null {
  try {
    return readFileSync(path, "utf-8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

/** Milliseconds since the lock file was last written, or null once it is gone. */
function lockAgeMs(lockPath: string): number | null {
  try {
    return Date.now() - statSync(lockPath).mtimeMs;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

/**
 * Run `fn` while holding `<path>.lock`, created exclusively. A lock older than
 * LOCK_STALE_MS is taken over. Not re-entrant.
 */
export function withFileLockSync<T>(path: string, fn: () => T): T {
  mkdirSync(dirname(path), { recursive: true });
  const lockPath = `${path}.lock`;
  let fd: number | null = null;

  for (let attempt = 0; attempt <= LOCK_RETRY_COUNT; attempt += 1) {
    try {
      fd = openSync(lockPath, "wx");
      writeFileSync(fd, String(process.pid));
      break;
    } catch (error) {
      if (!isErrnoException(error) || error.code !== "EEXIST") {
        throw error;
      }

      const age = lockAgeMs(lockPath);
      if (age === null) {
        continue;
      }
      if (age > LOCK_STALE_MS) {
        rmSync(lockPath, { force: true });
        continue;
      }

      if (attempt === LOCK_RETRY_COUNT) {
        throw new Error(`Timed out waiting for lock on ${path}`);
      }

      sleepSync(LOCK_RETRY_DELAY_MS * (attempt + 1));
    }
  }

  try {
    return fn();
  } finally {
    if (fd !== null) {
      closeSync(fd);
    }
    rmSync(lockPath, { force: true });
  }
}
