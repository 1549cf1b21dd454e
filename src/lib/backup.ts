import { cpSync, existsSync, mkdirSync, readdirSync, rmSync, statSync } from "fs";
import { basename, dirname, join } from "path";

export const DEFAULT_BACKUP_RETENTION = 3;

function timestamp(): string {
  return new Date().toISOString().replace(/[:.]/g, "-");
}

export function buildBackupPath(backupsDir: string, targetPath: string, owner: string): string {
  const base = join(backupsDir, owner, timestamp());
  // Two backups inside the same millisecond get numbered directories.
  let dir = base;
  for (let n = 1; existsSync(join(dir, basename(targetPath))); n += 1) {
    dir = `${base}-${n}`;
  }
  return join(dir, basename(targetPath));
}

/** Copy a file or directory aside. Returns null when there is nothing to copy. */
export function createBackup(backupsDir: string, targetPath: string, owner: string): string | null {
  if (!existsSync(targetPath)) return null;

  const backupPath = buildBackupPath(backupsDir, targetPath, owner);
  mkdirSync(dirname(backupPath), { recursive: true });
  cpSync(targetPath, backupPath, { recursive: statSync(targetPath).isDirectory() });
  return backupPath;
}

/** Newest first; ISO timestamps sort lexicographically. */
export function listBackups(backupsDir: string, owner: string): string[] {
  const ownerDir = join(backupsDir, owner);
  if (!existsSync(ownerDir)) return [];

  return readdirSync(ownerDir)
    .filter((name) => statSync(join(ownerDir, name)).isDirectory())
    .sort()
    .reverse()
    .map((name) => join(ownerDir, name));
}

export function pruneBackups(backupsDir: string, owner: string, retention: number = DEFAULT_BACKUP_RETENTION): void {
  for (const stale of listBackups(backupsDir, owner).slice(retention)) {
    rmSync(stale, { recursive: true, force: true });
  }
}
