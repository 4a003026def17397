import { existsSync, lstatSync, renameSync, rmSync } from "node:fs";
import { basename, dirname, extname, join } from "node:path";
import { create } from "tar";
import { FilesystemError } from "../core/errors";
import type { BackupStrategy } from "../core/types";
import { ensureDir, timestamp } from "../core/utils";

export interface BackupPathOptions {
  kind: "file" | "directory";
  strategy?: BackupStrategy;
  /** Disambiguates when an earlier backup already occupies the name. */
  index?: number;
  now?: Date;
}

/**
 * Where a backup of `original` goes. Pure: looks at nothing on disk.
 *
 *   ~/.config/gtk-3.0          -> ~/.config/gtk-3.0-backup
 *   ~/.config/kitty/kitty.conf -> ~/.config/kitty/kitty-backup.conf
 *   index 2                    -> ~/.config/gtk-3.0-backup-2
 *   archive                    -> ~/.config/fastfetch-backup/fastfetch-20250102-030405.tar.gz
 */
export function backupPath(
  original: string,
  options: BackupPathOptions,
): string {
  const strategy = options.strategy ?? "rename";
  const index = options.index ?? 0;
  const suffix = index > 0 ? `-backup-${index}` : "-backup";
  const dir = dirname(original);
  const name = basename(original);

  if (strategy === "archive") {
    const stamp = timestamp(options.now ?? new Date());
    const file =
      index > 0 ? `${name}-${stamp}-${index}.tar.gz` : `${name}-${stamp}.tar.gz`;
    return join(dir, `${name}-backup`, file);
  }

  if (options.kind === "directory") return `${original}${suffix}`;

  const ext = extname(name);
  if (!ext) return `${original}${suffix}`;
  return join(dir, `${name.slice(0, -ext.length)}${suffix}${ext}`);
}

export interface BackupOptions {
  strategy?: BackupStrategy;
  now?: Date;
}

function freeBackupPath(original: string, options: BackupPathOptions): string {
  for (let index = 0; ; index++) {
    const candidate = backupPath(original, { ...options, index });
    if (!existsSync(candidate)) return candidate;
  }
}

async function archiveDirectory(
  target: string,
  options: BackupPathOptions,
): Promise<string> {
  const dest = freeBackupPath(target, options);
  const partial = `${dest}.partial`;
  ensureDir(dirname(dest));
  try {
    await create({ gzip: true, file: partial, cwd: dirname(target) }, [
      basename(target),
    ]);
    renameSync(partial, dest);
  } catch (err) {
    rmSync(partial, { force: true });
    throw new FilesystemError(`Could not archive ${target}`, { cause: err });
  }
  // the archive is complete on disk before the original goes away
  try {
    rmSync(target, { recursive: true, force: true });
  } catch (err) {
    throw new FilesystemError(
      `Archived ${target} to ${dest} but could not remove it`,
      { cause: err },
    );
  }
  return dest;
}

/**
 * Moves whatever is at `target` out of the way. Resolves with the backup
 * location, or null when there was nothing to back up.
 */
export async function backupTarget(
  target: string,
  options: BackupOptions = {},
): Promise<string | null> {
  let isDir: boolean;
  try {
    isDir = lstatSync(target).isDirectory();
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return null;
    }
    throw new FilesystemError(`Could not inspect ${target}`, { cause: err });
  }

  const pathOptions: BackupPathOptions = {
    kind: isDir ? "directory" : "file",
    strategy: options.strategy === "archive" && isDir ? "archive" : "rename",
    now: options.now,
  };

  if (pathOptions.strategy === "archive") {
    return archiveDirectory(target, pathOptions);
  }

  const dest = freeBackupPath(target, pathOptions);
  try {
    renameSync(target, dest);
  } catch (err) {
    throw new FilesystemError(`Could not move ${target} to ${dest}`, {
      cause: err,
    });
  }
  return dest;
}
