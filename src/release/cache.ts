import { randomBytes } from "node:crypto";
import { mkdirSync, readdirSync, renameSync, rmSync } from "node:fs";
import { join } from "node:path";
import lockfile from "proper-lockfile";
import { extract } from "tar";
import {
  ExtractError,
  FilesystemError,
  MissingAssetError,
  NotFoundError,
} from "../core/errors";
import type { CacheEntry, Release } from "../core/types";
import {
  ensureDir,
  isDirectory,
  isNonEmptyDir,
  sanitizeTag,
} from "../core/utils";
import { downloadToFile } from "./download";
import type { FetchLike } from "./resolver";

export interface EnsureCacheOptions {
  fetch?: FetchLike;
}

function tempSuffix(): string {
  return `${process.pid}-${randomBytes(4).toString("hex")}`;
}

export function cacheEntryPath(cacheRoot: string, tag: string): string {
  const segment = sanitizeTag(tag);
  if (!segment) throw new NotFoundError(`Unusable release tag "${tag}"`);
  return join(cacheRoot, segment);
}

/** Cached release directories, newest first by name. */
export function listCachedTags(cacheRoot: string): string[] {
  if (!isDirectory(cacheRoot)) return [];
  return readdirSync(cacheRoot, { withFileTypes: true })
    .filter((e) => e.isDirectory() && !e.name.startsWith("."))
    .map((e) => e.name)
    .sort()
    .reverse();
}

async function extractInto(archive: string, dest: string): Promise<void> {
  mkdirSync(dest, { recursive: true });
  try {
    await extract({ file: archive, cwd: dest, strict: true });
  } catch (err) {
    throw new ExtractError(`Failed to extract ${archive}`, { cause: err });
  }
  if (!isNonEmptyDir(dest)) {
    throw new ExtractError(`Archive ${archive} contained no files`);
  }
}

async function populate(
  release: Release,
  cacheRoot: string,
  entryDir: string,
  options: EnsureCacheOptions,
): Promise<void> {
  const segment = sanitizeTag(release.tag);
  const suffix = tempSuffix();
  const archive = join(cacheRoot, `.download-${segment}-${suffix}.tar.gz`);
  const staging = join(cacheRoot, `.extract-${segment}-${suffix}`);

  try {
    await downloadToFile(release.archiveUrl, archive, options.fetch);
    await extractInto(archive, staging);

    // an empty leftover directory is not a cache hit and would block rename
    if (isDirectory(entryDir)) rmSync(entryDir, { recursive: true });
    try {
      renameSync(staging, entryDir);
    } catch (err) {
      throw new FilesystemError(`Could not move release into ${entryDir}`, {
        cause: err,
      });
    }
  } finally {
    rmSync(archive, { force: true });
    rmSync(staging, { recursive: true, force: true });
  }
}

/**
 * Makes sure `cacheRoot/<tag>` holds the extracted release archive,
 * downloading it only on a miss. The canonical directory only ever appears
 * fully populated.
 */
export async function ensureCacheEntry(
  release: Release,
  cacheRoot: string,
  options: EnsureCacheOptions = {},
): Promise<CacheEntry> {
  const entryDir = cacheEntryPath(cacheRoot, release.tag);
  if (isNonEmptyDir(entryDir)) {
    return { tag: release.tag, extractedPath: entryDir, fromCache: true };
  }

  ensureDir(cacheRoot);

  const unlock = await lockfile
    .lock(cacheRoot, {
      stale: 30_000,
      retries: { retries: 3, minTimeout: 50, factor: 2 },
    })
    .catch((err: unknown) => {
      throw new FilesystemError(
        `Cache ${cacheRoot} is locked by another installer run`,
        { cause: err },
      );
    });

  try {
    if (isNonEmptyDir(entryDir)) {
      return { tag: release.tag, extractedPath: entryDir, fromCache: true };
    }
    await populate(release, cacheRoot, entryDir, options);
    return { tag: release.tag, extractedPath: entryDir, fromCache: false };
  } finally {
    await unlock();
  }
}

/** The directory inside a cache entry that asset paths are relative to. */
export function layoutRoot(entry: CacheEntry, candidates: string[]): string {
  for (const candidate of candidates) {
    const path = join(entry.extractedPath, candidate);
    if (isDirectory(path)) return path;
  }
  throw new MissingAssetError(
    `None of ${candidates.join(", ")} found in release ${entry.tag} at ${entry.extractedPath}`,
  );
}
