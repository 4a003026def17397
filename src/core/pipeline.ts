import { join } from "node:path";
import { applyMutation } from "../apply/mutations";
import { spawnRunner } from "../apply/runner";
import { selectGroups } from "../catalog";
import { ensureCacheEntry, layoutRoot } from "../release/cache";
import { type FetchLike, resolveRelease } from "../release/resolver";
import { DEFAULT_LAYOUT_CANDIDATES } from "./config";
import { MissingAssetError, errorMessage } from "./errors";
import type { InstallerConfig } from "./schemas";
import type {
  ApplyContext,
  CacheEntry,
  MutationGroup,
  MutationResult,
  Release,
  ToolRunner,
} from "./types";
import { prependPath } from "./utils";

export interface PipelineOptions {
  home: string;
  cacheRoot: string;
  layoutCandidates?: string[];
  catalog?: MutationGroup[];
  dryRun?: boolean;
  env?: NodeJS.ProcessEnv;
  runner?: ToolRunner;
  now?: () => Date;
  onResult?: (result: MutationResult) => void;
}

function resolveLayout(
  cacheEntry: CacheEntry | null,
  candidates: string[],
): { root: string | null; error: Error | null } {
  if (!cacheEntry) {
    return {
      root: null,
      error: new MissingAssetError("No release assets were loaded"),
    };
  }
  try {
    return { root: layoutRoot(cacheEntry, candidates), error: null };
  } catch (err) {
    return {
      root: null,
      error: err instanceof Error ? err : new Error(String(err)),
    };
  }
}

/**
 * Applies the selected groups in catalog order. A failing mutation skips
 * the rest of its own group; other groups still run. Never throws for a
 * mutation failure, only for an invalid selection.
 */
export async function runPipeline(
  selected: Iterable<string>,
  cacheEntry: CacheEntry | null,
  options: PipelineOptions,
): Promise<MutationResult[]> {
  const groups = selectGroups(selected, options.catalog);
  const layout = resolveLayout(
    cacheEntry,
    options.layoutCandidates ?? DEFAULT_LAYOUT_CANDIDATES,
  );

  // tools installed earlier in a group (pipx) land in ~/.local/bin; under
  // sudo, child processes must still see the invoking user's home
  const env = {
    ...prependPath(options.env ?? process.env, join(options.home, ".local", "bin")),
    HOME: options.home,
  };
  const ctx: ApplyContext = {
    home: options.home,
    cacheRoot: options.cacheRoot,
    layoutRoot: layout.root,
    dryRun: options.dryRun ?? false,
    env,
    runner: options.runner ?? spawnRunner,
    now: options.now ?? (() => new Date()),
  };

  const results: MutationResult[] = [];
  const record = (result: MutationResult) => {
    results.push(result);
    options.onResult?.(result);
  };

  for (const group of groups) {
    let failedId: string | null = null;

    for (const mutation of group.mutations) {
      if (failedId !== null) {
        record({
          id: mutation.id,
          group: group.id,
          status: "skipped",
          detail: `skipped after ${failedId} failed`,
        });
        continue;
      }

      try {
        if (group.needsAssets && layout.error) throw layout.error;
        const outcome = await applyMutation(mutation, ctx);
        record({
          id: mutation.id,
          group: group.id,
          status: "success",
          detail: outcome.detail,
          ...(outcome.backupPath ? { backupPath: outcome.backupPath } : {}),
        });
      } catch (err) {
        failedId = mutation.id;
        record({
          id: mutation.id,
          group: group.id,
          status: "failed",
          detail: errorMessage(err),
        });
      }
    }
  }

  return results;
}

export interface ProvisionOptions
  extends Omit<PipelineOptions, "cacheRoot" | "layoutCandidates"> {
  groups: Iterable<string>;
  config: InstallerConfig;
  fetch?: FetchLike;
  onCacheReady?: (release: Release, entry: CacheEntry) => void;
}

export interface ProvisionReport {
  release: Release | null;
  cacheEntry: CacheEntry | null;
  results: MutationResult[];
}

/**
 * Resolve → cache → apply. Release and cache failures are fatal and
 * propagate; they are only attempted when a selected group needs assets.
 */
export async function provision(
  options: ProvisionOptions,
): Promise<ProvisionReport> {
  const selected = [...options.groups];
  const groups = selectGroups(selected, options.catalog);
  const { config } = options;

  let release: Release | null = null;
  let cacheEntry: CacheEntry | null = null;

  if (groups.some((g) => g.needsAssets)) {
    release = await resolveRelease(config.owner, config.repo, {
      apiBaseUrl: config.apiBaseUrl,
      archiveName: config.archiveName,
      fetch: options.fetch,
    });
    cacheEntry = await ensureCacheEntry(release, config.cacheRoot, {
      fetch: options.fetch,
    });
    options.onCacheReady?.(release, cacheEntry);
  }

  const results = await runPipeline(selected, cacheEntry, {
    ...options,
    cacheRoot: config.cacheRoot,
    layoutCandidates: config.layoutCandidates,
  });

  return { release, cacheEntry, results };
}
