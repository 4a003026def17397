import { existsSync } from "node:fs";
import { backupPath } from "../apply/backup";
import { NYARCH_CATALOG } from "../catalog";
import { listCachedTags } from "../release/cache";
import type { InstallerConfig } from "../core/schemas";
import type { MutationGroup } from "../core/types";
import { resolveTarget } from "../core/utils";

export interface TargetStatus {
  group: string;
  id: string;
  path: string;
  present: boolean;
  backups: string[];
}

export interface InstallStatus {
  cacheRoot: string;
  cachedTags: string[];
  targets: TargetStatus[];
}

/**
 * Backups the naming convention would have produced for `path`. An
 * archive-style backup directory shares its name with a renamed directory,
 * so it is reported once.
 */
export function findBackups(path: string): string[] {
  const found = new Set<string>();
  for (const kind of ["directory", "file"] as const) {
    for (let index = 0; ; index++) {
      const candidate = backupPath(path, { kind, index });
      if (!existsSync(candidate)) break;
      found.add(candidate);
    }
  }
  return [...found];
}

export function collectStatus(
  home: string,
  config: InstallerConfig,
  catalog: MutationGroup[] = NYARCH_CATALOG,
): InstallStatus {
  const targets: TargetStatus[] = [];
  for (const group of catalog) {
    for (const mutation of group.mutations) {
      if (mutation.kind === "run_installer") continue;
      const path = resolveTarget(mutation.target, home);
      targets.push({
        group: group.id,
        id: mutation.id,
        path,
        present: existsSync(path),
        backups: findBackups(path),
      });
    }
  }
  return {
    cacheRoot: config.cacheRoot,
    cachedTags: listCachedTags(config.cacheRoot),
    targets,
  };
}

export function printStatus(status: InstallStatus): void {
  console.log(`Cache:      ${status.cacheRoot}`);
  console.log(
    `Releases:   ${status.cachedTags.length > 0 ? status.cachedTags.join(", ") : "none cached"}\n`,
  );
  for (const target of status.targets) {
    const state = target.present ? "present" : "missing";
    const backups =
      target.backups.length > 0 ? ` (backups: ${target.backups.join(", ")})` : "";
    console.log(`${target.group}/${target.id}: ${state} ${target.path}${backups}`);
  }
}
