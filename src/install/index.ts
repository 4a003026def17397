import color from "picocolors";
import { loadConfig, resolveHome } from "../core/config";
import {
  type ProvisionOptions,
  type ProvisionReport,
  provision,
} from "../core/pipeline";
import type { InstallerConfig } from "../core/schemas";
import type { MutationResult } from "../core/types";
import type { GroupTally, InstallOptions } from "./types";

export { parseArgs } from "./args";
export type { GroupTally, InstallOptions } from "./types";

export type InstallDeps = Partial<
  Pick<
    ProvisionOptions,
    "catalog" | "env" | "fetch" | "runner" | "now" | "onResult" | "onCacheReady"
  >
> & {
  home?: string;
  config?: InstallerConfig;
};

export function install(
  options: InstallOptions,
  deps: InstallDeps = {},
): Promise<ProvisionReport> {
  const env = deps.env ?? process.env;
  const home = deps.home ?? resolveHome(env);
  const config = deps.config ?? loadConfig(home, env);

  return provision({
    groups: options.groups,
    dryRun: options.dryRun,
    home,
    config,
    env,
    catalog: deps.catalog,
    fetch: deps.fetch,
    runner: deps.runner,
    now: deps.now,
    onResult: deps.onResult,
    onCacheReady: deps.onCacheReady,
  });
}

export function tallyGroups(results: MutationResult[]): GroupTally[] {
  const tallies = new Map<string, GroupTally>();
  for (const result of results) {
    let tally = tallies.get(result.group);
    if (!tally) {
      tally = {
        group: result.group,
        succeeded: 0,
        skipped: 0,
        failed: 0,
        total: 0,
      };
      tallies.set(result.group, tally);
    }
    tally.total++;
    if (result.status === "success") tally.succeeded++;
    else if (result.status === "skipped") tally.skipped++;
    else tally.failed++;
  }
  return [...tallies.values()];
}

export function formatResultLine(result: MutationResult): string {
  const head = `${result.status.toUpperCase()}: ${result.group}/${result.id}`;
  const backup = result.backupPath ? `; backup at ${result.backupPath}` : "";
  return `${head} (${result.detail}${backup})`;
}

export function formatTally(tally: GroupTally): string {
  const extra: string[] = [];
  if (tally.failed > 0) extra.push(`${tally.failed} failed`);
  if (tally.skipped > 0) extra.push(`${tally.skipped} skipped`);
  const suffix = extra.length > 0 ? `, ${extra.join(", ")}` : "";
  return `${tally.group}: ${tally.succeeded}/${tally.total} succeeded${suffix}`;
}

function paint(result: MutationResult, line: string): string {
  switch (result.status) {
    case "success":
      return color.green(line);
    case "skipped":
      return color.yellow(line);
    case "failed":
      return color.red(line);
  }
}

export interface SummaryOptions {
  /** Off when each result was already shown as it happened. */
  listResults?: boolean;
}

export function printInstallSummary(
  report: ProvisionReport,
  options: SummaryOptions = {},
): void {
  if (report.release) {
    const source = report.cacheEntry?.fromCache ? "cached" : "downloaded";
    console.log(`Release:  ${report.release.tag} (${source})`);
  }

  if (options.listResults ?? true) {
    const summary = report.results
      .map((result) => paint(result, formatResultLine(result)))
      .join("\n");
    console.log(summary);
  }

  console.log("\nGroups:");
  for (const tally of tallyGroups(report.results)) {
    const line = `  ${formatTally(tally)}`;
    console.log(tally.failed > 0 ? color.red(line) : line);
  }
}

export function exitCodeFor(results: MutationResult[]): number {
  return results.some((r) => r.status === "failed") ? 1 : 0;
}
