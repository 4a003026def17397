import * as p from "@clack/prompts";
import color from "picocolors";
import { NYARCH_CATALOG } from "../catalog";
import { InstallerError } from "../core/errors";
import type { MutationResult } from "../core/types";
import {
  exitCodeFor,
  formatResultLine,
  type InstallDeps,
  install,
  printInstallSummary,
} from "./index";
import { getPackageVersion } from "./utils";

function logResult(result: MutationResult): void {
  const line = formatResultLine(result);
  if (result.status === "success") p.log.success(line);
  else if (result.status === "skipped") p.log.warn(line);
  else p.log.error(line);
}

/** The menu. Resolves with the process exit code. */
export async function interactiveInstall(
  deps: InstallDeps = {},
): Promise<number> {
  const catalog = deps.catalog ?? NYARCH_CATALOG;
  p.intro(color.bgMagenta(color.black(` nyarch-kde-setup v${getPackageVersion()} `)));

  const selected = await p.multiselect({
    message: "What do you want to install/configure?",
    options: catalog.map((group) => ({
      value: group.id,
      label: `[${group.scope.toUpperCase()}] ${group.label}`,
    })),
    required: false,
  });

  if (p.isCancel(selected)) {
    p.cancel("Setup cancelled.");
    return 0;
  }
  if (selected.length === 0) {
    p.outro("Nothing selected; no changes made.");
    return 0;
  }

  const system = catalog.filter(
    (g) => g.scope === "system" && selected.includes(g.id),
  );
  if (system.length > 0) {
    p.log.warn(
      `${system.map((g) => g.id).join(", ")} will run commands with sudo.`,
    );
  }

  const confirm = await p.confirm({
    message: `Apply ${color.bold(selected.join(", "))}?`,
  });
  if (p.isCancel(confirm) || !confirm) {
    p.cancel("Setup cancelled.");
    return 0;
  }

  try {
    const report = await install(
      { groups: selected, dryRun: false },
      {
        ...deps,
        catalog,
        onResult: logResult,
        onCacheReady: (release, entry) =>
          p.log.info(
            `Release ${release.tag} ${entry.fromCache ? "found in cache" : "downloaded"} at ${entry.extractedPath}`,
          ),
      },
    );
    printInstallSummary(report, { listResults: false });
    p.outro(
      color.magenta(
        "You may need to restart Plasma or log out and back in to see all changes.",
      ),
    );
    return exitCodeFor(report.results);
  } catch (err) {
    if (err instanceof InstallerError) {
      p.log.error(err.message);
      p.outro(color.red("No changes were applied."));
      return 1;
    }
    throw err;
  }
}
