#!/usr/bin/env tsx

import { InstallerError } from "./core/errors";

function printHelp(): void {
  console.log(`nyarch-kde-setup - apply the Nyarch theme to a KDE Plasma session

Usage:
  nyarch-kde-setup <command> [options]

Commands:
  install     Download the latest release and apply the selected groups
  list        Show the available groups and what each one changes
  status      Show cached releases, installed targets and their backups
  help        Show this help message

Install options:
  --groups <list>   Comma-separated groups to apply (see "list")
  --all             Apply every group
  --dry-run         Show what would change without touching anything

Without options, install opens an interactive menu.

Environment:
  NYARCH_CACHE_DIR  Cache directory [default: ~/.cache/nyarch-kde]
  NYARCH_API_URL    Releases API base URL [default: https://api.github.com]
  NYARCH_CONFIG     Config file [default: ~/.config/nyarch-kde/config.json]

Examples:
  nyarch-kde-setup install
  nyarch-kde-setup install --groups user,kitty
  nyarch-kde-setup install --all --dry-run
  nyarch-kde-setup status`);
}

async function list() {
  const { NYARCH_CATALOG } = await import("./catalog");
  for (const group of NYARCH_CATALOG) {
    console.log(`${group.id} [${group.scope}] ${group.label}`);
    for (const mutation of group.mutations) {
      console.log(`  - ${mutation.id}: ${mutation.description}`);
    }
  }
}

function fail(e: unknown): never {
  if (e instanceof InstallerError) {
    console.error(`[nyarch] ${e.name}: ${e.message}`);
    process.exit(1);
  }
  throw e;
}

async function status() {
  const { loadConfig, resolveHome } = await import("./core/config");
  const { collectStatus, printStatus } = await import("./install/status");
  const home = resolveHome();
  printStatus(collectStatus(home, loadConfig(home)));
}

const command = process.argv[2];

switch (command) {
  case "install": {
    const installArgs = process.argv.slice(3);
    if (installArgs.length === 0) {
      const { interactiveInstall } = await import("./install/interactive");
      process.exitCode = await interactiveInstall();
    } else {
      const { exitCodeFor, install, parseArgs, printInstallSummary } =
        await import("./install");

      try {
        const options = parseArgs(installArgs);
        const report = await install(options);
        printInstallSummary(report);
        process.exitCode = exitCodeFor(report.results);
      } catch (e) {
        fail(e);
      }
    }
    break;
  }
  case "list":
    await list();
    break;
  case "status":
    await status().catch(fail);
    break;
  case "--version":
  case "-v": {
    const { getPackageVersion } = await import("./install/utils");
    console.log(getPackageVersion());
    break;
  }
  case "help":
  case "--help":
  case "-h":
  case undefined:
    printHelp();
    break;
  default:
    console.error(`Unknown command: ${command}`);
    printHelp();
    process.exit(1);
}
