import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import {
  type InstallerConfig,
  type PartialInstallerConfig,
  PartialInstallerConfigSchema,
} from "./schemas";
import { resolveTarget } from "./utils";

export const DEFAULT_OWNER = "NyarchLinux";
export const DEFAULT_REPO = "NyarchLinux";
export const DEFAULT_ARCHIVE_NAME = "NyarchLinux.tar.gz";
export const DEFAULT_API_BASE_URL = "https://api.github.com";
export const DEFAULT_LAYOUT_CANDIDATES = [
  "NyarchLinuxComp/Gnome",
  "NyarchLinux/Gnome",
];

function passwdHome(user: string, passwdPath: string): string | undefined {
  let raw: string;
  try {
    raw = readFileSync(passwdPath, "utf-8");
  } catch {
    return undefined;
  }
  for (const line of raw.split("\n")) {
    const fields = line.split(":");
    if (fields[0] === user && fields[5]) return fields[5];
  }
  return undefined;
}

/**
 * Home of the person running the installer. Under sudo that is the
 * invoking user, not root.
 */
export function resolveHome(
  env: NodeJS.ProcessEnv = process.env,
  passwdPath = "/etc/passwd",
): string {
  const sudoUser = env.SUDO_USER;
  if (sudoUser) {
    const home = passwdHome(sudoUser, passwdPath);
    if (home) return home;
  }
  return env.HOME || homedir();
}

export function configPath(home: string, env: NodeJS.ProcessEnv): string {
  return env.NYARCH_CONFIG ?? join(home, ".config", "nyarch-kde", "config.json");
}

function readConfigFile(path: string): PartialInstallerConfig {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch {
    return {};
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    console.error(`[nyarch] malformed config at ${path}, using defaults`);
    return {};
  }

  const parsed = PartialInstallerConfigSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    console.error(`[nyarch] invalid config at ${path} (${issues}), using defaults`);
    return {};
  }
  return parsed.data;
}

export function loadConfig(
  home: string,
  env: NodeJS.ProcessEnv = process.env,
): InstallerConfig {
  const file = readConfigFile(configPath(home, env));
  const cacheRoot =
    env.NYARCH_CACHE_DIR ??
    file.cacheRoot ??
    join(home, ".cache", "nyarch-kde");

  return {
    owner: file.owner ?? DEFAULT_OWNER,
    repo: file.repo ?? DEFAULT_REPO,
    archiveName: file.archiveName ?? DEFAULT_ARCHIVE_NAME,
    apiBaseUrl: env.NYARCH_API_URL ?? file.apiBaseUrl ?? DEFAULT_API_BASE_URL,
    cacheRoot: cacheRoot.startsWith("~")
      ? resolveTarget(cacheRoot, home)
      : resolve(cacheRoot),
    layoutCandidates: file.layoutCandidates ?? [...DEFAULT_LAYOUT_CANDIDATES],
  };
}
