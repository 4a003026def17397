import {
  accessSync,
  constants,
  existsSync,
  mkdirSync,
  readdirSync,
  statSync,
} from "node:fs";
import { delimiter, dirname, isAbsolute, join, relative, sep } from "node:path";
import { InstallError } from "./errors";

export function ensureDir(path: string): void {
  if (!existsSync(path)) mkdirSync(path, { recursive: true });
}

export function ensureParent(path: string): void {
  ensureDir(dirname(path));
}

export function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

export function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

export function isNonEmptyDir(path: string): boolean {
  if (!isDirectory(path)) return false;
  return readdirSync(path).length > 0;
}

/** Turns a release tag into a single safe path segment. */
export function sanitizeTag(tag: string): string {
  const raw = tag.trim().replace(/[^a-zA-Z0-9._-]/g, "_");
  if (/^\.*$/.test(raw)) return "";
  return raw;
}

/**
 * Resolves a catalog target. `~` and `~/…` are taken relative to `home`;
 * anything else must already be absolute.
 */
export function resolveTarget(target: string, home: string): string {
  if (target === "~") return home;
  if (target.startsWith("~/")) return join(home, target.slice(2));
  if (!isAbsolute(target)) {
    throw new InstallError(`Target must be absolute or start with ~/: ${target}`);
  }
  return target;
}

/** Every regular file under `root`, as sorted POSIX-style relative paths. */
export function listFiles(root: string): string[] {
  const out: string[] = [];
  const walk = (dir: string) => {
    for (const entry of readdirSync(dir, { withFileTypes: true })) {
      const full = join(dir, entry.name);
      if (entry.isDirectory()) {
        walk(full);
      } else if (entry.isFile() || (entry.isSymbolicLink() && isFile(full))) {
        out.push(relative(root, full).split(sep).join("/"));
      }
    }
  };
  if (isDirectory(root)) walk(root);
  return out.sort();
}

export function findOnPath(
  command: string,
  env: NodeJS.ProcessEnv,
): string | undefined {
  const dirs = (env.PATH ?? "").split(delimiter).filter(Boolean);
  for (const dir of dirs) {
    const candidate = join(dir, command);
    try {
      accessSync(candidate, constants.X_OK);
      if (isFile(candidate)) return candidate;
    } catch {
      // not in this directory
    }
  }
  return undefined;
}

export function prependPath(
  env: NodeJS.ProcessEnv,
  dir: string,
): NodeJS.ProcessEnv {
  const current = env.PATH ?? "";
  const parts = current.split(delimiter).filter(Boolean);
  if (parts.includes(dir)) return { ...env };
  return { ...env, PATH: current ? `${dir}${delimiter}${current}` : dir };
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local-time `YYYYMMDD-HHMMSS`. */
export function timestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
