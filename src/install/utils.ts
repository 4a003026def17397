import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

function findPackageRoot(startDir: string): string {
  let dir = startDir;
  while (true) {
    if (existsSync(join(dir, "package.json"))) return dir;
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return startDir;
}

function readPkg(): { version: string } {
  const dir = dirname(fileURLToPath(import.meta.url));
  const root = findPackageRoot(dir);
  const pkg: unknown = JSON.parse(
    readFileSync(join(root, "package.json"), "utf-8"),
  );
  if (!pkg || typeof pkg !== "object") return { version: "0.0.0" };
  const version =
    "version" in pkg && typeof pkg.version === "string" ? pkg.version : "0.0.0";
  return { version };
}

export function getPackageVersion(): string {
  return readPkg().version;
}
