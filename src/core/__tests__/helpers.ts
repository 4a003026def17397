import { randomBytes } from "node:crypto";
import {
  mkdirSync,
  mkdtempSync,
  readFileSync,
  rmSync,
  writeFileSync,
} from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { create } from "tar";
import type { FetchLike } from "../../release/resolver";
import type {
  ApplyContext,
  ToolInvocation,
  ToolRunner,
} from "../types";
import { listFiles } from "../utils";

export function makeTempDir(label: string): string {
  return mkdtempSync(join(tmpdir(), `nyarch-${label}-`));
}

export function writeTree(root: string, files: Record<string, string | Buffer>): void {
  for (const [rel, content] of Object.entries(files)) {
    const path = join(root, rel);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, content);
  }
}

/** Relative path → content for every file under `root`. */
export function readTree(root: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const rel of listFiles(root)) {
    out[rel] = readFileSync(join(root, rel), "utf-8");
  }
  return out;
}

export const SKEL_FILES: Record<string, string> = {
  "etc/skel/.local/share/backgrounds/a.png": "png-a",
  "etc/skel/.local/share/backgrounds/b.JPG": "jpg-b",
  "etc/skel/.local/share/backgrounds/notes.txt": "not a wallpaper",
  "etc/skel/.local/share/backgrounds/sub/c.webp": "webp-c",
  "etc/skel/.local/share/icons/Tela-circle-MaterialYou/index.theme":
    "[Icon Theme]\nName=Tela-circle-MaterialYou\n",
  "etc/skel/.local/share/themes/Nyarch/gtk-3.0/gtk.css": "/* theme */\n",
  "etc/skel/.config/gtk-3.0/settings.ini": "[Settings]\ngtk-theme-name=Nyarch\n",
  "etc/skel/.config/gtk-4.0/settings.ini": "[Settings]\ngtk-theme-name=Nyarch\n",
  "etc/skel/.config/kitty/kitty.conf": "font_size 12.0\n",
  "etc/skel/.config/fastfetch/config.jsonc": "{ \"logo\": \"nyarch\" }\n",
  "usr/local/bin/nekofetch": "#!/bin/sh\necho neko\n",
  "usr/local/bin/nyaofetch": "#!/bin/sh\necho nyao\n",
};

/**
 * Builds a release tarball laid out like the upstream one:
 * `NyarchLinuxComp/Gnome/<SKEL_FILES>`. A block of random bytes keeps the
 * gzip stream long enough that truncating it cuts through file data.
 */
export async function buildReleaseArchive(
  files: Record<string, string | Buffer> = SKEL_FILES,
): Promise<Buffer> {
  const staging = makeTempDir("archive-src");
  const out = join(makeTempDir("archive-out"), "release.tar.gz");
  try {
    const tree: Record<string, string | Buffer> = {};
    for (const [rel, content] of Object.entries(files)) {
      tree[join("NyarchLinuxComp", "Gnome", rel)] = content;
    }
    tree["NyarchLinuxComp/padding.bin"] = randomBytes(64 * 1024);
    writeTree(staging, tree);
    await create({ gzip: true, file: out, cwd: staging }, ["NyarchLinuxComp"]);
    return readFileSync(out);
  } finally {
    rmSync(staging, { recursive: true, force: true });
    rmSync(dirname(out), { recursive: true, force: true });
  }
}

export type Route = () => Response;

export function fakeFetch(routes: Record<string, Route>): {
  fetch: FetchLike;
  calls: string[];
  inits: (RequestInit | undefined)[];
} {
  const calls: string[] = [];
  const inits: (RequestInit | undefined)[] = [];
  const fetchImpl: FetchLike = async (input, init) => {
    const url =
      typeof input === "string"
        ? input
        : input instanceof URL
          ? input.href
          : input.url;
    calls.push(url);
    inits.push(init);
    const route = routes[url];
    if (!route) return new Response("not found", { status: 404 });
    return route();
  };
  return { fetch: fetchImpl, calls, inits };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/**
 * Records invocations. `exitCodes` maps a command-line prefix
 * ("sudo apt-get") to the exit code it should report.
 */
export function fakeRunner(exitCodes: Record<string, number> = {}): {
  runner: ToolRunner;
  calls: ToolInvocation[];
  lines: () => string[];
} {
  const calls: ToolInvocation[] = [];
  const runner: ToolRunner = async (invocation) => {
    calls.push(invocation);
    const line = [invocation.command, ...invocation.args].join(" ");
    for (const [prefix, code] of Object.entries(exitCodes)) {
      if (line.startsWith(prefix)) return code;
    }
    return 0;
  };
  return {
    runner,
    calls,
    lines: () => calls.map((c) => [c.command, ...c.args].join(" ")),
  };
}

export function makeContext(overrides: Partial<ApplyContext> = {}): ApplyContext {
  return {
    home: "/nonexistent-home",
    cacheRoot: "/nonexistent-cache",
    layoutRoot: null,
    dryRun: false,
    env: { PATH: "/usr/bin:/bin" },
    runner: fakeRunner().runner,
    now: () => new Date(2025, 0, 2, 3, 4, 5),
    ...overrides,
  };
}
