import {
  appendFileSync,
  chmodSync,
  copyFileSync,
  existsSync,
  readFileSync,
  writeFileSync,
} from "node:fs";
import { extname, join } from "node:path";
import { createTwoFilesPatch } from "diff";
import {
  ExternalToolError,
  FilesystemError,
  MissingAssetError,
} from "../core/errors";
import type {
  AppendSnippetMutation,
  ApplyContext,
  CopyTreeMutation,
  Mutation,
  RunInstallerMutation,
  WriteFileMutation,
} from "../core/types";
import {
  ensureDir,
  ensureParent,
  isDirectory,
  isFile,
  listFiles,
  resolveTarget,
} from "../core/utils";
import { backupTarget } from "./backup";

export interface MutationOutcome {
  detail: string;
  backupPath?: string;
}

export const ALREADY_APPLIED = "already applied";

/** Absolute path of an asset inside the loaded release. */
export function assetPath(ctx: ApplyContext, asset: string): string {
  if (!ctx.layoutRoot) {
    throw new MissingAssetError(`No release assets loaded for ${asset}`);
  }
  const path = join(ctx.layoutRoot, asset);
  if (!existsSync(path)) {
    throw new MissingAssetError(`Asset ${asset} not found in release`);
  }
  return path;
}

function readTextOrEmpty(path: string): string {
  if (!isFile(path)) return "";
  return readFileSync(path, "utf-8");
}

function isText(data: Buffer): boolean {
  return !data.includes(0);
}

function renderPatch(path: string, before: string, after: string): string {
  return createTwoFilesPatch(path, path, before, after, "current", "proposed");
}

function withFsErrors<T>(action: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw new FilesystemError(`Could not ${action}`, { cause: err });
  }
}

function selectFiles(src: string, extensions?: string[]): string[] {
  const files = listFiles(src);
  if (!extensions || extensions.length === 0) return files;
  const wanted = new Set(extensions.map((e) => e.toLowerCase()));
  return files.filter((f) => wanted.has(extname(f).toLowerCase()));
}

function treeMatches(src: string, dest: string, files: string[]): boolean {
  if (!isDirectory(dest)) return false;
  const present = listFiles(dest);
  if (present.length !== files.length) return false;
  return files.every(
    (f, i) =>
      present[i] === f &&
      readFileSync(join(src, f)).equals(readFileSync(join(dest, f))),
  );
}

async function applyCopyTree(
  m: CopyTreeMutation,
  ctx: ApplyContext,
): Promise<MutationOutcome> {
  const src = assetPath(ctx, m.source.asset);
  if (!isDirectory(src)) {
    throw new MissingAssetError(`Asset ${m.source.asset} is not a directory`);
  }
  const files = selectFiles(src, m.extensions);
  if (files.length === 0) {
    throw new MissingAssetError(`Asset ${m.source.asset} has no files to copy`);
  }

  const target = resolveTarget(m.target, ctx.home);
  if (treeMatches(src, target, files)) return { detail: ALREADY_APPLIED };

  if (ctx.dryRun) {
    const backupNote = existsSync(target) ? " after backing up the existing copy" : "";
    return {
      detail: `would copy ${files.length} files to ${target}${backupNote}`,
    };
  }

  const backup = await backupTarget(target, {
    strategy: m.backup,
    now: ctx.now(),
  });
  withFsErrors(`copy ${m.source.asset} to ${target}`, () => {
    ensureDir(target);
    for (const file of files) {
      const dest = join(target, file);
      ensureParent(dest);
      copyFileSync(join(src, file), dest);
    }
  });

  return {
    detail: `copied ${files.length} files to ${target}`,
    backupPath: backup ?? undefined,
  };
}

async function applyWriteFile(
  m: WriteFileMutation,
  ctx: ApplyContext,
): Promise<MutationOutcome> {
  let content: Buffer;
  if ("literal" in m.source) {
    content = Buffer.from(m.source.literal, "utf-8");
  } else {
    const src = assetPath(ctx, m.source.asset);
    if (!isFile(src)) {
      throw new MissingAssetError(`Asset ${m.source.asset} is not a file`);
    }
    content = readFileSync(src);
  }

  const target = resolveTarget(m.target, ctx.home);
  if (isFile(target) && readFileSync(target).equals(content)) {
    return { detail: ALREADY_APPLIED };
  }

  if (ctx.dryRun) {
    if (isText(content) && !isDirectory(target)) {
      return {
        detail: renderPatch(target, readTextOrEmpty(target), content.toString("utf-8")),
      };
    }
    return { detail: `would write ${content.length} bytes to ${target}` };
  }

  const backup = await backupTarget(target, {
    strategy: m.backup,
    now: ctx.now(),
  });
  withFsErrors(`write ${target}`, () => {
    ensureParent(target);
    writeFileSync(target, content);
    if (m.mode !== undefined) chmodSync(target, m.mode);
  });

  return {
    detail: `wrote ${target}`,
    backupPath: backup ?? undefined,
  };
}

async function applyAppendSnippet(
  m: AppendSnippetMutation,
  ctx: ApplyContext,
): Promise<MutationOutcome> {
  const target = resolveTarget(m.target, ctx.home);
  const content = withFsErrors(`read ${target}`, () => readTextOrEmpty(target));
  const marker = m.marker.trim();
  const body = m.body.trim();

  if (content.includes(marker) || content.includes(body)) {
    return { detail: ALREADY_APPLIED };
  }
  // a hand-written equivalent wins; the rest of the group still runs
  if (m.conflictHint && content.includes(m.conflictHint)) {
    return {
      detail: `left ${target} unmodified: found "${m.conflictHint}"`,
    };
  }

  const separator = content.length > 0 && !content.endsWith("\n") ? "\n" : "";
  const addition = `${separator}${m.marker.trimEnd()}\n${m.body.trimEnd()}\n`;

  if (ctx.dryRun) {
    return { detail: renderPatch(target, content, content + addition) };
  }

  withFsErrors(`append to ${target}`, () => {
    ensureParent(target);
    appendFileSync(target, addition, "utf-8");
  });
  return {
    detail: content.length > 0 ? `appended snippet to ${target}` : `created ${target}`,
  };
}

function resolveArgs(
  args: RunInstallerMutation["args"],
  ctx: ApplyContext,
): string[] {
  return typeof args === "function" ? args(ctx) : args;
}

async function invoke(
  m: RunInstallerMutation,
  args: string[],
  ctx: ApplyContext,
): Promise<{ display: string; exitCode: number | null }> {
  const command = m.sudo ? "sudo" : m.command;
  const argv = m.sudo ? [m.command, ...args] : args;
  const display = [command, ...argv].join(" ");
  try {
    return {
      display,
      exitCode: await ctx.runner({ command, args: argv, env: ctx.env }),
    };
  } catch (err) {
    if (m.allowFailure) return { display, exitCode: null };
    throw new ExternalToolError(`Could not start ${command}`, null, {
      cause: err,
    });
  }
}

async function applyRunInstaller(
  m: RunInstallerMutation,
  ctx: ApplyContext,
): Promise<MutationOutcome> {
  if (m.isApplied?.(ctx)) return { detail: ALREADY_APPLIED };

  const args = resolveArgs(m.args, ctx);

  if (ctx.dryRun) {
    const command = m.sudo ? ["sudo", m.command] : [m.command];
    return { detail: `would run: ${[...command, ...args].join(" ")}` };
  }

  let { display, exitCode } = await invoke(m, args, ctx);
  if (exitCode !== 0 && exitCode !== null && m.fallbackArgs) {
    const first = display;
    ({ display, exitCode } = await invoke(m, resolveArgs(m.fallbackArgs, ctx), ctx));
    if (exitCode === 0) {
      return { detail: `ran ${display} after ${first} failed` };
    }
  }

  if (exitCode === null) {
    return { detail: `${display} could not start (ignored)` };
  }
  if (exitCode !== 0) {
    if (m.allowFailure) {
      return { detail: `${display} exited with ${exitCode} (ignored)` };
    }
    throw new ExternalToolError(`${display} exited with ${exitCode}`, exitCode);
  }
  return { detail: `ran ${display}` };
}

export function applyMutation(
  mutation: Mutation,
  ctx: ApplyContext,
): Promise<MutationOutcome> {
  switch (mutation.kind) {
    case "copy_tree":
      return applyCopyTree(mutation, ctx);
    case "write_file":
      return applyWriteFile(mutation, ctx);
    case "append_snippet":
      return applyAppendSnippet(mutation, ctx);
    case "run_installer":
      return applyRunInstaller(mutation, ctx);
  }
}
