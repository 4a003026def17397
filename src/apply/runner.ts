import { spawn } from "node:child_process";
import type { ToolInvocation, ToolRunner } from "../core/types";

/** Runs the tool attached to the terminal; only the exit code is looked at. */
export const spawnRunner: ToolRunner = (invocation: ToolInvocation) =>
  new Promise<number>((resolve, reject) => {
    const proc = spawn(invocation.command, invocation.args, {
      cwd: invocation.cwd,
      env: invocation.env,
      stdio: "inherit",
    });
    proc.once("error", reject);
    proc.once("close", (code, signal) => {
      resolve(code ?? (signal ? 128 : 1));
    });
  });
