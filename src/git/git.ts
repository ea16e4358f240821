import { execa, ExecaError, type Options } from "execa";

import { GitError } from "../core/errors.js";

export type GitOutput = { stdout: string; stderr: string; exitCode: number };

export async function git(cwd: string, args: string[], opts: Options = {}): Promise<GitOutput> {
  try {
    const res = await execa("git", args, {
      cwd,
      stdio: "pipe",
      env: process.env,
      ...opts,
    });
    return {
      stdout: outputToString(res.stdout),
      stderr: outputToString(res.stderr),
      exitCode: res.exitCode ?? -1,
    };
  } catch (err) {
    if (err instanceof ExecaError) {
      const stdout = outputToString(err.stdout);
      const stderr = outputToString(err.stderr) || err.shortMessage;
      throw new GitError(`git ${args.join(" ")} failed (cwd=${cwd}): ${stderr}`, {
        stdout,
        stderr,
      });
    }
    throw new GitError(`git ${args.join(" ")} failed (cwd=${cwd})`, err);
  }
}

export async function refExists(cwd: string, ref: string): Promise<boolean> {
  try {
    await git(cwd, ["rev-parse", "--verify", "--quiet", `${ref}^{commit}`]);
    return true;
  } catch {
    return false;
  }
}

export function outputToString(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined || value === null) return "";
  if (Array.isArray(value)) return value.map(outputToString).join("\n");
  return String(value);
}
