/**
 * Files changed relative to a base branch
 */

import { execFile } from "child_process";

import { GitError } from "../lib/errors.js";

export interface GitOutput {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Runs `git <args>` in `cwd`. Never rejects on a non-zero exit.
 */
export type GitRunner = (args: string[], cwd: string) => Promise<GitOutput>;

export const runGit: GitRunner = (args, cwd) => {
  return new Promise((resolve, reject) => {
    execFile("git", args, { cwd, maxBuffer: 10 * 1024 * 1024 }, (error, stdout, stderr) => {
      if (error !== null && typeof error.code !== "number") {
        reject(new GitError(`Could not run git: ${error.message}`, { args }));
        return;
      }
      resolve({
        stdout,
        stderr,
        exitCode: error === null ? 0 : Number(error.code),
      });
    });
  });
};

function splitLines(output: string): string[] {
  return output.split("\n").map((line) => line.trim()).filter((line) => line.length > 0);
}

async function runChecked(run: GitRunner, args: string[], cwd: string): Promise<string> {
  const result = await run(args, cwd);
  if (result.exitCode !== 0) {
    const detail = result.stderr.trim() || result.stdout.trim() || "unknown git error";
    throw new GitError(`git ${args.join(" ")} failed: ${detail}`, { args, exitCode: result.exitCode });
  }
  return result.stdout;
}

export async function getCurrentBranch(root: string, run: GitRunner = runGit): Promise<string> {
  return (await runChecked(run, ["rev-parse", "--abbrev-ref", "HEAD"], root)).trim();
}

export async function branchExists(branch: string, root: string, run: GitRunner = runGit): Promise<boolean> {
  const result = await run(["show-ref", "--verify", "--quiet", `refs/heads/${branch}`], root);
  return result.exitCode === 0;
}

export async function listBranches(root: string, run: GitRunner = runGit): Promise<string[]> {
  return splitLines(await runChecked(run, ["branch", "--format=%(refname:short)"], root));
}

/**
 * Paths changed since `baseBranch`.
 *
 * On the base branch itself this is the uncommitted work (unstaged and
 * staged) against HEAD; elsewhere it is `git diff <base>...HEAD`.
 */
export async function getChangedFilesSinceBase(
  baseBranch: string,
  root: string,
  run: GitRunner = runGit
): Promise<string[]> {
  if (!(await branchExists(baseBranch, root, run))) {
    const branches = await listBranches(root, run).catch(() => []);
    throw new GitError(
      `Base branch '${baseBranch}' does not exist. Available branches: ${branches.length > 0 ? branches.join(", ") : "none"}. ` +
        "Update baseBranch in .gapfill.yml.",
      { baseBranch, branches }
    );
  }

  const current = await getCurrentBranch(root, run);

  if (current === baseBranch) {
    const unstaged = splitLines(await runChecked(run, ["diff", "--name-only", "HEAD"], root));
    const staged = splitLines(await runChecked(run, ["diff", "--name-only", "--cached", "HEAD"], root));
    return [...new Set([...unstaged, ...staged])];
  }

  return splitLines(await runChecked(run, ["diff", "--name-only", `${baseBranch}...HEAD`], root));
}
