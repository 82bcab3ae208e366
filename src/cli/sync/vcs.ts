/**
 * Version control collaborator
 *
 * The sync core only needs two atomic steps from git: publish the mirror
 * (commit + push) and bring it up to date (pull --rebase). Both reject with
 * a VersionControlError when git fails.
 */

import { spawnSync } from "node:child_process";

import { VersionControlError } from "../errors.js";

export type CommitResult = {
  /** A commit was created for pending mirror changes */
  committed: boolean;
  /** `git push` ran and succeeded */
  pushed: boolean;
};

export interface VersionControl {
  commitAndPush(message: string): Promise<CommitResult>;
  pullRebase(): Promise<void>;
}

export type CommandResult = {
  status: number;
  stdout: string;
  stderr: string;
};

export type CommandRunner = (command: string, args: string[]) => CommandResult;

/**
 * Run a command synchronously, capturing output
 */
export const runCommand: CommandRunner = (command, args) => {
  const result = spawnSync(command, args, { encoding: "utf-8", stdio: "pipe" });
  if (result.error) {
    return { status: -1, stdout: "", stderr: result.error.message };
  }
  return {
    status: result.status ?? -1,
    stdout: result.stdout,
    stderr: result.stderr,
  };
};

/**
 * Git-backed collaborator scoped to the mirror directory.
 *
 * Commands run with `-C <mirror>` and the pathspec `.`, so only mirror files
 * are staged; the mirror may be a folder of a larger repository or a
 * repository of its own.
 */
export class GitVersionControl implements VersionControl {
  constructor(
    private readonly workTree: string,
    private readonly run: CommandRunner = runCommand
  ) {}

  private git(args: string[], hint?: string): CommandResult {
    const result = this.run("git", ["-C", this.workTree, ...args]);
    if (result.status !== 0) {
      const output = (result.stderr || result.stdout).trim();
      throw new VersionControlError(
        `git ${args[0]} failed${output ? `: ${output.split("\n")[0]}` : ""}`,
        output,
        hint
      );
    }
    return result;
  }

  async commitAndPush(message: string): Promise<CommitResult> {
    const status = this.git(["status", "--porcelain=v2", "--branch", "--", "."]);
    const lines = status.stdout.split("\n").filter(Boolean);

    const dirty = lines.some((line) => !line.startsWith("#"));
    const aheadLine = lines.find((line) => line.startsWith("# branch.ab "));
    const ahead = aheadLine ? parseInt(aheadLine.split(" ")[2]?.replace("+", "") ?? "0", 10) : 0;

    let committed = false;
    if (dirty) {
      this.git(["add", "-A", "--", "."]);
      this.git(["commit", "-m", message, "--", "."]);
      committed = true;
    }

    if (!committed && !(ahead > 0)) {
      return { committed, pushed: false };
    }

    this.git(
      ["push"],
      "The commit is kept locally; fix the remote problem and re-run push to publish it"
    );
    return { committed, pushed: true };
  }

  async pullRebase(): Promise<void> {
    this.git(
      ["pull", "--rebase"],
      "Finish or abort the rebase in the repository (see 'git status'), then re-run pull"
    );
  }
}
