import { execFileSync } from "node:child_process";
import type { GitInfo } from "../core/types.js";

function git(cwd: string, args: string[]): string | null {
  try {
    const out = execFileSync("git", args, {
      cwd,
      encoding: "utf-8",
      // stdio takes [subprocess.stdin, subprocess.stdout, subprocess.stderr]
      // we only need stdout
      stdio: ["ignore", "pipe", "ignore"],
    });
    return out.trim() || null;
  } catch {
    return null;
  }
}

export class GitClient {
  private constructor(public readonly projectRoot: string) {}

  /** Null when `cwd` is not inside a git work tree or git is not installed. */
  public static open(cwd: string): GitClient | null {
    const root = git(cwd, ["rev-parse", "--show-toplevel"]);
    return root ? new GitClient(root) : null;
  }

  public info(): GitInfo {
    const branch = git(this.projectRoot, ["rev-parse", "--abbrev-ref", "HEAD"]);
    const remoteUrl = git(this.projectRoot, ["remote", "get-url", "origin"]);
    const log = git(this.projectRoot, [
      "log",
      "-1",
      "--format=%H%x1f%s%x1f%an%x1f%cI",
    ]);

    let lastCommit: GitInfo["lastCommit"] = null;
    if (log) {
      const [hash = "", subject = "", author = "", date = ""] = log.split("\x1f");
      lastCommit = { hash, subject, author, date };
    }

    return { branch, remoteUrl, lastCommit };
  }
}
