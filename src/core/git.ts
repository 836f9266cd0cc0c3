import { mkdir } from "node:fs/promises";

import type { CommandRunner, RunResult } from "./runner";

export type Identity = {
  name: string;
  email: string;
};

export type CommitInfo = {
  hash: string;
  tree: string;
  parents: string[];
  author: Identity;
  committer: Identity;
  message: string;
};

export type CommitRequest = {
  source: string;
  parents: string[];
  message: string;
  author: Identity;
  committer: Identity;
};

export type Vcs = {
  fetch(ref: string): Promise<string>;
  resolve(ref: string): Promise<string | null>;
  checkout(hash: string): Promise<void>;
  merge(hash: string, message: string, committer: Identity): Promise<string | null>;
  commitTree(request: CommitRequest): Promise<string>;
  push(hash: string, branch: string): Promise<void>;
  mergeBase(left: string, right: string): Promise<string | null>;
  isAncestor(ancestor: string, descendant: string): Promise<boolean>;
  commits(from: string, to: string): Promise<CommitInfo[]>;
  lookup(hash: string): Promise<CommitInfo | null>;
};

export type GitVcsOptions = {
  runner: CommandRunner;
  dir: string;
  remote: string;
};

const FIELD_SEPARATOR = "\x1f";
const RECORD_SEPARATOR = "\x1e";
const LOG_FORMAT = ["%H", "%T", "%P", "%an", "%ae", "%cn", "%ce", "%B"].join("%x1f") + "%x1e";

export function identityEnv(author: Identity, committer: Identity = author): Record<string, string> {
  return {
    GIT_AUTHOR_NAME: author.name,
    GIT_AUTHOR_EMAIL: author.email,
    GIT_COMMITTER_NAME: committer.name,
    GIT_COMMITTER_EMAIL: committer.email,
  };
}

export function parseCommitLog(stdout: string): CommitInfo[] {
  return stdout
    .split(RECORD_SEPARATOR)
    .map((record) => record.replace(/^\n/, ""))
    .filter((record) => record.trim())
    .map((record) => {
      const [hash = "", tree = "", parents = "", authorName = "", authorEmail = "", committerName = "", committerEmail = "", ...rest] =
        record.split(FIELD_SEPARATOR);
      return {
        hash: hash.trim(),
        tree: tree.trim(),
        parents: parents.split(" ").filter(Boolean),
        author: { name: authorName, email: authorEmail },
        committer: { name: committerName, email: committerEmail },
        message: rest.join(FIELD_SEPARATOR).replace(/\n+$/, ""),
      };
    });
}

export async function createGitVcs(options: GitVcsOptions): Promise<Vcs> {
  const { runner, dir, remote } = options;
  await mkdir(dir, { recursive: true });
  await runner("git", ["init", "--quiet", dir]);

  const git = (args: string[], extra: { env?: Record<string, string>; input?: string; reject?: boolean } = {}): Promise<RunResult> =>
    runner("git", ["-C", dir, ...args], extra);

  return {
    async fetch(ref) {
      await git(["fetch", "--quiet", "--no-tags", remote, ref]);
      const result = await git(["rev-parse", "FETCH_HEAD"]);
      return result.stdout.trim();
    },

    async resolve(ref) {
      const result = await git(["rev-parse", "--verify", "--quiet", `${ref}^{commit}`], { reject: false });
      return result.exitCode === 0 && result.stdout.trim() ? result.stdout.trim() : null;
    },

    async checkout(hash) {
      await git(["checkout", "--quiet", "--force", "--detach", hash]);
    },

    async merge(hash, message, committer) {
      const result = await git(["merge", "--no-ff", "--no-edit", "-m", message, hash], {
        env: identityEnv(committer),
        reject: false,
      });
      if (result.exitCode !== 0) {
        await git(["merge", "--abort"], { reject: false });
        return null;
      }
      const head = await git(["rev-parse", "HEAD"]);
      return head.stdout.trim();
    },

    async commitTree(request) {
      const parentArgs = request.parents.flatMap((parent) => ["-p", parent]);
      const result = await git(["commit-tree", `${request.source}^{tree}`, ...parentArgs, "-F", "-"], {
        env: identityEnv(request.author, request.committer),
        input: request.message,
      });
      return result.stdout.trim();
    },

    async push(hash, branch) {
      await git(["push", "--quiet", remote, `${hash}:refs/heads/${branch}`]);
    },

    async mergeBase(left, right) {
      const result = await git(["merge-base", left, right], { reject: false });
      return result.exitCode === 0 && result.stdout.trim() ? result.stdout.trim() : null;
    },

    async isAncestor(ancestor, descendant) {
      const result = await git(["merge-base", "--is-ancestor", ancestor, descendant], { reject: false });
      return result.exitCode === 0;
    },

    async commits(from, to) {
      const result = await git(["log", `--format=${LOG_FORMAT}`, `${from}..${to}`]);
      return parseCommitLog(result.stdout);
    },

    async lookup(hash) {
      const result = await git(["log", "-1", `--format=${LOG_FORMAT}`, hash], { reject: false });
      if (result.exitCode !== 0) return null;
      return parseCommitLog(result.stdout)[0] ?? null;
    },
  };
}
