import { mkdir } from "node:fs/promises";

import { identityEnv, type Identity } from "./git";
import type { Logger } from "./logger";
import type { CommandRunner } from "./runner";

export const LEDGER_FILE = "heads.txt";
export const ZERO_HASH = "0".repeat(40);

export type LedgerEntry = {
  head: string;
  parent: string;
};

export type ReportedHead = {
  hash: string;
  parent: string | null;
};

export type LedgerStore = {
  read(key: string): Promise<LedgerEntry | null>;
  write(key: string, entry: LedgerEntry): Promise<void>;
};

export type LedgerVerdict = "initialized" | "matched" | "recovered";

export type IntegrityLedger = {
  verify(repository: string, branch: string, reported: ReportedHead): Promise<LedgerVerdict>;
  update(repository: string, branch: string, next: ReportedHead): Promise<void>;
  entry(repository: string, branch: string): Promise<LedgerEntry | null>;
};

export class IntegrityFault extends Error {
  constructor(
    message: string,
    readonly repository: string,
    readonly branch: string,
  ) {
    super(message);
    this.name = "IntegrityFault";
  }
}

export function ledgerKey(repository: string, branch: string): string {
  return `${repository}-${branch}`.replace(/[^A-Za-z0-9._-]/g, "-");
}

export function serializeLedgerEntry(entry: LedgerEntry): string {
  return `${entry.head}\n${entry.parent}\n`;
}

export function parseLedgerEntry(content: string, context = LEDGER_FILE): LedgerEntry {
  const [head = "", parent = ""] = content.split(/\r?\n/).map((line) => line.trim());
  if (!/^[0-9a-f]{40,64}$/.test(head) || !/^[0-9a-f]{40,64}$/.test(parent)) {
    throw new Error(`${context}: malformed ledger entry`);
  }
  return { head, parent };
}

function toEntry(reported: ReportedHead): LedgerEntry {
  return { head: reported.hash, parent: reported.parent ?? ZERO_HASH };
}

export function createIntegrityLedger(store: LedgerStore, logger: Logger): IntegrityLedger {
  return {
    async verify(repository, branch, reported) {
      const key = ledgerKey(repository, branch);
      const current = await store.read(key);
      if (!current) {
        await store.write(key, toEntry(reported));
        logger.info({ repository, branch, head: reported.hash }, "ledger: initialized");
        return "initialized";
      }

      if (current.head === reported.hash) {
        return "matched";
      }

      if (reported.parent === current.head) {
        await store.write(key, toEntry(reported));
        logger.info(
          { repository, branch, expected: current.head, reported: reported.hash },
          "ledger: recovered from interrupted update after push",
        );
        return "recovered";
      }

      logger.error(
        { repository, branch, expected: current.head, reported: reported.hash },
        "ledger: branch head does not match the recorded head",
      );
      throw new IntegrityFault(
        `${repository}:${branch}: expected head ${current.head} but found ${reported.hash}`,
        repository,
        branch,
      );
    },

    async update(repository, branch, next) {
      await store.write(ledgerKey(repository, branch), toEntry(next));
      logger.debug({ repository, branch, head: next.hash }, "ledger: updated");
    },

    entry(repository, branch) {
      return store.read(ledgerKey(repository, branch));
    },
  };
}

export type GitLedgerStoreOptions = {
  runner: CommandRunner;
  dir: string;
  remote: string;
  identity: Identity;
};

export async function createGitLedgerStore(options: GitLedgerStoreOptions): Promise<LedgerStore> {
  const { runner, dir, remote, identity } = options;
  await mkdir(dir, { recursive: true });
  await runner("git", ["init", "--quiet", "--bare", dir]);

  const git = (args: string[], input?: string) =>
    runner("git", ["--git-dir", dir, ...args], {
      env: identityEnv(identity),
      ...(input === undefined ? {} : { input }),
    });

  async function remoteHead(key: string): Promise<string | null> {
    const listed = await git(["ls-remote", "--heads", remote, `refs/heads/${key}`]);
    const hash = listed.stdout.trim().split(/\s+/)[0];
    return hash ? hash : null;
  }

  return {
    async read(key) {
      const head = await remoteHead(key);
      if (!head) return null;
      await git(["fetch", "--quiet", "--no-tags", remote, `refs/heads/${key}`]);
      const shown = await git(["show", `${head}:${LEDGER_FILE}`]);
      return parseLedgerEntry(shown.stdout, `${key}/${LEDGER_FILE}`);
    },

    async write(key, entry) {
      const previous = await remoteHead(key);
      if (previous) {
        await git(["fetch", "--quiet", "--no-tags", remote, `refs/heads/${key}`]);
      }
      const blob = await git(["hash-object", "-w", "--stdin"], serializeLedgerEntry(entry));
      const tree = await git(["mktree"], `100644 blob ${blob.stdout.trim()}\t${LEDGER_FILE}\n`);
      const parentArgs = previous ? ["-p", previous] : [];
      const commit = await git(["commit-tree", tree.stdout.trim(), ...parentArgs, "-m", `Update ${key} to ${entry.head}`]);
      await git(["push", "--quiet", remote, `${commit.stdout.trim()}:refs/heads/${key}`]);
    },
  };
}
