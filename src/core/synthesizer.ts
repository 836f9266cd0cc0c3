import { censusEmail, contributorByForgeUser, isCommitter, type Census } from "./census";
import { isMergeTitle } from "./commit-message";
import type { ForgeUser, PullRequestSnapshot } from "./forge";
import type { CommitInfo, Identity, Vcs } from "./git";

export const AUTOMATIC_MERGE_MESSAGE = "Automatic merge with latest target";

export type CommitFailureKind =
  | "conflict"
  | "unknown-author"
  | "no-merge-commit"
  | "no-common-ancestor"
  | "merge-restricted";

export type CommitFailure = {
  kind: CommitFailureKind;
  reason: string;
};

export type RebaseResult =
  | { ok: true; head: string; rebased: boolean; incoming: CommitInfo[] }
  | { ok: false; failure: CommitFailure; incoming: CommitInfo[] };

export type CommitResult = { ok: true; hash: string } | { ok: false; failure: CommitFailure };

export type SynthesisContext = {
  vcs: Vcs;
  pr: Pick<PullRequestSnapshot, "title" | "author" | "headHash" | "targetRef">;
  targetHash: string;
  census: Census;
  project: string;
  botIdentity: Identity;
};

export type CommitOptions = {
  finalHead: string;
  message: string;
  sponsor: ForgeUser | null;
  authorOverride: string | null;
};

function fail(kind: CommitFailureKind, reason: string): { ok: false; failure: CommitFailure } {
  return { ok: false, failure: { kind, reason } };
}

export function parseIdentity(value: string): Identity | null {
  const match = /^\s*(.+?)\s*<([^<>\s]+@[^<>\s]+)>\s*$/.exec(value);
  if (!match?.[1] || !match[2]) return null;
  return { name: match[1], email: match[2] };
}

function censusIdentity(context: SynthesisContext, user: ForgeUser): Identity | null {
  const contributor = contributorByForgeUser(context.census, user);
  if (!contributor) return null;
  return { name: contributor.fullName, email: censusEmail(context.census, contributor) };
}

async function storedMergeBase(context: SynthesisContext): Promise<string> {
  const base = await context.vcs.mergeBase(context.targetHash, context.pr.headHash);
  if (!base) {
    throw new Error(`synthesizer: ${context.pr.headHash} has no common ancestor with ${context.targetHash}`);
  }
  return base;
}

export async function rebaseOntoTarget(context: SynthesisContext): Promise<RebaseResult> {
  const base = await storedMergeBase(context);
  const incoming = await context.vcs.commits(base, context.targetHash);
  if (!incoming.length) {
    return { ok: true, head: context.pr.headHash, rebased: false, incoming };
  }

  await context.vcs.checkout(context.pr.headHash);
  const merged = await context.vcs.merge(context.targetHash, AUTOMATIC_MERGE_MESSAGE, context.botIdentity);
  if (!merged) {
    await context.vcs.checkout(context.pr.headHash);
    return {
      ok: false,
      incoming,
      failure: {
        kind: "conflict",
        reason: `It was not possible to rebase your changes automatically. Please merge \`${context.pr.targetRef}\` into your branch and try again.`,
      },
    };
  }
  return { ok: true, head: merged, rebased: true, incoming };
}

async function commitSquashed(context: SynthesisContext, options: CommitOptions): Promise<CommitResult> {
  let author = options.authorOverride ? parseIdentity(options.authorOverride) : null;
  author ??= censusIdentity(context, context.pr.author);
  if (!author) {
    const headCommit = await context.vcs.lookup(context.pr.headHash);
    if (!headCommit) {
      throw new Error(`synthesizer: head commit ${context.pr.headHash} not found`);
    }
    if (headCommit.parents.length > 1) {
      return fail("unknown-author", "Merge commits can only be integrated by authors listed in the census");
    }
    author = headCommit.author;
  }

  const [finalCommit, targetCommit] = await Promise.all([
    context.vcs.lookup(options.finalHead),
    context.vcs.lookup(context.targetHash),
  ]);
  if (finalCommit && targetCommit && finalCommit.tree === targetCommit.tree) {
    return { ok: true, hash: context.targetHash };
  }

  const committer = (options.sponsor && censusIdentity(context, options.sponsor)) || author;
  const hash = await context.vcs.commitTree({
    source: options.finalHead,
    parents: [context.targetHash],
    message: options.message,
    author,
    committer,
  });
  return { ok: true, hash };
}

async function commitMerge(context: SynthesisContext, options: CommitOptions): Promise<CommitResult> {
  const { vcs } = context;
  const base = await storedMergeBase(context);
  const commits = await vcs.commits(base, options.finalHead);

  let mergeCommit: CommitInfo | null = null;
  for (const commit of commits.slice(0, -1)) {
    if (commit.parents.length < 2) continue;
    let incoming = false;
    for (const parent of commit.parents) {
      if (!(await vcs.isAncestor(base, parent))) incoming = true;
    }
    if (incoming) {
      mergeCommit = commit;
      break;
    }
  }

  if (!mergeCommit) {
    return fail("no-merge-commit", "No merge commit containing incoming commits from another branch than the target was found");
  }

  let targetParent: string | null = null;
  const otherParents: string[] = [];
  for (const parent of mergeCommit.parents) {
    if (targetParent === null && (await vcs.isAncestor(base, parent))) {
      targetParent = await vcs.mergeBase(context.targetHash, options.finalHead);
      if (targetParent) continue;
    }
    otherParents.push(parent);
  }
  if (!targetParent) {
    return fail("no-common-ancestor", "The merge commit did not have any common ancestor with the target branch");
  }

  const author = censusIdentity(context, context.pr.author);
  if (!author || !isCommitter(context.census, context.project, context.pr.author)) {
    return fail("merge-restricted", "Merges can only be performed by Committers");
  }

  const committer = (options.sponsor && censusIdentity(context, options.sponsor)) || author;
  const hash = await vcs.commitTree({
    source: options.finalHead,
    parents: [targetParent, ...otherParents],
    message: options.message,
    author,
    committer,
  });
  return { ok: true, hash };
}

export async function synthesizeCommit(context: SynthesisContext, options: CommitOptions): Promise<CommitResult> {
  return isMergeTitle(context.pr.title) ? commitMerge(context, options) : commitSquashed(context, options);
}
