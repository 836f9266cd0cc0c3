import { isMergeTitle, parseIssueTitle } from "./commit-message";
import type { CommitInfo, Identity, Vcs } from "./git";

export type Validator = {
  check(repository: string, hash: string, targetHash: string): Promise<string[]>;
};

const EMAIL_PATTERN = /^[^@\s]+@[^@\s]+$/;

function identityIssues(role: string, identity: Identity): string[] {
  const issues: string[] = [];
  if (!identity.name.trim()) issues.push(`The ${role} name is empty`);
  if (!EMAIL_PATTERN.test(identity.email)) issues.push(`The ${role} email \`${identity.email}\` is not a valid address`);
  return issues;
}

export function commitIssues(commit: CommitInfo, targetHash: string): string[] {
  const issues: string[] = [];
  const [title = ""] = commit.message.split("\n");

  if (!title.trim()) {
    issues.push("The commit message title is empty");
  } else if (!isMergeTitle(title) && !parseIssueTitle(title)?.description) {
    issues.push(`The commit message title \`${title}\` does not reference an issue as \`ID: description\``);
  }
  if (/[ \t]+$/m.test(commit.message)) {
    issues.push("The commit message contains trailing whitespace");
  }
  if (!commit.parents.includes(targetHash) && commit.parents.length === 1) {
    issues.push(`The commit is not based on the current target head ${targetHash}`);
  }

  return [...issues, ...identityIssues("author", commit.author), ...identityIssues("committer", commit.committer)];
}

export function createBasicValidator(vcs: Vcs): Validator {
  return {
    async check(_repository, hash, targetHash) {
      const commit = await vcs.lookup(hash);
      if (!commit) {
        return [`The commit ${hash} could not be found`];
      }
      return commitIssues(commit, targetHash);
    },
  };
}
