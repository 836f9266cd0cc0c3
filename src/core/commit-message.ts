import { namespaceUsername, type Census } from "./census";
import type { ForgeReview, PullRequestSnapshot } from "./forge";
import type { TrackerState } from "./tracker";

const ISSUE_TITLE_PATTERN = /^(?:([A-Za-z][A-Za-z0-9]+)-)?([0-9]+)(?::\s+(.+))?$/;

export type TitleIssue = {
  id: string;
  description: string | null;
};

export type CommitMessageInput = {
  pr: Pick<PullRequestSnapshot, "title" | "author" | "headHash">;
  reviews: readonly ForgeReview[];
  census: Census;
  tracker: TrackerState;
  useStaleReviews: boolean;
  includeManualReviewers: boolean;
};

export function parseIssueTitle(title: string): TitleIssue | null {
  const match = ISSUE_TITLE_PATTERN.exec(title.trim());
  if (!match) return null;
  const prefix = match[1] ? `${match[1].toUpperCase()}-` : "";
  return { id: `${prefix}${match[2] ?? ""}`, description: match[3]?.trim() || null };
}

export function normalizeIssueId(raw: string): string {
  return raw.trim().replace(/^#/, "").toUpperCase();
}

export function isMergeTitle(title: string): boolean {
  return /^Merge\b/.test(title.trim());
}

export function approvingReviewers(input: Omit<CommitMessageInput, "tracker" | "includeManualReviewers">): string[] {
  const names: string[] = [];
  for (const review of input.reviews) {
    if (review.verdict !== "approved") continue;
    if (review.reviewer.id === input.pr.author.id) continue;
    if (!input.useStaleReviews && review.hash !== input.pr.headHash) continue;
    const name = namespaceUsername(input.census, review.reviewer) ?? review.reviewer.login;
    if (!names.includes(name)) names.push(name);
  }
  return names;
}

export function reviewerCredits(input: CommitMessageInput): string[] {
  const names = approvingReviewers(input);
  if (!input.includeManualReviewers) return names;
  for (const manual of input.tracker.reviewers) {
    if (!names.includes(manual)) names.push(manual);
  }
  return names;
}

export function buildCommitMessage(input: CommitMessageInput): string {
  const titleIssue = parseIssueTitle(input.pr.title);
  const issueLines = [titleIssue ? `${titleIssue.id}: ${titleIssue.description ?? ""}`.trim() : input.pr.title.trim()];
  for (const issue of input.tracker.solvedIssues) {
    if (titleIssue && issue.id === titleIssue.id) continue;
    issueLines.push(`${issue.id}: ${issue.description}`);
  }

  const sections = [issueLines.join("\n")];

  const summary = input.tracker.summary?.trim();
  if (summary) sections.push(summary);

  const trailers = input.tracker.contributors.map((contributor) => `Co-authored-by: ${contributor}`);
  const reviewers = reviewerCredits(input);
  if (reviewers.length) trailers.push(`Reviewed-by: ${reviewers.join(", ")}`);
  if (trailers.length) sections.push(trailers.join("\n"));

  return sections.join("\n\n");
}
