export type ForgeUser = {
  id: string;
  login: string;
};

export type ForgeComment = {
  id: string;
  author: ForgeUser;
  body: string;
  createdAt: string;
};

export const REVIEW_VERDICTS = ["approved", "changes_requested", "commented", "dismissed"] as const;
export type ReviewVerdict = (typeof REVIEW_VERDICTS)[number];

export type ForgeReview = {
  id: string;
  reviewer: ForgeUser;
  verdict: ReviewVerdict;
  hash: string;
  createdAt: string;
};

export type PullRequestState = "open" | "closed";

export type BranchHead = {
  hash: string;
  parent: string | null;
};

export type PullRequestSnapshot = {
  repository: string;
  number: number;
  title: string;
  body: string;
  author: ForgeUser;
  headHash: string;
  headRef: string;
  targetRef: string;
  targetHash: string;
  labels: string[];
  state: PullRequestState;
};

export type Forge = {
  currentUser(): Promise<ForgeUser>;
  pullRequest(repository: string, number: number): Promise<PullRequestSnapshot>;
  openPullRequests(repository: string): Promise<number[]>;
  comments(repository: string, number: number): Promise<ForgeComment[]>;
  reviews(repository: string, number: number): Promise<ForgeReview[]>;
  addComment(repository: string, number: number, body: string): Promise<ForgeComment>;
  addLabel(repository: string, number: number, label: string): Promise<void>;
  removeLabel(repository: string, number: number, label: string): Promise<void>;
  close(repository: string, number: number): Promise<void>;
  userByLogin(login: string): Promise<ForgeUser | null>;
  branchHead(repository: string, branch: string): Promise<BranchHead>;
  cloneUrl(repository: string): string;
};

export function isReviewVerdict(value: string): value is ReviewVerdict {
  return REVIEW_VERDICTS.some((verdict) => verdict === value);
}

function timestamp(value: string): number {
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? 0 : parsed;
}

export function sortByCreation<T extends { createdAt: string }>(items: readonly T[]): T[] {
  return [...items].sort((left, right) => timestamp(left.createdAt) - timestamp(right.createdAt));
}

export function activeReviews(reviews: readonly ForgeReview[]): ForgeReview[] {
  const latest = new Map<string, ForgeReview>();
  for (const review of sortByCreation(reviews)) {
    latest.delete(review.reviewer.id);
    latest.set(review.reviewer.id, review);
  }
  return Array.from(latest.values());
}

export function pullRequestKey(pr: { repository: string; number: number }): string {
  return `${pr.repository}#${pr.number}`;
}
