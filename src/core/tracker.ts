import type { CensusRole } from "./census";
import { sortByCreation, type ForgeComment, type ReviewVerdict } from "./forge";
import { decodeMarkers, type Marker, type SetAction } from "./markers";

export type TrackerDomain<S> = {
  empty(): S;
  fold(state: S, marker: Marker): S;
};

export type SolvedIssue = {
  id: string;
  description: string;
};

export type RecordedReview = {
  verdict: ReviewVerdict;
  hash: string;
};

export type ReviewerCountOverride = {
  count: number;
  role: CensusRole;
};

export type TrackerState = {
  labels: string[];
  contributors: string[];
  reviewers: string[];
  solvedIssues: SolvedIssue[];
  vetoes: string[];
  reviews: Record<string, RecordedReview>;
  reviewerCount: ReviewerCountOverride | null;
  sponsorReady: string | null;
  summary: string | null;
  author: string | null;
  prepush: string | null;
  replied: string[];
};

type SetChange = { action: SetAction; value: string };

export function botComments(comments: readonly ForgeComment[], botId: string): ForgeComment[] {
  return sortByCreation(comments).filter((comment) => comment.author.id === botId);
}

export function replayDomain<S>(comments: readonly ForgeComment[], botId: string, domain: TrackerDomain<S>): S {
  let state = domain.empty();
  for (const comment of botComments(comments, botId)) {
    for (const marker of decodeMarkers(comment.body)) {
      state = domain.fold(state, marker);
    }
  }
  return state;
}

function setDomain(select: (marker: Marker) => SetChange | null): TrackerDomain<string[]> {
  return {
    empty: () => [],
    fold: (state, marker) => {
      const change = select(marker);
      if (!change || !change.value) return state;
      const without = state.filter((value) => value !== change.value);
      return change.action === "add" ? [...without, change.value] : without;
    },
  };
}

function scalarDomain(select: (marker: Marker) => string | null): TrackerDomain<string | null> {
  return {
    empty: () => null,
    fold: (state, marker) => {
      const value = select(marker);
      if (value === null) return state;
      return value.trim() ? value : null;
    },
  };
}

export const labelDomain = setDomain((marker) =>
  marker.kind === "label" ? { action: marker.action, value: marker.name } : null,
);

export const contributorDomain = setDomain((marker) =>
  marker.kind === "contributor" ? { action: marker.action, value: marker.contributor } : null,
);

export const reviewerDomain = setDomain((marker) =>
  marker.kind === "reviewer" ? { action: marker.action, value: marker.login } : null,
);

export const vetoDomain = setDomain((marker) =>
  marker.kind === "veto" ? { action: marker.action === "veto" ? "add" : "remove", value: marker.userId } : null,
);

export const repliedDomain = setDomain((marker) =>
  marker.kind === "command-reply" ? { action: "add", value: marker.invocationId } : null,
);

export const solvedIssueDomain: TrackerDomain<SolvedIssue[]> = {
  empty: () => [],
  fold: (state, marker) => {
    if (marker.kind !== "solves") return state;
    const description = marker.description.trim();
    if (!description) {
      return state.filter((issue) => issue.id !== marker.issue);
    }
    if (state.some((issue) => issue.id === marker.issue)) {
      return state.map((issue) => (issue.id === marker.issue ? { id: issue.id, description } : issue));
    }
    return [...state, { id: marker.issue, description }];
  },
};

export const reviewRecordDomain: TrackerDomain<Record<string, RecordedReview>> = {
  empty: () => ({}),
  fold: (state, marker) => {
    if (marker.kind !== "review") return state;
    return { ...state, [marker.reviewerId]: { verdict: marker.verdict, hash: marker.hash } };
  },
};

export const reviewerCountDomain: TrackerDomain<ReviewerCountOverride | null> = {
  empty: () => null,
  fold: (state, marker) => (marker.kind === "reviewer-count" ? { count: marker.count, role: marker.role } : state),
};

export const sponsorReadyDomain = scalarDomain((marker) => (marker.kind === "sponsor-ready" ? marker.hash : null));
export const summaryDomain = scalarDomain((marker) => (marker.kind === "summary" ? marker.text : null));
export const authorDomain = scalarDomain((marker) => (marker.kind === "author" ? marker.author : null));
export const prepushDomain = scalarDomain((marker) => (marker.kind === "prepush" ? marker.hash : null));

export function replayTrackers(comments: readonly ForgeComment[], botId: string): TrackerState {
  return {
    labels: replayDomain(comments, botId, labelDomain),
    contributors: replayDomain(comments, botId, contributorDomain),
    reviewers: replayDomain(comments, botId, reviewerDomain),
    solvedIssues: replayDomain(comments, botId, solvedIssueDomain),
    vetoes: replayDomain(comments, botId, vetoDomain),
    reviews: replayDomain(comments, botId, reviewRecordDomain),
    reviewerCount: replayDomain(comments, botId, reviewerCountDomain),
    sponsorReady: replayDomain(comments, botId, sponsorReadyDomain),
    summary: replayDomain(comments, botId, summaryDomain),
    author: replayDomain(comments, botId, authorDomain),
    prepush: replayDomain(comments, botId, prepushDomain),
    replied: replayDomain(comments, botId, repliedDomain),
  };
}
