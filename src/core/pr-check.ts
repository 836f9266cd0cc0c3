import { CENSUS_ROLES, hasRole, roleOf, type CensusRole } from "./census";
import type { CommandContext } from "./commands";
import { isMergeTitle, parseIssueTitle } from "./commit-message";
import { activeReviews, type ForgeReview } from "./forge";
import { AUTO_LABEL, INTEGRATED_LABEL, READY_LABEL } from "./integration";
import { encodeMarker, SELF_COMMAND_MARKER } from "./markers";
import { botComments } from "./tracker";

export type ReviewRequirement = {
  role: CensusRole;
  count: number;
};

export type CheckReport = {
  recordedReviews: number;
  issues: string[];
  ready: boolean;
  autoIntegrate: boolean;
};

const VERDICT_TEXT: Record<ForgeReview["verdict"], string> = {
  approved: "approved",
  changes_requested: "requested changes to",
  commented: "commented on",
  dismissed: "had their review dismissed on",
};

export function unrecordedReviews(context: Pick<CommandContext, "reviews" | "tracker">): ForgeReview[] {
  return activeReviews(context.reviews).filter((review) => {
    const recorded = context.tracker.reviews[review.reviewer.id];
    return !recorded || recorded.verdict !== review.verdict || recorded.hash !== review.hash;
  });
}

export function reviewRequirements(context: Pick<CommandContext, "repo" | "tracker">): ReviewRequirement[] {
  const requirements: ReviewRequirement[] = [context.repo.reviewers];
  const extra = context.tracker.reviewerCount;
  if (extra && extra.count > 0) requirements.push(extra);
  return requirements
    .filter((requirement) => requirement.count > 0)
    .sort((left, right) => CENSUS_ROLES.indexOf(left.role) - CENSUS_ROLES.indexOf(right.role));
}

export function missingReviews(context: CommandContext): ReviewRequirement[] {
  const { census, project, pr } = context;
  const approvers = activeReviews(context.reviews)
    .filter((review) => review.verdict === "approved" && review.reviewer.id !== pr.author.id)
    .filter((review) => context.repo.useStaleReviews || review.hash === pr.headHash)
    .map((review) => review.reviewer);

  const missing: ReviewRequirement[] = [];
  let pool = [...approvers];
  for (const requirement of reviewRequirements(context)) {
    const qualified = pool
      .filter((user) => hasRole(census, project, user, requirement.role))
      .sort(
        (left, right) =>
          CENSUS_ROLES.indexOf(roleOf(census, project, right)) - CENSUS_ROLES.indexOf(roleOf(census, project, left)),
      );
    const used = qualified.slice(0, requirement.count);
    pool = pool.filter((user) => !used.includes(user));
    if (used.length < requirement.count) {
      missing.push({ role: requirement.role, count: requirement.count - used.length });
    }
  }
  return missing;
}

export function readinessIssues(context: CommandContext): string[] {
  const { pr, tracker } = context;
  const issues: string[] = [];

  if (!isMergeTitle(pr.title) && !parseIssueTitle(pr.title)?.description) {
    issues.push("The pull request title must be of the form `ID: description`");
  }
  for (const veto of tracker.vetoes) {
    issues.push(`Integration is blocked by a veto from the Reviewer with id ${veto}`);
  }
  for (const review of activeReviews(context.reviews)) {
    if (review.verdict === "changes_requested") {
      issues.push(`@${review.reviewer.login} has requested changes`);
    }
  }
  for (const requirement of missingReviews(context)) {
    issues.push(`Change must be properly reviewed (${requirement.count} more review${requirement.count === 1 ? "" : "s"} required from ${requirement.role})`);
  }
  return issues;
}

function alreadyRequestedAutoIntegration(context: CommandContext): boolean {
  const marker = `\`${context.pr.headHash}\``;
  return botComments(context.comments, context.bot.id).some(
    (comment) => comment.body.includes(SELF_COMMAND_MARKER) && comment.body.includes(marker),
  );
}

export async function checkPullRequest(context: CommandContext): Promise<CheckReport> {
  const { forge, pr, logger } = context;

  const newReviews = unrecordedReviews(context);
  for (const review of newReviews) {
    const body = [
      encodeMarker({ kind: "review", reviewerId: review.reviewer.id, verdict: review.verdict, hash: review.hash }),
      `@${review.reviewer.login} ${VERDICT_TEXT[review.verdict]} this change at \`${review.hash}\`.`,
    ].join("\n");
    await forge.addComment(pr.repository, pr.number, body);
  }

  if (pr.state === "closed") {
    return { recordedReviews: newReviews.length, issues: [], ready: false, autoIntegrate: false };
  }

  const issues = readinessIssues(context);
  const ready = issues.length === 0;
  if (ready && !pr.labels.includes(READY_LABEL)) {
    await forge.addLabel(pr.repository, pr.number, READY_LABEL);
  }
  if (!ready && pr.labels.includes(READY_LABEL)) {
    await forge.removeLabel(pr.repository, pr.number, READY_LABEL);
  }

  const autoIntegrate =
    ready &&
    pr.labels.includes(AUTO_LABEL) &&
    !pr.labels.includes(INTEGRATED_LABEL) &&
    !alreadyRequestedAutoIntegration(context);
  if (autoIntegrate) {
    await forge.addComment(
      pr.repository,
      pr.number,
      [SELF_COMMAND_MARKER, `Automatic integration requested for \`${pr.headHash}\`.`, "/integrate"].join("\n"),
    );
  }

  logger.debug({ repository: pr.repository, pr: pr.number, ready, issues: issues.length }, "check: completed");
  return { recordedReviews: newReviews.length, issues, ready, autoIntegrate };
}
