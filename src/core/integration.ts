import { isCommitter } from "./census";
import type { CommandContext, CommandOutcome } from "./commands";
import { buildCommitMessage, type CommitMessageInput } from "./commit-message";
import { activeReviews, type ForgeUser, type PullRequestSnapshot } from "./forge";
import type { Identity, Vcs } from "./git";
import { withLock, type LockService } from "./integration-lock";
import { IntegrityFault, type IntegrityLedger } from "./integrity-ledger";
import { encodeMarker, type Marker } from "./markers";
import { rebaseOntoTarget, synthesizeCommit, type SynthesisContext } from "./synthesizer";
import type { Validator } from "./validation";

export const READY_LABEL = "ready";
export const SPONSOR_LABEL = "sponsor";
export const INTEGRATED_LABEL = "integrated";
export const AUTO_LABEL = "auto";
export const DEFERRED_LABEL = "deferred";

const LABELS_CLEARED_ON_INTEGRATION = [READY_LABEL, SPONSOR_LABEL, DEFERRED_LABEL, AUTO_LABEL] as const;

export type IntegrationServices = {
  vcs: Vcs;
  lock: LockService;
  ledger: IntegrityLedger;
  validator: Validator;
  lockTimeoutMs: number;
  botIdentity: Identity;
};

export type IntegrationContext = CommandContext & {
  services: IntegrationServices;
};

export type IntegrationRequest = {
  sponsor: ForgeUser | null;
  expectedTargetHash: string | null;
};

async function markIntegrated(context: IntegrationContext, pr: PullRequestSnapshot, hash: string): Promise<void> {
  const { forge } = context;
  await forge.addLabel(pr.repository, pr.number, INTEGRATED_LABEL);
  await forge.close(pr.repository, pr.number);
  for (const label of LABELS_CLEARED_ON_INTEGRATION) {
    if (pr.labels.includes(label)) {
      await forge.removeLabel(pr.repository, pr.number, label);
    }
  }
  context.logger.info({ repository: pr.repository, pr: pr.number, hash }, "integration: pull request marked as integrated");
}

function messageInput(context: IntegrationContext, pr: PullRequestSnapshot, includeManualReviewers: boolean): CommitMessageInput {
  return {
    pr,
    reviews: activeReviews(context.reviews),
    census: context.census,
    tracker: context.tracker,
    useStaleReviews: context.repo.useStaleReviews,
    includeManualReviewers,
  };
}

async function runLocked(context: IntegrationContext, request: IntegrationRequest): Promise<CommandOutcome> {
  const { forge, services, logger } = context;
  const { vcs } = services;

  const refreshed = await forge.pullRequest(context.pr.repository, context.pr.number);
  if (refreshed.state === "closed") {
    return { lines: ["This pull request has already been closed."] };
  }

  const headHash = await vcs.fetch(refreshed.headRef);
  const targetHash = await vcs.fetch(`refs/heads/${refreshed.targetRef}`);
  const pr: PullRequestSnapshot = { ...refreshed, headHash, targetHash };

  if (request.expectedTargetHash && request.expectedTargetHash !== targetHash) {
    return {
      lines: [
        `The head of the target branch is no longer at the requested hash ${request.expectedTargetHash} - it has moved to ${targetHash}. Aborting integration.`,
      ],
    };
  }

  const targetCommit = await vcs.lookup(targetHash);
  await services.ledger.verify(pr.repository, pr.targetRef, { hash: targetHash, parent: targetCommit?.parents[0] ?? null });

  const prepush = context.tracker.prepush;
  if (prepush && (await vcs.isAncestor(prepush, targetHash))) {
    logger.info({ repository: pr.repository, pr: pr.number, hash: prepush }, "integration: push already completed in an earlier run");
    await markIntegrated(context, pr, prepush);
    return { lines: [`Pushed as commit ${prepush}.`] };
  }

  const synthesis: SynthesisContext = {
    vcs,
    pr,
    targetHash,
    census: context.census,
    project: context.project,
    botIdentity: services.botIdentity,
  };

  const lines: string[] = [];
  const rebase = await rebaseOntoTarget(synthesis);
  if (rebase.incoming.length) {
    lines.push(`The following commits have been pushed to ${pr.targetRef} since your change was applied:`);
    lines.push(...rebase.incoming.map((commit) => ` * ${commit.hash}: ${commit.message.split("\n")[0] ?? ""}`));
    lines.push("");
  }
  if (!rebase.ok) {
    return { lines: [...lines, rebase.failure.reason] };
  }
  if (rebase.rebased) {
    lines.push("Your commit was automatically rebased without conflicts.", "");
  }

  const commitOptions = {
    finalHead: rebase.head,
    sponsor: request.sponsor,
    authorOverride: context.tracker.author,
  };
  const created = await synthesizeCommit(synthesis, { ...commitOptions, message: buildCommitMessage(messageInput(context, pr, false)) });
  if (!created.ok) {
    return { lines: [...lines, `It was not possible to create a commit for the changes in this PR: ${created.failure.reason}`] };
  }

  if (created.hash === targetHash) {
    return { lines: [...lines, "Warning! Your commit did not result in any changes! No push attempt will be made."] };
  }

  const issues = await services.validator.check(pr.repository, created.hash, targetHash);
  if (issues.length) {
    return {
      lines: [
        ...lines,
        "Your integration request cannot be fulfilled at this time, as your changes failed the final validation:",
        ...issues.map((issue) => ` * ${issue}`),
      ],
    };
  }

  if (!request.sponsor && !isCommitter(context.census, context.project, pr.author)) {
    const markers: Marker[] = [{ kind: "sponsor-ready", hash: pr.headHash }];
    return {
      lines: [
        ...lines,
        `Your change (at version ${pr.headHash}) is now ready to be sponsored by a Committer.`,
        "A Committer can integrate it by issuing the `/sponsor` command.",
      ],
      markers,
      addLabels: [SPONSOR_LABEL],
    };
  }

  let finalHash = created.hash;
  const amendedMessage = buildCommitMessage(messageInput(context, pr, true));
  if (amendedMessage !== buildCommitMessage(messageInput(context, pr, false))) {
    const amended = await synthesizeCommit(synthesis, { ...commitOptions, message: amendedMessage });
    if (!amended.ok) {
      return { lines: [...lines, `It was not possible to create a commit for the changes in this PR: ${amended.failure.reason}`] };
    }
    finalHash = amended.hash;
  }

  await forge.addComment(
    pr.repository,
    pr.number,
    [encodeMarker({ kind: "prepush", hash: finalHash }), `Going to push as commit ${finalHash}.`].join("\n"),
  );
  await vcs.push(finalHash, pr.targetRef);
  logger.info({ repository: pr.repository, pr: pr.number, hash: finalHash, target: pr.targetRef }, "integration: pushed");

  const pushed = await vcs.lookup(finalHash);
  await services.ledger.update(pr.repository, pr.targetRef, { hash: finalHash, parent: pushed?.parents[0] ?? targetHash });
  await markIntegrated(context, pr, finalHash);

  return { lines: [...lines, `Pushed as commit ${finalHash}.`] };
}

export async function integratePullRequest(context: IntegrationContext, request: IntegrationRequest): Promise<CommandOutcome> {
  const { pr, services, logger } = context;
  try {
    const result = await withLock(services.lock, pr.repository, services.lockTimeoutMs, () => runLocked(context, request));
    if (!result.acquired) {
      logger.error({ repository: pr.repository, pr: pr.number }, "integration: unable to acquire the integration lock");
      return {
        lines: [`Unable to acquire the integration lock for ${pr.repository}; please try again later.`],
      };
    }
    return result.value;
  } catch (error) {
    if (error instanceof IntegrityFault) {
      return {
        lines: [
          `The recorded state of \`${error.branch}\` does not match the repository. Integration is halted for this branch until an operator has resolved the inconsistency.`,
        ],
      };
    }
    logger.error({ err: error, repository: pr.repository, pr: pr.number }, "integration: unexpected error");
    return {
      lines: [
        "An unexpected error occurred during integration. The error has been logged and will be investigated. It is possible that this error is caused by a transient issue; feel free to retry the operation.",
      ],
    };
  }
}
