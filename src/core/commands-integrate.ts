import { isCommitter } from "./census";
import { accessRejection, type CommandHandler } from "./commands";
import {
  AUTO_LABEL,
  DEFERRED_LABEL,
  integratePullRequest,
  READY_LABEL,
  type IntegrationContext,
} from "./integration";

const HASH_ARGUMENT = /^[0-9a-f]{40}$/;

export const integrateCommand: CommandHandler<IntegrationContext> = {
  name: "integrate",
  description: "performs integration of the changes in the PR",
  allowedInBody: true,
  allowedInComment: true,
  access: "author",
  authorize(context, invocation) {
    const deferred = context.pr.labels.includes(DEFERRED_LABEL);
    const option = invocation.args.trim().toLowerCase();
    if (deferred && option !== "defer" && option !== "undefer" && isCommitter(context.census, context.project, invocation.user)) {
      return null;
    }
    return accessRejection(context, invocation, "author");
  },
  async handle(context, invocation) {
    const option = invocation.args.trim().toLowerCase();
    switch (option) {
      case "auto":
        return {
          lines: ["This pull request will be automatically integrated when it is ready."],
          addLabels: [AUTO_LABEL],
        };
      case "manual":
        return {
          lines: ["This pull request will need to be manually integrated by the author."],
          removeLabels: [AUTO_LABEL],
        };
      case "defer":
        return {
          lines: [
            "Integration of this pull request has been deferred and may be completed by any project Committer using the `/integrate` command.",
          ],
          addLabels: [DEFERRED_LABEL],
        };
      case "undefer":
        return {
          lines: ["Integration of this pull request is no longer deferred and may only be completed by the author."],
          removeLabels: [DEFERRED_LABEL],
        };
    }

    if (option && !HASH_ARGUMENT.test(option)) {
      return { lines: ["Syntax: `/integrate [auto|manual|defer|undefer|<target-hash>]`"] };
    }
    if (!context.pr.labels.includes(READY_LABEL)) {
      return { lines: ["This pull request has not yet been marked as ready for integration."] };
    }

    const sponsor = invocation.user.id === context.pr.author.id ? null : invocation.user;
    return integratePullRequest(context, { sponsor, expectedTargetHash: option || null });
  },
};

export const sponsorCommand: CommandHandler<IntegrationContext> = {
  name: "sponsor",
  description: "performs integration of a PR that is authored by a non-committer",
  allowedInBody: false,
  allowedInComment: true,
  access: "committer",
  async handle(context, invocation) {
    const option = invocation.args.trim().toLowerCase();
    if (option && !HASH_ARGUMENT.test(option)) {
      return { lines: ["Syntax: `/sponsor [<target-hash>]`"] };
    }
    if (isCommitter(context.census, context.project, context.pr.author)) {
      return { lines: ["This change does not need sponsoring - the author is allowed to integrate it."] };
    }
    if (!context.pr.labels.includes(READY_LABEL)) {
      return { lines: ["This pull request has not yet been marked as ready for integration."] };
    }

    const requested = context.tracker.sponsorReady;
    if (!requested) {
      return {
        lines: [`The change author (@${context.pr.author.login}) must issue an \`/integrate\` command before the integration can be sponsored.`],
      };
    }
    if (requested !== context.pr.headHash) {
      return {
        lines: [
          "The PR has been updated since the change author issued the integrate command - the author must perform this command again.",
        ],
      };
    }

    return integratePullRequest(context, { sponsor: invocation.user, expectedTargetHash: option || null });
  },
};

export const INTEGRATION_COMMANDS: readonly CommandHandler<IntegrationContext>[] = [integrateCommand, sponsorCommand];
