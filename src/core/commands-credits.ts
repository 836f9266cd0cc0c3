import { contributorByForgeUser, contributorByUsername, formatContributor, namespaceUsername } from "./census";
import type { CommandContext, CommandHandler, CommandInvocation, CommandOutcome } from "./commands";
import { approvingReviewers, normalizeIssueId, parseIssueTitle } from "./commit-message";
import { isMarkerSafe } from "./markers";
import { parseIdentity } from "./synthesizer";

const CONTRIBUTOR_SYNTAX = "Syntax: `/contributor (add|remove) [@user | census-user | Full Name <email@address>]`";
const REVIEWER_SYNTAX = "Syntax: `/reviewer (credit|remove) [@user | census-user]`";
const ISSUE_SYNTAX = "Syntax: `/issue (add|remove) <ID>[: description]`";
const ISSUE_ID_PATTERN = /^#?(?:[A-Za-z][A-Za-z0-9]+-)?[0-9]+$/;

function splitAction(args: string): { action: string; rest: string } {
  const match = /^(\S+)(?:\s+(.*))?$/.exec(args.trim());
  return { action: (match?.[1] ?? "").toLowerCase(), rest: (match?.[2] ?? "").trim() };
}

function bulletList(values: readonly string[]): string[] {
  return values.map((value) => ` - \`${value}\``);
}

async function resolveContributor(context: CommandContext, value: string): Promise<string | null> {
  if (value.startsWith("@")) {
    const user = await context.forge.userByLogin(value.slice(1));
    if (!user) return null;
    const contributor = contributorByForgeUser(context.census, user);
    return contributor ? formatContributor(context.census, contributor) : null;
  }

  const byUsername = contributorByUsername(context.census, value);
  if (byUsername) return formatContributor(context.census, byUsername);

  const identity = parseIdentity(value);
  return identity ? `${identity.name} <${identity.email}>` : null;
}

async function resolveReviewer(context: CommandContext, value: string): Promise<string | null> {
  if (value.startsWith("@")) {
    const user = await context.forge.userByLogin(value.slice(1));
    if (!user) return null;
    return namespaceUsername(context.census, user) ?? user.login;
  }
  return contributorByUsername(context.census, value)?.username ?? null;
}

export const contributorCommand: CommandHandler = {
  name: "contributor",
  description: "adds or removes additional contributors for a PR",
  allowedInBody: true,
  allowedInComment: true,
  access: "author",
  async handle(context, invocation): Promise<CommandOutcome> {
    const { action, rest } = splitAction(invocation.args);
    if ((action !== "add" && action !== "remove") || !rest) {
      return { lines: [CONTRIBUTOR_SYNTAX] };
    }

    const contributor = await resolveContributor(context, rest);
    if (!contributor || !isMarkerSafe(contributor)) {
      return { lines: [`Could not parse \`${rest}\` as a valid contributor.`, CONTRIBUTOR_SYNTAX] };
    }

    const current = context.tracker.contributors;
    if (action === "add") {
      return {
        lines: [`Contributor \`${contributor}\` successfully added.`],
        markers: [{ kind: "contributor", action: "add", contributor }],
      };
    }

    if (current.includes(contributor)) {
      return {
        lines: [`Contributor \`${contributor}\` successfully removed.`],
        markers: [{ kind: "contributor", action: "remove", contributor }],
      };
    }
    if (!current.length) {
      return { lines: ["There are no additional contributors associated with this pull request."] };
    }
    return {
      lines: [`Contributor \`${contributor}\` was not found.`, "Current additional contributors are:", ...bulletList(current)],
    };
  },
};

export const reviewerCommand: CommandHandler = {
  name: "reviewer",
  description: "manually credits or removes an additional reviewer",
  allowedInBody: false,
  allowedInComment: true,
  access: "author",
  async handle(context, invocation) {
    const { action, rest } = splitAction(invocation.args);
    if (!["credit", "add", "remove"].includes(action) || !rest) {
      return { lines: [REVIEWER_SYNTAX] };
    }

    const reviewer = await resolveReviewer(context, rest);
    if (!reviewer) {
      return { lines: [`Could not parse \`${rest}\` as a valid reviewer.`, REVIEWER_SYNTAX] };
    }

    const credited = context.tracker.reviewers;
    if (action !== "remove") {
      const authenticated = approvingReviewers({
        pr: context.pr,
        reviews: context.reviews,
        census: context.census,
        useStaleReviews: true,
      });
      if (authenticated.includes(reviewer)) {
        return {
          lines: [
            `Reviewer \`${reviewer}\` has already made an authenticated review of this PR, and does not need to be credited manually.`,
          ],
        };
      }
      return {
        lines: [`Reviewer \`${reviewer}\` successfully credited.`],
        markers: [{ kind: "reviewer", action: "add", login: reviewer }],
      };
    }

    if (credited.includes(reviewer)) {
      return {
        lines: [`Reviewer \`${reviewer}\` successfully removed.`],
        markers: [{ kind: "reviewer", action: "remove", login: reviewer }],
      };
    }
    if (!credited.length) {
      return { lines: ["There are no manually specified reviewers associated with this pull request."] };
    }
    return {
      lines: [`Reviewer \`${reviewer}\` was not found.`, "Current additional reviewers are:", ...bulletList(credited)],
    };
  },
};

export const authorCommand: CommandHandler = {
  name: "author",
  description: "sets an overriding author to be used in the commit when the PR is integrated",
  allowedInBody: false,
  allowedInComment: true,
  access: "committer",
  async handle(context, invocation) {
    const { action, rest } = splitAction(invocation.args);
    if (action === "set") {
      const identity = parseIdentity(rest);
      if (!identity) {
        return { lines: [`Could not parse \`${rest}\` as a valid author.`, "Syntax: `/author set Full Name <email@address>`"] };
      }
      const author = `${identity.name} <${identity.email}>`;
      return { lines: [`Setting overriding author to \`${author}\`.`], markers: [{ kind: "author", author }] };
    }

    if (action === "remove") {
      const current = context.tracker.author;
      if (!current) {
        return { lines: ["There is no overriding author set for this pull request."] };
      }
      return {
        lines: [`Overriding author \`${current}\` was successfully removed.`],
        markers: [{ kind: "author", author: "" }],
      };
    }

    return { lines: ["Syntax: `/author (set|remove) [Full Name <email@address>]`"] };
  },
};

function summaryText(invocation: CommandInvocation): string {
  return [invocation.args, ...invocation.extraLines].join("\n").trim();
}

export const summaryCommand: CommandHandler = {
  name: "summary",
  description: "updates the summary in the commit message",
  allowedInBody: true,
  allowedInComment: true,
  access: "author",
  async handle(context, invocation) {
    const text = summaryText(invocation);
    if (!text) {
      if (!context.tracker.summary) {
        return { lines: ["To set a summary, use the syntax `/summary <summary text>`"] };
      }
      return { lines: ["Removing existing summary"], markers: [{ kind: "summary", text: "" }] };
    }

    const verb = context.tracker.summary ? "Updating existing" : "Setting";
    return {
      lines: [`${verb} summary to:`, "", "```", text, "```"],
      markers: [{ kind: "summary", text }],
    };
  },
};

export const issueCommand: CommandHandler = {
  name: "issue",
  aliases: ["solves"],
  description: "edits the set of issues that this PR solves",
  allowedInBody: true,
  allowedInComment: true,
  access: "author",
  async handle(context, invocation) {
    const { action, rest } = splitAction(invocation.args);
    if (action !== "add" && action !== "remove") {
      return { lines: [ISSUE_SYNTAX] };
    }

    const separator = rest.indexOf(":");
    const rawId = (separator >= 0 ? rest.slice(0, separator) : rest).trim();
    const description = separator >= 0 ? rest.slice(separator + 1).trim() : "";
    if (!ISSUE_ID_PATTERN.test(rawId)) {
      return { lines: [`Could not parse \`${rawId}\` as a valid issue id.`, ISSUE_SYNTAX] };
    }

    const issue = normalizeIssueId(rawId);
    if (parseIssueTitle(context.pr.title)?.id === issue) {
      return { lines: [`Issue \`${issue}\` is the primary issue of this pull request and is taken from the title.`] };
    }

    const solved = context.tracker.solvedIssues;
    if (action === "add") {
      if (!description) {
        return { lines: [`Please provide a description for issue \`${issue}\`.`, ISSUE_SYNTAX] };
      }
      return {
        lines: [`Adding additional issue to solves list: \`${issue}: ${description}\`.`],
        markers: [{ kind: "solves", issue, description }],
      };
    }

    if (!solved.some((entry) => entry.id === issue)) {
      return { lines: [`Issue \`${issue}\` was not found in the list of additional solved issues.`] };
    }
    return {
      lines: [`Removing additional issue from solves list: \`${issue}\`.`],
      markers: [{ kind: "solves", issue, description: "" }],
    };
  },
};

export const CREDIT_COMMANDS: readonly CommandHandler[] = [
  contributorCommand,
  reviewerCommand,
  authorCommand,
  summaryCommand,
  issueCommand,
];
