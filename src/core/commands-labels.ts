import { CENSUS_ROLES, isReviewer, type CensusRole } from "./census";
import { accessRejection, type CommandHandler, type CommandOutcome } from "./commands";
import type { Marker } from "./markers";

const MAX_ADDITIONAL_REVIEWERS = 10;

const ROLE_ALIASES: Record<string, CensusRole> = {
  lead: "lead",
  reviewer: "reviewers",
  reviewers: "reviewers",
  committer: "committers",
  committers: "committers",
  author: "authors",
  authors: "authors",
  contributor: "contributors",
  contributors: "contributors",
};

type LabelChange = { action: "add" | "remove"; label: string };

export function parseLabelArguments(args: string): LabelChange[] | null {
  const tokens = args
    .split(/[\s,]+/)
    .map((token) => token.trim())
    .filter(Boolean);
  const [first, ...rest] = tokens;
  if (!first) return null;

  if (first === "add" || first === "remove") {
    if (!rest.length) return null;
    return rest.map((label) => ({ action: first, label }));
  }

  const changes: LabelChange[] = [];
  for (const token of tokens) {
    const sign = token[0];
    const label = token.slice(1);
    if ((sign !== "+" && sign !== "-") || !label) return null;
    changes.push({ action: sign === "+" ? "add" : "remove", label });
  }
  return changes;
}

export const labelCommand: CommandHandler = {
  name: "label",
  description: "adds or removes labels",
  allowedInBody: true,
  allowedInComment: true,
  access: "author-or-committer",
  async handle(context, invocation): Promise<CommandOutcome> {
    const changes = parseLabelArguments(invocation.args);
    if (!changes) {
      return { lines: ["Syntax: `/label (add|remove) <label>[, <label>...]` or `/label +<label> -<label>`"] };
    }

    const allowed = context.repo.labels;
    const invalid = changes.filter((change) => !allowed.includes(change.label));
    if (invalid.length) {
      return {
        lines: [
          ...invalid.map((change) => `The label \`${change.label}\` is not a valid label.`),
          allowed.length ? "These labels are valid:" : "No labels can be managed with this command in this repository.",
          ...allowed.map((label) => ` * \`${label}\``),
        ],
      };
    }

    const lines: string[] = [];
    const markers: Marker[] = [];
    const addLabels: string[] = [];
    const removeLabels: string[] = [];
    for (const change of changes) {
      const applied = context.pr.labels.includes(change.label);
      if (change.action === "add") {
        if (applied) {
          lines.push(`The \`${change.label}\` label was already applied.`);
          continue;
        }
        addLabels.push(change.label);
        markers.push({ kind: "label", action: "add", name: change.label });
        lines.push(`The \`${change.label}\` label was successfully added.`);
        continue;
      }
      if (!applied) {
        lines.push(`The \`${change.label}\` label was not set.`);
        continue;
      }
      removeLabels.push(change.label);
      markers.push({ kind: "label", action: "remove", name: change.label });
      lines.push(`The \`${change.label}\` label was successfully removed.`);
    }

    return { lines, markers, addLabels, removeLabels };
  },
};

export function parseReviewersArguments(args: string): { count: number; role: CensusRole } | null {
  const match = /^(\d+)(?:\s+([A-Za-z]+))?$/.exec(args.trim());
  if (!match?.[1]) return null;
  const count = Number(match[1]);
  const role = match[2] ? ROLE_ALIASES[match[2].toLowerCase()] : "authors";
  if (!role || count > MAX_ADDITIONAL_REVIEWERS) return null;
  return { count, role };
}

export const reviewersCommand: CommandHandler = {
  name: "reviewers",
  description: "sets the number of additional required reviewers",
  allowedInBody: false,
  allowedInComment: true,
  access: "reviewer",
  authorize(context, invocation) {
    if (invocation.user.id === context.pr.author.id) return null;
    return accessRejection(context, invocation, "reviewer");
  },
  async handle(context, invocation) {
    const requested = parseReviewersArguments(invocation.args);
    if (!requested) {
      return {
        lines: [
          `Usage: \`/reviewers <n> [<role>]\` where \`<n>\` is between 0 and ${MAX_ADDITIONAL_REVIEWERS} and \`<role>\` is one of ${CENSUS_ROLES.map((role) => `\`${role}\``).join(", ")}.`,
        ],
      };
    }

    const current = context.tracker.reviewerCount;
    const lowering =
      current !== null &&
      (requested.count < current.count || CENSUS_ROLES.indexOf(requested.role) > CENSUS_ROLES.indexOf(current.role));
    if (lowering && !isReviewer(context.census, context.project, invocation.user)) {
      return { lines: ["Only Reviewers are allowed to lower the number of required reviewers."] };
    }

    const base = context.repo.reviewers;
    return {
      lines: [
        `The number of required reviews for this PR is now set to ${base.count} from ${base.role} plus ${requested.count} additional from ${requested.role}.`,
      ],
      markers: [{ kind: "reviewer-count", count: requested.count, role: requested.role }],
    };
  },
};

export const rejectCommand: CommandHandler = {
  name: "reject",
  aliases: ["veto"],
  description: "blocks integration of this pull request until the veto is withdrawn",
  allowedInBody: false,
  allowedInComment: true,
  access: "reviewer",
  authorize(context, invocation) {
    if (invocation.user.id === context.pr.author.id) {
      return "You cannot veto your own pull request.";
    }
    return accessRejection(context, invocation, "reviewer");
  },
  async handle(context, invocation) {
    if (context.tracker.vetoes.includes(invocation.user.id)) {
      return { lines: ["You have already vetoed this change."] };
    }
    return {
      lines: ["You have vetoed this change. Integration is blocked until you issue `/allow`."],
      markers: [{ kind: "veto", action: "veto", userId: invocation.user.id }],
    };
  },
};

export const allowCommand: CommandHandler = {
  name: "allow",
  description: "withdraws a previously issued veto",
  allowedInBody: false,
  allowedInComment: true,
  access: "reviewer",
  async handle(context, invocation) {
    if (!context.tracker.vetoes.includes(invocation.user.id)) {
      return { lines: ["You have not vetoed this change."] };
    }
    return {
      lines: ["Your veto has been withdrawn."],
      markers: [{ kind: "veto", action: "approve", userId: invocation.user.id }],
    };
  },
};

export const LABEL_COMMANDS: readonly CommandHandler[] = [labelCommand, reviewersCommand, rejectCommand, allowCommand];
