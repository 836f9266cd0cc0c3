import { isCommitter, isReviewer, type Census } from "./census";
import type { RepositoryConfig } from "./config";
import { sortByCreation, type Forge, type ForgeComment, type ForgeReview, type ForgeUser, type PullRequestSnapshot } from "./forge";
import type { Logger } from "./logger";
import { encodeMarker, neutralizeMarkers, SELF_COMMAND_MARKER, type Marker } from "./markers";
import type { TrackerState } from "./tracker";

const COMMAND_LINE_PATTERN = /^\s*\/([A-Za-z-]+)(?:\s+(.*))?$/;

export type CommandOrigin = "body" | "comment";

export type CommandInvocation = {
  id: string;
  name: string;
  args: string;
  extraLines: string[];
  user: ForgeUser;
  origin: CommandOrigin;
};

export type CommandOutcome = {
  lines: string[];
  markers?: Marker[];
  addLabels?: string[];
  removeLabels?: string[];
};

export type CommandAccess = "anyone" | "author" | "reviewer" | "committer" | "author-or-committer" | "integrator";

export type CommandContext = {
  pr: PullRequestSnapshot;
  comments: readonly ForgeComment[];
  reviews: readonly ForgeReview[];
  tracker: TrackerState;
  census: Census;
  project: string;
  repo: RepositoryConfig;
  bot: ForgeUser;
  forge: Forge;
  logger: Logger;
};

export type CommandHandler<C extends CommandContext = CommandContext> = {
  name: string;
  aliases?: string[];
  description: string;
  allowedInBody: boolean;
  allowedInComment: boolean;
  allowedWhenClosed?: boolean;
  access: CommandAccess;
  authorize?(context: C, invocation: CommandInvocation): string | null;
  handle(context: C, invocation: CommandInvocation): Promise<CommandOutcome>;
};

export type CommandRegistry<C extends CommandContext = CommandContext> = Map<string, CommandHandler<C>>;

export type DispatchReport = {
  handled: string[];
  rejected: string[];
  skipped: string[];
};

type ExtractedCommand = {
  name: string;
  args: string;
  extraLines: string[];
};

export function parseCommandLines(text: string): ExtractedCommand[] {
  const found: ExtractedCommand[] = [];
  let current: ExtractedCommand | null = null;
  let inFence = false;

  for (const line of text.split(/\r?\n/)) {
    if (/^\s*(```|~~~)/.test(line)) {
      inFence = !inFence;
      current = null;
      continue;
    }
    if (inFence) continue;

    const match = COMMAND_LINE_PATTERN.exec(line);
    if (match?.[1]) {
      current = { name: match[1].toLowerCase(), args: (match[2] ?? "").trim(), extraLines: [] };
      found.push(current);
      continue;
    }
    if (!line.trim()) {
      current = null;
      continue;
    }
    current?.extraLines.push(line.trimEnd());
  }

  return found;
}

function toInvocations(
  baseId: string,
  text: string,
  user: ForgeUser,
  origin: CommandOrigin,
): CommandInvocation[] {
  return parseCommandLines(text).map((command, index) => ({
    id: index === 0 ? baseId : `${baseId}:${index}`,
    name: command.name,
    args: command.args,
    extraLines: command.extraLines,
    user,
    origin,
  }));
}

export function extractCommands(
  pr: Pick<PullRequestSnapshot, "body" | "author">,
  comments: readonly ForgeComment[],
  botId: string,
): CommandInvocation[] {
  const invocations = toInvocations("body", pr.body, pr.author, "body");
  for (const comment of sortByCreation(comments)) {
    if (comment.author.id === botId) {
      if (!comment.body.includes(SELF_COMMAND_MARKER)) continue;
      invocations.push(...toInvocations(comment.id, comment.body, pr.author, "comment"));
      continue;
    }
    invocations.push(...toInvocations(comment.id, comment.body, comment.author, "comment"));
  }
  return invocations;
}

export function createRegistry<C extends CommandContext>(handlers: readonly CommandHandler<C>[]): CommandRegistry<C> {
  const registry: CommandRegistry<C> = new Map();
  for (const handler of handlers) {
    for (const name of [handler.name, ...(handler.aliases ?? [])]) {
      if (registry.has(name)) {
        throw new Error(`commands: duplicate command name ${name}`);
      }
      registry.set(name, handler);
    }
  }
  return registry;
}

export function helpCommand<C extends CommandContext>(handlers: () => readonly CommandHandler<C>[]): CommandHandler<C> {
  return {
    name: "help",
    description: "shows this text",
    allowedInBody: true,
    allowedInComment: true,
    allowedWhenClosed: true,
    access: "anyone",
    handle: async () => {
      const rows = [...handlers()]
        .sort((left, right) => left.name.localeCompare(right.name))
        .map((handler) => ` * \`${handler.name}\` - ${handler.description}`);
      return { lines: ["Available commands:", ...rows] };
    },
  };
}

export function accessRejection(context: CommandContext, invocation: CommandInvocation, access: CommandAccess): string | null {
  const { census, project, pr } = context;
  const user = invocation.user;
  const name = invocation.name;
  switch (access) {
    case "anyone":
      return null;
    case "author":
      return user.id === pr.author.id ? null : `Only the author (@${pr.author.login}) is allowed to issue the \`${name}\` command.`;
    case "reviewer":
      return isReviewer(census, project, user) ? null : `Only Reviewers are allowed to use the \`${name}\` command.`;
    case "committer":
      return isCommitter(census, project, user) ? null : `Only Committers are allowed to use the \`${name}\` command.`;
    case "author-or-committer":
      return user.id === pr.author.id || isCommitter(census, project, user)
        ? null
        : `Only the author (@${pr.author.login}) or Committers are allowed to use the \`${name}\` command.`;
    case "integrator":
      return context.repo.integrators.some((login) => login.toLowerCase() === user.login.toLowerCase())
        ? null
        : `Only integrators for this repository are allowed to use the \`${name}\` command.`;
  }
}

function originRejection<C extends CommandContext>(handler: CommandHandler<C>, invocation: CommandInvocation): string | null {
  if (invocation.origin === "body" && !handler.allowedInBody) {
    return `The command \`${invocation.name}\` cannot be used in the pull request body. Please use it in a new comment.`;
  }
  if (invocation.origin === "comment" && !handler.allowedInComment) {
    return `The command \`${invocation.name}\` can only be used in the pull request body.`;
  }
  return null;
}

export function formatReply(invocation: CommandInvocation, lines: readonly string[], markers: readonly Marker[] = []): string {
  const [first = "", ...rest] = lines;
  return [
    encodeMarker({ kind: "command-reply", invocationId: invocation.id }),
    neutralizeMarkers(`@${invocation.user.login} ${first}`.trimEnd()),
    ...rest.map(neutralizeMarkers),
    ...markers.map((marker) => encodeMarker(marker)),
  ].join("\n");
}

async function postReply(context: CommandContext, invocation: CommandInvocation, outcome: CommandOutcome): Promise<void> {
  const { forge, pr } = context;
  await forge.addComment(pr.repository, pr.number, formatReply(invocation, outcome.lines, outcome.markers));
  for (const label of outcome.addLabels ?? []) {
    if (!pr.labels.includes(label)) await forge.addLabel(pr.repository, pr.number, label);
  }
  for (const label of outcome.removeLabels ?? []) {
    if (pr.labels.includes(label)) await forge.removeLabel(pr.repository, pr.number, label);
  }
}

export async function dispatchCommands<C extends CommandContext>(
  context: C,
  registry: CommandRegistry<C>,
  invocations: readonly CommandInvocation[],
): Promise<DispatchReport> {
  const report: DispatchReport = { handled: [], rejected: [], skipped: [] };

  for (const invocation of invocations) {
    if (context.tracker.replied.includes(invocation.id)) {
      report.skipped.push(invocation.id);
      continue;
    }

    const handler = registry.get(invocation.name);
    if (!handler) {
      continue;
    }

    const rejection =
      (context.pr.state === "closed" && !handler.allowedWhenClosed
        ? `The command \`${invocation.name}\` cannot be used on a closed pull request.`
        : null) ??
      originRejection(handler, invocation) ??
      (handler.authorize ? handler.authorize(context, invocation) : accessRejection(context, invocation, handler.access));

    if (rejection) {
      context.logger.info({ command: invocation.name, user: invocation.user.login, id: invocation.id }, "command rejected");
      await postReply(context, invocation, { lines: [rejection] });
      report.rejected.push(invocation.id);
      continue;
    }

    context.logger.info({ command: invocation.name, user: invocation.user.login, id: invocation.id }, "command accepted");
    const outcome = await handler.handle(context, invocation);
    await postReply(context, invocation, outcome);
    report.handled.push(invocation.id);
  }

  return report;
}
