import type { Census } from "./census";
import { CREDIT_COMMANDS } from "./commands-credits";
import { INTEGRATION_COMMANDS } from "./commands-integrate";
import { LABEL_COMMANDS } from "./commands-labels";
import {
  createRegistry,
  dispatchCommands,
  extractCommands,
  helpCommand,
  type CommandHandler,
  type CommandRegistry,
  type DispatchReport,
} from "./commands";
import { censusProject, repositoryConfig, type BotConfig } from "./config";
import { pullRequestKey, type Forge, type ForgeUser } from "./forge";
import type { IntegrationContext, IntegrationServices } from "./integration";
import type { Logger } from "./logger";
import { checkPullRequest, type CheckReport } from "./pr-check";
import type { WorkItem } from "./scheduler";
import { replayTrackers } from "./tracker";

export type WorkItemDeps = {
  forge: Forge;
  census: Census;
  config: BotConfig;
  bot: ForgeUser;
  logger: Logger;
  servicesFor(repository: string): Promise<IntegrationServices>;
  registry?: CommandRegistry<IntegrationContext>;
};

export type PullRequestRunReport = {
  skipped: boolean;
  dispatch: DispatchReport | null;
  check: CheckReport | null;
};

export function createCommandRegistry(): CommandRegistry<IntegrationContext> {
  const handlers: CommandHandler<IntegrationContext>[] = [...CREDIT_COMMANDS, ...LABEL_COMMANDS, ...INTEGRATION_COMMANDS];
  return createRegistry([...handlers, helpCommand(() => handlers)]);
}

export async function loadPullRequestContext(
  deps: WorkItemDeps,
  repository: string,
  number: number,
): Promise<IntegrationContext> {
  const repo = repositoryConfig(deps.config, repository);
  const [pr, comments, reviews, services] = await Promise.all([
    deps.forge.pullRequest(repository, number),
    deps.forge.comments(repository, number),
    deps.forge.reviews(repository, number),
    deps.servicesFor(repository),
  ]);

  return {
    pr,
    comments,
    reviews,
    tracker: replayTrackers(comments, deps.bot.id),
    census: deps.census,
    project: censusProject(repo),
    repo,
    bot: deps.bot,
    forge: deps.forge,
    logger: deps.logger.child({ repository, pr: number }),
    services,
  };
}

export async function processPullRequest(deps: WorkItemDeps, repository: string, number: number): Promise<PullRequestRunReport> {
  const context = await loadPullRequestContext(deps, repository, number);
  if (!context.repo.targetBranches.includes(context.pr.targetRef)) {
    context.logger.debug({ target: context.pr.targetRef }, "work item: target branch is not managed");
    return { skipped: true, dispatch: null, check: null };
  }

  const registry = deps.registry ?? createCommandRegistry();
  const invocations = extractCommands(context.pr, context.comments, deps.bot.id);
  const dispatch = await dispatchCommands(context, registry, invocations);

  const mutated = dispatch.handled.length > 0 || dispatch.rejected.length > 0;
  const checkContext = mutated ? await loadPullRequestContext(deps, repository, number) : context;
  const check = await checkPullRequest(checkContext);

  return { skipped: false, dispatch, check };
}

export function createPullRequestWorkItem(deps: WorkItemDeps, repository: string, number: number): WorkItem {
  return {
    key: pullRequestKey({ repository, number }),
    async run() {
      const report = await processPullRequest(deps, repository, number);
      deps.logger.info(
        {
          repository,
          pr: number,
          skipped: report.skipped,
          handled: report.dispatch?.handled.length ?? 0,
          ready: report.check?.ready ?? false,
        },
        "work item: completed",
      );
    },
  };
}
