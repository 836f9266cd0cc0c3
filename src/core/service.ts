import path from "node:path";

import { loadCensus } from "./census";
import { lockTimeoutMs, type BotConfig } from "./config";
import type { Forge } from "./forge";
import { createGitVcs, type Identity, type Vcs } from "./git";
import { createGitHubForge } from "./github-forge";
import type { IntegrationServices } from "./integration";
import { createInMemoryLockService, type LockService } from "./integration-lock";
import { createGitLedgerStore, createIntegrityLedger, type IntegrityLedger } from "./integrity-ledger";
import type { Logger } from "./logger";
import { execaRunner, type CommandRunner } from "./runner";
import { createScheduler } from "./scheduler";
import { createBasicValidator } from "./validation";
import { createPullRequestWorkItem, processPullRequest, type PullRequestRunReport, type WorkItemDeps } from "./work-item";

export type BotServiceOptions = {
  config: BotConfig;
  logger: Logger;
  runner?: CommandRunner;
  forge?: Forge;
  lock?: LockService;
};

export type BotService = {
  deps: WorkItemDeps;
  ledger: IntegrityLedger;
  runPullRequest(repository: string, number: number): Promise<PullRequestRunReport>;
  poll(repository: string): Promise<number>;
};

export function botIdentity(config: BotConfig): Identity {
  return {
    name: config.bot.name ?? config.bot.login,
    email: config.bot.email ?? `${config.bot.login}@users.noreply.github.com`,
  };
}

export function repositoryWorkdir(config: BotConfig, repository: string): string {
  return path.join(config.workdir, repository.replace(/[^A-Za-z0-9._-]/g, "-"));
}

export async function createLedger(config: BotConfig, logger: Logger, runner: CommandRunner = execaRunner): Promise<IntegrityLedger> {
  const store = await createGitLedgerStore({
    runner,
    dir: config.ledger.workdir,
    remote: config.ledger.repository,
    identity: botIdentity(config),
  });
  return createIntegrityLedger(store, logger);
}

export async function createBotService(options: BotServiceOptions): Promise<BotService> {
  const { config, logger } = options;
  const runner = options.runner ?? execaRunner;
  const forge = options.forge ?? createGitHubForge({ runner, logger });
  const lock = options.lock ?? createInMemoryLockService();
  const identity = botIdentity(config);

  const [census, bot, ledger] = await Promise.all([
    loadCensus(config.census),
    forge.currentUser(),
    createLedger(config, logger, runner),
  ]);
  if (bot.login.toLowerCase() !== config.bot.login.toLowerCase()) {
    logger.warn({ configured: config.bot.login, actual: bot.login }, "service: authenticated user differs from configured bot login");
  }

  const repositories = new Map<string, Promise<Vcs>>();
  function vcsFor(repository: string): Promise<Vcs> {
    let vcs = repositories.get(repository);
    if (!vcs) {
      vcs = createGitVcs({ runner, dir: repositoryWorkdir(config, repository), remote: forge.cloneUrl(repository) });
      repositories.set(repository, vcs);
    }
    return vcs;
  }

  const deps: WorkItemDeps = {
    forge,
    census,
    config,
    bot,
    logger,
    async servicesFor(repository): Promise<IntegrationServices> {
      const vcs = await vcsFor(repository);
      return {
        vcs,
        lock,
        ledger,
        validator: createBasicValidator(vcs),
        lockTimeoutMs: lockTimeoutMs(config),
        botIdentity: identity,
      };
    },
  };

  return {
    deps,
    ledger,
    runPullRequest(repository, number) {
      return processPullRequest(deps, repository, number);
    },
    async poll(repository) {
      const scheduler = createScheduler({ workers: config.workers, logger });
      const numbers = await forge.openPullRequests(repository);
      for (const number of numbers) {
        scheduler.submit(createPullRequestWorkItem(deps, repository, number));
      }
      await scheduler.drain();
      return numbers.length;
    },
  };
}
