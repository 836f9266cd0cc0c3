import { Command } from "commander";

import { DEFAULT_CONFIG_FILE, loadBotConfig, repositoryConfig } from "./core/config";
import { createGitHubForge } from "./core/github-forge";
import { createLogger, type Logger } from "./core/logger";
import { execaRunner, type CommandRunner } from "./core/runner";
import { createBotService, createLedger } from "./core/service";

export type ProgramOptions = {
  runner?: CommandRunner;
  logger?: (level: string) => Logger;
};

function parsePullRequestNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new Error(`--pr must be a positive integer (got ${value})`);
  }
  return parsed;
}

function reportError(command: string, error: unknown): void {
  console.error(`${command}: ERROR`);
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const runner = options.runner ?? execaRunner;
  const loggerFor = options.logger ?? ((level: string) => createLogger({ level }));
  const program = new Command();

  program
    .name("pr-integrator")
    .description("Pull request review tracking and integration bot")
    .version("0.1.0");

  program
    .command("run")
    .description("Process commands, reviews and readiness for one pull request")
    .requiredOption("--repo <owner/name>", "Repository")
    .requiredOption("--pr <number>", "Pull request number")
    .option("--config <path>", "Configuration file", DEFAULT_CONFIG_FILE)
    .action(async (opts: { repo: string; pr: string; config: string }) => {
      try {
        const number = parsePullRequestNumber(opts.pr);
        const config = await loadBotConfig(opts.config);
        repositoryConfig(config, opts.repo);
        const service = await createBotService({ config, runner, logger: loggerFor(config.bot.logLevel) });
        const report = await service.runPullRequest(opts.repo, number);

        if (report.skipped) {
          console.log(`run: ${opts.repo}#${number} skipped (target branch not managed)`);
          return;
        }
        const handled = report.dispatch?.handled.length ?? 0;
        const rejected = report.dispatch?.rejected.length ?? 0;
        console.log(`run: ${opts.repo}#${number} OK`);
        console.log(`commands: ${handled} handled | ${rejected} rejected`);
        console.log(`ready: ${report.check?.ready ? "yes" : "no"}`);
        for (const issue of report.check?.issues ?? []) {
          console.log(`- ${issue}`);
        }
      } catch (error) {
        reportError("run", error);
      }
    });

  program
    .command("poll")
    .description("Process every open pull request of a repository")
    .requiredOption("--repo <owner/name>", "Repository")
    .option("--config <path>", "Configuration file", DEFAULT_CONFIG_FILE)
    .action(async (opts: { repo: string; config: string }) => {
      try {
        const config = await loadBotConfig(opts.config);
        repositoryConfig(config, opts.repo);
        const service = await createBotService({ config, runner, logger: loggerFor(config.bot.logLevel) });
        const processed = await service.poll(opts.repo);
        console.log(`poll: ${opts.repo} processed ${processed} pull request(s)`);
      } catch (error) {
        reportError("poll", error);
      }
    });

  const ledger = program.command("ledger").description("Inspect the integrity ledger");

  ledger
    .command("show")
    .description("Print the recorded head for a branch")
    .requiredOption("--repo <owner/name>", "Repository")
    .requiredOption("--branch <name>", "Target branch")
    .option("--config <path>", "Configuration file", DEFAULT_CONFIG_FILE)
    .action(async (opts: { repo: string; branch: string; config: string }) => {
      try {
        const config = await loadBotConfig(opts.config);
        const integrity = await createLedger(config, loggerFor(config.bot.logLevel), runner);
        const entry = await integrity.entry(opts.repo, opts.branch);
        if (!entry) {
          console.log(`ledger: no entry recorded for ${opts.repo}:${opts.branch}`);
          return;
        }
        console.log(`head: ${entry.head}`);
        console.log(`parent: ${entry.parent}`);
      } catch (error) {
        reportError("ledger show", error);
      }
    });

  ledger
    .command("verify")
    .description("Verify the branch head reported by the forge against the ledger")
    .requiredOption("--repo <owner/name>", "Repository")
    .requiredOption("--branch <name>", "Target branch")
    .option("--config <path>", "Configuration file", DEFAULT_CONFIG_FILE)
    .action(async (opts: { repo: string; branch: string; config: string }) => {
      try {
        const config = await loadBotConfig(opts.config);
        const logger = loggerFor(config.bot.logLevel);
        const forge = createGitHubForge({ runner, logger });
        const integrity = await createLedger(config, logger, runner);
        const head = await forge.branchHead(opts.repo, opts.branch);
        const verdict = await integrity.verify(opts.repo, opts.branch, head);
        console.log(`ledger verify: ${verdict} (${head.hash})`);
      } catch (error) {
        reportError("ledger verify", error);
      }
    });

  return program;
}

export async function runCli(argv: string[] = process.argv, options: ProgramOptions = {}): Promise<void> {
  const program = createProgram(options);
  await program.parseAsync(argv);
}
