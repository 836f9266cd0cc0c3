import { readFile } from "node:fs/promises";
import path from "node:path";
import { parse } from "yaml";
import { z } from "zod";

import { CENSUS_ROLES } from "./census";

export const DEFAULT_CONFIG_FILE = "pr-integrator.yml";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const RepositoryConfigSchema = z.object({
  name: z.string().regex(/^[^/\s]+\/[^/\s]+$/, "expected owner/name"),
  censusProject: z.string().min(1).optional(),
  targetBranches: z.array(z.string().min(1)).default(["main"]),
  labels: z.array(z.string().min(1)).default([]),
  reviewers: z
    .object({
      role: z.enum(CENSUS_ROLES).default("reviewers"),
      count: z.number().int().min(0).max(10).default(1),
    })
    .default({}),
  useStaleReviews: z.boolean().default(true),
  integrators: z.array(z.string().min(1)).default([]),
});

export const BotConfigSchema = z.object({
  bot: z.object({
    login: z.string().min(1),
    name: z.string().min(1).optional(),
    email: z.string().email().optional(),
    logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  }),
  workers: z.number().int().min(1).max(64).default(4),
  lockTimeoutMinutes: z.number().positive().default(10),
  census: z.string().min(1),
  ledger: z.object({
    repository: z.string().min(1),
    workdir: z.string().min(1).default(".pr-integrator/ledger"),
  }),
  workdir: z.string().min(1).default(".pr-integrator/work"),
  repositories: z.array(RepositoryConfigSchema).min(1),
});

export type RepositoryConfig = z.infer<typeof RepositoryConfigSchema>;
export type BotConfig = z.infer<typeof BotConfigSchema>;

export function parseBotConfig(raw: string, source = DEFAULT_CONFIG_FILE): BotConfig {
  let document: unknown;
  try {
    document = parse(raw);
  } catch (error) {
    throw new ConfigError(`${source}: invalid YAML: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = BotConfigSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `- ${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigError(`${source}: invalid configuration\n${issues.join("\n")}`);
  }
  return parsed.data;
}

export async function loadBotConfig(filePath = DEFAULT_CONFIG_FILE): Promise<BotConfig> {
  const resolved = path.resolve(filePath);
  let raw: string;
  try {
    raw = await readFile(resolved, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new ConfigError(`${filePath}: configuration file not found`);
    }
    throw error;
  }

  const config = parseBotConfig(raw, filePath);
  const baseDir = path.dirname(resolved);
  return {
    ...config,
    census: path.resolve(baseDir, config.census),
    workdir: path.resolve(baseDir, config.workdir),
    ledger: { ...config.ledger, workdir: path.resolve(baseDir, config.ledger.workdir) },
  };
}

export function repositoryConfig(config: BotConfig, repository: string): RepositoryConfig {
  const found = config.repositories.find((entry) => entry.name.toLowerCase() === repository.toLowerCase());
  if (!found) {
    throw new ConfigError(`${repository}: repository is not configured`);
  }
  return found;
}

export function censusProject(repo: RepositoryConfig): string {
  return repo.censusProject ?? repo.name.split("/")[1] ?? repo.name;
}

export function lockTimeoutMs(config: BotConfig): number {
  return Math.round(config.lockTimeoutMinutes * 60_000);
}
