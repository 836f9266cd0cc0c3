import { isReviewVerdict, type Forge, type ForgeComment, type ForgeReview, type ForgeUser, type PullRequestSnapshot } from "./forge";
import { runGhWithRetry } from "./gh-retry";
import type { Logger } from "./logger";
import { commandErrorText, type CommandRunner } from "./runner";

type JsonRecord = Record<string, unknown>;

const GH_API_PAGE_SIZE = 100;

export type GitHubForgeOptions = {
  runner: CommandRunner;
  logger?: Logger;
  host?: string;
};

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJsonArray(stdout: string, context: string): JsonRecord[] {
  const parsed: unknown = JSON.parse(stdout);
  if (!Array.isArray(parsed)) {
    throw new Error(`${context}: expected array response`);
  }
  return parsed.filter(isRecord);
}

function parseJsonObject(stdout: string, context: string): JsonRecord {
  const parsed: unknown = JSON.parse(stdout);
  if (!isRecord(parsed)) {
    throw new Error(`${context}: expected object response`);
  }
  return parsed;
}

function parseNullableString(value: unknown): string | null {
  return typeof value === "string" ? value.trim() || null : null;
}

function parseId(value: unknown): string | null {
  if (typeof value === "number" && Number.isInteger(value) && value > 0) return String(value);
  return parseNullableString(value);
}

function requireString(value: unknown, context: string): string {
  const parsed = parseNullableString(value);
  if (!parsed) {
    throw new Error(`${context}: missing value`);
  }
  return parsed;
}

function parseUser(value: unknown, context: string): ForgeUser {
  if (!isRecord(value)) {
    throw new Error(`${context}: missing user`);
  }
  const id = parseId(value.id);
  const login = parseNullableString(value.login);
  if (!id || !login) {
    throw new Error(`${context}: malformed user`);
  }
  return { id, login };
}

function parseLabelNames(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value
    .map((entry) => (isRecord(entry) ? parseNullableString(entry.name) ?? "" : ""))
    .filter(Boolean);
}

export function parseComment(row: JsonRecord): ForgeComment {
  return {
    id: requireString(parseId(row.id), "gh comment id"),
    author: parseUser(row.user, "gh comment"),
    body: typeof row.body === "string" ? row.body : "",
    createdAt: requireString(row.created_at, "gh comment created_at"),
  };
}

export function parseReview(row: JsonRecord): ForgeReview | null {
  const verdict = String(row.state ?? "").toLowerCase();
  const hash = parseNullableString(row.commit_id);
  const createdAt = parseNullableString(row.submitted_at);
  if (!isReviewVerdict(verdict) || !hash || !createdAt) return null;
  return {
    id: requireString(parseId(row.id), "gh review id"),
    reviewer: parseUser(row.user, "gh review"),
    verdict,
    hash,
    createdAt,
  };
}

export function parsePullRequest(repository: string, row: JsonRecord): PullRequestSnapshot {
  const head = isRecord(row.head) ? row.head : {};
  const base = isRecord(row.base) ? row.base : {};
  const number = typeof row.number === "number" ? row.number : Number.NaN;
  if (!Number.isInteger(number) || number <= 0) {
    throw new Error(`gh pull request: malformed number in ${repository}`);
  }
  return {
    repository,
    number,
    title: typeof row.title === "string" ? row.title : "",
    body: typeof row.body === "string" ? row.body : "",
    author: parseUser(row.user, "gh pull request"),
    headHash: requireString(head.sha, "gh pull request head.sha"),
    headRef: `refs/pull/${number}/head`,
    targetRef: requireString(base.ref, "gh pull request base.ref"),
    targetHash: requireString(base.sha, "gh pull request base.sha"),
    labels: parseLabelNames(row.labels),
    state: row.state === "closed" ? "closed" : "open",
  };
}

function isNotFound(error: unknown): boolean {
  const text = commandErrorText(error);
  return /\b404\b/.test(text) || text.includes("Not Found");
}

export function createGitHubForge(options: GitHubForgeOptions): Forge {
  const { runner, logger } = options;
  const host = options.host ?? "github.com";

  async function getObject(endpoint: string, context: string): Promise<JsonRecord> {
    const response = await runGhWithRetry(runner, ["api", endpoint], { logger });
    return parseJsonObject(response.stdout, context);
  }

  async function listPaginated(endpoint: string, context: string): Promise<JsonRecord[]> {
    const rows: JsonRecord[] = [];
    for (let page = 1; ; page += 1) {
      const separator = endpoint.includes("?") ? "&" : "?";
      const paginated = `${endpoint}${separator}per_page=${GH_API_PAGE_SIZE}&page=${page}`;
      const response = await runGhWithRetry(runner, ["api", paginated], { logger });
      const parsed = parseJsonArray(response.stdout, context);
      rows.push(...parsed);
      if (parsed.length < GH_API_PAGE_SIZE) break;
    }
    return rows;
  }

  async function send(method: string, endpoint: string, payload?: JsonRecord): Promise<string> {
    const args = ["api", "--method", method, endpoint];
    if (payload) args.push("--input", "-");
    const response = await runGhWithRetry(runner, args, {
      logger,
      ...(payload ? { input: JSON.stringify(payload) } : {}),
    });
    return response.stdout;
  }

  return {
    async currentUser() {
      return parseUser(await getObject("user", "gh user"), "gh user");
    },

    async pullRequest(repository, number) {
      return parsePullRequest(repository, await getObject(`repos/${repository}/pulls/${number}`, "gh pull request"));
    },

    async openPullRequests(repository) {
      const rows = await listPaginated(`repos/${repository}/pulls?state=open`, "gh pull requests");
      return rows
        .map((row) => row.number)
        .filter((value): value is number => typeof value === "number" && Number.isInteger(value) && value > 0);
    },

    async comments(repository, number) {
      const rows = await listPaginated(`repos/${repository}/issues/${number}/comments`, "gh issue comments");
      return rows.map(parseComment);
    },

    async reviews(repository, number) {
      const rows = await listPaginated(`repos/${repository}/pulls/${number}/reviews`, "gh pull request reviews");
      return rows.map(parseReview).filter((review): review is ForgeReview => review !== null);
    },

    async addComment(repository, number, body) {
      const stdout = await send("POST", `repos/${repository}/issues/${number}/comments`, { body });
      return parseComment(parseJsonObject(stdout, "gh issue comment"));
    },

    async addLabel(repository, number, label) {
      await send("POST", `repos/${repository}/issues/${number}/labels`, { labels: [label] });
    },

    async removeLabel(repository, number, label) {
      try {
        await send("DELETE", `repos/${repository}/issues/${number}/labels/${encodeURIComponent(label)}`);
      } catch (error) {
        if (!isNotFound(error)) throw error;
        logger?.debug({ repository, number, label }, "gh: label already absent");
      }
    },

    async close(repository, number) {
      await send("PATCH", `repos/${repository}/pulls/${number}`, { state: "closed" });
    },

    async userByLogin(login) {
      try {
        return parseUser(await getObject(`users/${encodeURIComponent(login)}`, "gh user"), "gh user");
      } catch (error) {
        if (isNotFound(error)) return null;
        throw error;
      }
    },

    async branchHead(repository, branch) {
      const row = await getObject(`repos/${repository}/commits/${encodeURIComponent(branch)}`, "gh branch commit");
      const parents = Array.isArray(row.parents) ? row.parents.filter(isRecord) : [];
      return {
        hash: requireString(row.sha, "gh branch commit sha"),
        parent: parseNullableString(parents[0]?.sha),
      };
    },

    cloneUrl(repository) {
      return `https://${host}/${repository}.git`;
    },
  };
}
