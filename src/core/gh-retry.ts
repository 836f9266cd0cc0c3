import type { Logger } from "./logger";
import { commandErrorText, type CommandRunner, type RunResult } from "./runner";

const DEFAULT_BACKOFF_MS = [250, 750, 1500] as const;

export type GhRetryOptions = {
  attempts?: number;
  backoffMs?: number[];
  idempotent?: boolean;
  input?: string;
  logger?: Logger;
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

export function isRetryableGhError(error: unknown): boolean {
  const text = commandErrorText(error).toLowerCase();
  if (!text) return false;

  return (
    text.includes("error connecting to api.github.com") ||
    text.includes("timeout") ||
    text.includes("timed out") ||
    text.includes("connection reset") ||
    text.includes("temporary failure") ||
    /\b502\b/.test(text) ||
    /\b503\b/.test(text) ||
    /\b504\b/.test(text)
  );
}

export function isIdempotentGhCommand(args: readonly string[]): boolean {
  if (!args.length) return false;
  const [scope, command] = args;

  if (scope === "pr" && (command === "view" || command === "list")) return true;
  if (scope === "label" && command === "list") return true;

  if (scope === "api") {
    const methodFlagIndex = args.findIndex((entry) => entry === "--method" || entry === "-X");
    if (methodFlagIndex < 0) {
      return !args.includes("--input") && !args.some((entry) => entry === "-f" || entry === "-F");
    }
    const method = String(args[methodFlagIndex + 1] ?? "GET")
      .trim()
      .toUpperCase();
    return method === "GET";
  }

  return false;
}

export async function runGhWithRetry(
  runner: CommandRunner,
  args: readonly string[],
  options: GhRetryOptions = {},
): Promise<RunResult> {
  const backoff = options.backoffMs && options.backoffMs.length > 0 ? options.backoffMs : Array.from(DEFAULT_BACKOFF_MS);
  const configuredAttempts = Math.max(1, Math.trunc(options.attempts ?? backoff.length));
  const idempotent = options.idempotent ?? isIdempotentGhCommand(args);
  const attempts = idempotent ? configuredAttempts : 1;

  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      return await runner("gh", args, options.input === undefined ? {} : { input: options.input });
    } catch (error) {
      lastError = error;
      const canRetry = idempotent && attempt < attempts && isRetryableGhError(error);
      if (!canRetry) {
        throw error;
      }

      const delay = backoff[Math.min(attempt - 1, backoff.length - 1)] ?? 0;
      options.logger?.warn({ attempt, delay, command: args.slice(0, 2).join(" ") }, "gh: transient failure, retrying");
      if (delay > 0) {
        await sleep(delay);
      }
    }
  }

  throw lastError ?? new Error("gh retry: command failed");
}
