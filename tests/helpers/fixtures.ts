import type { Census } from "../../src/core/census";
import type { BotConfig, RepositoryConfig } from "../../src/core/config";
import type { ForgeUser, PullRequestSnapshot } from "../../src/core/forge";
import type { Identity } from "../../src/core/git";
import type { IntegrationContext, IntegrationServices } from "../../src/core/integration";
import { createInMemoryLockService } from "../../src/core/integration-lock";
import { createIntegrityLedger, type LedgerEntry, type LedgerStore } from "../../src/core/integrity-ledger";
import { silentLogger, type Logger } from "../../src/core/logger";
import { replayTrackers } from "../../src/core/tracker";
import { createBasicValidator } from "../../src/core/validation";
import { createFakeForge, type FakeForge } from "./fake-forge";
import { createFakeVcs, type FakeVcs } from "./fake-vcs";

export const REPOSITORY = "acme/widgets";

export const BOT: ForgeUser = { id: "900", login: "integrator-bot" };
export const ALICE: ForgeUser = { id: "1", login: "alice" };
export const BOB: ForgeUser = { id: "2", login: "bob" };
export const CAROL: ForgeUser = { id: "3", login: "carol" };
export const DAVE: ForgeUser = { id: "4", login: "dave" };
export const ERIN: ForgeUser = { id: "5", login: "erin" };
export const LEAD: ForgeUser = { id: "6", login: "lena" };

export const BOT_IDENTITY: Identity = { name: "Integrator Bot", email: "integrator-bot@example.org" };

export function testLogger(): Logger {
  return silentLogger();
}

export function testCensus(): Census {
  return {
    domain: "example.org",
    contributors: [
      { username: "alice", fullName: "Alice Committer", forgeId: ALICE.id },
      { username: "bob", fullName: "Bob Reviewer", forgeId: BOB.id },
      { username: "carol", fullName: "Carol Author", forgeId: CAROL.id },
      { username: "erin", fullName: "Erin Reviewer", forgeId: ERIN.id },
      { username: "lena", fullName: "Lena Lead", forgeId: LEAD.id },
      { username: "frank", fullName: "Frank Offline" },
    ],
    projects: {
      widgets: {
        lead: "lena",
        reviewers: ["bob", "erin"],
        committers: ["alice"],
        authors: ["carol"],
      },
    },
  };
}

export function testRepoConfig(overrides: Partial<RepositoryConfig> = {}): RepositoryConfig {
  return {
    name: REPOSITORY,
    targetBranches: ["main"],
    labels: ["enhancement", "docs"],
    reviewers: { role: "reviewers", count: 1 },
    useStaleReviews: true,
    integrators: ["alice"],
    ...overrides,
  };
}

export function testBotConfig(overrides: Partial<BotConfig> = {}): BotConfig {
  return {
    bot: { login: BOT.login, logLevel: "silent" },
    workers: 2,
    lockTimeoutMinutes: 1,
    census: "census.yml",
    ledger: { repository: "https://forge.example/acme/ledger.git", workdir: "/tmp/ledger" },
    workdir: "/tmp/work",
    repositories: [testRepoConfig()],
    ...overrides,
  };
}

export function testPullRequest(overrides: Partial<PullRequestSnapshot> = {}): PullRequestSnapshot {
  return {
    repository: REPOSITORY,
    number: 7,
    title: "WID-12: Add sprocket support",
    body: "",
    author: ALICE,
    headHash: "b".repeat(40),
    headRef: "refs/pull/7/head",
    targetRef: "main",
    targetHash: "c".repeat(40),
    labels: [],
    state: "open",
    ...overrides,
  };
}

export function createMemoryLedgerStore(initial: Record<string, LedgerEntry> = {}): LedgerStore & {
  entries: Map<string, LedgerEntry>;
  writes: number;
} {
  const entries = new Map(Object.entries(initial));
  const store = {
    entries,
    writes: 0,
    async read(key: string) {
      return entries.get(key) ?? null;
    },
    async write(key: string, entry: LedgerEntry) {
      store.writes += 1;
      entries.set(key, entry);
    },
  };
  return store;
}

export type Harness = {
  forge: FakeForge;
  vcs: FakeVcs;
  services: IntegrationServices;
  ledgerStore: ReturnType<typeof createMemoryLedgerStore>;
  context(pr?: PullRequestSnapshot): Promise<IntegrationContext>;
};

export function createHarness(options: { repo?: RepositoryConfig } = {}): Harness {
  const forge = createFakeForge(BOT, [ALICE, BOB, CAROL, DAVE, ERIN, LEAD]);
  const vcs = createFakeVcs();
  const logger = testLogger();
  const ledgerStore = createMemoryLedgerStore();
  const services: IntegrationServices = {
    vcs,
    lock: createInMemoryLockService(),
    ledger: createIntegrityLedger(ledgerStore, logger),
    validator: createBasicValidator(vcs),
    lockTimeoutMs: 50,
    botIdentity: BOT_IDENTITY,
  };
  const repo = options.repo ?? testRepoConfig();

  return {
    forge,
    vcs,
    services,
    ledgerStore,
    async context(pr) {
      const snapshot = pr ?? (await forge.pullRequest(REPOSITORY, 7));
      const comments = await forge.comments(snapshot.repository, snapshot.number);
      return {
        pr: snapshot,
        comments,
        reviews: await forge.reviews(snapshot.repository, snapshot.number),
        tracker: replayTrackers(comments, BOT.id),
        census: testCensus(),
        project: "widgets",
        repo,
        bot: BOT,
        forge,
        logger,
        services,
      };
    },
  };
}
