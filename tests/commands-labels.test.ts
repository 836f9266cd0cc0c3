import { describe, expect, it } from "vitest";

import { createRegistry, dispatchCommands, type CommandInvocation } from "../src/core/commands";
import {
  allowCommand,
  labelCommand,
  parseLabelArguments,
  parseReviewersArguments,
  rejectCommand,
  reviewersCommand,
} from "../src/core/commands-labels";
import type { ForgeUser } from "../src/core/forge";
import { encodeMarker } from "../src/core/markers";
import { ALICE, BOB, BOT, CAROL, DAVE, createHarness, testPullRequest } from "./helpers/fixtures";

function invocation(name: string, args: string, user: ForgeUser): CommandInvocation {
  return { id: "200", name, args, extraLines: [], user, origin: "comment" };
}

describe("label arguments", () => {
  it("parses both syntaxes", () => {
    expect(parseLabelArguments("add docs, enhancement")).toEqual([
      { action: "add", label: "docs" },
      { action: "add", label: "enhancement" },
    ]);
    expect(parseLabelArguments("+docs -enhancement")).toEqual([
      { action: "add", label: "docs" },
      { action: "remove", label: "enhancement" },
    ]);
    expect(parseLabelArguments("docs")).toBeNull();
    expect(parseLabelArguments("remove")).toBeNull();
  });
});

describe("label command", () => {
  it("applies valid labels and records them", async () => {
    const harness = createHarness();
    harness.forge.setPullRequest(testPullRequest({ labels: ["enhancement"] }));
    const context = await harness.context();

    const outcome = await labelCommand.handle(context, invocation("label", "+docs -enhancement", ALICE));
    expect(outcome.lines).toEqual(["The `docs` label was successfully added.", "The `enhancement` label was successfully removed."]);
    expect(outcome.addLabels).toEqual(["docs"]);
    expect(outcome.removeLabels).toEqual(["enhancement"]);
  });

  it("rejects labels that are not configured", async () => {
    const harness = createHarness();
    harness.forge.setPullRequest(testPullRequest());
    const context = await harness.context();

    const outcome = await labelCommand.handle(context, invocation("label", "add ready", ALICE));
    expect(outcome.lines).toEqual([
      "The label `ready` is not a valid label.",
      "These labels are valid:",
      " * `enhancement`",
      " * `docs`",
    ]);
  });

  it("updates forge labels through dispatch", async () => {
    const harness = createHarness();
    harness.forge.setPullRequest(testPullRequest({ labels: ["docs"] }));
    harness.forge.comment("acme/widgets", 7, ALICE, "/label add docs enhancement");
    const context = await harness.context();

    const registry = createRegistry([labelCommand]);
    await dispatchCommands(context, registry, [
      { id: "300", name: "label", args: "add docs enhancement", extraLines: [], user: ALICE, origin: "comment" },
    ]);
    expect((await harness.forge.pullRequest("acme/widgets", 7)).labels).toEqual(["docs", "enhancement"]);
    const [reply] = harness.forge.botComments("acme/widgets", 7);
    expect(reply?.body.split("\n")).toEqual([
      "<!-- command reply: '300' -->",
      "@alice The `docs` label was already applied.",
      "The `enhancement` label was successfully added.",
      "<!-- added label: 'enhancement' -->",
    ]);
  });
});

describe("reviewers command", () => {
  it("parses counts and role aliases", () => {
    expect(parseReviewersArguments("2")).toEqual({ count: 2, role: "authors" });
    expect(parseReviewersArguments("1 committer")).toEqual({ count: 1, role: "committers" });
    expect(parseReviewersArguments("11")).toBeNull();
    expect(parseReviewersArguments("1 wizard")).toBeNull();
  });

  it("lets the author raise the requirement", async () => {
    const harness = createHarness();
    harness.forge.setPullRequest(testPullRequest({ author: CAROL }));
    const context = await harness.context();

    expect(reviewersCommand.authorize?.(context, invocation("reviewers", "1", CAROL))).toBeNull();
    const outcome = await reviewersCommand.handle(context, invocation("reviewers", "1 reviewers", CAROL));
    expect(outcome.lines).toEqual([
      "The number of required reviews for this PR is now set to 1 from reviewers plus 1 additional from reviewers.",
    ]);
    expect(outcome.markers).toEqual([{ kind: "reviewer-count", count: 1, role: "reviewers" }]);
  });

  it("stops non-reviewers from lowering the requirement", async () => {
    const harness = createHarness();
    harness.forge.setPullRequest(testPullRequest({ author: CAROL }));
    harness.forge.comment("acme/widgets", 7, BOT, encodeMarker({ kind: "reviewer-count", count: 2, role: "reviewers" }));
    const context = await harness.context();

    const outcome = await reviewersCommand.handle(context, invocation("reviewers", "1 reviewers", CAROL));
    expect(outcome.lines).toEqual(["Only Reviewers are allowed to lower the number of required reviewers."]);

    const byReviewer = await reviewersCommand.handle(context, invocation("reviewers", "0", BOB));
    expect(byReviewer.markers).toEqual([{ kind: "reviewer-count", count: 0, role: "authors" }]);
  });

  it("refuses other non-reviewers", async () => {
    const harness = createHarness();
    harness.forge.setPullRequest(testPullRequest());
    const context = await harness.context();
    expect(reviewersCommand.authorize?.(context, invocation("reviewers", "1", DAVE))).toBe(
      "Only Reviewers are allowed to use the `reviewers` command.",
    );
  });
});

describe("veto commands", () => {
  it("records and withdraws a veto", async () => {
    const harness = createHarness();
    harness.forge.setPullRequest(testPullRequest());
    const context = await harness.context();

    const vetoed = await rejectCommand.handle(context, invocation("reject", "", BOB));
    expect(vetoed.markers).toEqual([{ kind: "veto", action: "veto", userId: BOB.id }]);

    harness.forge.comment("acme/widgets", 7, BOT, encodeMarker({ kind: "veto", action: "veto", userId: BOB.id }));
    const vetoedContext = await harness.context();
    expect((await rejectCommand.handle(vetoedContext, invocation("reject", "", BOB))).lines).toEqual([
      "You have already vetoed this change.",
    ]);
    const allowed = await allowCommand.handle(vetoedContext, invocation("allow", "", BOB));
    expect(allowed.markers).toEqual([{ kind: "veto", action: "approve", userId: BOB.id }]);
  });

  it("forbids authors from vetoing their own change", async () => {
    const harness = createHarness();
    harness.forge.setPullRequest(testPullRequest());
    const context = await harness.context();
    expect(rejectCommand.authorize?.(context, invocation("reject", "", ALICE))).toBe("You cannot veto your own pull request.");
  });

  it("explains that there is no veto to withdraw", async () => {
    const harness = createHarness();
    harness.forge.setPullRequest(testPullRequest());
    const context = await harness.context();
    expect((await allowCommand.handle(context, invocation("allow", "", BOB))).lines).toEqual(["You have not vetoed this change."]);
  });
});
