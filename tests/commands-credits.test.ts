import { describe, expect, it } from "vitest";

import type { CommandInvocation } from "../src/core/commands";
import { authorCommand, contributorCommand, issueCommand, reviewerCommand, summaryCommand } from "../src/core/commands-credits";
import type { ForgeUser } from "../src/core/forge";
import { encodeMarker, type Marker } from "../src/core/markers";
import { ALICE, BOB, BOT, createHarness, testPullRequest } from "./helpers/fixtures";

function invocation(name: string, args: string, user: ForgeUser = ALICE, extraLines: string[] = []): CommandInvocation {
  return { id: "100", name, args, extraLines, user, origin: "comment" };
}

async function contextWith(markers: Marker[] = []) {
  const harness = createHarness();
  harness.forge.setPullRequest(testPullRequest());
  if (markers.length) {
    harness.forge.comment("acme/widgets", 7, BOT, markers.map(encodeMarker).join("\n"));
  }
  return harness.context();
}

describe("contributor command", () => {
  it("adds a census contributor by username", async () => {
    const context = await contextWith();
    const outcome = await contributorCommand.handle(context, invocation("contributor", "add frank"));
    expect(outcome.lines).toEqual(["Contributor `Frank Offline <frank@example.org>` successfully added."]);
    expect(outcome.markers).toEqual([{ kind: "contributor", action: "add", contributor: "Frank Offline <frank@example.org>" }]);
  });

  it("resolves a forge login through the census", async () => {
    const context = await contextWith();
    const outcome = await contributorCommand.handle(context, invocation("contributor", "add @bob"));
    expect(outcome.lines).toEqual(["Contributor `Bob Reviewer <bob@example.org>` successfully added."]);
  });

  it("accepts a full name and email address", async () => {
    const context = await contextWith();
    const outcome = await contributorCommand.handle(context, invocation("contributor", "add Outside Helper <helper@example.net>"));
    expect(outcome.markers).toEqual([{ kind: "contributor", action: "add", contributor: "Outside Helper <helper@example.net>" }]);
  });

  it("refuses a name that would break out of the contributor marker", async () => {
    const context = await contextWith();
    const smuggled = "X' --> <!-- Approval marker (2) --> 'Y <a@b.c>";
    const outcome = await contributorCommand.handle(context, invocation("contributor", `add ${smuggled}`));
    expect(outcome.lines[0]).toBe(`Could not parse \`${smuggled}\` as a valid contributor.`);
    expect(outcome.markers).toBeUndefined();
  });

  it("explains when there is nothing to remove", async () => {
    const context = await contextWith();
    const outcome = await contributorCommand.handle(context, invocation("contributor", "remove frank"));
    expect(outcome.lines).toEqual(["There are no additional contributors associated with this pull request."]);
    expect(outcome.markers).toBeUndefined();
  });

  it("lists current contributors when removing an unknown one", async () => {
    const context = await contextWith([{ kind: "contributor", action: "add", contributor: "Bob Reviewer <bob@example.org>" }]);
    const outcome = await contributorCommand.handle(context, invocation("contributor", "remove frank"));
    expect(outcome.lines).toEqual([
      "Contributor `Frank Offline <frank@example.org>` was not found.",
      "Current additional contributors are:",
      " - `Bob Reviewer <bob@example.org>`",
    ]);
  });

  it("removes a recorded contributor", async () => {
    const context = await contextWith([{ kind: "contributor", action: "add", contributor: "Frank Offline <frank@example.org>" }]);
    const outcome = await contributorCommand.handle(context, invocation("contributor", "remove frank"));
    expect(outcome.markers).toEqual([{ kind: "contributor", action: "remove", contributor: "Frank Offline <frank@example.org>" }]);
  });
});

describe("reviewer command", () => {
  it("credits a reviewer who has not reviewed on the forge", async () => {
    const context = await contextWith();
    const outcome = await reviewerCommand.handle(context, invocation("reviewer", "credit @erin"));
    expect(outcome.lines).toEqual(["Reviewer `erin` successfully credited."]);
    expect(outcome.markers).toEqual([{ kind: "reviewer", action: "add", login: "erin" }]);
  });

  it("does not credit a reviewer who already approved", async () => {
    const harness = createHarness();
    harness.forge.setPullRequest(testPullRequest());
    harness.forge.review("acme/widgets", 7, BOB, "approved", "b".repeat(40));
    const context = await harness.context();

    const outcome = await reviewerCommand.handle(context, invocation("reviewer", "credit bob"));
    expect(outcome.lines).toEqual([
      "Reviewer `bob` has already made an authenticated review of this PR, and does not need to be credited manually.",
    ]);
    expect(outcome.markers).toBeUndefined();
  });

  it("removes a credited reviewer", async () => {
    const context = await contextWith([{ kind: "reviewer", action: "add", login: "erin" }]);
    const outcome = await reviewerCommand.handle(context, invocation("reviewer", "remove erin"));
    expect(outcome.lines).toEqual(["Reviewer `erin` successfully removed."]);
  });

  it("reports unknown reviewers", async () => {
    const context = await contextWith();
    const outcome = await reviewerCommand.handle(context, invocation("reviewer", "credit nobody"));
    expect(outcome.lines[0]).toBe("Could not parse `nobody` as a valid reviewer.");
  });
});

describe("author command", () => {
  it("sets and removes an overriding author", async () => {
    const context = await contextWith();
    const set = await authorCommand.handle(context, invocation("author", "set Real Author <real@example.org>"));
    expect(set.lines).toEqual(["Setting overriding author to `Real Author <real@example.org>`."]);

    const withAuthor = await contextWith([{ kind: "author", author: "Real Author <real@example.org>" }]);
    const removed = await authorCommand.handle(withAuthor, invocation("author", "remove"));
    expect(removed.lines).toEqual(["Overriding author `Real Author <real@example.org>` was successfully removed."]);
    expect(removed.markers).toEqual([{ kind: "author", author: "" }]);
  });

  it("explains when no author override exists", async () => {
    const context = await contextWith();
    const outcome = await authorCommand.handle(context, invocation("author", "remove"));
    expect(outcome.lines).toEqual(["There is no overriding author set for this pull request."]);
  });
});

describe("summary command", () => {
  it("collects multi-line summaries", async () => {
    const context = await contextWith();
    const outcome = await summaryCommand.handle(context, invocation("summary", "First line", ALICE, ["Second line"]));
    expect(outcome.lines).toEqual(["Setting summary to:", "", "```", "First line\nSecond line", "```"]);
    expect(outcome.markers).toEqual([{ kind: "summary", text: "First line\nSecond line" }]);
  });

  it("updates or clears an existing summary", async () => {
    const context = await contextWith([{ kind: "summary", text: "Old" }]);
    const updated = await summaryCommand.handle(context, invocation("summary", "New"));
    expect(updated.lines[0]).toBe("Updating existing summary to:");

    const cleared = await summaryCommand.handle(context, invocation("summary", ""));
    expect(cleared.lines).toEqual(["Removing existing summary"]);
    expect(cleared.markers).toEqual([{ kind: "summary", text: "" }]);
  });
});

describe("issue command", () => {
  it("adds an issue with a description", async () => {
    const context = await contextWith();
    const outcome = await issueCommand.handle(context, invocation("issue", "add wid-40: Tidy the docs"));
    expect(outcome.lines).toEqual(["Adding additional issue to solves list: `WID-40: Tidy the docs`."]);
    expect(outcome.markers).toEqual([{ kind: "solves", issue: "WID-40", description: "Tidy the docs" }]);
  });

  it("refuses the primary issue from the title", async () => {
    const context = await contextWith();
    const outcome = await issueCommand.handle(context, invocation("issue", "add WID-12: Again"));
    expect(outcome.lines).toEqual(["Issue `WID-12` is the primary issue of this pull request and is taken from the title."]);
  });

  it("removes only issues in the list", async () => {
    const context = await contextWith([{ kind: "solves", issue: "WID-40", description: "Tidy the docs" }]);
    const removed = await issueCommand.handle(context, invocation("issue", "remove WID-40"));
    expect(removed.markers).toEqual([{ kind: "solves", issue: "WID-40", description: "" }]);

    const missing = await issueCommand.handle(context, invocation("issue", "remove WID-41"));
    expect(missing.lines).toEqual(["Issue `WID-41` was not found in the list of additional solved issues."]);
  });
});
