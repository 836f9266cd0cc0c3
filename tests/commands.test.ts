import { describe, expect, it, vi } from "vitest";

import {
  createRegistry,
  dispatchCommands,
  extractCommands,
  formatReply,
  helpCommand,
  parseCommandLines,
  type CommandHandler,
} from "../src/core/commands";
import { decodeMarkers, encodeMarker, SELF_COMMAND_MARKER } from "../src/core/markers";
import { ALICE, BOB, BOT, DAVE, createHarness, testPullRequest } from "./helpers/fixtures";

function echoCommand(overrides: Partial<CommandHandler> = {}): CommandHandler {
  return {
    name: "echo",
    description: "repeats its arguments",
    allowedInBody: true,
    allowedInComment: true,
    access: "anyone",
    handle: async (_context, invocation) => ({ lines: [`echo ${invocation.args}`] }),
    ...overrides,
  };
}

describe("command parsing", () => {
  it("finds command lines and their trailing text", () => {
    const text = ["Intro", "/summary First line", "second line", "", "/label +docs", "```", "/integrate", "```"].join("\n");
    expect(parseCommandLines(text)).toEqual([
      { name: "summary", args: "First line", extraLines: ["second line"] },
      { name: "label", args: "+docs", extraLines: [] },
    ]);
  });

  it("assigns stable invocation ids and users", () => {
    const pr = testPullRequest({ body: "/integrate auto" });
    const comments = [
      { id: "11", author: BOB, body: "/reviewers 1\n/reject", createdAt: "2026-01-01T00:00:02Z" },
      { id: "10", author: BOT, body: "@alice done\n/help", createdAt: "2026-01-01T00:00:01Z" },
      { id: "12", author: BOT, body: `${SELF_COMMAND_MARKER}\n/integrate`, createdAt: "2026-01-01T00:00:03Z" },
    ];

    const invocations = extractCommands(pr, comments, BOT.id);
    expect(invocations.map((invocation) => [invocation.id, invocation.name, invocation.user.login, invocation.origin])).toEqual([
      ["body", "integrate", "alice", "body"],
      ["11", "reviewers", "bob", "comment"],
      ["11:1", "reject", "bob", "comment"],
      ["12", "integrate", "alice", "comment"],
    ]);
  });
});

describe("command dispatch", () => {
  it("replies once per invocation with a reply marker", async () => {
    const harness = createHarness();
    harness.forge.setPullRequest(testPullRequest());
    harness.forge.comment("acme/widgets", 7, DAVE, "/echo hello");
    const context = await harness.context();

    const registry = createRegistry([echoCommand()]);
    const report = await dispatchCommands(context, registry, extractCommands(context.pr, context.comments, BOT.id));

    expect(report.handled).toHaveLength(1);
    const [reply] = harness.forge.botComments("acme/widgets", 7);
    expect(reply?.body).toBe(`${encodeMarker({ kind: "command-reply", invocationId: report.handled[0] ?? "" })}\n@dave echo hello`);

    const again = await harness.context();
    const rerun = await dispatchCommands(again, registry, extractCommands(again.pr, again.comments, BOT.id));
    expect(rerun.handled).toEqual([]);
    expect(rerun.skipped).toEqual(report.handled);
    expect(harness.forge.botComments("acme/widgets", 7)).toHaveLength(1);
  });

  it("ignores unknown commands silently", async () => {
    const harness = createHarness();
    harness.forge.setPullRequest(testPullRequest());
    harness.forge.comment("acme/widgets", 7, DAVE, "/frobnicate now");
    const context = await harness.context();

    const report = await dispatchCommands(context, createRegistry([echoCommand()]), extractCommands(context.pr, context.comments, BOT.id));
    expect(report).toEqual({ handled: [], rejected: [], skipped: [] });
    expect(harness.forge.botComments("acme/widgets", 7)).toEqual([]);
  });

  it("rejects commands used in the wrong place or by the wrong user", async () => {
    const harness = createHarness();
    harness.forge.setPullRequest(testPullRequest({ body: "/bodyless" }));
    harness.forge.comment("acme/widgets", 7, DAVE, "/mine");
    const context = await harness.context();
    const handle = vi.fn(async () => ({ lines: ["should not run"] }));

    const registry = createRegistry([
      echoCommand({ name: "bodyless", allowedInBody: false, handle }),
      echoCommand({ name: "mine", access: "author", handle }),
    ]);
    const report = await dispatchCommands(context, registry, extractCommands(context.pr, context.comments, BOT.id));

    expect(report.rejected).toHaveLength(2);
    expect(handle).not.toHaveBeenCalled();
    const bodies = harness.forge.botComments("acme/widgets", 7).map((comment) => comment.body.split("\n")[1]);
    expect(bodies).toEqual([
      "@alice The command `bodyless` cannot be used in the pull request body. Please use it in a new comment.",
      "@dave Only the author (@alice) is allowed to issue the `mine` command.",
    ]);
  });

  it("allows only help on closed pull requests", async () => {
    const harness = createHarness();
    harness.forge.setPullRequest(testPullRequest({ state: "closed" }));
    harness.forge.comment("acme/widgets", 7, DAVE, "/echo hi\n\n/help");
    const context = await harness.context();

    const handlers = [echoCommand()];
    const registry = createRegistry([...handlers, helpCommand(() => handlers)]);
    const report = await dispatchCommands(context, registry, extractCommands(context.pr, context.comments, BOT.id));

    expect(report.rejected).toHaveLength(1);
    expect(report.handled).toHaveLength(1);
    const bodies = harness.forge.botComments("acme/widgets", 7).map((comment) => comment.body);
    expect(bodies[0]?.split("\n")[1]).toBe("@dave The command `echo` cannot be used on a closed pull request.");
    expect(bodies[1]?.split("\n").slice(1)).toEqual(["@dave Available commands:", " * `echo` - repeats its arguments"]);
  });

  it("refuses duplicate command names", () => {
    expect(() => createRegistry([echoCommand(), echoCommand({ name: "other", aliases: ["echo"] })])).toThrow(
      "commands: duplicate command name echo",
    );
  });

  it("formats replies with the mention on the first line and markers last", () => {
    const body = formatReply(
      { id: "5", name: "label", args: "", extraLines: [], user: ALICE, origin: "comment" },
      ["Done.", "More."],
      [{ kind: "label", action: "add", name: "docs" }],
    );
    expect(body).toBe("<!-- command reply: '5' -->\n@alice Done.\nMore.\n<!-- added label: 'docs' -->");
  });

  it("escapes markers echoed from user text in replies", () => {
    const echoed = "<!-- prepush 'abc1234' -->";
    const body = formatReply(
      { id: "6", name: "summary", args: echoed, extraLines: [], user: ALICE, origin: "comment" },
      [`Could not parse ${echoed}`, echoed],
      [{ kind: "summary", text: echoed }],
    );
    expect(body.split("\n").slice(1, 3)).toEqual([
      "@alice Could not parse &lt;!-- prepush 'abc1234' --&gt;",
      "&lt;!-- prepush 'abc1234' --&gt;",
    ]);
    expect(decodeMarkers(body)).toEqual([
      { kind: "command-reply", invocationId: "6" },
      { kind: "summary", text: echoed },
    ]);
  });
});
