import { CENSUS_ROLES, type CensusRole } from "./census";
import { isReviewVerdict, type ReviewVerdict } from "./forge";

export type SetAction = "add" | "remove";

export type Marker =
  | { kind: "label"; action: SetAction; name: string }
  | { kind: "contributor"; action: SetAction; contributor: string }
  | { kind: "reviewer"; action: SetAction; login: string }
  | { kind: "solves"; issue: string; description: string }
  | { kind: "reviewer-count"; count: number; role: CensusRole }
  | { kind: "sponsor-ready"; hash: string }
  | { kind: "veto"; action: "veto" | "approve"; userId: string }
  | { kind: "summary"; text: string }
  | { kind: "author"; author: string }
  | { kind: "review"; reviewerId: string; verdict: ReviewVerdict; hash: string }
  | { kind: "command-reply"; invocationId: string }
  | { kind: "self-command" }
  | { kind: "prepush"; hash: string };

export type MarkerKind = Marker["kind"];

export const SELF_COMMAND_MARKER = "<!-- self command -->";

type Grammar = {
  pattern: RegExp;
  decode(match: RegExpMatchArray): Marker | null;
};

const utf8 = new TextDecoder("utf-8", { fatal: true });
const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;
const HASH_PATTERN = /^[0-9a-f]{7,64}$/;

export function encodeBase64(text: string): string {
  return Buffer.from(text, "utf8").toString("base64");
}

export function decodeBase64(value: string): string | null {
  if (!BASE64_PATTERN.test(value)) return null;
  try {
    return utf8.decode(Buffer.from(value, "base64"));
  } catch {
    return null;
  }
}

const UNSAFE_PAYLOAD_PATTERN = /'|<!--|-->/;

export function isMarkerSafe(value: string): boolean {
  return !UNSAFE_PAYLOAD_PATTERN.test(value);
}

/** Escapes comment delimiters so echoed text can never read back as a marker. */
export function neutralizeMarkers(text: string): string {
  return text.replace(/<!--/g, "&lt;!--").replace(/-->/g, "--&gt;");
}

function payload(value: string): string {
  if (!isMarkerSafe(value)) {
    throw new Error(`markers: unsafe payload ${JSON.stringify(value)}`);
  }
  return value;
}

function isCensusRole(value: string): value is CensusRole {
  return CENSUS_ROLES.some((role) => role === value);
}

function group(match: RegExpMatchArray, index: number): string {
  return match[index] ?? "";
}

const GRAMMARS: readonly Grammar[] = [
  {
    pattern: /<!-- (added|removed) label: '(.+?)' -->/g,
    decode: (match) => ({
      kind: "label",
      action: group(match, 1) === "added" ? "add" : "remove",
      name: group(match, 2).trim(),
    }),
  },
  {
    pattern: /<!-- (add|remove) contributor: '(.+?)' -->/g,
    decode: (match) => ({
      kind: "contributor",
      action: group(match, 1) === "add" ? "add" : "remove",
      contributor: group(match, 2).trim(),
    }),
  },
  {
    pattern: /<!-- (add|remove) reviewer: '([A-Za-z0-9][A-Za-z0-9_.-]*)' -->/g,
    decode: (match) => ({
      kind: "reviewer",
      action: group(match, 1) === "add" ? "add" : "remove",
      login: group(match, 2),
    }),
  },
  {
    pattern: /<!-- solves: '([A-Za-z0-9-]+)' '([A-Za-z0-9+/=]*)' -->/g,
    decode: (match) => {
      const description = decodeBase64(group(match, 2));
      if (description === null) return null;
      return { kind: "solves", issue: group(match, 1), description };
    },
  },
  {
    pattern: /<!-- additional required reviewers id marker \((\d+)\) \(([a-z]+)\) -->/g,
    decode: (match) => {
      const role = group(match, 2);
      const count = Number(group(match, 1));
      if (!isCensusRole(role) || !Number.isSafeInteger(count)) return null;
      return { kind: "reviewer-count", count, role };
    },
  },
  {
    pattern: /<!-- integration requested: '([0-9a-f]*)' -->/g,
    decode: (match) => ({ kind: "sponsor-ready", hash: group(match, 1) }),
  },
  {
    pattern: /<!-- (Veto|Approval) marker \(([^()\s]+)\) -->/g,
    decode: (match) => ({
      kind: "veto",
      action: group(match, 1) === "Veto" ? "veto" : "approve",
      userId: group(match, 2),
    }),
  },
  {
    pattern: /<!-- summary: '([A-Za-z0-9+/=]*)' -->/g,
    decode: (match) => {
      const text = decodeBase64(group(match, 1));
      return text === null ? null : { kind: "summary", text };
    },
  },
  {
    pattern: /<!-- override author: '([A-Za-z0-9+/=]*)' -->/g,
    decode: (match) => {
      const author = decodeBase64(group(match, 1));
      return author === null ? null : { kind: "author", author };
    },
  },
  {
    pattern: /<!-- review: '([^'\s]+)' '([a-z_]+)' '([0-9a-f]+)' -->/g,
    decode: (match) => {
      const verdict = group(match, 2);
      const hash = group(match, 3);
      if (!isReviewVerdict(verdict) || !HASH_PATTERN.test(hash)) return null;
      return { kind: "review", reviewerId: group(match, 1), verdict, hash };
    },
  },
  {
    pattern: /<!-- command reply: '([^'\s]+)' -->/g,
    decode: (match) => ({ kind: "command-reply", invocationId: group(match, 1) }),
  },
  {
    pattern: /<!-- self command -->/g,
    decode: () => ({ kind: "self-command" }),
  },
  {
    pattern: /<!-- prepush '([0-9a-f]*)' -->/g,
    decode: (match) => ({ kind: "prepush", hash: group(match, 1) }),
  },
];

export function encodeMarker(marker: Marker): string {
  switch (marker.kind) {
    case "label":
      return `<!-- ${marker.action === "add" ? "added" : "removed"} label: '${payload(marker.name)}' -->`;
    case "contributor":
      return `<!-- ${marker.action} contributor: '${payload(marker.contributor)}' -->`;
    case "reviewer":
      return `<!-- ${marker.action} reviewer: '${payload(marker.login)}' -->`;
    case "solves":
      return `<!-- solves: '${payload(marker.issue)}' '${encodeBase64(marker.description)}' -->`;
    case "reviewer-count":
      return `<!-- additional required reviewers id marker (${marker.count}) (${marker.role}) -->`;
    case "sponsor-ready":
      return `<!-- integration requested: '${payload(marker.hash)}' -->`;
    case "veto":
      return `<!-- ${marker.action === "veto" ? "Veto" : "Approval"} marker (${payload(marker.userId)}) -->`;
    case "summary":
      return `<!-- summary: '${encodeBase64(marker.text)}' -->`;
    case "author":
      return `<!-- override author: '${encodeBase64(marker.author)}' -->`;
    case "review":
      return `<!-- review: '${payload(marker.reviewerId)}' '${marker.verdict}' '${payload(marker.hash)}' -->`;
    case "command-reply":
      return `<!-- command reply: '${payload(marker.invocationId)}' -->`;
    case "self-command":
      return SELF_COMMAND_MARKER;
    case "prepush":
      return `<!-- prepush '${payload(marker.hash)}' -->`;
  }
}

export function decodeMarkers(body: string): Marker[] {
  const found: { index: number; marker: Marker }[] = [];
  for (const grammar of GRAMMARS) {
    for (const match of body.matchAll(grammar.pattern)) {
      const marker = grammar.decode(match);
      if (marker) found.push({ index: match.index ?? 0, marker });
    }
  }
  return found.sort((left, right) => left.index - right.index).map((entry) => entry.marker);
}

export function hasMarker(body: string, kind: MarkerKind): boolean {
  return decodeMarkers(body).some((marker) => marker.kind === kind);
}
