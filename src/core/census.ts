import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { z } from "zod";

import type { ForgeUser } from "./forge";

export const CENSUS_ROLES = ["lead", "reviewers", "committers", "authors", "contributors"] as const;
export type CensusRole = (typeof CENSUS_ROLES)[number];

const ContributorSchema = z.object({
  username: z.string().min(1),
  fullName: z.string().min(1),
  forgeId: z.string().min(1).optional(),
});

const ProjectRolesSchema = z.object({
  lead: z.string().min(1).optional(),
  reviewers: z.array(z.string().min(1)).default([]),
  committers: z.array(z.string().min(1)).default([]),
  authors: z.array(z.string().min(1)).default([]),
});

export const CensusSchema = z.object({
  domain: z.string().min(1),
  contributors: z.array(ContributorSchema).default([]),
  projects: z.record(ProjectRolesSchema).default({}),
});

export type CensusContributor = z.infer<typeof ContributorSchema>;
export type Census = z.infer<typeof CensusSchema>;

export function parseCensus(raw: string, source = "census"): Census {
  const parsed = CensusSchema.safeParse(parse(raw));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new Error(`${source}: invalid census\n${issues.join("\n")}`);
  }
  return parsed.data;
}

export async function loadCensus(filePath: string): Promise<Census> {
  return parseCensus(await readFile(filePath, "utf8"), filePath);
}

export function contributorByForgeUser(census: Census, user: ForgeUser): CensusContributor | null {
  return census.contributors.find((contributor) => contributor.forgeId === user.id) ?? null;
}

export function contributorByUsername(census: Census, username: string): CensusContributor | null {
  const normalized = username.trim().toLowerCase();
  return census.contributors.find((contributor) => contributor.username.toLowerCase() === normalized) ?? null;
}

export function namespaceUsername(census: Census, user: ForgeUser): string | null {
  return contributorByForgeUser(census, user)?.username ?? null;
}

export function censusEmail(census: Census, contributor: CensusContributor): string {
  return `${contributor.username}@${census.domain}`;
}

export function formatContributor(census: Census, contributor: CensusContributor): string {
  return `${contributor.fullName} <${censusEmail(census, contributor)}>`;
}

function roleRank(census: Census, project: string, username: string): number {
  const roles = census.projects[project];
  if (!roles) return CENSUS_ROLES.length - 1;
  if (roles.lead === username) return 0;
  if (roles.reviewers.includes(username)) return 1;
  if (roles.committers.includes(username)) return 2;
  if (roles.authors.includes(username)) return 3;
  return 4;
}

export function hasRole(census: Census, project: string, user: ForgeUser, role: CensusRole): boolean {
  const username = namespaceUsername(census, user);
  if (!username) return role === "contributors";
  return roleRank(census, project, username) <= CENSUS_ROLES.indexOf(role);
}

export function isAuthor(census: Census, project: string, user: ForgeUser): boolean {
  return hasRole(census, project, user, "authors");
}

export function isCommitter(census: Census, project: string, user: ForgeUser): boolean {
  return hasRole(census, project, user, "committers");
}

export function isReviewer(census: Census, project: string, user: ForgeUser): boolean {
  return hasRole(census, project, user, "reviewers");
}

export function isLead(census: Census, project: string, user: ForgeUser): boolean {
  return hasRole(census, project, user, "lead");
}

export function roleOf(census: Census, project: string, user: ForgeUser): CensusRole {
  const username = namespaceUsername(census, user);
  if (!username) return "contributors";
  return CENSUS_ROLES[roleRank(census, project, username)] ?? "contributors";
}
