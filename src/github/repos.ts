import { z } from "zod";
import type { RepositoryRef } from "../lib/types.ts";
import { createChildLogger } from "../lib/logger.ts";
import type { GitHubRequester, GitHubResponse } from "./request.ts";
import { githubFailure, readBody } from "./request.ts";
import { repoSlug } from "../task/naming.ts";

const log = createChildLogger("github:repos");

const userSchema = z.object({ login: z.string().min(1) });

const repoSchema = z.object({
  name: z.string(),
  full_name: z.string(),
  html_url: z.string(),
  default_branch: z.string().nullish(),
  owner: z.object({ login: z.string() }),
});

const MAX_DESCRIPTION = 350;

export async function resolveOwner(opts: {
  gh: GitHubRequester;
  configuredOwner: string;
}): Promise<string> {
  if (opts.configuredOwner) return opts.configuredOwner;

  const res = await opts.gh.request({ method: "GET", path: "/user" });
  if (!res.ok) throw githubFailure(res, "Resolve token owner");
  const user = readBody(res, userSchema, "Resolve token owner");
  log.debug({ owner: user.login }, "Resolved owner from token");
  return user.login;
}

function toRepositoryRef(res: GitHubResponse, created: boolean): RepositoryRef {
  const repo = readBody(res, repoSchema, "Read repository");
  return {
    owner: repo.owner.login,
    name: repo.name,
    fullName: repo.full_name,
    htmlUrl: repo.html_url,
    defaultBranch: repo.default_branch ?? "main",
    created,
  };
}

export function repositoryDescription(brief: string): string {
  const flat = brief.replace(/\s+/g, " ").trim();
  return flat.length > MAX_DESCRIPTION
    ? `${flat.slice(0, MAX_DESCRIPTION - 3)}...`
    : flat;
}

/**
 * Creates `owner/name`, or reuses it when GitHub reports the name is taken.
 * When `owner` is not an organisation the org endpoint answers 404 and the
 * repository is created under the token's user instead.
 */
export async function ensureRepository(opts: {
  gh: GitHubRequester;
  owner: string;
  name: string;
  description: string;
  asOrganization: boolean;
}): Promise<RepositoryRef> {
  const { gh, owner } = opts;
  // the lookup on 422 must use the name GitHub stored, not the one we asked for
  const name = repoSlug(opts.name);
  const payload = {
    name,
    description: repositoryDescription(opts.description),
    private: false,
    auto_init: true,
  };

  let res: GitHubResponse | null = null;
  if (opts.asOrganization) {
    res = await gh.request({
      method: "POST",
      path: `/orgs/${encodeURIComponent(owner)}/repos`,
      body: payload,
    });
    if (res.status === 404) {
      log.info({ owner }, "Owner is not an organisation, creating under user");
      res = null;
    }
  }

  if (!res) {
    res = await gh.request({ method: "POST", path: "/user/repos", body: payload });
  }

  if (res.status === 201) {
    const repo = toRepositoryRef(res, true);
    log.info({ repo: repo.fullName }, "Repository created");
    return repo;
  }

  if (res.status === 422) {
    const existing = await gh.request({
      method: "GET",
      path: `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(name)}`,
    });
    if (existing.ok) {
      const repo = toRepositoryRef(existing, false);
      log.info({ repo: repo.fullName }, "Reusing existing repository");
      return repo;
    }
    // the 422 was not a name clash
    throw githubFailure(res, `Create repository ${owner}/${name}`);
  }

  throw githubFailure(res, `Create repository ${owner}/${name}`);
}
