import type { RepositoryRef } from "../lib/types.ts";
import { createChildLogger } from "../lib/logger.ts";
import { pagesUrlFor } from "../task/naming.ts";
import type { GitHubRequester } from "./request.ts";
import { githubFailure } from "./request.ts";

const log = createChildLogger("github:pages");

export interface PagesResult {
  url: string;
  branch: string;
  action: "enabled" | "updated";
}

/**
 * Serves `branch` from the repository root. A 409 means Pages is already on
 * for this repository, in which case its source is repointed instead.
 */
export async function activatePages(opts: {
  gh: GitHubRequester;
  repo: RepositoryRef;
  branch: string;
}): Promise<PagesResult> {
  const { gh, repo, branch } = opts;
  const path = `/repos/${encodeURIComponent(repo.owner)}/${encodeURIComponent(repo.name)}/pages`;
  const body = { source: { branch, path: "/" } };
  const url = pagesUrlFor(repo.owner, repo.name);

  const created = await gh.request({ method: "POST", path, body });
  if (created.ok) {
    log.info({ repo: repo.fullName, branch, url }, "Pages enabled");
    return { url, branch, action: "enabled" };
  }
  if (created.status !== 409) {
    throw githubFailure(created, `Enable Pages for ${repo.fullName}`);
  }

  const updated = await gh.request({ method: "PUT", path, body });
  if (!updated.ok) {
    throw githubFailure(updated, `Repoint Pages for ${repo.fullName}`);
  }
  log.info({ repo: repo.fullName, branch, url }, "Pages source updated");
  return { url, branch, action: "updated" };
}
