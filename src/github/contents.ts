import { z } from "zod";
import type { Artifact, FileUploadStatus, RepositoryRef } from "../lib/types.ts";
import { createChildLogger } from "../lib/logger.ts";
import { UpstreamError } from "../lib/errors.ts";
import type { GitHubRequester } from "./request.ts";
import { encodePath, githubFailure, readBody } from "./request.ts";

const log = createChildLogger("github:contents");

const fileSchema = z.object({ sha: z.string() });

const refSchema = z.object({
  object: z.object({ sha: z.string() }),
});

const putSchema = z.object({
  commit: z.object({ sha: z.string() }),
});

function repoPath(repo: RepositoryRef): string {
  return `/repos/${encodeURIComponent(repo.owner)}/${encodeURIComponent(repo.name)}`;
}

export async function getBranchSha(opts: {
  gh: GitHubRequester;
  repo: RepositoryRef;
  branch: string;
}): Promise<string | null> {
  const res = await opts.gh.request({
    method: "GET",
    path: `${repoPath(opts.repo)}/git/ref/heads/${encodePath(opts.branch)}`,
  });
  if (res.status === 404) return null;
  if (!res.ok) throw githubFailure(res, `Read branch ${opts.branch}`);
  return readBody(res, refSchema, `Read branch ${opts.branch}`).object.sha;
}

/** Creates `branch` from the head of `from` unless it already exists. */
export async function ensureBranch(opts: {
  gh: GitHubRequester;
  repo: RepositoryRef;
  branch: string;
  from: string;
}): Promise<void> {
  const { gh, repo, branch, from } = opts;

  const existing = await getBranchSha({ gh, repo, branch });
  if (existing) return;

  const base = await getBranchSha({ gh, repo, branch: from });
  if (!base) {
    throw new UpstreamError({
      service: "github",
      status: 404,
      body: "",
      message: `Create branch ${branch} failed: base branch ${from} not found in ${repo.fullName}`,
    });
  }

  const res = await gh.request({
    method: "POST",
    path: `${repoPath(repo)}/git/refs`,
    body: { ref: `refs/heads/${branch}`, sha: base },
  });
  if (!res.ok) throw githubFailure(res, `Create branch ${branch}`);
  log.info({ repo: repo.fullName, branch, from }, "Branch created");
}

export async function getFileSha(opts: {
  gh: GitHubRequester;
  repo: RepositoryRef;
  path: string;
  branch: string;
}): Promise<string | null> {
  const res = await opts.gh.request({
    method: "GET",
    path: `${repoPath(opts.repo)}/contents/${encodePath(opts.path)}?ref=${encodeURIComponent(opts.branch)}`,
  });
  if (res.status === 404) return null;
  if (!res.ok) throw githubFailure(res, `Read ${opts.path}`);
  return readBody(res, fileSchema, `Read ${opts.path}`).sha;
}

/**
 * Create-or-update through the Contents API. An existing file is overwritten
 * with the blob sha read just before the write; a stale sha comes back as
 * 409 and is reported, not retried.
 */
export async function putFile(opts: {
  gh: GitHubRequester;
  repo: RepositoryRef;
  branch: string;
  artifact: Artifact;
}): Promise<FileUploadStatus> {
  const { gh, repo, branch, artifact } = opts;

  const sha = await getFileSha({ gh, repo, path: artifact.path, branch });
  const message = sha ? `Update ${artifact.path}` : `Add ${artifact.path}`;

  const res = await gh.request({
    method: "PUT",
    path: `${repoPath(repo)}/contents/${encodePath(artifact.path)}`,
    body: {
      message,
      content: artifact.content.toString("base64"),
      branch,
      ...(sha ? { sha } : {}),
    },
  });

  if (!res.ok) {
    if (res.status === 409) {
      log.warn({ repo: repo.fullName, path: artifact.path, branch }, "Stale file sha");
    }
    throw githubFailure(res, `Write ${artifact.path} on ${branch}`);
  }

  const body = readBody(res, putSchema, `Write ${artifact.path}`);
  const status = sha ? "updated" : "created";
  log.info(
    { repo: repo.fullName, path: artifact.path, branch, status },
    "File published",
  );

  return {
    path: artifact.path,
    kind: artifact.kind,
    status,
    commitSha: body.commit.sha,
  };
}
