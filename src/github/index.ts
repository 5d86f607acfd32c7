import type { AppConfig } from "../config/schema.ts";
import type {
  Artifact,
  FileUploadStatus,
  RepositoryRef,
} from "../lib/types.ts";
import { createChildLogger } from "../lib/logger.ts";
import { createGitHubRequester } from "./request.ts";
import type { GitHubRequester } from "./request.ts";
import { ensureRepository, resolveOwner } from "./repos.ts";
import { ensureBranch, putFile } from "./contents.ts";
import { activatePages } from "./pages.ts";
import type { PagesResult } from "./pages.ts";

const log = createChildLogger("github");

export type { PagesResult };

export interface GitHubManager {
  resolveOwner(): Promise<string>;
  ensureRepository(opts: {
    owner: string;
    name: string;
    description: string;
  }): Promise<RepositoryRef>;
  ensureBranch(opts: {
    repo: RepositoryRef;
    branch: string;
    from: string;
  }): Promise<void>;
  publishFile(opts: {
    repo: RepositoryRef;
    branch: string;
    artifact: Artifact;
  }): Promise<FileUploadStatus>;
  activatePages(opts: {
    repo: RepositoryRef;
    branch: string;
  }): Promise<PagesResult>;
}

export function createGitHubManager(
  config: AppConfig["github"],
  gh: GitHubRequester = createGitHubRequester(config),
): GitHubManager {
  log.debug({ apiUrl: config.apiUrl, owner: config.owner || null }, "GitHub client ready");

  return {
    async resolveOwner() {
      return resolveOwner({ gh, configuredOwner: config.owner });
    },

    async ensureRepository({ owner, name, description }) {
      return ensureRepository({
        gh,
        owner,
        name,
        description,
        asOrganization: config.owner !== "" && owner === config.owner,
      });
    },

    async ensureBranch({ repo, branch, from }) {
      if (branch === from) return;
      await ensureBranch({ gh, repo, branch, from });
    },

    async publishFile({ repo, branch, artifact }) {
      return putFile({ gh, repo, branch, artifact });
    },

    async activatePages({ repo, branch }) {
      return activatePages({ gh, repo, branch });
    },
  };
}
