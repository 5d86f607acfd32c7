import { nanoid } from "nanoid";
import type { Artifact, PublishResult, TaskRequest } from "../lib/types.ts";
import type { GitHubManager } from "../github/index.ts";
import type { ContentGenerator } from "../generator/index.ts";
import type { CallbackNotifier } from "../callback/index.ts";
import { licenseArtifact } from "../generator/license.ts";
import { publishBranchFor, repoNameFor } from "../task/naming.ts";
import { PipelineError, toResultError } from "../lib/errors.ts";
import { createChildLogger } from "../lib/logger.ts";

const log = createChildLogger("pipeline");

export type PipelineStage = "provision" | "generate" | "publish" | "pages";

export interface PipelineDeps {
  github: GitHubManager;
  generator: ContentGenerator;
  callback: CallbackNotifier;
  newRunId?: () => string;
  now?: () => Date;
}

export interface TaskPipeline {
  run(request: TaskRequest): Promise<PublishResult>;
}

/**
 * Provision, generate, publish, activate Pages, then notify. Stages run one
 * after another; the first failure stops the run, is sent to the callback
 * and rethrown as a PipelineError carrying the failed result.
 */
export function createPipeline(deps: PipelineDeps): TaskPipeline {
  const { github, generator, callback } = deps;
  const newRunId = deps.newRunId ?? (() => nanoid(10));
  const now = deps.now ?? (() => new Date());

  return {
    async run(request) {
      const runId = newRunId();
      const name = repoNameFor(request.task, request.nonce);
      const branch = publishBranchFor(request.round);
      const runLog = log.child({ runId, repo: name, branch });

      const result: PublishResult = {
        runId,
        success: false,
        task: request.task,
        nonce: request.nonce,
        round: request.round,
        email: request.email,
        repository: null,
        repoUrl: null,
        pagesUrl: null,
        branch,
        files: [],
        error: null,
        finishedAt: "",
      };

      let stage: PipelineStage = "provision";
      try {
        runLog.info("Provisioning repository");
        const owner = await github.resolveOwner();
        const repo = await github.ensureRepository({
          owner,
          name,
          description: request.brief,
        });
        result.repository = repo.fullName;
        result.repoUrl = repo.htmlUrl;

        stage = "generate";
        runLog.info("Generating files");
        const generated = await generator.generate({
          task: request.task,
          brief: request.brief,
        });

        stage = "publish";
        await github.ensureBranch({ repo, branch, from: repo.defaultBranch });
        const artifacts: Artifact[] = [
          ...generated,
          licenseArtifact(repo.owner, now()),
          ...request.attachments.map(
            (a): Artifact => ({ path: a.name, kind: "attachment", content: a.content }),
          ),
        ];
        runLog.info({ files: artifacts.length }, "Publishing files");
        for (const artifact of artifacts) {
          result.files.push(
            await github.publishFile({ repo, branch, artifact }),
          );
        }

        stage = "pages";
        const pages = await github.activatePages({ repo, branch });
        result.pagesUrl = pages.url;
        result.success = true;
      } catch (err) {
        runLog.error({ stage, err }, "Pipeline stage failed");
        result.error = toResultError(err, stage);
        result.finishedAt = now().toISOString();
        await callback.notify(request.evaluationUrl, result);
        throw new PipelineError({ stage, result, cause: err });
      }

      result.finishedAt = now().toISOString();
      await callback.notify(request.evaluationUrl, result);
      runLog.info({ repoUrl: result.repoUrl, pagesUrl: result.pagesUrl }, "Task published");
      return result;
    },
  };
}
