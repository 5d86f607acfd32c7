import { Hono } from "hono";
import type { TaskPipeline } from "../pipeline/index.ts";
import type { PublishResult, ResultError } from "../lib/types.ts";
import {
  AuthorizationError,
  GenerationError,
  PipelineError,
  UpstreamError,
  ValidationError,
  toResultError,
} from "../lib/errors.ts";
import { createChildLogger } from "../lib/logger.ts";
import { parseTaskRequest } from "./parser.ts";

const log = createChildLogger("task");

export interface TaskRouteDeps {
  pipeline: TaskPipeline;
  secret: string;
}

export type ErrorStatus = 400 | 401 | 500 | 502;

export interface ErrorBody {
  status: "failed";
  error: ResultError & { issues?: string[] };
  result?: PublishResult;
}

export function statusFor(err: unknown): ErrorStatus {
  const cause = err instanceof PipelineError ? err.cause : err;
  if (cause instanceof ValidationError) return 400;
  if (cause instanceof AuthorizationError) return 401;
  if (cause instanceof UpstreamError || cause instanceof GenerationError) {
    return 502;
  }
  return 500;
}

export function toErrorBody(err: unknown): ErrorBody {
  if (err instanceof PipelineError) {
    return {
      status: "failed",
      error: toResultError(err.cause, err.stage),
      result: err.result,
    };
  }
  const error: ErrorBody["error"] = toResultError(err);
  if (err instanceof ValidationError) error.issues = err.issues;
  return { status: "failed", error };
}

export function createTaskRoutes(deps: TaskRouteDeps): Hono {
  const { pipeline, secret } = deps;
  const app = new Hono();

  app.post("/", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch (err) {
      const invalid = new ValidationError("Request body is not valid JSON", ["body"], err);
      return c.json(toErrorBody(invalid), 400);
    }

    try {
      const request = parseTaskRequest(body, { secret });
      log.info(
        { task: request.task, nonce: request.nonce, round: request.round },
        "Task accepted",
      );
      const result = await pipeline.run(request);
      return c.json(result, 200);
    } catch (err) {
      const status = statusFor(err);
      if (status === 500) {
        log.error({ err }, "Task failed unexpectedly");
      }
      return c.json(toErrorBody(err), status);
    }
  });

  return app;
}
