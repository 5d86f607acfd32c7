import type { PublishResult, ResultError } from "./types.ts";

export class AppError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, cause?: unknown) {
    super(message, { cause });
    this.name = this.constructor.name;
    this.code = code;
  }
}

export class ConfigError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_ERROR", cause);
  }
}

export class ValidationError extends AppError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], cause?: unknown) {
    super(message, "VALIDATION_ERROR", cause);
    this.issues = issues;
  }
}

export class AuthorizationError extends AppError {
  constructor(message: string) {
    super(message, "AUTHORIZATION_ERROR");
  }
}

export type UpstreamService = "github" | "anthropic";

/** A third-party API answered with a non-success status, or could not be reached (status 0). */
export class UpstreamError extends AppError {
  public readonly service: UpstreamService;
  public readonly status: number;
  public readonly body: string;

  constructor(opts: {
    service: UpstreamService;
    status: number;
    body: string;
    message: string;
    cause?: unknown;
  }) {
    super(opts.message, "UPSTREAM_ERROR", opts.cause);
    this.service = opts.service;
    this.status = opts.status;
    this.body = opts.body;
  }
}

export class GenerationError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "GENERATION_ERROR", cause);
  }
}

export class PipelineError extends AppError {
  public readonly stage: string;
  public readonly result: PublishResult;

  constructor(opts: { stage: string; result: PublishResult; cause: unknown }) {
    const reason =
      opts.cause instanceof Error ? opts.cause.message : String(opts.cause);
    super(`Stage "${opts.stage}" failed: ${reason}`, "PIPELINE_ERROR", opts.cause);
    this.stage = opts.stage;
    this.result = opts.result;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toResultError(err: unknown, stage?: string): ResultError {
  const base: ResultError = {
    code: err instanceof AppError ? err.code : "INTERNAL_ERROR",
    message: errorMessage(err),
  };
  if (stage) base.stage = stage;
  if (err instanceof UpstreamError) {
    base.service = err.service;
    base.upstreamStatus = err.status;
  }
  return base;
}
