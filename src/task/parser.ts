import { timingSafeEqual } from "node:crypto";
import { z } from "zod";
import type { Attachment, TaskRequest } from "../lib/types.ts";
import { AuthorizationError, ValidationError } from "../lib/errors.ts";
import { createChildLogger } from "../lib/logger.ts";
import { RESERVED_PATHS } from "./naming.ts";

const log = createChildLogger("task:parser");

const DATA_URI = /^data:([^;,]+);base64,([A-Za-z0-9+/=\s]+)$/;
const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/** Base64 payload of a data URI, or null when the URI or its padding is malformed. */
function dataUriPayload(uri: string): { mimeType: string; payload: string } | null {
  const match = DATA_URI.exec(uri);
  const mimeType = match?.[1];
  const payload = match?.[2]?.replace(/\s+/g, "");
  if (!mimeType || !payload || !BASE64.test(payload)) return null;
  return { mimeType, payload };
}

// null and "" count as absent, so defaults still apply
function absent(value: unknown): unknown {
  return value === null || value === "" ? undefined : value;
}

const attachmentSchema = z.object({
  name: z
    .string()
    .trim()
    .min(1)
    .refine(
      (name) => !name.startsWith("/") && !name.split("/").includes(".."),
      "must be a relative path inside the repository",
    )
    .refine(
      (name) => !RESERVED_PATHS.includes(name),
      "is reserved for a generated file",
    ),
  url: z
    .string()
    .regex(DATA_URI, "must be a base64 data URI")
    .refine(
      (url) => !DATA_URI.test(url) || dataUriPayload(url) !== null,
      "payload is not well-formed base64",
    ),
});

export const taskRequestSchema = z.object({
  task: z.string().trim().min(1),
  brief: z.string().trim().min(1),
  nonce: z.string().trim().min(1),
  email: z.preprocess(absent, z.string().trim().optional()),
  round: z.preprocess(absent, z.coerce.number().int().min(1).default(1)),
  attachments: z.preprocess(absent, z.array(attachmentSchema).default([])),
  evaluation_url: z.preprocess(absent, z.string().url().optional()),
  secret: z.string().optional(),
});

export type TaskRequestBody = z.input<typeof taskRequestSchema>;

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function secretsMatch(supplied: string, expected: string): boolean {
  const a = Buffer.from(supplied, "utf8");
  const b = Buffer.from(expected, "utf8");
  if (a.length !== b.length) return false;
  return timingSafeEqual(a, b);
}

/**
 * Rejects the request when a shared secret is configured and the body does
 * not carry the same value. An empty `expected` disables the check.
 */
export function checkSecret(
  body: Record<string, unknown>,
  expected: string,
): void {
  if (!expected) return;

  const supplied = body["secret"];
  if (typeof supplied !== "string" || !secretsMatch(supplied, expected)) {
    log.warn({ task: body["task"] }, "Secret mismatch");
    throw new AuthorizationError("secret mismatch");
  }
}

export function decodeDataUri(name: string, uri: string): Attachment {
  const parsed = dataUriPayload(uri);
  if (!parsed) {
    throw new ValidationError(`Attachment ${name} is not a base64 data URI`, [
      `attachments.${name}`,
    ]);
  }
  return {
    name,
    mimeType: parsed.mimeType,
    content: Buffer.from(parsed.payload, "base64"),
  };
}

export function parseTaskRequest(
  body: unknown,
  opts: { secret: string },
): TaskRequest {
  if (!isJsonObject(body)) {
    throw new ValidationError("Request body must be a JSON object", ["body"]);
  }

  checkSecret(body, opts.secret);

  const parsed = taskRequestSchema.safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (i) => `${i.path.join(".") || "body"}: ${i.message}`,
    );
    log.info({ issues }, "Rejected task request");
    throw new ValidationError(
      `Invalid task request: ${issues.join("; ")}`,
      issues,
      parsed.error,
    );
  }

  const data = parsed.data;
  return {
    task: data.task,
    brief: data.brief,
    nonce: data.nonce,
    email: data.email || null,
    round: data.round,
    attachments: data.attachments.map((a) => decodeDataUri(a.name, a.url)),
    evaluationUrl: data.evaluation_url ?? null,
  };
}
