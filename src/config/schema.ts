import { z } from "zod";

const anthropicSchema = z.object({
  apiKey: z.string().min(1),
  model: z.string().min(1).default("claude-sonnet-4-5-20250929"),
  baseUrl: z.string().url().default("https://api.anthropic.com"),
  maxTokens: z.number().int().positive().default(4096),
});

const githubSchema = z.object({
  token: z.string().min(1),
  owner: z.string().default(""),
  apiUrl: z.string().url().default("https://api.github.com"),
});

const securitySchema = z.object({
  submissionSecret: z.string().default(""),
});

const callbackSchema = z.object({
  timeoutMs: z.number().int().positive().default(10_000),
});

const serverSchema = z.object({
  port: z.number().default(8000),
});

export const configSchema = z.object({
  anthropic: anthropicSchema,
  github: githubSchema,
  security: securitySchema,
  callback: callbackSchema,
  server: serverSchema,
});

export type AppConfig = z.infer<typeof configSchema>;
