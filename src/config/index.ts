import { configSchema } from "./schema.ts";
import type { AppConfig } from "./schema.ts";
import { ConfigError } from "../lib/errors.ts";

export type { AppConfig };

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw = {
    anthropic: {
      apiKey: env["ANTHROPIC_API_KEY"] ?? "",
      model: env["ANTHROPIC_MODEL"] || undefined,
      baseUrl: env["ANTHROPIC_BASE_URL"] || undefined,
      maxTokens: parseIntOrDefault(env["ANTHROPIC_MAX_TOKENS"], 4096),
    },
    github: {
      token: env["GITHUB_TOKEN"] ?? "",
      owner: env["GITHUB_OWNER"]?.trim() ?? "",
      apiUrl: env["GITHUB_API_URL"] || undefined,
    },
    security: {
      submissionSecret:
        env["SUBMISSION_SECRET"] || env["STUDENT_SECRET"] || "",
    },
    callback: {
      timeoutMs: parseIntOrDefault(env["CALLBACK_TIMEOUT_MS"], 10_000),
    },
    server: {
      port: parseIntOrDefault(env["PORT"], 8000),
    },
  };

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((i) => i.path.join("."));
    throw new ConfigError(
      `Invalid configuration: ${fields.join(", ")}`,
      parsed.error,
    );
  }
  return parsed.data;
}

function parseIntOrDefault(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}
