import Anthropic from "@anthropic-ai/sdk";
import type { AppConfig } from "../config/schema.ts";
import type { Artifact } from "../lib/types.ts";
import { GenerationError, UpstreamError, errorMessage } from "../lib/errors.ts";
import { createChildLogger } from "../lib/logger.ts";
import { buildFilePrompts } from "./prompts.ts";
import type { FilePrompt } from "./prompts.ts";

const log = createChildLogger("generator");

const FENCED = /^```[\w.+-]*[ \t]*\r?\n([\s\S]*?)\r?\n?```$/;

export interface ContentGenerator {
  generate(opts: { task: string; brief: string }): Promise<Artifact[]>;
}

export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const match = FENCED.exec(trimmed);
  return match?.[1] !== undefined ? match[1].trim() : trimmed;
}

export function extractText(response: {
  content: Array<{ type: string; text?: string }>;
}): string | null {
  const textBlock = response.content.find((b) => b.type === "text");
  return textBlock?.text ?? null;
}

export function createContentGenerator(
  config: AppConfig["anthropic"],
): ContentGenerator {
  // retries are off: a failed completion aborts the run
  const client = new Anthropic({
    apiKey: config.apiKey,
    baseURL: config.baseUrl,
    maxRetries: 0,
  });

  async function complete(prompt: FilePrompt): Promise<Artifact> {
    let response: Anthropic.Message;
    try {
      response = await client.messages.create({
        model: config.model,
        max_tokens: config.maxTokens,
        temperature: 0.2,
        system: prompt.system,
        messages: [{ role: "user", content: prompt.user }],
      });
    } catch (err) {
      if (err instanceof Anthropic.APIError) {
        throw new UpstreamError({
          service: "anthropic",
          status: err.status ?? 0,
          body: err.message,
          message: `Generate ${prompt.path} failed: Anthropic API returned ${err.status ?? "no status"}: ${err.message}`,
          cause: err,
        });
      }
      throw new GenerationError(
        `Generate ${prompt.path} failed: ${errorMessage(err)}`,
        err,
      );
    }

    const text = stripCodeFence(extractText(response) ?? "");
    if (!text) {
      throw new GenerationError(
        `Generate ${prompt.path} failed: model returned no text (stop reason ${response.stop_reason ?? "unknown"})`,
      );
    }

    log.info(
      { path: prompt.path, chars: text.length, stopReason: response.stop_reason },
      "File generated",
    );
    return {
      path: prompt.path,
      kind: prompt.kind,
      content: Buffer.from(`${text}\n`, "utf8"),
    };
  }

  return {
    async generate({ task, brief }) {
      const artifacts: Artifact[] = [];
      for (const prompt of buildFilePrompts({ task, brief })) {
        artifacts.push(await complete(prompt));
      }
      return artifacts;
    },
  };
}
