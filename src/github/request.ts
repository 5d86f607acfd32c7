import type { z } from "zod";
import type { AppConfig } from "../config/schema.ts";
import { UpstreamError, errorMessage } from "../lib/errors.ts";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export interface GitHubResponse {
  method: HttpMethod;
  path: string;
  status: number;
  ok: boolean;
  text: string;
  data: unknown;
}

export interface GitHubRequester {
  request(opts: {
    method: HttpMethod;
    path: string;
    body?: unknown;
  }): Promise<GitHubResponse>;
}

export function createGitHubRequester(
  config: AppConfig["github"],
): GitHubRequester {
  const baseUrl = config.apiUrl.replace(/\/+$/, "");
  const headers: Record<string, string> = {
    Authorization: `Bearer ${config.token}`,
    Accept: "application/vnd.github+json",
    "X-GitHub-Api-Version": "2022-11-28",
    "User-Agent": "pagesmith",
  };

  return {
    async request({ method, path, body }) {
      let response: Response;
      try {
        response = await fetch(`${baseUrl}${path}`, {
          method,
          headers:
            body === undefined
              ? headers
              : { ...headers, "Content-Type": "application/json" },
          body: body === undefined ? undefined : JSON.stringify(body),
        });
      } catch (err) {
        throw new UpstreamError({
          service: "github",
          status: 0,
          body: "",
          message: `GitHub ${method} ${path} failed: ${errorMessage(err)}`,
          cause: err,
        });
      }

      const text = await response.text();
      return {
        method,
        path,
        status: response.status,
        ok: response.ok,
        text,
        data: parseJson(text),
      };
    },
  };
}

function parseJson(text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function upstreamMessage(res: GitHubResponse): string {
  const data = res.data;
  if (typeof data === "object" && data !== null && "message" in data) {
    const message = data.message;
    if (typeof message === "string") return message;
  }
  return res.text.slice(0, 500);
}

export function githubFailure(res: GitHubResponse, action: string): UpstreamError {
  return new UpstreamError({
    service: "github",
    status: res.status,
    body: res.text,
    message: `${action} failed: GitHub ${res.method} ${res.path} returned ${res.status}: ${upstreamMessage(res)}`,
  });
}

export function readBody<T extends z.ZodTypeAny>(
  res: GitHubResponse,
  schema: T,
  action: string,
): z.infer<T> {
  const parsed = schema.safeParse(res.data);
  if (!parsed.success) {
    throw new UpstreamError({
      service: "github",
      status: res.status,
      body: res.text,
      message: `${action}: unexpected response from GitHub ${res.method} ${res.path}`,
      cause: parsed.error,
    });
  }
  return parsed.data;
}

export function encodePath(path: string): string {
  return path.split("/").map(encodeURIComponent).join("/");
}
