import { vi } from "vitest";

export const GITHUB_API = "https://api.github.test";

export interface RecordedCall {
  method: string;
  url: string;
  path: string;
  body: unknown;
}

interface StoredFile {
  sha: string;
  content: string;
}

interface FakeRepo {
  owner: string;
  name: string;
  description: string;
  branches: Map<string, string>;
  files: Map<string, StoredFile>;
  pages: { branch: string; path: string } | null;
}

interface Failure {
  method: string;
  pattern: RegExp;
  status: number;
  message: string;
}

function asRecord(value: unknown): Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}

function json(status: number, data: unknown): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function urlOf(input: string | URL | Request): URL {
  if (typeof input === "string") return new URL(input);
  if (input instanceof URL) return input;
  return new URL(input.url);
}

/**
 * In-memory stand-in for the GitHub REST endpoints the service calls.
 * Requests to any other origin are recorded as callbacks.
 */
export function createFakeGitHub(opts: { login?: string; orgs?: string[] } = {}) {
  const login = opts.login ?? "octo-user";
  const orgs = new Set(opts.orgs ?? []);
  const repos = new Map<string, FakeRepo>();
  const calls: RecordedCall[] = [];
  const callbacks: RecordedCall[] = [];
  const failures: Failure[] = [];
  let counter = 0;
  let callbackStatus = 200;

  const nextSha = (prefix: string) => `${prefix}${String(++counter).padStart(4, "0")}`;

  function repoJson(repo: FakeRepo) {
    return {
      name: repo.name,
      full_name: `${repo.owner}/${repo.name}`,
      html_url: `https://github.com/${repo.owner}/${repo.name}`,
      default_branch: "main",
      owner: { login: repo.owner },
    };
  }

  function addRepo(owner: string, name: string, description = ""): FakeRepo {
    const repo: FakeRepo = {
      owner,
      name,
      description,
      branches: new Map(),
      files: new Map(),
      pages: null,
    };
    const commit = nextSha("commit");
    repo.branches.set("main", commit);
    repo.files.set("main:README.md", {
      sha: nextSha("blob"),
      content: Buffer.from(`# ${name}\n`).toString("base64"),
    });
    repos.set(`${owner}/${name}`, repo);
    return repo;
  }

  function createRepo(owner: string, body: Record<string, unknown>): Response {
    const name = String(body["name"] ?? "").replace(/[^A-Za-z0-9._-]/g, "-");
    if (repos.has(`${owner}/${name}`)) {
      return json(422, {
        message: "Repository creation failed.",
        errors: [{ resource: "Repository", field: "name", message: "name already exists on this account" }],
      });
    }
    const repo = addRepo(owner, name, String(body["description"] ?? ""));
    return json(201, repoJson(repo));
  }

  function handleRepo(
    method: string,
    repo: FakeRepo,
    rest: string,
    url: URL,
    body: Record<string, unknown>,
  ): Response {
    if (rest === "" && method === "GET") return json(200, repoJson(repo));

    const ref = /^\/git\/ref\/heads\/(.+)$/.exec(rest);
    if (ref?.[1] && method === "GET") {
      const branch = decodeURIComponent(ref[1]);
      const sha = repo.branches.get(branch);
      return sha
        ? json(200, { ref: `refs/heads/${branch}`, object: { sha, type: "commit" } })
        : json(404, { message: "Not Found" });
    }

    if (rest === "/git/refs" && method === "POST") {
      const name = String(body["ref"] ?? "").replace(/^refs\/heads\//, "");
      if (repo.branches.has(name)) return json(422, { message: "Reference already exists" });
      const sha = String(body["sha"]);
      const source = [...repo.branches.entries()].find(([, head]) => head === sha)?.[0];
      if (source) {
        for (const [key, file] of [...repo.files.entries()]) {
          if (key.startsWith(`${source}:`)) {
            repo.files.set(`${name}:${key.slice(source.length + 1)}`, { ...file });
          }
        }
      }
      repo.branches.set(name, sha);
      return json(201, { ref: body["ref"], object: { sha: body["sha"] } });
    }

    const contents = /^\/contents\/(.+)$/.exec(rest);
    if (contents?.[1]) {
      const path = contents[1].split("/").map(decodeURIComponent).join("/");
      if (method === "GET") {
        const branch = url.searchParams.get("ref") ?? "main";
        const file = repo.files.get(`${branch}:${path}`);
        return file
          ? json(200, { type: "file", path, sha: file.sha, content: file.content, encoding: "base64" })
          : json(404, { message: "Not Found" });
      }
      if (method === "PUT") {
        const branch = String(body["branch"] ?? "main");
        if (!repo.branches.has(branch)) return json(404, { message: `Branch ${branch} not found` });
        const key = `${branch}:${path}`;
        const existing = repo.files.get(key);
        const sha = body["sha"];
        if (existing && sha === undefined) {
          return json(422, { message: '"sha" wasn\'t supplied.' });
        }
        if (existing && sha !== existing.sha) {
          return json(409, { message: `${path} does not match ${String(sha)}` });
        }
        const blob = nextSha("blob");
        const commit = nextSha("commit");
        repo.files.set(key, { sha: blob, content: String(body["content"] ?? "") });
        repo.branches.set(branch, commit);
        return json(existing ? 200 : 201, {
          content: { path, sha: blob },
          commit: { sha: commit, message: body["message"] },
        });
      }
    }

    if (rest === "/pages") {
      const source = asRecord(body["source"]);
      const next = { branch: String(source["branch"]), path: String(source["path"]) };
      if (method === "POST") {
        if (repo.pages) return json(409, { message: "GitHub Pages is already enabled." });
        repo.pages = next;
        return json(201, {
          url: `${GITHUB_API}/repos/${repo.owner}/${repo.name}/pages`,
          html_url: `https://${repo.owner.toLowerCase()}.github.io/${repo.name}/`,
          source: next,
        });
      }
      if (method === "PUT") {
        if (!repo.pages) return json(404, { message: "Not Found" });
        repo.pages = next;
        return new Response(null, { status: 204 });
      }
    }

    return json(404, { message: "Not Found" });
  }

  function route(method: string, url: URL, body: Record<string, unknown>): Response {
    const path = url.pathname;

    for (const [index, failure] of failures.entries()) {
      if (failure.method === method && failure.pattern.test(path)) {
        failures.splice(index, 1);
        return json(failure.status, { message: failure.message });
      }
    }

    if (path === "/user" && method === "GET") return json(200, { login });
    if (path === "/user/repos" && method === "POST") return createRepo(login, body);

    const org = /^\/orgs\/([^/]+)\/repos$/.exec(path);
    if (org?.[1] && method === "POST") {
      const name = decodeURIComponent(org[1]);
      if (!orgs.has(name)) return json(404, { message: "Not Found" });
      return createRepo(name, body);
    }

    const repoMatch = /^\/repos\/([^/]+)\/([^/]+)(.*)$/.exec(path);
    if (repoMatch?.[1] && repoMatch[2] !== undefined) {
      const key = `${decodeURIComponent(repoMatch[1])}/${decodeURIComponent(repoMatch[2])}`;
      const repo = repos.get(key);
      if (!repo) return json(404, { message: "Not Found" });
      return handleRepo(method, repo, repoMatch[3] ?? "", url, body);
    }

    return json(404, { message: "Not Found" });
  }

  async function fetchImpl(
    input: string | URL | Request,
    init?: RequestInit,
  ): Promise<Response> {
    const url = urlOf(input);
    const method = (init?.method ?? "GET").toUpperCase();
    const raw = typeof init?.body === "string" ? init.body : undefined;
    const parsed: unknown = raw ? JSON.parse(raw) : undefined;
    const call: RecordedCall = { method, url: url.href, path: url.pathname, body: parsed };

    if (url.origin !== new URL(GITHUB_API).origin) {
      callbacks.push(call);
      return json(callbackStatus, { ok: callbackStatus < 300 });
    }

    calls.push(call);
    return route(method, url, asRecord(parsed));
  }

  return {
    login,
    repos,
    calls,
    callbacks,
    fetch: fetchImpl,
    install() {
      return vi.spyOn(globalThis, "fetch").mockImplementation(fetchImpl);
    },
    addRepo,
    failNext(method: string, pattern: RegExp, status: number, message = "Upstream failure") {
      failures.push({ method, pattern, status, message });
    },
    setCallbackStatus(status: number) {
      callbackStatus = status;
    },
    fileContent(fullName: string, branch: string, path: string): string | null {
      const file = repos.get(fullName)?.files.get(`${branch}:${path}`);
      return file ? Buffer.from(file.content, "base64").toString("utf8") : null;
    },
    fileSha(fullName: string, branch: string, path: string): string | null {
      return repos.get(fullName)?.files.get(`${branch}:${path}`)?.sha ?? null;
    },
  };
}

export type FakeGitHub = ReturnType<typeof createFakeGitHub>;
