import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createCallbackNotifier } from "../../src/callback/index.ts";
import type { PublishResult } from "../../src/lib/types.ts";

const result: PublishResult = {
  runId: "run-1",
  success: true,
  task: "site",
  nonce: "ab12",
  round: 1,
  email: null,
  repository: "octo-user/site-ab12",
  repoUrl: "https://github.com/octo-user/site-ab12",
  pagesUrl: "https://octo-user.github.io/site-ab12/",
  branch: "main",
  files: [],
  error: null,
  finishedAt: "2026-01-01T00:00:00.000Z",
};

describe("createCallbackNotifier", () => {
  let originalFetch: typeof globalThis.fetch;

  beforeEach(() => {
    originalFetch = globalThis.fetch;
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it("does nothing without a URL", async () => {
    globalThis.fetch = vi.fn() as unknown as typeof fetch;

    const outcome = await createCallbackNotifier({ timeoutMs: 1000 }).notify(null, result);

    expect(outcome).toEqual({ attempted: false, delivered: false, status: null });
    expect(globalThis.fetch).not.toHaveBeenCalled();
  });

  it("posts the result as JSON", async () => {
    globalThis.fetch = vi.fn().mockResolvedValue({
      ok: true,
      status: 200,
    }) as unknown as typeof fetch;

    const outcome = await createCallbackNotifier({ timeoutMs: 1000 }).notify(
      "https://eval.example.com/notify",
      result,
    );

    expect(outcome).toEqual({ attempted: true, delivered: true, status: 200 });
    expect(globalThis.fetch).toHaveBeenCalledWith(
      "https://eval.example.com/notify",
      expect.objectContaining({
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(result),
      }),
    );
  });

  it("reports a rejected delivery", async () => {
    globalThis.fetch = vi.fn().mockResolvedValue({
      ok: false,
      status: 503,
    }) as unknown as typeof fetch;

    const outcome = await createCallbackNotifier({ timeoutMs: 1000 }).notify(
      "https://eval.example.com/notify",
      result,
    );

    expect(outcome).toEqual({ attempted: true, delivered: false, status: 503 });
    expect(globalThis.fetch).toHaveBeenCalledOnce();
  });

  it("swallows network errors", async () => {
    globalThis.fetch = vi
      .fn()
      .mockRejectedValue(new TypeError("fetch failed")) as unknown as typeof fetch;

    const outcome = await createCallbackNotifier({ timeoutMs: 1000 }).notify(
      "https://eval.example.com/notify",
      result,
    );

    expect(outcome).toEqual({ attempted: true, delivered: false, status: null });
  });
});
