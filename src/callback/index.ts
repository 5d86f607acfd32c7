import type { AppConfig } from "../config/schema.ts";
import type { PublishResult } from "../lib/types.ts";
import { createChildLogger } from "../lib/logger.ts";

const log = createChildLogger("callback");

export interface CallbackOutcome {
  attempted: boolean;
  delivered: boolean;
  status: number | null;
}

export interface CallbackNotifier {
  notify(url: string | null, result: PublishResult): Promise<CallbackOutcome>;
}

/** Best-effort delivery: failures are logged and reported, never thrown. */
export function createCallbackNotifier(
  config: AppConfig["callback"],
): CallbackNotifier {
  return {
    async notify(url, result) {
      if (!url) {
        return { attempted: false, delivered: false, status: null };
      }

      try {
        const response = await fetch(url, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify(result),
          signal: AbortSignal.timeout(config.timeoutMs),
        });

        if (!response.ok) {
          log.warn(
            { runId: result.runId, url, status: response.status },
            "Callback rejected",
          );
          return { attempted: true, delivered: false, status: response.status };
        }

        log.info({ runId: result.runId, url, status: response.status }, "Callback delivered");
        return { attempted: true, delivered: true, status: response.status };
      } catch (err) {
        log.warn({ runId: result.runId, url, err }, "Callback delivery failed");
        return { attempted: true, delivered: false, status: null };
      }
    },
  };
}
