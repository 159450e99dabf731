/**
 * Interval polling for the background trackers (CI runs, ArgoCD rollouts).
 * A tick is skipped while the previous poll is still running.
 */

import { log } from "./logger.js";

export interface PollResult {
  checked: number;
  failed: number;
}

/** Start polling; the returned function stops it */
export function startPoller(
  name: string,
  intervalMs: number,
  poll: () => Promise<PollResult>
): () => void {
  let polling = false;

  const timer = setInterval(() => {
    if (polling) return;
    polling = true;
    void poll()
      .then(({ checked, failed }) => {
        if (checked > 0) log("debug", `${name} poll complete`, { checked, failed });
      })
      .catch((error: unknown) => {
        log("error", `${name} poll failed`, {
          error: error instanceof Error ? error.message : String(error),
        });
      })
      .finally(() => {
        polling = false;
      });
  }, intervalMs);

  log("info", `${name} tracker started`, { intervalMs });
  return () => {
    clearInterval(timer);
    log("info", `${name} tracker stopped`);
  };
}
