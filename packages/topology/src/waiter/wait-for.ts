import { TopologyError, TopologyErrorType } from "../errors";
import type { TopologyLogCallback } from "../types";

export interface WaitOptions {
  /** Timeout in milliseconds */
  timeoutMs: number;
  /** Polling interval in milliseconds */
  pollIntervalMs: number;
  /** Human-readable description for logging */
  description: string;
  log?: TopologyLogCallback;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Poll `condition` until it returns true.
 *
 * The condition is always evaluated at least once; once `timeoutMs` has
 * elapsed without it holding, a `TopologyError(TIMEOUT)` is thrown. Errors
 * thrown by the condition itself propagate immediately.
 */
export async function waitFor(
  condition: () => Promise<boolean>,
  options: WaitOptions,
): Promise<void> {
  const { timeoutMs, pollIntervalMs, description, log, sleep = defaultSleep } = options;
  const start = Date.now();

  for (;;) {
    if (await condition()) return;

    const elapsed = Date.now() - start;
    if (elapsed >= timeoutMs) {
      log?.(`  [${description}] TIMEOUT after ${Math.round(timeoutMs / 1000)}s`, "stderr");
      throw new TopologyError(
        `Timeout waiting for ${description} after ${timeoutMs}ms`,
        TopologyErrorType.TIMEOUT,
      );
    }

    log?.(`  Waiting for ${description}... (${Math.round(elapsed / 1000)}s elapsed)`);
    await sleep(pollIntervalMs);
  }
}
