// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/util/fireAndForget`
 * Purpose: Run a best-effort write off the request path with a bounded timeout.
 * Scope: Timeout + error capture for secondary writes (use-count touch, ask telemetry). Does not retry.
 * Invariants: The returned promise never rejects; failures and timeouts are logged at warn and dropped.
 * Side-effects: IO (logging)
 * Notes: Callers normally `void` the result; tests may await it.
 * @public
 */

import type { Logger } from "pino";

export interface FireAndForgetOptions {
  log: Logger;
  /** Stable name for the write, logged on failure */
  label: string;
  timeoutMs: number;
}

class BestEffortTimeoutError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "BestEffortTimeoutError";
  }
}

export async function fireAndForget(
  task: () => Promise<unknown>,
  options: FireAndForgetOptions
): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new BestEffortTimeoutError(options.label, options.timeoutMs)),
      options.timeoutMs
    );
    timer.unref();
  });

  try {
    await Promise.race([task(), timeout]);
  } catch (error) {
    options.log.warn(
      { err: error, label: options.label },
      "best-effort write dropped"
    );
  } finally {
    clearTimeout(timer);
  }
}
