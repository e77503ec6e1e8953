// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/util/fireAndForget`
 * Purpose: Unit tests for best-effort writes bounded by a timeout.
 * Scope: Failure and timeout handling. Does NOT test the callers.
 * Invariants: Never rejects; failures and timeouts are logged at warn with the label.
 * Side-effects: none (fake timers)
 * Links: src/shared/util/fireAndForget.ts
 * @public
 */

import { afterEach, describe, expect, it, vi } from "vitest";

import { makeNoopLogger } from "@/shared/observability";
import { fireAndForget } from "@/shared/util";

describe("shared/util/fireAndForget", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("runs the task", async () => {
    const log = makeNoopLogger();
    const task = vi.fn(async () => 1);

    await fireAndForget(task, { log, label: "touch", timeoutMs: 1000 });

    expect(task).toHaveBeenCalledTimes(1);
  });

  it("logs and swallows a failing task", async () => {
    const log = makeNoopLogger();
    const warn = vi.spyOn(log, "warn");

    await expect(
      fireAndForget(
        async () => {
          throw new Error("db down");
        },
        { log, label: "qa_event", timeoutMs: 1000 }
      )
    ).resolves.toBeUndefined();

    expect(warn).toHaveBeenCalledWith(
      expect.objectContaining({ label: "qa_event" }),
      "best-effort write dropped"
    );
  });

  it("gives up on a task that outlives its timeout", async () => {
    vi.useFakeTimers();
    const log = makeNoopLogger();
    const warn = vi.spyOn(log, "warn");

    const pending = fireAndForget(() => new Promise<void>(() => {}), {
      log,
      label: "enqueue",
      timeoutMs: 50,
    });
    await vi.advanceTimersByTimeAsync(50);
    await pending;

    expect(warn).toHaveBeenCalledTimes(1);
    const [fields] = warn.mock.calls[0] ?? [];
    expect(fields).toMatchObject({ label: "enqueue" });
  });
});
