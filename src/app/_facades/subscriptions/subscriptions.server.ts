// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/_facades/subscriptions/subscriptions.server`
 * Purpose: App-layer wiring for subscription status, trial start, plan scheduling and admin activation.
 * Scope: Server-only facade. Resolves deps, delegates to feature services, maps AccessStatus and records to contract DTOs; does not perform HTTP handling.
 * Invariants: Date fields map to ISO strings; status is always derived after the write.
 * Side-effects: IO (via subscription ports)
 * Notes: Domain errors (UnknownPlanError, TrialNotEligibleError, NoCurrentSubscriptionError, InvalidPeriodError) bubble to routes.
 * Links: contracts/subscriptions.*.v1.contract.ts, features/subscriptions/public.ts
 * @public
 */

import { resolveSubscriptionDeps } from "@/bootstrap/container";
import type {
  AdminSubscriptionsActivateInput,
  AdminSubscriptionsActivateOutput,
} from "@/contracts/admin.subscriptions.activate.v1.contract";
import type { SubscriptionsScheduleInput } from "@/contracts/subscriptions.schedule.v1.contract";
import type { SubscriptionStatusDto } from "@/contracts/subscriptions.status.v1.contract";
import type { AccessStatus } from "@/core/subscriptions/public";
import {
  activatePlan,
  getSubscriptionStatus,
  schedulePlanChange,
  startTrial,
} from "@/features/subscriptions/public";
import type { RequestContext } from "@/shared/observability";

export function toStatusDto(status: AccessStatus): SubscriptionStatusDto {
  return {
    active: status.active,
    state: status.state,
    reason: status.reason,
    plan_code: status.planCode,
    expires_at: status.expiresAt?.toISOString() ?? null,
    grace_until: status.graceUntil?.toISOString() ?? null,
    pending: status.pending
      ? {
          plan_code: status.pending.planCode,
          effective_at: status.pending.effectiveAt.toISOString(),
        }
      : null,
  };
}

export async function getSubscriptionStatusFacade(
  accountId: string,
  ctx: RequestContext
): Promise<SubscriptionStatusDto> {
  const status = await getSubscriptionStatus(
    resolveSubscriptionDeps(),
    accountId,
    ctx
  );
  return toStatusDto(status);
}

export async function startTrialFacade(
  accountId: string,
  ctx: RequestContext
): Promise<SubscriptionStatusDto> {
  const deps = resolveSubscriptionDeps();
  await startTrial(deps, accountId, ctx);
  return toStatusDto(await getSubscriptionStatus(deps, accountId, ctx));
}

export async function schedulePlanChangeFacade(
  input: SubscriptionsScheduleInput,
  ctx: RequestContext
): Promise<SubscriptionStatusDto> {
  const { status } = await schedulePlanChange(
    resolveSubscriptionDeps(),
    { accountId: input.account_id, planCode: input.plan_code },
    ctx
  );
  return toStatusDto(status);
}

export async function adminActivateFacade(
  input: AdminSubscriptionsActivateInput,
  ctx: RequestContext
): Promise<AdminSubscriptionsActivateOutput> {
  const deps = resolveSubscriptionDeps();
  const record = await activatePlan(
    deps,
    {
      accountId: input.account_id,
      planCode: input.plan_code,
      source: "admin",
      expiresAt: input.expires_at ? new Date(input.expires_at) : undefined,
    },
    ctx
  );
  const status = await getSubscriptionStatus(deps, input.account_id, ctx);

  return {
    subscription: {
      id: record.id,
      plan_code: record.planCode,
      status: record.status,
      period_start: record.periodStart.toISOString(),
      period_end: record.periodEnd.toISOString(),
      source: record.source,
    },
    status: toStatusDto(status),
  };
}
