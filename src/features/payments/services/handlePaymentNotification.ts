// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/payments/services/handlePaymentNotification`
 * Purpose: Turn a signed provider notification into exactly one subscription activation (or scheduled upgrade).
 * Scope: Signature check, event filter, idempotency marker, provider re-verification, metadata extraction, activation. Does not parse HTTP.
 * Invariants:
 *   - SIGNATURE_FIRST: nothing is parsed or stored before the HMAC-SHA512 signature matches
 *   - SINGLE_CLAIM: at most one delivery per reference holds the processing claim; success markers are never reclaimed
 *   - VERIFY_BEFORE_TRUST: account, plan, amount and currency come from the provider lookup, not the webhook body
 *   - SUCCESS_AFTER_ACTIVATION: the marker turns success only after the subscription change is stored
 *   - NO_STUCK_CLAIM: a store failure while activating marks the claim failed before rethrowing
 *   - REPLAY_REPORTS_STATUS: a replay answers with the account's current access state, not the marker alone
 * Side-effects: IO (via ProcessedPaymentRepository, PaymentVerifier, subscription services), metrics, logging
 * Notes: Provider outages and store failures propagate so the route answers 500 and the provider redelivers.
 *        A failed marker, or a processing marker older than STALE_CLAIM_MS, can be reclaimed by a redelivery.
 *        A retry after a lost success marker does not activate twice: the current record already carries the reference.
 * Links: core/payments/rules.ts, features/subscriptions/public.ts
 * @public
 */

import {
  checkPaidAmount,
  checkVerifiedTransaction,
  extractPaymentMetadata,
  isPaymentMetadataError,
  PAYMENT_SUCCESS_EVENT,
  type PaymentMetadata,
  type ProcessedPayment,
  type PaymentRejectionReason,
  type ProcessedPaymentStatus,
  STALE_CLAIM_MS,
  type VerifiedTransaction,
} from "@/core/payments/public";
import type { AccessStatus } from "@/core/subscriptions/public";
import {
  activatePlan,
  getSubscriptionSnapshot,
  type SubscriptionDeps,
  schedulePlanChange,
} from "@/features/subscriptions/public";
import type { PaymentVerifier, ProcessedPaymentRepository } from "@/ports";
import {
  EVENT_NAMES,
  logEvent,
  paymentNotificationsTotal,
  type RequestContext,
} from "@/shared/observability";
import { verifyHmacSha512 } from "@/shared/util";

import { parsePaymentEvent } from "./paystackEvent";

export interface PaymentFulfillmentDeps {
  subscription: SubscriptionDeps;
  processedPayments: ProcessedPaymentRepository;
  verifier: PaymentVerifier;
  /** Provider secret key; HMAC key for notifications. Missing means every notification is rejected. */
  webhookSecret: string | undefined;
  verifyTimeoutMs: number;
}

export interface PaymentNotificationInput {
  /** Request body exactly as received; the signature covers these bytes */
  rawBody: Uint8Array | string;
  signature: string | null;
}

export type PaymentFailureReason =
  | PaymentRejectionReason
  | "transaction_not_found";

export type PaymentNotificationResult =
  | { ok: false; reason: "invalid_signature" }
  | { ok: true; ignored: "malformed_event" | "event_not_handled" }
  | {
      ok: true;
      idempotent: true;
      activated: false;
      payment: ProcessedPaymentStatus;
      /** Current access state of the paying account; null while no account is linked to the reference */
      subscription: AccessStatus | null;
    }
  | {
      ok: true;
      activated: true;
      scheduled: boolean;
      accountId: string;
      planCode: string;
    }
  | { ok: true; activated: false; reason: PaymentFailureReason };

const PROVIDER_UNAVAILABLE = "provider_unavailable";
const ACTIVATION_FAILED = "activation_failed";

export async function handlePaymentNotification(
  deps: PaymentFulfillmentDeps,
  input: PaymentNotificationInput,
  ctx: RequestContext
): Promise<PaymentNotificationResult> {
  const base = { reqId: ctx.reqId, routeId: ctx.routeId };

  function ignored(
    reason: "malformed_event" | "event_not_handled",
    eventName: string | null
  ): PaymentNotificationResult {
    logEvent(ctx.log, EVENT_NAMES.PAYMENTS_EVENT_IGNORED, {
      ...base,
      reason,
      eventName,
    });
    paymentNotificationsTotal.inc({ result: "ignored" });
    return { ok: true, ignored: reason };
  }

  async function replay(
    ref: string,
    marker: ProcessedPayment | null
  ): Promise<PaymentNotificationResult> {
    const payment = marker?.status ?? "processing";
    const subscription = marker?.accountId
      ? (await getSubscriptionSnapshot(deps.subscription, marker.accountId, ctx))
          .status
      : null;
    logEvent(ctx.log, EVENT_NAMES.PAYMENTS_REPLAY, {
      ...base,
      reference: ref,
      status: payment,
    });
    paymentNotificationsTotal.inc({ result: "replay" });
    return { ok: true, idempotent: true, activated: false, payment, subscription };
  }

  async function reject(
    ref: string,
    reason: PaymentFailureReason
  ): Promise<PaymentNotificationResult> {
    await deps.processedPayments.markFailed(
      ref,
      reason,
      new Date(ctx.clock.now())
    );
    logEvent(ctx.log, EVENT_NAMES.PAYMENTS_VERIFICATION_REJECTED, {
      ...base,
      reference: ref,
      reason,
    });
    paymentNotificationsTotal.inc({ result: "rejected" });
    return { ok: true, activated: false, reason };
  }

  if (!deps.webhookSecret) {
    ctx.log.error("payment secret key not configured; rejecting notification");
  }
  if (
    !deps.webhookSecret ||
    !verifyHmacSha512(deps.webhookSecret, input.rawBody, input.signature)
  ) {
    logEvent(ctx.log, EVENT_NAMES.PAYMENTS_SIGNATURE_REJECTED, {
      ...base,
      signaturePresent: input.signature !== null,
    });
    paymentNotificationsTotal.inc({ result: "invalid_signature" });
    return { ok: false, reason: "invalid_signature" };
  }

  const event = parsePaymentEvent(
    typeof input.rawBody === "string"
      ? input.rawBody
      : Buffer.from(input.rawBody).toString("utf8")
  );
  if (!event) return ignored("malformed_event", null);
  if (
    event.event !== PAYMENT_SUCCESS_EVENT ||
    event.data.status?.toLowerCase() !== "success"
  ) {
    return ignored("event_not_handled", event.event);
  }

  const reference = event.data.reference;
  const now = new Date(ctx.clock.now());

  const existing = await deps.processedPayments.find(reference);
  if (existing?.status === "success") return replay(reference, existing);

  const claimed = await deps.processedPayments.claim(
    reference,
    now,
    new Date(now.getTime() - STALE_CLAIM_MS)
  );
  if (!claimed) {
    return replay(reference, await deps.processedPayments.find(reference));
  }

  let transaction: VerifiedTransaction | null;
  try {
    transaction = await deps.verifier.verifyTransaction(
      reference,
      AbortSignal.timeout(deps.verifyTimeoutMs)
    );
  } catch (error) {
    await deps.processedPayments.markFailed(
      reference,
      PROVIDER_UNAVAILABLE,
      new Date(ctx.clock.now())
    );
    paymentNotificationsTotal.inc({ result: "failed" });
    throw error;
  }
  if (!transaction) return reject(reference, "transaction_not_found");

  const transactionRejection = checkVerifiedTransaction(reference, transaction);
  if (transactionRejection) return reject(reference, transactionRejection);

  let metadata: PaymentMetadata;
  try {
    metadata = extractPaymentMetadata(reference, transaction.metadata);
  } catch (error) {
    if (isPaymentMetadataError(error)) return reject(reference, error.reason);
    throw error;
  }

  const plan = await deps.subscription.plans.getPlan(metadata.planCode);
  if (!plan) return reject(reference, "unknown_plan");

  const amountRejection = checkPaidAmount(plan, transaction);
  if (amountRejection) return reject(reference, amountRejection);

  let scheduled: boolean;
  try {
    scheduled = await activateOrSchedule(
      deps,
      metadata,
      plan.planCode,
      reference,
      ctx
    );

    await deps.processedPayments.markSuccess(
      reference,
      {
        accountId: metadata.accountId,
        planCode: plan.planCode,
        amount: transaction.amount,
        currency: transaction.currency,
      },
      new Date(ctx.clock.now())
    );
  } catch (error) {
    await deps.processedPayments.markFailed(
      reference,
      ACTIVATION_FAILED,
      new Date(ctx.clock.now())
    );
    paymentNotificationsTotal.inc({ result: "failed" });
    throw error;
  }

  logEvent(
    ctx.log,
    scheduled ? EVENT_NAMES.PAYMENTS_SCHEDULED : EVENT_NAMES.PAYMENTS_ACTIVATED,
    {
      ...base,
      reference,
      accountId: metadata.accountId,
      planCode: plan.planCode,
      amount: transaction.amount,
    }
  );
  paymentNotificationsTotal.inc({
    result: scheduled ? "scheduled" : "activated",
  });

  return {
    ok: true,
    activated: true,
    scheduled,
    accountId: metadata.accountId,
    planCode: plan.planCode,
  };
}

/**
 * at_expiry upgrades on an account that still has a running trial or paid
 * period are scheduled for its end; everything else activates now.
 * A current record already activated by this reference is left as it is.
 * @returns true when the change was scheduled
 */
async function activateOrSchedule(
  deps: PaymentFulfillmentDeps,
  metadata: PaymentMetadata,
  planCode: string,
  reference: string,
  ctx: RequestContext
): Promise<boolean> {
  const current = await deps.subscription.subscriptions.getCurrent(
    metadata.accountId
  );
  if (current?.providerReference === reference) return false;

  if (metadata.upgradeMode === "at_expiry") {
    const { status } = await getSubscriptionSnapshot(
      deps.subscription,
      metadata.accountId,
      ctx
    );
    if (status.state === "trial" || status.state === "active") {
      await schedulePlanChange(
        deps.subscription,
        { accountId: metadata.accountId, planCode },
        ctx
      );
      return true;
    }
  }

  await activatePlan(
    deps.subscription,
    {
      accountId: metadata.accountId,
      planCode,
      source: "payment",
      providerReference: reference,
    },
    ctx
  );
  return false;
}
