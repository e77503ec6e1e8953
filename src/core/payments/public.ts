// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/payments/public`
 * Purpose: Public surface for the payments domain.
 * Scope: Re-exports only. Does not define new logic.
 * Side-effects: none
 * @public
 */

export { isPaymentMetadataError, PaymentMetadataError } from "./errors";
export type {
  PaymentMetadata,
  PaymentRejectionReason,
  ProcessedPayment,
  ProcessedPaymentStatus,
  UpgradeMode,
  VerifiedTransaction,
} from "./model";
export { PAYMENT_SUCCESS_EVENT } from "./model";
export {
  checkPaidAmount,
  checkVerifiedTransaction,
  extractPaymentMetadata,
  isClaimStale,
  MINOR_UNITS_PER_MAJOR,
  STALE_CLAIM_MS,
} from "./rules";
