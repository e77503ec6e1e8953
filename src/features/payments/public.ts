// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/payments/public`
 * Purpose: Single entrypoint for payment fulfillment.
 * Scope: Re-exports the notification handler and its result types.
 * Side-effects: none
 * Links: Used by the payment webhook facade
 * @public
 */

export {
  handlePaymentNotification,
  type PaymentFailureReason,
  type PaymentFulfillmentDeps,
  type PaymentNotificationInput,
  type PaymentNotificationResult,
} from "./services/handlePaymentNotification";
