/**
 * IBillingNotifier - Human Notification Port
 *
 * @module packages/core/ports/IBillingNotifier
 */

export interface DisbursementSuccessNotice {
  organization: string;
  itemCount: number;
  amountCents: number;
  /** Null when the provider accepted the transfer without returning an id */
  transferId: string | null;
  idempotencyKey: string;
}

export interface DisbursementFailureNotice {
  organization: string;
  itemCount: number;
  amountCents: number;
  error: string;
  idempotencyKey: string;
}

export interface IBillingNotifier {
  notifySuccess(notice: DisbursementSuccessNotice): Promise<void>;
  notifyFailure(notice: DisbursementFailureNotice): Promise<void>;
}
