/**
 * ITransferGateway - Organization Transfer Port
 *
 * Provider-agnostic interface for moving money from one organization
 * account to another. Callers branch on a closed outcome type rather
 * than on thrown errors.
 *
 * @module packages/core/ports/ITransferGateway
 */

// =============================================================================
// Types
// =============================================================================

export interface TransferRequest {
  /** Account paying (the billed organization) */
  sourceAccount: string;
  /** Account receiving (the fulfillment account) */
  destinationAccount: string;
  /** Amount in cents */
  amountCents: number;
  /** Transfer memo; carries the idempotency key for dedup and lookup */
  memo: string;
}

/**
 * Result of a transfer attempt.
 *
 * - `success`: the provider accepted the transfer; `transferId` is null
 *   when a 2xx response carried no usable id
 * - `permanent`: retrying the identical request cannot succeed (400/403/404)
 * - `transient`: retrying may succeed (server error, timeout, network, unknown)
 */
export type TransferOutcome =
  | { outcome: 'success'; transferId: string | null }
  | { outcome: 'permanent'; error: string; statusCode: number }
  | { outcome: 'transient'; error: string; statusCode?: number };

export interface TransferSummary {
  id: string;
  memo: string;
  amountCents: number;
}

// =============================================================================
// ITransferGateway Interface
// =============================================================================

export interface ITransferGateway {
  /**
   * Create a transfer. Never throws for provider or network failures;
   * those come back classified in the outcome.
   */
  createTransfer(request: TransferRequest): Promise<TransferOutcome>;

  /**
   * List recent transfers for an account.
   * Used by manual recovery tooling, not by the automated passes.
   */
  listTransfers(account: string, limit?: number): Promise<TransferSummary[]>;

  /**
   * Find a transfer whose memo contains `reference` and whose amount matches.
   */
  findTransferByReference(
    account: string,
    reference: string,
    amountCents: number,
  ): Promise<TransferSummary | null>;
}
