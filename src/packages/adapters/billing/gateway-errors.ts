/**
 * Transfer API error type and outcome classification
 *
 * GatewayError never leaves the gateway adapter: createTransfer() turns it
 * into a TransferOutcome via classifyGatewayError().
 *
 * @module packages/adapters/billing/gateway-errors
 */

import type { TransferOutcome } from '../../core/ports/ITransferGateway.js';

/** Statuses for which resending the identical request cannot succeed */
export const PERMANENT_STATUS_CODES: readonly number[] = [400, 403, 404];

export class GatewayError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'GatewayError';
  }
}

export function isPermanentStatus(statusCode: number | undefined): statusCode is number {
  return statusCode !== undefined && PERMANENT_STATUS_CODES.includes(statusCode);
}

/**
 * Map any error raised while creating a transfer onto a non-success outcome.
 * Anything that is not a GatewayError with a permanent status is transient.
 */
export function classifyGatewayError(
  error: unknown,
): Exclude<TransferOutcome, { outcome: 'success' }> {
  if (error instanceof GatewayError) {
    if (isPermanentStatus(error.statusCode)) {
      return { outcome: 'permanent', error: error.message, statusCode: error.statusCode };
    }
    return error.statusCode === undefined
      ? { outcome: 'transient', error: error.message }
      : { outcome: 'transient', error: error.message, statusCode: error.statusCode };
  }

  const message = error instanceof Error ? error.message : String(error);
  return { outcome: 'transient', error: message };
}
