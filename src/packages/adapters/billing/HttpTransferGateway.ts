/**
 * HttpTransferGateway - Organization Transfer API Implementation
 *
 * Implements ITransferGateway against a REST API that moves funds between
 * organization accounts (`POST /organizations/{slug}/transfers`).
 *
 * Features:
 * - OAuth2 bearer auth with an injected TokenCache
 * - One refresh-and-retry on 401
 * - Request timeout via AbortController
 * - Exponential backoff retry for network errors on read-only calls
 * - Failure classification into permanent / transient outcomes
 *
 * @module packages/adapters/billing/HttpTransferGateway
 */

import { z } from 'zod';
import type {
  ITransferGateway,
  TransferOutcome,
  TransferRequest,
  TransferSummary,
} from '../../core/ports/ITransferGateway.js';
import { logger } from '../../../utils/logger.js';
import { GatewayError, classifyGatewayError } from './gateway-errors.js';
import {
  TokenCache,
  refreshAccessToken,
  type OAuthClientCredentials,
} from './TokenCache.js';

// =============================================================================
// Constants
// =============================================================================

/** Maximum retry attempts for network errors */
const MAX_RETRIES = 3;

/** Base delay for exponential backoff (ms) */
const BASE_DELAY_MS = 1000;

/** Default page size when listing transfers */
const DEFAULT_LIST_LIMIT = 100;

// =============================================================================
// Config
// =============================================================================

export interface HttpTransferGatewayConfig {
  baseUrl: string;
  credentials: OAuthClientCredentials;
  timeoutMs: number;
  /** Override backoff base delay (tests) */
  retryBaseDelayMs?: number;
}

// =============================================================================
// API Response Schemas
// =============================================================================

const transferCreatedSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
});

const transferListItemSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  memo: z.string().nullish(),
  name: z.string().nullish(),
  amount_cents: z.number().int().default(0),
});

const transferListSchema = z.array(transferListItemSchema);

// =============================================================================
// Helper Functions
// =============================================================================

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Network errors (no HTTP status) are the only ones worth an in-process retry
 */
function isNetworkError(error: unknown): boolean {
  return error instanceof GatewayError && error.statusCode === undefined;
}

function formatDollars(amountCents: number): string {
  return `$${(amountCents / 100).toFixed(2)}`;
}

// =============================================================================
// HttpTransferGateway Class
// =============================================================================

export class HttpTransferGateway implements ITransferGateway {
  private readonly baseUrl: string;
  private readonly credentials: OAuthClientCredentials;
  private readonly timeoutMs: number;
  private readonly retryBaseDelayMs: number;
  private readonly tokens: TokenCache;

  constructor(config: HttpTransferGatewayConfig, tokens: TokenCache) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.credentials = config.credentials;
    this.timeoutMs = config.timeoutMs;
    this.retryBaseDelayMs = config.retryBaseDelayMs ?? BASE_DELAY_MS;
    this.tokens = tokens;
  }

  // ---------------------------------------------------------------------------
  // Transfers
  // ---------------------------------------------------------------------------

  /**
   * Create a transfer. Sent exactly once per call: a duplicate POST could
   * move money twice, so retries belong to the reconciler's next pass.
   */
  async createTransfer(request: TransferRequest): Promise<TransferOutcome> {
    const { sourceAccount, destinationAccount, amountCents, memo } = request;
    const url = `${this.baseUrl}/organizations/${encodeURIComponent(sourceAccount)}/transfers`;

    logger.info(
      { event: 'gateway.transfer.create', sourceAccount, destinationAccount, amountCents },
      `Creating transfer: ${sourceAccount} -> ${destinationAccount}, ${formatDollars(amountCents)}`
    );

    try {
      const response = await this.request(url, {
        method: 'POST',
        body: JSON.stringify({
          to_organization_id: destinationAccount,
          amount_cents: amountCents,
          name: memo,
        }),
      });

      if (response.status === 404) {
        throw new GatewayError(`Organization not found: ${sourceAccount}`, 404);
      }

      if (response.status === 403) {
        throw new GatewayError('Not authorized to create transfer from this organization', 403);
      }

      if (response.status !== 200 && response.status !== 201) {
        const errorText = await response.text();
        logger.error(
          { status: response.status, error: errorText },
          'Transfer API error creating transfer'
        );
        throw new GatewayError(
          `Transfer API error: status ${response.status} - ${errorText}`,
          response.status
        );
      }

      // A 2xx means the money moved; never report it as retryable
      const body: unknown = await response.json().catch(() => null);
      const parsed = transferCreatedSchema.safeParse(body);
      if (!parsed.success) {
        logger.warn(
          { event: 'gateway.transfer.accepted_without_id', sourceAccount, status: response.status },
          'Transfer accepted but response did not include a transfer id'
        );
        return { outcome: 'success', transferId: null };
      }

      logger.info(
        { event: 'gateway.transfer.created', transferId: parsed.data.id },
        'Transfer created'
      );
      return { outcome: 'success', transferId: parsed.data.id };
    } catch (err) {
      const outcome = classifyGatewayError(err);
      logger.warn(
        { event: 'gateway.transfer.rejected', sourceAccount, ...outcome },
        `Transfer ${outcome.outcome} failure`
      );
      return outcome;
    }
  }

  async listTransfers(account: string, limit: number = DEFAULT_LIST_LIMIT): Promise<TransferSummary[]> {
    const params = new URLSearchParams({ per_page: String(limit) });
    const url = `${this.baseUrl}/organizations/${encodeURIComponent(account)}/transfers?${params.toString()}`;

    return this.withRetry(async () => {
      const response = await this.request(url, { method: 'GET' });

      if (response.status === 404) {
        throw new GatewayError(`Organization not found: ${account}`, 404);
      }

      if (response.status !== 200) {
        logger.error({ status: response.status }, 'Transfer API error listing transfers');
        throw new GatewayError(`Transfer API error: status ${response.status}`, response.status);
      }

      const parsed = transferListSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new GatewayError('Transfer API returned an unexpected transfer list', response.status);
      }

      return parsed.data.map((transfer) => ({
        id: transfer.id,
        memo: transfer.memo ?? transfer.name ?? '',
        amountCents: transfer.amount_cents,
      }));
    }, 'listTransfers');
  }

  async findTransferByReference(
    account: string,
    reference: string,
    amountCents: number,
  ): Promise<TransferSummary | null> {
    const transfers = await this.listTransfers(account);
    const match = transfers.find(
      (transfer) => transfer.memo.includes(reference) && transfer.amountCents === amountCents
    );

    if (match) {
      logger.info(
        { event: 'gateway.transfer.matched', transferId: match.id, reference },
        'Found matching transfer'
      );
    }
    return match ?? null;
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  /**
   * Send a request with the cached access token. On 401 refresh the token
   * once and resend with the new credential.
   */
  private async request(url: string, init: { method: 'GET' | 'POST'; body?: string }): Promise<Response> {
    const response = await this.send(url, init, this.tokens.accessToken);

    if (response.status !== 401 || !this.tokens.canRefresh()) {
      return response;
    }

    logger.info({ event: 'gateway.token.expired' }, 'Access token rejected (401), refreshing');
    const refreshed = await refreshAccessToken(this.tokens, this.credentials, this.timeoutMs);
    return this.send(url, init, refreshed);
  }

  private async send(
    url: string,
    init: { method: 'GET' | 'POST'; body?: string },
    accessToken: string,
  ): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      return await fetch(url, {
        method: init.method,
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${accessToken}`,
        },
        body: init.body,
        signal: controller.signal,
      });
    } catch (err) {
      if (controller.signal.aborted) {
        logger.error({ url }, 'Transfer API timeout');
        throw new GatewayError('Transfer API timeout');
      }
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ url, error: message }, 'Transfer API request error');
      throw new GatewayError(`Failed to connect to transfer API: ${message}`);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Execute a read with exponential backoff retry on network errors
   */
  private async withRetry<T>(fn: () => Promise<T>, operation: string): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn();
      } catch (err) {
        if (!isNetworkError(err) || attempt >= MAX_RETRIES) {
          throw err;
        }
        const delay = this.retryBaseDelayMs * Math.pow(2, attempt - 1);
        logger.warn(
          { operation, attempt, error: err instanceof Error ? err.message : String(err), delay },
          'Network error, retrying transfer API operation'
        );
        await sleep(delay);
      }
    }
  }
}
