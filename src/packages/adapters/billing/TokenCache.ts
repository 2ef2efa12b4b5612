/**
 * TokenCache - OAuth2 credential holder for the transfer API
 *
 * Owned by one HttpTransferGateway instance and passed in at construction,
 * so there is no module-level token state. refreshAccessToken() is the only
 * writer after construction.
 *
 * @module packages/adapters/billing/TokenCache
 */

import { z } from 'zod';
import { logger } from '../../../utils/logger.js';
import { GatewayError } from './gateway-errors.js';

// =============================================================================
// Types
// =============================================================================

export interface OAuthClientCredentials {
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
}

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
});

// =============================================================================
// TokenCache
// =============================================================================

export class TokenCache {
  private tokens: TokenPair;

  constructor(initial: TokenPair) {
    this.tokens = { ...initial };
  }

  get accessToken(): string {
    return this.tokens.accessToken;
  }

  get refreshToken(): string {
    return this.tokens.refreshToken;
  }

  canRefresh(): boolean {
    return this.tokens.refreshToken.length > 0;
  }

  /**
   * Store a new access token; the refresh token rotates only when the
   * provider hands out a new one.
   */
  update(accessToken: string, refreshToken?: string): void {
    this.tokens = {
      accessToken,
      refreshToken: refreshToken ?? this.tokens.refreshToken,
    };
  }
}

// =============================================================================
// Refresh
// =============================================================================

/**
 * Exchange the cached refresh token for a new access token.
 *
 * Failures carry no status code: a credential problem is never a reason to
 * give up on a disbursement, so they must classify as transient.
 */
export async function refreshAccessToken(
  cache: TokenCache,
  credentials: OAuthClientCredentials,
  timeoutMs: number,
): Promise<string> {
  if (!cache.canRefresh()) {
    throw new GatewayError('No refresh token available - need to re-authorize');
  }

  if (!credentials.clientId || !credentials.clientSecret) {
    throw new GatewayError('Client id and secret are required for token refresh');
  }

  logger.info({ event: 'gateway.token.refresh' }, 'Refreshing transfer API access token');

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(credentials.tokenUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({
        grant_type: 'refresh_token',
        refresh_token: cache.refreshToken,
        client_id: credentials.clientId,
        client_secret: credentials.clientSecret,
      }).toString(),
      signal: controller.signal,
    });

    if (response.status !== 200) {
      const errorText = await response.text();
      logger.error(
        { status: response.status, error: errorText },
        'Transfer API token refresh failed'
      );
      throw new GatewayError(`Failed to refresh access token: ${response.status}`);
    }

    const parsed = tokenResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new GatewayError('Token refresh response did not include an access token');
    }

    cache.update(parsed.data.access_token, parsed.data.refresh_token);
    if (parsed.data.refresh_token) {
      logger.info({ event: 'gateway.token.rotated' }, 'Refresh token also updated');
    }

    logger.info({ event: 'gateway.token.refreshed' }, 'Access token refreshed');
    return cache.accessToken;
  } catch (err) {
    if (err instanceof GatewayError) throw err;
    if (controller.signal.aborted) {
      logger.error('Transfer API token refresh timed out');
      throw new GatewayError('Token refresh timeout');
    }
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ error: message }, 'Transfer API token refresh error');
    throw new GatewayError(`Failed to refresh access token: ${message}`);
  } finally {
    clearTimeout(timeoutId);
  }
}
