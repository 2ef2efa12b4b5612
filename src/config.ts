import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { logger } from './utils/logger.js';

// Load environment variables from .env.local for development
dotenvConfig({ path: '.env.local' });
dotenvConfig(); // Fallback to .env

/**
 * Thrown when environment configuration fails validation
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Configuration schema with Zod validation
 */
const configSchema = z.object({
  database: z.object({
    path: z.string().min(1),
  }),

  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']),
  }),

  // Organization-to-organization transfer API (OAuth2)
  transferApi: z.object({
    baseUrl: z.string().url(),
    tokenUrl: z.string().url(),
    clientId: z.string(),
    clientSecret: z.string(),
    accessToken: z.string(),
    refreshToken: z.string(),
    timeoutMs: z.coerce.number().int().min(1000).max(120000).default(30000),
  }),

  billing: z.object({
    // Destination account every disbursement is paid into
    fulfillmentAccountSlug: z.string().min(1),
    memoPrefix: z.string().min(1).max(64),
    intervalMinutes: z.coerce.number().int().min(5).max(1440).default(60),
  }),

  notifications: z.object({
    slackWebhookUrl: z.string().url().optional(),
  }),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Parse and validate configuration from environment variables
 */
export function parseConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    database: {
      path: env.DATABASE_PATH ?? './data/billing.db',
    },
    logging: {
      level: env.LOG_LEVEL ?? 'info',
    },
    transferApi: {
      baseUrl: env.TRANSFER_API_BASE_URL ?? 'https://hcb.hackclub.com/api/v4',
      tokenUrl: env.TRANSFER_API_TOKEN_URL ?? 'https://hcb.hackclub.com/api/v4/oauth/token',
      clientId: env.TRANSFER_API_CLIENT_ID ?? '',
      clientSecret: env.TRANSFER_API_CLIENT_SECRET ?? '',
      accessToken: env.TRANSFER_API_ACCESS_TOKEN ?? '',
      refreshToken: env.TRANSFER_API_REFRESH_TOKEN ?? '',
      timeoutMs: env.TRANSFER_API_TIMEOUT_MS ?? '30000',
    },
    billing: {
      fulfillmentAccountSlug: env.FULFILLMENT_ACCOUNT_SLUG ?? 'hermes-fulfillment',
      memoPrefix: env.BILLING_MEMO_PREFIX ?? 'Fulfillment',
      intervalMinutes: env.BILLING_INTERVAL_MINUTES ?? '60',
    },
    notifications: {
      slackWebhookUrl: env.SLACK_WEBHOOK_URL || undefined,
    },
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues.map(
      (issue) => `  - ${issue.path.join('.')}: ${issue.message}`
    );
    logger.fatal({ errors: result.error.issues }, 'Configuration validation failed');
    throw new ConfigurationError(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return result.data;
}

// Parse configuration at module load time
export const config: Config = parseConfig();

// The logger is created before dotenv runs; apply the validated level now
logger.level = config.logging.level;

// =============================================================================
// Transfer API Configuration Helpers
// =============================================================================

/**
 * Check whether the transfer gateway has usable credentials: either an
 * access token, or a refresh token together with the OAuth2 client pair.
 */
export function isTransferGatewayConfigured(cfg: Config = config): boolean {
  const api = cfg.transferApi;
  if (api.accessToken) return true;
  return !!api.refreshToken && !!api.clientId && !!api.clientSecret;
}

/**
 * List the transfer API environment variables still missing.
 * Empty when the gateway can authenticate.
 */
export function getMissingTransferConfig(cfg: Config = config): string[] {
  if (isTransferGatewayConfigured(cfg)) return [];

  const api = cfg.transferApi;
  const missing: string[] = [];

  if (!api.accessToken && !api.refreshToken) {
    missing.push('TRANSFER_API_ACCESS_TOKEN');
    missing.push('TRANSFER_API_REFRESH_TOKEN');
  }
  if (!api.accessToken) {
    if (!api.clientId) missing.push('TRANSFER_API_CLIENT_ID');
    if (!api.clientSecret) missing.push('TRANSFER_API_CLIENT_SECRET');
  }

  return missing;
}
