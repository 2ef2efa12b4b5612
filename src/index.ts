/**
 * Billing Worker Entry Point
 *
 * Opens the ledger database, wires the transfer gateway and notifier into
 * the disbursement reconciler, and runs it on the configured interval.
 *
 * @module index
 */

import { config, getMissingTransferConfig, isTransferGatewayConfigured } from './config.js';
import { logger } from './utils/logger.js';
import { closeDatabase, initDatabase } from './db/connection.js';
import { SqliteLedgerStore } from './packages/adapters/storage/SqliteLedgerStore.js';
import { HttpTransferGateway } from './packages/adapters/billing/HttpTransferGateway.js';
import { TokenCache } from './packages/adapters/billing/TokenCache.js';
import {
  LogBillingNotifier,
  SlackBillingNotifier,
} from './packages/adapters/notifications/SlackBillingNotifier.js';
import { createDisbursementReconciler } from './jobs/disbursement-reconciler.js';
import { createBillingScheduler } from './jobs/billing-scheduler.js';
import type { ITransferGateway } from './packages/core/ports/ITransferGateway.js';
import type { IBillingNotifier } from './packages/core/ports/IBillingNotifier.js';

function buildGateway(): ITransferGateway | undefined {
  if (!isTransferGatewayConfigured(config)) {
    logger.warn(
      { missing: getMissingTransferConfig(config) },
      'Transfer API credentials missing - billing cycles will be skipped'
    );
    return undefined;
  }

  const api = config.transferApi;
  return new HttpTransferGateway(
    {
      baseUrl: api.baseUrl,
      timeoutMs: api.timeoutMs,
      credentials: {
        tokenUrl: api.tokenUrl,
        clientId: api.clientId,
        clientSecret: api.clientSecret,
      },
    },
    new TokenCache({ accessToken: api.accessToken, refreshToken: api.refreshToken }),
  );
}

function buildNotifier(): IBillingNotifier {
  const webhookUrl = config.notifications.slackWebhookUrl;
  if (!webhookUrl) {
    logger.info('SLACK_WEBHOOK_URL not set - billing notifications go to the log');
    return new LogBillingNotifier();
  }
  return new SlackBillingNotifier(webhookUrl);
}

function main(): void {
  const db = initDatabase(config.database.path);

  const reconciler = createDisbursementReconciler({
    store: new SqliteLedgerStore(db),
    gateway: buildGateway(),
    notifier: buildNotifier(),
    fulfillmentAccountSlug: config.billing.fulfillmentAccountSlug,
    memoPrefix: config.billing.memoPrefix,
  });

  const scheduler = createBillingScheduler({
    reconciler,
    intervalMs: config.billing.intervalMinutes * 60 * 1000,
  });

  let isShuttingDown = false;
  const shutdown = (signal: string) => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    logger.info({ signal }, 'Shutting down billing worker');
    scheduler.stop();
    closeDatabase();
    process.exit(0);
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  scheduler.start();
}

main();
