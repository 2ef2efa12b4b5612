/**
 * Billing notifiers
 *
 * SlackBillingNotifier posts to a Slack incoming webhook.
 * LogBillingNotifier is used when no webhook is configured.
 *
 * Both throw on delivery problems; the reconciler logs and drops those
 * so a notification can never undo a committed disbursement.
 *
 * @module packages/adapters/notifications/SlackBillingNotifier
 */

import type {
  DisbursementFailureNotice,
  DisbursementSuccessNotice,
  IBillingNotifier,
} from '../../core/ports/IBillingNotifier.js';
import { logger } from '../../../utils/logger.js';

/** Request timeout (ms) */
const REQUEST_TIMEOUT_MS = 10000;

/**
 * Escape the three characters Slack treats as control sequences in mrkdwn
 */
export function escapeSlackText(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

export function formatCents(amountCents: number): string {
  return `$${(amountCents / 100).toFixed(2)}`;
}

export function buildSuccessMessage(notice: DisbursementSuccessNotice): string {
  return [
    `:white_check_mark: *Billing disbursement completed* for ${escapeSlackText(notice.organization)}`,
    `${notice.itemCount} items, ${formatCents(notice.amountCents)}`,
    notice.transferId === null
      ? 'Transfer: id not returned, match by reference'
      : `Transfer: \`${escapeSlackText(notice.transferId)}\``,
    `Reference: \`${escapeSlackText(notice.idempotencyKey)}\``,
  ].join('\n');
}

export function buildFailureMessage(notice: DisbursementFailureNotice): string {
  return [
    `:rotating_light: *Billing disbursement failed* for ${escapeSlackText(notice.organization)}`,
    `${notice.itemCount} items, ${formatCents(notice.amountCents)} need a manual transfer`,
    `Error: ${escapeSlackText(notice.error)}`,
    `Reference: \`${escapeSlackText(notice.idempotencyKey)}\``,
  ].join('\n');
}

// =============================================================================
// SlackBillingNotifier
// =============================================================================

export class SlackBillingNotifier implements IBillingNotifier {
  private readonly webhookUrl: string;

  constructor(webhookUrl: string) {
    this.webhookUrl = webhookUrl;
  }

  async notifySuccess(notice: DisbursementSuccessNotice): Promise<void> {
    await this.post(buildSuccessMessage(notice));
  }

  async notifyFailure(notice: DisbursementFailureNotice): Promise<void> {
    await this.post(buildFailureMessage(notice));
  }

  private async post(text: string): Promise<void> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);

    try {
      const response = await fetch(this.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ text }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`Slack webhook error: ${response.status} - ${errorText}`);
      }
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

// =============================================================================
// LogBillingNotifier
// =============================================================================

export class LogBillingNotifier implements IBillingNotifier {
  async notifySuccess(notice: DisbursementSuccessNotice): Promise<void> {
    logger.info({ event: 'billing.notify.success', ...notice }, buildSuccessMessage(notice));
  }

  async notifyFailure(notice: DisbursementFailureNotice): Promise<void> {
    logger.warn({ event: 'billing.notify.failure', ...notice }, buildFailureMessage(notice));
  }
}
