/**
 * SNS Client Utility - Mailbox Monitor
 */

import { SNSClient } from '@aws-sdk/client-sns';
import type { MailboxConfig } from '../config/mailbox';

const clients = new Map<string, SNSClient>();

/**
 * Get (or create) the SNS client for a region
 */
export const getSnsClient = (config: Pick<MailboxConfig, 'region'>): SNSClient => {
  const cached = clients.get(config.region);
  if (cached) {
    return cached;
  }

  const client = new SNSClient({ region: config.region, maxAttempts: 1 });
  clients.set(config.region, client);
  return client;
};
