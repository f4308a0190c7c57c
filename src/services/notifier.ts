/**
 * Notifier - publishes mailbox notifications to an SNS topic
 *
 * Fire-and-forget: one attempt, no retry. A failed publish is returned as a
 * result and never thrown.
 */

import { PublishCommand, SNSClient } from '@aws-sdk/client-sns';
import { fail, ok, OperationResult } from '../lib/result';

export type NotifierErrorKind = 'PUBLISH_FAILED';

export type NotifyResult = OperationResult<{ messageId?: string }, NotifierErrorKind>;

export interface Notifier {
  publish(message: string): Promise<NotifyResult>;
}

export class SnsNotifier implements Notifier {
  constructor(
    private readonly snsClient: SNSClient,
    private readonly topicArn: string
  ) {}

  async publish(message: string): Promise<NotifyResult> {
    try {
      const response = await this.snsClient.send(
        new PublishCommand({
          TopicArn: this.topicArn,
          Message: message,
        })
      );
      return ok({ messageId: response.MessageId });
    } catch (error) {
      return fail('PUBLISH_FAILED', error);
    }
  }
}
