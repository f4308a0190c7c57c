/**
 * Counter Record Model - Mailbox Monitor
 *
 * Durable storage for the single open-event counter. Every mutation is one
 * atomic UpdateItem so that concurrent invocations never lose an update.
 * No operation throws: failures come back as results for the caller to log.
 */

import { DynamoDBDocumentClient, GetCommand, UpdateCommand } from '@aws-sdk/lib-dynamodb';
import { z } from 'zod';
import { COUNTER_KEY, DEFAULT_TIMEZONE } from '../config/mailbox';
import { fail, ok, OperationResult } from '../lib/result';
import { formatCounterTimestamp } from '../lib/timestamp';
import { counterRecordSchema } from '../types/mailbox';

export type CounterStoreErrorKind = 'READ_FAILED' | 'INCREMENT_FAILED' | 'RESET_FAILED';

export type StoreResult<T> = OperationResult<T, CounterStoreErrorKind>;

/**
 * Persistence port consumed by the state machine
 */
export interface CounterStore {
  /** Current counter; 0 when no record exists */
  read(): Promise<StoreResult<number>>;
  /** Atomically add 1 and return the updated counter */
  increment(): Promise<StoreResult<number>>;
  /** Atomically set the counter to 0 and return the value it held before */
  reset(): Promise<StoreResult<number>>;
}

export interface DynamoCounterStoreOptions {
  tableName: string;
  timeZone?: string;
  key?: string;
  now?: () => Date;
}

const counterValueSchema = z.number().int().nonnegative();

/**
 * Read the `value` attribute out of an UpdateItem response
 */
const parseReturnedValue = (attributes: Record<string, unknown> | undefined): number => {
  if (!attributes || attributes['value'] === undefined) {
    return 0;
  }
  return counterValueSchema.parse(attributes['value']);
};

/**
 * CounterStore backed by a DynamoDB table keyed on `id`
 */
export class DynamoCounterStore implements CounterStore {
  private readonly tableName: string;
  private readonly timeZone: string;
  private readonly key: string;
  private readonly now: () => Date;

  constructor(
    private readonly docClient: DynamoDBDocumentClient,
    options: DynamoCounterStoreOptions
  ) {
    this.tableName = options.tableName;
    this.timeZone = options.timeZone ?? DEFAULT_TIMEZONE;
    this.key = options.key ?? COUNTER_KEY;
    this.now = options.now ?? (() => new Date());
  }

  async read(): Promise<StoreResult<number>> {
    try {
      const response = await this.docClient.send(
        new GetCommand({
          TableName: this.tableName,
          Key: { id: this.key },
          ConsistentRead: true,
        })
      );

      if (!response.Item) {
        return ok(0);
      }

      return ok(counterRecordSchema.parse(response.Item).value);
    } catch (error) {
      return fail('READ_FAILED', error);
    }
  }

  async increment(): Promise<StoreResult<number>> {
    try {
      const response = await this.docClient.send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: { id: this.key },
          UpdateExpression: 'SET #val = if_not_exists(#val, :zero) + :inc, #ts = :time',
          ExpressionAttributeNames: {
            '#val': 'value',
            '#ts': 'timestamp',
          },
          ExpressionAttributeValues: {
            ':inc': 1,
            ':zero': 0,
            ':time': this.timestamp(),
          },
          ReturnValues: 'UPDATED_NEW',
        })
      );

      return ok(parseReturnedValue(response.Attributes));
    } catch (error) {
      return fail('INCREMENT_FAILED', error);
    }
  }

  async reset(): Promise<StoreResult<number>> {
    try {
      const response = await this.docClient.send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: { id: this.key },
          UpdateExpression: 'SET #val = :zero, #ts = :time',
          ExpressionAttributeNames: {
            '#val': 'value',
            '#ts': 'timestamp',
          },
          ExpressionAttributeValues: {
            ':zero': 0,
            ':time': this.timestamp(),
          },
          ReturnValues: 'UPDATED_OLD',
        })
      );

      return ok(parseReturnedValue(response.Attributes));
    } catch (error) {
      return fail('RESET_FAILED', error);
    }
  }

  private timestamp(): string {
    return formatCounterTimestamp(this.now(), this.timeZone);
  }
}
