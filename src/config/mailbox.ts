/**
 * Mailbox Monitor Configuration
 *
 * Settings are read from the Lambda environment once per invocation and
 * validated with zod. Missing or invalid settings are a configuration
 * error, never a per-event error.
 */

import { z } from 'zod';
import { MailboxConfigurationError } from '../lib/errors';

/**
 * Partition key of the single counter record
 */
export const COUNTER_KEY = 'open';

export const DEFAULT_TIMEZONE = 'America/Chicago';
export const DEFAULT_REGION = 'us-east-1';
export const LOCAL_DYNAMODB_ENDPOINT = 'http://host.docker.internal:8000';

const isValidTimeZone = (timeZone: string): boolean => {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
};

const mailboxEnvSchema = z.object({
  MAILBOX_SNS_ARN: z.string({ required_error: 'MAILBOX_SNS_ARN is required' }).min(1),
  MAILBOX_DYNAMODB_TABLE: z.string({ required_error: 'MAILBOX_DYNAMODB_TABLE is required' }).min(1),
  MAILBOX_TIMEZONE: z
    .string()
    .refine(isValidTimeZone, 'MAILBOX_TIMEZONE must be an IANA time zone')
    .default(DEFAULT_TIMEZONE),
  AWS_REGION: z.string().default(DEFAULT_REGION),
  DYNAMODB_ENDPOINT: z.string().url('DYNAMODB_ENDPOINT must be a URL').optional(),
  AWS_SAM_LOCAL: z.string().optional(),
});

export interface MailboxConfig {
  topicArn: string;
  tableName: string;
  timeZone: string;
  region: string;
  /** Set when running against DynamoDB Local */
  dynamoEndpoint?: string;
}

/**
 * Drop blank values so that `FOO=` behaves like an unset variable
 */
const withoutBlankValues = (
  env: Record<string, string | undefined>
): Record<string, string> => {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value;
    }
  }
  return cleaned;
};

/**
 * Load and validate the mailbox configuration
 *
 * @throws MailboxConfigurationError naming every missing or invalid setting
 */
export function loadMailboxConfig(
  env: Record<string, string | undefined> = process.env
): MailboxConfig {
  const parsed = mailboxEnvSchema.safeParse(withoutBlankValues(env));

  if (!parsed.success) {
    const settings = [...new Set(parsed.error.errors.map((issue) => issue.path.join('.')))];
    throw new MailboxConfigurationError(settings);
  }

  const values = parsed.data;
  const dynamoEndpoint =
    values.DYNAMODB_ENDPOINT ??
    (values.AWS_SAM_LOCAL === 'true' ? LOCAL_DYNAMODB_ENDPOINT : undefined);

  return {
    topicArn: values.MAILBOX_SNS_ARN,
    tableName: values.MAILBOX_DYNAMODB_TABLE,
    timeZone: values.MAILBOX_TIMEZONE,
    region: values.AWS_REGION,
    ...(dynamoEndpoint ? { dynamoEndpoint } : {}),
  };
}
