import {
  DEFAULT_REGION,
  DEFAULT_TIMEZONE,
  LOCAL_DYNAMODB_ENDPOINT,
  loadMailboxConfig,
} from '../../../src/config/mailbox';
import { MailboxConfigurationError } from '../../../src/lib/errors';

describe('Mailbox Configuration', () => {
  const requiredEnv = {
    MAILBOX_SNS_ARN: 'arn:aws:sns:us-east-1:123456789012:mailbox',
    MAILBOX_DYNAMODB_TABLE: 'mailbox-state-v2',
  };

  it('should load required settings and apply defaults', () => {
    expect(loadMailboxConfig(requiredEnv)).toEqual({
      topicArn: 'arn:aws:sns:us-east-1:123456789012:mailbox',
      tableName: 'mailbox-state-v2',
      timeZone: DEFAULT_TIMEZONE,
      region: DEFAULT_REGION,
    });
  });

  it('should honour optional overrides', () => {
    const config = loadMailboxConfig({
      ...requiredEnv,
      MAILBOX_TIMEZONE: 'Europe/Berlin',
      AWS_REGION: 'eu-central-1',
      DYNAMODB_ENDPOINT: 'http://localhost:8000',
    });

    expect(config.timeZone).toBe('Europe/Berlin');
    expect(config.region).toBe('eu-central-1');
    expect(config.dynamoEndpoint).toBe('http://localhost:8000');
  });

  it('should point at DynamoDB Local under SAM local', () => {
    const config = loadMailboxConfig({ ...requiredEnv, AWS_SAM_LOCAL: 'true' });

    expect(config.dynamoEndpoint).toBe(LOCAL_DYNAMODB_ENDPOINT);
  });

  it('should report every missing required setting', () => {
    expect.assertions(3);
    try {
      loadMailboxConfig({});
    } catch (error) {
      expect(error).toBeInstanceOf(MailboxConfigurationError);
      if (error instanceof MailboxConfigurationError) {
        expect(error.settings).toEqual(['MAILBOX_SNS_ARN', 'MAILBOX_DYNAMODB_TABLE']);
        expect(error.message).toBe(
          'MAILBOX_SNS_ARN and MAILBOX_DYNAMODB_TABLE environment variables are required.'
        );
      }
    }
  });

  it('should treat blank values as missing', () => {
    expect(() =>
      loadMailboxConfig({ MAILBOX_SNS_ARN: '  ', MAILBOX_DYNAMODB_TABLE: 'mailbox-state-v2' })
    ).toThrow(MailboxConfigurationError);
  });

  it('should reject an unknown time zone and name it in the message', () => {
    expect.assertions(2);
    try {
      loadMailboxConfig({ ...requiredEnv, MAILBOX_TIMEZONE: 'Mars/Olympus_Mons' });
    } catch (error) {
      if (error instanceof MailboxConfigurationError) {
        expect(error.settings).toEqual(['MAILBOX_TIMEZONE']);
        expect(error.message).toBe('Invalid or missing configuration: MAILBOX_TIMEZONE.');
      }
    }
  });

  it('should list every failing setting when required and optional ones both fail', () => {
    expect(() =>
      loadMailboxConfig({ MAILBOX_DYNAMODB_TABLE: 'mailbox-state-v2', DYNAMODB_ENDPOINT: 'not a url' })
    ).toThrow('Invalid or missing configuration: MAILBOX_SNS_ARN, DYNAMODB_ENDPOINT.');
  });
});
