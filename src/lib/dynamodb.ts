/**
 * DynamoDB Client Utility - Mailbox Monitor
 * 
 * Document Client factory using AWS SDK v3. Clients are cached per
 * region/endpoint so warm Lambda containers reuse their connections.
 */

import { DynamoDBClient, DynamoDBClientConfig } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, TranslateConfig } from '@aws-sdk/lib-dynamodb';
import type { MailboxConfig } from '../config/mailbox';

export type DynamoConnectionConfig = Pick<MailboxConfig, 'region' | 'dynamoEndpoint'>;

/**
 * Build the low-level client configuration
 *
 * A configured endpoint means DynamoDB Local: TLS is disabled and dummy
 * credentials override whatever the environment provides.
 */
export const buildClientConfig = (config: DynamoConnectionConfig): DynamoDBClientConfig => {
  const clientConfig: DynamoDBClientConfig = {
    region: config.region,
    maxAttempts: 3,
    requestHandler: {
      connectionTimeout: 3000,
      requestTimeout: 3000,
    },
  };

  if (config.dynamoEndpoint) {
    clientConfig.endpoint = config.dynamoEndpoint;
    clientConfig.tls = false;
    clientConfig.credentials = {
      accessKeyId: 'local',
      secretAccessKey: 'local',
    };
  }

  return clientConfig;
};

/**
 * Marshalling options:
 * - removeUndefinedValues: Prevent errors from undefined attributes
 * - wrapNumbers: false returns numbers as JavaScript numbers (not BigInt)
 */
const marshallOptions: TranslateConfig['marshallOptions'] = {
  removeUndefinedValues: true,
  convertEmptyValues: false,
};

const unmarshallOptions: TranslateConfig['unmarshallOptions'] = {
  wrapNumbers: false,
};

const clients = new Map<string, DynamoDBDocumentClient>();

/**
 * Get (or create) the Document Client for a region/endpoint pair
 */
export const getDocumentClient = (config: DynamoConnectionConfig): DynamoDBDocumentClient => {
  const cacheKey = `${config.region}|${config.dynamoEndpoint ?? ''}`;
  const cached = clients.get(cacheKey);
  if (cached) {
    return cached;
  }

  const client = DynamoDBDocumentClient.from(new DynamoDBClient(buildClientConfig(config)), {
    marshallOptions,
    unmarshallOptions,
  });
  clients.set(cacheKey, client);
  return client;
};
