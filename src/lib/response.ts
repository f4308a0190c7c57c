/**
 * API Response Helpers - Mailbox Monitor
 * 
 * API Gateway proxy responses with permissive CORS headers. Bodies are a
 * JSON-encoded string message, e.g. `"Success"`.
 */

import type { APIGatewayProxyResult } from 'aws-lambda';
import { MailboxConfigurationError, MailboxInputError } from './errors';
import { logger } from './logger';
import { toError } from './result';

const corsHeaders = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': '*',
  'Access-Control-Allow-Methods': 'POST, OPTIONS',
};

/**
 * Create an API Gateway response with a JSON-encoded string body
 */
const createResponse = (
  statusCode: number,
  message: string
): APIGatewayProxyResult => {
  return {
    statusCode,
    headers: { ...corsHeaders },
    body: JSON.stringify(message),
  };
};

export const successResponse = (message: string = 'Success'): APIGatewayProxyResult =>
  createResponse(200, message);

/**
 * CORS preflight response
 */
export const optionsResponse = (): APIGatewayProxyResult => ({
  statusCode: 200,
  headers: {
    ...corsHeaders,
    'Access-Control-Max-Age': '3600',
  },
  body: '',
});

const badRequestResponse = (message: string): APIGatewayProxyResult => {
  logger.warn('Bad request', { message });
  return createResponse(400, message);
};

const internalServerErrorResponse = (
  message: string = 'An internal error occurred',
  error?: Error
): APIGatewayProxyResult => {
  if (error) {
    logger.error('Internal server error', error);
  }
  return createResponse(500, message);
};

/**
 * Map a thrown error onto a response
 */
export const handleError = (error: unknown): APIGatewayProxyResult => {
  if (error instanceof MailboxInputError) {
    return badRequestResponse(error.message);
  }

  if (error instanceof MailboxConfigurationError) {
    logger.error('Mailbox configuration error', error, { settings: error.settings });
    return createResponse(error.statusCode, error.message);
  }

  return internalServerErrorResponse('An unexpected error occurred', toError(error));
};
