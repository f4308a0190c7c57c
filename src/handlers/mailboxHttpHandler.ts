/**
 * Mailbox HTTP Handler
 * 
 * @description API Gateway (HTTP API) entry point for the door sensor.
 * Handles POST /mailbox/open and POST /mailbox/closed; the door signal is
 * taken from the raw request path.
 */

import type { APIGatewayProxyEventV2, APIGatewayProxyResult, Context } from 'aws-lambda';
import { MailboxInputError } from '../lib/errors';
import {
  createLambdaLogger,
  logLambdaCompletion,
  logLambdaInvocation,
} from '../lib/logger';
import { handleError, optionsResponse, successResponse } from '../lib/response';
import {
  createMailboxStateMachine,
  defaultMailboxDependencies,
  MailboxDependencies,
} from '../services/mailboxService';
import { parseDoorSignalFromPath } from '../types/mailbox';

const FUNCTION_NAME = 'mailboxHttpHandler';

export type MailboxHttpHandler = (
  event: APIGatewayProxyEventV2,
  context: Context
) => Promise<APIGatewayProxyResult>;

export const createMailboxHttpHandler = (
  dependencies: MailboxDependencies = defaultMailboxDependencies
): MailboxHttpHandler => async (event, context) => {
  const startedAt = Date.now();
  const log = createLambdaLogger(context.awsRequestId);
  logLambdaInvocation(FUNCTION_NAME, event, context.awsRequestId);

  try {
    if (event.requestContext.http.method === 'OPTIONS') {
      return optionsResponse();
    }

    const signal = parseDoorSignalFromPath(event.rawPath);
    if (!signal) {
      throw new MailboxInputError('Invalid mailbox status.');
    }

    const config = dependencies.loadConfig();
    const machine = await createMailboxStateMachine(config, dependencies);
    const outcome = await machine.handleEvent(signal);

    log.info('Mailbox request processed', {
      path: event.rawPath,
      event: outcome.event,
      state: outcome.state,
      counter: outcome.counter,
    });

    return successResponse();
  } catch (error) {
    return handleError(error);
  } finally {
    logLambdaCompletion(FUNCTION_NAME, Date.now() - startedAt, context.awsRequestId);
  }
};

export const handler = createMailboxHttpHandler();
