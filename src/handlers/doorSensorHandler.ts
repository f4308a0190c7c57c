/**
 * Door Sensor Handler
 *
 * @description Direct-invocation entry point (IoT rule or Lambda invoke)
 * taking `{ "door": "open" | "closed" }`. A missing or unknown door value
 * and missing configuration are thrown so the invocation is recorded as failed.
 */

import type { Context } from 'aws-lambda';
import { MailboxInputError } from '../lib/errors';
import { createLambdaLogger, logLambdaError } from '../lib/logger';
import { toError } from '../lib/result';
import {
  createMailboxStateMachine,
  defaultMailboxDependencies,
  MailboxDependencies,
} from '../services/mailboxService';
import { doorSensorEventSchema, isDoorSignal, TransitionOutcome } from '../types/mailbox';

const FUNCTION_NAME = 'doorSensorHandler';

export type DoorSensorHandler = (event: unknown, context: Context) => Promise<TransitionOutcome>;

export const createDoorSensorHandler = (
  dependencies: MailboxDependencies = defaultMailboxDependencies
): DoorSensorHandler => async (event, context) => {
  const log = createLambdaLogger(context.awsRequestId);
  log.info('Door sensor event received', { event });

  try {
    const parsed = doorSensorEventSchema.safeParse(event);
    if (!parsed.success) {
      throw new MailboxInputError();
    }
    if (!isDoorSignal(parsed.data.door)) {
      throw new MailboxInputError('Invalid mailbox status.');
    }

    const config = dependencies.loadConfig();
    const machine = await createMailboxStateMachine(config, dependencies);
    const outcome = await machine.handleEvent(parsed.data.door);

    log.info('Door sensor event processed', {
      event: outcome.event,
      recognized: outcome.recognized,
      state: outcome.state,
      counter: outcome.counter,
    });

    return outcome;
  } catch (error) {
    logLambdaError(FUNCTION_NAME, toError(error), context.awsRequestId);
    throw error;
  }
};

export const handler = createDoorSensorHandler();
