/**
 * Mailbox Service - wires configuration, storage and notification
 * collaborators into a state machine for one invocation.
 */

import { loadMailboxConfig, MailboxConfig } from '../config/mailbox';
import { getDocumentClient } from '../lib/dynamodb';
import { getSnsClient } from '../lib/sns';
import { CounterStore, DynamoCounterStore } from '../models/counterRecord';
import { MailboxStateMachine, MailboxStateMachineOptions } from './mailboxStateMachine';
import { Notifier, SnsNotifier } from './notifier';

/**
 * Factories the handlers depend on; tests swap in in-memory fakes
 */
export interface MailboxDependencies {
  loadConfig: () => MailboxConfig;
  createStore: (config: MailboxConfig) => CounterStore;
  createNotifier: (config: MailboxConfig) => Notifier;
  machineOptions?: MailboxStateMachineOptions;
}

export const defaultMailboxDependencies: MailboxDependencies = {
  loadConfig: () => loadMailboxConfig(process.env),
  createStore: (config) =>
    new DynamoCounterStore(getDocumentClient(config), {
      tableName: config.tableName,
      timeZone: config.timeZone,
    }),
  createNotifier: (config) => new SnsNotifier(getSnsClient(config), config.topicArn),
};

/**
 * Build the state machine for a single event
 */
export async function createMailboxStateMachine(
  config: MailboxConfig,
  dependencies: MailboxDependencies
): Promise<MailboxStateMachine> {
  return MailboxStateMachine.create(
    dependencies.createStore(config),
    dependencies.createNotifier(config),
    dependencies.machineOptions
  );
}
