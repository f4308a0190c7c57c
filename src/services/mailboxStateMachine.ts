/**
 * Mailbox State Machine - Mailbox Monitor
 *
 * Consumes one door event per instance, drives the persisted counter and
 * decides which notifications to publish.
 *
 * State transitions:
 *   CLOSED --open--> OPEN --open--> AJAR --open--> AJAR (power-of-two reminders)
 *   any    --closed--> CLOSED (notify only if the counter was above 0)
 *
 * The counter store is the only memory shared between invocations. Reminder
 * cadence is derived from the counter alone, so it survives re-instantiation.
 */

import { logger } from '../lib/logger';
import type { CounterStore, StoreResult } from '../models/counterRecord';
import type { Notifier } from './notifier';
import { DoorSignal, isDoorSignal, MailboxState, TransitionOutcome } from '../types/mailbox';

export const MAILBOX_MESSAGES = {
  open: 'Mailbox OPEN',
  ajar: 'Mailbox AJAR',
  closed: 'Mailbox CLOSED',
  stillAjar: (count: number): string => `Mailbox still AJAR, event count: ${count}`,
} as const;

/**
 * How a new instance picks its starting state
 * - derive: from the persisted counter (0 CLOSED, 1 OPEN, >1 AJAR)
 * - closed: always CLOSED
 */
export type InitialStatePolicy = 'derive' | 'closed';

export interface MailboxStateMachineOptions {
  initialState?: InitialStatePolicy;
}

export const deriveState = (counter: number): MailboxState => {
  if (counter <= 0) {
    return 'CLOSED';
  }
  return counter === 1 ? 'OPEN' : 'AJAR';
};

/**
 * Exact for every safe integer; bitwise `n & (n - 1)` truncates to 32 bits
 */
export const isPowerOfTwo = (value: number): boolean =>
  Number.isSafeInteger(value) && value > 0 && 2 ** Math.round(Math.log2(value)) === value;

/**
 * Backoff rule for repeated AJAR reminders: 1, 2, 4, 8, 16, ...
 */
export const shouldNotifyAjar = (counter: number): boolean => isPowerOfTwo(counter);

export class MailboxStateMachine {
  private currentState: MailboxState;

  private constructor(
    private readonly store: CounterStore,
    private readonly notifier: Notifier,
    initialState: MailboxState
  ) {
    this.currentState = initialState;
  }

  /**
   * Build a state machine, reading the counter when the policy asks for it
   */
  static async create(
    store: CounterStore,
    notifier: Notifier,
    options: MailboxStateMachineOptions = {}
  ): Promise<MailboxStateMachine> {
    const policy = options.initialState ?? 'derive';

    if (policy === 'closed') {
      return new MailboxStateMachine(store, notifier, 'CLOSED');
    }

    const counter = await readCounter(store);
    return new MailboxStateMachine(store, notifier, deriveState(counter));
  }

  get state(): MailboxState {
    return this.currentState;
  }

  /**
   * Process one door event. Unrecognized events are ignored.
   */
  async handleEvent(event: string): Promise<TransitionOutcome> {
    const previousState = this.currentState;

    if (!isDoorSignal(event)) {
      logger.debug('Ignoring unrecognized mailbox event', { event, state: previousState });
      return {
        event,
        recognized: false,
        previousState,
        state: previousState,
        counter: null,
        notifications: [],
      };
    }

    const { counter, notifications } = await this.apply(event);

    logger.info('Mailbox event handled', {
      event,
      previousState,
      state: this.currentState,
      counter,
      notifications: notifications.length,
    });

    return {
      event,
      recognized: true,
      previousState,
      state: this.currentState,
      counter,
      notifications,
    };
  }

  private async apply(
    signal: DoorSignal
  ): Promise<{ counter: number; notifications: string[] }> {
    return signal === 'open' ? this.handleOpen() : this.handleClosed();
  }

  private async handleOpen(): Promise<{ counter: number; notifications: string[] }> {
    const counter = await this.incrementCounter();
    const notifications: string[] = [];

    switch (this.currentState) {
      case 'CLOSED':
        this.currentState = 'OPEN';
        await this.notify(MAILBOX_MESSAGES.open, notifications);
        break;
      case 'OPEN':
        this.currentState = 'AJAR';
        await this.notify(MAILBOX_MESSAGES.ajar, notifications);
        break;
      case 'AJAR':
        if (shouldNotifyAjar(counter)) {
          await this.notify(MAILBOX_MESSAGES.stillAjar(counter), notifications);
        }
        break;
    }

    return { counter, notifications };
  }

  private async handleClosed(): Promise<{ counter: number; notifications: string[] }> {
    const notifications: string[] = [];
    const reset = await this.store.reset();

    let previousCounter: number;
    let counter = 0;
    if (reset.success) {
      previousCounter = reset.data;
    } else {
      logStoreFailure(reset);
      // The reset did not land, so the stored value is still the pre-reset one
      previousCounter = await readCounter(this.store);
      counter = previousCounter;
    }

    this.currentState = 'CLOSED';
    if (previousCounter > 0) {
      await this.notify(MAILBOX_MESSAGES.closed, notifications);
    }

    return { counter, notifications };
  }

  /**
   * Atomically increment, falling back to a fresh read if the update fails
   */
  private async incrementCounter(): Promise<number> {
    const result = await this.store.increment();
    if (result.success) {
      return result.data;
    }

    logStoreFailure(result);
    return readCounter(this.store);
  }

  private async notify(message: string, sent: string[]): Promise<void> {
    sent.push(message);
    const result = await this.notifier.publish(message);

    if (!result.success) {
      logger.error('Failed to publish mailbox notification', result.error.cause, {
        kind: result.error.kind,
        notification: message,
      });
    }
  }
}

/**
 * Read the counter, treating a failed read as 0
 */
async function readCounter(store: CounterStore): Promise<number> {
  const result = await store.read();
  if (result.success) {
    return result.data;
  }

  logStoreFailure(result);
  return 0;
}

function logStoreFailure(result: Extract<StoreResult<number>, { success: false }>): void {
  logger.error('Mailbox counter store operation failed', result.error.cause, {
    kind: result.error.kind,
    detail: result.error.message,
  });
}
