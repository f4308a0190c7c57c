/**
 * Mailbox domain types and zod schemas
 */

import { z } from 'zod';

const mailboxStateSchema = z.enum(['CLOSED', 'OPEN', 'AJAR']);
export type MailboxState = z.infer<typeof mailboxStateSchema>;

/**
 * The two door signals the state machine recognizes
 */
const doorSignalSchema = z.enum(['open', 'closed']);
export type DoorSignal = z.infer<typeof doorSignalSchema>;

export const isDoorSignal = (value: unknown): value is DoorSignal =>
  doorSignalSchema.safeParse(value).success;

/**
 * Persisted counter record (key `id = "open"`)
 */
export const counterRecordSchema = z.object({
  id: z.string(),
  value: z.number().int().nonnegative().default(0),
  timestamp: z.string().optional(),
});

/**
 * Direct-invocation payload, e.g. from an IoT rule: `{ "door": "open" }`
 */
export const doorSensorEventSchema = z
  .object({
    door: z.string(),
  })
  .passthrough();

/**
 * Result of processing one event
 */
export interface TransitionOutcome {
  event: string;
  recognized: boolean;
  previousState: MailboxState;
  state: MailboxState;
  /** Counter after the event; null when the event was ignored */
  counter: number | null;
  /** Messages handed to the notifier, in order */
  notifications: string[];
}

/**
 * Extract the door signal from an HTTP request path such as `/mailbox/open`
 *
 * "open" wins when a path somehow contains both words.
 */
export function parseDoorSignalFromPath(rawPath: string | undefined): DoorSignal | null {
  if (!rawPath) {
    return null;
  }
  if (rawPath.includes('open')) {
    return 'open';
  }
  if (rawPath.includes('closed')) {
    return 'closed';
  }
  return null;
}
