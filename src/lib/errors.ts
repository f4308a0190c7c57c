/**
 * Custom error classes for the mailbox handlers
 *
 * Input and configuration errors short-circuit an invocation before any
 * state is touched. Store and notifier failures never surface as errors;
 * see lib/result.ts.
 */

/**
 * Error thrown when the trigger carries no recognizable door signal
 */
export class MailboxInputError extends Error {
  public readonly code = 'MBS001';
  public readonly statusCode = 400;

  constructor(message: string = 'Ignoring event as "door" key is missing.') {
    super(message);
    this.name = 'MailboxInputError';
    Object.setPrototypeOf(this, MailboxInputError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
    };
  }
}

const REQUIRED_SETTINGS = ['MAILBOX_SNS_ARN', 'MAILBOX_DYNAMODB_TABLE'];

/**
 * The fixed wording is kept for the two required settings; anything else is
 * named explicitly
 */
const describeSettings = (settings: string[]): string =>
  settings.length > 0 && settings.every((setting) => REQUIRED_SETTINGS.includes(setting))
    ? 'MAILBOX_SNS_ARN and MAILBOX_DYNAMODB_TABLE environment variables are required.'
    : `Invalid or missing configuration: ${settings.join(', ')}.`;

/**
 * Error thrown when environment settings are absent or invalid
 */
export class MailboxConfigurationError extends Error {
  public readonly code = 'MBS002';
  public readonly statusCode = 500;

  constructor(
    public readonly settings: string[],
    message: string = describeSettings(settings)
  ) {
    super(message);
    this.name = 'MailboxConfigurationError';
    Object.setPrototypeOf(this, MailboxConfigurationError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      settings: this.settings,
    };
  }
}

