/**
 * Structured Logging - Mailbox Monitor
 *
 * One JSON document per line on the console stream matching the level, so
 * CloudWatch Logs Insights can filter on `level`, `requestId` and context.
 */

type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LOG_LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR'];

const SERVICE_NAME = 'mailbox-monitor';

const CONSOLE_WRITERS: Record<LogLevel, (line: string) => void> = {
  DEBUG: (line) => console.debug(line),
  INFO: (line) => console.log(line),
  WARN: (line) => console.warn(line),
  ERROR: (line) => console.error(line),
};

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  service: string;
  requestId?: string;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

/**
 * LOG_LEVEL is read on every write; unknown values mean INFO
 */
const configuredLevel = (): LogLevel => {
  const level = process.env['LOG_LEVEL']?.toUpperCase() ?? 'INFO';
  return isLogLevel(level) ? level : 'INFO';
};

export class Logger {
  constructor(private readonly requestId?: string) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('DEBUG', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('INFO', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('WARN', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.write('ERROR', message, context, error);
  }

  private write(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(configuredLevel())) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: SERVICE_NAME,
      ...(this.requestId ? { requestId: this.requestId } : {}),
      message,
      ...(context && Object.keys(context).length > 0 ? { context } : {}),
      ...(error ? { error: { name: error.name, message: error.message, stack: error.stack } } : {}),
    };

    CONSOLE_WRITERS[level](JSON.stringify(entry));
  }
}

/**
 * Module logger for code that runs outside a request, such as the state machine
 */
export const logger = new Logger();

/**
 * Logger bound to one Lambda invocation
 */
export const createLambdaLogger = (awsRequestId?: string): Logger => new Logger(awsRequestId);

export const logLambdaInvocation = (
  functionName: string,
  event: unknown,
  requestId?: string
): void => {
  createLambdaLogger(requestId).info('Lambda invocation started', {
    functionName,
    eventType: typeof event,
  });
};

export const logLambdaCompletion = (
  functionName: string,
  duration: number,
  requestId?: string
): void => {
  createLambdaLogger(requestId).info('Lambda invocation completed', {
    functionName,
    durationMs: duration,
  });
};

export const logLambdaError = (
  functionName: string,
  error: Error,
  requestId?: string
): void => {
  createLambdaLogger(requestId).error(`Lambda invocation failed: ${functionName}`, error);
};
