/**
 * Operation results for collaborators that must never throw.
 *
 * Store and notifier calls report failure as a value; the caller decides
 * how to log it and what fallback to use.
 */

export interface OperationFailure<K extends string> {
  kind: K;
  message: string;
  cause?: Error;
}

export type OperationResult<T, K extends string> =
  | { success: true; data: T }
  | { success: false; error: OperationFailure<K> };

export const ok = <T>(data: T): { success: true; data: T } => ({ success: true, data });

export const fail = <K extends string>(
  kind: K,
  error: unknown
): { success: false; error: OperationFailure<K> } => {
  const cause = toError(error);
  return {
    success: false,
    error: { kind, message: cause.message, cause },
  };
};

/**
 * Normalize anything thrown into an Error instance
 */
export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));
