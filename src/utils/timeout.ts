/**
 * Timeout helper for calls into external collaborators
 */

import { ErrorCategory, ErrorCode, TimeoutError } from '../errors';

export interface TimeoutOptions {
  /** Operation name used in the error message */
  operation: string;
  timeout_ms: number;
  code?: ErrorCode;
  category?: ErrorCategory;
  /** Caller-owned signal; aborting it rejects the call immediately */
  signal?: AbortSignal;
}

function abortReason(signal: AbortSignal, operation: string): Error {
  return signal.reason instanceof Error ? signal.reason : new Error(`${operation} aborted`);
}

/**
 * Runs `fn` with a deadline. The signal handed to `fn` is aborted when the
 * deadline passes or the caller's signal is aborted, whichever comes first.
 */
export function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  options: TimeoutOptions
): Promise<T> {
  const controller = new AbortController();
  const parent = options.signal;

  if (parent?.aborted) {
    return Promise.reject(abortReason(parent, options.operation));
  }

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const finish = (): boolean => {
      if (settled) return false;
      settled = true;
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
      return true;
    };

    const onParentAbort = (): void => {
      if (!parent || !finish()) return;
      const reason = abortReason(parent, options.operation);
      controller.abort(reason);
      reject(reason);
    };

    const timer = setTimeout(() => {
      if (!finish()) return;
      const error = new TimeoutError(
        options.operation,
        options.timeout_ms,
        options.code,
        options.category
      );
      controller.abort(error);
      reject(error);
    }, options.timeout_ms);

    parent?.addEventListener('abort', onParentAbort);

    let pending: Promise<T>;
    try {
      pending = fn(controller.signal);
    } catch (error) {
      if (finish()) reject(error);
      return;
    }

    pending.then(
      (value) => {
        if (finish()) resolve(value);
      },
      (error: unknown) => {
        if (finish()) reject(error);
      }
    );
  });
}
