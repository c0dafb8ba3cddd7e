import type { HandlerInvoke, JsonObject } from '@switchyard/core';
import { DEFAULT_DEADLINE_MS, errorMessage } from '@switchyard/core';

export type ExecutionResult =
  | { status: 'ok'; output: string; elapsedMs: number }
  | { status: 'timed_out'; deadlineMs: number; elapsedMs: number }
  | { status: 'failed'; cause: string; error: unknown; elapsedMs: number }
  | { status: 'cancelled'; elapsedMs: number };

export interface RunBoundedOptions {
  /** Default: 10 000 ms. */
  deadlineMs?: number;
  /** Caller-side cancellation of the whole call. */
  signal?: AbortSignal;
}

/**
 * Run a handler under a deadline.
 *
 * The returned promise settles no later than the deadline (or the caller's
 * abort), whether or not the handler's own promise ever settles. On timeout
 * or cancellation the handler's signal is aborted and its eventual result is
 * discarded; a handler that ignores the signal keeps running in the
 * background. Handler faults come back as `failed`, never as a rejection.
 *
 * A handler that blocks the event loop synchronously cannot be interrupted
 * in-process; the deadline fires as soon as the loop is free again.
 */
export async function runBounded(
  invoke: HandlerInvoke,
  params: JsonObject,
  options: RunBoundedOptions = {},
): Promise<ExecutionResult> {
  const deadlineMs = options.deadlineMs ?? DEFAULT_DEADLINE_MS;
  if (!Number.isFinite(deadlineMs) || deadlineMs <= 0) {
    throw new RangeError(`deadlineMs must be a positive number, got ${deadlineMs}`);
  }

  const start = performance.now();
  const elapsed = (): number => Math.round(performance.now() - start);
  const external = options.signal;

  if (external?.aborted) {
    return { status: 'cancelled', elapsedMs: elapsed() };
  }

  const controller = new AbortController();

  return new Promise<ExecutionResult>((resolve) => {
    let settled = false;

    const settle = (result: ExecutionResult, abortHandler: boolean): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      external?.removeEventListener('abort', onCancel);
      if (abortHandler) {
        controller.abort(new Error(`Handler abandoned: ${result.status}`));
      }
      resolve(result);
    };

    const onCancel = (): void => {
      settle({ status: 'cancelled', elapsedMs: elapsed() }, true);
    };

    const timer = setTimeout(() => {
      settle({ status: 'timed_out', deadlineMs, elapsedMs: elapsed() }, true);
    }, deadlineMs);

    external?.addEventListener('abort', onCancel, { once: true });

    let pending: Promise<string>;
    try {
      pending = Promise.resolve(invoke(structuredClone(params), controller.signal));
    } catch (err) {
      pending = Promise.reject(err);
    }

    pending.then(
      (output: unknown) => {
        if (typeof output !== 'string') {
          const error = new TypeError(`Handler returned ${typeof output} instead of a string`);
          settle({ status: 'failed', cause: error.message, error, elapsedMs: elapsed() }, false);
          return;
        }
        settle({ status: 'ok', output, elapsedMs: elapsed() }, false);
      },
      (err: unknown) => {
        settle({ status: 'failed', cause: errorMessage(err), error: err, elapsedMs: elapsed() }, false);
      },
    );
  });
}
