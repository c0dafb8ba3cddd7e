import type { HandlerNamespace } from './actions.js';

/** Why a dispatch did not end in a handler's own result. */
export type FaultKind =
  | 'parse_fault'
  | 'not_found'
  | 'timed_out'
  | 'handler_fault'
  | 'cancelled'
  | 'fallback_fault';

/** Which handler produced the result. */
export type DispatchSource = HandlerNamespace | 'fallback';

/** Result of one dispatch. Owned by the caller. */
export interface DispatchOutcome {
  readonly result: string;
  readonly source: DispatchSource;
  readonly elapsedMs: number;
  readonly fault?: FaultKind;
}

/** Per-call dispatch options. */
export interface DispatchOptions {
  /** Overrides the dispatcher's configured deadline for this call. */
  deadlineMs?: number;
  /** Cancels the in-flight dispatch. */
  signal?: AbortSignal;
}
