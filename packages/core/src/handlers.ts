import type { HandlerNamespace, JsonObject } from './actions.js';

/**
 * A registered tool or capability.
 * The signal aborts when the deadline passes or the caller cancels;
 * handlers that ignore it keep running after their result is discarded.
 */
export type HandlerInvoke = (
  params: JsonObject,
  signal: AbortSignal,
) => string | Promise<string>;

/** Entry in the handler registry. */
export interface HandlerRecord {
  namespace: HandlerNamespace;
  name: string;
  description: string;
  invoke: HandlerInvoke;
  registeredAt: string;
}

/** Conversational handler that receives every input no action claimed. */
export interface ChatHandler {
  chat(text: string, signal?: AbortSignal): string | Promise<string>;
}
