import type { ChatHandler, HandlerInvoke, HandlerNamespace } from '@switchyard/core';
import type { HandlerRegistry } from '@switchyard/handlers';

export interface HandlerRegistration {
  namespace: HandlerNamespace;
  name: string;
  invoke: HandlerInvoke;
  description?: string;
}

/** `use tool: echo {"text": "..."}` */
export const echoTool: HandlerRegistration = {
  namespace: 'tool',
  name: 'echo',
  description: 'Return the "text" parameter unchanged.',
  invoke: (params) => {
    const text = params['text'];
    if (typeof text !== 'string') {
      throw new Error('"text" must be a string');
    }
    return text;
  },
};

/** `use capability: clock {}`: current time, optionally in another IANA zone. */
export const clockCapability: HandlerRegistration = {
  namespace: 'capability',
  name: 'clock',
  description: 'Report the current time; optional "timeZone" parameter.',
  invoke: (params) => {
    const timeZone = params['timeZone'];
    const date = new Date();
    if (typeof timeZone === 'string') {
      return date.toLocaleString('en-US', { timeZone, timeZoneName: 'short' });
    }
    return date.toISOString();
  },
};

export const BUILTIN_HANDLERS: readonly HandlerRegistration[] = [echoTool, clockCapability];

/** Register handlers, returning the names that were added. */
export function registerHandlers(
  registry: HandlerRegistry,
  handlers: readonly HandlerRegistration[],
): string[] {
  return handlers.map((h) => {
    registry.register(h.namespace, h.name, h.invoke, h.description);
    return `${h.namespace}:${h.name}`;
  });
}

/** Chat handler for the console entry point when no model is attached. */
export function createEchoChat(prefix = 'You said: '): ChatHandler {
  return {
    chat: (text: string) => `${prefix}${text}`,
  };
}
