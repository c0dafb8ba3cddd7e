import type { HandlerNamespace } from '@switchyard/core';

/**
 * Input began with a command prefix but did not follow the grammar.
 * Returned by the parser as a value, not thrown.
 */
export class CommandParseError extends Error {
  constructor(
    public readonly namespace: HandlerNamespace,
    public readonly reason: string,
    public readonly handlerName?: string,
  ) {
    super(`Malformed ${namespace} command${handlerName ? ` "${handlerName}"` : ''}: ${reason}`);
    this.name = 'CommandParseError';
  }
}
