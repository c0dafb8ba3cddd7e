import type { HandlerNamespace } from '@switchyard/core';

/** Thrown when registering a handler under a name its namespace already holds. */
export class DuplicateHandlerError extends Error {
  constructor(
    public readonly namespace: HandlerNamespace,
    public readonly handlerName: string,
  ) {
    super(`${namespace} already registered: ${handlerName}`);
    this.name = 'DuplicateHandlerError';
  }
}

/** Thrown when a required handler is not in the registry. */
export class HandlerNotFoundError extends Error {
  constructor(
    public readonly namespace: HandlerNamespace,
    public readonly handlerName: string,
  ) {
    super(`${namespace} not found: ${handlerName}`);
    this.name = 'HandlerNotFoundError';
  }
}

/** Thrown when a registration is malformed. */
export class HandlerValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HandlerValidationError';
  }
}
