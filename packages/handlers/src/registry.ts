import type { HandlerInvoke, HandlerNamespace, HandlerRecord } from '@switchyard/core';
import { now } from '@switchyard/core';
import { DuplicateHandlerError, HandlerNotFoundError, HandlerValidationError } from './errors.js';

/** Names a command can address: word characters only. */
const HANDLER_NAME = /^\w+$/;

function key(namespace: HandlerNamespace, name: string): string {
  return `${namespace}:${name}`;
}

/**
 * In-memory registry of tools and capabilities.
 * The two namespaces are independent: `tool:search` and `capability:search`
 * may coexist.
 */
export class HandlerRegistry {
  private readonly entries = new Map<string, HandlerRecord>();

  /** Register a handler. Throws DuplicateHandlerError if the name is taken. */
  register(
    namespace: HandlerNamespace,
    name: string,
    invoke: HandlerInvoke,
    description = '',
  ): HandlerRecord {
    if (!HANDLER_NAME.test(name)) {
      throw new HandlerValidationError(
        `Invalid ${namespace} name "${name}": use letters, digits and underscores`,
      );
    }
    const k = key(namespace, name);
    if (this.entries.has(k)) {
      throw new DuplicateHandlerError(namespace, name);
    }
    const record: HandlerRecord = { namespace, name, description, invoke, registeredAt: now() };
    this.entries.set(k, record);
    return record;
  }

  /** Remove a handler. Returns true if it existed. */
  unregister(namespace: HandlerNamespace, name: string): boolean {
    return this.entries.delete(key(namespace, name));
  }

  /** Look up the invocable for a handler, or undefined. */
  resolve(namespace: HandlerNamespace, name: string): HandlerInvoke | undefined {
    return this.entries.get(key(namespace, name))?.invoke;
  }

  /** Like resolve, but throws HandlerNotFoundError. */
  require(namespace: HandlerNamespace, name: string): HandlerInvoke {
    const invoke = this.resolve(namespace, name);
    if (!invoke) {
      throw new HandlerNotFoundError(namespace, name);
    }
    return invoke;
  }

  get(namespace: HandlerNamespace, name: string): HandlerRecord | undefined {
    return this.entries.get(key(namespace, name));
  }

  has(namespace: HandlerNamespace, name: string): boolean {
    return this.entries.has(key(namespace, name));
  }

  /** Registered handlers sorted by name, optionally restricted to one namespace. */
  list(namespace?: HandlerNamespace): HandlerRecord[] {
    return [...this.entries.values()]
      .filter((r) => namespace === undefined || r.namespace === namespace)
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  /** Case-insensitive substring match on name or description. */
  search(namespace: HandlerNamespace, query: string): HandlerRecord[] {
    const needle = query.trim().toLowerCase();
    return this.list(namespace).filter(
      (r) =>
        r.name.toLowerCase().includes(needle) ||
        r.description.toLowerCase().includes(needle),
    );
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
