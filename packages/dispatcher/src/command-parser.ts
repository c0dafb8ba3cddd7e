import type { Action, HandlerNamespace, JsonObject, JsonValue } from '@switchyard/core';
import { errorMessage, isJsonObject } from '@switchyard/core';
import { CommandParseError } from './errors.js';

export type ParseResult =
  | { type: 'action'; action: Action }
  | { type: 'none' }
  | { type: 'fault'; fault: CommandParseError };

const PREFIXES: ReadonlyArray<readonly [string, HandlerNamespace]> = [
  ['use tool:', 'tool'],
  ['use capability:', 'capability'],
];

const NAME = /^\s+(\w+)/;

function deepFreeze<T extends JsonValue>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Parse a command:
 *
 *   use tool: <name> <json-object>
 *   use capability: <name> <json-object>
 *
 * Keywords are case-sensitive and must start the input. Input without a
 * keyword prefix is conversational (`none`). Once a prefix matches, any
 * deviation from the grammar is a `fault`. Parameters are parsed as a JSON
 * object literal and nothing else.
 */
export function parseCommand(text: string): ParseResult {
  const match = PREFIXES.find(([prefix]) => text.startsWith(prefix));
  if (!match) return { type: 'none' };

  const [prefix, namespace] = match;
  const rest = text.slice(prefix.length);

  const nameMatch = NAME.exec(rest);
  const name = nameMatch?.[1];
  if (!nameMatch || name === undefined) {
    return fault(namespace, `expected whitespace and a ${namespace} name after "${prefix}"`);
  }

  const afterName = rest.slice(nameMatch[0].length);
  if (afterName.trim() === '') {
    return fault(namespace, 'missing JSON parameters', name);
  }
  if (!/^\s/.test(afterName)) {
    return fault(namespace, `expected whitespace after the ${namespace} name`, name);
  }

  let params: unknown;
  try {
    params = JSON.parse(afterName);
  } catch (err) {
    return fault(namespace, `malformed JSON parameters: ${errorMessage(err)}`, name);
  }
  if (!isJsonObject(params)) {
    return fault(namespace, 'parameters must be a JSON object', name);
  }

  const action: Action = Object.freeze({
    kind: namespace,
    name,
    params: deepFreeze<JsonObject>(params),
  });
  return { type: 'action', action };
}

/** Render an action back to command text. */
export function formatCommand(action: Action): string {
  return `use ${action.kind}: ${action.name} ${JSON.stringify(action.params)}`;
}

function fault(namespace: HandlerNamespace, reason: string, name?: string): ParseResult {
  return { type: 'fault', fault: new CommandParseError(namespace, reason, name) };
}
