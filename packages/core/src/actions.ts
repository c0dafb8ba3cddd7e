/** Any value that survives a JSON round trip. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** A JSON object literal; the only shape accepted as action parameters. */
export type JsonObject = { [key: string]: JsonValue };

/** The two registration namespaces a command can address. */
export type HandlerNamespace = 'tool' | 'capability';

export const HANDLER_NAMESPACES: readonly HandlerNamespace[] = ['tool', 'capability'];

/** A structured request extracted from a `use tool:` / `use capability:` command. */
export interface Action {
  readonly kind: HandlerNamespace;
  readonly name: string;
  readonly params: Readonly<JsonObject>;
}
