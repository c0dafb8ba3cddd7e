const PREFIX = 'SWITCHYARD_';
const SEPARATOR = '__';

/**
 * Coerce a string value to a number, boolean, or leave as string.
 */
function coerce(value: string): string | number | boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;

  if (/^-?\d+(\.\d+)?$/.test(value)) {
    const num = Number(value);
    if (Number.isFinite(num)) return num;
  }

  return value;
}

/** `DEADLINE_MS` → `deadlineMs`. */
function toCamelCase(segment: string): string {
  return segment
    .toLowerCase()
    .replace(/_([a-z0-9])/g, (_match, ch: string) => ch.toUpperCase());
}

/**
 * Apply environment variable overrides to a config object.
 *
 * Variables must be prefixed with `SWITCHYARD_`. Nesting is expressed
 * with double-underscore (`__`); single underscores inside a segment
 * separate words of a camelCase key. Values are coerced to numbers/booleans
 * where possible.
 *
 * Example: `SWITCHYARD_DISPATCHER__DEADLINE_MS=500`
 *   → `config.dispatcher.deadlineMs = 500`
 *
 * @param config The config object to mutate in-place.
 * @param env    Optional env map (defaults to `process.env`).
 * @returns The mutated config (same reference).
 */
export function applyEnvOverrides<T extends object>(
  config: T,
  env: Record<string, string | undefined> = process.env,
): T {
  for (const [key, rawValue] of Object.entries(env)) {
    if (!key.startsWith(PREFIX) || rawValue === undefined) continue;

    const path = key.slice(PREFIX.length).split(SEPARATOR).map(toCamelCase);

    if (path.some((segment) => segment === '')) continue;

    setNested(config, path, coerce(rawValue));
  }

  return config;
}

function setNested(obj: object, path: string[], value: unknown): void {
  let current: Record<string, unknown> = obj as Record<string, unknown>;

  for (const segment of path.slice(0, -1)) {
    const next = current[segment];

    if (next !== null && typeof next === 'object' && !Array.isArray(next)) {
      current = next as Record<string, unknown>;
    } else {
      const created: Record<string, unknown> = {};
      current[segment] = created;
      current = created;
    }
  }

  const last = path[path.length - 1];
  if (last !== undefined) {
    current[last] = value;
  }
}
