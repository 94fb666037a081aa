import type { ZodTypeAny } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

const DROPPED_KEYS = new Set(['$schema', '$ref', 'definitions', '$defs', 'components']);

function stripDefaults(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(stripDefaults);
  }
  if (value && typeof value === 'object') {
    const next: Record<string, unknown> = {};
    for (const [key, nested] of Object.entries(value)) {
      if (key === 'default') {
        continue;
      }
      next[key] = stripDefaults(nested);
    }
    return next;
  }
  return value;
}

/**
 * Inline JSON schema for route documentation. Defaults are dropped because zod
 * applies them when the handler parses the payload.
 */
export function toJsonSchema(schema: ZodTypeAny): Record<string, unknown> {
  const jsonSchema = zodToJsonSchema(schema, { $refStrategy: 'none' });
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(jsonSchema)) {
    if (!DROPPED_KEYS.has(key)) {
      result[key] = stripDefaults(value);
    }
  }
  return result;
}
