import type { Static, TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { isRecord } from '@tether/core';
import type { ArgumentViolation } from './errors.js';

export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; violations: ArgumentViolation[] };

/**
 * Parse a model-supplied JSON argument string and check it against a
 * TypeBox schema. An empty string is read as `{}`.
 */
export function decodeArguments<S extends TSchema>(schema: S, argumentsJson: string): DecodeResult<Static<S>> {
  let parsed: unknown;
  try {
    parsed = argumentsJson.trim() === '' ? {} : JSON.parse(argumentsJson);
  } catch (err) {
    return {
      ok: false,
      violations: [{ path: '', message: `Invalid JSON: ${err instanceof Error ? err.message : String(err)}` }],
    };
  }

  if (Value.Check(schema, parsed)) {
    return { ok: true, value: parsed };
  }

  const violations: ArgumentViolation[] = [];
  for (const error of Value.Errors(schema, parsed)) {
    violations.push({ path: error.path || '/', message: error.message });
  }
  return { ok: false, violations };
}

/**
 * Format violations into a readable string suitable for LLM self-correction.
 * Includes the schema's properties and required fields as hints.
 */
export function formatViolations(heading: string, violations: ArgumentViolation[], schema: TSchema): string {
  const lines: string[] = [heading];

  for (const v of violations) {
    lines.push(v.path ? `  - ${v.path}: ${v.message}` : `  - ${v.message}`);
  }

  const properties = isRecord(schema['properties']) ? schema['properties'] : undefined;
  const requiredValue: unknown = schema['required'];
  const required = Array.isArray(requiredValue)
    ? requiredValue.filter((r): r is string => typeof r === 'string')
    : [];

  if (properties) {
    lines.push('');
    lines.push('Schema properties:');
    for (const [name, prop] of Object.entries(properties)) {
      const type = isRecord(prop) && typeof prop['type'] === 'string' ? prop['type'] : 'unknown';
      const desc = isRecord(prop) && typeof prop['description'] === 'string' ? prop['description'] : '';
      const reqMark = required.includes(name) ? ' (required)' : '';
      lines.push(`  - ${name}: ${type}${reqMark}${desc ? `: ${desc}` : ''}`);
    }
  }

  return lines.join('\n');
}
