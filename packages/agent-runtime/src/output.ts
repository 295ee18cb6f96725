import type { Static, TSchema } from '@sinclair/typebox';
import type { RunContext } from './agent-context.js';
import { decodeArguments, formatViolations } from './schema-validation.js';

/** The model's plain text is the result. No output tool is advertised. */
export interface TextOutputSpec<T> {
  kind: 'text';
  fromText(text: string): T;
}

/** The result arrives as arguments to the output-schema pseudo-tool. */
export interface StructuredOutputSpec<T> {
  kind: 'structured';
  schema: TSchema;
  parse(argumentsJson: string): ParsedOutput<T>;
}

export type ParsedOutput<T> = { ok: true; value: T } | { ok: false; message: string };

export type OutputSpec<T> = TextOutputSpec<T> | StructuredOutputSpec<T>;

/**
 * Post-processes a candidate output. May return a transformed value, or
 * throw `ValidationRetry` to send feedback to the model and try again.
 */
export type OutputValidator<Deps, Output> = (
  context: RunContext<Deps>,
  output: Output,
) => Output | Promise<Output>;

export function textOutput(): TextOutputSpec<string> {
  return { kind: 'text', fromText: (text) => text };
}

export function structuredOutput<S extends TSchema>(schema: S): StructuredOutputSpec<Static<S>> {
  return {
    kind: 'structured',
    schema,
    parse(argumentsJson) {
      const decoded = decodeArguments(schema, argumentsJson);
      if (decoded.ok) return { ok: true, value: decoded.value };
      return {
        ok: false,
        message: formatViolations('Invalid final result:', decoded.violations, schema),
      };
    },
  };
}
