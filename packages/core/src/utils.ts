import { randomUUID } from 'node:crypto';

/** Generate a random identifier for runs, tool calls and deferrals. */
export function generateId(): string {
  return randomUUID();
}

/** Type guard: checks that a value is a non-null object. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Error message text of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
