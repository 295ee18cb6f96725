import { CONFIG_SECTION_KEYS } from './config.js';
import { isRecord } from './utils.js';

const PREFIX = 'TETHER_';
const SEPARATOR = '__';

/** Every key name the config schema knows, for restoring camelCase. */
const KNOWN_KEYS: readonly string[] = [
  ...Object.keys(CONFIG_SECTION_KEYS),
  ...Object.values(CONFIG_SECTION_KEYS).flat(),
];

interface EnvOverride {
  path: string[];
  value: string | number | boolean;
}

function coerce(value: string): string | number | boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (/^-?\d+(\.\d+)?$/.test(value)) {
    const num = Number(value);
    if (Number.isFinite(num)) return num;
  }
  return value;
}

/** `TETHER_` variables as override paths. Names with an empty segment are skipped. */
function collectOverrides(env: Record<string, string | undefined>): EnvOverride[] {
  const overrides: EnvOverride[] = [];
  for (const [name, raw] of Object.entries(env)) {
    if (raw === undefined || !name.startsWith(PREFIX)) continue;
    const path = name.slice(PREFIX.length).split(SEPARATOR);
    if (path.includes('')) continue;
    overrides.push({ path, value: coerce(raw) });
  }
  return overrides;
}

/**
 * Overlay `TETHER_` environment variables onto a config object, in place.
 *
 * `__` separates nesting levels and values become numbers or booleans
 * where they parse as such. Segments match case-insensitively, first
 * against keys already present, then against the keys the schema knows;
 * anything else is lowercased. The result still needs validating.
 *
 * Example: `TETHER_RETRY__MAXATTEMPTS=5` sets `config.retry.maxAttempts = 5`.
 */
export function applyEnvOverrides<T extends object>(
  config: T,
  env: Record<string, string | undefined> = process.env,
): T {
  const root = config as unknown as Record<string, unknown>;
  for (const { path, value } of collectOverrides(env)) {
    const leaf = path[path.length - 1] ?? '';
    const parent = path.slice(0, -1).reduce(descend, root);
    parent[matchKey(parent, leaf)] = value;
  }
  return config;
}

/** Step into `segment`, replacing a missing or scalar value with an empty object. */
function descend(node: Record<string, unknown>, segment: string): Record<string, unknown> {
  const key = matchKey(node, segment);
  const child = node[key];
  if (isRecord(child)) return child;
  const created: Record<string, unknown> = {};
  node[key] = created;
  return created;
}

function matchKey(node: Record<string, unknown>, segment: string): string {
  const lower = segment.toLowerCase();
  const sameKey = (k: string) => k.toLowerCase() === lower;
  return Object.keys(node).find(sameKey) ?? KNOWN_KEYS.find(sameKey) ?? lower;
}
