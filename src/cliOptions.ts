import { toUnixSeconds } from './utils/time.js';

export function parsePositiveInteger(value: string | undefined, fallback: number, flagName: string): number {
  if (value === undefined) {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Option --${flagName} must be a positive number.`);
  }
  return Math.floor(parsed);
}

export function parseOptionalPositiveInteger(value: string | undefined, flagName: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  return parsePositiveInteger(value, 0, flagName);
}

export function parseCommaList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  const seen = new Set<string>();
  const parts: string[] = [];
  for (const rawPart of value.split(',')) {
    const trimmed = rawPart.trim();
    if (!trimmed) {
      continue;
    }
    const key = trimmed.toUpperCase();
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    parts.push(trimmed);
  }
  return parts;
}

export function determineEpoch(value: string | undefined, fallback: number, flagName: string): number {
  if (value === undefined) {
    return fallback;
  }

  try {
    return toUnixSeconds(value);
  } catch {
    throw new Error(`Option --${flagName} must be an ISO date or epoch seconds, got "${value}".`);
  }
}

/** Maps and sets have no JSON form; print them as an object and a sorted array. */
export function toPrintable(value: unknown): unknown {
  if (value instanceof Map) {
    return Object.fromEntries([...value.entries()].map(([key, entry]) => [String(key), entry]));
  }
  if (value instanceof Set) {
    return [...value].map(String).sort();
  }
  return value;
}

export function createLogger(scope: string, enabled: boolean) {
  return (message: string) => {
    if (enabled) {
      console.error(`[${scope}] ${message}`);
    }
  };
}
