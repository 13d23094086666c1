import { ManifestError } from "./errors";

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
};

// setTimeout holds a signed 32-bit delay; longer ones fire immediately
const MAX_DELAY_MS = 2_147_483_647;

const DURATION = /^(?:\d+(?:\.\d+)?(?:ms|h|m|s))+$/;
const GROUP = /(\d+(?:\.\d+)?)(ms|h|m|s)/g;

/**
 * Accepts either a millisecond count or a compose-style duration such as
 * `"1m30s"` or `"500ms"`, and returns milliseconds.
 */
export const parseDuration = (value: unknown, field: string): number => {
  if (typeof value === "number") {
    if (!Number.isFinite(value) || value < 0) {
      throw new ManifestError(`${field} must be a non-negative duration`);
    }
    return withinTimerRange(Math.round(value), field);
  }

  if (typeof value !== "string") {
    throw new ManifestError(`${field} must be a duration like "10s" or a number of milliseconds`);
  }

  const raw = value.trim();
  if (!DURATION.test(raw)) {
    throw new ManifestError(`${field} has invalid duration "${value}"`);
  }

  let total = 0;
  for (const match of raw.matchAll(GROUP)) {
    const [, amount, unit] = match;
    total += Number(amount) * (UNIT_MS[unit] ?? 0);
  }
  return withinTimerRange(Math.round(total), field);
};

const withinTimerRange = (ms: number, field: string): number => {
  if (ms > MAX_DELAY_MS) {
    throw new ManifestError(`${field} must be at most ${MAX_DELAY_MS}ms (about 24 days)`);
  }
  return ms;
};
