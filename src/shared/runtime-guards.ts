export function isRecordLike(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === 'object' && value !== null;
}

export function parseNonNegativeSafeInteger(value: unknown): number | null {
  if (typeof value !== 'number') {
    return null;
  }

  if (!Number.isSafeInteger(value) || value < 0) {
    return null;
  }

  return Math.trunc(value);
}

const STRICT_INTEGER_PATTERN = /^\d+$/u;

export function parseStrictIntegerString(value: string | undefined): number | null {
  if (value === undefined || !STRICT_INTEGER_PATTERN.test(value.trim())) {
    return null;
  }

  return parseNonNegativeSafeInteger(Number(value.trim()));
}
