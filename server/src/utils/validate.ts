export type ValidationResult<T> = { ok: true; value: T } | { ok: false; error: string };

function fail<T>(error: string): ValidationResult<T> {
  return { ok: false, error };
}

type StringOpts = {
  field?: string;
  required?: boolean;
  trim?: boolean;
  maxLen?: number;
};

export function asString(raw: unknown, opts: StringOpts & { required: true }): ValidationResult<string>;
export function asString(raw: unknown, opts?: StringOpts): ValidationResult<string | undefined>;
export function asString(raw: unknown, opts?: StringOpts): ValidationResult<string | undefined> {
  const field = opts?.field ?? "value";
  const required = opts?.required ?? false;
  if (raw === undefined || raw === null) {
    if (required) return fail(`${field} is required`);
    return { ok: true, value: undefined };
  }

  if (typeof raw !== "string") {
    return fail(`${field} must be a string`);
  }

  let s = raw;
  if (opts?.trim) s = s.trim();

  if (required && !s) return fail(`${field} is required`);
  if (opts?.maxLen !== undefined && s.length > opts.maxLen) return fail(`${field} is too long`);

  return { ok: true, value: s };
}

type IntegerOpts = {
  field?: string;
  required?: boolean;
  min?: number;
};

/**
 * Accepts a JSON number or, for path and query values, a decimal string.
 * An empty string counts as absent.
 */
export function asInteger(raw: unknown, opts: IntegerOpts & { required: true }): ValidationResult<number>;
export function asInteger(raw: unknown, opts?: IntegerOpts): ValidationResult<number | undefined>;
export function asInteger(raw: unknown, opts?: IntegerOpts): ValidationResult<number | undefined> {
  const field = opts?.field ?? "value";
  const required = opts?.required ?? false;

  const blank = raw === undefined || raw === null || (typeof raw === "string" && !raw.trim());
  if (blank) {
    if (required) return fail(`${field} is required`);
    return { ok: true, value: undefined };
  }

  let n: number;
  if (typeof raw === "number") {
    n = raw;
  } else if (typeof raw === "string" && /^[+-]?\d+$/.test(raw.trim())) {
    n = Number(raw.trim());
  } else {
    return fail(`${field} must be an integer`);
  }

  if (!Number.isSafeInteger(n)) return fail(`${field} must be an integer`);
  if (opts?.min !== undefined && n < opts.min) return fail(`${field} must be >= ${opts.min}`);

  return { ok: true, value: n };
}

export function asArray(raw: unknown, opts?: { field?: string; maxLen?: number }): ValidationResult<unknown[]> {
  const field = opts?.field ?? "value";
  if (!Array.isArray(raw)) return fail(`${field} must be an array`);
  if (opts?.maxLen !== undefined && raw.length > opts.maxLen) return fail(`${field} is too long`);
  return { ok: true, value: raw };
}

export function asRecord(raw: unknown, opts?: { field?: string }): ValidationResult<Record<string, unknown>> {
  const field = opts?.field ?? "value";
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    return fail(`${field} must be an object`);
  }
  return { ok: true, value: { ...raw } };
}

/**
 * Reads `name` from a request record ignoring case, so `LocationId`,
 * `locationId` and `locationid` all bind. An exact match wins.
 */
export function pick(record: Record<string, unknown>, name: string): unknown {
  if (name in record) return record[name];
  const lower = name.toLowerCase();
  for (const [key, value] of Object.entries(record)) {
    if (key.toLowerCase() === lower) return value;
  }
  return undefined;
}

/** Like `pick`, but an empty or blank string counts as absent. */
export function pickPresent(record: Record<string, unknown>, name: string): unknown {
  const value = pick(record, name);
  if (typeof value === "string" && !value.trim()) return undefined;
  return value;
}
