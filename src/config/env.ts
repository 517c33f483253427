/**
 * Shared helpers dedicated to reading environment variables in a predictable
 * manner. Every reader takes the environment record explicitly (defaulting to
 * {@link process.env}) so tests can pass a plain object.
 */
const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

export type EnvRecord = Readonly<Record<string, string | undefined>>;

/** Normalises the raw value retrieved from the environment. */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }

  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/**
 * Reads the provided environment variable and interprets it as a boolean.
 *
 * The helper tolerates human-friendly variants ("1", "true", "yes", "on" for
 * truthy, "0", "false", "no", "off" for falsy) while falling back to the
 * supplied default when the variable is absent or ambiguous.
 */
export function readBool(name: string, defaultValue: boolean, env: EnvRecord = process.env): boolean {
  return readOptionalBool(name, env) ?? defaultValue;
}

/** Returns an optional boolean if {@link name} is set to a recognised literal. */
export function readOptionalBool(name: string, env: EnvRecord = process.env): boolean | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }

  const lower = normalised.toLowerCase();
  if (TRUE_LITERALS.has(lower)) {
    return true;
  }
  if (FALSE_LITERALS.has(lower)) {
    return false;
  }
  return undefined;
}

interface NumberOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

function withinBounds(value: number, options: NumberOptions | undefined): boolean {
  if (!Number.isFinite(value)) {
    return false;
  }
  if (options?.min !== undefined && value < options.min) {
    return false;
  }
  if (options?.max !== undefined && value > options.max) {
    return false;
  }
  return true;
}

/**
 * Reads the environment variable as an integer using base 10. Unexpected
 * values cause the helper to return the provided default.
 */
export function readInt(name: string, defaultValue: number, options?: NumberOptions, env: EnvRecord = process.env): number {
  return readOptionalInt(name, options, env) ?? defaultValue;
}

/** Returns an optional integer when {@link name} contains a valid base-10 literal. */
export function readOptionalInt(name: string, options?: NumberOptions, env: EnvRecord = process.env): number | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }

  if (!/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }

  const value = Number.parseInt(normalised, 10);
  // Literals beyond the safe integer range would silently lose precision.
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }

  return withinBounds(value, options) ? value : undefined;
}

/** Returns the trimmed string when {@link name} is set to a non-empty value. */
export function readOptionalString(name: string, env: EnvRecord = process.env): string | undefined {
  return normaliseEnvValue(env[name]);
}
