/**
 * Helpers reading environment variables with consistent coercion rules. Every
 * reader accepts an optional source so configuration can be resolved from a
 * plain record in tests instead of mutating {@link process.env}.
 */

/** Key/value view over environment variables. */
export type EnvSource = Readonly<Record<string, string | undefined>>;

/** Returns the trimmed value, treating blanks as unset. */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

export interface NumberOptions {
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

/** Returns an optional integer when {@link name} contains a valid base-10 literal. */
export function readOptionalInt(
  name: string,
  options?: NumberOptions,
  env: EnvSource = process.env,
): number | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised || !/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }
  const value = Number.parseInt(normalised, 10);
  // Literals beyond the safe integer range would be silently rounded.
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }
  return withinBounds(value, options) ? value : undefined;
}

export function readInt(
  name: string,
  defaultValue: number,
  options?: NumberOptions,
  env: EnvSource = process.env,
): number {
  return readOptionalInt(name, options, env) ?? defaultValue;
}

/** Returns the trimmed string when {@link name} is set to a non-empty value. */
export function readOptionalString(name: string, env: EnvSource = process.env): string | undefined {
  return normaliseEnvValue(env[name]);
}

/**
 * Reads an enum-like variable, validating it against the allow-list. Mixed
 * case and surrounding whitespace are tolerated; unknown literals read as
 * unset.
 */
export function readOptionalEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  env: EnvSource = process.env,
): T | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }
  const lower = normalised.toLowerCase();
  return allowed.find((value) => value.toLowerCase() === lower);
}
