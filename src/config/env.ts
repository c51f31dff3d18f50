/**
 * Helpers reading environment variables with predictable coercion rules. The
 * readers are bound to an explicit source so tests can hand in a plain record
 * instead of mutating `process.env`.
 */
const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

/** Shape of the environment consumed by the readers. */
export type EnvSource = Readonly<Record<string, string | undefined>>;

interface NumberBounds {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

function withinBounds(value: number, bounds: NumberBounds | undefined): boolean {
  if (!Number.isFinite(value)) {
    return false;
  }
  if (bounds?.min !== undefined && value < bounds.min) {
    return false;
  }
  if (bounds?.max !== undefined && value > bounds.max) {
    return false;
  }
  return true;
}

/**
 * Typed accessors over an {@link EnvSource}. Unset, blank or malformed values
 * resolve to `undefined` (optional readers) or to the supplied default.
 */
export interface EnvReader {
  optionalString(name: string): string | undefined;
  string(name: string, defaultValue: string): string;
  optionalBool(name: string): boolean | undefined;
  bool(name: string, defaultValue: boolean): boolean;
  optionalInt(name: string, bounds?: NumberBounds): number | undefined;
  int(name: string, defaultValue: number, bounds?: NumberBounds): number;
  optionalEnum<T extends string>(name: string, allowed: readonly T[]): T | undefined;
  enumOf<T extends string>(name: string, allowed: readonly T[], defaultValue: T): T;
  /** Returns true when at least one of the variables holds a non-blank value. */
  anyPresent(names: readonly string[]): boolean;
}

/** Builds an {@link EnvReader} bound to the provided source. */
export function createEnvReader(env: EnvSource = process.env): EnvReader {
  const optionalString = (name: string): string | undefined => {
    const raw = env[name];
    if (typeof raw !== "string") {
      return undefined;
    }
    const trimmed = raw.trim();
    return trimmed.length === 0 ? undefined : trimmed;
  };

  const optionalBool = (name: string): boolean | undefined => {
    const value = optionalString(name)?.toLowerCase();
    if (value === undefined) {
      return undefined;
    }
    if (TRUE_LITERALS.has(value)) {
      return true;
    }
    if (FALSE_LITERALS.has(value)) {
      return false;
    }
    return undefined;
  };

  const optionalInt = (name: string, bounds?: NumberBounds): number | undefined => {
    const value = optionalString(name);
    if (value === undefined || !/^[-+]?\d+$/.test(value)) {
      return undefined;
    }
    const parsed = Number.parseInt(value, 10);
    if (!Number.isSafeInteger(parsed)) {
      return undefined;
    }
    return withinBounds(parsed, bounds) ? parsed : undefined;
  };

  const optionalEnum = <T extends string>(name: string, allowed: readonly T[]): T | undefined => {
    const value = optionalString(name)?.toLowerCase();
    if (value === undefined) {
      return undefined;
    }
    return allowed.find((candidate) => candidate.toLowerCase() === value);
  };

  return {
    optionalString,
    string: (name, defaultValue) => optionalString(name) ?? defaultValue,
    optionalBool,
    bool: (name, defaultValue) => optionalBool(name) ?? defaultValue,
    optionalInt,
    int: (name, defaultValue, bounds) => optionalInt(name, bounds) ?? defaultValue,
    optionalEnum,
    enumOf: (name, allowed, defaultValue) => optionalEnum(name, allowed) ?? defaultValue,
    anyPresent: (names) => names.some((name) => optionalString(name) !== undefined),
  };
}
