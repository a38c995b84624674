/**
 * Parsers for `validate*Environment` functions. Each throws with the service name in the
 * message so a bad deployment fails at boot, not on first use.
 */
export interface EnvParsers {
  requiredString(value: unknown, name: string): string;
  optionalString(value: unknown): string | undefined;
  positiveInt(value: unknown, fallback: number, name: string): number;
  nonNegativeInt(value: unknown, fallback: number, name: string): number;
  boolean(value: unknown, fallback: boolean, name: string): boolean;
  oneOf<const T extends string>(value: unknown, allowed: readonly T[], fallback: T, name: string): T;
}

export function createEnvParsers(serviceName: string): EnvParsers {
  const fail = (message: string): never => {
    throw new Error(`[${serviceName}] ${message}`);
  };

  const parseInteger = (value: unknown, fallback: number, name: string, min: number): number => {
    if (value === undefined || value === null || value === '') {
      return fallback;
    }

    const parsed = typeof value === 'number' ? value : Number.parseInt(String(value), 10);
    if (!Number.isFinite(parsed) || parsed < min) {
      return fail(`${name} must be ${min === 0 ? 'a non-negative' : 'a positive'} integer.`);
    }

    return Math.trunc(parsed);
  };

  return {
    requiredString(value, name) {
      return optionalString(value) ?? fail(`${name} is required.`);
    },
    optionalString,
    positiveInt(value, fallback, name) {
      return parseInteger(value, fallback, name, 1);
    },
    nonNegativeInt(value, fallback, name) {
      return parseInteger(value, fallback, name, 0);
    },
    boolean(value, fallback, name) {
      if (value === undefined || value === null || value === '') {
        return fallback;
      }

      if (typeof value === 'boolean') {
        return value;
      }

      const normalized = String(value).trim().toLowerCase();
      if (normalized === 'true') {
        return true;
      }
      if (normalized === 'false') {
        return false;
      }

      return fail(`${name} must be "true" or "false".`);
    },
    oneOf(value, allowed, fallback, name) {
      const normalized = optionalString(value)?.toLowerCase();
      if (normalized === undefined) {
        return fallback;
      }

      const match = allowed.find((candidate) => candidate === normalized);
      return match ?? fail(`${name} must be one of: ${allowed.join(', ')}.`);
    },
  };
}

function optionalString(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }

  const normalized = value.trim();
  return normalized.length > 0 ? normalized : undefined;
}
