/**
 * Environment Utilities
 * Parses process.env values with range checks; invalid values fall back to the default with a warning.
 */

interface NumberOptions {
  min?: number;
  max?: number;
  fieldName?: string;
}

export class EnvironmentUtils {
  static parseInt(key: string, defaultValue: number, options: NumberOptions = {}): number {
    return this.parseNumber(key, defaultValue, options, value => Number.parseInt(value, 10), "integer");
  }

  static parseFloat(key: string, defaultValue: number, options: NumberOptions = {}): number {
    return this.parseNumber(key, defaultValue, options, value => Number.parseFloat(value), "float");
  }

  static parseBoolean(key: string, defaultValue: boolean, options: { fieldName?: string } = {}): boolean {
    const value = process.env[key];
    if (!value) return defaultValue;

    const lowerValue = value.toLowerCase();
    if (lowerValue === "true" || lowerValue === "1" || lowerValue === "yes") return true;
    if (lowerValue === "false" || lowerValue === "0" || lowerValue === "no") return false;

    console.warn(`Invalid boolean value "${value}" for ${options.fieldName || key}, using default ${defaultValue}`);
    return defaultValue;
  }

  static parseString(
    key: string,
    defaultValue: string,
    options: {
      pattern?: RegExp;
      fieldName?: string;
    } = {}
  ): string {
    const value = process.env[key];
    if (!value) return defaultValue;

    if (options.pattern && !options.pattern.test(value)) {
      console.warn(`Value for ${options.fieldName || key} doesn't match pattern, using default`);
      return defaultValue;
    }

    return value;
  }

  /**
   * Parse a value that must be one of `allowed`
   */
  static parseEnum<T extends string>(key: string, defaultValue: T, allowed: readonly T[]): T {
    const value = process.env[key];
    if (!value) return defaultValue;

    const match = allowed.find(candidate => candidate === value);
    if (match === undefined) {
      console.warn(`Value "${value}" for ${key} is not one of ${allowed.join(", ")}, using default ${defaultValue}`);
      return defaultValue;
    }
    return match;
  }

  /**
   * Parse comma-separated list from environment variable
   */
  static parseList(key: string, defaultValue: string[] = []): string[] {
    const value = process.env[key];
    if (!value) return defaultValue;

    return value
      .split(",")
      .map(item => item.trim())
      .filter(Boolean);
  }

  /**
   * Parse an optional string; empty means unset
   */
  static parseOptional(key: string): string | undefined {
    const value = process.env[key]?.trim();
    return value ? value : undefined;
  }

  private static parseNumber(
    key: string,
    defaultValue: number,
    options: NumberOptions,
    parse: (value: string) => number,
    kind: string
  ): number {
    const value = process.env[key];
    if (!value) return defaultValue;

    const name = options.fieldName || key;
    const parsed = parse(value);
    if (Number.isNaN(parsed)) {
      console.warn(`Invalid ${kind} value "${value}" for ${name}, using default ${defaultValue}`);
      return defaultValue;
    }

    if (options.min !== undefined && parsed < options.min) {
      console.warn(`Value ${parsed} for ${name} is below minimum ${options.min}, using default ${defaultValue}`);
      return defaultValue;
    }

    if (options.max !== undefined && parsed > options.max) {
      console.warn(`Value ${parsed} for ${name} is above maximum ${options.max}, using default ${defaultValue}`);
      return defaultValue;
    }

    return parsed;
  }
}
