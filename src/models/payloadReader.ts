import { ResponseFormatError } from '../gitlab/errors';
import { isRecord } from '../utils/records';

type FieldKey<P> = Extract<keyof P, string>;

/**
 * Typed field extraction over a raw API record. Keys are checked against the payload interface at
 * compile time and values against the expected JSON type at run time; a mismatch raises
 * {@link ResponseFormatError} naming the entity and field.
 */
export class PayloadReader<P extends object> {
  private readonly payload: Record<string, unknown>;

  constructor(private readonly entity: string, raw: unknown) {
    if (!isRecord(raw)) {
      throw new ResponseFormatError(entity, 'expected a JSON object');
    }
    this.payload = raw;
  }

  number(key: FieldKey<P>): number {
    const value = this.payload[key];
    if (typeof value === 'number' && Number.isFinite(value)) {
      return value;
    }
    return this.fail(key, 'a number');
  }

  optionalNumber(key: FieldKey<P>): number | null {
    const value = this.payload[key];
    if (value === undefined || value === null) {
      return null;
    }
    return this.number(key);
  }

  string(key: FieldKey<P>): string {
    const value = this.payload[key];
    if (typeof value === 'string') {
      return value;
    }
    return this.fail(key, 'a string');
  }

  optionalString(key: FieldKey<P>): string | null {
    const value = this.payload[key];
    if (value === undefined || value === null) {
      return null;
    }
    return this.string(key);
  }

  stringOr(key: FieldKey<P>, fallback: string): string {
    return this.optionalString(key) ?? fallback;
  }

  boolean(key: FieldKey<P>, fallback = false): boolean {
    const value = this.payload[key];
    if (value === undefined || value === null) {
      return fallback;
    }
    if (typeof value === 'boolean') {
      return value;
    }
    return this.fail(key, 'a boolean');
  }

  oneOf<V extends string>(key: FieldKey<P>, allowed: readonly V[]): V {
    const value = this.string(key);
    const match = allowed.find(candidate => candidate === value);
    if (match === undefined) {
      return this.fail(key, `one of ${allowed.join(', ')} (received "${value}")`);
    }
    return match;
  }

  optionalOneOf<V extends string>(key: FieldKey<P>, allowed: readonly V[]): V | null {
    const value = this.payload[key];
    if (value === undefined || value === null) {
      return null;
    }
    return this.oneOf(key, allowed);
  }

  /**
   * Opens a reader over a nested object field, or returns `null` when the field is absent.
   */
  nested<K extends FieldKey<P>>(key: K): PayloadReader<Extract<NonNullable<P[K]>, object>> | null {
    const value = this.payload[key];
    if (value === undefined || value === null) {
      return null;
    }
    if (!isRecord(value)) {
      return this.fail(key, 'an object');
    }
    return new PayloadReader<Extract<NonNullable<P[K]>, object>>(`${this.entity}.${key}`, value);
  }

  list(key: FieldKey<P>): unknown[] {
    const value = this.payload[key];
    if (value === undefined || value === null) {
      return [];
    }
    if (Array.isArray(value)) {
      return value;
    }
    return this.fail(key, 'an array');
  }

  private fail(key: string, expected: string): never {
    throw new ResponseFormatError(this.entity, `field "${key}" must be ${expected}`);
  }
}
