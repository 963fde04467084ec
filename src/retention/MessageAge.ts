import { InvalidMessageAgeError } from '../errors/RetentionErrors.js';
import { AgeConversion, DEFAULT_AGE_CONVERSION } from '../types/index.js';

export const AgeUnit = {
  DAYS: 'days',
  WEEKS: 'weeks',
  MONTHS: 'months',
  YEARS: 'years',
} as const;
export type AgeUnit = typeof AgeUnit[keyof typeof AgeUnit];

const UNIT_BY_CODE: Readonly<Record<string, AgeUnit | undefined>> = {
  d: AgeUnit.DAYS,
  w: AgeUnit.WEEKS,
  m: AgeUnit.MONTHS,
  y: AgeUnit.YEARS,
};

const CODE_BY_UNIT: Readonly<Record<AgeUnit, string>> = {
  days: 'd',
  weeks: 'w',
  months: 'm',
  years: 'y',
};

const SINGULAR: Readonly<Record<AgeUnit, string>> = {
  days: 'day',
  weeks: 'week',
  months: 'month',
  years: 'year',
};

/**
 * Minimum age a message must reach before a rule disposes of it.
 *
 * Written in configuration as a compact token: `d:30`, `w:2`, `m:6`, `y:1`.
 * Instances are immutable.
 */
export class MessageAge {
  private constructor(
    readonly unit: AgeUnit,
    readonly count: number
  ) {
    Object.freeze(this);
  }

  static of(unit: AgeUnit, count: number): MessageAge {
    if (!Number.isSafeInteger(count) || count <= 0) {
      throw new InvalidMessageAgeError({
        token: `${CODE_BY_UNIT[unit]}:${count}`,
        reason: 'count',
        count: String(count),
      });
    }
    return new MessageAge(unit, count);
  }

  static days(count: number): MessageAge {
    return MessageAge.of(AgeUnit.DAYS, count);
  }

  static weeks(count: number): MessageAge {
    return MessageAge.of(AgeUnit.WEEKS, count);
  }

  static months(count: number): MessageAge {
    return MessageAge.of(AgeUnit.MONTHS, count);
  }

  static years(count: number): MessageAge {
    return MessageAge.of(AgeUnit.YEARS, count);
  }

  /**
   * Parse a `unit:count` token. The unit is case-insensitive.
   * @throws InvalidMessageAgeError with `reason` telling a bad shape, an
   * unknown unit and a bad count apart
   */
  static parse(token: string): MessageAge {
    const match = /^([A-Za-z]+):(.*)$/.exec(token.trim());
    if (!match) {
      throw new InvalidMessageAgeError({ token, reason: 'format' });
    }

    const code = match[1];
    const rawCount = match[2].trim();
    const unit = UNIT_BY_CODE[code.toLowerCase()];
    if (!unit) {
      throw new InvalidMessageAgeError({ token, reason: 'unit', unit: code });
    }

    const count = /^\d+$/.test(rawCount) ? Number(rawCount) : NaN;
    if (!Number.isSafeInteger(count) || count <= 0) {
      throw new InvalidMessageAgeError({ token, reason: 'count', count: rawCount });
    }

    return new MessageAge(unit, count);
  }

  toToken(): string {
    return `${CODE_BY_UNIT[this.unit]}:${this.count}`;
  }

  toDays(conversion: AgeConversion = DEFAULT_AGE_CONVERSION): number {
    switch (this.unit) {
      case AgeUnit.DAYS:
        return this.count;
      case AgeUnit.WEEKS:
        return this.count * conversion.daysPerWeek;
      case AgeUnit.MONTHS:
        return this.count * conversion.daysPerMonth;
      case AgeUnit.YEARS:
        return this.count * conversion.daysPerYear;
    }
  }

  /** Search predicate fragment selecting messages older than this age. */
  render(conversion: AgeConversion = DEFAULT_AGE_CONVERSION): string {
    return `older_than:${this.toDays(conversion)}d`;
  }

  /** "1 month", "5 years" */
  describe(): string {
    const noun = SINGULAR[this.unit];
    return `${this.count} ${this.count > 1 ? `${noun}s` : noun}`;
  }

  /** "5-years"; used in marker label names */
  slug(): string {
    return `${this.count}-${this.unit}`;
  }

  equals(other: MessageAge): boolean {
    return this.unit === other.unit && this.count === other.count;
  }

  compareTo(other: MessageAge): number {
    if (this.unit !== other.unit) {
      throw new RangeError(
        `Cannot compare ${this.toToken()} with ${other.toToken()}: ages are only ordered within one unit`
      );
    }
    return this.count - other.count;
  }

  toString(): string {
    return this.toToken();
  }

  toJSON(): string {
    return this.toToken();
  }
}
