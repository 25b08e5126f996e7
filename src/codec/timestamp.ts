const MS_PER_DAY = 86_400_000;

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?(?:([Zz])|([+-])(\d{2}):?(\d{2}))?)?$/;

/** Days since 1970-01-01 for a proleptic Gregorian date. */
function daysFromCivil(year: number, month: number, day: number): number {
  const y = month <= 2 ? year - 1 : year;
  const era = Math.floor(y / 400);
  const yoe = y - era * 400;
  const doy = Math.floor((153 * ((month + 9) % 12) + 2) / 5) + day - 1;
  const doe = yoe * 365 + Math.floor(yoe / 4) - Math.floor(yoe / 100) + doy;
  return era * 146_097 + doe - 719_468;
}

/** Inverse of {@link daysFromCivil}. */
function civilFromDays(days: number): [year: number, month: number, day: number] {
  const z = days + 719_468;
  const era = Math.floor(z / 146_097);
  const doe = z - era * 146_097;
  const yoe = Math.floor((doe - Math.floor(doe / 1460) + Math.floor(doe / 36_524) - Math.floor(doe / 146_096)) / 365);
  const doy = doe - (365 * yoe + Math.floor(yoe / 4) - Math.floor(yoe / 100));
  const mp = Math.floor((5 * doy + 2) / 153);
  const day = doy - Math.floor((153 * mp + 2) / 5) + 1;
  const month = mp < 10 ? mp + 3 : mp - 9;
  const year = yoe + era * 400 + (month <= 2 ? 1 : 0);
  return [year, month, day];
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }

  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

const pad = (value: number, width: number) => String(value).padStart(width, '0');

/**
 * An instant in UTC with microsecond precision.
 *
 * The API emits six fractional digits; `Date` only holds milliseconds, so the
 * sub-millisecond remainder is kept alongside.
 */
export class Timestamp {
  /** Whole milliseconds since the epoch */
  readonly epochMs: number;
  /** Microseconds past `epochMs`, 0-999 */
  readonly micros: number;

  private constructor(epochMs: number, micros: number) {
    this.epochMs = epochMs;
    this.micros = micros;
    Object.freeze(this);
  }

  /**
   * Parses an ISO-8601 date or date-time. A missing offset is read as UTC.
   * Returns `null` for anything malformed, out of range or finer than microseconds.
   */
  static parse(value: string): Timestamp | null {
    const match = ISO_PATTERN.exec(value);
    if (!match) {
      return null;
    }

    const [, y, mo, d, h = '0', mi = '0', s = '0', fraction = '', zulu, sign, offH = '0', offM = '0'] = match;
    if (fraction.length > 6) {
      return null;
    }

    const year = Number(y);
    const month = Number(mo);
    const day = Number(d);
    const hour = Number(h);
    const minute = Number(mi);
    const second = Number(s);
    const offsetHours = Number(offH);
    const offsetMinutes = Number(offM);

    if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
      return null;
    }

    if (hour > 23 || minute > 59 || second > 59 || offsetHours > 23 || offsetMinutes > 59) {
      return null;
    }

    const totalMicros = Number(fraction.padEnd(6, '0'));
    const offset = zulu || !sign ? 0 : (sign === '-' ? -1 : 1) * (offsetHours * 60 + offsetMinutes);
    const epochMs =
      daysFromCivil(year, month, day) * MS_PER_DAY +
      ((hour * 60 + minute - offset) * 60 + second) * 1000 +
      Math.floor(totalMicros / 1000);

    return new Timestamp(epochMs, totalMicros % 1000);
  }

  /** Converts a `Date`; throws a `RangeError` for an invalid one, as `Date#toISOString` does. */
  static fromDate(date: Date): Timestamp {
    const epochMs = date.getTime();
    if (Number.isNaN(epochMs)) {
      throw new RangeError('Invalid time value');
    }

    return new Timestamp(epochMs, 0);
  }

  /** Builds a timestamp from whole microseconds since the epoch. */
  static fromEpochMicros(epochMicros: number): Timestamp {
    const epochMs = Math.floor(epochMicros / 1000);
    return new Timestamp(epochMs, epochMicros - epochMs * 1000);
  }

  /** Microseconds since the epoch */
  get epochMicros(): number {
    return this.epochMs * 1000 + this.micros;
  }

  /** Drops the sub-millisecond part. */
  toDate(): Date {
    return new Date(this.epochMs);
  }

  /** Canonical form, `YYYY-MM-DDTHH:MM:SS.ffffffZ`. */
  toISOString(): string {
    const days = Math.floor(this.epochMs / MS_PER_DAY);
    const msOfDay = this.epochMs - days * MS_PER_DAY;
    const [year, month, day] = civilFromDays(days);
    const hour = Math.floor(msOfDay / 3_600_000);
    const minute = Math.floor((msOfDay % 3_600_000) / 60_000);
    const second = Math.floor((msOfDay % 60_000) / 1000);
    const fraction = (msOfDay % 1000) * 1000 + this.micros;

    const date = `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
    const time = `${pad(hour, 2)}:${pad(minute, 2)}:${pad(second, 2)}.${pad(fraction, 6)}`;
    return `${date}T${time}Z`;
  }

  toJSON(): string {
    return this.toISOString();
  }

  toString(): string {
    return this.toISOString();
  }

  equals(other: Timestamp): boolean {
    return this.epochMs === other.epochMs && this.micros === other.micros;
  }

  /** Negative when this is earlier than `other`, positive when later. */
  compare(other: Timestamp): number {
    return this.epochMs - other.epochMs || this.micros - other.micros;
  }
}
