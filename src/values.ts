// src/values.ts

const DECIMAL_RE = /^-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?$/;

/**
 * An arbitrary-precision decimal carried as its literal text so it reaches
 * the wire without a float round trip.
 */
export class Decimal {
  private readonly text: string;

  constructor(text: string) {
    if (!DECIMAL_RE.test(text)) throw new Error(`not a decimal literal: "${text}"`);
    this.text = text;
  }

  toString(): string {
    return this.text;
  }
}

/** A date with no time of day. */
export class CalendarDate {
  readonly year: number;
  readonly month: number; // 1..12
  readonly day: number;

  constructor(year: number, month: number, day: number) {
    if (!Number.isInteger(year) || year < 1 || year > 9999) throw new Error(`year must be 1..9999 (got ${year})`);
    if (!Number.isInteger(month) || month < 1 || month > 12) throw new Error(`month must be 1..12 (got ${month})`);
    const daysInMonth = new Date(Date.UTC(2000, month, 0)).getUTCDate() - (month === 2 && !isLeap(year) ? 1 : 0);
    if (!Number.isInteger(day) || day < 1 || day > daysInMonth) {
      throw new Error(`day must be 1..${daysInMonth} (got ${day})`);
    }
    this.year = year;
    this.month = month;
    this.day = day;
  }

  /** Parses "YYYY-MM-DD". */
  static parse(text: string): CalendarDate {
    const m = /^(\d{4})-(\d{2})-(\d{2})$/.exec(text);
    if (!m) throw new Error(`not a calendar date: "${text}"`);
    return new CalendarDate(Number(m[1]), Number(m[2]), Number(m[3]));
  }

  toString(): string {
    return `${pad(this.year, 4)}-${pad(this.month, 2)}-${pad(this.day, 2)}`;
  }
}

/**
 * Everything the serializer knows how to put on the wire. Object members
 * that are `undefined` are dropped, like JSON.stringify does.
 */
export type WireValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | Date
  | CalendarDate
  | Decimal
  | readonly WireValue[]
  | ReadonlySet<WireValue>
  | WireObject;

export interface WireObject {
  readonly [key: string]: WireValue | undefined;
}

/** Values that can stand in a query string. */
export type ScalarValue = boolean | number | bigint | string | Date | CalendarDate | Decimal | readonly ScalarValue[];

function isLeap(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function pad(n: number, width: number): string {
  return String(n).padStart(width, "0");
}
