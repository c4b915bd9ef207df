/**
 * @fileoverview A single OHLCV observation for one instrument.
 *
 * Price fields are fixed at construction and validated against the six OHLC
 * ordering rules. The two session fields are filled in later by a
 * session-boundary scan.
 *
 * @module @pricebars/contracts/bar
 */

import {
  InvalidBarInputError,
  InvariantViolationError,
  UndefinedAdjustmentError,
  type BarRule,
} from './errors.js';

/**
 * Plain-object form of a bar's price and time fields.
 *
 * @example
 * ```typescript
 * const fields: BarFields = {
 *   dateTime: new Date('2024-03-04T14:30:00.000Z'),
 *   open: 100.5,
 *   high: 101.25,
 *   low: 100.0,
 *   close: 101.0,
 *   volume: 1500000,
 *   adjClose: 50.5,
 * };
 * ```
 */
export interface BarFields {
  dateTime: Date;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  adjClose: number;
}

interface OrderingRule {
  rule: BarRule;
  description: string;
  holds: (bar: Pick<BarFields, 'open' | 'high' | 'low' | 'close'>) => boolean;
}

/**
 * Checked in this order; violations are reported in the same order.
 *
 * @internal
 */
const ORDERING_RULES: readonly OrderingRule[] = [
  { rule: 'H>=O', description: '(H)igh !>= (O)pen.', holds: (b) => b.high >= b.open },
  { rule: 'H>=L', description: '(H)igh !>= (L)ow.', holds: (b) => b.high >= b.low },
  { rule: 'H>=C', description: '(H)igh !>= (C)lose.', holds: (b) => b.high >= b.close },
  { rule: 'L<=O', description: '(L)ow !<= (O)pen.', holds: (b) => b.low <= b.open },
  { rule: 'L<=H', description: '(L)ow !<= (H)igh.', holds: (b) => b.low <= b.high },
  { rule: 'L<=C', description: '(L)ow !<= (C)lose.', holds: (b) => b.low <= b.close },
];

const NUMERIC_FIELDS = ['open', 'high', 'low', 'close', 'volume', 'adjClose'] as const;

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Formats a date as `YYYY.MM.DD HH:MM` using UTC fields.
 */
function formatMinute(date: Date): string {
  return (
    `${date.getUTCFullYear()}.${pad2(date.getUTCMonth() + 1)}.${pad2(date.getUTCDate())} ` +
    `${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}`
  );
}

function renderBar(fields: BarFields): string {
  return (
    `DT: ${formatMinute(fields.dateTime)}, ` +
    `O: ${fields.open.toFixed(2)}, ` +
    `H: ${fields.high.toFixed(2)}, ` +
    `L: ${fields.low.toFixed(2)}, ` +
    `C: ${fields.close.toFixed(2)}, ` +
    `V: ${Math.trunc(fields.volume)}`
  );
}

/**
 * A symbol's prices at a given time.
 *
 * @invariant high >= open, high >= low, high >= close
 * @invariant low <= open, low <= high, low <= close
 * @invariant sessionClose === true implies barsUntilSessionClose === 0
 *
 * @example
 * ```typescript
 * const bar = new Bar(new Date('2024-03-04T14:30:00Z'), 10, 12, 9, 11, 5000, 5.5);
 * bar.adjHigh();  // 6
 *
 * new Bar(new Date('2024-03-04T14:30:00Z'), 10, 5, 1, 8, 0, 8);
 * // throws InvariantViolationError with violations ['H>=O', 'H>=C']
 * ```
 */
export class Bar {
  private readonly _dateTime: Date;
  private readonly _open: number;
  private readonly _high: number;
  private readonly _low: number;
  private readonly _close: number;
  private readonly _volume: number;
  private readonly _adjClose: number;
  private _sessionClose = false;
  private _barsUntilSessionClose: number | null = null;

  /**
   * @param dateTime - Bar timestamp; time zone handling is the caller's concern
   * @param open - Opening price
   * @param high - Highest price
   * @param low - Lowest price
   * @param close - Closing price
   * @param volume - Traded volume
   * @param adjClose - Closing price adjusted for splits and dividends
   * @throws {InvalidBarInputError} If the date is invalid or a number is not finite
   * @throws {InvariantViolationError} If any OHLC ordering rule is broken
   */
  constructor(
    dateTime: Date,
    open: number,
    high: number,
    low: number,
    close: number,
    volume: number,
    adjClose: number
  ) {
    const fields: BarFields = { dateTime, open, high, low, close, volume, adjClose };
    Bar.checkInputs(fields);

    const violations = ORDERING_RULES.filter((rule) => !rule.holds(fields));
    if (violations.length > 0) {
      const rendered = renderBar(fields);
      throw new InvariantViolationError(
        violations.map((v) => `${v.description} (${rendered})`).join('\n'),
        { violations: violations.map((v) => v.rule), bar: rendered }
      );
    }

    this._dateTime = new Date(dateTime.getTime());
    this._open = open;
    this._high = high;
    this._low = low;
    this._close = close;
    this._volume = volume;
    this._adjClose = adjClose;
  }

  /**
   * Builds a bar from a plain object.
   */
  static fromFields(fields: BarFields): Bar {
    return new Bar(
      fields.dateTime,
      fields.open,
      fields.high,
      fields.low,
      fields.close,
      fields.volume,
      fields.adjClose
    );
  }

  private static checkInputs(fields: BarFields): void {
    if (!(fields.dateTime instanceof Date) || Number.isNaN(fields.dateTime.getTime())) {
      throw new InvalidBarInputError('Bar dateTime must be a valid Date', {
        field: 'dateTime',
        value: fields.dateTime,
      });
    }
    for (const field of NUMERIC_FIELDS) {
      if (!Number.isFinite(fields[field])) {
        throw new InvalidBarInputError(`Bar ${field} must be a finite number`, {
          field,
          value: fields[field],
        });
      }
    }
  }

  get dateTime(): Date {
    return new Date(this._dateTime.getTime());
  }

  get open(): number {
    return this._open;
  }

  get high(): number {
    return this._high;
  }

  get low(): number {
    return this._low;
  }

  get close(): number {
    return this._close;
  }

  get volume(): number {
    return this._volume;
  }

  get adjClose(): number {
    return this._adjClose;
  }

  /** True if this is the last bar of its trading session */
  get sessionClose(): boolean {
    return this._sessionClose;
  }

  /** Bars remaining until the session closes, or null if not yet known */
  get barsUntilSessionClose(): number | null {
    return this._barsUntilSessionClose;
  }

  /**
   * Adjusted opening price, `adjClose * open / close`.
   *
   * @throws {UndefinedAdjustmentError} If close is zero
   */
  adjOpen(): number {
    return this.adjust('open', this._open);
  }

  /**
   * Adjusted high, `adjClose * high / close`.
   *
   * @throws {UndefinedAdjustmentError} If close is zero
   */
  adjHigh(): number {
    return this.adjust('high', this._high);
  }

  /**
   * Adjusted low, `adjClose * low / close`.
   *
   * @throws {UndefinedAdjustmentError} If close is zero
   */
  adjLow(): number {
    return this.adjust('low', this._low);
  }

  private adjust(field: 'open' | 'high' | 'low', raw: number): number {
    if (this._close === 0) {
      throw new UndefinedAdjustmentError(
        `Cannot compute adjusted ${field}: close is zero (${this.toString()})`,
        { field, close: this._close, adjClose: this._adjClose }
      );
    }
    return (this._adjClose * raw) / this._close;
  }

  /**
   * Marks or unmarks this bar as the last one of its session. Marking it
   * also resets the countdown to 0.
   */
  setSessionClose(sessionClose: boolean): void {
    this._sessionClose = sessionClose;
    if (sessionClose) {
      this._barsUntilSessionClose = 0;
    }
  }

  /**
   * Sets the countdown to the session close. Does not touch `sessionClose`.
   *
   * @throws {InvalidBarInputError} If the count is not null or a non-negative integer
   */
  setBarsUntilSessionClose(barsUntilSessionClose: number | null): void {
    if (
      barsUntilSessionClose !== null &&
      (!Number.isInteger(barsUntilSessionClose) || barsUntilSessionClose < 0)
    ) {
      throw new InvalidBarInputError('barsUntilSessionClose must be a non-negative integer', {
        field: 'barsUntilSessionClose',
        value: barsUntilSessionClose,
      });
    }
    this._barsUntilSessionClose = barsUntilSessionClose;
  }

  /**
   * Compares time and price fields. Session fields are ignored.
   */
  equals(other: unknown): boolean {
    if (!(other instanceof Bar)) {
      return false;
    }
    return (
      this._dateTime.getTime() === other._dateTime.getTime() &&
      this._open === other._open &&
      this._high === other._high &&
      this._low === other._low &&
      this._close === other._close &&
      this._volume === other._volume &&
      this._adjClose === other._adjClose
    );
  }

  /**
   * Snapshot of the time and price fields as a plain object.
   */
  toFields(): BarFields {
    return {
      dateTime: this.dateTime,
      open: this._open,
      high: this._high,
      low: this._low,
      close: this._close,
      volume: this._volume,
      adjClose: this._adjClose,
    };
  }

  /**
   * `DT: 2024.03.04 14:30, O: 10.00, H: 12.00, L: 9.00, C: 11.00, V: 5000`
   */
  toString(): string {
    return renderBar(this.toFields());
  }
}
