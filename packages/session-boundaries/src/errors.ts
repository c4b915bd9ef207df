import { PriceBarsError } from '@pricebars/contracts';

/**
 * Thrown when bars handed to a session scan are not in strictly ascending
 * date-time order.
 */
export class UnorderedBarsError extends PriceBarsError {
  constructor(message: string, data: { index: number; previous: string; current: string }) {
    super('UNORDERED_BARS', message, data);
  }
}

export function isUnorderedBarsError(error: unknown): error is UnorderedBarsError {
  return error instanceof UnorderedBarsError;
}
