import Decimal from 'decimal.js';
import { divide, toDecimal } from './decimal.util';
import { daysBetween } from './date.util';

const DAYS_PER_YEAR = '365.25';

/** Capital gain: (current - purchase) × quantity. Negative on a loss. */
export function earnings(currentPrice: Decimal, purchasePrice: Decimal, quantity: number): Decimal {
  return currentPrice.minus(purchasePrice).times(quantity);
}

/**
 * Price appreciation as a percentage of the purchase price.
 * @throws Error('Division by zero') when purchasePrice is 0
 */
export function percentageYield(currentPrice: Decimal, purchasePrice: Decimal): Decimal {
  return divide(currentPrice.minus(purchasePrice), purchasePrice).times(100);
}

/** Whole calendar days held, in years of 365.25 days. Same-day purchases hold 0. */
export function yearsHeld(purchaseDate: Date, asOf: Date): Decimal {
  return toDecimal(daysBetween(purchaseDate, asOf)).dividedBy(DAYS_PER_YEAR);
}

/**
 * Annualized return, total return divided by years held, in percent.
 * A purchase dated today or in the future yields exactly 0.
 */
export function yearlyReturn(
  currentPrice: Decimal,
  purchasePrice: Decimal,
  purchaseDate: Date,
  asOf: Date = new Date(),
): Decimal {
  const held = yearsHeld(purchaseDate, asOf);
  if (held.lessThanOrEqualTo(0)) {
    return new Decimal(0);
  }
  const totalReturn = divide(currentPrice.minus(purchasePrice), purchasePrice);
  return divide(totalReturn, held).times(100);
}
