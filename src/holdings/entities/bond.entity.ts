import Decimal from 'decimal.js';
import { toDecimal } from '../../common/utils/decimal.util';
import { HoldingConversionError } from '../holding.errors';
import { HoldingKind, Investment, InvestmentFields, parseDecimal } from './investment.entity';

// Bond as entered: yieldRate is percentage text such as "1.35%".
export interface BondFields extends InvestmentFields {
  coupon: string | number;
  yieldRate: string;
}

// Bond read back from the store: the yield rate is already a fraction.
export interface StoredBondFields extends InvestmentFields {
  coupon: string | number;
  yieldFraction: number;
}

/**
 * Strips a trailing '%' and divides by 100: "1.35%" -> 0.0135.
 * Text without the sign is divided as well, so "0.0135" becomes 0.000135.
 */
export function parseYieldRate(value: string): Decimal {
  const text = value.trim();
  const number = text.endsWith('%') ? text.slice(0, -1) : text;
  try {
    return parseDecimal('yieldRate', number).dividedBy(100);
  } catch {
    throw new HoldingConversionError('yieldRate', value, 'expected a percentage such as 1.35%');
  }
}

/**
 * Fixed-income holding. Earnings add yield income on top of the capital gain;
 * percentYield and yearlyReturn stay price-only, as inherited.
 */
export class Bond extends Investment {
  readonly kind: HoldingKind = HoldingKind.BOND;
  readonly coupon: Decimal;
  readonly yieldRate: Decimal;   // fraction, 0.0135 for 1.35%

  constructor(fields: BondFields | StoredBondFields) {
    super(fields);
    this.coupon = parseDecimal('coupon', fields.coupon);
    this.yieldRate = 'yieldFraction' in fields
      ? toDecimal(fields.yieldFraction)
      : parseYieldRate(fields.yieldRate);
  }

  /** Capital gain plus quantity × purchasePrice × yieldRate */
  earnings(): Decimal {
    const income = this.purchasePrice.times(this.quantity).times(this.yieldRate);
    return super.earnings().plus(income);
  }
}
