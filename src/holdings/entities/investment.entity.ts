import Decimal from 'decimal.js';
import { toDecimal } from '../../common/utils/decimal.util';
import { parseUsDate } from '../../common/utils/date.util';
import { earnings, percentageYield, yearlyReturn } from '../../common/utils/metrics.util';
import { HoldingConversionError } from '../holding.errors';

export enum HoldingKind {
  STOCK = 'stock',
  BOND = 'bond',
}

// Raw values as they arrive from a parsed line, a DTO or a stored row.
export interface InvestmentFields {
  purchaseId: string;
  symbol: string;
  quantity: string | number;
  purchasePrice: string | number;
  currentPrice: string | number;
  purchaseDate: string;           // MM/DD/YYYY, kept as written
}

// Plain decimal notation only; hex, NaN and Infinity are rejected.
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function parseQuantity(value: string | number): number {
  const text = String(value).trim();
  if (!/^[+-]?\d+$/.test(text)) {
    throw new HoldingConversionError('quantity', value, 'expected a whole number of shares');
  }
  const quantity = Number(text);
  if (!Number.isSafeInteger(quantity)) {
    throw new HoldingConversionError('quantity', value, 'too large to count exactly');
  }
  return quantity;
}

export function parseDecimal(field: string, value: string | number): Decimal {
  const text = String(value).trim();
  if (!DECIMAL_PATTERN.test(text)) {
    throw new HoldingConversionError(field, value, 'expected a decimal number');
  }
  return toDecimal(text);
}

/**
 * Equity holding. Values are coerced once at construction and never change;
 * metrics are computed on demand from the stored fields.
 */
export class Investment {
  readonly kind: HoldingKind = HoldingKind.STOCK;
  readonly purchaseId: string;
  readonly symbol: string;
  readonly quantity: number;
  readonly purchasePrice: Decimal;
  readonly currentPrice: Decimal;
  readonly purchaseDate: string;
  readonly purchasedOn: Date;

  /** @throws HoldingConversionError if any value cannot be coerced */
  constructor(fields: InvestmentFields) {
    this.purchaseId = fields.purchaseId;
    this.symbol = fields.symbol;
    this.quantity = parseQuantity(fields.quantity);
    this.purchasePrice = parseDecimal('purchasePrice', fields.purchasePrice);
    this.currentPrice = parseDecimal('currentPrice', fields.currentPrice);

    // used as a divisor by percentYield and yearlyReturn
    if (!this.purchasePrice.greaterThan(0)) {
      throw new HoldingConversionError('purchasePrice', fields.purchasePrice, 'must be positive');
    }

    const purchasedOn = parseUsDate(fields.purchaseDate);
    if (!purchasedOn) {
      throw new HoldingConversionError('purchaseDate', fields.purchaseDate, 'expected MM/DD/YYYY');
    }
    this.purchaseDate = fields.purchaseDate.trim();
    this.purchasedOn = purchasedOn;
  }

  earnings(): Decimal {
    return earnings(this.currentPrice, this.purchasePrice, this.quantity);
  }

  percentYield(): Decimal {
    return percentageYield(this.currentPrice, this.purchasePrice);
  }

  yearlyReturn(asOf: Date = new Date()): Decimal {
    return yearlyReturn(this.currentPrice, this.purchasePrice, this.purchasedOn, asOf);
  }
}
