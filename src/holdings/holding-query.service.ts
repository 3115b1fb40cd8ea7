import { Injectable } from '@nestjs/common';
import { Investment } from './entities/investment.entity';
import { Bond } from './entities/bond.entity';
import { StockMetricsDto, BondMetricsDto } from './dto/holding-response.dto';
import { toNumber } from '../common/utils/decimal.util';

export type EarningsFilter = 'positive' | 'negative';

export function isEarningsFilter(value: string): value is EarningsFilter {
  return value === 'positive' || value === 'negative';
}

// Read-only views over holdings, shared by the HTTP API and the interactive filter.
@Injectable()
export class HoldingQueryService {
  /** Holdings with a gain, in input order */
  withPositiveEarnings<T extends Investment>(holdings: T[]): T[] {
    return holdings.filter((holding) => holding.earnings().greaterThan(0));
  }

  /** Holdings with a loss, in input order */
  withNegativeEarnings<T extends Investment>(holdings: T[]): T[] {
    return holdings.filter((holding) => holding.earnings().lessThan(0));
  }

  /** Highest annualized return first. Does not reorder the input. */
  sortByYearlyReturn<T extends Investment>(holdings: T[], asOf: Date = new Date()): T[] {
    return holdings
      .map((holding) => ({ holding, yearly: holding.yearlyReturn(asOf) }))
      .sort((a, b) => b.yearly.comparedTo(a.yearly))
      .map(({ holding }) => holding);
  }

  /**
   * First holding whose symbol equals the upper-cased input.
   * Stored symbols are compared as written.
   */
  findBySymbol<T extends Investment>(holdings: T[], symbol: string): T | undefined {
    const wanted = symbol.trim().toUpperCase();
    return holdings.find((holding) => holding.symbol === wanted);
  }

  filterByEarnings<T extends Investment>(holdings: T[], filter?: EarningsFilter): T[] {
    if (filter === 'positive') {
      return this.withPositiveEarnings(holdings);
    }
    if (filter === 'negative') {
      return this.withNegativeEarnings(holdings);
    }
    return holdings;
  }

  toStockMetrics(stock: Investment, asOf: Date = new Date()): StockMetricsDto {
    return {
      purchaseId: stock.purchaseId,
      symbol: stock.symbol,
      quantity: stock.quantity,
      earnings: toNumber(stock.earnings()),
      percentYield: toNumber(stock.percentYield()),
      yearlyReturn: toNumber(stock.yearlyReturn(asOf)),
    };
  }

  toBondMetrics(bond: Bond): BondMetricsDto {
    return {
      purchaseId: bond.purchaseId,
      symbol: bond.symbol,
      quantity: bond.quantity,
      earnings: toNumber(bond.earnings()),
      coupon: toNumber(bond.coupon),
      yieldRate: toNumber(bond.yieldRate),
      purchaseDate: bond.purchaseDate,
    };
  }
}
