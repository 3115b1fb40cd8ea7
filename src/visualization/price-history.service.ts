import { Injectable, Logger } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { Investment } from '../holdings/entities/investment.entity';
import { parseShortDate } from '../common/utils/date.util';
import { toDecimal, toNumber } from '../common/utils/decimal.util';

// One external price record: { "Symbol": "AAPL", "Date": "07-Mar-19", "Close": 172.5 }
export interface PriceRecord {
  Symbol?: unknown;
  Date?: unknown;
  Close?: unknown;
}

export interface ValuePoint {
  date: Date;
  value: number;      // close × held quantity
}

function parseClose(close: unknown): number | undefined {
  if (typeof close === 'number') {
    return Number.isFinite(close) ? close : undefined;
  }
  if (typeof close === 'string' && close.trim() !== '') {
    const parsed = Number(close.trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function isRecord(entry: unknown): entry is PriceRecord {
  return typeof entry === 'object' && entry !== null;
}

/** Symbol -> held quantity. A later holding of the same symbol replaces an earlier one. */
export function heldQuantities(stocks: Investment[]): Map<string, number> {
  return new Map(stocks.map((stock) => [stock.symbol, stock.quantity]));
}

// Turns an external price history into per-symbol position values over time.
@Injectable()
export class PriceHistoryService {
  private readonly logger = new Logger(PriceHistoryService.name);

  /** @throws if the file is unreadable or not a JSON array */
  async loadRecords(path: string): Promise<unknown[]> {
    const parsed: unknown = JSON.parse(await readFile(path, 'utf-8'));
    if (!Array.isArray(parsed)) {
      throw new Error(`'${path}' does not contain a JSON array of price records`);
    }
    return parsed;
  }

  /**
   * Keeps records for held symbols, values them at close × quantity, groups by
   * symbol and sorts each series by date ascending. Records with a bad date or
   * close are skipped one by one.
   */
  buildSeries(records: unknown[], quantities: Map<string, number>): Map<string, ValuePoint[]> {
    const series = new Map<string, ValuePoint[]>();
    let skipped = 0;

    for (const record of records) {
      if (!isRecord(record) || typeof record.Symbol !== 'string') {
        continue;
      }
      const quantity = quantities.get(record.Symbol);
      if (quantity === undefined) {
        continue;
      }

      const date = typeof record.Date === 'string' ? parseShortDate(record.Date) : undefined;
      const close = parseClose(record.Close);
      if (!date || close === undefined) {
        skipped++;
        continue;
      }

      const points = series.get(record.Symbol) ?? [];
      points.push({ date, value: toNumber(toDecimal(close).times(quantity)) });
      series.set(record.Symbol, points);
    }

    for (const points of series.values()) {
      points.sort((a, b) => a.date.getTime() - b.date.getTime());
    }
    if (skipped > 0) {
      this.logger.warn(`Skipped ${skipped} price records with an unreadable date or close`);
    }
    return series;
  }
}
