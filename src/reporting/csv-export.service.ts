import { Injectable, Logger } from '@nestjs/common';
import { writeFile } from 'fs/promises';
import { Investment } from '../holdings/entities/investment.entity';
import { toFixed2 } from '../common/utils/decimal.util';

export const CSV_HEADER = ['Symbol', 'Earnings', 'Yield%', 'Yearly%'];

// Quotes a cell only when it holds a delimiter, quote or line break.
function quote(cell: string): string {
  return /[",\r\n]/.test(cell) ? `"${cell.replace(/"/g, '""')}"` : cell;
}

// Per-stock metric summary as CSV, CRLF line endings.
@Injectable()
export class CsvExportService {
  private readonly logger = new Logger(CsvExportService.name);

  render(stocks: Investment[], asOf: Date = new Date()): string {
    const rows = [
      CSV_HEADER,
      ...stocks.map((s) => [s.symbol, toFixed2(s.earnings()), toFixed2(s.percentYield()), toFixed2(s.yearlyReturn(asOf))]),
    ];
    return rows.map((row) => row.map(quote).join(',') + '\r\n').join('');
  }

  /** Returns false instead of throwing when the file cannot be written */
  async export(path: string, stocks: Investment[]): Promise<boolean> {
    try {
      await writeFile(path, this.render(stocks), 'utf-8');
      this.logger.log(`CSV summary written to ${path}`);
      return true;
    } catch (error) {
      this.logger.warn(`Failed to export CSV '${path}': ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }
}
