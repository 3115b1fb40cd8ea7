import { Injectable, Logger } from '@nestjs/common';
import { writeFile } from 'fs/promises';
import { Investor } from '../holdings/entities/investor.entity';
import { Investment } from '../holdings/entities/investment.entity';
import { Bond } from '../holdings/entities/bond.entity';
import { toFixed2 } from '../common/utils/decimal.util';

// Left-aligned fixed-width cells; longer values are not truncated.
function cells(...columns: Array<[string | number, number]>): string {
  return columns.map(([value, width]) => String(value).padEnd(width)).join('');
}

// Fixed-width text report of stock and bond metrics for one investor.
@Injectable()
export class ReportWriterService {
  private readonly logger = new Logger(ReportWriterService.name);

  render(investor: Investor, stocks: Investment[], bonds: Bond[], asOf: Date = new Date()): string {
    const lines = [
      `Investor: ${investor.name}`,
      `Address: ${investor.address}`,
      `Phone: ${investor.phone}`,
      '',
      'STOCKS:',
      cells(['ID', 6], ['Symbol', 10], ['Qty', 6], ['Earn', 10], ['Yield%', 10], ['Yearly%', 10]),
      ...stocks.map((s) =>
        cells(
          [s.purchaseId, 6],
          [s.symbol, 10],
          [s.quantity, 6],
          [toFixed2(s.earnings()), 10],
          [toFixed2(s.percentYield()), 10],
          [toFixed2(s.yearlyReturn(asOf)), 10],
        ),
      ),
      '',
      'BONDS:',
      cells(['ID', 6], ['Symbol', 10], ['Qty', 6], ['Earn', 10], ['Date', 12]),
      ...bonds.map((b) =>
        cells([b.purchaseId, 6], [b.symbol, 10], [b.quantity, 6], [toFixed2(b.earnings()), 10], [b.purchaseDate, 12]),
      ),
    ];
    return lines.join('\n') + '\n';
  }

  /**
   * Renders and writes the report. Returns false instead of throwing when
   * rendering or writing fails, so later steps still run.
   */
  async write(path: string, investor: Investor, stocks: Investment[], bonds: Bond[]): Promise<boolean> {
    try {
      await writeFile(path, this.render(investor, stocks, bonds), 'utf-8');
      this.logger.log(`Report written to ${path}`);
      return true;
    } catch (error) {
      this.logger.warn(`Failed to write report '${path}': ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }
}
