import { registerAs } from '@nestjs/config';
import { Investor } from '../holdings/entities/investor.entity';

export interface PortfolioConfig {
  stockFile: string;
  bondFile: string;
  seedBondsFile: string;
  priceHistoryFile: string;
  databasePath: string;
  reportFile: string;
  csvFile: string;
  chartFile: string;
  interactive: boolean;
  port: number;
  investor: Investor;
}

function flag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') {
    return fallback;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

// Paths are resolved against the working directory by the services that open them.
export default registerAs('portfolio', (): PortfolioConfig => ({
  stockFile: process.env.STOCK_FILE ?? 'data/stocks.txt',
  bondFile: process.env.BOND_FILE ?? 'data/bonds.txt',
  seedBondsFile: process.env.SEED_BONDS_FILE ?? 'data/seed-bonds.json',
  priceHistoryFile: process.env.PRICE_HISTORY_FILE ?? 'data/price-history.json',
  databasePath: process.env.DATABASE_PATH ?? 'portfolio.db',
  reportFile: process.env.REPORT_FILE ?? 'Investment_Report.txt',
  csvFile: process.env.CSV_FILE ?? 'stock_summary.csv',
  chartFile: process.env.CHART_FILE ?? 'portfolio_history.svg',
  interactive: flag(process.env.INTERACTIVE, Boolean(process.stdin.isTTY)),
  port: parseInt(process.env.PORT ?? '3000', 10),
  investor: {
    investorId: process.env.INVESTOR_ID ?? 'INV001',
    name: process.env.INVESTOR_NAME ?? 'Sample Investor',
    address: process.env.INVESTOR_ADDRESS ?? 'Springfield',
    phone: process.env.INVESTOR_PHONE ?? '(555)010-0100',
  },
}));
