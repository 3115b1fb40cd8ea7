import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import portfolioConfig from '../config/portfolio.config';
import { HoldingParserService, ParseFailure } from '../holdings/holding-parser.service';
import { HoldingStoreService, StoreCounts } from '../store/holding-store.service';
import { ReportWriterService } from '../reporting/report-writer.service';
import { CsvExportService } from '../reporting/csv-export.service';
import { PortfolioFilterService } from '../reporting/portfolio-filter.service';
import { PriceHistoryService, heldQuantities } from '../visualization/price-history.service';
import { ChartRendererService } from '../visualization/chart-renderer.service';

export type RunStep = 'report' | 'csv' | 'filter' | 'chart';

export interface RunSummary {
  stocks: number;
  bonds: number;               // file bonds plus seed bonds
  parseFailures: {
    stocks: ParseFailure[];
    bonds: ParseFailure[];
    seedBonds: ParseFailure[];
  };
  stored: StoreCounts;
  failedSteps: RunStep[];
}

export interface RunStreams {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

// One batch run: parse -> upsert -> report, CSV, filter, chart.
// Parse problems leave partial holdings; store errors propagate and stop the run
// before any writer; every later step fails on its own without stopping the rest.
@Injectable()
export class PortfolioRunService {
  private readonly logger = new Logger(PortfolioRunService.name);

  constructor(
    @Inject(portfolioConfig.KEY) private readonly config: ConfigType<typeof portfolioConfig>,
    private readonly parser: HoldingParserService,
    private readonly store: HoldingStoreService,
    private readonly reportWriter: ReportWriterService,
    private readonly csvExport: CsvExportService,
    private readonly filter: PortfolioFilterService,
    private readonly priceHistory: PriceHistoryService,
    private readonly chartRenderer: ChartRendererService,
  ) {}

  async run(streams: RunStreams = {}): Promise<RunSummary> {
    const stockResult = await this.parser.readStocks(this.config.stockFile);
    const bondResult = await this.parser.readBonds(this.config.bondFile);
    const seedResult = await this.parser.readSeedBonds(this.config.seedBondsFile);

    const stocks = stockResult.holdings;
    const bonds = [...bondResult.holdings, ...seedResult.holdings];
    this.logger.log(`Parsed ${stocks.length} stocks and ${bonds.length} bonds (${seedResult.holdings.length} seeded)`);

    const stored = await this.store.setup(stocks, bonds);

    const failedSteps: RunStep[] = [];
    const step = async (name: RunStep, action: () => Promise<boolean | void>) => {
      try {
        if ((await action()) === false) {
          failedSteps.push(name);
        }
      } catch (error) {
        this.logger.warn(`Step '${name}' failed: ${error instanceof Error ? error.message : String(error)}`);
        failedSteps.push(name);
      }
    };

    await step('report', () => this.reportWriter.write(this.config.reportFile, this.config.investor, stocks, bonds));
    await step('csv', () => this.csvExport.export(this.config.csvFile, stocks));
    if (this.config.interactive) {
      await step('filter', () => this.filter.run(stocks, streams.input, streams.output));
    }
    await step('chart', async () => {
      const records = await this.priceHistory.loadRecords(this.config.priceHistoryFile);
      const series = this.priceHistory.buildSeries(records, heldQuantities(stocks));
      await this.chartRenderer.render(series, this.config.chartFile);
    });

    return {
      stocks: stocks.length,
      bonds: bonds.length,
      parseFailures: {
        stocks: stockResult.failures,
        bonds: bondResult.failures,
        seedBonds: seedResult.failures,
      },
      stored,
      failedSteps,
    };
  }
}
