import { Module } from '@nestjs/common';
import { HoldingsModule } from '../holdings/holdings.module';
import { ReportWriterService } from './report-writer.service';
import { CsvExportService } from './csv-export.service';
import { PortfolioFilterService } from './portfolio-filter.service';

@Module({
  imports: [HoldingsModule], // HoldingQueryService drives the filter menu
  providers: [ReportWriterService, CsvExportService, PortfolioFilterService],
  exports: [ReportWriterService, CsvExportService, PortfolioFilterService],
})
export class ReportingModule {}
