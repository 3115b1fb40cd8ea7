import { Module } from '@nestjs/common';
import { HoldingsModule } from '../holdings/holdings.module';
import { StoreModule } from '../store/store.module';
import { ReportingModule } from '../reporting/reporting.module';
import { VisualizationModule } from '../visualization/visualization.module';
import { PortfolioRunService } from './portfolio-run.service';

@Module({
  imports: [HoldingsModule, StoreModule, ReportingModule, VisualizationModule],
  providers: [PortfolioRunService],
  exports: [PortfolioRunService],
})
export class RunModule {}
