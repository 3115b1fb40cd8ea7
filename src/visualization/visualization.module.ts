import { Module } from '@nestjs/common';
import { PriceHistoryService } from './price-history.service';
import { ChartRendererService } from './chart-renderer.service';

@Module({
  providers: [PriceHistoryService, ChartRendererService],
  exports: [PriceHistoryService, ChartRendererService],
})
export class VisualizationModule {}
