import { Module } from '@nestjs/common';
import { StoreModule } from '../store/store.module';
import { HoldingsController } from './holdings.controller';
import { HoldingParserService } from './holding-parser.service';
import { HoldingQueryService } from './holding-query.service';

@Module({
  imports: [StoreModule], // HoldingStoreService backs the HTTP queries
  controllers: [HoldingsController],
  providers: [
    HoldingParserService,  // flat files -> Investment / Bond
    HoldingQueryService,   // filters and metric views
  ],
  exports: [HoldingParserService, HoldingQueryService],
})
export class HoldingsModule {}
