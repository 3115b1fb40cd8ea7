import { Module } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import portfolioConfig from '../config/portfolio.config';
import { HoldingStoreService } from './holding-store.service';
import { StockRow } from './entities/stock-row.entity';
import { BondRow } from './entities/bond-row.entity';
import { CreateHoldingTables1700000000000 } from './migrations/1700000000000-CreateHoldingTables';

export const STORE_ENTITIES = [StockRow, BondRow];

/**
 * Connection options for a store file (or ':memory:'). Tables are created by
 * migration on open; synchronize stays off so an existing table is never rewritten.
 */
export function storeOptions(database: string): TypeOrmModuleOptions {
  return {
    type: 'better-sqlite3',
    database,
    entities: STORE_ENTITIES,
    migrations: [CreateHoldingTables1700000000000],
    migrationsRun: true,
    synchronize: false,
    retryAttempts: 0,     // an unopenable store is fatal, no retry loop
  };
}

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      inject: [portfolioConfig.KEY],
      useFactory: (config: ConfigType<typeof portfolioConfig>) => storeOptions(config.databasePath),
    }),
    TypeOrmModule.forFeature(STORE_ENTITIES),
  ],
  providers: [HoldingStoreService],
  exports: [HoldingStoreService],
})
export class StoreModule {}
