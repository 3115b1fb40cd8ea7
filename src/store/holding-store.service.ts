import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, Repository } from 'typeorm';
import { Investment } from '../holdings/entities/investment.entity';
import { Bond } from '../holdings/entities/bond.entity';
import { StockRow } from './entities/stock-row.entity';
import { BondRow } from './entities/bond-row.entity';

export interface StoreCounts {
  stocks: number;
  bonds: number;
}

// Decimals are stored at full double precision, so rows rebuild the same metrics.
export function toStockRow(stock: Investment): StockRow {
  return {
    purchaseId: stock.purchaseId,
    symbol: stock.symbol,
    quantity: stock.quantity,
    purchasePrice: stock.purchasePrice.toNumber(),
    currentPrice: stock.currentPrice.toNumber(),
    purchaseDate: stock.purchaseDate,
  };
}

export function toBondRow(bond: Bond): BondRow {
  return {
    purchaseId: bond.purchaseId,
    symbol: bond.symbol,
    quantity: bond.quantity,
    purchasePrice: bond.purchasePrice.toNumber(),
    currentPrice: bond.currentPrice.toNumber(),
    coupon: bond.coupon.toNumber(),
    yieldRate: bond.yieldRate.toNumber(),
    purchaseDate: bond.purchaseDate,
  };
}

// SQLite-backed holdings store. Tables are created by migration when the
// connection opens; every write is an upsert keyed by purchase_id.
// The connection belongs to the Nest application context and closes with it.
@Injectable()
export class HoldingStoreService {
  private readonly logger = new Logger(HoldingStoreService.name);

  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    @InjectRepository(StockRow) private readonly stocks: Repository<StockRow>,
    @InjectRepository(BondRow) private readonly bonds: Repository<BondRow>,
  ) {}

  /**
   * Upserts every holding in one transaction, committed before returning.
   * Last write wins per purchase_id, including duplicates within one call.
   * Errors propagate; nothing is written if any upsert fails.
   */
  async setup(stocks: Investment[], bonds: Bond[]): Promise<StoreCounts> {
    await this.dataSource.transaction(async (manager) => {
      for (const stock of stocks) {
        await this.upsertStockWith(manager, stock);
      }
      for (const bond of bonds) {
        await this.upsertBondWith(manager, bond);
      }
    });

    const counts = await this.countRows();
    this.logger.log(
      `Upserted ${stocks.length} stocks and ${bonds.length} bonds (store holds ${counts.stocks} stocks, ${counts.bonds} bonds)`,
    );
    return counts;
  }

  /** Single bond upsert for manual entry */
  async upsertBond(bond: Bond): Promise<void> {
    await this.upsertBondWith(this.dataSource.manager, bond);
  }

  /** Rebuilds equity holdings from stored rows, ordered by purchase id */
  async findStocks(): Promise<Investment[]> {
    const rows = await this.stocks.find({ order: { purchaseId: 'ASC' } });
    return rows.map((row) => new Investment(row));
  }

  /** Rebuilds bond holdings; the stored yield rate is already a fraction */
  async findBonds(): Promise<Bond[]> {
    const rows = await this.bonds.find({ order: { purchaseId: 'ASC' } });
    return rows.map(({ yieldRate, ...row }) => new Bond({ ...row, yieldFraction: yieldRate }));
  }

  async countRows(): Promise<StoreCounts> {
    return {
      stocks: await this.stocks.count(),
      bonds: await this.bonds.count(),
    };
  }

  private async upsertStockWith(manager: EntityManager, stock: Investment): Promise<void> {
    await manager.upsert(StockRow, toStockRow(stock), ['purchaseId']);
  }

  private async upsertBondWith(manager: EntityManager, bond: Bond): Promise<void> {
    await manager.upsert(BondRow, toBondRow(bond), ['purchaseId']);
  }
}
