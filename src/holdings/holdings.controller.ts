import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Param,
  Post,
  Query,
} from '@nestjs/common';
import { HoldingStoreService } from '../store/holding-store.service';
import { HoldingQueryService, isEarningsFilter } from './holding-query.service';
import { Bond } from './entities/bond.entity';
import { CreateBondDto } from './dto/create-bond.dto';
import { BondMetricsDto, BondUpsertResponseDto, StockMetricsDto } from './dto/holding-response.dto';
import { HoldingConversionError } from './holding.errors';

@Controller('holdings')
export class HoldingsController {
  constructor(
    private readonly store: HoldingStoreService,
    private readonly queryService: HoldingQueryService,
  ) {}

  /**
   * Persisted equity holdings with their metrics.
   *
   * GET /holdings/stocks?earnings=positive&sort=yearly-return
   * @param earnings - 'positive' or 'negative' to keep gains or losses only
   * @param sort - 'yearly-return' for highest annualized return first
   */
  @Get('stocks')
  @HttpCode(HttpStatus.OK)
  async getStocks(
    @Query('earnings') earnings?: string,
    @Query('sort') sort?: string,
  ): Promise<StockMetricsDto[]> {
    if (earnings !== undefined && !isEarningsFilter(earnings)) {
      throw new BadRequestException(`earnings must be 'positive' or 'negative', got '${earnings}'`);
    }
    if (sort !== undefined && sort !== 'yearly-return') {
      throw new BadRequestException(`sort must be 'yearly-return', got '${sort}'`);
    }

    const asOf = new Date();
    let stocks = this.queryService.filterByEarnings(await this.store.findStocks(), earnings);
    if (sort) {
      stocks = this.queryService.sortByYearlyReturn(stocks, asOf);
    }
    return stocks.map((stock) => this.queryService.toStockMetrics(stock, asOf));
  }

  /**
   * Looks up one equity holding by symbol (case-insensitive input).
   *
   * GET /holdings/stocks/AAPL
   */
  @Get('stocks/:symbol')
  @HttpCode(HttpStatus.OK)
  async getStock(@Param('symbol') symbol: string): Promise<StockMetricsDto> {
    const stock = this.queryService.findBySymbol(await this.store.findStocks(), symbol);
    if (!stock) {
      throw new NotFoundException(`No stock holding for symbol ${symbol.toUpperCase()}`);
    }
    return this.queryService.toStockMetrics(stock);
  }

  /**
   * Persisted bond holdings with yield-inclusive earnings.
   *
   * GET /holdings/bonds
   */
  @Get('bonds')
  @HttpCode(HttpStatus.OK)
  async getBonds(): Promise<BondMetricsDto[]> {
    const bonds = await this.store.findBonds();
    return bonds.map((bond) => this.queryService.toBondMetrics(bond));
  }

  /**
   * Records a manually entered bond. Upsert - same purchaseId replaces the row.
   *
   * POST /holdings/bonds
   */
  @Post('bonds')
  @HttpCode(HttpStatus.CREATED)
  async addBond(@Body() createBondDto: CreateBondDto): Promise<BondUpsertResponseDto> {
    let bond: Bond;
    try {
      bond = new Bond(createBondDto);
    } catch (error) {
      if (error instanceof HoldingConversionError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }

    await this.store.upsertBond(bond);
    return {
      bond: this.queryService.toBondMetrics(bond),
      message: `Bond ${bond.purchaseId} saved`,
    };
  }
}
