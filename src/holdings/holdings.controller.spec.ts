import { Test, TestingModule } from '@nestjs/testing';
import { TypeOrmModule } from '@nestjs/typeorm';
import { BadRequestException, NotFoundException } from '@nestjs/common';
import { HoldingsController } from './holdings.controller';
import { HoldingQueryService } from './holding-query.service';
import { HoldingStoreService } from '../store/holding-store.service';
import { STORE_ENTITIES, storeOptions } from '../store/store.module';
import { Investment } from './entities/investment.entity';
import { CreateBondDto } from './dto/create-bond.dto';

describe('HoldingsController', () => {
  let module: TestingModule;
  let controller: HoldingsController;
  let store: HoldingStoreService;

  const createStock = (purchaseId: string, symbol: string, purchasePrice: string, currentPrice: string) =>
    new Investment({ purchaseId, symbol, quantity: 10, purchasePrice, currentPrice, purchaseDate: '1/1/2019' });

  const createBondDto = (overrides: Partial<CreateBondDto> = {}): CreateBondDto => ({
    purchaseId: 'B999',
    symbol: 'GT2:GOV',
    quantity: 200,
    purchasePrice: 100.02,
    currentPrice: 100.05,
    coupon: 1.38,
    yieldRate: '1.35%',
    purchaseDate: '8/1/2017',
    ...overrides,
  });

  beforeEach(async () => {
    module = await Test.createTestingModule({
      imports: [
        TypeOrmModule.forRoot(storeOptions(':memory:')),
        TypeOrmModule.forFeature(STORE_ENTITIES),
      ],
      controllers: [HoldingsController],
      providers: [HoldingStoreService, HoldingQueryService],
    }).compile();

    controller = module.get<HoldingsController>(HoldingsController);
    store = module.get<HoldingStoreService>(HoldingStoreService);

    await store.setup(
      [
        createStock('S1', 'AAPL', '100', '120'),
        createStock('S2', 'INTC', '50', '30'),
        createStock('S3', 'MSFT', '100', '300'),
      ],
      [],
    );
  });

  afterEach(async () => {
    await module.close();
  });

  describe('getStocks', () => {
    it('should return every stored stock with metrics', async () => {
      const result = await controller.getStocks();

      expect(result.map((s) => s.purchaseId)).toEqual(['S1', 'S2', 'S3']);
      expect(result[0].earnings).toBe(200);
      expect(result[0].percentYield).toBe(20);
    });

    it('should keep only losses for earnings=negative', async () => {
      const result = await controller.getStocks('negative');

      expect(result.map((s) => s.symbol)).toEqual(['INTC']);
      expect(result[0].earnings).toBe(-200);
    });

    it('should sort gains by yearly return', async () => {
      const result = await controller.getStocks('positive', 'yearly-return');

      expect(result.map((s) => s.symbol)).toEqual(['MSFT', 'AAPL']);
    });

    it('should reject unknown filter values', async () => {
      await expect(controller.getStocks('flat')).rejects.toThrow(BadRequestException);
      await expect(controller.getStocks(undefined, 'name')).rejects.toThrow(BadRequestException);
    });
  });

  describe('getStock', () => {
    it('should find a stock by case-insensitive symbol', async () => {
      const result = await controller.getStock('msft');

      expect(result.purchaseId).toBe('S3');
      expect(result.earnings).toBe(2000);
    });

    it('should throw NotFoundException for an unknown symbol', async () => {
      await expect(controller.getStock('ko')).rejects.toThrow(NotFoundException);
    });
  });

  describe('bonds', () => {
    it('should store a manual bond and list it', async () => {
      const response = await controller.addBond(createBondDto());

      expect(response.message).toBe('Bond B999 saved');
      expect(response.bond.earnings).toBe(276.054);

      const bonds = await controller.getBonds();
      expect(bonds).toHaveLength(1);
      expect(bonds[0].yieldRate).toBe(0.0135);
    });

    it('should replace a bond posted again with the same purchase id', async () => {
      await controller.addBond(createBondDto());
      await controller.addBond(createBondDto({ currentPrice: 101 }));

      const bonds = await controller.getBonds();
      expect(bonds).toHaveLength(1);
      expect(bonds[0].earnings).toBe(466.054);
    });

    it('should map conversion errors to BadRequestException', async () => {
      await expect(controller.addBond(createBondDto({ purchaseDate: '02/30/2020' }))).rejects.toThrow(
        BadRequestException,
      );
      expect(await controller.getBonds()).toEqual([]);
    });
  });
});
