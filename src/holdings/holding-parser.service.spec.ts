import { Test, TestingModule } from '@nestjs/testing';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { HoldingParserService, parseBondLines, parseStockLines } from './holding-parser.service';

describe('HoldingParserService', () => {
  let service: HoldingParserService;
  let dir: string;

  const writeInput = (name: string, content: string): string => {
    const path = join(dir, name);
    writeFileSync(path, content, 'utf-8');
    return path;
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [HoldingParserService],
    }).compile();

    service = module.get<HoldingParserService>(HoldingParserService);
    dir = mkdtempSync(join(tmpdir(), 'holdings-parser-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('parseStockLines', () => {
    it('should assign S + line number as purchase id', () => {
      const result = parseStockLines('AAPL,100,145.20,188.40,3/14/2019\nKO,200,58.30,61.15,11/20/2018\n');

      expect(result.holdings.map((s) => s.purchaseId)).toEqual(['S1', 'S2']);
      expect(result.holdings[1].symbol).toBe('KO');
      expect(result.holdings[1].quantity).toBe(200);
      expect(result.failures).toEqual([]);
      expect(result.aborted).toBe(false);
    });

    it('should tolerate CRLF line endings and spaces around fields', () => {
      const result = parseStockLines('AAPL, 100 ,145.20,188.40,3/14/2019\r\n');

      expect(result.holdings).toHaveLength(1);
      expect(result.holdings[0].quantity).toBe(100);
      expect(result.holdings[0].purchaseDate).toBe('3/14/2019');
    });

    it('should stop at a line with the wrong field count and keep earlier holdings', () => {
      const result = parseStockLines(
        'AAPL,100,145.20,188.40,3/14/2019\nMSFT,50,210.75\nKO,200,58.30,61.15,11/20/2018\n',
      );

      expect(result.holdings.map((s) => s.symbol)).toEqual(['AAPL']);
      expect(result.failures).toEqual([{ line: 2, message: 'expected 5 fields, got 3' }]);
      expect(result.aborted).toBe(true);
    });

    it('should stop at a bad numeric value', () => {
      const result = parseStockLines('AAPL,10.5,145.20,188.40,3/14/2019\nKO,200,58.30,61.15,11/20/2018\n');

      expect(result.holdings).toHaveLength(0);
      expect(result.failures).toEqual([
        { line: 1, message: "Invalid quantity '10.5': expected a whole number of shares" },
      ]);
    });

    it('should treat a blank line as malformed', () => {
      const result = parseStockLines('AAPL,100,145.20,188.40,3/14/2019\n\nKO,200,58.30,61.15,11/20/2018\n');

      expect(result.holdings).toHaveLength(1);
      expect(result.failures[0].line).toBe(2);
    });
  });

  describe('parseBondLines', () => {
    it('should assign B + line number and skip lines of another width silently', () => {
      const result = parseBondLines(
        'AAPL,100,145.20,188.40,3/14/2019\nGT10:GOV,150,98.40,97.85,2.25,2.10%,5/3/2019\n',
      );

      expect(result.holdings).toHaveLength(1);
      expect(result.holdings[0].purchaseId).toBe('B2');
      expect(result.holdings[0].yieldRate.toString()).toBe('0.021');
      expect(result.failures).toEqual([]);
      expect(result.skippedLines).toEqual([1]);
      expect(result.aborted).toBe(false);
    });

    it('should stop at a bad numeric value in a 7-field line', () => {
      const result = parseBondLines(
        'GT10:GOV,150,98.40,97.85,2.25,2.10%,5/3/2019\nGT5:GOV,x,100.10,99.60,1.75,1.60%,10/22/2020\nGT2:GOV,200,100.02,100.05,1.38,1.35%,8/1/2017\n',
      );

      expect(result.holdings.map((b) => b.purchaseId)).toEqual(['B1']);
      expect(result.failures).toEqual([{ line: 2, message: "Invalid quantity 'x': expected a whole number of shares" }]);
      expect(result.aborted).toBe(true);
    });
  });

  describe('readStocks', () => {
    it('should read holdings from a file', async () => {
      const path = writeInput('stocks.txt', 'AAPL,100,145.20,188.40,3/14/2019\nINTC,150,52.60,31.25,1/8/2021\n');

      const result = await service.readStocks(path);

      expect(result.holdings.map((s) => s.symbol)).toEqual(['AAPL', 'INTC']);
    });

    it('should report a missing file instead of throwing', async () => {
      const result = await service.readStocks(join(dir, 'missing.txt'));

      expect(result.holdings).toEqual([]);
      expect(result.failures).toHaveLength(1);
      expect(result.failures[0].line).toBeNull();
      expect(result.failures[0].message).toContain('ENOENT');
      expect(result.aborted).toBe(true);
    });

    it('should return partial results for a malformed file', async () => {
      const path = writeInput('stocks.txt', 'AAPL,100,145.20,188.40,3/14/2019\nbroken line\n');

      const result = await service.readStocks(path);

      expect(result.holdings).toHaveLength(1);
      expect(result.failures).toEqual([{ line: 2, message: 'expected 5 fields, got 1' }]);
    });
  });

  describe('readBonds', () => {
    it('should keep only 7-field records without reporting an error', async () => {
      const path = writeInput(
        'bonds.txt',
        'GT10:GOV,150,98.40,97.85,2.25,2.10%,5/3/2019\nAAPL,100,145.20,188.40,3/14/2019\n',
      );

      const result = await service.readBonds(path);

      expect(result.holdings.map((b) => b.purchaseId)).toEqual(['B1']);
      expect(result.failures).toEqual([]);
    });
  });

  describe('readSeedBonds', () => {
    it('should build bonds from validated JSON entries', async () => {
      const path = writeInput(
        'seed.json',
        JSON.stringify([
          {
            purchaseId: 'B999',
            symbol: 'GT2:GOV',
            quantity: 200,
            purchasePrice: 100.02,
            currentPrice: 100.05,
            coupon: 1.38,
            yieldRate: '1.35%',
            purchaseDate: '8/1/2017',
          },
        ]),
      );

      const result = await service.readSeedBonds(path);

      expect(result.holdings).toHaveLength(1);
      expect(result.holdings[0].purchaseId).toBe('B999');
      expect(result.holdings[0].earnings().toString()).toBe('276.054');
      expect(result.failures).toEqual([]);
    });

    it('should leave out invalid entries and keep the valid ones', async () => {
      const path = writeInput(
        'seed.json',
        JSON.stringify([
          { purchaseId: 'B1', symbol: 'GT5:GOV', quantity: 1.5, purchasePrice: 100, currentPrice: 99, coupon: 1, yieldRate: '1%', purchaseDate: '1/2/2020' },
          { purchaseId: 'B2', symbol: 'GT5:GOV', quantity: 10, purchasePrice: 100, currentPrice: 99, coupon: 1, yieldRate: '1%', purchaseDate: '1/2/2020' },
        ]),
      );

      const result = await service.readSeedBonds(path);

      expect(result.holdings.map((b) => b.purchaseId)).toEqual(['B2']);
      expect(result.failures).toHaveLength(1);
      expect(result.failures[0].line).toBe(1);
      expect(result.failures[0].message).toBe('quantity must be an integer number');
    });

    it('should yield no bonds when the seed file is missing', async () => {
      const result = await service.readSeedBonds(join(dir, 'missing.json'));

      expect(result.holdings).toEqual([]);
      expect(result.aborted).toBe(true);
    });

    it('should reject a seed file that is not an array', async () => {
      const path = writeInput('seed.json', '{"purchaseId":"B1"}');

      const result = await service.readSeedBonds(path);

      expect(result.holdings).toEqual([]);
      expect(result.failures).toEqual([{ line: null, message: 'expected a JSON array of bonds' }]);
    });
  });
});
