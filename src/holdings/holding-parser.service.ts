import { Injectable, Logger } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { Investment } from './entities/investment.entity';
import { Bond } from './entities/bond.entity';
import { CreateBondDto } from './dto/create-bond.dto';

// What to do with a line whose field count is wrong.
// 'abort' stops the file like any other error; 'skip' drops the line silently.
export interface ParsePolicy {
  expectedFields: number;
  onFieldCountMismatch: 'abort' | 'skip';
}

export interface ParseFailure {
  line: number | null;   // null for file-level failures (unreadable file)
  message: string;
}

// Holdings built before the first fatal failure, plus what went wrong.
export interface ParseResult<T> {
  holdings: T[];
  failures: ParseFailure[];
  skippedLines: number[];
  aborted: boolean;
}

export const STOCK_POLICY: ParsePolicy = { expectedFields: 5, onFieldCountMismatch: 'abort' };
export const BOND_POLICY: ParsePolicy = { expectedFields: 7, onFieldCountMismatch: 'skip' };

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Splits file text into lines; the empty remainder after a final newline is dropped. */
function splitLines(text: string): string[] {
  const lines = text.split('\n');
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines.map((line) => line.trim());
}

/**
 * Builds holdings from comma-separated lines, one record per line, no header.
 * The build callback receives the trimmed fields and the 1-based line number.
 */
export function parseLines<T>(
  text: string,
  policy: ParsePolicy,
  build: (fields: string[], lineNumber: number) => T,
): ParseResult<T> {
  const result: ParseResult<T> = { holdings: [], failures: [], skippedLines: [], aborted: false };

  const lines = splitLines(text);
  for (let index = 0; index < lines.length; index++) {
    const lineNumber = index + 1;
    const fields = lines[index].split(',').map((field) => field.trim());

    try {
      if (fields.length !== policy.expectedFields) {
        if (policy.onFieldCountMismatch === 'skip') {
          result.skippedLines.push(lineNumber);
          continue;
        }
        throw new Error(`expected ${policy.expectedFields} fields, got ${fields.length}`);
      }
      result.holdings.push(build(fields, lineNumber));
    } catch (error) {
      result.failures.push({ line: lineNumber, message: errorMessage(error) });
      result.aborted = true;
      break;
    }
  }

  return result;
}

export function parseStockLines(text: string): ParseResult<Investment> {
  return parseLines(text, STOCK_POLICY, ([symbol, quantity, purchasePrice, currentPrice, purchaseDate], lineNumber) =>
    new Investment({ purchaseId: `S${lineNumber}`, symbol, quantity, purchasePrice, currentPrice, purchaseDate }),
  );
}

export function parseBondLines(text: string): ParseResult<Bond> {
  return parseLines(
    text,
    BOND_POLICY,
    ([symbol, quantity, purchasePrice, currentPrice, coupon, yieldRate, purchaseDate], lineNumber) =>
      new Bond({ purchaseId: `B${lineNumber}`, symbol, quantity, purchasePrice, currentPrice, coupon, yieldRate, purchaseDate }),
  );
}

// Reads holdings files. Never throws: failures are logged and returned with
// whatever was parsed before them, so callers must treat results as possibly partial.
@Injectable()
export class HoldingParserService {
  private readonly logger = new Logger(HoldingParserService.name);

  /** Stock file: symbol,quantity,purchasePrice,currentPrice,purchaseDate. Stops at the first bad line. */
  async readStocks(path: string): Promise<ParseResult<Investment>> {
    return this.readFileWith(path, 'stock', parseStockLines);
  }

  /** Bond file: symbol,quantity,purchasePrice,currentPrice,coupon,yieldRate,purchaseDate. Skips lines of another width. */
  async readBonds(path: string): Promise<ParseResult<Bond>> {
    return this.readFileWith(path, 'bond', parseBondLines);
  }

  /**
   * Manually entered bonds kept outside the bond file (JSON array of CreateBondDto).
   * A missing file yields no bonds; invalid entries are reported and left out.
   */
  async readSeedBonds(path: string): Promise<ParseResult<Bond>> {
    const result: ParseResult<Bond> = { holdings: [], failures: [], skippedLines: [], aborted: false };

    let entries: unknown;
    try {
      entries = JSON.parse(await readFile(path, 'utf-8'));
    } catch (error) {
      this.logger.warn(`No seed bonds loaded from '${path}': ${errorMessage(error)}`);
      return { ...result, failures: [{ line: null, message: errorMessage(error) }], aborted: true };
    }

    if (!Array.isArray(entries)) {
      const message = 'expected a JSON array of bonds';
      this.logger.warn(`No seed bonds loaded from '${path}': ${message}`);
      return { ...result, failures: [{ line: null, message }], aborted: true };
    }

    entries.forEach((entry: unknown, index) => {
      try {
        const dto = plainToInstance(CreateBondDto, entry);
        const errors = validateSync(dto);
        if (errors.length > 0) {
          throw new Error(errors.flatMap((e) => Object.values(e.constraints ?? {})).join('; '));
        }
        result.holdings.push(new Bond(dto));
      } catch (error) {
        result.failures.push({ line: index + 1, message: errorMessage(error) });
        this.logger.warn(`Seed bond #${index + 1} in '${path}' rejected: ${errorMessage(error)}`);
      }
    });

    return result;
  }

  private async readFileWith<T>(
    path: string,
    label: string,
    parse: (text: string) => ParseResult<T>,
  ): Promise<ParseResult<T>> {
    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (error) {
      this.logger.error(`Error reading ${label} file '${path}': ${errorMessage(error)}`);
      return {
        holdings: [],
        failures: [{ line: null, message: errorMessage(error) }],
        skippedLines: [],
        aborted: true,
      };
    }

    const result = parse(text);
    for (const failure of result.failures) {
      this.logger.error(`Error reading ${label} file '${path}' at line ${failure.line}: ${failure.message}`);
    }
    return result;
  }
}
