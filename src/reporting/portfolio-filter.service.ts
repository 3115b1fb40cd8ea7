import { Injectable } from '@nestjs/common';
import { createInterface } from 'readline';
import { Investment } from '../holdings/entities/investment.entity';
import { HoldingQueryService } from '../holdings/holding-query.service';
import { toFixed2, toGrouped } from '../common/utils/decimal.util';

export type FilterCommand = 'positive' | 'negative' | 'sort' | 'lookup' | 'exit' | 'invalid';

export const FILTER_MENU = 'Filter options: [1] positive, [2] negative, [3] sort, [4] lookup, [5] exit';

const ALIASES = new Map<string, FilterCommand>([
  ['1', 'positive'],
  ['positive', 'positive'],
  ['2', 'negative'],
  ['negative', 'negative'],
  ['3', 'sort'],
  ['sort', 'sort'],
  ['4', 'lookup'],
  ['lookup', 'lookup'],
  ['5', 'exit'],
  ['exit', 'exit'],
  ['quit', 'exit'],
]);

/** First word of the answer, case-insensitive. Blank input is invalid. */
export function parseCommand(answer: string): FilterCommand {
  const [word] = answer.trim().toLowerCase().split(/\s+/);
  return ALIASES.get(word) ?? 'invalid';
}

// Text menu over already-computed stock metrics. Reads one command per line
// until exit or end of input; bad input prints "Invalid." and re-prompts.
@Injectable()
export class PortfolioFilterService {
  constructor(private readonly queryService: HoldingQueryService) {}

  /** Output lines for every command except lookup and exit */
  respond(command: FilterCommand, stocks: Investment[], asOf: Date = new Date()): string[] {
    switch (command) {
      case 'positive':
        return this.queryService.withPositiveEarnings(stocks).map((s) => `${s.symbol}: $${toGrouped(s.earnings())}`);
      case 'negative':
        return this.queryService.withNegativeEarnings(stocks).map((s) => `${s.symbol}: $${toGrouped(s.earnings())}`);
      case 'sort':
        return this.queryService
          .sortByYearlyReturn(stocks, asOf)
          .map((s) => `${s.symbol}: ${toFixed2(s.yearlyReturn(asOf))}%`);
      default:
        return ['Invalid.'];
    }
  }

  lookup(stocks: Investment[], symbol: string, asOf: Date = new Date()): string {
    const stock = this.queryService.findBySymbol(stocks, symbol);
    if (!stock) {
      return 'Not found.';
    }
    return `${stock.symbol}: Earn=${toFixed2(stock.earnings())}, Yearly%=${toFixed2(stock.yearlyReturn(asOf))}`;
  }

  async run(
    stocks: Investment[],
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout,
    asOf: Date = new Date(),
  ): Promise<void> {
    const rl = createInterface({ input, terminal: false, crlfDelay: Infinity });
    const lines = rl[Symbol.asyncIterator]();

    const ask = async (prompt: string): Promise<string | undefined> => {
      output.write(prompt);
      const next = await lines.next();
      return next.done ? undefined : next.value;
    };
    const print = (text: string) => output.write(`${text}\n`);

    try {
      for (;;) {
        print(`\n${FILTER_MENU}`);
        const answer = await ask('Choice: ');
        if (answer === undefined) {
          return;
        }

        const command = parseCommand(answer);
        if (command === 'exit') {
          return;
        }
        if (command === 'lookup') {
          const symbol = await ask('Enter symbol: ');
          if (symbol === undefined) {
            return;
          }
          print(this.lookup(stocks, symbol, asOf));
          continue;
        }
        this.respond(command, stocks, asOf).forEach(print);
      }
    } finally {
      rl.close();
    }
  }
}
