import 'reflect-metadata';
import { INestApplicationContext, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { PriceExtractorService } from './services/price-extractor.service';
import { StarSchemaTransformerService } from './services/star-schema-transformer.service';
import { PricePipelineService } from './services/price-pipeline.service';
import { FundamentalsAggregatorService } from './services/fundamentals-aggregator.service';
import { ArtifactStoreService } from './storage/artifact-store.service';
import { ARTIFACT_ZONES, ArtifactZone } from './storage/artifact-paths';
import { PipelineException } from './exceptions';
import { isIsoDay } from './utils/trading-day';
import { TICKER_PATTERN } from './dto/price-window.dto';

export type CliCommand =
  | { command: 'extract' | 'transform' | 'prices'; ticker: string; start: string; end: string }
  | { command: 'fundamentals'; ticker: string; force: boolean }
  | { command: 'clean'; zones: ArtifactZone[] };

export const USAGE = [
  'Usage: market-lake <command>',
  '',
  '  extract <TICKER> <START> <END>     download daily prices into the raw zone',
  '  transform <TICKER> <START> <END>   derive staged, fact and dimension tables',
  '  prices <TICKER> <START> <END>      cached prices for a window, fetching on a miss',
  '  fundamentals <TICKER> [--force]    cached or refreshed fundamentals',
  `  clean [ZONE]                       remove artifacts (${ARTIFACT_ZONES.join(', ')})`,
  '',
  'Dates are YYYY-MM-DD; the window is inclusive.',
].join('\n');

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/**
 * @throws CliUsageError
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const [command, ...args] = argv;

  switch (command) {
    case 'extract':
    case 'transform':
    case 'prices': {
      if (args.length !== 3) {
        throw new CliUsageError(`${command} expects <TICKER> <START> <END>`);
      }
      const [ticker, start, end] = args;
      for (const day of [start, end]) {
        if (!isIsoDay(day)) {
          throw new CliUsageError(`Invalid date '${day}', expected YYYY-MM-DD`);
        }
      }
      if (start > end) {
        throw new CliUsageError(`Start ${start} is after end ${end}`);
      }
      return { command, ticker: parseTicker(ticker), start, end };
    }
    case 'fundamentals': {
      const force = args.includes('--force');
      const positional = args.filter((arg) => arg !== '--force');
      if (positional.length !== 1) {
        throw new CliUsageError('fundamentals expects <TICKER> [--force]');
      }
      return { command, ticker: parseTicker(positional[0]), force };
    }
    case 'clean': {
      if (args.length === 0) {
        return { command, zones: [...ARTIFACT_ZONES] };
      }
      const zone = ARTIFACT_ZONES.find((candidate) => candidate === args[0]);
      if (args.length > 1 || zone === undefined) {
        throw new CliUsageError(`clean expects one of: ${ARTIFACT_ZONES.join(', ')}`);
      }
      return { command, zones: [zone] };
    }
    default:
      throw new CliUsageError(command ? `Unknown command '${command}'` : 'Missing command');
  }
}

function parseTicker(raw: string): string {
  const ticker = raw.trim().toUpperCase();
  if (!TICKER_PATTERN.test(ticker)) {
    throw new CliUsageError(`Invalid ticker '${raw}'`);
  }
  return ticker;
}

async function run(app: INestApplicationContext, cli: CliCommand): Promise<unknown> {
  switch (cli.command) {
    case 'extract': {
      const { path, table } = await app
        .get(PriceExtractorService)
        .extract(cli.ticker, cli.start, cli.end);
      return { path, rows: table.rows.length };
    }
    case 'transform': {
      const result = await app
        .get(StarSchemaTransformerService)
        .transform(cli.ticker, cli.start, cli.end);
      return {
        paths: result.paths,
        rows: result.fact.length,
        encoding: result.encoding.kind,
        warnings: result.warnings,
      };
    }
    case 'prices': {
      const result = await app
        .get(PricePipelineService)
        .getPriceData(cli.ticker, cli.start, cli.end);
      return {
        cached: result.cached,
        rows: result.table.rows.length,
        summary: result.summary,
        warnings: result.warnings,
      };
    }
    case 'fundamentals':
      return app.get(FundamentalsAggregatorService).getOrUpdate(cli.ticker, cli.force);
    case 'clean':
      return { removed: await app.get(ArtifactStoreService).clear(cli.zones) };
  }
}

async function main(): Promise<number> {
  let cli: CliCommand;
  try {
    cli = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      process.stderr.write(`${error.message}\n\n${USAGE}\n`);
      return 1;
    }
    throw error;
  }

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn', 'log'],
  });
  try {
    const output = await run(app, cli);
    process.stdout.write(`${JSON.stringify(output, null, 2)}\n`);
    return 0;
  } catch (error) {
    if (error instanceof PipelineException) {
      Logger.error(error.message, 'MarketLake');
      return 1;
    }
    throw error;
  } finally {
    await app.close();
  }
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      Logger.error(error instanceof Error ? error.stack : String(error), 'MarketLake');
      process.exitCode = 1;
    });
}
