import { Transform } from 'class-transformer';
import { IsBoolean, IsOptional, Matches } from 'class-validator';

const ISO_DAY = /^\d{4}-\d{2}-\d{2}$/;

/** Upper-cased ticker symbol, safe to embed in artifact file names */
export const TICKER_PATTERN = /^[A-Z0-9.^=-]{1,15}$/;

export class TickerParamDto {
  @Transform(({ value }) => (typeof value === 'string' ? value.trim().toUpperCase() : value))
  @Matches(TICKER_PATTERN, { message: 'ticker must be a ticker symbol such as AAPL' })
  ticker!: string;
}

export class PriceWindowQueryDto {
  @Matches(ISO_DAY, { message: 'start must be a YYYY-MM-DD date' })
  start!: string;

  @Matches(ISO_DAY, { message: 'end must be a YYYY-MM-DD date' })
  end!: string;
}

export class FundamentalsQueryDto {
  @IsOptional()
  @Transform(({ value }) => value === true || value === 'true' || value === '1')
  @IsBoolean()
  force?: boolean;
}
