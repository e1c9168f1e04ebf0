import { IsInt, IsNotEmpty, IsString, Min } from 'class-validator';

/**
 * One entry of the SEC company ticker directory,
 * e.g. `{ "cik_str": 320193, "ticker": "AAPL", "title": "Apple Inc." }`
 */
export class CompanyTickerEntryDto {
  @IsInt()
  @Min(0)
  cik_str!: number;

  @IsString()
  @IsNotEmpty()
  ticker!: string;

  @IsString()
  title!: string;
}
