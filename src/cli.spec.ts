import { CliUsageError, parseCliArgs } from './cli';

describe('parseCliArgs', () => {
  it('should parse a window command and upper-case the ticker', () => {
    expect(parseCliArgs(['prices', 'aapl', '2023-01-15', '2023-02-01'])).toEqual({
      command: 'prices',
      ticker: 'AAPL',
      start: '2023-01-15',
      end: '2023-02-01',
    });
  });

  it('should parse fundamentals with and without --force', () => {
    expect(parseCliArgs(['fundamentals', 'msft'])).toEqual({
      command: 'fundamentals',
      ticker: 'MSFT',
      force: false,
    });
    expect(parseCliArgs(['fundamentals', '--force', 'msft'])).toEqual({
      command: 'fundamentals',
      ticker: 'MSFT',
      force: true,
    });
  });

  it('should clean every zone by default', () => {
    expect(parseCliArgs(['clean'])).toEqual({
      command: 'clean',
      zones: ['raw', 'staged', 'analytics', 'fundamentals', 'cache'],
    });
    expect(parseCliArgs(['clean', 'staged'])).toEqual({ command: 'clean', zones: ['staged'] });
  });

  it('should reject tickers that are not plain symbols', () => {
    expect(() => parseCliArgs(['extract', '../../x', '2023-01-01', '2023-01-02'])).toThrow(
      "Invalid ticker '../../x'",
    );
    expect(() => parseCliArgs(['fundamentals', 'aapl/../msft'])).toThrow(CliUsageError);
  });

  it.each([
    [[]],
    [['serve']],
    [['extract', 'AAPL', '2023-01-15']],
    [['transform', 'AAPL', '2023-02-30', '2023-03-01']],
    [['prices', 'AAPL', '2023-02-01', '2023-01-15']],
    [['fundamentals']],
    [['clean', 'everything']],
  ])('should reject %j', (argv: string[]) => {
    expect(() => parseCliArgs(argv)).toThrow(CliUsageError);
  });
});
