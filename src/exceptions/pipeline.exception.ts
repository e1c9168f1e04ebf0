/**
 * Identifies the request an error belongs to, so it can be reproduced
 */
export interface PipelineContext {
  ticker: string;
  start?: string;
  end?: string;
}

export function describeContext(context: PipelineContext): string {
  if (context.start && context.end) {
    return `${context.ticker} [${context.start}..${context.end}]`;
  }
  return context.ticker;
}

/**
 * Base exception for pipeline errors
 */
export class PipelineException extends Error {
  constructor(
    message: string,
    public readonly context: PipelineContext,
    public readonly cause?: Error,
  ) {
    super(`${message} (${describeContext(context)})`);
    this.name = 'PipelineException';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Provider returned nothing for the requested window. Non-fatal.
 */
export class NoDataAvailableException extends PipelineException {
  constructor(context: PipelineContext, provider: string) {
    super(`No data returned by ${provider}`, context);
    this.name = 'NoDataAvailableException';
  }
}

/**
 * A logical column could not be resolved against the artifact's labels
 */
export class ColumnNotFoundException extends PipelineException {
  constructor(
    public readonly column: string,
    public readonly available: readonly string[],
    context: PipelineContext,
  ) {
    super(
      `Column '${column}' not found (case-insensitive). Available columns: ${available.join(', ')}`,
      context,
    );
    this.name = 'ColumnNotFoundException';
  }
}

/**
 * Transform requested before the raw artifact was extracted
 */
export class MissingRawDataException extends PipelineException {
  constructor(context: PipelineContext, path: string) {
    super(`Raw artifact ${path} does not exist; run extraction first`, context);
    this.name = 'MissingRawDataException';
  }
}

/**
 * Network or HTTP failure from an upstream provider
 */
export class ProviderUnavailableException extends PipelineException {
  constructor(
    public readonly provider: string,
    context: PipelineContext,
    public readonly status?: number,
    cause?: Error,
  ) {
    super(
      status !== undefined
        ? `${provider} returned HTTP ${status}`
        : `${provider} request failed${cause ? `: ${cause.message}` : ''}`,
      context,
      cause,
    );
    this.name = 'ProviderUnavailableException';
  }
}

/**
 * Ticker absent from the regulatory provider's ticker directory
 */
export class IdentifierNotFoundException extends PipelineException {
  constructor(context: PipelineContext) {
    super('CIK not found in ticker directory', context);
    this.name = 'IdentifierNotFoundException';
  }
}
