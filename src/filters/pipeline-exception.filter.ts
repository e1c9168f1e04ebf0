import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import {
  ColumnNotFoundException,
  IdentifierNotFoundException,
  MissingRawDataException,
  NoDataAvailableException,
  PipelineException,
  ProviderUnavailableException,
} from '../exceptions';

export interface PipelineErrorBody {
  statusCode: number;
  error: string;
  message: string;
  ticker: string;
  start?: string;
  end?: string;
}

export function statusFor(exception: PipelineException): HttpStatus {
  if (exception instanceof NoDataAvailableException || exception instanceof IdentifierNotFoundException) {
    return HttpStatus.NOT_FOUND;
  }
  if (exception instanceof ColumnNotFoundException) {
    return HttpStatus.UNPROCESSABLE_ENTITY;
  }
  if (exception instanceof MissingRawDataException) {
    return HttpStatus.CONFLICT;
  }
  if (exception instanceof ProviderUnavailableException) {
    return HttpStatus.BAD_GATEWAY;
  }
  return HttpStatus.INTERNAL_SERVER_ERROR;
}

/**
 * Maps pipeline exceptions to HTTP responses carrying the ticker and window
 */
@Catch(PipelineException)
export class PipelineExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(PipelineExceptionFilter.name);

  constructor(private readonly httpAdapterHost: HttpAdapterHost) {}

  catch(exception: PipelineException, host: ArgumentsHost): void {
    const { httpAdapter } = this.httpAdapterHost;
    const ctx = host.switchToHttp();
    const statusCode = statusFor(exception);

    if (statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(exception.message, exception.stack);
    } else {
      this.logger.warn(exception.message);
    }

    const body: PipelineErrorBody = {
      statusCode,
      error: exception.name,
      message: exception.message,
      ...exception.context,
    };
    httpAdapter.reply(ctx.getResponse(), body, statusCode);
  }
}
