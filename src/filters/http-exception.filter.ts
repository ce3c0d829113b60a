import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { Response } from 'express';
import { errorStack, isApplicationError } from '../utils/error-handling.util';
import { SecurityUtil } from '../utils/security.util';

export interface ErrorBody {
  error: string;
  [detail: string]: unknown;
}

/**
 * Renders every failure as `{ "error": "..." }`.
 *
 * Client errors carry their details (e.g. the denied address and tier);
 * server-side details are logged and never returned.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const { status, body } = this.render(exception);
    response.status(status).json(body);
  }

  render(exception: unknown): { status: number; body: ErrorBody } {
    if (isApplicationError(exception)) {
      if (exception.isClientError) {
        return { status: exception.status, body: { error: exception.message, ...exception.details } };
      }
      this.logger.warn(`${exception.type} [${exception.code ?? '-'}]: ${exception.message}`);
      return { status: exception.status, body: { error: exception.message } };
    }

    if (exception instanceof HttpException) {
      return { status: exception.getStatus(), body: { error: HttpExceptionFilter.httpMessage(exception) } };
    }

    this.logger.error(`Unhandled error: ${String(exception)}`, errorStack(exception));
    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      body: { error: SecurityUtil.sanitizeErrorMessage(exception) },
    };
  }

  /** ValidationPipe reports a list of messages; they are joined. */
  private static httpMessage(exception: HttpException): string {
    const payload = exception.getResponse();
    if (typeof payload === 'string') {
      return payload;
    }
    if (typeof payload === 'object' && payload !== null && 'message' in payload) {
      const { message } = payload;
      if (Array.isArray(message)) {
        return message.map(String).join('; ');
      }
      if (typeof message === 'string') {
        return message;
      }
    }
    return exception.message;
  }
}
