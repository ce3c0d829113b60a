import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { Response } from 'express';

/**
 * An AbortSignal that fires when the client goes away before the
 * response has been written. Ledger calls and lookups made on behalf of
 * the request take it.
 */
export const RequestSignal = createParamDecorator((_data: unknown, ctx: ExecutionContext): AbortSignal => {
  const response = ctx.switchToHttp().getResponse<Response>();
  const controller = new AbortController();
  response.once('close', () => {
    if (!response.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
});
