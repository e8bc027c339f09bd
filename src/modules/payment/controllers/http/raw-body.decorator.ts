import { createParamDecorator, ExecutionContext, RawBodyRequest } from '@nestjs/common';
import { Request } from 'express';

/**
 * Request body bytes as received: the buffer left by the raw parser that
 * PaymentModule mounts on its routes, or the copy Nest keeps under
 * `rawBody: true` when a JSON parser ran first.
 */
export const RawBody = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): Buffer | undefined => {
    const request = ctx.switchToHttp().getRequest<RawBodyRequest<Request>>();
    const body: unknown = request.body;
    return Buffer.isBuffer(body) ? body : request.rawBody;
  },
);
