import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  RawBodyRequest,
} from '@nestjs/common';
import type { Request } from 'express';
import { Observable } from 'rxjs';

/**
 * Raw Body Interceptor
 *
 * Guarantees `request.rawBody` for webhook signature verification. The
 * application is created with `rawBody: true`; when that buffer is absent
 * (another body parser ran first) it is rebuilt from the parsed body.
 */
@Injectable()
export class RawBodyInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<RawBodyRequest<Request>>();

    if (request.rawBody) {
      return next.handle();
    }

    const body: unknown = request.body;
    if (Buffer.isBuffer(body)) {
      request.rawBody = body;
    } else if (typeof body === 'string') {
      request.rawBody = Buffer.from(body);
    } else if (body && typeof body === 'object') {
      // Re-serialized JSON may not match the provider's bytes
      request.rawBody = Buffer.from(JSON.stringify(body));
    }

    return next.handle();
  }
}
