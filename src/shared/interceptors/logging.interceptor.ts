import {
  CallHandler,
  ExecutionContext,
  Injectable,
  Logger,
  NestInterceptor,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const started = Date.now();

    // Failures are logged by the exception filter
    return next.handle().pipe(
      tap(() => {
        const response = http.getResponse<Response>();
        this.logger.debug(
          `${request.method} ${request.url} ${response.statusCode} +${Date.now() - started}ms`,
        );
      }),
    );
  }
}
