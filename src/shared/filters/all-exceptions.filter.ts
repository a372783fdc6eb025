import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { InvalidEmailAddressException } from '../../email-address/domain/exceptions/invalid-email-address.exception';
import { EmailAddressNotFoundException } from '../../email-address/domain/exceptions/email-address-not-found.exception';

export interface ErrorDetail {
  field: string;
  constraints: Record<string, string>;
}

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    // Let @nestjs/terminus health-check responses pass through unchanged
    if (exception instanceof HttpException) {
      const exceptionResponse = exception.getResponse();
      if (
        typeof exceptionResponse === 'object' &&
        exceptionResponse !== null &&
        'status' in exceptionResponse &&
        ('info' in exceptionResponse || 'error' in exceptionResponse) &&
        'details' in exceptionResponse
      ) {
        response.status(exception.getStatus()).json(exceptionResponse);
        return;
      }
    }

    let statusCode: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let message = 'Internal server error';
    let details: ErrorDetail[] = [];

    if (exception instanceof InvalidEmailAddressException) {
      statusCode = HttpStatus.UNPROCESSABLE_ENTITY;
      message = exception.message;
      details = [
        { field: exception.field, constraints: { validation: exception.message } },
      ];
    } else if (exception instanceof EmailAddressNotFoundException) {
      statusCode = HttpStatus.NOT_FOUND;
      message = exception.message;
    } else if (exception instanceof HttpException) {
      statusCode = exception.getStatus();
      const exceptionResponse = exception.getResponse();

      if (typeof exceptionResponse === 'string') {
        message = exceptionResponse;
      } else if ('message' in exceptionResponse) {
        const raw: unknown = exceptionResponse.message;

        // class-validator reports one message per failed constraint
        if (Array.isArray(raw)) {
          message = 'Validation failed';
          details = raw.map((msg) => {
            const text = String(msg);
            return {
              field: text.split(' ')[0] || 'unknown',
              constraints: { validation: text },
            };
          });
        } else {
          message = typeof raw === 'string' && raw ? raw : exception.message;
        }
      } else {
        message = exception.message;
      }
    }

    if (statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        `${request.method} ${request.url} - ${statusCode}`,
        exception instanceof Error ? exception.stack : String(exception),
      );
    } else {
      this.logger.warn(
        `${request.method} ${request.url} - ${statusCode}: ${message}`,
      );
    }

    response.status(statusCode).json({
      success: false,
      error: {
        statusCode,
        message,
        details,
      },
      timestamp: new Date().toISOString(),
    });
  }
}
