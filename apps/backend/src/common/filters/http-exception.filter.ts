import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Request, Response } from 'express';

export interface ErrorBody {
  timestamp: string;
  status: number;
  error: string;
  message: string | string[];
  path: string;
}

const reasonPhrase = (status: number) =>
  (HttpStatus[status] ?? 'ERROR')
    .toLowerCase()
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');

const messageOf = (exception: HttpException): string | string[] => {
  const response = exception.getResponse();
  if (typeof response === 'string') {
    return response;
  }
  const message: unknown = Reflect.get(response, 'message');
  if (typeof message === 'string') {
    return message;
  }
  if (
    Array.isArray(message) &&
    message.every((entry): entry is string => typeof entry === 'string')
  ) {
    return message;
  }
  return exception.message;
};

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const status =
      exception instanceof HttpException
        ? exception.getStatus()
        : HttpStatus.INTERNAL_SERVER_ERROR;
    const message =
      exception instanceof HttpException
        ? messageOf(exception)
        : 'Internal server error';

    if (status >= 500) {
      this.logger.error(
        `Unexpected error on ${request.method} ${request.originalUrl ?? request.url}`,
        exception instanceof Error ? exception.stack : String(exception),
      );
    } else {
      this.logger.warn(
        `${status} on ${request.method} ${request.originalUrl ?? request.url}: ${Array.isArray(message) ? message.join('; ') : message}`,
      );
    }

    const body: ErrorBody = {
      timestamp: new Date().toISOString(),
      status,
      error: reasonPhrase(status),
      message,
      path: request.originalUrl ?? request.url,
    };
    response.status(status).json(body);
  }
}
