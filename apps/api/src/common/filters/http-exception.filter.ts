import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Request, Response } from 'express';

/** Body of every error response produced by the API. */
export interface ErrorResponseBody {
  success: false;
  message: string;
}

const GENERIC_ERROR_MESSAGE = 'An unexpected error occurred.';

/**
 * Global exception filter. Renders every error as `{ success, message }`.
 *
 * - HttpExceptions keep their status; their message is taken from the
 *   response body (ValidationPipe's message arrays are joined)
 * - Anything else is a 500 with a generic message; the stack is logged
 *   server-side only
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const status =
      exception instanceof HttpException
        ? exception.getStatus()
        : HttpStatus.INTERNAL_SERVER_ERROR;

    const message =
      exception instanceof HttpException
        ? extractMessage(exception)
        : GENERIC_ERROR_MESSAGE;

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        `${request.method} ${request.url} failed with ${status}`,
        describeCause(exception),
      );
    }

    const body: ErrorResponseBody = { success: false, message };
    response.status(status).json(body);
  }
}

function extractMessage(exception: HttpException): string {
  const body = exception.getResponse();

  if (typeof body === 'string') {
    return body;
  }

  if ('message' in body) {
    const { message } = body;
    if (typeof message === 'string') {
      return message;
    }
    if (Array.isArray(message)) {
      return message.filter((m) => typeof m === 'string').join('; ');
    }
  }

  return exception.message;
}

function describeCause(exception: unknown): string | undefined {
  if (exception instanceof HttpException) {
    const cause = exception.cause;
    return cause instanceof Error ? cause.stack : exception.stack;
  }
  return exception instanceof Error ? exception.stack : String(exception);
}
