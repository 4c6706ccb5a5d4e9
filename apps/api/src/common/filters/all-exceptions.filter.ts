import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger
} from '@nestjs/common';
import { isCalendarError, type CalendarErrorCode } from '@gigboard/shared';
import type { Request, Response } from 'express';

const calendarErrorStatus: Record<CalendarErrorCode, HttpStatus> = {
  NO_BAND_SELECTED: HttpStatus.BAD_REQUEST,
  INVALID_DAY_KEY: HttpStatus.BAD_REQUEST,
  FETCH_FAILED: HttpStatus.BAD_GATEWAY
};

export function resolveException(exception: unknown): { status: number; error: unknown } {
  if (exception instanceof HttpException) {
    return { status: exception.getStatus(), error: exception.getResponse() };
  }

  if (isCalendarError(exception)) {
    return {
      status: calendarErrorStatus[exception.code],
      error: { code: exception.code, message: exception.message }
    };
  }

  return { status: HttpStatus.INTERNAL_SERVER_ERROR, error: { message: 'Internal server error' } };
}

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const { status, error } = resolveException(exception);

    if (status >= 500) {
      this.logger.error(
        {
          path: request.url,
          method: request.method,
          body: request.body,
          exception
        },
        'Unhandled server exception'
      );
    }

    response.status(status).json({
      statusCode: status,
      path: request.url,
      timestamp: new Date().toISOString(),
      error
    });
  }
}
