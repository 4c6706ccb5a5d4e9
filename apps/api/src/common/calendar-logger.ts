import type { Logger } from '@nestjs/common';
import type { CalendarLogger } from '@gigboard/shared';

/** Routes the shared calendar core's logging through a Nest logger (pino in production). */
export function nestCalendarLogger(logger: Logger): CalendarLogger {
  return {
    debug: (message, context) => logger.debug({ ...context }, message),
    info: (message, context) => logger.log({ ...context }, message),
    warn: (message, context) => logger.warn({ ...context }, message)
  };
}
