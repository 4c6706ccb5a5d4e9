import { Module } from '@nestjs/common';
import { MonthEventCache } from '@gigboard/shared';
import { config } from '../config';
import { CalendarController } from './calendar.controller';
import { CalendarRepository } from './calendar.repository';
import { CalendarService, MONTH_EVENT_CACHE } from './calendar.service';

@Module({
  controllers: [CalendarController],
  providers: [
    CalendarRepository,
    CalendarService,
    {
      provide: MONTH_EVENT_CACHE,
      useFactory: () => new MonthEventCache({ ttlMs: config.calendar.cacheTtlMs })
    }
  ],
  exports: [CalendarService]
})
export class CalendarModule {}
