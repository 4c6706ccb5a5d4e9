import { Controller, Get } from '@nestjs/common';
import { CalendarService } from '../calendar/calendar.service';

@Controller('health')
export class HealthController {
  constructor(private readonly calendar: CalendarService) {}

  @Get()
  check(): { status: string; cachedMonths: number; time: string } {
    return {
      status: 'ok',
      cachedMonths: this.calendar.cachedMonthCount,
      time: new Date().toISOString()
    };
  }
}
