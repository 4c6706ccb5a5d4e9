import { Controller, Get, HttpCode, HttpStatus, Param, Post } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { CalendarService } from './calendar.service';
import { BandParamsDto, CalendarDayParamsDto, CalendarMonthParamsDto } from './dto/calendar-params.dto';

@ApiTags('calendar')
@Controller('calendar/bands/:bandId')
export class CalendarController {
  constructor(private readonly calendar: CalendarService) {}

  @Get('months/:year/:month')
  month(@Param() params: CalendarMonthParamsDto) {
    return this.calendar.getMonth(params.bandId, params.year, params.month);
  }

  @Get('days/:dayKey')
  day(@Param() params: CalendarDayParamsDto) {
    return this.calendar.getDay(params.bandId, params.dayKey);
  }

  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  refresh(@Param() params: BandParamsDto) {
    return this.calendar.refresh(params.bandId);
  }
}
