import { Module } from '@nestjs/common';
import { CalendarModule } from '../calendar/calendar.module';
import { RehearsalsController } from './rehearsals.controller';
import { RehearsalsService } from './rehearsals.service';

@Module({
  imports: [CalendarModule],
  controllers: [RehearsalsController],
  providers: [RehearsalsService]
})
export class RehearsalsModule {}
