import { Module } from '@nestjs/common';
import { CalendarModule } from '../calendar/calendar.module';
import { GigsController } from './gigs.controller';
import { GigsService } from './gigs.service';

@Module({
  imports: [CalendarModule],
  controllers: [GigsController],
  providers: [GigsService]
})
export class GigsModule {}
