import { Module } from '@nestjs/common';
import { CalendarModule } from '../calendar/calendar.module';
import { BlockOutsController } from './block-outs.controller';
import { BlockOutsService } from './block-outs.service';

@Module({
  imports: [CalendarModule],
  controllers: [BlockOutsController],
  providers: [BlockOutsService]
})
export class BlockOutsModule {}
