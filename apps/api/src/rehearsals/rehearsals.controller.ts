import { Body, Controller, Delete, Param, Post, Put, Query } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { BandQueryDto } from '../common/dto/band-query.dto';
import { CreateRehearsalDto, UpdateRehearsalDto } from './dto/rehearsal.dto';
import { RehearsalsService } from './rehearsals.service';

@ApiTags('rehearsals')
@Controller('rehearsals')
export class RehearsalsController {
  constructor(private readonly rehearsals: RehearsalsService) {}

  @Post()
  create(@Body() dto: CreateRehearsalDto) {
    return this.rehearsals.create(dto);
  }

  @Put(':id')
  update(@Param('id') id: string, @Body() dto: UpdateRehearsalDto) {
    return this.rehearsals.update(id, dto);
  }

  @Delete(':id')
  remove(@Param('id') id: string, @Query() query: BandQueryDto) {
    return this.rehearsals.remove(id, query.bandId);
  }
}
