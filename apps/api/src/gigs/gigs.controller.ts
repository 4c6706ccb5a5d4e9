import { Body, Controller, Delete, Param, Post, Put, Query } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { BandQueryDto } from '../common/dto/band-query.dto';
import { CreateGigDto, UpdateGigDto } from './dto/gig.dto';
import { GigsService } from './gigs.service';

@ApiTags('gigs')
@Controller('gigs')
export class GigsController {
  constructor(private readonly gigs: GigsService) {}

  @Post()
  create(@Body() dto: CreateGigDto) {
    return this.gigs.create(dto);
  }

  @Put(':id')
  update(@Param('id') id: string, @Body() dto: UpdateGigDto) {
    return this.gigs.update(id, dto);
  }

  @Delete(':id')
  remove(@Param('id') id: string, @Query() query: BandQueryDto) {
    return this.gigs.remove(id, query.bandId);
  }
}
