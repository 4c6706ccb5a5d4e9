import { Body, Controller, Delete, Param, Post, Put, Query } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { BandQueryDto } from '../common/dto/band-query.dto';
import { BlockOutsService } from './block-outs.service';
import { CreateBlockOutDto } from './dto/create-block-out.dto';
import { DeleteBlockOutSpanDto } from './dto/delete-block-out.dto';
import { UpdateBlockOutDto } from './dto/update-block-out.dto';

@ApiTags('block-outs')
@Controller('block-outs')
export class BlockOutsController {
  constructor(private readonly blockOuts: BlockOutsService) {}

  @Post()
  create(@Body() dto: CreateBlockOutDto) {
    return this.blockOuts.create(dto);
  }

  @Put(':id')
  update(@Param('id') id: string, @Body() dto: UpdateBlockOutDto) {
    return this.blockOuts.update(id, dto);
  }

  // Registered before ':id' so "span" is not taken as a block-out id.
  @Delete('span')
  removeSpan(@Body() dto: DeleteBlockOutSpanDto) {
    return this.blockOuts.removeSpan(dto);
  }

  @Delete(':id')
  remove(@Param('id') id: string, @Query() query: BandQueryDto) {
    return this.blockOuts.remove(id, query.bandId);
  }
}
