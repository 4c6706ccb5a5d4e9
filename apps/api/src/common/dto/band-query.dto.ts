import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';

export class BandQueryDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  bandId!: string;
}
