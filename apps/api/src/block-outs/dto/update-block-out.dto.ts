import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsNotEmpty, IsOptional, IsString, Matches, MaxLength } from 'class-validator';
import { DAY_KEY_FORMAT } from './create-block-out.dto';

export class UpdateBlockOutDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  bandId!: string;

  @ApiProperty({ example: '2025-07-11' })
  @Matches(DAY_KEY_FORMAT)
  date!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(500)
  reason?: string;
}
