import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsNotEmpty, IsOptional, IsString, Matches, MaxLength } from 'class-validator';
import { DAY_KEY_FORMAT } from '../../block-outs/dto/create-block-out.dto';

export class CreateRehearsalDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  bandId!: string;

  @ApiProperty({ example: '2025-07-08' })
  @Matches(DAY_KEY_FORMAT)
  date!: string;

  @ApiPropertyOptional({ example: '7:00 PM' })
  @IsOptional()
  @IsString()
  @MaxLength(20)
  startTime?: string;

  @ApiPropertyOptional({ example: '10:00 PM' })
  @IsOptional()
  @IsString()
  @MaxLength(20)
  endTime?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(300)
  location?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  notes?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  setlistId?: string;
}

/** PUT replaces every field, as the edit form sends the whole rehearsal. */
export class UpdateRehearsalDto extends CreateRehearsalDto {}
