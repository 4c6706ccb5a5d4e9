import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsBoolean, IsNotEmpty, IsOptional, IsString, Matches, MaxLength } from 'class-validator';
import { DAY_KEY_FORMAT } from '../../block-outs/dto/create-block-out.dto';

export class CreateGigDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  bandId!: string;

  @ApiProperty({ example: 'Summer Fair' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  name!: string;

  @ApiProperty({ example: '2025-07-10' })
  @Matches(DAY_KEY_FORMAT)
  date!: string;

  @ApiPropertyOptional({ example: '8:00 PM' })
  @IsOptional()
  @IsString()
  @MaxLength(20)
  startTime?: string;

  @ApiPropertyOptional({ example: '11:00 PM' })
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

  @ApiPropertyOptional({ description: 'Offered but not yet confirmed' })
  @IsOptional()
  @IsBoolean()
  isPotential?: boolean;
}

/** PUT replaces every field, as the edit form sends the whole gig. */
export class UpdateGigDto extends CreateGigDto {}
