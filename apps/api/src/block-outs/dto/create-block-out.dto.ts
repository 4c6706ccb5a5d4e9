import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsNotEmpty, IsOptional, IsString, Matches, MaxLength } from 'class-validator';

export const DAY_KEY_FORMAT = /^\d{4}-\d{2}-\d{2}$/;

export class CreateBlockOutDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  bandId!: string;

  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  userId!: string;

  @ApiProperty({ example: '2025-07-10' })
  @Matches(DAY_KEY_FORMAT)
  startDate!: string;

  @ApiPropertyOptional({ example: '2025-07-14', description: 'Inclusive last day of the range' })
  @IsOptional()
  @Matches(DAY_KEY_FORMAT)
  untilDate?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(500)
  reason?: string;
}
