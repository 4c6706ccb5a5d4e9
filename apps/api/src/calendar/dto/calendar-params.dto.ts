import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsNotEmpty, IsString, Matches, Max, Min } from 'class-validator';

export class BandParamsDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  bandId!: string;
}

export class CalendarMonthParamsDto extends BandParamsDto {
  @ApiProperty({ example: 2025 })
  @Type(() => Number)
  @IsInt()
  @Min(1970)
  @Max(9999)
  year!: number;

  @ApiProperty({ minimum: 1, maximum: 12 })
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(12)
  month!: number;
}

export class CalendarDayParamsDto extends BandParamsDto {
  @ApiProperty({ example: '2025-07-10' })
  @Matches(/^\d{4}-\d{2}-\d{2}$/)
  dayKey!: string;
}
