import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, Matches } from 'class-validator';
import { DAY_KEY_FORMAT } from './create-block-out.dto';

export class DeleteBlockOutSpanDto {
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

  @ApiProperty({ example: '2025-07-14' })
  @Matches(DAY_KEY_FORMAT)
  endDate!: string;
}
