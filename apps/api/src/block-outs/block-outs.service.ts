import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException
} from '@nestjs/common';
import {
  blockOutRowSchema,
  compareCalendarDates,
  daysBetweenInclusive,
  expandRangeToDayKeys,
  parseDayKey,
  type BlockOutRecord
} from '@gigboard/shared';
import { canonicalDay, requireBand, trimmedText } from '../common/band-input';
import { CalendarService } from '../calendar/calendar.service';
import { BLOCK_DATES_TABLE } from '../calendar/calendar.repository';
import { SupabaseService } from '../supabase/supabase.service';
import { isNoRows, isUniqueViolation, SupabaseQueryError, unwrapRows } from '../supabase/supabase-query';
import { CreateBlockOutDto } from './dto/create-block-out.dto';
import { DeleteBlockOutSpanDto } from './dto/delete-block-out.dto';
import { UpdateBlockOutDto } from './dto/update-block-out.dto';

/** Longest range one request may block out; each day is its own row. */
export const MAX_BLOCK_OUT_DAYS = 366;

@Injectable()
export class BlockOutsService {
  private readonly logger = new Logger(BlockOutsService.name);

  constructor(
    private readonly supabase: SupabaseService,
    private readonly calendar: CalendarService
  ) {}

  async create(dto: CreateBlockOutDto): Promise<BlockOutRecord[]> {
    const bandId = requireBand(dto.bandId);
    const startDate = canonicalDay(dto.startDate);
    const untilDate = dto.untilDate ? canonicalDay(dto.untilDate) : null;

    if (untilDate) {
      const start = parseDayKey(startDate);
      const until = parseDayKey(untilDate);
      if (compareCalendarDates(until, start) < 0) {
        throw new BadRequestException('untilDate must not be before startDate');
      }
      if (daysBetweenInclusive(start, until) > MAX_BLOCK_OUT_DAYS) {
        throw new BadRequestException(`A block-out may span at most ${MAX_BLOCK_OUT_DAYS} days`);
      }
    }

    const reason = trimmedText(dto.reason);
    const days = untilDate ? expandRangeToDayKeys({ startDate, untilDate }) : [startDate];
    const created: BlockOutRecord[] = [];

    try {
      for (const date of days) {
        const result = await this.supabase.client
          .from(BLOCK_DATES_TABLE)
          .insert({ band_id: bandId, user_id: dto.userId, date, reason })
          .select()
          .single();

        if (isUniqueViolation(result.error)) {
          if (days.length === 1) {
            throw new ConflictException(`Block-out already exists for ${date}`);
          }
          // Ranges may overlap days the member already blocked out.
          this.logger.debug({ bandId, date }, 'Skipped existing block-out day');
          continue;
        }

        created.push(blockOutRowSchema.parse(unwrapRows(result, 'Failed to create block-out')));
      }
    } finally {
      // Rows written before a failure are visible on the next read.
      if (created.length > 0) this.calendar.invalidate(bandId);
    }

    this.logger.log({ bandId, requested: days.length, created: created.length }, 'Created block-out days');
    return created;
  }

  async update(blockOutId: string, dto: UpdateBlockOutDto): Promise<BlockOutRecord> {
    const bandId = requireBand(dto.bandId);

    const result = await this.supabase.client
      .from(BLOCK_DATES_TABLE)
      .update({
        date: canonicalDay(dto.date),
        reason: trimmedText(dto.reason),
        updated_at: new Date().toISOString()
      })
      .eq('id', blockOutId)
      .eq('band_id', bandId)
      .select()
      .single();

    if (isNoRows(result.error)) {
      throw new NotFoundException('Block-out not found');
    }

    const updated = blockOutRowSchema.parse(unwrapRows(result, 'Failed to update block-out'));
    this.calendar.invalidate(bandId);
    return updated;
  }

  async remove(blockOutId: string, bandId: string): Promise<{ deleted: true }> {
    const band = requireBand(bandId);

    const { error } = await this.supabase.client
      .from(BLOCK_DATES_TABLE)
      .delete()
      .eq('id', blockOutId)
      .eq('band_id', band);

    if (error) throw new SupabaseQueryError('Failed to delete block-out', error);

    this.calendar.invalidate(band);
    return { deleted: true };
  }

  /** Deletes every day of a member's span, used when a multi-day block-out is edited or removed. */
  async removeSpan(dto: DeleteBlockOutSpanDto): Promise<{ deleted: true }> {
    const bandId = requireBand(dto.bandId);

    const { error } = await this.supabase.client
      .from(BLOCK_DATES_TABLE)
      .delete()
      .eq('user_id', dto.userId)
      .eq('band_id', bandId)
      .gte('date', canonicalDay(dto.startDate))
      .lte('date', canonicalDay(dto.endDate));

    if (error) throw new SupabaseQueryError('Failed to delete block-out span', error);

    this.calendar.invalidate(bandId);
    return { deleted: true };
  }
}
