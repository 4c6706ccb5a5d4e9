import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { rehearsalRowSchema, type Rehearsal } from '@gigboard/shared';
import { canonicalDay, nullableText, requireBand, trimmedText } from '../common/band-input';
import { CalendarService } from '../calendar/calendar.service';
import { REHEARSALS_TABLE } from '../calendar/calendar.repository';
import { SupabaseService } from '../supabase/supabase.service';
import { isNoRows, SupabaseQueryError, unwrapRows } from '../supabase/supabase-query';
import { CreateRehearsalDto, UpdateRehearsalDto } from './dto/rehearsal.dto';

function rehearsalColumns(dto: CreateRehearsalDto) {
  return {
    date: canonicalDay(dto.date),
    start_time: trimmedText(dto.startTime),
    end_time: trimmedText(dto.endTime),
    location: trimmedText(dto.location),
    notes: nullableText(dto.notes),
    setlist_id: dto.setlistId ?? null
  };
}

@Injectable()
export class RehearsalsService {
  private readonly logger = new Logger(RehearsalsService.name);

  constructor(
    private readonly supabase: SupabaseService,
    private readonly calendar: CalendarService
  ) {}

  async create(dto: CreateRehearsalDto): Promise<Rehearsal> {
    const bandId = requireBand(dto.bandId);

    const result = await this.supabase.client
      .from(REHEARSALS_TABLE)
      .insert({ band_id: bandId, ...rehearsalColumns(dto) })
      .select()
      .single();

    const rehearsal = rehearsalRowSchema.parse(unwrapRows(result, 'Failed to create rehearsal'));
    this.calendar.invalidate(bandId);
    this.logger.log({ bandId, rehearsalId: rehearsal.id, date: rehearsal.date }, 'Created rehearsal');
    return rehearsal;
  }

  async update(rehearsalId: string, dto: UpdateRehearsalDto): Promise<Rehearsal> {
    const bandId = requireBand(dto.bandId);

    const result = await this.supabase.client
      .from(REHEARSALS_TABLE)
      .update({ ...rehearsalColumns(dto), updated_at: new Date().toISOString() })
      .eq('id', rehearsalId)
      .eq('band_id', bandId)
      .select()
      .single();

    if (isNoRows(result.error)) {
      throw new NotFoundException('Rehearsal not found');
    }

    const rehearsal = rehearsalRowSchema.parse(unwrapRows(result, 'Failed to update rehearsal'));
    this.calendar.invalidate(bandId);
    return rehearsal;
  }

  async remove(rehearsalId: string, bandId: string): Promise<{ deleted: true }> {
    const band = requireBand(bandId);

    const { error } = await this.supabase.client
      .from(REHEARSALS_TABLE)
      .delete()
      .eq('id', rehearsalId)
      .eq('band_id', band);
    if (error) throw new SupabaseQueryError('Failed to delete rehearsal', error);

    this.calendar.invalidate(band);
    return { deleted: true };
  }
}
