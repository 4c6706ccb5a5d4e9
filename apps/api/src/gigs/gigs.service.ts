import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { gigRowSchema, type Gig } from '@gigboard/shared';
import { canonicalDay, nullableText, requireBand, trimmedText } from '../common/band-input';
import { CalendarService } from '../calendar/calendar.service';
import { GIGS_TABLE } from '../calendar/calendar.repository';
import { SupabaseService } from '../supabase/supabase.service';
import { isNoRows, SupabaseQueryError, unwrapRows } from '../supabase/supabase-query';
import { CreateGigDto, UpdateGigDto } from './dto/gig.dto';

function gigColumns(dto: CreateGigDto) {
  const name = dto.name.trim();
  if (!name) throw new BadRequestException('Gig name is required');

  return {
    name,
    date: canonicalDay(dto.date),
    start_time: trimmedText(dto.startTime),
    end_time: trimmedText(dto.endTime),
    location: trimmedText(dto.location),
    notes: nullableText(dto.notes),
    setlist_id: dto.setlistId ?? null,
    is_potential: dto.isPotential ?? false
  };
}

@Injectable()
export class GigsService {
  private readonly logger = new Logger(GigsService.name);

  constructor(
    private readonly supabase: SupabaseService,
    private readonly calendar: CalendarService
  ) {}

  async create(dto: CreateGigDto): Promise<Gig> {
    const bandId = requireBand(dto.bandId);

    const result = await this.supabase.client
      .from(GIGS_TABLE)
      .insert({ band_id: bandId, ...gigColumns(dto) })
      .select()
      .single();

    const gig = gigRowSchema.parse(unwrapRows(result, 'Failed to create gig'));
    this.calendar.invalidate(bandId);
    this.logger.log({ bandId, gigId: gig.id, date: gig.date }, 'Created gig');
    return gig;
  }

  async update(gigId: string, dto: UpdateGigDto): Promise<Gig> {
    const bandId = requireBand(dto.bandId);

    const result = await this.supabase.client
      .from(GIGS_TABLE)
      .update({ ...gigColumns(dto), updated_at: new Date().toISOString() })
      .eq('id', gigId)
      .eq('band_id', bandId)
      .select()
      .single();

    if (isNoRows(result.error)) {
      throw new NotFoundException('Gig not found');
    }

    const gig = gigRowSchema.parse(unwrapRows(result, 'Failed to update gig'));
    this.calendar.invalidate(bandId);
    return gig;
  }

  async remove(gigId: string, bandId: string): Promise<{ deleted: true }> {
    const band = requireBand(bandId);

    const { error } = await this.supabase.client.from(GIGS_TABLE).delete().eq('id', gigId).eq('band_id', band);
    if (error) throw new SupabaseQueryError('Failed to delete gig', error);

    this.calendar.invalidate(band);
    return { deleted: true };
  }
}
