import { Injectable } from '@nestjs/common';
import {
  blockOutRowSchema,
  FALLBACK_MEMBER_NAME,
  gigRowSchema,
  rehearsalRowSchema,
  userNameRowSchema,
  type BlockOutRecord,
  type CalendarDataSource,
  type Gig,
  type Rehearsal,
  type UserNameRow
} from '@gigboard/shared';
import { z } from 'zod';
import { SupabaseService } from '../supabase/supabase.service';
import { unwrapRows } from '../supabase/supabase-query';

export const GIGS_TABLE = 'gigs';
export const REHEARSALS_TABLE = 'rehearsals';
export const BLOCK_DATES_TABLE = 'block_dates';
export const USERS_TABLE = 'users';

export function displayNameOf(row: UserNameRow): string {
  if (row.first_name) return row.first_name;
  if (row.last_name) return row.last_name;
  return FALLBACK_MEMBER_NAME;
}

@Injectable()
export class CalendarRepository implements CalendarDataSource {
  constructor(private readonly supabase: SupabaseService) {}

  async fetchGigsForBand(bandId: string): Promise<Gig[]> {
    const result = await this.supabase.client
      .from(GIGS_TABLE)
      .select('*')
      .eq('band_id', bandId)
      .order('date', { ascending: true });

    return z.array(gigRowSchema).parse(unwrapRows(result, 'Failed to fetch gigs'));
  }

  async fetchRehearsalsForBand(bandId: string): Promise<Rehearsal[]> {
    const result = await this.supabase.client
      .from(REHEARSALS_TABLE)
      .select('*')
      .eq('band_id', bandId)
      .order('date', { ascending: true });

    return z.array(rehearsalRowSchema).parse(unwrapRows(result, 'Failed to fetch rehearsals'));
  }

  async fetchBlockOutsForBand(bandId: string): Promise<BlockOutRecord[]> {
    const result = await this.supabase.client
      .from(BLOCK_DATES_TABLE)
      .select('*')
      .eq('band_id', bandId)
      .order('date', { ascending: true });

    return z.array(blockOutRowSchema).parse(unwrapRows(result, 'Failed to fetch block dates'));
  }

  async resolveUserDisplayNames(userIds: string[]): Promise<Map<string, string>> {
    if (userIds.length === 0) return new Map();

    const result = await this.supabase.client
      .from(USERS_TABLE)
      .select('id, first_name, last_name')
      .in('id', userIds);

    const rows = z.array(userNameRowSchema).parse(unwrapRows(result, 'Failed to fetch member names'));
    return new Map(rows.map((row): [string, string] => [row.id, displayNameOf(row)]));
  }
}
