import { z } from 'zod';
import { isDayKey } from './day-key';

export const calendarEventKindSchema = z.enum(['GIG', 'REHEARSAL', 'BLOCK_OUT']);

// Postgres `date` columns arrive as `YYYY-MM-DD`; timestamps are cut back to their date part.
export const dayKeySchema = z
  .string()
  .transform((value) => value.slice(0, 10))
  .refine(isDayKey, { message: 'Expected a YYYY-MM-DD date' });

const textSchema = z
  .string()
  .nullish()
  .transform((value) => value ?? '');

const optionalTextSchema = z
  .string()
  .nullish()
  .transform((value) => value ?? null);

export const gigRowSchema = z
  .object({
    id: z.string().min(1),
    band_id: z.string().min(1),
    name: z.string(),
    date: dayKeySchema,
    start_time: textSchema,
    end_time: textSchema,
    location: textSchema,
    notes: optionalTextSchema,
    setlist_id: optionalTextSchema,
    is_potential: z.boolean().nullish().transform((value) => value ?? false)
  })
  .transform((row) => ({
    id: row.id,
    bandId: row.band_id,
    name: row.name,
    date: row.date,
    startTime: row.start_time,
    endTime: row.end_time,
    location: row.location,
    notes: row.notes,
    setlistId: row.setlist_id,
    isPotential: row.is_potential
  }));

export const rehearsalRowSchema = z
  .object({
    id: z.string().min(1),
    band_id: z.string().min(1),
    date: dayKeySchema,
    start_time: textSchema,
    end_time: textSchema,
    location: textSchema,
    notes: optionalTextSchema,
    setlist_id: optionalTextSchema
  })
  .transform((row) => ({
    id: row.id,
    bandId: row.band_id,
    date: row.date,
    startTime: row.start_time,
    endTime: row.end_time,
    location: row.location,
    notes: row.notes,
    setlistId: row.setlist_id
  }));

// `reason` is NOT NULL in block_dates; an empty string means no reason was given.
export const blockOutRowSchema = z
  .object({
    id: z.string().min(1),
    user_id: z.string().min(1),
    band_id: z.string().min(1),
    date: dayKeySchema,
    reason: textSchema
  })
  .transform((row) => ({
    id: row.id,
    userId: row.user_id,
    bandId: row.band_id,
    date: row.date,
    reason: row.reason
  }));

export const userNameRowSchema = z.object({
  id: z.string().min(1),
  first_name: optionalTextSchema,
  last_name: optionalTextSchema
});

export type CalendarEventKind = z.infer<typeof calendarEventKindSchema>;
export type Gig = z.output<typeof gigRowSchema>;
export type Rehearsal = z.output<typeof rehearsalRowSchema>;
export type BlockOutRecord = z.output<typeof blockOutRowSchema>;
export type UserNameRow = z.output<typeof userNameRowSchema>;
