/**
 * Zod schemas for the raw session records handed to the loader.
 * Database rows and uploaded MAT-files are both mapped onto this shape.
 */

import { z } from 'zod';

export const IdSchema = z.union([z.string().min(1), z.number().int()]).transform(String);

// Dates only exist within ±8.64e15 ms of the epoch
const MAX_EPOCH_MS = 8.64e15;

const EpochMsSchema = z.number().finite().min(-MAX_EPOCH_MS).max(MAX_EPOCH_MS);

const TimestampSchema = z.union([z.string().min(1), EpochMsSchema, z.date()]);

export const PhaseMarkerSchema = z.union([z.number(), z.string()]);

export const RawSessionRecordSchema = z.object({
  id: IdSchema,
  patient_id: IdSchema,
  start_time: TimestampSchema,
  end_time: TimestampSchema,
  channels: z.array(z.array(z.number().finite())).min(1, 'at least one channel is required'),
  phase_markers: z.array(PhaseMarkerSchema).optional(),
  sample_rate: z.number().finite().positive().optional(),
  timestamps: z.array(EpochMsSchema).optional(),
  exercise_type: z.string().nullish(),
  exercise_gesture: z.string().nullish(),
  stimulation_mode: z.string().nullish(),
  reps_completed: z.number().nullish(),
});

export type RawSessionRecord = z.input<typeof RawSessionRecordSchema>;
export type ParsedSessionRecord = z.output<typeof RawSessionRecordSchema>;

// Data point rows store EMG either as arrays or as JSON text
const EmgArraySchema = z.union([
  z.array(z.number()),
  z.string().transform((text, ctx) => {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `EMG value is not valid JSON: ${reason}` });
      return z.NEVER;
    }
    const result = z.array(z.number()).safeParse(parsed);
    if (!result.success) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'EMG value is not a numeric array' });
      return z.NEVER;
    }
    return result.data;
  }),
]);

// pg hands timestamptz columns back as Date objects, PostgREST as ISO text
export const DbTimestampSchema = z.union([z.string(), z.date().transform((d) => d.toISOString())]);

export const DataPointRowSchema = z.object({
  timestamp: DbTimestampSchema,
  norm_emg: EmgArraySchema.nullish(),
  rms_emg: EmgArraySchema.nullish(),
  stimulation: z.unknown().optional(),
  exercise_phase: PhaseMarkerSchema.nullish(),
});

export type DataPointRow = z.output<typeof DataPointRowSchema>;

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}
