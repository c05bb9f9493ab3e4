// Session table: display rows, filters and the summary shown for a selection

import { formatDuration, formatTimestampForDisplay, parseTimestamp } from '../formatters';
import type { ExerciseSession } from '@/types/database';

export interface SessionTableRow extends ExerciseSession {
  startTimeDisplay: string;
  durationDisplay: string;
  // Unformatted value, kept for sorting and filtering
  startTimeRaw: string | null;
}

export function prepareSessionTable(sessions: readonly ExerciseSession[]): SessionTableRow[] {
  return sessions.map((session) => ({
    ...session,
    startTimeDisplay: formatTimestampForDisplay(session.start_time),
    durationDisplay: formatDuration(session.duration_seconds),
    startTimeRaw: session.start_time,
  }));
}

export interface SessionFilter {
  // Inclusive, YYYY-MM-DD in UTC
  fromDate?: string;
  toDate?: string;
  exerciseType?: string;
  exerciseGesture?: string;
}

function dateOnly(value: string | null): string | null {
  const date = parseTimestamp(value);
  return date ? date.toISOString().slice(0, 10) : null;
}

export function filterSessions<T extends ExerciseSession>(rows: readonly T[], filter: SessionFilter): T[] {
  return rows.filter((row) => {
    if (filter.fromDate || filter.toDate) {
      const day = dateOnly(row.start_time);
      if (!day) return false;
      if (filter.fromDate && day < filter.fromDate) return false;
      if (filter.toDate && day > filter.toDate) return false;
    }
    if (filter.exerciseType && row.exercise_type !== filter.exerciseType) return false;
    if (filter.exerciseGesture && row.exercise_gesture !== filter.exerciseGesture) return false;
    return true;
  });
}

/**
 * Distinct non-empty values of a column, sorted, for filter choices.
 */
export function distinctValues(
  rows: readonly ExerciseSession[],
  column: 'exercise_type' | 'exercise_gesture' | 'stimulation_mode'
): string[] {
  const values = new Set<string>();
  for (const row of rows) {
    const value = row[column];
    if (value) values.add(value);
  }
  return [...values].sort();
}

export interface SessionSummary {
  sessions: number;
  totalMinutes: number;
  totalReps: number;
  averageMinutes: number | null;
}

export function summarizeSessions(rows: readonly ExerciseSession[]): SessionSummary {
  const durations = rows.map((r) => r.duration_seconds).filter((d): d is number => d !== null);
  const totalSeconds = durations.reduce((sum, d) => sum + d, 0);

  return {
    sessions: rows.length,
    totalMinutes: totalSeconds / 60,
    totalReps: rows.reduce((sum, r) => sum + (r.reps_completed ?? 0), 0),
    averageMinutes: durations.length > 0 ? totalSeconds / durations.length / 60 : null,
  };
}
