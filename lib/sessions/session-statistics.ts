/**
 * Per-day session statistics for the sessions overview charts:
 * sessions per day, minutes per day, and when in the day each session began.
 */

import { EmptySelectionError } from '../errors';
import { parseTimestamp } from '../formatters';

const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

export interface SessionTiming {
  time: unknown;
  durationSeconds?: number | null;
}

export interface DailyTotals {
  date: string;
  sessions: number;
  totalMinutes: number;
}

export interface TimeOfDayPoint {
  timestamp: string;
  hour: number;
  dayOfWeek: string;
}

export interface DailyStatistics {
  days: DailyTotals[];
  timeOfDay: TimeOfDayPoint[];
}

/**
 * Group sessions by UTC calendar day. Sessions whose time does not parse are
 * dropped; missing durations count as zero minutes.
 */
export function computeDailyStatistics(rows: readonly SessionTiming[]): DailyStatistics {
  const parsed = rows.flatMap((row) => {
    const date = parseTimestamp(row.time);
    return date ? [{ date, durationSeconds: row.durationSeconds ?? null }] : [];
  });

  if (parsed.length === 0) {
    throw new EmptySelectionError('No sessions with a valid start time');
  }
  if (parsed.length < rows.length) {
    console.warn(`[Session Statistics] Dropped ${rows.length - parsed.length} session(s) with unparsable times`);
  }

  const byDay = new Map<string, DailyTotals>();
  for (const { date, durationSeconds } of parsed) {
    const day = date.toISOString().slice(0, 10);
    const totals = byDay.get(day) ?? { date: day, sessions: 0, totalMinutes: 0 };
    totals.sessions += 1;
    if (durationSeconds !== null && !isNaN(durationSeconds)) {
      totals.totalMinutes += durationSeconds / 60;
    }
    byDay.set(day, totals);
  }

  return {
    days: [...byDay.values()].sort((a, b) => a.date.localeCompare(b.date)),
    timeOfDay: parsed
      .sort((a, b) => a.date.getTime() - b.date.getTime())
      .map(({ date }) => ({
        timestamp: date.toISOString(),
        hour: date.getUTCHours() + date.getUTCMinutes() / 60,
        dayOfWeek: WEEKDAYS[date.getUTCDay()],
      })),
  };
}
