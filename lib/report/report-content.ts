/**
 * Rehabilitation report content
 *
 * Everything the PDF shows, computed from the selected sessions: key metrics,
 * exercise breakdown, early/recent trend, recommendations, activity charts
 * and the session detail table.
 */

import { REPORT_MAX_BREAKDOWN_ROWS } from '../constants';
import { EmptySelectionError } from '../errors';
import { parseTimestamp } from '../formatters';
import { computeDailyStatistics, type DailyStatistics } from '../sessions/session-statistics';
import { prepareSessionTable, summarizeSessions } from '../sessions/session-table';
import type { ExerciseSession } from '@/types/database';

export interface ReportSections {
  summary: boolean;
  details: boolean;
  exercises: boolean;
  trends: boolean;
  charts: boolean;
}

export interface ReportOptions {
  patientName: string;
  period?: string;
  generatedAt?: Date;
  sections?: Partial<ReportSections>;
}

export interface KeyMetrics {
  totalSessions: number;
  activeDays: number;
  averageMinutes: number | null;
  sessionsPerDay: number;
  totalReps: number;
  averageReps: number | null;
}

export interface BreakdownRow {
  name: string;
  count: number;
  percent: number;
}

export interface RepsTrend {
  early: number | null;
  recent: number | null;
  changePercent: number | null;
}

export interface RepsPoint {
  timestamp: string;
  reps: number;
}

export interface ReportContent {
  patientName: string;
  period?: string;
  generatedAt: Date;
  sections: ReportSections;
  metrics: KeyMetrics;
  exercises: BreakdownRow[];
  gestures: BreakdownRow[];
  trend: RepsTrend | null;
  recommendations: string[];
  activity: DailyStatistics | null;
  hourHistogram: number[];
  repsSeries: RepsPoint[];
  detailHeader: string[];
  detailRows: string[][];
}

const DEFAULT_SECTIONS: ReportSections = {
  summary: true,
  details: true,
  exercises: true,
  trends: true,
  charts: true,
};

export const DETAIL_COLUMNS = ['Start Time', 'Duration', 'Exercise', 'Gesture', 'Stimulation', 'Reps'];

function mean(values: readonly number[]): number | null {
  return values.length > 0 ? values.reduce((sum, v) => sum + v, 0) / values.length : null;
}

function repsOf(sessions: readonly ExerciseSession[]): number[] {
  return sessions.map((s) => s.reps_completed).filter((r): r is number => r !== null);
}

/**
 * Most frequent values first (ties by name), as a share of all sessions.
 */
export function breakdown(values: ReadonlyArray<string | null>, total: number): BreakdownRow[] {
  const counts = new Map<string, number>();
  for (const value of values) {
    if (value) counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
    .slice(0, REPORT_MAX_BREAKDOWN_ROWS)
    .map(([name, count]) => ({ name, count, percent: Math.round((count / total) * 100) }));
}

function startMs(session: ExerciseSession): number | null {
  return parseTimestamp(session.start_time)?.getTime() ?? null;
}

// Sessions in time order; sessions without a usable start time go last
function chronological(sessions: readonly ExerciseSession[]): ExerciseSession[] {
  return [...sessions].sort((a, b) => {
    const x = startMs(a);
    const y = startMs(b);
    if (x === null || y === null) return (x === null ? 1 : 0) - (y === null ? 1 : 0);
    return x - y;
  });
}

/**
 * Mean reps of the earlier half of the sessions against the later half.
 * Needs at least two sessions.
 */
export function computeRepsTrend(sessions: readonly ExerciseSession[]): RepsTrend | null {
  if (sessions.length < 2) return null;

  const ordered = chronological(sessions);
  const mid = Math.floor(ordered.length / 2);
  const early = mean(repsOf(ordered.slice(0, mid)));
  const recent = mean(repsOf(ordered.slice(mid)));
  const changePercent = early !== null && early !== 0 && recent !== null ? ((recent - early) / early) * 100 : null;

  return { early, recent, changePercent };
}

export function recommendationsFor(metrics: KeyMetrics): string[] {
  const recommendations: string[] = [];
  if (metrics.averageReps !== null) {
    recommendations.push(
      metrics.averageReps < 5
        ? 'Consider increasing target repetitions per session to improve dosing.'
        : 'Repetition count is reasonable; consider focusing on progression over weeks.'
    );
  }
  if (metrics.averageMinutes !== null && metrics.averageMinutes < 5) {
    recommendations.push('Sessions are short; ensure the minimum therapeutic dose is met.');
  }
  recommendations.push('Review signal quality for any sessions with few valid EMG samples.');
  return recommendations;
}

function dailyStatisticsOrNull(sessions: readonly ExerciseSession[]): DailyStatistics | null {
  try {
    return computeDailyStatistics(
      sessions.map((s) => ({ time: s.start_time, durationSeconds: s.duration_seconds }))
    );
  } catch (error) {
    // No parsable start time: the report has no activity charts
    if (error instanceof EmptySelectionError) return null;
    throw error;
  }
}

export function buildReportContent(sessions: readonly ExerciseSession[], options: ReportOptions): ReportContent {
  if (sessions.length === 0) {
    throw new EmptySelectionError('No sessions selected for the report');
  }

  const summary = summarizeSessions(sessions);
  const activity = dailyStatisticsOrNull(sessions);
  const activeDays = activity?.days.length ?? 0;

  const metrics: KeyMetrics = {
    totalSessions: summary.sessions,
    activeDays,
    averageMinutes: summary.averageMinutes,
    sessionsPerDay: summary.sessions / Math.max(activeDays, 1),
    totalReps: summary.totalReps,
    averageReps: mean(repsOf(sessions)),
  };

  const hourHistogram = new Array<number>(24).fill(0);
  for (const point of activity?.timeOfDay ?? []) {
    hourHistogram[Math.floor(point.hour)] += 1;
  }

  const repsSeries = chronological(sessions).flatMap((s) => {
    const date = parseTimestamp(s.start_time);
    return date && s.reps_completed !== null ? [{ timestamp: date.toISOString(), reps: s.reps_completed }] : [];
  });

  const detailRows = prepareSessionTable(sessions).map((row) => [
    row.startTimeDisplay,
    row.durationDisplay,
    row.exercise_type ?? '',
    row.exercise_gesture ?? '',
    row.stimulation_mode ?? '',
    row.reps_completed !== null ? String(row.reps_completed) : '',
  ]);

  return {
    patientName: options.patientName,
    ...(options.period ? { period: options.period } : {}),
    generatedAt: options.generatedAt ?? new Date(),
    sections: { ...DEFAULT_SECTIONS, ...options.sections },
    metrics,
    exercises: breakdown(
      sessions.map((s) => s.exercise_type),
      sessions.length
    ),
    gestures: breakdown(
      sessions.map((s) => s.exercise_gesture),
      sessions.length
    ),
    trend: computeRepsTrend(sessions),
    recommendations: recommendationsFor(metrics),
    activity,
    hourHistogram,
    repsSeries,
    detailHeader: DETAIL_COLUMNS,
    detailRows,
  };
}

function fixed(value: number | null, digits: number): string {
  return value === null ? 'N/A' : value.toFixed(digits);
}

/**
 * Key metrics as label/value pairs, two pairs per row.
 */
export function metricsTable(metrics: KeyMetrics): string[][] {
  return [
    ['Total Sessions', String(metrics.totalSessions), 'Active Days', String(metrics.activeDays)],
    [
      'Avg Session Duration (min)',
      fixed(metrics.averageMinutes, 1),
      'Sessions/Day',
      metrics.sessionsPerDay.toFixed(2),
    ],
    ['Total Reps', String(metrics.totalReps), 'Avg Reps/Session', fixed(metrics.averageReps, 1)],
  ];
}

export function trendTable(trend: RepsTrend): string[][] {
  let change = 'N/A';
  if (trend.changePercent !== null) {
    const rounded = Math.round(trend.changePercent);
    change = `${rounded >= 0 ? '+' : ''}${rounded}%`;
  }
  return [
    ['Metric', 'Early', 'Recent', 'Change'],
    ['Avg Reps', fixed(trend.early, 1), fixed(trend.recent, 1), change],
  ];
}

export function gestureSummary(gestures: readonly BreakdownRow[]): string {
  return `Top Gestures: ${gestures.map((g) => `${g.name} (${g.count})`).join(', ')}`;
}
