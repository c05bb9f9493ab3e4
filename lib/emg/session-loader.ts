/**
 * Session Loader
 *
 * Turns raw session records (database rows or an uploaded MAT-file) into
 * validated, frozen sessions with their channels and phase intervals.
 */

import { EmptySelectionError, MalformedRecordError } from '../errors';
import { parseTimestamp } from '../formatters';
import { segmentPhases } from './phase-segmenter';
import {
  RawSessionRecordSchema,
  formatZodIssues,
  type ParsedSessionRecord,
  type RawSessionRecord,
} from './schemas';
import type {
  ChannelSeries,
  ChannelStatistics,
  LoadedSession,
  SelectionStatistics,
  Session,
  TimeBase,
} from './types';

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    const children: unknown[] = Object.values(value);
    children.forEach(deepFreeze);
  }
  return value;
}

function recordLabel(record: unknown, position: number): string | undefined {
  if (record !== null && typeof record === 'object' && 'id' in record) {
    const { id } = record;
    if (typeof id === 'string' || typeof id === 'number') return String(id);
  }
  return position >= 0 ? `#${position}` : undefined;
}

function resolveTime(value: ParsedSessionRecord['start_time'], field: string, sessionId: string): Date {
  const date = parseTimestamp(value);
  if (!date) {
    throw new MalformedRecordError(`Session ${sessionId}: ${field} is not a valid timestamp`, {
      sessionId,
      issues: [`${field}: ${String(value)}`],
    });
  }
  return date;
}

function resolveTimeBase(record: ParsedSessionRecord, sampleCount: number): TimeBase {
  const sessionId = record.id;

  if (record.timestamps !== undefined) {
    const { timestamps } = record;
    if (timestamps.length !== sampleCount) {
      throw new MalformedRecordError(
        `Session ${sessionId}: ${timestamps.length} timestamps for ${sampleCount} samples`,
        { sessionId }
      );
    }
    for (let i = 1; i < timestamps.length; i++) {
      if (timestamps[i] < timestamps[i - 1]) {
        throw new MalformedRecordError(
          `Session ${sessionId}: timestamps decrease at sample ${i}`,
          { sessionId }
        );
      }
    }
    return { kind: 'timestamps', timestamps: [...timestamps] };
  }

  if (record.sample_rate !== undefined) {
    return { kind: 'rate', sampleRate: record.sample_rate };
  }

  throw new MalformedRecordError(`Session ${sessionId}: either sample_rate or timestamps is required`, {
    sessionId,
  });
}

function buildSession(record: ParsedSessionRecord): LoadedSession {
  const sessionId = record.id;
  const sampleCount = record.channels[0].length;

  record.channels.forEach((samples, channelIndex) => {
    if (samples.length !== sampleCount) {
      throw new MalformedRecordError(
        `Session ${sessionId}: channel ${channelIndex} has ${samples.length} samples, expected ${sampleCount}`,
        { sessionId }
      );
    }
  });

  const markers = record.phase_markers;
  if (markers !== undefined && markers.length !== sampleCount) {
    throw new MalformedRecordError(
      `Session ${sessionId}: ${markers.length} phase markers for ${sampleCount} samples`,
      { sessionId }
    );
  }

  const start = resolveTime(record.start_time, 'start_time', sessionId);
  const end = resolveTime(record.end_time, 'end_time', sessionId);
  if (end.getTime() < start.getTime()) {
    throw new MalformedRecordError(`Session ${sessionId}: end_time is before start_time`, {
      sessionId,
    });
  }

  const timeBase = resolveTimeBase(record, sampleCount);

  const session: Session = {
    id: sessionId,
    patientId: record.patient_id,
    startTime: start.toISOString(),
    endTime: end.toISOString(),
    durationSeconds: (end.getTime() - start.getTime()) / 1000,
    sampleCount,
    channelCount: record.channels.length,
    timeBase,
    ...(record.exercise_type != null && { exerciseType: record.exercise_type }),
    ...(record.exercise_gesture != null && { exerciseGesture: record.exercise_gesture }),
    ...(record.stimulation_mode != null && { stimulationMode: record.stimulation_mode }),
    ...(record.reps_completed != null && { repsCompleted: record.reps_completed }),
  };

  const channels: ChannelSeries[] = record.channels.map((samples, channelIndex) => ({
    sessionId,
    channelIndex,
    samples: [...samples],
  }));

  // Sessions recorded without phase markers are drawn unshaded
  const phases = markers !== undefined ? segmentPhases(markers, sessionId) : [];

  return deepFreeze({ session, channels, phases });
}

/**
 * Validate and normalize raw records.
 *
 * Returns sessions keyed by id in input order. An empty input yields an empty
 * map; aggregate statistics over it fail separately with EmptySelectionError.
 */
export function loadSessions(records: readonly unknown[]): Map<string, LoadedSession> {
  const sessions = new Map<string, LoadedSession>();

  records.forEach((raw, position) => {
    const parsed = RawSessionRecordSchema.safeParse(raw);
    if (!parsed.success) {
      const sessionId = recordLabel(raw, position);
      const issues = formatZodIssues(parsed.error);
      throw new MalformedRecordError(`Session ${sessionId}: ${issues.join('; ')}`, {
        sessionId,
        issues,
      });
    }

    const record = parsed.data;
    if (sessions.has(record.id)) {
      throw new MalformedRecordError(`Session ${record.id} appears more than once`, {
        sessionId: record.id,
      });
    }

    sessions.set(record.id, buildSession(record));
  });

  console.log(`[Session Loader] Loaded ${sessions.size} session(s)`);

  return sessions;
}

/**
 * Load a single record; convenience for the single-session plot path.
 */
export function loadSession(record: RawSessionRecord): LoadedSession {
  const [loaded] = loadSessions([record]).values();
  return loaded;
}

/**
 * Descriptive aggregates over a selection of sessions.
 */
export function computeSelectionStatistics(
  sessions: Iterable<LoadedSession>
): SelectionStatistics {
  const list = [...sessions];
  if (list.length === 0) {
    throw new EmptySelectionError('Select at least one session to compute statistics');
  }

  const totalDurationSeconds = list.reduce((sum, s) => sum + s.session.durationSeconds, 0);
  const totalSamples = list.reduce((sum, s) => sum + s.session.sampleCount, 0);

  const accumulators = new Map<number, { min: number; max: number; sum: number; sumSq: number; n: number }>();
  for (const { channels } of list) {
    for (const channel of channels) {
      let acc = accumulators.get(channel.channelIndex);
      if (!acc) {
        acc = { min: Infinity, max: -Infinity, sum: 0, sumSq: 0, n: 0 };
        accumulators.set(channel.channelIndex, acc);
      }
      for (const value of channel.samples) {
        if (value < acc.min) acc.min = value;
        if (value > acc.max) acc.max = value;
        acc.sum += value;
        acc.sumSq += value * value;
        acc.n += 1;
      }
    }
  }

  const channels: ChannelStatistics[] = [...accumulators.entries()]
    .sort(([a], [b]) => a - b)
    .map(([channelIndex, acc]) => ({
      channelIndex,
      min: acc.n > 0 ? acc.min : NaN,
      max: acc.n > 0 ? acc.max : NaN,
      mean: acc.n > 0 ? acc.sum / acc.n : NaN,
      rms: acc.n > 0 ? Math.sqrt(acc.sumSq / acc.n) : NaN,
      sampleCount: acc.n,
    }));

  return {
    sessionCount: list.length,
    totalDurationSeconds,
    meanDurationSeconds: totalDurationSeconds / list.length,
    totalSamples,
    channels,
  };
}
