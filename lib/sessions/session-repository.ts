/**
 * Session Repository
 *
 * Reads patients, exercise sessions and their EMG data points from the data
 * store, validates every row, and caches reads for the configured TTLs.
 */

import { z } from 'zod';
import { CACHE_TTL, TABLES } from '../constants';
import { getConfig, type AppConfig } from '../config';
import { DataSourceError, MalformedRecordError } from '../errors';
import { parseTimestamp } from '../formatters';
import { createDatabaseClient } from '../db';
import type { DatabaseClient, QueryResult, Row } from '../db/types';
import { QueryCache, type Clock } from '../db/query-cache';
import {
  DataPointRowSchema,
  DbTimestampSchema,
  IdSchema,
  formatZodIssues,
  type DataPointRow,
  type RawSessionRecord,
} from '../emg/schemas';
import type { PhaseMarker } from '../emg/types';
import type { AccountRole, ExerciseSession, PatientProfile } from '@/types/database';

const NumericColumnSchema = z
  .union([z.number(), z.string().regex(/^-?\d+(\.\d+)?$/).transform(Number)])
  .nullish()
  .transform((v) => v ?? null);

const TextColumnSchema = z
  .string()
  .nullish()
  .transform((v) => v ?? null);

const PatientRowSchema = z.object({
  id: IdSchema,
  name: z.string(),
});

const AccessRowSchema = z.object({
  patient_profile_id: IdSchema,
});

const SessionRowSchema = z.object({
  id: IdSchema,
  start_time: DbTimestampSchema.nullish().transform((v) => v ?? null),
  exercise_type: TextColumnSchema,
  exercise_gesture: TextColumnSchema,
  duration_seconds: NumericColumnSchema,
  stimulation_mode: TextColumnSchema,
  reps_completed: NumericColumnSchema,
});

const SESSION_COLUMNS =
  'id, start_time, exercise_type, exercise_gesture, duration_seconds, stimulation_mode, reps_completed';
const DATA_POINT_COLUMNS = 'timestamp, norm_emg, rms_emg, stimulation, exercise_phase';

export interface Viewer {
  userId: string;
  role: AccountRole;
}

export interface SessionRepositoryOptions {
  cacheTtl?: Partial<AppConfig['cache']>;
  clock?: Clock;
}

function unwrap(table: string, result: QueryResult<Row[]>): Row[] {
  if (result.error) {
    throw new DataSourceError(table, result.error);
  }
  return result.data ?? [];
}

function parseRows<T>(table: string, rows: Row[], schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
  return rows.map((row, i) => {
    const parsed = schema.safeParse(row);
    if (!parsed.success) {
      const issues = formatZodIssues(parsed.error);
      throw new MalformedRecordError(`${table} row ${i}: ${issues.join('; ')}`, { issues });
    }
    return parsed.data;
  });
}

function emgValues(point: DataPointRow): number[] | null {
  if (point.rms_emg && point.rms_emg.length > 0) return point.rms_emg;
  if (point.norm_emg && point.norm_emg.length > 0) return point.norm_emg;
  return null;
}

/**
 * Build a raw loader record from a session row and its ordered data points.
 *
 * Each point carries one value per channel; points with neither `rms_emg`
 * nor `norm_emg` are skipped. Phase markers are kept only when every kept
 * point has one.
 */
export function dataPointsToRecord(
  session: ExerciseSession,
  patientId: string,
  points: readonly DataPointRow[]
): RawSessionRecord {
  const sessionId = session.id;
  const timestamps: number[] = [];
  const markers: PhaseMarker[] = [];
  let channels: number[][] = [];
  let skipped = 0;

  for (const point of points) {
    const values = emgValues(point);
    if (!values) {
      skipped++;
      continue;
    }

    if (channels.length === 0) {
      channels = values.map(() => []);
    } else if (values.length !== channels.length) {
      throw new MalformedRecordError(
        `Session ${sessionId}: data point at ${point.timestamp} has ${values.length} channels, expected ${channels.length}`,
        { sessionId }
      );
    }

    const time = parseTimestamp(point.timestamp);
    if (!time) {
      throw new MalformedRecordError(`Session ${sessionId}: invalid data point timestamp ${point.timestamp}`, {
        sessionId,
      });
    }

    timestamps.push(time.getTime());
    values.forEach((v, c) => channels[c].push(v));
    if (point.exercise_phase != null) {
      markers.push(point.exercise_phase);
    }
  }

  if (timestamps.length === 0) {
    throw new MalformedRecordError(`Session ${sessionId} has no EMG samples`, { sessionId });
  }
  if (skipped > 0) {
    console.warn(`[Session Repository] Session ${sessionId}: skipped ${skipped} data point(s) without EMG`);
  }

  const first = timestamps[0];
  const last = timestamps[timestamps.length - 1];
  const start = parseTimestamp(session.start_time)?.getTime() ?? first;
  const end =
    session.duration_seconds !== null ? start + session.duration_seconds * 1000 : Math.max(start, last);

  const record: RawSessionRecord = {
    id: sessionId,
    patient_id: patientId,
    start_time: start,
    end_time: Math.max(start, end),
    channels,
    timestamps,
    exercise_type: session.exercise_type,
    exercise_gesture: session.exercise_gesture,
    stimulation_mode: session.stimulation_mode,
    reps_completed: session.reps_completed,
  };

  if (markers.length === timestamps.length) {
    record.phase_markers = markers;
  } else if (markers.length > 0) {
    console.warn(
      `[Session Repository] Session ${sessionId}: ${markers.length} of ${timestamps.length} samples have a phase, drawing unshaded`
    );
  }

  return record;
}

export class SessionRepository {
  private patients: QueryCache<PatientProfile[]>;
  private sessions: QueryCache<ExerciseSession[]>;
  private dataPoints: QueryCache<DataPointRow[]>;

  constructor(
    private db: DatabaseClient,
    { cacheTtl = {}, clock }: SessionRepositoryOptions = {}
  ) {
    this.patients = new QueryCache(cacheTtl.patientsTtlSeconds ?? CACHE_TTL.patients, clock);
    this.sessions = new QueryCache(cacheTtl.sessionsTtlSeconds ?? CACHE_TTL.sessions, clock);
    this.dataPoints = new QueryCache(cacheTtl.dataPointsTtlSeconds ?? CACHE_TTL.dataPoints, clock);
  }

  /**
   * Patients visible to a viewer, by name. Admins see every patient;
   * everyone else sees the patients linked to their account.
   */
  async listPatients({ userId, role }: Viewer): Promise<PatientProfile[]> {
    return this.patients.getOrLoad(`${role}:${userId}`, async () => {
      let query = this.db.from(TABLES.patients).select('id, name');

      if (role !== 'admin') {
        const access = parseRows(
          TABLES.patientAccess,
          unwrap(
            TABLES.patientAccess,
            await this.db.from(TABLES.patientAccess).select('patient_profile_id').eq('account_id', userId).execute()
          ),
          AccessRowSchema
        );
        if (access.length === 0) {
          console.log(`[Session Repository] No patients linked to account ${userId}`);
          return [];
        }
        query = query.in('id', [...new Set(access.map((a) => a.patient_profile_id))]);
      }

      const rows = unwrap(TABLES.patients, await query.order('name').execute());
      const patients = parseRows(TABLES.patients, rows, PatientRowSchema);
      console.log(`[Session Repository] Loaded ${patients.length} patient(s) for ${role} ${userId}`);
      return patients;
    });
  }

  /**
   * Sessions of one patient, newest first.
   */
  async listSessions(patientId: string): Promise<ExerciseSession[]> {
    return this.sessions.getOrLoad(patientId, async () => {
      const result = await this.db
        .from(TABLES.sessions)
        .select(SESSION_COLUMNS)
        .eq('patient_profile_id', patientId)
        .order('start_time', { ascending: false })
        .execute();
      const sessions = parseRows(TABLES.sessions, unwrap(TABLES.sessions, result), SessionRowSchema);
      console.log(`[Session Repository] Loaded ${sessions.length} session(s) for patient ${patientId}`);
      return sessions;
    });
  }

  /**
   * Data points of one session in timestamp order.
   */
  async fetchDataPoints(sessionId: string): Promise<DataPointRow[]> {
    return this.dataPoints.getOrLoad(sessionId, async () => {
      const result = await this.db
        .from(TABLES.dataPoints)
        .select(DATA_POINT_COLUMNS)
        .eq('session_id', sessionId)
        .order('timestamp')
        .execute();
      return parseRows(TABLES.dataPoints, unwrap(TABLES.dataPoints, result), DataPointRowSchema);
    });
  }

  /**
   * Raw loader records for the given sessions, in the order given.
   */
  async fetchSessionRecords(
    sessions: readonly ExerciseSession[],
    patientId: string
  ): Promise<RawSessionRecord[]> {
    const points = await Promise.all(sessions.map((s) => this.fetchDataPoints(s.id)));
    return sessions.map((session, i) => dataPointsToRecord(session, patientId, points[i]));
  }

  invalidateSessions(patientId?: string): void {
    if (patientId === undefined) {
      this.sessions.clear();
    } else {
      this.sessions.invalidate(patientId);
    }
  }

  clearCache(): void {
    this.patients.clear();
    this.sessions.clear();
    this.dataPoints.clear();
  }
}

/**
 * Repository on the configured data store, with the configured cache TTLs.
 */
export function createSessionRepository(config: AppConfig = getConfig()): SessionRepository {
  return new SessionRepository(createDatabaseClient(config.database), { cacheTtl: config.cache });
}
