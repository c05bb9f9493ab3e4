// Sessions-table MAT-file: one column per session attribute, one entry per session

import { MAT_TYPE_SESSIONS_TABLE, SESSIONS_TABLE_FIELDS } from '../constants';
import { EmptyBundleError, MatFileError } from '../errors';
import type { ExerciseSession } from '@/types/database';
import { detectMatFileType, extractMatField } from './array-export';
import {
  matCell,
  matScalar,
  matString,
  readMatFile,
  writeMatFile,
  type MatValue,
  type MatVariables,
} from './mat-file';

type SessionsTableField = (typeof SESSIONS_TABLE_FIELDS)[number];

type Column =
  | { kind: 'text'; value: (row: ExerciseSession) => string | null }
  | { kind: 'number'; value: (row: ExerciseSession) => number | null };

const COLUMNS: Record<SessionsTableField, Column> = {
  session_id: { kind: 'text', value: (r) => r.id },
  time: { kind: 'text', value: (r) => r.start_time },
  duration_seconds: { kind: 'number', value: (r) => r.duration_seconds },
  exercise_type: { kind: 'text', value: (r) => r.exercise_type },
  exercise_gesture: { kind: 'text', value: (r) => r.exercise_gesture },
  stimulation_mode: { kind: 'text', value: (r) => r.stimulation_mode },
  reps_completed: { kind: 'number', value: (r) => r.reps_completed },
};

// Missing text is written as '', missing numbers as an empty matrix
function columnCell(column: Column, rows: readonly ExerciseSession[]): MatValue {
  if (column.kind === 'number') {
    const { value } = column;
    return matCell(rows.map((r) => matScalar(value(r))));
  }
  const { value } = column;
  return matCell(rows.map((r) => matString(value(r) ?? '')));
}

export function sessionsTableVariables(rows: readonly ExerciseSession[]): MatVariables {
  if (rows.length === 0) {
    throw new EmptyBundleError();
  }

  const variables: MatVariables = {};
  for (const field of SESSIONS_TABLE_FIELDS) {
    variables[field] = columnCell(COLUMNS[field], rows);
  }
  variables.type = matCell([matString(MAT_TYPE_SESSIONS_TABLE)]);
  return variables;
}

export function exportSessionsTable(rows: readonly ExerciseSession[]): Uint8Array {
  const bytes = writeMatFile(sessionsTableVariables(rows));
  console.log(`[Export] Wrote sessions table with ${rows.length} row(s)`);
  return bytes;
}

function textOrNull(value: unknown): string | null {
  if (typeof value === 'string') return value.length > 0 ? value : null;
  if (typeof value === 'number') return String(value);
  return null;
}

function numberOrNull(value: unknown): number | null {
  return typeof value === 'number' && !isNaN(value) ? value : null;
}

/**
 * Read a sessions-table MAT-file back into session rows.
 */
export function readSessionsTable(bytes: Uint8Array): ExerciseSession[] {
  const variables = readMatFile(bytes);
  const fileType = detectMatFileType(variables);
  if (fileType !== 'sessions_table') {
    throw new MatFileError(`Expected a sessions table MAT-file, found type "${fileType}"`);
  }

  const columns = new Map(SESSIONS_TABLE_FIELDS.map((field) => [field, extractMatField(variables, field)]));
  const at = (field: SessionsTableField, i: number): unknown => columns.get(field)?.[i];

  return (columns.get('session_id') ?? []).map((id, i) => ({
    id: textOrNull(id) ?? `#${i}`,
    start_time: textOrNull(at('time', i)),
    duration_seconds: numberOrNull(at('duration_seconds', i)),
    exercise_type: textOrNull(at('exercise_type', i)),
    exercise_gesture: textOrNull(at('exercise_gesture', i)),
    stimulation_mode: textOrNull(at('stimulation_mode', i)),
    reps_completed: numberOrNull(at('reps_completed', i)),
  }));
}
