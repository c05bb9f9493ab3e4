/**
 * Array-interchange export
 *
 * Writes selected sessions to a MAT-file with `sessions` metadata and `emg`
 * channel arrays, and reads such files (or the older single-session layout)
 * back into raw loader records.
 */

import { MAT_TYPE_EMG, MAT_TYPE_SESSIONS_TABLE, PHASE_CODES } from '../constants';
import { MalformedRecordError, MatFileError } from '../errors';
import { parseTimestamp } from '../formatters';
import { expandIntervals } from '../emg/phase-segmenter';
import type { RawSessionRecord } from '../emg/schemas';
import type { LoadedSession, PhaseMarker } from '../emg/types';
import { validateExportBundle, type ExportBundle } from './export-bundle';
import {
  asCells,
  asNumbers,
  asString,
  asStructElements,
  matCell,
  matNumeric,
  matScalar,
  matString,
  matStruct,
  readMatFile,
  unwrapMatValue,
  writeMatFile,
  type MatValue,
  type MatVariables,
} from './mat-file';

export type MatFileType = 'emg' | 'sessions_table' | 'unknown';

const SESSION_FIELDS = [
  'session_id',
  'patient_id',
  'start_time',
  'end_time',
  'duration_seconds',
  'channel_count',
  'sample_count',
  'sample_rate',
  'exercise_type',
  'exercise_gesture',
  'stimulation_mode',
  'reps_completed',
];

function optionalString(value: string | undefined): MatValue {
  return value === undefined ? matNumeric([]) : matString(value);
}

function sessionMetadata({ session }: LoadedSession): Record<string, MatValue> {
  return {
    session_id: matString(session.id),
    patient_id: matString(session.patientId),
    start_time: matString(session.startTime),
    end_time: matString(session.endTime),
    duration_seconds: matScalar(session.durationSeconds),
    channel_count: matScalar(session.channelCount),
    sample_count: matScalar(session.sampleCount),
    sample_rate: matScalar(session.timeBase.kind === 'rate' ? session.timeBase.sampleRate : undefined),
    exercise_type: optionalString(session.exerciseType),
    exercise_gesture: optionalString(session.exerciseGesture),
    stimulation_mode: optionalString(session.stimulationMode),
    reps_completed: matScalar(session.repsCompleted),
  };
}

// samples x channels, column-major: each channel's samples stay contiguous
function emgMatrix({ session, channels }: LoadedSession): MatValue {
  const data = new Float64Array(session.sampleCount * session.channelCount);
  channels.forEach((channel) => {
    data.set(channel.samples, channel.channelIndex * session.sampleCount);
  });
  return matNumeric(data, [session.sampleCount, session.channelCount]);
}

function timestampVector({ session }: LoadedSession): MatValue {
  if (session.timeBase.kind === 'rate') return matNumeric([]);
  return matNumeric(session.timeBase.timestamps, [1, session.sampleCount]);
}

function phaseVector({ session, phases }: LoadedSession): MatValue {
  if (phases.length === 0) return matNumeric([]);
  const codes = expandIntervals(phases).map((label) => PHASE_CODES[label]);
  return matNumeric(codes, [1, session.sampleCount]);
}

/**
 * Variables written for a bundle, in file order.
 */
export function bundleToMatVariables(bundle: ExportBundle): MatVariables {
  validateExportBundle(bundle);

  return {
    type: matString(MAT_TYPE_EMG),
    sessions: matStruct(bundle.sessions.map(sessionMetadata), SESSION_FIELDS),
    emg: matCell(bundle.sessions.map(emgMatrix)),
    timestamps: matCell(bundle.sessions.map(timestampVector)),
    phase_markers: matCell(bundle.sessions.map(phaseVector)),
  };
}

export function exportArrayBundle(bundle: ExportBundle): Uint8Array {
  const bytes = writeMatFile(bundleToMatVariables(bundle));
  console.log(`[Export] Wrote MAT-file with ${bundle.sessions.length} session(s), ${bytes.length} bytes`);
  return bytes;
}

/**
 * Classify a MAT-file by its `type` variable, falling back on field names.
 */
export function detectMatFileType(variables: MatVariables): MatFileType {
  const typeVar = variables.type;
  if (typeVar?.kind === 'char') {
    const t = typeVar.text.toLowerCase();
    if (t.startsWith('sessions')) return 'sessions_table';
    if (t.startsWith(MAT_TYPE_EMG)) return 'emg';
  } else if (typeVar?.kind === 'cell' && typeVar.cells[0]?.kind === 'char') {
    return detectMatFileType({ ...variables, type: typeVar.cells[0] });
  }

  if ('emg' in variables && ('timestamps' in variables || 'time' in variables)) {
    return 'emg';
  }
  if ('time' in variables || 'session_id' in variables) {
    return MAT_TYPE_SESSIONS_TABLE;
  }
  return 'unknown';
}

function optionalText(value: MatValue | undefined): string | undefined {
  return value?.kind === 'char' ? value.text : undefined;
}

function optionalNumber(value: MatValue | undefined): number | undefined {
  return value?.kind === 'numeric' && value.data.length > 0 ? value.data[0] : undefined;
}

function splitChannels(value: MatValue, sessionId: string): number[][] {
  if (value.kind !== 'numeric' || value.dims.length !== 2) {
    throw new MatFileError(`Session ${sessionId}: emg must be a samples x channels matrix`);
  }
  const [sampleCount, channelCount] = value.dims;
  return Array.from({ length: channelCount }, (_, c) =>
    Array.from(value.data.subarray(c * sampleCount, (c + 1) * sampleCount))
  );
}

function bundleRecords(variables: MatVariables): RawSessionRecord[] {
  const metadata = asStructElements(variables.sessions, 'sessions');
  const emg = asCells(variables.emg, 'emg');
  const timestamps = variables.timestamps ? asCells(variables.timestamps, 'timestamps') : [];
  const phases = variables.phase_markers ? asCells(variables.phase_markers, 'phase_markers') : [];

  if (emg.length !== metadata.length) {
    throw new MatFileError(`File lists ${metadata.length} sessions but ${emg.length} emg arrays`);
  }

  return metadata.map((meta, i) => {
    const id = asString(meta.session_id, 'session_id');
    const sampleRate = optionalNumber(meta.sample_rate);
    const markers = phases[i] ? asNumbers(phases[i], 'phase_markers') : [];

    const record: RawSessionRecord = {
      id,
      patient_id: asString(meta.patient_id, 'patient_id'),
      start_time: asString(meta.start_time, 'start_time'),
      end_time: asString(meta.end_time, 'end_time'),
      channels: splitChannels(emg[i], id),
      exercise_type: optionalText(meta.exercise_type),
      exercise_gesture: optionalText(meta.exercise_gesture),
      stimulation_mode: optionalText(meta.stimulation_mode),
      reps_completed: optionalNumber(meta.reps_completed),
    };

    if (sampleRate !== undefined) {
      record.sample_rate = sampleRate;
    } else {
      record.timestamps = timestamps[i] ? asNumbers(timestamps[i], 'timestamps') : [];
    }
    if (markers.length > 0) {
      record.phase_markers = markers;
    }
    return record;
  });
}

/**
 * Values of a variable as a flat list: cells and vectors become their
 * elements, anything else a single entry. Missing variables give [].
 */
export function extractMatField(variables: MatVariables, name: string): unknown[] {
  const value = variables[name];
  if (!value) return [];
  const unwrapped = unwrapMatValue(value);
  return Array.isArray(unwrapped) ? unwrapped : [unwrapped];
}

export interface LegacyUploadOptions {
  sessionId?: string;
  patientId?: string;
}

// Single-session upload: emg (samples x channels), timestamps, optional exercise_phase
function legacyRecord(variables: MatVariables, options: LegacyUploadOptions): RawSessionRecord {
  const sessionId = options.sessionId ?? 'uploaded';
  const emg = variables.emg;
  if (!emg) {
    throw new MatFileError('File has no emg variable');
  }

  const times = extractMatField(variables, 'timestamps').map((t, i) => {
    const date = parseTimestamp(t);
    if (!date) {
      throw new MalformedRecordError(`Upload: timestamp ${i} is not a valid time: ${String(t)}`, {
        sessionId,
      });
    }
    return date.getTime();
  });
  if (times.length === 0) {
    throw new MalformedRecordError('Upload: no timestamps found', { sessionId });
  }

  const phaseValues = extractMatField(variables, 'exercise_phase');
  const phaseMarkers = phaseValues.filter(
    (v): v is PhaseMarker => typeof v === 'string' || typeof v === 'number'
  );

  const record: RawSessionRecord = {
    id: sessionId,
    patient_id: options.patientId ?? 'unknown',
    start_time: times[0],
    end_time: times[times.length - 1],
    channels: splitChannels(emg, sessionId),
    timestamps: times,
  };
  if (phaseMarkers.length > 0) {
    record.phase_markers = phaseMarkers;
  }
  return record;
}

/**
 * Read an uploaded EMG MAT-file into raw records for the session loader.
 */
export function readArrayBundle(bytes: Uint8Array, options: LegacyUploadOptions = {}): RawSessionRecord[] {
  const variables = readMatFile(bytes);
  const fileType = detectMatFileType(variables);

  if (fileType !== 'emg') {
    throw new MatFileError(`Expected an EMG MAT-file, found type "${fileType}"`);
  }

  const records = 'sessions' in variables ? bundleRecords(variables) : [legacyRecord(variables, options)];
  console.log(`[MAT Reader] Read ${records.length} session record(s)`);
  return records;
}
