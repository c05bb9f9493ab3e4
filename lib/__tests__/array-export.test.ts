import { describe, it, expect } from 'vitest';
import { loadSessions } from '../emg/session-loader';
import {
  bundleToMatVariables,
  detectMatFileType,
  exportArrayBundle,
  extractMatField,
  readArrayBundle,
} from '../export/array-export';
import { createExportBundle } from '../export/export-bundle';
import { exportSessionsTable, readSessionsTable } from '../export/sessions-table-export';
import {
  matCell,
  matNumeric,
  matScalar,
  matString,
  readMatFile,
  writeMatFile,
} from '../export/mat-file';
import { EmptyBundleError, MalformedRecordError, MatFileError } from '../errors';
import type { ExerciseSession } from '@/types/database';
import { START_MS, rateRecord, timestampRecord } from './fixtures';

const bundle = () => createExportBundle(loadSessions([rateRecord(), timestampRecord()]).values());

describe('Array Export', () => {
  describe('exportArrayBundle', () => {
    it('should write type, sessions, emg, timestamps and phase_markers', () => {
      const vars = readMatFile(exportArrayBundle(bundle()));
      expect(Object.keys(vars)).toEqual(['type', 'sessions', 'emg', 'timestamps', 'phase_markers']);
      expect(extractMatField(vars, 'type')).toEqual(['emg']);
    });

    it('should store one samples x channels matrix per session', () => {
      const { emg } = bundleToMatVariables(bundle());
      expect(emg.kind).toBe('cell');
      if (emg.kind === 'cell') {
        expect(emg.cells.map((c) => c.dims)).toEqual([
          [6, 2],
          [4, 1],
        ]);
        expect(emg.cells[0]).toEqual(
          matNumeric([1, 2, 3, 4, 5, 6, 10, 20, 30, 40, 50, 60], [6, 2])
        );
      }
    });

    it('should list session metadata', () => {
      const vars = readMatFile(exportArrayBundle(bundle()));
      const [first, second] = extractMatField(vars, 'sessions');
      expect(first).toEqual({
        session_id: 's1',
        patient_id: 'p1',
        start_time: '2024-03-01T10:00:00.000Z',
        end_time: '2024-03-01T10:00:03.000Z',
        duration_seconds: 3,
        channel_count: 2,
        sample_count: 6,
        sample_rate: 2,
        exercise_type: [],
        exercise_gesture: [],
        stimulation_mode: [],
        reps_completed: [],
      });
      expect(second).toMatchObject({ session_id: 's2', sample_rate: [], exercise_type: 'grip', reps_completed: 3 });
    });

    it('should write phases as 0/1 codes', () => {
      const vars = readMatFile(exportArrayBundle(bundle()));
      expect(extractMatField(vars, 'phase_markers')).toEqual([
        [0, 0, 1, 1, 1, 0],
        [1, 1, 0, 0],
      ]);
    });

    it('should reject an empty selection', () => {
      expect(() => exportArrayBundle({ sessions: [], createdAt: '2024-03-01T00:00:00.000Z' })).toThrow(
        EmptyBundleError
      );
    });
  });

  describe('readArrayBundle', () => {
    it('should load back to the same sessions', () => {
      const original = bundle();
      const reloaded = loadSessions(readArrayBundle(exportArrayBundle(original)));
      expect([...reloaded.values()]).toEqual(original.sessions);
    });

    it('should reproduce the file byte for byte', () => {
      const bytes = exportArrayBundle(bundle());
      const again = exportArrayBundle(createExportBundle(loadSessions(readArrayBundle(bytes)).values()));
      expect(again).toEqual(bytes);
    });

    it('should omit markers for sessions exported without phases', () => {
      const unshaded = createExportBundle(loadSessions([rateRecord({ phase_markers: undefined })]).values());
      const [record] = readArrayBundle(exportArrayBundle(unshaded));
      expect(record.phase_markers).toBeUndefined();
      expect(record.sample_rate).toBe(2);
    });

    it('should read a single-session upload', () => {
      const bytes = writeMatFile({
        timestamps: matCell([
          matString('2024-03-01T10:00:00.000000Z'),
          matString('2024-03-01T10:00:00.010000Z'),
          matString('2024-03-01T10:00:00.020000Z'),
        ]),
        emg: matNumeric([1, 2, 3, 10, 20, 30], [3, 2]),
        exercise_phase: matCell([matString('rest'), matString('attempt'), matString('attempt')]),
        type: matCell([matString('emg')]),
      });

      const [record] = readArrayBundle(bytes, { sessionId: 'up1', patientId: 'p9' });
      expect(record).toEqual({
        id: 'up1',
        patient_id: 'p9',
        start_time: START_MS,
        end_time: START_MS + 20,
        channels: [
          [1, 2, 3],
          [10, 20, 30],
        ],
        timestamps: [START_MS, START_MS + 10, START_MS + 20],
        phase_markers: ['rest', 'attempt', 'attempt'],
      });

      const loaded = loadSessions([record]).get('up1');
      expect(loaded?.phases.map((p) => p.label)).toEqual(['rest', 'attempt']);
    });

    it('should reject upload timestamps that do not parse', () => {
      const bytes = writeMatFile({
        timestamps: matCell([matString('yesterday')]),
        emg: matNumeric([1], [1, 1]),
      });
      expect(() => readArrayBundle(bytes)).toThrow(MalformedRecordError);
    });

    it('should reject other MAT-file types', () => {
      const bytes = writeMatFile({ time: matCell([matString('2024-03-01')]) });
      expect(() => readArrayBundle(bytes)).toThrow('Expected an EMG MAT-file, found type "sessions_table"');
    });
  });

  describe('detectMatFileType', () => {
    it('should prefer the type variable', () => {
      expect(detectMatFileType({ type: matString('EMG'), time: matScalar(1) })).toBe('emg');
      expect(detectMatFileType({ type: matCell([matString('sessions_table')]) })).toBe('sessions_table');
    });

    it('should fall back on variable names', () => {
      expect(detectMatFileType({ emg: matNumeric([1]), timestamps: matCell([]) })).toBe('emg');
      expect(detectMatFileType({ session_id: matCell([]) })).toBe('sessions_table');
      expect(detectMatFileType({ other: matScalar(1) })).toBe('unknown');
    });
  });

  describe('extractMatField', () => {
    it('should flatten cells and vectors and wrap scalars', () => {
      const vars = { a: matCell([matString('x'), matScalar(2)]), b: matNumeric([1, 2]), c: matScalar(5) };
      expect(extractMatField(vars, 'a')).toEqual(['x', 2]);
      expect(extractMatField(vars, 'b')).toEqual([1, 2]);
      expect(extractMatField(vars, 'c')).toEqual([5]);
      expect(extractMatField(vars, 'missing')).toEqual([]);
    });
  });
});

describe('Sessions Table Export', () => {
  const rows: ExerciseSession[] = [
    {
      id: 'a1',
      start_time: '2024-03-01T10:00:00+00:00',
      exercise_type: 'grip',
      exercise_gesture: 'open',
      duration_seconds: 330,
      stimulation_mode: 'fes',
      reps_completed: 12,
    },
    {
      id: 'a2',
      start_time: null,
      exercise_type: null,
      exercise_gesture: null,
      duration_seconds: null,
      stimulation_mode: null,
      reps_completed: null,
    },
  ];

  it('should read back the rows it wrote', () => {
    expect(readSessionsTable(exportSessionsTable(rows))).toEqual(rows);
  });

  it('should be detected as a sessions table', () => {
    expect(detectMatFileType(readMatFile(exportSessionsTable(rows)))).toBe('sessions_table');
  });

  it('should reject an empty selection', () => {
    expect(() => exportSessionsTable([])).toThrow(EmptyBundleError);
  });

  it('should reject EMG files', () => {
    expect(() => readSessionsTable(exportArrayBundle(bundle()))).toThrow(MatFileError);
  });
});
