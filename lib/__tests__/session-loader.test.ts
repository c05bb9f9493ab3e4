import { describe, it, expect } from 'vitest';
import { computeSelectionStatistics, loadSession, loadSessions } from '../emg/session-loader';
import { EmptySelectionError, MalformedRecordError, UnknownPhaseLabelError } from '../errors';
import { START_MS, rateRecord, timestampRecord } from './fixtures';

describe('Session Loader', () => {
  describe('loadSessions', () => {
    it('should key sessions by id in input order', () => {
      const sessions = loadSessions([timestampRecord(), rateRecord()]);
      expect([...sessions.keys()]).toEqual(['s2', 's1']);
    });

    it('should normalize session metadata', () => {
      const { session, channels, phases } = loadSession(rateRecord());
      expect(session).toEqual({
        id: 's1',
        patientId: 'p1',
        startTime: '2024-03-01T10:00:00.000Z',
        endTime: '2024-03-01T10:00:03.000Z',
        durationSeconds: 3,
        sampleCount: 6,
        channelCount: 2,
        timeBase: { kind: 'rate', sampleRate: 2 },
      });
      expect(channels.map((c) => c.channelIndex)).toEqual([0, 1]);
      expect(channels[1].samples).toEqual([10, 20, 30, 40, 50, 60]);
      expect(phases.map((p) => [p.label, p.startOffset, p.endOffset])).toEqual([
        ['rest', 0, 2],
        ['attempt', 2, 5],
        ['rest', 5, 6],
      ]);
    });

    it('should keep explicit timestamps and optional metadata', () => {
      const { session } = loadSession(timestampRecord());
      expect(session.timeBase).toEqual({
        kind: 'timestamps',
        timestamps: [START_MS, START_MS + 100, START_MS + 200, START_MS + 1200],
      });
      expect(session.exerciseType).toBe('grip');
      expect(session.repsCompleted).toBe(3);
      expect(session.exerciseGesture).toBeUndefined();
    });

    it('should accept numeric ids and epoch start times', () => {
      const { session } = loadSession(rateRecord({ id: 42, start_time: START_MS }));
      expect(session.id).toBe('42');
      expect(session.startTime).toBe('2024-03-01T10:00:00.000Z');
    });

    it('should freeze loaded sessions', () => {
      const loaded = loadSession(rateRecord());
      expect(Object.isFrozen(loaded)).toBe(true);
      expect(Object.isFrozen(loaded.channels[0].samples)).toBe(true);
      expect(Object.isFrozen(loaded.phases[0])).toBe(true);
    });

    it('should not share arrays with the input record', () => {
      const record = rateRecord();
      const loaded = loadSession(record);
      record.channels[0][0] = 99;
      expect(loaded.channels[0].samples[0]).toBe(1);
    });

    it('should load sessions without phase markers unshaded', () => {
      expect(loadSession(rateRecord({ phase_markers: undefined })).phases).toEqual([]);
    });

    it('should return an empty map for no records', () => {
      expect(loadSessions([]).size).toBe(0);
    });

    it('should reject records missing required fields', () => {
      expect(() => loadSessions([{ id: 's1' }])).toThrow(MalformedRecordError);
      expect(() => loadSessions([{ id: 's1' }])).toThrow(/^Session s1: /);
    });

    it('should reject channels of different lengths', () => {
      expect(() => loadSessions([rateRecord({ channels: [[1, 2, 3, 4, 5, 6], [1, 2]] })])).toThrow(
        'Session s1: channel 1 has 2 samples, expected 6'
      );
    });

    it('should reject a marker count that differs from the sample count', () => {
      expect(() => loadSessions([rateRecord({ phase_markers: [0, 1] })])).toThrow(
        'Session s1: 2 phase markers for 6 samples'
      );
    });

    it('should require a sample rate or timestamps', () => {
      expect(() => loadSessions([rateRecord({ sample_rate: undefined })])).toThrow(
        'Session s1: either sample_rate or timestamps is required'
      );
    });

    it('should reject decreasing timestamps', () => {
      const record = timestampRecord({ timestamps: [START_MS, START_MS + 100, START_MS + 50, START_MS + 200] });
      expect(() => loadSessions([record])).toThrow('Session s2: timestamps decrease at sample 2');
    });

    it('should reject an end time before the start time', () => {
      expect(() => loadSessions([rateRecord({ end_time: '2024-03-01T09:59:59Z' })])).toThrow(
        'Session s1: end_time is before start_time'
      );
    });

    it('should reject times outside the representable date range', () => {
      expect(() => loadSessions([rateRecord({ start_time: 1e16, end_time: 1e16 })])).toThrow(MalformedRecordError);
      expect(() =>
        loadSessions([timestampRecord({ timestamps: [1e16, 1e16 + 100, 1e16 + 200, 1e16 + 300] })])
      ).toThrow(MalformedRecordError);
      expect(() =>
        loadSessions([timestampRecord({ timestamps: [START_MS, START_MS + 100, Infinity, Infinity] })])
      ).toThrow(MalformedRecordError);
    });

    it('should reject non-finite samples and sample rates', () => {
      expect(() => loadSessions([rateRecord({ sample_rate: Infinity })])).toThrow(MalformedRecordError);
      expect(() => loadSessions([timestampRecord({ channels: [[5, NaN, 5, -5]] })])).toThrow(MalformedRecordError);
    });

    it('should reject duplicate ids', () => {
      expect(() => loadSessions([rateRecord(), rateRecord()])).toThrow('Session s1 appears more than once');
    });

    it('should propagate unknown phase markers', () => {
      expect(() => loadSessions([rateRecord({ phase_markers: [0, 0, 1, 7, 1, 0] })])).toThrow(
        UnknownPhaseLabelError
      );
    });
  });

  describe('computeSelectionStatistics', () => {
    it('should aggregate durations, samples and per-channel values', () => {
      const sessions = loadSessions([
        rateRecord(),
        rateRecord({
          id: 's3',
          end_time: '2024-03-01T10:00:02Z',
          channels: [[2, 4]],
          phase_markers: [1, 1],
          sample_rate: 1,
        }),
      ]);

      const stats = computeSelectionStatistics(sessions.values());
      expect(stats.sessionCount).toBe(2);
      expect(stats.totalDurationSeconds).toBe(5);
      expect(stats.meanDurationSeconds).toBe(2.5);
      expect(stats.totalSamples).toBe(8);

      expect(stats.channels).toHaveLength(2);
      expect(stats.channels[0]).toMatchObject({ channelIndex: 0, min: 1, max: 6, mean: 3.375, sampleCount: 8 });
      expect(stats.channels[1]).toMatchObject({ channelIndex: 1, min: 10, max: 60, mean: 35, sampleCount: 6 });
      expect(stats.channels[1].rms).toBeCloseTo(Math.sqrt(9100 / 6));
    });

    it('should fail on an empty selection', () => {
      expect(() => computeSelectionStatistics([])).toThrow(EmptySelectionError);
    });
  });
});
