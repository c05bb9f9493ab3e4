// Shared test records

import type { RawSessionRecord } from '../emg/schemas';

export const START = '2024-03-01T10:00:00Z';
export const START_MS = Date.parse(START);

/**
 * Two channels, six samples at 2 Hz, phases rest/attempt/rest.
 */
export function rateRecord(overrides: Partial<RawSessionRecord> = {}): RawSessionRecord {
  return {
    id: 's1',
    patient_id: 'p1',
    start_time: START,
    end_time: '2024-03-01T10:00:03Z',
    channels: [
      [1, 2, 3, 4, 5, 6],
      [10, 20, 30, 40, 50, 60],
    ],
    phase_markers: [0, 0, 1, 1, 1, 0],
    sample_rate: 2,
    ...overrides,
  };
}

/**
 * One channel, four samples 100 ms apart except a 1 s gap before the last.
 */
export function timestampRecord(overrides: Partial<RawSessionRecord> = {}): RawSessionRecord {
  return {
    id: 's2',
    patient_id: 'p1',
    start_time: START,
    end_time: '2024-03-01T10:00:02Z',
    channels: [[5, -5, 5, -5]],
    phase_markers: ['attempt', 'attempt', 'rest', 'rest'],
    timestamps: [START_MS, START_MS + 100, START_MS + 200, START_MS + 1200],
    exercise_type: 'grip',
    reps_completed: 3,
    ...overrides,
  };
}
