import type { PHASE_LABELS } from '../constants';

export type PhaseLabel = (typeof PHASE_LABELS)[number];

/** Raw per-sample marker as stored: 0/1 codes or 'rest'/'attempt' strings. */
export type PhaseMarker = number | string;

export type TimeBase =
  | { kind: 'rate'; sampleRate: number }
  | { kind: 'timestamps'; timestamps: readonly number[] }; // epoch ms

export interface Session {
  id: string;
  patientId: string;
  startTime: string;
  endTime: string;
  durationSeconds: number;
  sampleCount: number;
  channelCount: number;
  timeBase: TimeBase;
  exerciseType?: string;
  exerciseGesture?: string;
  stimulationMode?: string;
  repsCompleted?: number;
}

export interface ChannelSeries {
  sessionId: string;
  channelIndex: number;
  samples: readonly number[];
}

/** Half-open sample range [startOffset, endOffset). */
export interface PhaseInterval {
  sessionId: string;
  label: PhaseLabel;
  startOffset: number;
  endOffset: number;
}

export interface LoadedSession {
  session: Session;
  channels: readonly ChannelSeries[];
  phases: readonly PhaseInterval[];
}

export interface ChannelStatistics {
  channelIndex: number;
  min: number;
  max: number;
  mean: number;
  rms: number;
  sampleCount: number;
}

export interface SelectionStatistics {
  sessionCount: number;
  totalDurationSeconds: number;
  meanDurationSeconds: number;
  totalSamples: number;
  channels: ChannelStatistics[];
}
