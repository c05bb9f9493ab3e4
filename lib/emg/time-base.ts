// Sample timing helpers shared by the drawing plan and the exporters

import type { Session, TimeBase } from './types';

export function median(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

function timestampDiffs(timestamps: readonly number[]): number[] {
  const diffs: number[] = [];
  for (let i = 1; i < timestamps.length; i++) {
    diffs.push(timestamps[i] - timestamps[i - 1]);
  }
  return diffs;
}

/**
 * Typical spacing between samples in seconds (median of the timestamp deltas).
 */
export function sampleIntervalSeconds(timeBase: TimeBase): number {
  if (timeBase.kind === 'rate') {
    return 1 / timeBase.sampleRate;
  }
  const diffs = timestampDiffs(timeBase.timestamps);
  return diffs.length > 0 ? median(diffs) / 1000 : 0;
}

/**
 * Seconds from the first sample to sample `index`. `index === sampleCount`
 * gives the end of the last sample, which closes the final phase interval.
 */
export function sampleTimeSeconds(timeBase: TimeBase, index: number): number {
  if (timeBase.kind === 'rate') {
    return index / timeBase.sampleRate;
  }

  const { timestamps } = timeBase;
  if (timestamps.length === 0) return 0;
  if (index < timestamps.length) {
    return (timestamps[index] - timestamps[0]) / 1000;
  }
  const last = (timestamps[timestamps.length - 1] - timestamps[0]) / 1000;
  return last + (index - timestamps.length + 1) * sampleIntervalSeconds(timeBase);
}

/**
 * Absolute time of a sample in epoch milliseconds.
 */
export function sampleEpochMs(session: Session, index: number): number {
  const { timeBase } = session;
  if (timeBase.kind === 'timestamps') {
    return timeBase.timestamps[index];
  }
  return Date.parse(session.startTime) + (index * 1000) / timeBase.sampleRate;
}

/**
 * Mark samples that come right after a gap larger than `factor` times the
 * median sample spacing, so plotted lines can break there.
 */
export function breakGapsMask(timestamps: readonly number[], factor: number): boolean[] {
  if (timestamps.length < 2) {
    return timestamps.map(() => false);
  }

  const diffs = timestampDiffs(timestamps);
  const threshold = median(diffs) * factor;
  // Duplicate timestamps can make the median spacing zero
  return [false, ...diffs.map((dt) => threshold > 0 && dt > threshold)];
}
