// Phase segmentation: per-sample markers -> contiguous labelled intervals

import { PHASE_CODES, PHASE_LABELS } from '../constants';
import { UnknownPhaseLabelError } from '../errors';
import type { PhaseInterval, PhaseLabel, PhaseMarker } from './types';

export function isPhaseLabel(value: unknown): value is PhaseLabel {
  return typeof value === 'string' && (PHASE_LABELS as readonly string[]).includes(value);
}

/**
 * Map one raw marker onto the closed label set, or undefined when it is not recognised.
 */
export function resolvePhaseLabel(marker: PhaseMarker): PhaseLabel | undefined {
  if (typeof marker === 'number') {
    if (marker === PHASE_CODES.rest) return 'rest';
    if (marker === PHASE_CODES.attempt) return 'attempt';
    return undefined;
  }

  const normalized = marker.trim().toLowerCase();
  return isPhaseLabel(normalized) ? normalized : undefined;
}

/**
 * Split a marker sequence into labelled runs.
 *
 * A new interval opens at the first sample and at every label change; the
 * output partitions [0, markers.length) exactly. Throws UnknownPhaseLabelError
 * on the first unrecognised marker.
 */
export function segmentPhases(
  markers: readonly PhaseMarker[],
  sessionId: string
): PhaseInterval[] {
  const intervals: PhaseInterval[] = [];
  let current: PhaseLabel | undefined;
  let runStart = 0;

  for (let i = 0; i < markers.length; i++) {
    const label = resolvePhaseLabel(markers[i]);
    if (label === undefined) {
      throw new UnknownPhaseLabelError(markers[i], { sessionId, sampleIndex: i });
    }

    if (current === undefined) {
      current = label;
      runStart = i;
    } else if (label !== current) {
      pushRun(intervals, sessionId, current, runStart, i);
      current = label;
      runStart = i;
    }
  }

  if (current !== undefined) {
    pushRun(intervals, sessionId, current, runStart, markers.length);
  }

  return intervals;
}

function pushRun(
  intervals: PhaseInterval[],
  sessionId: string,
  label: PhaseLabel,
  start: number,
  end: number
): void {
  if (end <= start) return;
  intervals.push({ sessionId, label, startOffset: start, endOffset: end });
}

/**
 * Replace unrecognised markers with `fallback` before segmenting.
 * This is a caller policy; segmentPhases itself never coerces.
 */
export function coerceUnknownMarkers(
  markers: readonly PhaseMarker[],
  fallback: PhaseLabel
): PhaseMarker[] {
  return markers.map((marker) => (resolvePhaseLabel(marker) === undefined ? fallback : marker));
}

/**
 * Expand intervals back to one label per sample.
 */
export function expandIntervals(intervals: readonly PhaseInterval[]): PhaseLabel[] {
  const labels: PhaseLabel[] = [];
  for (const interval of intervals) {
    for (let i = interval.startOffset; i < interval.endOffset; i++) {
      labels.push(interval.label);
    }
  }
  return labels;
}

/**
 * Label covering a sample, or undefined when it falls in a gap.
 */
export function phaseAt(
  intervals: readonly PhaseInterval[],
  sampleIndex: number
): PhaseLabel | undefined {
  let lo = 0;
  let hi = intervals.length - 1;

  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    const interval = intervals[mid];
    if (sampleIndex < interval.startOffset) {
      hi = mid - 1;
    } else if (sampleIndex >= interval.endOffset) {
      lo = mid + 1;
    } else {
      return interval.label;
    }
  }

  return undefined;
}

/**
 * Check that intervals are sorted, non-overlapping and cover [0, sampleCount).
 */
export function coversTimeline(intervals: readonly PhaseInterval[], sampleCount: number): boolean {
  let expected = 0;
  for (const interval of intervals) {
    if (interval.startOffset !== expected || interval.endOffset <= interval.startOffset) {
      return false;
    }
    expected = interval.endOffset;
  }
  return expected === sampleCount;
}
