/**
 * Drawing plan for the stacked EMG chart.
 *
 * Everything a charting library needs to render one session: offset traces,
 * phase shading rectangles and legend entries. No pixels are touched here.
 */

import { EMG_LINE_COLORS, PHASE_COLORS, PHASE_LABELS } from '../constants';
import { UnknownPhaseLabelError } from '../errors';
import { computeChannelBaselines, layoutRange, type StackDirection } from './channel-layout';
import { isPhaseLabel } from './phase-segmenter';
import { breakGapsMask, sampleTimeSeconds } from './time-base';
import type { LoadedSession, PhaseLabel } from './types';

export interface TracePoint {
  x: number;
  y: number | null;
}

export interface ChannelTrace {
  channelIndex: number;
  label: string;
  color: string;
  baseline: number;
  points: TracePoint[];
}

export interface ShadingRect {
  label: PhaseLabel;
  start: number;
  end: number;
  color: string;
}

export interface LegendEntry {
  kind: 'channel' | 'phase';
  label: string;
  color: string;
}

export interface DrawingPlan {
  sessionId: string;
  title: string;
  xLabel: string;
  yLabel: string;
  traces: ChannelTrace[];
  shading: ShadingRect[];
  legend: LegendEntry[];
  yRange: { min: number; max: number };
}

export interface DrawingPlanOptions {
  offsetUnit: number;
  direction?: StackDirection;
  gapFactor?: number;
  title?: string;
}

/**
 * Shading color for a phase. Unknown labels fail loudly so mis-segmented data
 * is visible instead of rendering unshaded.
 */
export function phaseColor(label: string): string {
  if (!isPhaseLabel(label)) {
    throw new UnknownPhaseLabelError(label);
  }
  return PHASE_COLORS[label];
}

export function channelLabel(channelIndex: number): string {
  return `Ch ${channelIndex + 1}`;
}

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}

export function buildDrawingPlan(loaded: LoadedSession, options: DrawingPlanOptions): DrawingPlan {
  const { session, channels, phases } = loaded;
  const { offsetUnit, direction = 1, gapFactor } = options;

  const baselines = computeChannelBaselines(channels, { offsetUnit, direction });
  const baselineByChannel = new Map(baselines.map((b) => [b.channelIndex, b.baseline]));

  const times = Array.from({ length: session.sampleCount }, (_, i) =>
    sampleTimeSeconds(session.timeBase, i)
  );
  const gapMask =
    gapFactor !== undefined && session.timeBase.kind === 'timestamps'
      ? breakGapsMask(session.timeBase.timestamps, gapFactor)
      : times.map(() => false);

  const traces: ChannelTrace[] = [...channels]
    .sort((a, b) => a.channelIndex - b.channelIndex)
    .map((channel) => {
      const baseline = baselineByChannel.get(channel.channelIndex) ?? 0;
      return {
        channelIndex: channel.channelIndex,
        label: channelLabel(channel.channelIndex),
        color: EMG_LINE_COLORS[channel.channelIndex % EMG_LINE_COLORS.length],
        baseline,
        points: channel.samples.map((value, i) => ({
          x: times[i],
          y: gapMask[i] ? null : value + baseline,
        })),
      };
    });

  const shading: ShadingRect[] = phases.map((interval) => ({
    label: interval.label,
    start: sampleTimeSeconds(session.timeBase, interval.startOffset),
    end: sampleTimeSeconds(session.timeBase, interval.endOffset),
    color: phaseColor(interval.label),
  }));

  // Top channel first, then the phase swatches
  const topDown = direction === 1 ? [...traces].reverse() : traces;
  const legend = topDown.map((trace): LegendEntry => ({
    kind: 'channel',
    label: trace.label,
    color: trace.color,
  }));
  if (shading.length > 0) {
    for (const label of PHASE_LABELS) {
      legend.push({ kind: 'phase', label: capitalize(label), color: phaseColor(label) });
    }
  }

  return {
    sessionId: session.id,
    title: options.title ?? `EMG Data - Session ${session.id}`,
    xLabel: 'Time (s)',
    yLabel: 'EMG Channels (offset)',
    traces,
    shading,
    legend,
    yRange: layoutRange(baselines, offsetUnit),
  };
}
