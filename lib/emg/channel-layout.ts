// Channel layout: fixed, index-based vertical baselines for stacked traces

import { NonContiguousChannelsError } from '../errors';

/** 1 stacks channels upward, -1 downward. */
export type StackDirection = 1 | -1;

export interface ChannelLayoutOptions {
  offsetUnit: number;
  direction?: StackDirection;
}

export interface ChannelBaseline {
  channelIndex: number;
  baseline: number;
}

/**
 * Baseline for each channel is `channelIndex * offsetUnit * direction`.
 *
 * The result is sorted by channel index regardless of input order, so the
 * same channel always lands at the same height across sessions.
 */
export function computeChannelBaselines(
  channels: ReadonlyArray<{ channelIndex: number }>,
  options: ChannelLayoutOptions
): ChannelBaseline[] {
  const { offsetUnit, direction = 1 } = options;

  if (!Number.isFinite(offsetUnit) || offsetUnit <= 0) {
    throw new RangeError(`offsetUnit must be a positive number, got ${offsetUnit}`);
  }

  const indices = channels.map((ch) => ch.channelIndex);
  assertContiguous(indices);

  return [...indices]
    .sort((a, b) => a - b)
    .map((channelIndex) => ({
      channelIndex,
      // `+ 0` folds -0 into 0 for channel 0 when stacking downward
      baseline: channelIndex * offsetUnit * direction + 0,
    }));
}

export function assertContiguous(indices: readonly number[]): void {
  const sorted = [...indices].sort((a, b) => a - b);
  for (let i = 0; i < sorted.length; i++) {
    if (sorted[i] !== i) {
      throw new NonContiguousChannelsError([...indices]);
    }
  }
}

/**
 * Vertical extent that shows every baseline with one offset unit of headroom.
 */
export function layoutRange(
  baselines: readonly ChannelBaseline[],
  offsetUnit: number
): { min: number; max: number } {
  if (baselines.length === 0) {
    return { min: -offsetUnit, max: offsetUnit };
  }

  const values = baselines.map((b) => b.baseline);
  return {
    min: Math.min(...values) - offsetUnit,
    max: Math.max(...values) + offsetUnit,
  };
}
