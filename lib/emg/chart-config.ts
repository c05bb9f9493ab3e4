import type { Chart, ChartConfiguration, ChartType, Plugin } from 'chart.js';
import { EMG_LINE_WIDTH, PHASE_SHADING_ALPHA } from '../constants';
import type { DrawingPlan, ShadingRect, TracePoint } from './drawing-plan';

export interface PhaseShadingOptions {
  rects: ShadingRect[];
  alpha: number;
}

export interface ChannelLabelOptions {
  labels: string[];
  offsets: number[];
}

declare module 'chart.js' {
  interface PluginOptionsByType<TType extends ChartType> {
    emgPhaseShading?: PhaseShadingOptions;
    emgChannelLabels?: ChannelLabelOptions;
  }
}

export interface PixelBox {
  left: number;
  top: number;
  width: number;
  height: number;
  color: string;
}

interface ChartAreaLike {
  left: number;
  right: number;
  top: number;
  bottom: number;
}

/**
 * Pixel rectangles for the phase intervals, clipped to the chart area.
 * Intervals entirely outside the visible x range are dropped.
 */
export function shadingBoxes(
  rects: ReadonlyArray<Partial<ShadingRect>>,
  xScale: { getPixelForValue(value: number): number },
  area: ChartAreaLike
): PixelBox[] {
  const boxes: PixelBox[] = [];

  for (const rect of rects) {
    if (rect.start === undefined || rect.end === undefined) continue;

    const x1 = xScale.getPixelForValue(rect.start);
    const x2 = xScale.getPixelForValue(rect.end);

    const left = Math.max(Math.min(x1, x2), area.left);
    const right = Math.min(Math.max(x1, x2), area.right);

    if (right <= area.left || left >= area.right || right <= left) continue;

    boxes.push({
      left,
      top: area.top,
      width: right - left,
      height: area.bottom - area.top,
      color: rect.color ?? '#888888',
    });
  }

  return boxes;
}

// Paints phase backgrounds before the traces so lines stay on top
export const phaseShadingPlugin: Plugin<'line'> = {
  id: 'emgPhaseShading',

  beforeDatasetsDraw(chart: Chart<'line'>) {
    const options = chart.options.plugins?.emgPhaseShading;
    if (!options) return;

    const xScale = chart.scales.x;
    const { ctx, chartArea } = chart;
    if (!xScale || !chartArea) return;

    ctx.save();
    ctx.globalAlpha = options.alpha ?? PHASE_SHADING_ALPHA;
    for (const box of shadingBoxes(options.rects ?? [], xScale, chartArea)) {
      ctx.fillStyle = box.color;
      ctx.fillRect(box.left, box.top, box.width, box.height);
    }
    ctx.restore();
  },
};

// Channel label plugin: draws channel names at their baselines on the left margin
export const channelLabelPlugin: Plugin<'line'> = {
  id: 'emgChannelLabels',

  afterDraw(chart: Chart<'line'>) {
    const meta = chart.options.plugins?.emgChannelLabels;
    if (!meta) return;

    const { ctx, chartArea } = chart;
    const yScale = chart.scales.y;
    if (!yScale || !chartArea) return;

    const labels = meta.labels ?? [];
    const offsets = meta.offsets ?? [];

    ctx.save();
    ctx.fillStyle = '#374151';
    ctx.font = 'bold 11px sans-serif';
    ctx.textAlign = 'right';
    ctx.textBaseline = 'middle';

    for (let i = 0; i < labels.length && i < offsets.length; i++) {
      const yPixel = yScale.getPixelForValue(offsets[i]);
      if (yPixel >= chartArea.top && yPixel <= chartArea.bottom) {
        ctx.fillText(labels[i], chartArea.left - 6, yPixel);
      }
    }

    ctx.restore();
  },
};

/**
 * Chart.js line-chart configuration for a drawing plan.
 * Each channel is its own dataset; null points break the line at gaps.
 */
export function toChartConfiguration(plan: DrawingPlan): ChartConfiguration<'line', TracePoint[]> {
  return {
    type: 'line',
    data: {
      datasets: plan.traces.map((trace) => ({
        label: trace.label,
        data: trace.points,
        borderColor: trace.color,
        backgroundColor: 'transparent',
        borderWidth: EMG_LINE_WIDTH,
        pointRadius: 0,
        tension: 0,
        spanGaps: false,
      })),
    },
    options: {
      responsive: true,
      maintainAspectRatio: false,
      animation: false,
      parsing: false,
      layout: {
        padding: { left: 60 },
      },
      plugins: {
        legend: { display: false },
        title: { display: true, text: plan.title },
        emgPhaseShading: {
          rects: plan.shading,
          alpha: PHASE_SHADING_ALPHA,
        },
        emgChannelLabels: {
          labels: plan.traces.map((t) => t.label),
          offsets: plan.traces.map((t) => t.baseline),
        },
      },
      scales: {
        x: {
          type: 'linear',
          title: { display: true, text: plan.xLabel },
          grid: { color: 'rgba(0, 0, 0, 0.08)' },
        },
        y: {
          type: 'linear',
          min: plan.yRange.min,
          max: plan.yRange.max,
          title: { display: true, text: plan.yLabel },
          ticks: { display: false },
        },
      },
    },
    plugins: [phaseShadingPlugin, channelLabelPlugin],
  };
}
