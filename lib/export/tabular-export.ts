/**
 * Tabular (CSV) export: one row per (session, channel, sample).
 */

import Papa from 'papaparse';
import { TABULAR_EXPORT_COLUMNS } from '../constants';
import { MalformedRecordError } from '../errors';
import { isPhaseLabel, phaseAt } from '../emg/phase-segmenter';
import { sampleEpochMs } from '../emg/time-base';
import type { PhaseLabel } from '../emg/types';
import { validateExportBundle, type ExportBundle } from './export-bundle';

export interface TabularRow {
  session_id: string;
  channel_index: number;
  sample_index: number;
  timestamp: string;
  amplitude: number;
  phase_label: PhaseLabel | '';
}

export function tabularRowCount(bundle: ExportBundle): number {
  return bundle.sessions.reduce(
    (sum, { session }) => sum + session.channelCount * session.sampleCount,
    0
  );
}

/**
 * Rows grouped by session (bundle order), then channel, then sample.
 */
export function buildTabularRows(bundle: ExportBundle): TabularRow[] {
  validateExportBundle(bundle);

  const rows: TabularRow[] = [];
  for (const { session, channels, phases } of bundle.sessions) {
    const timestamps = Array.from({ length: session.sampleCount }, (_, i) =>
      new Date(sampleEpochMs(session, i)).toISOString()
    );
    const labels = Array.from({ length: session.sampleCount }, (_, i) => phaseAt(phases, i) ?? '');

    for (const channel of channels) {
      channel.samples.forEach((amplitude, sampleIndex) => {
        rows.push({
          session_id: session.id,
          channel_index: channel.channelIndex,
          sample_index: sampleIndex,
          timestamp: timestamps[sampleIndex],
          amplitude,
          phase_label: labels[sampleIndex],
        });
      });
    }
  }

  return rows;
}

/**
 * Serialize a bundle as UTF-8 CSV text with a header row and `\n` line endings.
 */
export function exportTabularCsv(bundle: ExportBundle): string {
  const rows = buildTabularRows(bundle);

  const csv = Papa.unparse(
    {
      fields: [...TABULAR_EXPORT_COLUMNS],
      data: rows.map((row) => TABULAR_EXPORT_COLUMNS.map((column) => row[column])),
    },
    { newline: '\n' }
  );

  console.log(`[Export] Wrote ${rows.length} CSV rows for ${bundle.sessions.length} session(s)`);

  return `${csv}\n`;
}

export function encodeUtf8(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

/**
 * Read a tabular export back into typed rows.
 */
export function parseTabularCsv(text: string): TabularRow[] {
  const parsed = Papa.parse<Record<string, string>>(text, {
    header: true,
    skipEmptyLines: true,
  });

  if (parsed.errors.length > 0) {
    const first = parsed.errors[0];
    throw new MalformedRecordError(`CSV row ${first.row ?? '?'}: ${first.message}`);
  }

  const fields = parsed.meta.fields ?? [];
  const missing = TABULAR_EXPORT_COLUMNS.filter((column) => !fields.includes(column));
  if (missing.length > 0) {
    throw new MalformedRecordError(`CSV is missing columns: ${missing.join(', ')}`);
  }

  return parsed.data.map((raw, i) => {
    const channelIndex = Number(raw.channel_index);
    const sampleIndex = Number(raw.sample_index);
    const amplitude = Number(raw.amplitude);
    const phase = raw.phase_label;

    if (!Number.isInteger(channelIndex) || !Number.isInteger(sampleIndex) || isNaN(amplitude)) {
      throw new MalformedRecordError(`CSV row ${i + 1}: non-numeric channel, sample or amplitude`, {
        sessionId: raw.session_id,
      });
    }
    let phaseLabel: PhaseLabel | '' = '';
    if (phase !== '') {
      if (!isPhaseLabel(phase)) {
        throw new MalformedRecordError(`CSV row ${i + 1}: unknown phase label "${phase}"`, {
          sessionId: raw.session_id,
        });
      }
      phaseLabel = phase;
    }

    return {
      session_id: raw.session_id,
      channel_index: channelIndex,
      sample_index: sampleIndex,
      timestamp: raw.timestamp,
      amplitude,
      phase_label: phaseLabel,
    };
  });
}
