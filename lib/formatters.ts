// Formatting utilities for timestamps, filenames and display values

import {
  EXPORT_FILE_SUFFIXES,
  REPORT_FILENAME_TIMESTAMP,
  TIMESTAMP_DISPLAY_FORMAT,
  TIMESTAMP_DISPLAY_FORMAT_SHORT,
  type ExportKind,
} from './constants';

/**
 * Convert a string to a safe filename by removing special characters
 */
export function safeFilename(s: string | null | undefined): string {
  return (s ?? '')
    .trim()
    .replace(/\s+/g, '_')
    .replace(/[^A-Za-z0-9._-]/g, '');
}

export function exportFilename(patientName: string, kind: ExportKind): string {
  return `${safeFilename(patientName)}${EXPORT_FILE_SUFFIXES[kind]}`;
}

export function reportFilename(patientName: string, generatedAt: Date): string {
  const name = safeFilename(patientName) || 'patient';
  return `${name}_report_${formatDate(generatedAt, REPORT_FILENAME_TIMESTAMP)}.pdf`;
}

const ISO_LIKE =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2})(?::(\d{2}))?(?:\.(\d+))?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

/**
 * ISO-like timestamp parsing.
 *
 * Accepts any number of fractional digits, a `Z` or numeric offset, and a
 * space instead of `T`. Timestamps without an offset are read as UTC.
 * Numbers are epoch milliseconds. Returns null when nothing sensible parses.
 */
export function parseTimestamp(value: unknown): Date | null {
  if (value instanceof Date) {
    return isNaN(value.getTime()) ? null : value;
  }
  if (typeof value === 'number') {
    const date = new Date(value);
    return isNaN(date.getTime()) ? null : date;
  }
  if (typeof value !== 'string') {
    return null;
  }

  const match = ISO_LIKE.exec(value.trim());
  if (!match) return null;

  const [, date, hm = '00:00', sec = '00', frac = '', zone = 'Z'] = match;
  const millis = frac.slice(0, 3).padEnd(3, '0');
  const offset = normalizeOffset(zone);

  const ms = Date.parse(`${date}T${hm}:${sec}.${millis}${offset}`);
  return isNaN(ms) ? null : new Date(ms);
}

function normalizeOffset(zone: string): string {
  if (zone.toUpperCase() === 'Z') return 'Z';
  const digits = zone.slice(1).replace(':', '').padEnd(4, '0');
  return `${zone[0]}${digits.slice(0, 2)}:${digits.slice(2)}`;
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

/**
 * Render a date with YYYY, MM, DD, HH, mm and ss tokens (UTC).
 */
export function formatDate(date: Date, pattern: string): string {
  return pattern.replace(/YYYY|MM|DD|HH|mm|ss/g, (token) => {
    switch (token) {
      case 'YYYY':
        return pad(date.getUTCFullYear(), 4);
      case 'MM':
        return pad(date.getUTCMonth() + 1);
      case 'DD':
        return pad(date.getUTCDate());
      case 'HH':
        return pad(date.getUTCHours());
      case 'mm':
        return pad(date.getUTCMinutes());
      default:
        return pad(date.getUTCSeconds());
    }
  });
}

/**
 * Format a timestamp for display. Unparsable strings are returned unchanged.
 */
export function formatTimestampForDisplay(ts: unknown, short = false): string {
  if (ts === null || ts === undefined) {
    return 'N/A';
  }

  if (typeof ts !== 'string' && !(ts instanceof Date)) {
    return String(ts);
  }

  const date = parseTimestamp(ts);
  if (!date) {
    return String(ts);
  }

  return formatDate(date, short ? TIMESTAMP_DISPLAY_FORMAT_SHORT : TIMESTAMP_DISPLAY_FORMAT);
}

/**
 * Format a duration in seconds, e.g. "5m 30s"
 */
export function formatDuration(seconds: number | null | undefined): string {
  if (seconds === null || seconds === undefined || isNaN(seconds)) {
    return 'N/A';
  }

  const minutes = Math.floor(seconds / 60);
  const secs = Math.floor(seconds % 60);

  if (minutes > 0) {
    return `${minutes}m ${secs}s`;
  }
  return `${secs}s`;
}

/**
 * Format an hour of day (14.5 -> "2:30 PM")
 */
export function formatTimeOfDay(hour: number): string {
  const h = Math.floor(hour);
  const m = Math.floor((hour - h) * 60);
  const period = h < 12 ? 'AM' : 'PM';
  let displayH = h <= 12 ? h : h - 12;
  if (displayH === 0) {
    displayH = 12;
  }
  return `${displayH}:${pad(m)} ${period}`;
}
