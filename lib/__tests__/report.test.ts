import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PDFDocument } from 'pdf-lib';
import {
  buildReportContent,
  computeRepsTrend,
  gestureSummary,
  metricsTable,
  trendTable,
} from '../report/report-content';
import { generateRehabilitationReport, pdfSafeText, renderReportPdf } from '../report/report-pdf';
import { reportFilename } from '../formatters';
import { EmptySelectionError } from '../errors';
import type { ExerciseSession } from '@/types/database';

const GENERATED_AT = new Date('2024-03-06T12:00:00Z');

function session(overrides: Partial<ExerciseSession> & { id: string }): ExerciseSession {
  return {
    start_time: null,
    exercise_type: null,
    exercise_gesture: null,
    duration_seconds: null,
    stimulation_mode: null,
    reps_completed: null,
    ...overrides,
  };
}

const sessions: ExerciseSession[] = [
  session({
    id: 'r1',
    start_time: '2024-03-04T09:30:00Z',
    exercise_type: 'grip',
    exercise_gesture: 'open',
    duration_seconds: 600,
    stimulation_mode: 'fes',
    reps_completed: 4,
  }),
  session({
    id: 'r2',
    start_time: '2024-03-04T18:00:00Z',
    exercise_type: 'grip',
    exercise_gesture: 'close',
    duration_seconds: 240,
    reps_completed: 6,
  }),
  session({
    id: 'r3',
    start_time: '2024-03-05T07:15:00Z',
    exercise_type: 'wrist',
    exercise_gesture: 'open',
    reps_completed: 10,
  }),
  session({ id: 'r4', duration_seconds: 120 }),
];

describe('Rehabilitation report', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('buildReportContent', () => {
    it('should compute key metrics from the selection', () => {
      const content = buildReportContent(sessions, { patientName: 'Jane Doe', generatedAt: GENERATED_AT });
      expect(metricsTable(content.metrics)).toEqual([
        ['Total Sessions', '4', 'Active Days', '2'],
        ['Avg Session Duration (min)', '5.3', 'Sessions/Day', '2.00'],
        ['Total Reps', '20', 'Avg Reps/Session', '6.7'],
      ]);
    });

    it('should break down exercises and gestures as shares of all sessions', () => {
      const content = buildReportContent(sessions, { patientName: 'Jane Doe' });
      expect(content.exercises).toEqual([
        { name: 'grip', count: 2, percent: 50 },
        { name: 'wrist', count: 1, percent: 25 },
      ]);
      expect(gestureSummary(content.gestures)).toBe('Top Gestures: open (2), close (1)');
    });

    it('should collect activity by hour and reps over time', () => {
      const content = buildReportContent(sessions, { patientName: 'Jane Doe' });
      expect(content.hourHistogram.flatMap((count, hour) => (count > 0 ? [hour] : []))).toEqual([7, 9, 18]);
      expect(content.repsSeries).toEqual([
        { timestamp: '2024-03-04T09:30:00.000Z', reps: 4 },
        { timestamp: '2024-03-04T18:00:00.000Z', reps: 6 },
        { timestamp: '2024-03-05T07:15:00.000Z', reps: 10 },
      ]);
    });

    it('should list session details for display', () => {
      const content = buildReportContent(sessions, { patientName: 'Jane Doe' });
      expect(content.detailHeader).toEqual(['Start Time', 'Duration', 'Exercise', 'Gesture', 'Stimulation', 'Reps']);
      expect(content.detailRows[0]).toEqual(['2024-03-04 09:30:00', '10m 0s', 'grip', 'open', 'fes', '4']);
      expect(content.detailRows[3]).toEqual(['N/A', '2m 0s', '', '', '', '']);
    });

    it('should include every section unless told otherwise', () => {
      const content = buildReportContent(sessions, {
        patientName: 'Jane Doe',
        period: 'March 2024',
        sections: { details: false },
      });
      expect(content.sections).toEqual({
        summary: true,
        details: false,
        exercises: true,
        trends: true,
        charts: true,
      });
      expect(content.period).toBe('March 2024');
    });

    it('should recommend more repetitions for short, light sessions', () => {
      const content = buildReportContent([session({ id: 'x', duration_seconds: 120, reps_completed: 2 })], {
        patientName: 'Jane Doe',
      });
      expect(content.recommendations).toEqual([
        'Consider increasing target repetitions per session to improve dosing.',
        'Sessions are short; ensure the minimum therapeutic dose is met.',
        'Review signal quality for any sessions with few valid EMG samples.',
      ]);
      expect(content.trend).toBeNull();
    });

    it('should leave out activity when no start time parses', () => {
      const content = buildReportContent([session({ id: 'x' })], { patientName: 'Jane Doe' });
      expect(content.activity).toBeNull();
      expect(content.metrics.activeDays).toBe(0);
      expect(content.metrics.sessionsPerDay).toBe(1);
      expect(content.hourHistogram.every((count) => count === 0)).toBe(true);
    });

    it('should fail on an empty selection', () => {
      expect(() => buildReportContent([], { patientName: 'Jane Doe' })).toThrow(EmptySelectionError);
    });
  });

  describe('computeRepsTrend', () => {
    it('should compare the earlier half with the later half in time order', () => {
      const trend = computeRepsTrend([...sessions].reverse());
      expect(trend).toEqual({ early: 5, recent: 10, changePercent: 100 });
      expect(trend && trendTable(trend)).toEqual([
        ['Metric', 'Early', 'Recent', 'Change'],
        ['Avg Reps', '5.0', '10.0', '+100%'],
      ]);
    });

    it('should report no change against an early average of zero', () => {
      expect(trendTable({ early: 0, recent: 3, changePercent: null })[1]).toEqual(['Avg Reps', '0.0', '3.0', 'N/A']);
      expect(trendTable({ early: 4, recent: 3, changePercent: -25.4 })[1][3]).toBe('-25%');
    });
  });

  describe('renderReportPdf', () => {
    it('should write a PDF with one page per part', async () => {
      const bytes = await renderReportPdf(
        buildReportContent(sessions, { patientName: 'Jane Doe', generatedAt: GENERATED_AT })
      );
      expect(new TextDecoder().decode(bytes.subarray(0, 5))).toBe('%PDF-');

      const doc = await PDFDocument.load(bytes, { updateMetadata: false });
      expect(doc.getPageCount()).toBe(3);
      expect(doc.getTitle()).toBe('Clinical Rehabilitation Report - Jane Doe');
      expect(doc.getSubject()).toBe('All selected sessions');
      expect(doc.getCreationDate()?.toISOString()).toBe('2024-03-06T12:00:00.000Z');
    });

    it('should fit a summary-only report on one page', async () => {
      const content = buildReportContent(sessions, {
        patientName: 'Jane Doe',
        period: 'Week 10',
        sections: { details: false, trends: false, exercises: false, charts: false },
      });
      const doc = await PDFDocument.load(await renderReportPdf(content), { updateMetadata: false });
      expect(doc.getPageCount()).toBe(1);
      expect(doc.getSubject()).toBe('Week 10');
    });

    it('should replace characters the standard fonts cannot encode', async () => {
      expect(pdfSafeText('Zoë → ok')).toBe('Zo? ? ok');
      const bytes = await generateRehabilitationReport(sessions, { patientName: 'Zoë', generatedAt: GENERATED_AT });
      const doc = await PDFDocument.load(bytes, { updateMetadata: false });
      expect(doc.getTitle()).toBe('Clinical Rehabilitation Report - Zo?');
    });
  });

  describe('reportFilename', () => {
    it('should name reports after the patient and the generation time', () => {
      const at = new Date('2024-03-06T12:05:09Z');
      expect(reportFilename('Jane Doe', at)).toBe('Jane_Doe_report_20240306_120509.pdf');
      expect(reportFilename('', at)).toBe('patient_report_20240306_120509.pdf');
    });
  });
});
