/**
 * Rehabilitation report PDF
 *
 * Lays out report content on US Letter pages with pdf-lib: key metrics and
 * activity charts first, then trends and recommendations, then the session
 * detail table.
 */

import { PDFDocument, PageSizes, StandardFonts, rgb, type Color, type PDFFont, type PDFPage } from 'pdf-lib';
import { formatTimestampForDisplay } from '../formatters';
import type { ExerciseSession } from '@/types/database';
import {
  buildReportContent,
  gestureSummary,
  metricsTable,
  trendTable,
  type ReportContent,
  type ReportOptions,
} from './report-content';

const MARGIN = 50;
const PRODUCER = 'emg-session-viewer';

function hex(color: string): Color {
  const value = parseInt(color.slice(1), 16);
  return rgb(((value >> 16) & 0xff) / 255, ((value >> 8) & 0xff) / 255, (value & 0xff) / 255);
}

const COLORS = {
  title: hex('#2c3e50'),
  section: hex('#2980b9'),
  text: hex('#000000'),
  grid: hex('#808080'),
  headerFill: hex('#3498db'),
  headerText: hex('#ffffff'),
  stripe: hex('#f8f9fa'),
  labelFill: hex('#ecf0f1'),
  daysBar: hex('#4e79a7'),
  hoursBar: hex('#f28e2b'),
  repsLine: hex('#1f77b4'),
};

// The standard fonts only encode WinAnsi; anything else is replaced
export function pdfSafeText(text: string): string {
  return text.replace(/[^\x20-\x7e]/g, '?');
}

interface TableStyle {
  header?: boolean;
  labelColumns?: number[];
  fontSize?: number;
}

class ReportWriter {
  private page: PDFPage;
  private y = 0;

  constructor(
    private doc: PDFDocument,
    private regular: PDFFont,
    private bold: PDFFont
  ) {
    this.page = this.addPage();
  }

  private get width(): number {
    return this.page.getWidth() - 2 * MARGIN;
  }

  private addPage(): PDFPage {
    const page = this.doc.addPage(PageSizes.Letter);
    this.y = page.getHeight() - MARGIN;
    return page;
  }

  newPage(): void {
    this.page = this.addPage();
  }

  private ensure(height: number): void {
    if (this.y - height < MARGIN) this.newPage();
  }

  space(height: number): void {
    this.y -= height;
  }

  private fit(text: string, font: PDFFont, size: number, maxWidth: number): string {
    let out = pdfSafeText(text);
    if (font.widthOfTextAtSize(out, size) <= maxWidth) return out;
    while (out.length > 0 && font.widthOfTextAtSize(`${out}...`, size) > maxWidth) {
      out = out.slice(0, -1);
    }
    return `${out}...`;
  }

  line(text: string, options: { size?: number; bold?: boolean; color?: Color; center?: boolean } = {}): void {
    const size = options.size ?? 10;
    const font = options.bold ? this.bold : this.regular;
    const safe = this.fit(text, font, size, this.width);
    this.ensure(size * 1.5);
    this.y -= size * 1.2;
    const x = options.center ? MARGIN + (this.width - font.widthOfTextAtSize(safe, size)) / 2 : MARGIN;
    this.page.drawText(safe, { x, y: this.y, size, font, color: options.color ?? COLORS.text });
    this.y -= size * 0.3;
  }

  paragraph(text: string, size = 10): void {
    const words = pdfSafeText(text).split(/\s+/);
    let current = '';
    for (const word of words) {
      const candidate = current ? `${current} ${word}` : word;
      if (current && this.regular.widthOfTextAtSize(candidate, size) > this.width) {
        this.line(current, { size });
        current = word;
      } else {
        current = candidate;
      }
    }
    if (current) this.line(current, { size });
  }

  section(title: string): void {
    this.ensure(40);
    this.space(8);
    this.line(title, { size: 14, bold: true, color: COLORS.section });
    this.space(4);
  }

  table(rows: string[][], columnWidths: number[], style: TableStyle = {}): void {
    const size = style.fontSize ?? 8;
    const rowHeight = size + 8;
    const header = style.header ? rows[0] : undefined;

    const drawRow = (cells: string[], index: number, isHeader: boolean): void => {
      let x = MARGIN;
      cells.forEach((cell, col) => {
        const width = columnWidths[col] ?? 0;
        let fill: Color | undefined;
        if (isHeader) fill = COLORS.headerFill;
        else if (style.labelColumns?.includes(col)) fill = COLORS.labelFill;
        else if (style.header && index % 2 === 0) fill = COLORS.stripe;

        this.page.drawRectangle({
          x,
          y: this.y - rowHeight,
          width,
          height: rowHeight,
          color: fill,
          borderColor: COLORS.grid,
          borderWidth: 0.25,
        });
        const font = isHeader ? this.bold : this.regular;
        this.page.drawText(this.fit(cell, font, size, width - 6), {
          x: x + 3,
          y: this.y - rowHeight + 5,
          size,
          font,
          color: isHeader ? COLORS.headerText : COLORS.text,
        });
        x += width;
      });
      this.y -= rowHeight;
    };

    if (header) {
      this.ensure(rowHeight * 2);
      drawRow(header, 0, true);
    }
    const body = header ? rows.slice(1) : rows;
    body.forEach((cells, index) => {
      if (this.y - rowHeight < MARGIN) {
        this.newPage();
        if (header) drawRow(header, 0, true);
      }
      drawRow(cells, index + 1, false);
    });
    this.space(6);
  }

  barChart(title: string, values: readonly number[], labels: readonly string[], color: Color): void {
    const height = 90;
    this.ensure(height + 40);
    this.line(title, { size: 10, bold: true });

    const top = this.y - 4;
    const bottom = top - height;
    const max = Math.max(1, ...values);
    const slot = this.width / Math.max(values.length, 1);
    const labelEvery = Math.max(1, Math.ceil(values.length / 12));

    this.page.drawLine({
      start: { x: MARGIN, y: bottom },
      end: { x: MARGIN + this.width, y: bottom },
      thickness: 0.5,
      color: COLORS.grid,
    });
    values.forEach((value, i) => {
      const x = MARGIN + i * slot;
      if (value > 0) {
        this.page.drawRectangle({ x: x + slot * 0.1, y: bottom, width: slot * 0.8, height: (value / max) * height, color });
      }
      if (i % labelEvery === 0) {
        this.page.drawText(pdfSafeText(labels[i] ?? ''), { x, y: bottom - 9, size: 6, font: this.regular });
      }
    });
    this.page.drawText(String(max), { x: MARGIN - 16, y: top - 6, size: 6, font: this.regular });
    this.y = bottom - 16;
  }

  lineChart(title: string, values: readonly number[], labels: readonly string[], color: Color): void {
    const height = 90;
    this.ensure(height + 40);
    this.line(title, { size: 10, bold: true });

    const top = this.y - 4;
    const bottom = top - height;
    const min = Math.min(0, ...values);
    const max = Math.max(min + 1, ...values);
    const step = values.length > 1 ? this.width / (values.length - 1) : 0;
    const point = (i: number) => ({ x: MARGIN + i * step, y: bottom + ((values[i] - min) / (max - min)) * height });

    this.page.drawLine({
      start: { x: MARGIN, y: bottom },
      end: { x: MARGIN + this.width, y: bottom },
      thickness: 0.5,
      color: COLORS.grid,
    });
    for (let i = 0; i < values.length; i++) {
      const p = point(i);
      if (i > 0) this.page.drawLine({ start: point(i - 1), end: p, thickness: 1, color });
      this.page.drawCircle({ x: p.x, y: p.y, size: 2, color });
    }
    this.page.drawText(pdfSafeText(labels[0] ?? ''), { x: MARGIN, y: bottom - 9, size: 6, font: this.regular });
    const last = pdfSafeText(labels[labels.length - 1] ?? '');
    this.page.drawText(last, {
      x: MARGIN + this.width - this.regular.widthOfTextAtSize(last, 6),
      y: bottom - 9,
      size: 6,
      font: this.regular,
    });
    this.page.drawText(String(max), { x: MARGIN - 16, y: top - 6, size: 6, font: this.regular });
    this.y = bottom - 16;
  }

  get contentWidth(): number {
    return this.width;
  }
}

function writeActivityCharts(writer: ReportWriter, content: ReportContent): void {
  if (!content.activity) return;
  const { days } = content.activity;
  writer.barChart(
    'Sessions per Day',
    days.map((d) => d.sessions),
    days.map((d) => d.date.slice(5)),
    COLORS.daysBar
  );
  writer.barChart(
    'Session Hour Distribution',
    content.hourHistogram,
    content.hourHistogram.map((_, hour) => String(hour)),
    COLORS.hoursBar
  );
}

/**
 * Render report content to PDF bytes.
 */
export async function renderReportPdf(content: ReportContent): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  doc.setTitle(pdfSafeText(`Clinical Rehabilitation Report - ${content.patientName}`));
  doc.setSubject(pdfSafeText(content.period ?? 'All selected sessions'));
  doc.setCreator(PRODUCER);
  doc.setProducer(PRODUCER);
  doc.setCreationDate(content.generatedAt);
  doc.setModificationDate(content.generatedAt);

  const regular = await doc.embedFont(StandardFonts.Helvetica);
  const bold = await doc.embedFont(StandardFonts.HelveticaBold);
  const writer = new ReportWriter(doc, regular, bold);
  const width = writer.contentWidth;
  const { sections } = content;

  writer.line('Clinical Rehabilitation Report', { size: 22, bold: true, color: COLORS.title, center: true });
  let info = `Patient: ${content.patientName} | Generated: ${formatTimestampForDisplay(content.generatedAt)}`;
  if (content.period) info += ` | Period: ${content.period}`;
  writer.line(info, { size: 9 });
  writer.space(8);

  if (sections.summary) {
    writer.section('Key Metrics');
    writer.table(metricsTable(content.metrics), [width * 0.38, width * 0.17, width * 0.28, width * 0.17], {
      labelColumns: [0, 2],
      fontSize: 9,
    });
  }

  if (sections.charts) {
    writeActivityCharts(writer, content);
  }

  if (sections.exercises) {
    writer.section('Exercise Breakdown');
    if (content.exercises.length > 0) {
      writer.table(
        [['Exercise', 'Count', '%'], ...content.exercises.map((e) => [e.name, String(e.count), `${e.percent}%`])],
        [width * 0.5, width * 0.2, width * 0.2],
        { header: true }
      );
    } else {
      writer.paragraph('No exercise types recorded.');
    }
    if (content.gestures.length > 0) {
      writer.paragraph(gestureSummary(content.gestures));
    }
  }

  if (sections.trends) {
    writer.newPage();
    writer.section('Trends & Assessment');
    if (content.trend) {
      writer.table(trendTable(content.trend), [width * 0.4, width * 0.2, width * 0.2, width * 0.2], { header: true });
    } else {
      writer.paragraph('Insufficient data for trends.');
    }
    if (sections.charts && content.repsSeries.length >= 2) {
      writer.lineChart(
        'Reps over Time',
        content.repsSeries.map((p) => p.reps),
        content.repsSeries.map((p) => p.timestamp.slice(0, 10)),
        COLORS.repsLine
      );
    }
    writer.section('Recommendations');
    for (const recommendation of content.recommendations) {
      writer.paragraph(`- ${recommendation}`);
    }
  }

  if (sections.details) {
    writer.newPage();
    writer.section('Session Details');
    const columnWidth = width / content.detailHeader.length;
    writer.table(
      [content.detailHeader, ...content.detailRows],
      content.detailHeader.map(() => columnWidth),
      { header: true }
    );
  }

  return doc.save();
}

/**
 * Build and render the rehabilitation report for the selected sessions.
 */
export async function generateRehabilitationReport(
  sessions: readonly ExerciseSession[],
  options: ReportOptions
): Promise<Uint8Array> {
  const content = buildReportContent(sessions, options);
  const bytes = await renderReportPdf(content);
  console.log(`[Report] Wrote ${bytes.length} byte report for ${sessions.length} session(s)`);
  return bytes;
}
