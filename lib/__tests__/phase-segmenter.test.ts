import { describe, it, expect } from 'vitest';
import {
  coerceUnknownMarkers,
  coversTimeline,
  expandIntervals,
  phaseAt,
  resolvePhaseLabel,
  segmentPhases,
} from '../emg/phase-segmenter';
import { UnknownPhaseLabelError } from '../errors';

describe('Phase Segmenter', () => {
  describe('resolvePhaseLabel', () => {
    it('should map numeric codes', () => {
      expect(resolvePhaseLabel(0)).toBe('rest');
      expect(resolvePhaseLabel(1)).toBe('attempt');
      expect(resolvePhaseLabel(2)).toBeUndefined();
    });

    it('should match labels ignoring case and whitespace', () => {
      expect(resolvePhaseLabel(' Attempt ')).toBe('attempt');
      expect(resolvePhaseLabel('REST')).toBe('rest');
      expect(resolvePhaseLabel('pause')).toBeUndefined();
    });
  });

  describe('segmentPhases', () => {
    it('should split markers into rest and attempt runs', () => {
      expect(segmentPhases([0, 0, 1, 1, 1, 0], 's1')).toEqual([
        { sessionId: 's1', label: 'rest', startOffset: 0, endOffset: 2 },
        { sessionId: 's1', label: 'attempt', startOffset: 2, endOffset: 5 },
        { sessionId: 's1', label: 'rest', startOffset: 5, endOffset: 6 },
      ]);
    });

    it('should treat string and numeric markers alike', () => {
      expect(segmentPhases(['rest', 0, 'attempt', 1], 's1')).toEqual([
        { sessionId: 's1', label: 'rest', startOffset: 0, endOffset: 2 },
        { sessionId: 's1', label: 'attempt', startOffset: 2, endOffset: 4 },
      ]);
    });

    it('should return one interval for a constant sequence', () => {
      expect(segmentPhases([1, 1, 1], 's1')).toEqual([
        { sessionId: 's1', label: 'attempt', startOffset: 0, endOffset: 3 },
      ]);
    });

    it('should return no intervals for no markers', () => {
      expect(segmentPhases([], 's1')).toEqual([]);
    });

    it('should partition the whole timeline', () => {
      const markers = [1, 0, 0, 1, 0, 1, 1];
      const intervals = segmentPhases(markers, 's1');
      expect(coversTimeline(intervals, markers.length)).toBe(true);
      expect(expandIntervals(intervals)).toEqual([
        'attempt', 'rest', 'rest', 'attempt', 'rest', 'attempt', 'attempt',
      ]);
    });

    it('should reject an unknown marker with its position', () => {
      expect(() => segmentPhases([0, 1, 2], '14')).toThrow(UnknownPhaseLabelError);
      expect(() => segmentPhases([0, 1, 2], '14')).toThrow(
        'session 14 has a phase marker outside {0, 1, attempt, rest} at sample 2: 2'
      );
    });

    it('should carry the session, sample and marker on the error', () => {
      try {
        segmentPhases(['rest', 'warmup'], 's9');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(UnknownPhaseLabelError);
        if (error instanceof UnknownPhaseLabelError) {
          expect(error.sessionId).toBe('s9');
          expect(error.sampleIndex).toBe(1);
          expect(error.marker).toBe('warmup');
          expect(error.code).toBe('UNKNOWN_PHASE_LABEL');
        }
      }
    });
  });

  describe('coerceUnknownMarkers', () => {
    it('should replace only unrecognised markers', () => {
      expect(coerceUnknownMarkers([0, 2, 'attempt', 'x'], 'rest')).toEqual([0, 'rest', 'attempt', 'rest']);
    });
  });

  describe('phaseAt', () => {
    const intervals = segmentPhases([0, 0, 1, 1, 1, 0], 's1');

    it('should find the label covering a sample', () => {
      expect(phaseAt(intervals, 0)).toBe('rest');
      expect(phaseAt(intervals, 2)).toBe('attempt');
      expect(phaseAt(intervals, 4)).toBe('attempt');
      expect(phaseAt(intervals, 5)).toBe('rest');
    });

    it('should return undefined past the end', () => {
      expect(phaseAt(intervals, 6)).toBeUndefined();
    });
  });

  describe('coversTimeline', () => {
    it('should reject gaps and short coverage', () => {
      expect(
        coversTimeline(
          [
            { sessionId: 's', label: 'rest', startOffset: 0, endOffset: 2 },
            { sessionId: 's', label: 'attempt', startOffset: 3, endOffset: 5 },
          ],
          5
        )
      ).toBe(false);
      expect(coversTimeline([{ sessionId: 's', label: 'rest', startOffset: 0, endOffset: 2 }], 3)).toBe(false);
    });
  });
});
