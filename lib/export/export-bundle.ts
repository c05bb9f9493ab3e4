// Export bundle: frozen snapshot of the sessions selected for export

import { EmptyBundleError, SerializationError } from '../errors';
import { coversTimeline } from '../emg/phase-segmenter';
import type { LoadedSession } from '../emg/types';

export interface ExportBundle {
  readonly sessions: readonly LoadedSession[];
  readonly createdAt: string;
}

export function createExportBundle(
  sessions: Iterable<LoadedSession>,
  createdAt: Date = new Date()
): ExportBundle {
  const list = [...sessions];
  if (list.length === 0) {
    throw new EmptyBundleError();
  }

  return Object.freeze({
    sessions: Object.freeze(list),
    createdAt: createdAt.toISOString(),
  });
}

/**
 * Re-check shape invariants before serializing. The loader already enforces
 * them, but a bundle can outlive the call that built it.
 */
export function validateExportBundle(bundle: ExportBundle): void {
  if (bundle.sessions.length === 0) {
    throw new EmptyBundleError();
  }

  for (const { session, channels, phases } of bundle.sessions) {
    if (channels.length !== session.channelCount) {
      throw new SerializationError(
        `Session ${session.id}: ${channels.length} channels, expected ${session.channelCount}`,
        session.id
      );
    }

    channels.forEach((channel, position) => {
      if (channel.channelIndex !== position) {
        throw new SerializationError(
          `Session ${session.id}: channel at position ${position} has index ${channel.channelIndex}`,
          session.id
        );
      }
      if (channel.samples.length !== session.sampleCount) {
        throw new SerializationError(
          `Session ${session.id}: channel ${channel.channelIndex} has ${channel.samples.length} samples, expected ${session.sampleCount}`,
          session.id
        );
      }
    });

    if (
      session.timeBase.kind === 'timestamps' &&
      session.timeBase.timestamps.length !== session.sampleCount
    ) {
      throw new SerializationError(
        `Session ${session.id}: ${session.timeBase.timestamps.length} timestamps for ${session.sampleCount} samples`,
        session.id
      );
    }

    if (phases.length > 0 && !coversTimeline(phases, session.sampleCount)) {
      throw new SerializationError(
        `Session ${session.id}: phase intervals do not cover all ${session.sampleCount} samples`,
        session.id
      );
    }
  }
}
