/**
 * Pipeline Errors
 *
 * Every stage fails with a named error so the calling UI can show a precise
 * message. `code` is stable and safe to switch on.
 */

export type PipelineErrorCode =
  | 'MALFORMED_RECORD'
  | 'EMPTY_SELECTION'
  | 'UNKNOWN_PHASE_LABEL'
  | 'NON_CONTIGUOUS_CHANNELS'
  | 'EMPTY_BUNDLE'
  | 'SERIALIZATION_ERROR'
  | 'MAT_FILE_ERROR'
  | 'DATA_SOURCE_ERROR';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class MalformedRecordError extends PipelineError {
  readonly sessionId?: string;
  readonly issues: string[];

  constructor(message: string, options: { sessionId?: string; issues?: string[] } = {}) {
    super('MALFORMED_RECORD', message);
    this.sessionId = options.sessionId;
    this.issues = options.issues ?? [];
  }
}

export class EmptySelectionError extends PipelineError {
  constructor(message = 'No sessions selected') {
    super('EMPTY_SELECTION', message);
  }
}

export class UnknownPhaseLabelError extends PipelineError {
  readonly marker: unknown;
  readonly sessionId?: string;
  readonly sampleIndex?: number;

  constructor(marker: unknown, options: { sessionId?: string; sampleIndex?: number } = {}) {
    const where = options.sessionId !== undefined ? `session ${options.sessionId} has` : 'found';
    const at = options.sampleIndex !== undefined ? ` at sample ${options.sampleIndex}` : '';
    super(
      'UNKNOWN_PHASE_LABEL',
      `${where} a phase marker outside {0, 1, attempt, rest}${at}: ${JSON.stringify(marker)}`
    );
    this.marker = marker;
    this.sessionId = options.sessionId;
    this.sampleIndex = options.sampleIndex;
  }
}

export class NonContiguousChannelsError extends PipelineError {
  readonly channelIndices: number[];

  constructor(channelIndices: number[]) {
    super(
      'NON_CONTIGUOUS_CHANNELS',
      `Channel indices must run from 0 without gaps or repeats, got [${channelIndices.join(', ')}]`
    );
    this.channelIndices = channelIndices;
  }
}

export class EmptyBundleError extends PipelineError {
  constructor() {
    super('EMPTY_BUNDLE', 'No sessions selected for export');
  }
}

export class SerializationError extends PipelineError {
  readonly sessionId?: string;

  constructor(message: string, sessionId?: string) {
    super('SERIALIZATION_ERROR', message);
    this.sessionId = sessionId;
  }
}

export class MatFileError extends PipelineError {
  constructor(message: string) {
    super('MAT_FILE_ERROR', message);
  }
}

export class DataSourceError extends PipelineError {
  readonly table: string;

  constructor(table: string, cause: Error) {
    super('DATA_SOURCE_ERROR', `Query on ${table} failed: ${cause.message}`);
    this.table = table;
    this.cause = cause;
  }
}
