// Public entry point

export * from './config';
export * from './constants';
export * from './errors';
export * from './formatters';

export * from './emg/types';
export * from './emg/schemas';
export * from './emg/phase-segmenter';
export * from './emg/channel-layout';
export * from './emg/time-base';
export * from './emg/session-loader';
export * from './emg/drawing-plan';
export * from './emg/chart-config';

export * from './export/mat-file';
export * from './export/export-bundle';
export * from './export/tabular-export';
export * from './export/array-export';
export * from './export/sessions-table-export';

export * from './db';
export * from './sessions/session-repository';
export * from './sessions/session-table';
export * from './sessions/session-statistics';

export * from './report/report-content';
export * from './report/report-pdf';

export type * from '../types/database';
