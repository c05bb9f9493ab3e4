// Application Constants

// Phase labels
export const PHASE_LABELS = ['attempt', 'rest'] as const;

// Numeric phase codes as stored by the recording app (0 = rest, 1 = attempt)
export const PHASE_CODES = {
  rest: 0,
  attempt: 1,
} as const;

// Phase shading palette
export const PHASE_COLORS = {
  attempt: '#ff6b6b',
  rest: '#6ba4ff',
} as const;

export const PHASE_SHADING_ALPHA = 0.25;

// EMG plot layout
export const EMG_CHANNEL_OFFSET = 2000; // vertical offset between channels
export const EMG_GAP_DETECTION_FACTOR = 5.0;
export const EMG_LINE_WIDTH = 0.8;
export const EMG_LINE_COLORS = [
  '#1f77b4', '#ff7f0e', '#2ca02c', '#d62728',
  '#9467bd', '#8c564b', '#e377c2', '#7f7f7f',
  '#bcbd22', '#17becf',
];

// Tabular export
export const TABULAR_EXPORT_COLUMNS = [
  'session_id',
  'channel_index',
  'sample_index',
  'timestamp',
  'amplitude',
  'phase_label',
] as const;

// MAT-file variable names
export const MAT_TYPE_EMG = 'emg';
export const MAT_TYPE_SESSIONS_TABLE = 'sessions_table';

export const SESSIONS_TABLE_FIELDS = [
  'session_id',
  'time',
  'duration_seconds',
  'exercise_type',
  'exercise_gesture',
  'stimulation_mode',
  'reps_completed',
] as const;

export type ExportKind = 'sessions' | 'sessions_table' | 'emg';

export const EXPORT_FILE_SUFFIXES: Record<ExportKind, string> = {
  sessions: '_sessions.csv',
  sessions_table: '_sessions_table.mat',
  emg: '_emg.mat',
};

// Rehabilitation report
export const REPORT_MAX_BREAKDOWN_ROWS = 6;
export const REPORT_FILENAME_TIMESTAMP = 'YYYYMMDD_HHmmss';

// Timestamp display formats
export const TIMESTAMP_DISPLAY_FORMAT = 'YYYY-MM-DD HH:mm:ss';
export const TIMESTAMP_DISPLAY_FORMAT_SHORT = 'MM/DD HH:mm';

// Query cache lifetimes
export const CACHE_TTL = {
  patients: 300,
  sessions: 60,
  dataPoints: 60,
};

// Database tables
export const TABLES = {
  patients: 'patient_profiles',
  patientAccess: 'patient_profile_access',
  sessions: 'exercise_sessions',
  dataPoints: 'exercise_data_points',
} as const;
