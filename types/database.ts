// Database Schema Types for the remote data store

export type AccountRole = 'clinician' | 'admin' | 'patient';

export interface PatientProfile {
  id: string;
  name: string;
}

export interface ExerciseSession {
  id: string;
  patient_profile_id?: string;
  start_time: string | null;
  exercise_type: string | null;
  exercise_gesture: string | null;
  duration_seconds: number | null;
  stimulation_mode: string | null;
  reps_completed: number | null;
}
