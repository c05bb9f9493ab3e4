/**
 * Centralized Configuration
 *
 * Provides validated configuration for the data source, query cache and EMG plots
 */

import { CACHE_TTL, EMG_CHANNEL_OFFSET, EMG_GAP_DETECTION_FACTOR } from './constants';
import type { StackDirection } from './emg/channel-layout';

export type DatabaseMode = 'supabase' | 'postgres';

export interface AppConfig {
  database: {
    mode: DatabaseMode;
    url?: string;
    supabaseUrl?: string;
    supabaseKey?: string;
  };
  cache: {
    patientsTtlSeconds: number;
    sessionsTtlSeconds: number;
    dataPointsTtlSeconds: number;
  };
  plot: {
    channelOffset: number;
    gapDetectionFactor: number;
    direction: StackDirection;
  };
  app: {
    title: string;
  };
}

type Env = Record<string, string | undefined>;

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined) return defaultValue;
  const num = parseFloat(value);
  return isNaN(num) ? defaultValue : num;
}

function parseDatabaseMode(value: string | undefined): DatabaseMode {
  return value === 'postgres' ? 'postgres' : 'supabase';
}

function parseDirection(value: string | undefined): StackDirection {
  return value?.toLowerCase() === 'down' ? -1 : 1;
}

export function getConfig(env: Env = process.env): AppConfig {
  return {
    database: {
      mode: parseDatabaseMode(env.DATABASE_MODE),
      url: env.DATABASE_URL,
      supabaseUrl: env.SUPABASE_URL,
      supabaseKey: env.SUPABASE_SECRET_KEY,
    },
    cache: {
      patientsTtlSeconds: parseNumber(env.PATIENT_CACHE_TTL_SECONDS, CACHE_TTL.patients),
      sessionsTtlSeconds: parseNumber(env.SESSION_CACHE_TTL_SECONDS, CACHE_TTL.sessions),
      dataPointsTtlSeconds: parseNumber(env.DATA_POINT_CACHE_TTL_SECONDS, CACHE_TTL.dataPoints),
    },
    plot: {
      channelOffset: parseNumber(env.EMG_CHANNEL_OFFSET, EMG_CHANNEL_OFFSET),
      gapDetectionFactor: parseNumber(env.EMG_GAP_DETECTION_FACTOR, EMG_GAP_DETECTION_FACTOR),
      direction: parseDirection(env.EMG_STACK_DIRECTION),
    },
    app: {
      title: env.APP_TITLE || 'Clinician Dashboard',
    },
  };
}

export function validateConfig(config: AppConfig = getConfig()): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (config.database.mode === 'supabase') {
    if (!config.database.supabaseUrl) {
      errors.push('SUPABASE_URL is required in supabase database mode');
    }
    if (!config.database.supabaseKey) {
      errors.push('SUPABASE_SECRET_KEY is required in supabase database mode');
    }
  }

  if (config.database.mode === 'postgres' && !config.database.url) {
    errors.push('DATABASE_URL is required in postgres database mode');
  }

  if (config.plot.channelOffset <= 0) {
    errors.push('EMG_CHANNEL_OFFSET must be positive');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
