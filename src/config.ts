/**
 * Runtime configuration, read from the environment (and .env when present)
 */

import { config as loadDotenv } from 'dotenv';

loadDotenv();

export const DEFAULT_BASE_URL = 'https://apps.es.vt.edu/ssb/HZSKVTSC.P_ProcRequest';
export const DEFAULT_TIMEOUT_MS = 15_000;
export const DEFAULT_CONCURRENCY = 4;

export interface TimetableConfig {
  baseUrl: string;
  timeoutMs: number;
  concurrency: number;
  debug: boolean;
  saveHtml: boolean;
}

function positiveInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): TimetableConfig {
  return {
    baseUrl: env.VTT_BASE_URL?.trim() || DEFAULT_BASE_URL,
    timeoutMs: positiveInt(env.VTT_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
    concurrency: positiveInt(env.VTT_CONCURRENCY, DEFAULT_CONCURRENCY),
    debug: env.VTT_DEBUG === 'true',
    saveHtml: env.VTT_SAVE_HTML === 'true',
  };
}
