import { MAX_SCORE, MIN_SCORE } from '../strength/const.js';
import { DEFAULT_LOG_LEVEL, LOG_LEVELS } from './const.js';

export type LogLevelName = typeof LOG_LEVELS[number];

export interface RawCliOptions {
  json?: boolean;
  tips?: boolean;
  minScore?: string;
  logLevel?: string;
}

export interface CheckSettings {
  json: boolean;
  minScore?: number;
  tips: boolean;
  logLevel: LogLevelName;
}

function isLogLevelName(value: string): value is LogLevelName {
  return LOG_LEVELS.some(level => level === value);
}

export function parseMinScore(raw: string): number {
  const trimmed = raw.trim();
  const n = /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : NaN;
  if (isNaN(n) || n < MIN_SCORE || n > MAX_SCORE) {
    throw new Error(`Invalid --min-score "${raw}" (expected an integer ${MIN_SCORE}..${MAX_SCORE})`);
  }
  return n;
}

export function parseLogLevel(raw: string): LogLevelName {
  const level = raw.trim().toLowerCase();
  if (!isLogLevelName(level)) {
    throw new Error(`Invalid --log-level "${raw}" (expected one of ${LOG_LEVELS.join(', ')})`);
  }
  return level;
}

export function parseSettings(opts: RawCliOptions): CheckSettings {
  return {
    json: !!opts.json,
    tips: opts.tips ?? true,
    minScore: opts.minScore === undefined ? undefined : parseMinScore(opts.minScore),
    logLevel: parseLogLevel(opts.logLevel ?? DEFAULT_LOG_LEVEL),
  };
}
