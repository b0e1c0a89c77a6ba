import log from 'loglevel';
import { categoryCount, charsetSize, profileCharset, type CharsetProfile } from './charset.js';
import { detectPatterns, type PatternKind } from './patterns.js';
import {
  COMMON_PASSWORD_SCORE_CAP,
  COMPLEXITY_BONUS,
  COMPLEXITY_BONUS_MIN_LENGTH,
  ENTROPY_BASE_SCORES,
  LOW_ENTROPY_BITS,
  MAX_SCORE,
  MIN_SCORE,
  NOTES,
  PATTERN_PENALTY,
  SHORT_PASSWORD_LENGTH,
  STRONG_SCORE,
} from './const.js';

export interface PasswordAnalysis {
  readonly score: number;
  readonly entropyBits: number;
  readonly length: number;
  readonly notes: readonly string[];
  readonly patterns: readonly PatternKind[];
  readonly charset: Readonly<CharsetProfile>;
}

export type ScoreTier = 'Very Weak' | 'Weak' | 'Fair' | 'Strong' | 'Very Strong';

const PATTERN_NOTES: Record<PatternKind, string> = {
  'common': NOTES.common,
  'repeat': NOTES.repeat,
  'numeric-sequence': NOTES.numericSequence,
  'letter-sequence': NOTES.letterSequence,
  'keyboard-sequence': NOTES.keyboardSequence,
};

export class WeakPasswordError extends Error {
  readonly score: number;
  readonly minScore: number;
  readonly notes: readonly string[];

  constructor(analysis: PasswordAnalysis, minScore: number) {
    super(`Password too weak (score ${analysis.score}/${MAX_SCORE}, required ${minScore}). ${analysis.notes.join(' ')}`);
    this.name = 'WeakPasswordError';
    this.score = analysis.score;
    this.minScore = minScore;
    this.notes = analysis.notes;
  }
}

function clampScore(score: number): number {
  return Math.max(MIN_SCORE, Math.min(MAX_SCORE, score));
}

export function entropyBits(length: number, profile: CharsetProfile): number {
  if (length === 0) return 0;
  return length * Math.log2(charsetSize(profile));
}

export function baseScore(bits: number): number {
  for (const [minBits, score] of ENTROPY_BASE_SCORES) {
    if (bits >= minBits) return score;
  }
  return MIN_SCORE;
}

export function scoreTier(score: number): ScoreTier {
  if (score >= 9) return 'Very Strong';
  if (score >= 7) return 'Strong';
  if (score >= 5) return 'Fair';
  if (score >= 3) return 'Weak';
  return 'Very Weak';
}

export function analyze(pw: string): PasswordAnalysis {
  const charset = Object.freeze(profileCharset(pw));
  if (!pw) {
    return Object.freeze({
      score: MIN_SCORE,
      entropyBits: 0,
      length: 0,
      notes: Object.freeze([NOTES.empty]),
      patterns: Object.freeze([]),
      charset,
    });
  }

  const length = Array.from(pw).length;
  const bits = entropyBits(length, charset);
  const patterns = detectPatterns(pw);
  log.debug('charset', charset, 'patterns', patterns);

  const penalized = patterns.filter(p => p !== 'common').length;
  let score = clampScore(baseScore(bits) - penalized * PATTERN_PENALTY);
  if (length >= COMPLEXITY_BONUS_MIN_LENGTH && categoryCount(charset) === 4) score += COMPLEXITY_BONUS;
  score = clampScore(score);
  if (patterns.includes('common')) score = Math.min(score, COMMON_PASSWORD_SCORE_CAP);

  const notes: string[] = [];
  if (patterns.length === 0 && score >= STRONG_SCORE) {
    notes.push(NOTES.strong);
  } else {
    notes.push(...patterns.map(p => PATTERN_NOTES[p]));
    if (length < SHORT_PASSWORD_LENGTH) notes.push(NOTES.tooShort);
    if (bits < LOW_ENTROPY_BITS) notes.push(NOTES.lowEntropy);
    if (categoryCount(charset) <= 1) notes.push(NOTES.lowVariety);
    notes.push(NOTES.tip);
  }

  return Object.freeze({
    score,
    entropyBits: bits,
    length,
    notes: Object.freeze(notes),
    patterns: Object.freeze(patterns),
    charset,
  });
}

export function assertStrongPassword(pw: string, minScore: number): PasswordAnalysis {
  const analysis = analyze(pw);
  if (analysis.score < minScore) throw new WeakPasswordError(analysis, minScore);
  return analysis;
}
