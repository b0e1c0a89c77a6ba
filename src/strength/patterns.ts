import { COMMON_PASSWORDS, KEYBOARD_RUNS, MIN_RUN_LENGTH, MIN_SEQUENCE_LENGTH } from './const.js';

export type PatternKind = 'common' | 'repeat' | 'numeric-sequence' | 'letter-sequence' | 'keyboard-sequence';

const KEYBOARD_SEQUENCES: readonly string[] = [
  ...KEYBOARD_RUNS,
  ...KEYBOARD_RUNS.map(run => [...run].reverse().join('')),
];

const REPEAT_RE = new RegExp(`([\\s\\S])\\1{${MIN_RUN_LENGTH - 1},}`, 'u');

const CODE_0 = 48;
const CODE_9 = 57;
const CODE_A = 97;
const CODE_Z = 122;

export function isCommonPassword(pw: string): boolean {
  return COMMON_PASSWORDS.has(pw.toLowerCase());
}

export function hasRepeatedRun(pw: string): boolean {
  return REPEAT_RE.test(pw);
}

// Ascending or descending by exactly one code unit, every code unit within [lo, hi].
function hasStepRun(s: string, lo: number, hi: number, minLength: number): boolean {
  for (const step of [1, -1]) {
    let run = 1;
    for (let i = 1; i < s.length; i++) {
      const prev = s.charCodeAt(i - 1);
      const cur = s.charCodeAt(i);
      const inRange = prev >= lo && prev <= hi && cur >= lo && cur <= hi;
      run = inRange && cur - prev === step ? run + 1 : 1;
      if (run >= minLength) return true;
    }
  }
  return false;
}

export function hasNumericSequence(pw: string): boolean {
  return hasStepRun(pw, CODE_0, CODE_9, MIN_SEQUENCE_LENGTH);
}

export function hasLetterSequence(pw: string): boolean {
  return hasStepRun(pw.toLowerCase(), CODE_A, CODE_Z, MIN_SEQUENCE_LENGTH);
}

export function hasKeyboardSequence(pw: string): boolean {
  const lower = pw.toLowerCase();
  return KEYBOARD_SEQUENCES.some(seq => lower.includes(seq));
}

/**
 * Runs every detector and returns the kinds found, in a fixed order:
 * common, repeat, numeric-sequence, letter-sequence, keyboard-sequence.
 */
export function detectPatterns(pw: string): PatternKind[] {
  const found: PatternKind[] = [];
  if (isCommonPassword(pw)) found.push('common');
  if (hasRepeatedRun(pw)) found.push('repeat');
  if (hasNumericSequence(pw)) found.push('numeric-sequence');
  if (hasLetterSequence(pw)) found.push('letter-sequence');
  if (hasKeyboardSequence(pw)) found.push('keyboard-sequence');
  return found;
}
