export const LOWER_ALPHABET_SIZE = 26;
export const UPPER_ALPHABET_SIZE = 26;
export const DIGIT_ALPHABET_SIZE = 10;
export const SYMBOL_ALPHABET_SIZE = 32;

export const MIN_SCORE = 0;
export const MAX_SCORE = 10;

// [minimum entropy bits, base score], highest first
export const ENTROPY_BASE_SCORES = [
  [80, 9],
  [60, 7],
  [36, 5],
  [28, 3],
  [0, 1],
] as const;

export const PATTERN_PENALTY = 2;
export const COMPLEXITY_BONUS = 1;
export const COMPLEXITY_BONUS_MIN_LENGTH = 12;
export const COMMON_PASSWORD_SCORE_CAP = 1;
export const SHORT_PASSWORD_LENGTH = 8;
export const LOW_ENTROPY_BITS = 40;
export const STRONG_SCORE = 7;

export const MIN_RUN_LENGTH = 3;
export const MIN_SEQUENCE_LENGTH = 4;

export const KEYBOARD_RUNS = [
  'qwer', 'wert', 'erty', 'rtyu', 'tyui', 'yuio', 'uiop',
  'asdf', 'sdfg', 'dfgh', 'fghj', 'ghjk', 'hjkl',
  'zxcv', 'xcvb', 'cvbn', 'vbnm',
] as const;

export const COMMON_PASSWORDS: ReadonlySet<string> = new Set([
  'password', '123456', '123456789', '12345', 'qwerty', 'abc123', '111111', '123123',
  'letmein', 'admin', 'welcome', 'iloveyou', 'monkey', 'dragon', 'football', 'baseball',
  'qwertyuiop', '1234', '1q2w3e4r', 'passw0rd', 'password1', '000000',
]);

export const NOTES = {
  empty: 'No password provided.',
  common: 'Common password (easily guessed).',
  repeat: 'Repeated characters (e.g. aaa, 111).',
  numericSequence: 'Numeric sequence (e.g. 1234, 4321).',
  letterSequence: 'Alphabetical sequence (e.g. abcd).',
  keyboardSequence: 'Keyboard sequence (e.g. qwer, asdf).',
  tooShort: `Too short (< ${SHORT_PASSWORD_LENGTH} characters).`,
  lowEntropy: 'Low entropy. Consider a longer password with more variety.',
  lowVariety: 'Use a mix of lowercase, uppercase, digits, and symbols.',
  tip: 'Use a longer random phrase.',
  strong: 'Looks strong. No common patterns detected.',
} as const;
