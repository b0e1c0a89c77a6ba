import { DIGIT_ALPHABET_SIZE, LOWER_ALPHABET_SIZE, SYMBOL_ALPHABET_SIZE, UPPER_ALPHABET_SIZE } from './const.js';

export interface CharsetProfile {
  hasLower: boolean;
  hasUpper: boolean;
  hasDigit: boolean;
  hasSymbol: boolean;
}

export function profileCharset(pw: string): CharsetProfile {
  const profile: CharsetProfile = { hasLower: false, hasUpper: false, hasDigit: false, hasSymbol: false };
  for (const ch of pw) {
    if (ch >= 'a' && ch <= 'z') profile.hasLower = true;
    else if (ch >= 'A' && ch <= 'Z') profile.hasUpper = true;
    else if (ch >= '0' && ch <= '9') profile.hasDigit = true;
    else profile.hasSymbol = true;
  }
  return profile;
}

/** Additive alphabet estimate: all four categories give 94, the printable ASCII set. */
export function charsetSize(profile: CharsetProfile): number {
  let size = 0;
  if (profile.hasLower) size += LOWER_ALPHABET_SIZE;
  if (profile.hasUpper) size += UPPER_ALPHABET_SIZE;
  if (profile.hasDigit) size += DIGIT_ALPHABET_SIZE;
  if (profile.hasSymbol) size += SYMBOL_ALPHABET_SIZE;
  return Math.max(size, 1);
}

export function categoryCount(profile: CharsetProfile): number {
  return [profile.hasLower, profile.hasUpper, profile.hasDigit, profile.hasSymbol].filter(Boolean).length;
}
