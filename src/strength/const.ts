export const MIN_PASSWORD_LENGTH = 12;
export const EVALUATION_CACHE_SIZE = 1000;
export const DEFAULT_GENERATED_LENGTH = 16;
export const MAX_GENERATED_LENGTH = 4096;

export const UTF8 = 'utf-8';

export const SCORE_LABELS = {
  0: 'Very Weak',
  1: 'Weak',
  2: 'Moderate',
  3: 'Strong',
  4: 'Very Strong',
} as const;

export const PASSING_SCORE = 3;
export const MAX_SCORE = 4;

// Characters that satisfy the "special character" requirement.
export const SPECIAL_CHARACTERS = '!@#$%^&*(),.?":{}|<>';

export const ASCII_LETTERS = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ';
export const DIGITS = '0123456789';
export const ASCII_PUNCTUATION = '!"#$%&\'()*+,-./:;<=>?@[\\]^_`{|}~';
export const GENERATOR_ALPHABET = ASCII_LETTERS + DIGITS + ASCII_PUNCTUATION;
