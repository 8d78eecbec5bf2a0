import { InvalidArgumentError } from 'commander';
import { DEFAULT_GENERATED_LENGTH, MAX_GENERATED_LENGTH } from '../strength/index.js';
import { INVALID_LENGTH_MESSAGE } from './const.js';

/** A length from 1 to MAX_GENERATED_LENGTH, or undefined. */
export function parsePositiveInt(raw: string): number | undefined {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) return undefined;
  const n = parseInt(trimmed, 10);
  return n > 0 && n <= MAX_GENERATED_LENGTH ? n : undefined;
}

/** commander argument parser for `--length`. */
export function parseLengthOption(value: string): number {
  const length = parsePositiveInt(value);
  if (length === undefined) throw new InvalidArgumentError(INVALID_LENGTH_MESSAGE);
  return length;
}

/**
 * Reads a length typed at the interactive prompt. Blank means the default;
 * anything else that is not a length from 1 to MAX_GENERATED_LENGTH gives undefined.
 */
export function parseLengthInput(raw: string): number | undefined {
  if (raw.trim() === '') return DEFAULT_GENERATED_LENGTH;
  return parsePositiveInt(raw);
}
