import _ from 'lodash';
import { DEFAULT_GENERATED_LENGTH, GENERATOR_ALPHABET, MAX_GENERATED_LENGTH } from './const.js';

// Uses Math.random through lodash: fine for suggestions, not for secrets that need a CSPRNG.
export function generatePassword(length: number = DEFAULT_GENERATED_LENGTH): string {
  if (!Number.isInteger(length) || length < 0 || length > MAX_GENERATED_LENGTH) {
    throw new RangeError(`Password length must be an integer from 0 to ${MAX_GENERATED_LENGTH}, got ${length}`);
  }
  return _.times(length, () => GENERATOR_ALPHABET[_.random(GENERATOR_ALPHABET.length - 1)]).join('');
}
