import { MIN_PASSWORD_LENGTH, SPECIAL_CHARACTERS } from './const.js';

export type CharacterClass = 'uppercase' | 'lowercase' | 'digit' | 'special';

interface ClassRule {
  name: CharacterClass;
  present: (password: string) => boolean;
}

// Order matters: it is the order missing classes are reported in.
const CLASS_RULES: readonly ClassRule[] = [
  { name: 'uppercase', present: pw => /[A-Z]/.test(pw) },
  { name: 'lowercase', present: pw => /[a-z]/.test(pw) },
  { name: 'digit', present: pw => /\p{Nd}/u.test(pw) },
  { name: 'special', present: pw => [...pw].some(c => SPECIAL_CHARACTERS.includes(c)) },
];

export function missingCharacterClasses(password: string): CharacterClass[] {
  return CLASS_RULES.filter(rule => !rule.present(password)).map(rule => rule.name);
}

/** Length in code points, so an emoji counts once. */
export function passwordLength(password: string): number {
  return [...password].length;
}

export function isTooShort(password: string): boolean {
  return passwordLength(password) < MIN_PASSWORD_LENGTH;
}
