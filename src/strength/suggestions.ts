import { MIN_PASSWORD_LENGTH } from './const.js';
import { isTooShort, missingCharacterClasses, type CharacterClass } from './complexity.js';
import type { StrengthEvaluator } from './evaluator.js';

const CLASS_ADVICE: Record<CharacterClass, string> = {
  uppercase: 'Add uppercase letters',
  lowercase: 'Add lowercase letters',
  digit: 'Add numbers',
  special: 'Add special characters',
};

const SUGGESTIONS_MARKER = 'Suggestions: ';
export const SUGGESTIONS_HEADER = 'Suggested improvements:';

export function structuralAdvice(password: string): string[] {
  const advice: string[] = [];
  if (isTooShort(password)) advice.push(`Increase length to at least ${MIN_PASSWORD_LENGTH} characters`);
  for (const missing of missingCharacterClasses(password)) advice.push(CLASS_ADVICE[missing]);
  return advice;
}

// Whatever follows the last "Suggestions: " in the message; the whole message if there is none.
export function suggestionsFromMessage(message: string): string[] {
  const at = message.lastIndexOf(SUGGESTIONS_MARKER);
  const tail = at === -1 ? message : message.slice(at + SUGGESTIONS_MARKER.length);
  return tail.split(', ').filter(s => s.length > 0);
}

export function formatSuggestions(suggestions: string[]): string {
  return `${SUGGESTIONS_HEADER}\n\n` + suggestions.map(s => `- ${s}`).join('\n');
}

export function suggestImprovements(evaluator: StrengthEvaluator, password: string): string {
  const { message } = evaluator.evaluate(password);
  const advice = structuralAdvice(password);
  return formatSuggestions(advice.length > 0 ? advice : suggestionsFromMessage(message));
}
