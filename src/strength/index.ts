export * from './const.js';
export * from './errors.js';
export { WordlistStore } from './wordlist.js';
export { LruCache } from './lru-cache.js';
export { ZxcvbnOracle, type OracleVerdict, type ScoringOracle } from './oracle.js';
export { missingCharacterClasses, passwordLength, type CharacterClass } from './complexity.js';
export {
  StrengthEvaluator,
  isScore,
  labelForScore,
  type EvaluatorOptions,
  type Score,
  type ScoreLabel,
  type StrengthLabel,
  type StrengthResult,
} from './evaluator.js';
export { suggestImprovements, formatSuggestions } from './suggestions.js';
export { generatePassword } from './generator.js';
