import { EVALUATION_CACHE_SIZE, MAX_SCORE, MIN_PASSWORD_LENGTH, PASSING_SCORE, SCORE_LABELS } from './const.js';
import { isTooShort, missingCharacterClasses, type CharacterClass } from './complexity.js';
import { ScoringError, describeCause } from './errors.js';
import { LruCache } from './lru-cache.js';
import { ZxcvbnOracle, type OracleVerdict, type ScoringOracle } from './oracle.js';
import { WordlistStore } from './wordlist.js';

export type Score = 0 | 1 | 2 | 3 | 4;
export type ScoreLabel = (typeof SCORE_LABELS)[Score];
export type StrengthLabel = 'Too short' | 'Banned' | ScoreLabel;

export interface StrengthResult {
  readonly strength: StrengthLabel;
  readonly score: Score;
  readonly message: string;
}

export interface EvaluatorOptions {
  weakWordlistPath?: string;
  bannedWordlistPath?: string;
  wordlists?: WordlistStore;
  oracle?: ScoringOracle;
  cacheSize?: number;
}

const CLASS_NAMES: Record<CharacterClass, string> = {
  uppercase: 'uppercase letter',
  lowercase: 'lowercase letter',
  digit: 'number',
  special: 'special character',
};

export const TOO_SHORT_MESSAGE = `Password should be at least ${MIN_PASSWORD_LENGTH} characters long.`;
export const WEAK_LIST_MESSAGE = 'Password is commonly used and easily guessable.';
export const BANNED_LIST_MESSAGE = 'This password is not allowed, as it is commonly found in data leaks.';

export function isScore(value: number): value is Score {
  return Number.isInteger(value) && value >= 0 && value <= MAX_SCORE;
}

export function labelForScore(score: Score): ScoreLabel {
  return SCORE_LABELS[score];
}

function result(strength: StrengthLabel, score: Score, message: string): StrengthResult {
  return Object.freeze({ strength, score, message });
}

/**
 * Rates passwords through an ordered pipeline: length gate, weak list, banned list,
 * oracle score, then the character-class override. Results are memoized per exact
 * password, so a wordlist changed after a password was seen is not reflected for it
 * until {@link clearCache} is called.
 */
export class StrengthEvaluator {
  private readonly wordlists: WordlistStore;
  private readonly oracle: ScoringOracle;
  private readonly cache: LruCache<string, StrengthResult>;
  private readonly weakWordlistPath?: string;
  private readonly bannedWordlistPath?: string;

  constructor(opts: EvaluatorOptions = {}) {
    this.wordlists = opts.wordlists ?? new WordlistStore();
    this.oracle = opts.oracle ?? new ZxcvbnOracle();
    this.cache = new LruCache(opts.cacheSize ?? EVALUATION_CACHE_SIZE);
    this.weakWordlistPath = opts.weakWordlistPath || undefined;
    this.bannedWordlistPath = opts.bannedWordlistPath || undefined;

    // load eagerly so a bad path fails here rather than on the first check
    if (this.weakWordlistPath) this.wordlists.load(this.weakWordlistPath);
    if (this.bannedWordlistPath) this.wordlists.load(this.bannedWordlistPath);
  }

  evaluate(password: string): StrengthResult {
    const cached = this.cache.get(password);
    if (cached) return cached;

    const evaluated = this.runPipeline(password);
    this.cache.set(password, evaluated);
    return evaluated;
  }

  clearCache(): void {
    this.cache.clear();
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  private runPipeline(password: string): StrengthResult {
    if (isTooShort(password)) {
      return result('Too short', 0, TOO_SHORT_MESSAGE);
    }
    if (this.weakWordlistPath && this.wordlists.contains(this.weakWordlistPath, password)) {
      return result('Weak', 0, WEAK_LIST_MESSAGE);
    }
    if (this.bannedWordlistPath && this.wordlists.contains(this.bannedWordlistPath, password)) {
      return result('Banned', 0, BANNED_LIST_MESSAGE);
    }

    const verdict = this.consultOracle(password);
    const score = verdict.score;
    const label = labelForScore(score);

    const missing = missingCharacterClasses(password);
    if (missing.length > 0) {
      const names = missing.map(c => CLASS_NAMES[c]).join(', ');
      return result('Weak', score, `Password lacks complexity. Missing: ${names}.`);
    }

    if (score >= PASSING_SCORE) {
      return result(label, score, `Password meets all the requirements. Score: ${score}/${MAX_SCORE}`);
    }
    return result(label, score, `Password is ${label.toLowerCase()}. Suggestions: ${verdict.suggestions.join(', ')}`);
  }

  private consultOracle(password: string): OracleVerdict & { score: Score } {
    let verdict: OracleVerdict;
    try {
      verdict = this.oracle.score(password);
    } catch (e) {
      throw new ScoringError(describeCause(e), e);
    }
    const { score, suggestions } = verdict;
    if (!isScore(score)) {
      throw new ScoringError(`score ${score} is outside 0-${MAX_SCORE}`);
    }
    return { score, suggestions };
  }
}
