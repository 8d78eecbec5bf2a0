export type WordlistErrorKind = 'NotFound' | 'LoadFailure';

export class WordlistError extends Error {
  readonly kind: WordlistErrorKind;
  readonly path: string;

  constructor(kind: WordlistErrorKind, path: string, cause?: unknown) {
    const message = kind === 'NotFound'
      ? `Wordlist '${path}' not found.`
      : `Error loading wordlist from '${path}': ${describeCause(cause)}`;
    super(message, { cause });
    this.name = 'WordlistError';
    this.kind = kind;
    this.path = path;
  }
}

export class ScoringError extends Error {
  readonly kind = 'ScoringFailure';

  constructor(reason: string, cause?: unknown) {
    super(`Scoring oracle failed: ${reason}`, { cause });
    this.name = 'ScoringError';
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
