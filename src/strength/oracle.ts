import { zxcvbn, zxcvbnOptions } from '@zxcvbn-ts/core';
import * as zxcvbnCommonPackage from '@zxcvbn-ts/language-common';
import * as zxcvbnEnPackage from '@zxcvbn-ts/language-en';

export interface OracleVerdict {
  score: number; // 0-4
  suggestions: string[];
}

/** Anything that can rate a password on the 0-4 scale. */
export interface ScoringOracle {
  score(password: string): OracleVerdict;
}

let optionsLoaded = false;

function loadZxcvbnOptions(): void {
  if (optionsLoaded) return;
  zxcvbnOptions.setOptions({
    translations: zxcvbnEnPackage.translations,
    graphs: zxcvbnCommonPackage.adjacencyGraphs,
    dictionary: {
      ...zxcvbnCommonPackage.dictionary,
      ...zxcvbnEnPackage.dictionary,
    },
  });
  optionsLoaded = true;
}

export class ZxcvbnOracle implements ScoringOracle {
  constructor() {
    loadZxcvbnOptions();
  }

  score(password: string): OracleVerdict {
    const { score, feedback } = zxcvbn(password);
    return { score, suggestions: [...feedback.suggestions] };
  }
}
