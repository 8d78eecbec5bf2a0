import type log from 'loglevel';
import {
  DEFAULT_GENERATED_LENGTH,
  generatePassword,
  suggestImprovements,
  type StrengthEvaluator,
  type StrengthResult,
} from '../strength/index.js';
import { NO_RESULTS_MESSAGE } from './const.js';
import { exportResults, type CheckRecord } from './export.js';
import { checkerLogger } from './logging.js';

export interface CheckReport {
  password: string;
  result: StrengthResult;
  suggestions: string;
}

/**
 * Command handlers shared by the one-shot commands and the interactive loop.
 * Keeps a record of every check so the run can be exported.
 */
export class CheckerSession {
  private readonly evaluator: StrengthEvaluator;
  private readonly logger: log.Logger;
  private readonly records: CheckRecord[] = [];

  constructor(evaluator: StrengthEvaluator, logger: log.Logger = checkerLogger) {
    this.evaluator = evaluator;
    this.logger = logger;
  }

  check(password: string): CheckReport {
    const result = this.evaluator.evaluate(password);
    const suggestions = suggestImprovements(this.evaluator, password);
    this.records.push({ password, strength: result.strength, message: result.message });
    this.logger.info(`Password checked: ${result.strength}`);
    return { password, result, suggestions };
  }

  generate(length: number = DEFAULT_GENERATED_LENGTH): CheckReport {
    return this.check(generatePassword(length));
  }

  get results(): readonly CheckRecord[] {
    return this.records;
  }

  async exportResults(path: string): Promise<number> {
    if (this.records.length === 0) throw new Error(NO_RESULTS_MESSAGE);
    await exportResults(this.records, path);
    return this.records.length;
  }
}

export function formatReport(report: CheckReport): string {
  return [
    `Strength: ${report.result.strength}`,
    `Message: ${report.result.message}`,
    '',
    report.suggestions,
  ].join('\n');
}
