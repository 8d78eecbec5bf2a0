import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import log from 'loglevel';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { GENERATOR_ALPHABET, StrengthEvaluator, type ScoringOracle } from '../strength/index.js';
import { CheckerSession, formatReport } from './session.js';

const oracle: ScoringOracle = { score: () => ({ score: 4, suggestions: [] }) };

describe('CheckerSession', () => {
  let dir: string;
  let logger: log.Logger;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'session-'));
    logger = log.getLogger('session-test');
    logger.setLevel('info');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('evaluates, suggests and records a check', () => {
    const session = new CheckerSession(new StrengthEvaluator({ oracle }), logger);
    const report = session.check('Tr0ub4dor&3xyz!');

    expect(report.result).toEqual({
      strength: 'Very Strong',
      score: 4,
      message: 'Password meets all the requirements. Score: 4/4',
    });
    expect(report.suggestions).toBe('Suggested improvements:\n\n- Password meets all the requirements. Score: 4/4');
    expect(session.results).toEqual([
      { password: 'Tr0ub4dor&3xyz!', strength: 'Very Strong', message: 'Password meets all the requirements. Score: 4/4' },
    ]);
  });

  it('logs the strength of every check but never the password', () => {
    const info = vi.spyOn(logger, 'info');
    const session = new CheckerSession(new StrengthEvaluator({ oracle }), logger);
    session.check('abc');
    session.check('Tr0ub4dor&3xyz!');

    expect(info.mock.calls).toEqual([['Password checked: Too short'], ['Password checked: Very Strong']]);
  });

  it('records repeated checks of the same password', () => {
    const session = new CheckerSession(new StrengthEvaluator({ oracle }), logger);
    session.check('abc');
    session.check('abc');
    expect(session.results).toHaveLength(2);
  });

  it('checks the passwords it generates', () => {
    const session = new CheckerSession(new StrengthEvaluator({ oracle }), logger);
    const report = session.generate(20);

    expect(report.password).toHaveLength(20);
    expect([...report.password].every(c => GENERATOR_ALPHABET.includes(c))).toBe(true);
    expect(session.results.map(r => r.password)).toEqual([report.password]);
  });

  it('exports the records as indented JSON', async () => {
    const session = new CheckerSession(new StrengthEvaluator({ oracle }), logger);
    session.check('abc');
    session.check('Abcdefghijkl');
    const file = join(dir, 'results.json');

    await expect(session.exportResults(file)).resolves.toBe(2);
    expect(readFileSync(file, 'utf-8')).toBe(
      '[\n' +
        '    {\n' +
        '        "password": "abc",\n' +
        '        "strength": "Too short",\n' +
        '        "message": "Password should be at least 12 characters long."\n' +
        '    },\n' +
        '    {\n' +
        '        "password": "Abcdefghijkl",\n' +
        '        "strength": "Weak",\n' +
        '        "message": "Password lacks complexity. Missing: number, special character."\n' +
        '    }\n' +
        ']',
    );
  });

  it('refuses to export an empty run', async () => {
    const session = new CheckerSession(new StrengthEvaluator({ oracle }), logger);
    await expect(session.exportResults(join(dir, 'results.json'))).rejects.toThrow('No results to export.');
  });
});

describe('formatReport', () => {
  it('prints strength, message and suggestions', () => {
    const text = formatReport({
      password: 'abc',
      result: { strength: 'Too short', score: 0, message: 'Password should be at least 12 characters long.' },
      suggestions: 'Suggested improvements:\n\n- Add numbers',
    });
    expect(text).toBe(
      'Strength: Too short\n' +
        'Message: Password should be at least 12 characters long.\n' +
        '\n' +
        'Suggested improvements:\n\n- Add numbers',
    );
  });
});
