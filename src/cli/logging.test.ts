import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import log from 'loglevel';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { attachFileSink, checkerLogger, configureLogging, formatLogLine } from './logging.js';

describe('formatLogLine', () => {
  it('writes timestamp, level and message', () => {
    const line = formatLogLine('info', ['Password checked:', 'Weak'], new Date('2024-01-02T03:04:05.000Z'));
    expect(line).toBe('2024-01-02T03:04:05.000Z - INFO - Password checked: Weak\n');
  });
});

describe('attachFileSink', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'logging-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('appends one line per enabled call', () => {
    const file = join(dir, 'checker.log');
    const logger = log.getLogger('file-sink-test');
    logger.setLevel('info');
    attachFileSink(logger, file);

    logger.info('Password checked: Strong');
    logger.debug('not written');
    logger.warn('Password checked:', 'Banned');

    const lines = readFileSync(file, 'utf-8').split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z - INFO - Password checked: Strong$/);
    expect(lines[1]).toMatch(/ - WARN - Password checked: Banned$/);
    expect(lines[2]).toBe('');
  });
});

describe('configureLogging', () => {
  it('keeps check events quiet unless asked for', () => {
    configureLogging({ verbose: false });
    expect(checkerLogger.getLevel()).toBe(log.levels.WARN);
    expect(log.getLevel()).toBe(log.levels.INFO);

    configureLogging({ verbose: true });
    expect(checkerLogger.getLevel()).toBe(log.levels.INFO);
  });
});
