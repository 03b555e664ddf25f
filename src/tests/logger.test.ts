import { describe, it, afterEach, mock } from 'node:test';
import assert from 'node:assert';

import { isLogLevel, logger, setLogLevel } from '../logger.js';

describe('Logger', () => {
  afterEach(() => {
    mock.restoreAll();
    setLogLevel('info');
  });

  it('recognises only its own levels', () => {
    assert.strictEqual(isLogLevel('warn'), true);
    assert.strictEqual(isLogLevel('debug'), true);
    assert.strictEqual(isLogLevel('toString'), false);
    assert.strictEqual(isLogLevel('__proto__'), false);
    assert.strictEqual(isLogLevel('WARN'), false);
    assert.strictEqual(isLogLevel(undefined), false);
  });

  it('drops messages below the threshold', () => {
    const lines: string[] = [];
    mock.method(console, 'error', (line: unknown) => { lines.push(String(line)); });

    setLogLevel('warn');
    logger.info('Running 7 tasks');
    logger.warn('Ignoring malformed config file');

    assert.strictEqual(lines.length, 1);
    assert.ok(lines[0]?.includes('[CREWSMITH] WARN '));
    assert.ok(lines[0]?.includes('Ignoring malformed config file'));
  });

  it('adds the error message to the data', () => {
    const lines: string[] = [];
    mock.method(console, 'error', (line: unknown) => { lines.push(String(line)); });

    logger.error('Fatal error', new Error('disk full'), { taskId: 'backend' });

    assert.strictEqual(lines.length, 1);
    assert.ok(lines[0]?.includes('"taskId":"backend","error":"disk full"'));
  });
});
