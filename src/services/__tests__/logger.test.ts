/**
 * logger.test.ts
 *
 * Covers:
 *   1. Line format (timestamp, prefix, padded level, JSON context)
 *   2. Level filtering shared by ConsoleLogger and FileLogger
 *   3. ConsoleLogger stream selection
 *   4. FileLogger.flush writes buffered lines to disk
 *   5. TeeLogger forwards to every target
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ConsoleLogger, FileLogger, TeeLogger, formatLogLine } from '../logger.js';

afterEach(() => {
  jest.restoreAllMocks();
});

describe('formatLogLine', () => {
  it('formats time, prefix, level, message and context', () => {
    const now = new Date('2024-03-05T07:08:09.123Z');
    expect(formatLogLine(now, 'dataset-analysis', 'INFO ', 'Step 1/5  Done', { readings: 3 })).toBe(
      '07:08:09.123 [dataset-analysis] [INFO ] Step 1/5  Done  {"readings":3}',
    );
    expect(formatLogLine(now, 'p', 'WARN ', 'no context')).toBe('07:08:09.123 [p] [WARN ] no context');
  });
});

describe('FileLogger', () => {
  it('drops messages below its level', () => {
    const log = new FileLogger('warn');
    log.debug('d');
    log.info('i');
    log.warn('w');
    log.error('e');
    expect(log.lines).toHaveLength(2);
    expect(log.lines[0]).toMatch(/\[dataset-analysis\] \[WARN \] w$/);
    expect(log.lines[1]).toMatch(/\[dataset-analysis\] \[ERROR\] e$/);
  });

  it('keeps nothing at the silent level', () => {
    const log = new FileLogger('silent');
    log.error('e');
    expect(log.lines).toEqual([]);
  });

  it('flushes buffered lines to a file', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'dataset-log-'));
    try {
      const log = new FileLogger('debug', 'test');
      log.info('hello', { n: 1 });
      const file = path.join(dir, 'sub', 'analysis.log');
      log.flush(file);
      const text = fs.readFileSync(file, 'utf-8');
      expect(text).toMatch(/^\d{2}:\d{2}:\d{2}\.\d{3} \[test\] \[INFO \] hello {2}\{"n":1\}\n$/);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('ConsoleLogger', () => {
  it('writes errors to stderr and other levels to stdout', () => {
    const stdout = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const stderr = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);

    const log = new ConsoleLogger('info', 'test');
    log.debug('hidden');
    log.info('shown');
    log.error('failed');

    expect(stdout).toHaveBeenCalledTimes(1);
    expect(String(stdout.mock.calls[0]?.[0])).toMatch(/\[test\] \[INFO \] shown\n$/);
    expect(stderr).toHaveBeenCalledTimes(1);
    expect(String(stderr.mock.calls[0]?.[0])).toMatch(/\[test\] \[ERROR\] failed\n$/);
  });
});

describe('TeeLogger', () => {
  it('forwards each call to every target, each applying its own level', () => {
    const verbose = new FileLogger('debug', 'a');
    const quiet = new FileLogger('warn', 'b');
    const tee = new TeeLogger([verbose, quiet]);

    tee.debug('step', { n: 1 });
    tee.warn('careful');

    expect(verbose.lines).toHaveLength(2);
    expect(verbose.lines[0]).toMatch(/\[a\] \[DEBUG\] step {2}\{"n":1\}$/);
    expect(quiet.lines).toHaveLength(1);
    expect(quiet.lines[0]).toMatch(/\[b\] \[WARN \] careful$/);
  });
});
