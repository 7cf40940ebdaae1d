// Tests for the file logger

import { afterEach, beforeEach, expect, test, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Logger, createLogger, getGlobalLogger, getLogger, setGlobalLogger } from '../src/logging.ts';
import { TermscrollConfig } from '../src/config/mod.ts';

let testLogDir = '';

beforeEach(() => {
  testLogDir = mkdtempSync(join(tmpdir(), 'termscroll-logs-'));
});

afterEach(() => {
  setGlobalLogger(undefined);
  rmSync(testLogDir, { recursive: true, force: true });
});

test('basic logging writes every level to the file', () => {
  const logFile = join(testLogDir, 'basic.log');
  const logger = createLogger({ logFile, level: 'DEBUG', format: 'text', bufferSize: 1, flushInterval: 0 });

  logger.info('Test info message');
  logger.warn('Test warning message');
  logger.error('Test error message', new Error('Test error'));
  logger.close();

  const content = readFileSync(logFile, 'utf8');
  expect(content).toContain('INFO  Test info message');
  expect(content).toContain('WARN  Test warning message');
  expect(content).toContain('ERROR Test error message | ERROR: Test error');
  expect(content).toContain('Logging session ended');
});

test('entries below the level are dropped', () => {
  const logFile = join(testLogDir, 'level.log');
  const logger = createLogger({ logFile, level: 'WARN', bufferSize: 1, flushInterval: 0 });

  logger.info('hidden message');
  logger.warn('shown message');
  logger.flush();

  const content = readFileSync(logFile, 'utf8');
  expect(content).not.toContain('hidden message');
  expect(content).toContain('shown message');
  expect(logger.getStats().entriesByLevel.WARN).toBe(1);
  logger.close();
});

test('an empty log file path disables logging', () => {
  const logger = createLogger({ logFile: '' });
  logger.error('nowhere');
  expect(logger.isDisabled).toBe(true);
  expect(logger.logFile).toBeUndefined();
  expect(logger.getStats().totalEntries).toBe(0);
});

test('an unusable log directory disables only that logger', () => {
  const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
  const blocker = join(testLogDir, 'blocker.log');
  const first = createLogger({ logFile: blocker, bufferSize: 1, flushInterval: 0 });
  first.close();

  const logger = createLogger({ logFile: join(blocker, 'nested', 'x.log'), flushInterval: 0 });
  logger.warn('lost');

  expect(logger.isDisabled).toBe(true);
  expect(first.isDisabled).toBe(false);
  expect(spy).toHaveBeenCalledTimes(1);
  spy.mockRestore();
});

test('text format', () => {
  const logger = new Logger({ logFile: '', format: 'text', includeTimestamp: false });
  const line = logger.formatEntry({
    timestamp: new Date(0),
    level: 'INFO',
    message: 'hello',
    source: 'ListView',
    context: { index: 1 },
  });
  expect(line).toBe('INFO  [ListView] hello | {"index":1}\n');
});

test('structured format', () => {
  const logger = new Logger({ logFile: '', includeTimestamp: false });
  const line = logger.formatEntry({
    timestamp: new Date(0),
    level: 'WARN',
    message: 'moved',
    source: 'TreeView',
    context: { index: 3, label: 'src' },
  });
  expect(line).toBe('[WARN] TreeView: moved | index=3, label="src"\n');
});

test('json format', () => {
  const logger = new Logger({ logFile: '', format: 'json' });
  const line = logger.formatEntry({ timestamp: new Date(0), level: 'DEBUG', message: 'm' });
  expect(JSON.parse(line)).toEqual({ timestamp: '1970-01-01T00:00:00.000Z', level: 'DEBUG', message: 'm' });
});

test('component loggers use the global logger installed later', () => {
  const componentLogger = getLogger('ScrollPolicy');
  const logFile = join(testLogDir, 'global.log');
  const logger = createLogger({ logFile, level: 'DEBUG', format: 'text', bufferSize: 1, flushInterval: 0 });
  setGlobalLogger(logger);

  componentLogger.debug('policy changed', { to: 'auto-scroll' });
  logger.close();

  expect(readFileSync(logFile, 'utf8')).toContain('DEBUG [ScrollPolicy] policy changed | {"to":"auto-scroll"}');
});

test('the default global logger takes log.level and log.file from config', () => {
  const logFile = join(testLogDir, 'configured.log');
  TermscrollConfig.reset();
  TermscrollConfig.init({ skipFile: true, overrides: { 'log.level': 'DEBUG', 'log.file': logFile } });
  try {
    const logger = getGlobalLogger();
    expect(logger.getLevel()).toBe('DEBUG');
    expect(logger.logFile).toBe(logFile);

    TermscrollConfig.get().setValue('log.level', 'WARN');
    expect(getGlobalLogger()).not.toBe(logger);
    expect(getGlobalLogger().getLevel()).toBe('WARN');
  } finally {
    TermscrollConfig.reset();
  }
});

test('an installed global logger survives config changes', () => {
  const logger = createLogger({ logFile: '', level: 'ERROR' });
  setGlobalLogger(logger);
  TermscrollConfig.reset();
  TermscrollConfig.init({ skipFile: true, overrides: { 'log.level': 'DEBUG' } });
  try {
    expect(getGlobalLogger()).toBe(logger);
    expect(getGlobalLogger().getLevel()).toBe('ERROR');
  } finally {
    TermscrollConfig.reset();
  }
});
