import { describe, it, expect } from 'vitest';
import {
  createLogger,
  createNoopLogger,
  createTransport,
  getLogger,
  initializeLogger,
  isLoggerInitialized,
} from './logger.js';

// No outputs: pino writes JSON to stdout without a worker transport
const minimalConfig = {
  level: 'warn' as const,
  output: [],
};

describe('Logger', () => {
  describe('createLogger()', () => {
    it('reports the configured level', () => {
      const logger = createLogger(minimalConfig);
      expect(logger.level).toBe('warn');
    });

    it('does not throw for any level', () => {
      const logger = createLogger(minimalConfig);
      expect(() => logger.trace('trace message')).not.toThrow();
      expect(() => logger.debug('debug message')).not.toThrow();
      expect(() => logger.info('info message', { component: 'test' })).not.toThrow();
    });
  });

  describe('createTransport()', () => {
    it('needs no transport for JSON stdout alone', () => {
      expect(createTransport({ level: 'info', output: [{ type: 'stdout', format: 'json' }] })).toBeUndefined();
    });

    it('keeps JSON stdout next to a file output', () => {
      const transport = createTransport({
        level: 'info',
        output: [
          { type: 'stdout', format: 'json' },
          { type: 'file', path: '/var/log/plugstead.log' },
        ],
      });

      expect(transport).toEqual({
        targets: [
          { target: 'pino/file', options: { destination: '/var/log/plugstead.log', mkdir: true }, level: 'info' },
          { target: 'pino/file', options: { destination: 1 }, level: 'info' },
        ],
      });
    });

    it('returns a single target for one file output', () => {
      const transport = createTransport({ level: 'warn', output: [{ type: 'file', path: '/var/log/plugstead.log' }] });
      expect(transport).toEqual({
        target: 'pino/file',
        options: { destination: '/var/log/plugstead.log', mkdir: true },
        level: 'warn',
      });
    });
  });

  describe('child()', () => {
    it('keeps the parent level', () => {
      const logger = createLogger(minimalConfig);
      const child = logger.child({ component: 'ExtensionManager', extensionId: 'acme.reports' });
      expect(child.level).toBe('warn');
    });
  });

  describe('global logger', () => {
    it('is available after initializeLogger()', () => {
      const logger = initializeLogger(minimalConfig);
      expect(isLoggerInitialized()).toBe(true);
      expect(getLogger()).toBe(logger);
    });
  });

  describe('createNoopLogger()', () => {
    it('returns itself from child()', () => {
      const logger = createNoopLogger();
      expect(logger.child({ component: 'x' })).toBe(logger);
      expect(logger.level).toBe('info');
    });
  });
});
