import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Logger, LogLevel, parseLogLevel } from './logger.js';

const spyOnConsole = () => vi.spyOn(console, 'log').mockImplementation(() => {});

describe('Logger', () => {
  let logger: Logger;
  let consoleSpy: ReturnType<typeof spyOnConsole>;

  beforeEach(() => {
    // Reset singleton instance
    Reflect.set(Logger, 'instance', undefined);
    logger = Logger.getInstance();
    consoleSpy = spyOnConsole();
  });

  afterEach(() => {
    consoleSpy.mockRestore();
  });

  describe('getInstance', () => {
    it('should return singleton instance', () => {
      const instance1 = Logger.getInstance();
      const instance2 = Logger.getInstance();

      expect(instance1).toBe(instance2);
    });
  });

  describe('setLogLevel', () => {
    it('should only print entries at or above the level', () => {
      logger.setLogLevel(LogLevel.WARN);

      logger.debug('Debug message');
      logger.info('Info message');
      logger.warn('Warn message');
      logger.error('Error message');

      expect(consoleSpy).toHaveBeenCalledTimes(2);
      expect(consoleSpy).toHaveBeenCalledWith(
        expect.stringContaining('WARN: Warn message')
      );
      expect(consoleSpy).toHaveBeenCalledWith(
        expect.stringContaining('ERROR: Error message')
      );
      expect(logger.getLogLevel()).toBe(LogLevel.WARN);
    });

    it('should skip debug output at the default level', () => {
      logger.debug('Debug message');

      expect(consoleSpy).not.toHaveBeenCalled();
      expect(logger.getLogs()).toHaveLength(0);
    });
  });

  describe('context formatting', () => {
    it('should append context as JSON', () => {
      logger.setLogLevel(LogLevel.DEBUG);
      logger.debug('registry transition', { messageId: 7, outcome: 'nak' });

      expect(consoleSpy).toHaveBeenCalledWith(
        expect.stringContaining(
          'DEBUG: registry transition {"messageId":7,"outcome":"nak"}'
        )
      );
    });

    it('should prefix lines with an ISO timestamp', () => {
      logger.info('Info message');

      const line = consoleSpy.mock.calls[0][0];
      expect(line).toMatch(
        /^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] INFO: Info message$/
      );
    });
  });

  describe('getLogs', () => {
    it('should return logged entries in order', () => {
      logger.setLogLevel(LogLevel.DEBUG);
      logger.debug('Debug message');
      logger.info('Info message', { node: 'yang' });

      const logs = logger.getLogs();
      expect(logs).toHaveLength(2);
      expect(logs[0]).toMatchObject({
        level: LogLevel.DEBUG,
        message: 'Debug message',
        timestamp: expect.any(Number),
      });
      expect(logs[1].context).toEqual({ node: 'yang' });
    });

    it('should return a copy of the history', () => {
      logger.info('Test message');

      const logs1 = logger.getLogs();
      const logs2 = logger.getLogs();

      expect(logs1).not.toBe(logs2);
      expect(logs1).toEqual(logs2);
    });

    it('should drop the oldest entries past the cap', () => {
      logger.setMaxEntries(2);
      logger.info('first');
      logger.info('second');
      logger.info('third');

      expect(logger.getLogs().map(entry => entry.message)).toEqual([
        'second',
        'third',
      ]);
    });

    it('should clear the history', () => {
      logger.info('Test message');
      logger.clearLogs();

      expect(logger.getLogs()).toEqual([]);
    });
  });

  describe('parseLogLevel', () => {
    it('should map level names case-insensitively', () => {
      expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
      expect(parseLogLevel('Warning')).toBe(LogLevel.WARN);
      expect(parseLogLevel('ERROR')).toBe(LogLevel.ERROR);
    });

    it('should fall back to INFO', () => {
      expect(parseLogLevel(undefined)).toBe(LogLevel.INFO);
      expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
    });
  });
});
