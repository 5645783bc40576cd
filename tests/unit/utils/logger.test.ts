/**
 * Tests for the leveled logger.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Logger } from '../../../src/utils/logger.js';

describe('Logger', () => {
  const consoleSpy = {
    log: vi.spyOn(console, 'log').mockImplementation(() => {}),
    warn: vi.spyOn(console, 'warn').mockImplementation(() => {}),
    error: vi.spyOn(console, 'error').mockImplementation(() => {}),
  };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('levels', () => {
    it('should log debug only at debug level', () => {
      const log = new Logger();
      log.debug('hidden');
      expect(consoleSpy.log).not.toHaveBeenCalled();

      log.setLevel('debug');
      log.debug('shown');
      expect(consoleSpy.log).toHaveBeenCalledTimes(1);
      expect(consoleSpy.log).toHaveBeenCalledWith(expect.stringContaining('[DEBUG] shown'));
    });

    it('should route warn and error to stderr', () => {
      const log = new Logger();
      log.warn('careful');
      log.error('broken');

      expect(consoleSpy.warn).toHaveBeenCalledWith(expect.stringContaining('[WARN] careful'));
      expect(consoleSpy.error).toHaveBeenCalledWith(expect.stringContaining('[ERROR] broken'));
      expect(consoleSpy.log).not.toHaveBeenCalled();
    });

    it('should take its starting level from the constructor', () => {
      const log = new Logger('error');
      log.warn('careful');
      log.success('done');
      log.error('broken');

      expect(consoleSpy.warn).not.toHaveBeenCalled();
      expect(consoleSpy.log).not.toHaveBeenCalled();
      expect(consoleSpy.error).toHaveBeenCalledTimes(1);
    });

    it('should not log anything when silent', () => {
      const log = new Logger('silent');

      log.debug('debug');
      log.warn('warn');
      log.error('error');
      log.success('done');

      expect(consoleSpy.log).not.toHaveBeenCalled();
      expect(consoleSpy.warn).not.toHaveBeenCalled();
      expect(consoleSpy.error).not.toHaveBeenCalled();
    });
  });

  describe('error cause', () => {
    it('should leave out the stack above debug level', () => {
      const log = new Logger();
      log.error('failed', new Error('load failed'));

      expect(consoleSpy.error).toHaveBeenCalledTimes(1);
    });

    it('should print the stack at debug level', () => {
      const log = new Logger('debug');
      log.error('failed', new Error('load failed'));

      expect(consoleSpy.error).toHaveBeenCalledTimes(2);
      expect(consoleSpy.error).toHaveBeenLastCalledWith(
        expect.stringContaining('Error: load failed')
      );
    });

    it('should ignore a cause that is not an Error', () => {
      const log = new Logger('debug');
      log.error('failed', 'gone');

      expect(consoleSpy.error).toHaveBeenCalledTimes(1);
    });
  });

  describe('success', () => {
    it('should log with a checkmark at info level', () => {
      new Logger().success('done');
      expect(consoleSpy.log).toHaveBeenCalledWith(expect.stringContaining('✓ done'));
    });

    it('should be hidden at warn level', () => {
      new Logger('warn').success('done');
      expect(consoleSpy.log).not.toHaveBeenCalled();
    });
  });
});
