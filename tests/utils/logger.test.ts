/**
 * Tests for Logger
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, maskSecret, silentLogger } from '../../src/utils/logger.js';

describe('createLogger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should drop debug output unless enabled', () => {
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

        createLogger().debug('hidden');
        expect(errorSpy).not.toHaveBeenCalled();

        const logger = createLogger({ debug: true });
        logger.debug('shown');
        expect(logger.debugEnabled).toBe(true);
        expect(errorSpy).toHaveBeenCalledTimes(1);
    });

    it('should write status lines to stderr and keep stdout for results', () => {
        const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
        const logger = createLogger();

        logger.info('hello');
        logger.success('done');
        logger.warn('careful');
        logger.dim('aside');
        logger.error('broken');

        expect(logSpy).not.toHaveBeenCalled();
        expect(errorSpy).toHaveBeenCalledTimes(5);
        expect(errorSpy.mock.calls[0][1]).toBe('hello');
        expect(errorSpy.mock.calls[4][1]).toBe('broken');

        logger.kv('Client ID', 'test-id');
        expect(logSpy).toHaveBeenCalledTimes(1);
    });

    it('should keep the silent logger quiet', () => {
        const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
        silentLogger.info('nothing');
        silentLogger.kv('key', 'value');
        expect(logSpy).not.toHaveBeenCalled();
    });
});

describe('maskSecret', () => {
    it('should keep only the last four characters', () => {
        expect(maskSecret('test-secret')).toBe('••••••cret');
        expect(maskSecret('12345678')).toBe('••••••5678');
    });

    it('should hide short secrets completely', () => {
        expect(maskSecret('abcd')).toBe('••••••');
        expect(maskSecret('abcdefg')).toBe('••••••');
        expect(maskSecret('')).toBe('••••••');
    });
});
