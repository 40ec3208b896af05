/**
 * Tests for Formatter utilities
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { formatBytes, formatDate, formatProgress, formatTable, printTable } from '../../src/utils/formatter.js';

describe('formatDate', () => {
    it('should include the year', () => {
        const result = formatDate(new Date('2026-06-15T10:30:00Z').getTime());
        expect(result).toContain('2026');
    });
});

describe('formatBytes', () => {
    it('should format bytes', () => {
        expect(formatBytes(500)).toBe('500 B');
    });

    it('should format kilobytes', () => {
        expect(formatBytes(2048)).toBe('2.0 KB');
    });

    it('should format megabytes', () => {
        expect(formatBytes(5242880)).toBe('5.0 MB');
    });

    it('should format gigabytes', () => {
        expect(formatBytes(2147483648)).toBe('2.0 GB');
    });

    it('should stay in gigabytes past 1024 GB', () => {
        expect(formatBytes(2 * 1024 ** 4)).toBe('2048.0 GB');
    });
});

describe('formatProgress', () => {
    it('should show received, total and percentage', () => {
        expect(formatProgress(1048576, 2097152)).toBe('1.0 MB / 2.0 MB (50%)');
    });

    it('should show only the received size when the total is unknown', () => {
        expect(formatProgress(512, undefined)).toBe('512 B');
    });
});

describe('formatTable', () => {
    it('should size each column from its longest cell', () => {
        const lines = formatTable(['Version', 'Build'], [['19.5', '303'], ['20.0.1234', '7']]);

        expect(lines).toHaveLength(4);
        expect(lines[2]).toBe('19.5       303');
        expect(lines[3]).toBe('20.0.1234  7');
    });
});

describe('printTable', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should print header, separator and padded rows', () => {
        const spy = vi.spyOn(console, 'log').mockImplementation(() => {});

        printTable(['A', 'Bb'], [['x', 'y'], ['longer', 'z']]);

        expect(spy).toHaveBeenCalledTimes(4);
        expect(spy.mock.calls[2][0]).toBe('x       y');
        expect(spy.mock.calls[3][0]).toBe('longer  z');
    });

    it('should handle empty rows', () => {
        const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
        printTable(['Name'], []);
        expect(spy).toHaveBeenCalledTimes(2);
    });
});
