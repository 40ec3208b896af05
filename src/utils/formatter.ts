/**
 * Formatter utility
 * Table and size output for CLI
 */

import chalk from 'chalk';

/**
 * Lay out rows under bold headers, each column two wider than its longest cell
 */
export function formatTable(headers: string[], rows: string[][]): string[] {
    const widths = headers.map(
        (header, col) => Math.max(header.length, ...rows.map((row) => (row[col] ?? '').length)) + 2
    );
    const line = (cells: string[]) =>
        cells
            .map((cell, col) => (cell ?? '').padEnd(widths[col]))
            .join('')
            .trimEnd();

    const rule = chalk.dim('─'.repeat(widths.reduce((sum, width) => sum + width, 0)));
    return [chalk.bold(line(headers)), rule, ...rows.map(line)];
}

export function printTable(headers: string[], rows: string[][]): void {
    for (const text of formatTable(headers, rows)) {
        console.log(text);
    }
}

/**
 * Format a date as a short readable string
 */
export function formatDate(date: Date | string | number): string {
    const d = new Date(date);
    return d.toLocaleString('en-US', {
        year: 'numeric',
        month: 'short',
        day: 'numeric',
        hour: '2-digit',
        minute: '2-digit',
    });
}

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB'] as const;

export function formatBytes(bytes: number): string {
    let value = bytes;
    let unit = 0;
    while (value >= 1024 && unit < SIZE_UNITS.length - 1) {
        value /= 1024;
        unit++;
    }
    return unit === 0 ? `${bytes} B` : `${value.toFixed(1)} ${SIZE_UNITS[unit]}`;
}

/**
 * "12.0 MB / 1.2 GB (1%)", or just the received size when the total is unknown
 */
export function formatProgress(received: number, total: number | undefined): string {
    if (!total) return formatBytes(received);
    const percent = Math.floor((received / total) * 100);
    return `${formatBytes(received)} / ${formatBytes(total)} (${percent}%)`;
}
