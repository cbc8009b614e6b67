import type { OutcomeStatus } from '../../core/types';

// ANSI color codes
export const colors = {
    reset: '\x1b[0m',
    bold: '\x1b[1m',
    dim: '\x1b[2m',

    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    cyan: '\x1b[36m',
};

export function colorize(text: string, color: string): string {
    return `${color}${text}${colors.reset}`;
}

export function stripAnsi(str: string): string {
    // eslint-disable-next-line no-control-regex
    return str.replace(/\x1b\[[0-9;]*m/g, '');
}

export function outcomeIcon(status: OutcomeStatus): string {
    switch (status) {
        case 'updated':
            return colorize('✓', colors.green);
        case 'no-change':
            return colorize('●', colors.dim);
        case 'timed-out':
        case 'cancelled':
            return colorize('◐', colors.yellow);
        case 'path-missing':
        case 'sync-failed':
        case 'build-failed':
        case 'dispatch-failed':
            return colorize('✗', colors.red);
    }
}
