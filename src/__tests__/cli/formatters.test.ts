import { describe, it, expect } from 'vitest';
import { colors, colorize, outcomeIcon, stripAnsi } from '../../cli/formatters/icons';
import { formatTable, truncate } from '../../cli/formatters/table';
import { formatReport } from '../../cli/formatters/report';
import { describeBuildFailure } from '../../cli/commands/build';

describe('icons', () => {
    it('wraps text in a color and resets it', () => {
        expect(colorize('ok', colors.green)).toBe('\x1b[32mok\x1b[0m');
        expect(stripAnsi(colorize('ok', colors.green))).toBe('ok');
    });

    it('picks an icon per outcome', () => {
        expect(stripAnsi(outcomeIcon('updated'))).toBe('✓');
        expect(stripAnsi(outcomeIcon('no-change'))).toBe('●');
        expect(stripAnsi(outcomeIcon('timed-out'))).toBe('◐');
        expect(stripAnsi(outcomeIcon('build-failed'))).toBe('✗');
        expect(outcomeIcon('sync-failed')).toBe(colorize('✗', colors.red));
    });
});

describe('formatTable', () => {
    interface Row {
        name: string;
        count: number;
    }

    it('aligns columns to the widest cell', () => {
        const table = formatTable<Row>(
            [{ name: 'api', count: 3 }, { name: 'storefront', count: 12 }],
            [
                { key: 'name', title: 'Name' },
                { key: 'count', title: 'N', align: 'right' },
            ]
        );

        expect(stripAnsi(table).split('\n')).toEqual([
            'Name        N',
            '──────────  ──',
            'api          3',
            'storefront  12',
        ]);
    });

    it('applies column formatters', () => {
        const table = formatTable<Row>(
            [{ name: 'api', count: 0 }],
            [{ key: 'count', title: 'Count', formatter: (v) => (v ? String(v) : '-') }]
        );

        expect(stripAnsi(table).split('\n')[2]).toBe('-');
    });

    it('says so when there are no rows', () => {
        expect(stripAnsi(formatTable<Row>([], [{ key: 'name', title: 'Name' }]))).toBe('No data');
    });
});

describe('truncate', () => {
    it('keeps short strings', () => {
        expect(truncate('make', 10)).toBe('make');
    });

    it('cuts long strings with an ellipsis', () => {
        expect(truncate('docker compose up -d --build', 12)).toBe('docker co...');
    });
});

describe('formatReport', () => {
    it('prefixes the status line with its icon', () => {
        const line = formatReport({
            project: { name: 'api', path: '/srv/api', repo: '', type: 'pm2', buildCommand: '' },
            outcome: { status: 'no-change' },
            durationMs: 40,
        });

        expect(stripAnsi(line)).toBe('● No new commits for api');
    });
});

describe('describeBuildFailure', () => {
    it('describes each kind of failure', () => {
        expect(describeBuildFailure({ status: 'failed', exitCode: 1 })).toBe('exit status 1');
        expect(describeBuildFailure({ status: 'failed', exitCode: null, detail: 'spawn bash ENOENT' }))
            .toBe('spawn bash ENOENT');
        expect(describeBuildFailure({ status: 'timed-out', timeoutMs: 3_600_000 })).toBe('timed out after 3600s');
        expect(describeBuildFailure({ status: 'cancelled' })).toBe('cancelled');
    });
});
