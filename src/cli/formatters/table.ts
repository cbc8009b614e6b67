import { colors, colorize, stripAnsi } from './icons';

export interface Column<T> {
    key: keyof T & string;
    title: string;
    width?: number;
    align?: 'left' | 'right';
    formatter?: (value: T[keyof T & string]) => string;
}

export function formatTable<T extends object>(data: readonly T[], columns: Column<T>[]): string {
    if (data.length === 0) {
        return colorize('No data', colors.dim);
    }

    const cell = (row: T, col: Column<T>): string => {
        const value = row[col.key];
        return col.formatter ? col.formatter(value) : String(value ?? '');
    };

    // Calculate column widths
    const widths = columns.map(col => {
        const maxDataWidth = Math.max(...data.map(row => stripAnsi(cell(row, col)).length));
        return Math.max(col.width || 0, col.title.length, maxDataWidth);
    });

    const header = columns.map((col, i) => pad(col.title, widths[i], 'left')).join('  ');
    const separator = widths.map(w => '─'.repeat(w)).join('  ');

    const rows = data.map(row =>
        columns.map((col, i) => pad(cell(row, col), widths[i], col.align || 'left')).join('  ').trimEnd()
    );

    return [
        colorize(header.trimEnd(), colors.bold),
        colorize(separator, colors.dim),
        ...rows
    ].join('\n');
}

function pad(str: string, width: number, align: 'left' | 'right'): string {
    const len = stripAnsi(str).length;
    if (len >= width) return str;

    const padding = ' '.repeat(width - len);
    return align === 'right' ? padding + str : str + padding;
}

export function truncate(str: string, maxLength: number): string {
    if (str.length <= maxLength) return str;
    return str.substring(0, maxLength - 3) + '...';
}
