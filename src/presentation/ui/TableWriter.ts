import { LineWriter } from './TerminalSpinner';

export type Cell = string | number | boolean | null | undefined;

const COLUMN_GAP = 2;

/**
 * Left-aligned, space-padded table. Rows are buffered until flush() so
 * column widths fit the widest cell.
 */
export class TableWriter {
    private readonly rows: string[][] = [];

    constructor(
        private readonly headers: readonly string[],
        private readonly out: LineWriter = process.stdout
    ) { }

    addRow(values: readonly Cell[]): void {
        this.rows.push(values.map((value, index) => this.formatCell(value, index)));
    }

    get rowCount(): number {
        return this.rows.length;
    }

    /**
     * Returns the rendered lines without writing them.
     */
    render(): string[] {
        const header = this.headers.map((h) => h.toUpperCase());
        const all = [header, ...this.rows];
        const widths = header.map((_, column) =>
            Math.max(...all.map((row) => (row[column] ?? '').length))
        );

        return all.map((row) => header
            .map((_, column) => (row[column] ?? '').padEnd(widths[column] + COLUMN_GAP))
            .join('')
            .trimEnd());
    }

    flush(): void {
        for (const line of this.render()) {
            this.out.write(`${line}\n`);
        }
        this.rows.length = 0;
    }

    private formatCell(value: Cell, column: number): string {
        if (value === null || value === undefined) {
            return '';
        }
        const text = String(value);
        const header = (this.headers[column] ?? '').toLowerCase();
        // Status-like columns are shown upper-case regardless of wire casing
        if (header.includes('status') || header.includes('state')) {
            return text.toUpperCase();
        }
        return text;
    }
}

/**
 * Formats an ISO timestamp in local time as `YYYY-MM-DD HH:mm`.
 * Unparseable input is returned unchanged.
 */
export function formatTimestamp(value: string | undefined): string {
    if (!value) {
        return '';
    }
    const date = new Date(value);
    if (isNaN(date.getTime())) {
        return value;
    }
    const pad = (n: number) => String(n).padStart(2, '0');
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

export function createAvatarTable(out?: LineWriter): TableWriter {
    return new TableWriter(['NAME', 'ID', 'STATUS', 'CREATED'], out);
}

export function createSessionTable(out?: LineWriter): TableWriter {
    return new TableWriter(['SESSION ID', 'MODEL', 'STATE', 'DESIRED STATE', 'START TIME'], out);
}

export function createVoiceProfileTable(out?: LineWriter): TableWriter {
    return new TableWriter(['ID', 'NAME', 'DESCRIPTION', 'LANGUAGES'], out);
}
