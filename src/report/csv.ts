const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(value: string | number): string {
    const text = String(value);
    if (!NEEDS_QUOTING.test(text)) return text;
    return `"${text.replace(/"/g, '""')}"`;
}

export function toCsv(header: readonly string[], rows: ReadonlyArray<ReadonlyArray<string | number>>): string {
    const lines = [header, ...rows].map(cells => cells.map(escapeCsvField).join(','));
    return lines.join('\n') + '\n';
}
