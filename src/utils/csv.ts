/**
 * Minimal RFC 4180 reader: quoted fields may hold delimiters, doubled quotes and
 * line breaks. CRLF and LF line endings are both accepted; blank lines are dropped.
 */
export function parseCsv(text: string, delimiter = ','): string[][] {
    const rows: string[][] = [];
    let row: string[] = [];
    let field = '';
    let quoted = false;
    let i = 0;

    const endField = () => {
        row.push(field);
        field = '';
    };
    const endRow = () => {
        endField();
        if (row.length > 1 || row[0] !== '') rows.push(row);
        row = [];
    };

    // Strip a UTF-8 byte order mark
    if (text.charCodeAt(0) === 0xfeff) i = 1;

    while (i < text.length) {
        const char = text[i];

        if (quoted) {
            if (char === '"') {
                if (text[i + 1] === '"') {
                    field += '"';
                    i += 2;
                    continue;
                }
                quoted = false;
            } else {
                field += char;
            }
            i++;
            continue;
        }

        if (char === '"' && field === '') {
            quoted = true;
        } else if (char === delimiter) {
            endField();
        } else if (char === '\n') {
            endRow();
        } else if (char === '\r') {
            if (text[i + 1] === '\n') i++;
            endRow();
        } else {
            field += char;
        }
        i++;
    }

    if (field !== '' || row.length > 0) endRow();
    return rows;
}

/**
 * Values of one named column, header row excluded. Returns null when the header
 * has no such column.
 */
export function readColumn(rows: readonly string[][], column: string): Array<string | undefined> | null {
    const [header, ...body] = rows;
    const index = header?.findIndex((name) => name.trim() === column) ?? -1;
    if (index < 0) return null;
    return body.map((row) => row[index]);
}
