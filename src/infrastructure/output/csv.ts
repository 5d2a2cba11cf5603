/**
 * Minimal RFC 4180 CSV encoding and decoding.
 */

const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvValue(value: string): string {
  if (NEEDS_QUOTING.test(value) || value.startsWith(' ') || value.endsWith(' ')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsvRow(values: string[]): string {
  return values.map(escapeCsvValue).join(',');
}

/**
 * Parse CSV text into rows of cells. Quoted cells may contain commas,
 * doubled quotes and newlines. A trailing newline does not produce a row.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = '';
  let inQuotes = false;
  let i = 0;

  const source = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  while (i < source.length) {
    const char = source[i];

    if (inQuotes) {
      if (char === '"') {
        if (source[i + 1] === '"') {
          cell += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
        i++;
        continue;
      }
      cell += char;
      i++;
      continue;
    }

    if (char === '"' && cell === '') {
      inQuotes = true;
      i++;
      continue;
    }

    if (char === ',') {
      row.push(cell);
      cell = '';
      i++;
      continue;
    }

    if (char === '\r' || char === '\n') {
      row.push(cell);
      rows.push(row);
      row = [];
      cell = '';
      i += char === '\r' && source[i + 1] === '\n' ? 2 : 1;
      continue;
    }

    cell += char;
    i++;
  }

  if (cell !== '' || row.length > 0) {
    row.push(cell);
    rows.push(row);
  }

  return rows.filter((r) => !(r.length === 1 && r[0] === ''));
}

/**
 * Parse CSV with a header row into records keyed by column name.
 */
export function parseCsvRecords(text: string): Array<Record<string, string>> {
  const rows = parseCsv(text);
  if (rows.length === 0) {
    return [];
  }

  const header = rows[0].map((h) => h.trim());
  return rows.slice(1).map((cells) => {
    const record: Record<string, string> = {};
    header.forEach((column, index) => {
      record[column] = cells[index] ?? '';
    });
    return record;
  });
}
