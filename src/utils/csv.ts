/**
 * CSV helpers for the period export and the employee import
 *
 * @module utils/csv
 */

export const CSV_BOM = '\ufeff';
export const CSV_LINE_TERMINATOR = '\r\n';

export type CsvCell = string | number | null | undefined;

/**
 * Quote a cell when it contains a quote, comma, CR or LF; inner quotes are doubled
 */
export function csvEscape(value: CsvCell): string {
  const s = (value ?? '').toString();
  if (s.includes('"') || s.includes(',') || s.includes('\n') || s.includes('\r')) {
    return '"' + s.replace(/"/g, '""') + '"';
  }
  return s;
}

export function toCsvRow(cells: readonly CsvCell[]): string {
  return cells.map(csvEscape).join(',');
}

/**
 * Build a CSV document; every row, the last included, ends with CRLF
 */
export function buildCsv(rows: readonly (readonly CsvCell[])[], options?: { readonly bom?: boolean }): string {
  const body = rows.map((row) => toCsvRow(row) + CSV_LINE_TERMINATOR).join('');
  return options?.bom ? CSV_BOM + body : body;
}

/**
 * Parse CSV text into rows of cells
 *
 * Accepts quoted cells with doubled quotes and embedded line breaks, CRLF or LF
 * line endings and a leading BOM. Blank lines are dropped.
 */
export function parseCsv(text: string): string[][] {
  const input = text.startsWith(CSV_BOM) ? text.slice(CSV_BOM.length) : text;
  const rows: string[][] = [];

  let row: string[] = [];
  let cell = '';
  let inQuotes = false;
  let i = 0;

  const endRow = (): void => {
    row.push(cell);
    if (!(row.length === 1 && row[0] === '')) {
      rows.push(row);
    }
    row = [];
    cell = '';
  };

  while (i < input.length) {
    const ch = input[i];

    if (inQuotes) {
      if (ch === '"') {
        if (input[i + 1] === '"') {
          cell += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
      } else {
        cell += ch;
      }
      i++;
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      row.push(cell);
      cell = '';
    } else if (ch === '\r') {
      if (input[i + 1] === '\n') {
        i++;
      }
      endRow();
    } else if (ch === '\n') {
      endRow();
    } else {
      cell += ch;
    }
    i++;
  }

  if (cell !== '' || row.length > 0) {
    endRow();
  }

  return rows;
}
