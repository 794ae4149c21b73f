/**
 * Tab-separated values.
 *
 * Fields are quoted with `"` only when they contain a tab, a quote or a line
 * break; quotes inside a quoted field are doubled. `null` is an empty field.
 *
 * @module tsv
 */

export type TsvField = string | number | null;

const NEEDS_QUOTES = /[\t"\r\n]/;

export function formatTsvField(field: TsvField): string {
  if (field === null) return '';
  const text = String(field);
  return NEEDS_QUOTES.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function formatTsvRow(fields: TsvField[]): string {
  return fields.map(formatTsvField).join('\t');
}

export function stringifyTsv(rows: TsvField[][]): string {
  return rows.map((row) => formatTsvRow(row) + '\n').join('');
}

/**
 * Parse TSV text into rows of strings. Blank lines are skipped.
 */
export function parseTsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let fieldStarted = false;

  const endRow = (): void => {
    if (fieldStarted || row.length > 0 || field !== '') {
      row.push(field);
      rows.push(row);
    }
    row = [];
    field = '';
    fieldStarted = false;
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"' && field === '') {
      inQuotes = true;
      fieldStarted = true;
    } else if (ch === '\t') {
      row.push(field);
      field = '';
      fieldStarted = true;
    } else if (ch === '\n') {
      endRow();
    } else if (ch === '\r') {
      if (text[i + 1] === '\n') i++;
      endRow();
    } else {
      field += ch;
    }
  }
  endRow();

  return rows;
}
