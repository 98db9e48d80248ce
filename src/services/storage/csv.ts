import { CSV_DELIMITER } from '../../config/constants';
import { ExpenseParseError } from '../../types/errors';

export interface CsvRow {
  fields: string[];
  line: number;
}

/**
 * Quote a field when it holds the delimiter, a quote or a line break.
 * Embedded quotes are doubled.
 */
export function escapeCsvField(field: string): string {
  if (field.includes(CSV_DELIMITER) || field.includes('"') || field.includes('\n') || field.includes('\r')) {
    return `"${field.replace(/"/g, '""')}"`;
  }
  return field;
}

export function formatCsvRow(fields: readonly string[]): string {
  return fields.map(escapeCsvField).join(CSV_DELIMITER);
}

/**
 * Split CSV text into rows. Quoted fields may contain delimiters and line breaks;
 * `line` is the 1-based line on which each row starts. The line break that ends
 * the text does not open a new row.
 */
export function parseCsvRows(text: string, filePath: string): CsvRow[] {
  const rows: CsvRow[] = [];
  let fields: string[] = [];
  let field = '';
  let inQuotes = false;
  let quoted = false;
  let line = 1;
  let rowStart = 1;
  let quoteStart = 1;

  const endRow = (): void => {
    fields.push(field);
    rows.push({ fields, line: rowStart });
    fields = [];
    field = '';
    quoted = false;
  };

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (char === '\n') line++;
        field += char;
      }
      continue;
    }

    if (char === '"' && field === '' && !quoted) {
      inQuotes = true;
      quoted = true;
      quoteStart = line;
    } else if (char === CSV_DELIMITER) {
      fields.push(field);
      field = '';
      quoted = false;
    } else if (char === '\r' && text[i + 1] === '\n') {
      // handled with the \n
    } else if (char === '\n') {
      endRow();
      line++;
      rowStart = line;
    } else {
      field += char;
    }
  }

  if (inQuotes) {
    throw new ExpenseParseError('Unterminated quoted field', filePath, quoteStart);
  }
  if (field !== '' || quoted || fields.length > 0) {
    endRow();
  }

  return rows;
}
