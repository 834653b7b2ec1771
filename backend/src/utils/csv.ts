import * as XLSX from 'xlsx';

export interface CsvRecord {
  /**
   * Record number counting the header as 1. A quoted field that spans lines
   * still counts as one record, so this can trail the physical line number.
   */
  row: number;
  /** Cell text keyed by lower-cased, trimmed header name */
  values: Record<string, string>;
}

export interface CsvTable {
  headers: string[];
  records: CsvRecord[];
}

function cellText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

/**
 * Parse comma-separated text with a header row. Quoted fields follow the usual
 * CSV rules; blank rows are dropped. Every cell is kept as text.
 */
export function parseCsv(text: string): CsvTable {
  const content = text.replace(/^\uFEFF/, '');
  if (!content.trim()) {
    return { headers: [], records: [] };
  }

  const workbook = XLSX.read(content, { type: 'string', raw: true });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) {
    return { headers: [], records: [] };
  }

  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: true,
    defval: '',
    blankrows: true,
  });
  const [headerRow = [], ...body] = rows;
  const headers = headerRow.map((cell) => cellText(cell).trim().toLowerCase());

  const records: CsvRecord[] = [];
  body.forEach((cells, index) => {
    const texts = cells.map(cellText);
    if (texts.every((cell) => cell.trim() === '')) {
      return;
    }
    const values: Record<string, string> = {};
    headers.forEach((header, column) => {
      if (header) {
        values[header] = texts[column] ?? '';
      }
    });
    records.push({ row: index + 2, values });
  });

  return { headers, records };
}
