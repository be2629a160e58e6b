export type CsvCell = string | number | boolean | null | undefined;

export interface CsvTable {
  header: string[];
  rows: Record<string, string>[];
}

const needsQuoting = (value: string) => /[",\r\n]/.test(value) || value !== value.trim();

export function formatCsvCell(value: CsvCell): string {
  if (value === null || value === undefined) return '';
  const text = String(value);
  return needsQuoting(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(header: string[], rows: Record<string, CsvCell>[]): string {
  const lines = [header.map(formatCsvCell).join(',')];
  for (const row of rows) {
    lines.push(header.map(column => formatCsvCell(row[column])).join(','));
  }
  return lines.join('\n') + '\n';
}

// RFC 4180 record splitter: quoted fields may hold commas, doubled quotes and newlines
function splitRecords(text: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let inQuotes = false;

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
    if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      record.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      record.push(field);
      records.push(record);
      record = [];
      field = '';
    } else {
      field += ch;
    }
  }
  if (field !== '' || record.length > 0) {
    record.push(field);
    records.push(record);
  }
  return records.filter(r => !(r.length === 1 && r[0] === ''));
}

export function parseCsv(text: string): CsvTable {
  const records = splitRecords(text.replace(/^\uFEFF/, ''));
  if (records.length === 0) return { header: [], rows: [] };

  const header = records[0].map(h => h.trim());
  const rows = records.slice(1).map(values => {
    const row: Record<string, string> = {};
    header.forEach((column, idx) => {
      row[column] = values[idx] ?? '';
    });
    return row;
  });
  return { header, rows };
}
