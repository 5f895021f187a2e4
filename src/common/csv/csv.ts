/** RFC 4180 quoting: a field with a separator, quote or line break is quoted, inner quotes doubled. */
export function escapeCsvField(value: string): string {
  if (
    value.includes('"') ||
    value.includes(',') ||
    value.includes('\n') ||
    value.includes('\r')
  ) {
    return '"' + value.replace(/"/g, '""') + '"';
  }
  return value;
}

export function toCsv<C extends string>(
  columns: readonly C[],
  rows: ReadonlyArray<Readonly<Record<C, string>>>,
): string {
  const lines = [columns.map(escapeCsvField).join(',')];
  for (const row of rows) {
    lines.push(columns.map((col) => escapeCsvField(row[col] ?? '')).join(','));
  }
  return lines.join('\r\n') + '\r\n';
}

/** Splits RFC 4180 text into records of raw field values. */
export function parseCsvRecords(text: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"' && text[i + 1] === '"') {
        field += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
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

  return records.filter((r) => !(r.length === 1 && r[0] === ''));
}

export interface CsvTable {
  header: string[];
  rows: Record<string, string>[];
}

/** Parses CSV with a header line; rows are keyed by the trimmed header names. */
export function parseCsvTable(text: string): CsvTable {
  const [first, ...body] = parseCsvRecords(text);
  const header = (first ?? []).map((h) => h.trim());
  return {
    header,
    rows: body.map((values) =>
      Object.fromEntries(header.map((col, i) => [col, values[i] ?? ''])),
    ),
  };
}

export function parseCsv(text: string): Record<string, string>[] {
  return parseCsvTable(text).rows;
}
