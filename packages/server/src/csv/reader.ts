// ============================================================================
// CSV Reader — telemetry file text → raw table
// ============================================================================
import type { RawRow, RawTable } from '@missionreplay/shared';

// Splits text into records of trimmed cells. Double quotes may wrap commas and
// line breaks; "" inside quotes is a literal quote.
export function parseCsvRecords(text: string): string[][] {
  const records: string[][] = [];
  let cells: string[] = [];
  let cell = '';
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') { cell += '"'; i++; }
        else quoted = false;
      } else {
        cell += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      cells.push(cell.trim());
      cell = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      cells.push(cell.trim());
      records.push(cells);
      cells = [];
      cell = '';
    } else {
      cell += ch;
    }
  }
  cells.push(cell.trim());
  records.push(cells);
  return records;
}

function isBlank(record: string[]): boolean {
  return record.length === 1 && record[0] === '';
}

export function readCsv(text: string): RawTable {
  const records = parseCsvRecords(text.replace(/^\uFEFF/, '')).filter(r => !isBlank(r));
  if (records.length === 0) return { columns: [], rows: [] };

  const [columns, ...body] = records;
  const rows: RawRow[] = body.map(cells => {
    const row: RawRow = {};
    columns.forEach((col, idx) => { row[col] = cells[idx] ?? ''; });
    return row;
  });

  return { columns, rows };
}
