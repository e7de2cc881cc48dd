/**
 * CSV rows for chunk bodies: comma-delimited, minimal quoting with doubled
 * quotes, rows terminated by \r\n.
 */

export const ROW_TERMINATOR = '\r\n';

const NEEDS_QUOTING = /[",\r\n]/;

export function formatCsvCell(cell: string): string {
  return NEEDS_QUOTING.test(cell) ? `"${cell.replace(/"/g, '""')}"` : cell;
}

export function formatCsvRow(cells: readonly string[]): string {
  return cells.map(formatCsvCell).join(',') + ROW_TERMINATOR;
}

/**
 * Split CSV text into rows of cells. Accepts \r\n or \n row ends; quoted
 * cells may span lines.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = '';
  let quoted = false;
  let i = 0;

  const endRow = (): void => {
    row.push(cell);
    rows.push(row);
    row = [];
    cell = '';
  };

  while (i < text.length) {
    const ch = text[i];

    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          cell += '"';
          i += 2;
          continue;
        }
        quoted = false;
      } else {
        cell += ch;
      }
      i++;
      continue;
    }

    if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      row.push(cell);
      cell = '';
    } else if (ch === '\r' && text[i + 1] === '\n') {
      endRow();
      i++;
    } else if (ch === '\n') {
      endRow();
    } else {
      cell += ch;
    }
    i++;
  }

  if (cell.length > 0 || row.length > 0) {
    endRow();
  }

  return rows;
}
