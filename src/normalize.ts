export type Row = string[];

const isBlank = (value: string | undefined): boolean =>
  (value ?? "").trim() === "";

const maxWidth = (rows: Row[]): number =>
  rows.reduce((width, row) => Math.max(width, row.length), 0);

/**
 * Removes columns that hold no visible text in any row, such as the icon
 * column of a server-generated directory index. Missing cells count as empty.
 */
export function trimEmptyColumns(rows: Row[]): Row[] {
  const width = maxWidth(rows);
  const kept: number[] = [];
  for (let column = 0; column < width; column++) {
    if (rows.some((row) => !isBlank(row[column]))) {
      kept.push(column);
    }
  }
  return rows.map((row) => kept.map((column) => row[column] ?? ""));
}

export function dropEmptyRows(rows: Row[]): Row[] {
  return rows.filter((row) => row.some((value) => !isBlank(value)));
}

export const padRow = (row: Row, width: number): Row =>
  row.length < width
    ? [...row, ...Array.from({ length: width - row.length }, () => "")]
    : [...row];

export function normalizeWidth(rows: Row[]): Row[] {
  const width = maxWidth(rows);
  return rows.map((row) => padRow(row, width));
}

/** Trims empty columns, drops empty rows, then pads to a rectangle. */
export function normalizeRows(rows: Row[]): Row[] {
  return normalizeWidth(dropEmptyRows(trimEmptyColumns(rows)));
}
