import type { Logger } from "../logger.js";

export const MAX_VISIBLE_COLUMNS = 8;
export const PAGE_SIZE = 10;
export const ROW_NUMBER_WIDTH = 6;
const MAX_CELL_CHARS = 100;
const WIDTH_SAMPLE_ROWS = 50;

/** Ordered `[column, value]` pairs with exactly the header's keys, in header order. */
export type ResultRow = [string, string][];

export interface ResultSet {
  header: string[];
  rows: ResultRow[];
}

export const EMPTY_RESULT: ResultSet = { header: [], rows: [] };

export interface Ingested {
  result: ResultSet;
  /** Rows the backend returned, before the cap. */
  returned: number;
  truncated: boolean;
}

/**
 * Builds a `ResultSet` from positional rows. At most `maxRows` rows are kept;
 * a kept row whose length differs from the header is dropped with a warning.
 */
export function ingest(header: string[], rows: string[][], maxRows: number, logger?: Logger): Ingested {
  const kept: ResultRow[] = [];
  for (const [i, row] of rows.slice(0, maxRows).entries()) {
    if (row.length !== header.length) {
      logger?.warn(`Dropping result row ${i + 1}: ${row.length} values for ${header.length} columns`);
      continue;
    }
    kept.push(header.map((name, c): [string, string] => [name, row[c] ?? ""]));
  }
  return { result: { header: [...header], rows: kept }, returned: rows.length, truncated: rows.length > maxRows };
}

export function truncationNotice(maxRows: number, returned: number): string {
  return `Results limited to ${maxRows} rows (${returned} returned)`;
}

/**
 * Value of the column at `index`. Headers may repeat (`SELECT a.id, b.id`),
 * so cells are read by position, never by name.
 */
export function cellAt(row: ResultRow, index: number): string | undefined {
  return row[index]?.[1];
}

// ── Cursor ───────────────────────────────────────────────────────────

export interface ResultCursor {
  selectedRow: number;
  rowScroll: number;
  columnScroll: number;
}

export const INITIAL_CURSOR: ResultCursor = { selectedRow: 0, rowScroll: 0, columnScroll: 0 };

export interface Viewport {
  totalRows: number;
  totalColumns: number;
  /** Data rows that fit in the result pane. */
  visibleRows: number;
}

export type CursorMove = "up" | "down" | "pageUp" | "pageDown" | "home" | "end" | "left" | "right";

const clampTo = (n: number, max: number): number => Math.max(0, Math.min(n, Math.max(0, max)));

/** Puts every offset back in range and scrolls so the selected row is visible. */
export function clampCursor(cursor: ResultCursor, view: Viewport): ResultCursor {
  const visible = Math.max(1, view.visibleRows);
  const selectedRow = clampTo(cursor.selectedRow, view.totalRows - 1);
  let rowScroll = cursor.rowScroll;
  if (selectedRow < rowScroll) rowScroll = selectedRow;
  else if (selectedRow >= rowScroll + visible) rowScroll = selectedRow - visible + 1;
  return {
    selectedRow,
    rowScroll: clampTo(rowScroll, view.totalRows - visible),
    columnScroll: clampTo(cursor.columnScroll, view.totalColumns - MAX_VISIBLE_COLUMNS),
  };
}

export function moveCursor(cursor: ResultCursor, move: CursorMove, view: Viewport): ResultCursor {
  const next = { ...cursor };
  switch (move) {
    case "up":
      next.selectedRow -= 1;
      break;
    case "down":
      next.selectedRow += 1;
      break;
    case "pageUp":
      next.selectedRow -= PAGE_SIZE;
      break;
    case "pageDown":
      next.selectedRow += PAGE_SIZE;
      break;
    case "home":
      return { ...INITIAL_CURSOR };
    case "end":
      next.selectedRow = view.totalRows - 1;
      break;
    case "left":
      next.columnScroll -= 1;
      break;
    case "right":
      next.columnScroll += 1;
      break;
  }
  return clampCursor(next, view);
}

// ── Display ──────────────────────────────────────────────────────────

/**
 * Removes control characters other than tab and newline, trims, shows empty
 * cells as `NULL` and cuts long values to 97 characters plus `...`.
 */
export function displayCell(raw: string): string {
  const cleaned = [...raw].filter((ch) => ch === "\t" || ch === "\n" || !/\p{Cc}/u.test(ch)).join("").trim();
  if (cleaned === "") return "NULL";
  const chars = [...cleaned];
  return chars.length > MAX_CELL_CHARS ? `${chars.slice(0, MAX_CELL_CHARS - 3).join("")}...` : cleaned;
}

/**
 * Width per visible column, excluding the row-number column. `offset` is the
 * absolute index of the first visible column.
 */
export function columnWidths(result: ResultSet, offset: number, count: number): number[] {
  const sample = result.rows.slice(0, WIDTH_SAMPLE_ROWS);
  return result.header.slice(offset, offset + count).map((header, i) => {
    const contentWidths = sample.map((row) => Math.min(cellAt(row, offset + i)?.length ?? 4, WIDTH_SAMPLE_ROWS));
    const content = contentWidths.length > 0 ? Math.max(...contentWidths) : header.length;
    const optimal = Math.max(header.length + 2, content + 2);
    return Math.max(Math.min(optimal, 40), 8);
  });
}

export interface WindowRow {
  /** 1-based row number. */
  number: number;
  cells: string[];
  selected: boolean;
}

export interface ResultWindow {
  title: string;
  headers: string[];
  widths: number[];
  rows: WindowRow[];
}

export function resultTitle(result: ResultSet, cursor: ResultCursor, visibleRows: number, shownColumns: number): string {
  const total = result.rows.length;
  const totalColumns = result.header.length;
  if (total <= visibleRows && cursor.columnScroll === 0 && totalColumns <= MAX_VISIBLE_COLUMNS) {
    return `Query Result (${total} rows)`;
  }
  const rowInfo =
    total > visibleRows ? `Rows ${Math.min(cursor.rowScroll + visibleRows, total)}/${total} - ` : `${total} rows - `;
  const colInfo =
    totalColumns > MAX_VISIBLE_COLUMNS
      ? ` | Cols ${cursor.columnScroll + 1}-${Math.min(cursor.columnScroll + shownColumns, totalColumns)}/${totalColumns}`
      : "";
  return `Query Result (${rowInfo}Row ${Math.min(cursor.selectedRow + 1, total)}/${total}${colInfo})`;
}

/** The slice of `result` the pane shows for `cursor`. */
export function windowResult(result: ResultSet, cursor: ResultCursor, visibleRows: number): ResultWindow {
  const headers = result.header.slice(cursor.columnScroll, cursor.columnScroll + MAX_VISIBLE_COLUMNS);
  const rows = result.rows.slice(cursor.rowScroll, cursor.rowScroll + Math.max(0, visibleRows)).map((row, i) => ({
    number: cursor.rowScroll + i + 1,
    cells: headers.map((_, c) => displayCell(cellAt(row, cursor.columnScroll + c) ?? "")),
    selected: cursor.rowScroll + i === cursor.selectedRow,
  }));
  return {
    title: resultTitle(result, cursor, visibleRows, headers.length),
    headers,
    widths: [ROW_NUMBER_WIDTH, ...columnWidths(result, cursor.columnScroll, headers.length)],
    rows,
  };
}

// ── Clipboard text ───────────────────────────────────────────────────

function tsv(header: string[], rows: ResultRow[]): string {
  let out = `${header.join("\t")}\n`;
  for (const row of rows) {
    out += `${header.map((_, c) => cellAt(row, c) ?? "NULL").join("\t")}\n`;
  }
  return out;
}

/** Header plus the row at `index`, untruncated. Empty when there is no data. */
export function copySelectedText(result: ResultSet, index: number): string {
  if (result.rows.length === 0) return "";
  const row = result.rows[index];
  return tsv(result.header, row ? [row] : []);
}

export function copyAllText(result: ResultSet): string {
  if (result.rows.length === 0) return "";
  return tsv(result.header, result.rows);
}
