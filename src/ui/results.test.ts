import { describe, expect, it } from "vitest";
import { createLogger } from "../logger.js";
import {
  INITIAL_CURSOR,
  MAX_VISIBLE_COLUMNS,
  clampCursor,
  columnWidths,
  copyAllText,
  copySelectedText,
  displayCell,
  ingest,
  moveCursor,
  resultTitle,
  truncationNotice,
  windowResult,
  type CursorMove,
  type ResultSet,
  type Viewport,
} from "./results.js";

function numbered(count: number, columns = 2): { header: string[]; rows: string[][] } {
  const header = Array.from({ length: columns }, (_, c) => `c${c}`);
  const rows = Array.from({ length: count }, (_, r) => header.map((_, c) => `r${r}c${c}`));
  return { header, rows };
}

describe("ingest", () => {
  it("keeps header keys in header order", () => {
    const { result } = ingest(["id", "name"], [["1", "alice"]], 1000);
    expect(result).toEqual({ header: ["id", "name"], rows: [[["id", "1"], ["name", "alice"]]] });
  });

  it("caps rows and reports the truncation", () => {
    const { header, rows } = numbered(1500);
    const ingested = ingest(header, rows, 1000);
    expect(ingested.result.rows).toHaveLength(1000);
    expect(ingested.returned).toBe(1500);
    expect(ingested.truncated).toBe(true);
    expect(truncationNotice(1000, ingested.returned)).toBe("Results limited to 1000 rows (1500 returned)");
  });

  it("drops rows whose width differs from the header", () => {
    const lines: string[] = [];
    const logger = createLogger("warn", (line) => lines.push(line), () => new Date(0));
    const { result, truncated } = ingest(["a", "b"], [["1", "2"], ["3"], ["4", "5"]], 10, logger);
    expect(result.rows.map((row) => row.map(([, v]) => v))).toEqual([
      ["1", "2"],
      ["4", "5"],
    ]);
    expect(truncated).toBe(false);
    expect(lines).toEqual(["1970-01-01T00:00:00.000Z WARN Dropping result row 2: 1 values for 2 columns\n"]);
  });
});

describe("cursor movement", () => {
  const view: Viewport = { totalRows: 25, totalColumns: 12, visibleRows: 10 };

  it("steps, pages and jumps", () => {
    let cursor = moveCursor(INITIAL_CURSOR, "pageDown", view);
    expect(cursor).toEqual({ selectedRow: 10, rowScroll: 1, columnScroll: 0 });
    cursor = moveCursor(cursor, "end", view);
    expect(cursor).toEqual({ selectedRow: 24, rowScroll: 15, columnScroll: 0 });
    cursor = moveCursor(cursor, "pageUp", view);
    expect(cursor).toEqual({ selectedRow: 14, rowScroll: 14, columnScroll: 0 });
    cursor = moveCursor(cursor, "right", view);
    expect(cursor.columnScroll).toBe(1);
    expect(moveCursor(cursor, "home", view)).toEqual(INITIAL_CURSOR);
  });

  it("limits column scroll to the columns beyond the visible eight", () => {
    let cursor = INITIAL_CURSOR;
    for (let i = 0; i < 10; i++) cursor = moveCursor(cursor, "right", view);
    expect(cursor.columnScroll).toBe(12 - MAX_VISIBLE_COLUMNS);
    cursor = moveCursor(cursor, "left", { ...view, totalColumns: 3 });
    expect(cursor.columnScroll).toBe(0);
  });

  it("stays at zero on an empty result", () => {
    const empty: Viewport = { totalRows: 0, totalColumns: 0, visibleRows: 10 };
    expect(moveCursor(INITIAL_CURSOR, "down", empty)).toEqual(INITIAL_CURSOR);
    expect(moveCursor(INITIAL_CURSOR, "end", empty)).toEqual(INITIAL_CURSOR);
  });

  it("keeps every offset in bounds under arbitrary moves", () => {
    const moves: CursorMove[] = ["up", "down", "pageUp", "pageDown", "home", "end", "left", "right"];
    let seed = 11;
    let cursor = INITIAL_CURSOR;
    for (let i = 0; i < 2000; i++) {
      seed = (seed * 1103515245 + 12345) % 2147483648;
      const visibleRows = 1 + (seed % 15);
      const current: Viewport = { ...view, visibleRows };
      cursor = moveCursor(cursor, moves[seed % moves.length] ?? "down", current);
      expect(cursor.selectedRow).toBeGreaterThanOrEqual(0);
      expect(cursor.selectedRow).toBeLessThanOrEqual(view.totalRows - 1);
      expect(cursor.rowScroll).toBeGreaterThanOrEqual(0);
      expect(cursor.rowScroll).toBeLessThanOrEqual(Math.max(0, view.totalRows - visibleRows));
      expect(cursor.selectedRow).toBeGreaterThanOrEqual(cursor.rowScroll);
      expect(cursor.selectedRow).toBeLessThan(cursor.rowScroll + visibleRows);
      expect(cursor.columnScroll).toBeLessThanOrEqual(view.totalColumns - MAX_VISIBLE_COLUMNS);
    }
  });

  it("pulls offsets back after the viewport shrinks", () => {
    const cursor = clampCursor({ selectedRow: 24, rowScroll: 20, columnScroll: 9 }, view);
    expect(cursor).toEqual({ selectedRow: 24, rowScroll: 15, columnScroll: 4 });
  });
});

describe("displayCell", () => {
  it("cleans and shortens values", () => {
    expect(displayCell("  a\u0007b  ")).toBe("ab");
    expect(displayCell("a\tb")).toBe("a\tb");
    expect(displayCell("")).toBe("NULL");
    expect(displayCell("x".repeat(101))).toBe(`${"x".repeat(97)}...`);
    expect(displayCell("x".repeat(100))).toBe("x".repeat(100));
  });
});

describe("columnWidths", () => {
  it("fits headers and content between 8 and 40", () => {
    const result: ResultSet = {
      header: ["id", "description", "n"],
      rows: [
        [
          ["id", "1"],
          ["description", "y".repeat(60)],
          ["n", "12345678"],
        ],
      ],
    };
    expect(columnWidths(result, 0, 3)).toEqual([8, 40, 10]);
    expect(columnWidths(result, 1, 2)).toEqual([40, 10]);
  });
});

describe("windowing", () => {
  it("shows the plain title when everything fits", () => {
    const { header, rows } = numbered(3);
    const { result } = ingest(header, rows, 1000);
    const view = windowResult(result, INITIAL_CURSOR, 10);
    expect(view.title).toBe("Query Result (3 rows)");
    expect(view.headers).toEqual(["c0", "c1"]);
    expect(view.rows.map((r) => [r.number, r.selected])).toEqual([
      [1, true],
      [2, false],
      [3, false],
    ]);
  });

  it("describes the position once rows or columns overflow", () => {
    const { header, rows } = numbered(30, 10);
    const { result } = ingest(header, rows, 1000);
    const cursor = { selectedRow: 12, rowScroll: 5, columnScroll: 2 };
    const view = windowResult(result, cursor, 10);
    expect(view.title).toBe("Query Result (Rows 15/30 - Row 13/30 | Cols 3-10/10)");
    expect(view.headers).toEqual(["c2", "c3", "c4", "c5", "c6", "c7", "c8", "c9"]);
    expect(view.rows[0]?.cells[0]).toBe("r5c2");
    expect(view.rows[7]?.selected).toBe(true);
    expect(view.widths[0]).toBe(6);
  });

  it("titles a narrow overflow by row count", () => {
    const { header, rows } = numbered(4, 9);
    const { result } = ingest(header, rows, 1000);
    expect(resultTitle(result, INITIAL_CURSOR, 10, 8)).toBe("Query Result (4 rows - Row 1/4 | Cols 1-8/9)");
  });
});

describe("repeated column names", () => {
  const { result } = ingest(["id", "id", "name"], [["1", "2", "alice"]], 1000);

  it("shows each cell under its own header", () => {
    const view = windowResult(result, INITIAL_CURSOR, 10);
    expect(view.headers).toEqual(["id", "id", "name"]);
    expect(view.rows[0]?.cells).toEqual(["1", "2", "alice"]);
  });

  it("reads scrolled columns by position", () => {
    const view = windowResult(result, { ...INITIAL_CURSOR, columnScroll: 1 }, 10);
    expect(view.rows[0]?.cells).toEqual(["2", "alice"]);
  });

  it("copies every cell", () => {
    expect(copyAllText(result)).toBe("id\tid\tname\n1\t2\talice\n");
    expect(copySelectedText(result, 0)).toBe("id\tid\tname\n1\t2\talice\n");
  });
});

describe("clipboard text", () => {
  const result: ResultSet = {
    header: ["id", "note"],
    rows: [
      [
        ["id", "1"],
        ["note", "first"],
      ],
      [
        ["id", "2"],
        ["note", "x".repeat(120)],
      ],
    ],
  };

  it("copies the header and the selected row untruncated", () => {
    expect(copySelectedText(result, 1)).toBe(`id\tnote\n2\t${"x".repeat(120)}\n`);
  });

  it("copies every row", () => {
    expect(copyAllText(result)).toBe(`id\tnote\n1\tfirst\n2\t${"x".repeat(120)}\n`);
  });

  it("copies nothing from an empty result", () => {
    expect(copyAllText({ header: ["id"], rows: [] })).toBe("");
    expect(copySelectedText({ header: ["id"], rows: [] }, 0)).toBe("");
  });
});
