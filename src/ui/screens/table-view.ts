import { isPrintable, type KeyEvent } from "../../terminal/keys.js";
import type { DatabaseClientUI } from "../client-ui.js";
import { box, fitLine, hjoin, seg, split, wrapText, type Frame, type Line } from "../frame.js";
import { windowResult, type ResultWindow } from "../results.js";
import { helpLine, type ScreenController } from "./controller.js";

/** Lines a result table uses above its rows: header and a spacer. */
const RESULT_HEADER_LINES = 2;

const HELP = helpLine(
  "Tab",
  " - navigate, ",
  "F5/Ctrl+E",
  " - execute, ",
  "Ctrl+C",
  " - copy row, ",
  "Ctrl+A",
  " - copy all, ",
  "F12",
  " - debug, ",
  "F1",
  " - databases, ",
  "Esc",
  " - quit",
);

function tablesPanel(ui: DatabaseClientUI, width: number, height: number): Line[] {
  ui.setTablesViewport(height - 2);
  const focused = ui.focus === "TablesList";
  const title = `Tables (${ui.tables.length === 0 ? 0 : ui.selectedTable + 1}/${ui.tables.length})`;
  const body: Line[] = [];
  if (ui.tables.length === 0) body.push([seg("No tables found", "muted")]);
  for (const [i, name] of ui.tables.slice(ui.tablesScroll).entries()) {
    const index = ui.tablesScroll + i;
    const expanded = ui.expandedTable === name;
    const label = `${expanded ? "▾" : "▸"} ${name}`;
    body.push(index === ui.selectedTable ? [seg(label.padEnd(width - 2), focused ? "selected" : "focus")] : [seg(label)]);
    if (!expanded) continue;
    for (const column of ui.tableSchemas.get(name)?.columns ?? []) {
      body.push([seg(`  ├─ ${column.name}`, "muted"), ...(column.dataType ? [seg(`: ${column.dataType}`, "muted")] : [])]);
    }
  }
  return box(title, body, width, height, { focused });
}

function editorPanel(ui: DatabaseClientUI, width: number, height: number): { lines: Line[]; cursor?: { x: number; y: number } } {
  const inner = height - 2;
  ui.editor.followCursor(inner);
  const body = ui.editor
    .getLines()
    .slice(ui.editor.scroll, ui.editor.scroll + inner)
    .map((text) => [seg(text)]);
  const focused = ui.focus === "SqlEditor";
  const lines = box("SQL Query", body, width, height, { focused });
  if (!focused || inner < 1) return { lines };
  const { x, y } = ui.editor.cursor;
  return { lines, cursor: { x: 1 + Math.min(x, width - 3), y: 1 + y - ui.editor.scroll } };
}

function tableLines(view: ResultWindow, highlight: boolean): Line[] {
  const row = (cells: string[]) => cells.map((cell, i) => cell.padEnd(view.widths[i] ?? 0)).join(" ");
  const lines: Line[] = [[seg(row(["#", ...view.headers]), "header")], []];
  for (const r of view.rows) {
    const text = row([String(r.number), ...r.cells]);
    lines.push([seg(text, r.selected && highlight ? "selected" : undefined)]);
  }
  return lines;
}

function resultPanel(ui: DatabaseClientUI, width: number, height: number): Line[] {
  ui.setResultViewport(height - 2 - RESULT_HEADER_LINES);
  const focused = ui.focus === "QueryResult";
  const inner = width - 2;

  if (ui.resultPaneMode === "debug") {
    const title = `Debug Info (${ui.debug.size} messages)`;
    if (ui.debug.size === 0) return box(title, [[seg("No debug information available", "muted")]], width, height, { focused });
    const view = windowResult(ui.activeResult(), ui.activeCursor(), ui.resultVisibleRows);
    return box(title, tableLines(view, focused), width, height, { focused });
  }

  if (ui.resultError !== null) {
    const body = wrapText(ui.resultError, inner).map((l) => [seg(l, "error")]);
    return box("Query Result", body, width, height, { focused });
  }
  if (ui.result.header.length === 0) {
    const body = ui.resultMessage ? wrapText(ui.resultMessage, inner).map((l) => [seg(l, "success")]) : [];
    return box("Query Result", body, width, height, { focused });
  }
  const view = windowResult(ui.result, ui.cursor, ui.resultVisibleRows);
  const title = ui.resultMessage ? `${view.title} - ${ui.resultMessage}` : view.title;
  return box(title, tableLines(view, focused), width, height, { focused });
}

async function handleFocusedKey(ui: DatabaseClientUI, event: KeyEvent): Promise<void> {
  switch (ui.focus) {
    case "TablesList":
      if (event.key === "ArrowUp") ui.moveTableSelection(-1);
      else if (event.key === "ArrowDown") ui.moveTableSelection(1);
      else if (event.key === "Enter") await ui.toggleTable();
      return;
    case "SqlEditor":
      editorKey(ui, event);
      return;
    case "QueryResult":
      await resultKey(ui, event);
      return;
  }
}

function editorKey(ui: DatabaseClientUI, event: KeyEvent): void {
  const editor = ui.editor;
  switch (event.key) {
    case "ArrowUp":
      editor.up();
      return;
    case "ArrowDown":
      editor.down();
      return;
    case "ArrowLeft":
      editor.left();
      return;
    case "ArrowRight":
      editor.right();
      return;
    case "Home":
      editor.home();
      return;
    case "End":
      editor.end();
      return;
    case "Enter":
      editor.newline();
      return;
    case "Backspace":
      editor.backspace();
      return;
    case "Delete":
      editor.delete();
      return;
  }
  if (isPrintable(event)) editor.insert(event.key);
}

async function resultKey(ui: DatabaseClientUI, event: KeyEvent): Promise<void> {
  if (event.ctrl && event.key === "c") return ui.copySelectedRow();
  if (event.ctrl && event.key === "a") return ui.copyAllRows();
  switch (event.key) {
    case "ArrowUp":
      ui.moveResult("up");
      break;
    case "ArrowDown":
      ui.moveResult("down");
      break;
    case "ArrowLeft":
      ui.moveResult("left");
      break;
    case "ArrowRight":
      ui.moveResult("right");
      break;
    case "PageUp":
      ui.moveResult("pageUp");
      break;
    case "PageDown":
      ui.moveResult("pageDown");
      break;
    case "Home":
      ui.moveResult("home");
      break;
    case "End":
      ui.moveResult("end");
      break;
  }
}

export const tableView: ScreenController = {
  render(ui, width, height): Frame {
    const [mainHeight = 0, footerHeight = 0] = split(height, [95, 5]);
    const [leftWidth = 0, rightWidth = 0] = split(width, [30, 70]);
    const [editorHeight = 0, resultHeight = 0] = split(mainHeight, [50, 50]);

    const editor = editorPanel(ui, rightWidth, editorHeight);
    const right = [...editor.lines, ...resultPanel(ui, rightWidth, resultHeight)];
    const main = hjoin(tablesPanel(ui, leftWidth, mainHeight), right);

    const status = ui.statusMessage;
    const footer = Array.from({ length: footerHeight }, (_, i) =>
      fitLine(i > 0 ? [] : status ? [seg(status, "focus")] : HELP, width),
    );
    const frame: Frame = { lines: [...main.map((l) => fitLine(l, width)), ...footer] };
    if (editor.cursor) frame.cursor = { x: leftWidth + editor.cursor.x, y: editor.cursor.y };
    return frame;
  },

  async handleKey(ui, event) {
    if (event.ctrl && event.key === "e") return ui.executeSql();
    switch (event.key) {
      case "F1":
        ui.backToDatabases();
        return;
      case "Escape":
        ui.quit();
        return;
      case "Tab":
        ui.cycleFocus();
        return;
      case "F5":
        return ui.executeSql();
      case "F12":
        ui.toggleDebug();
        return;
    }
    await handleFocusedKey(ui, event);
  },
};
