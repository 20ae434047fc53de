import type { KeyEvent } from "../../terminal/keys.js";
import type { DatabaseClientUI } from "../client-ui.js";
import type { Frame } from "../frame.js";
import type { Screen } from "../fsm.js";
import { connectionInput } from "./connection-input.js";
import type { ScreenController } from "./controller.js";
import { databaseSelection } from "./database-selection.js";
import { dbTypeSelection } from "./db-type-selection.js";
import { messagePopup } from "./message-popup.js";
import { tableView } from "./table-view.js";

export const controllers: Record<Screen, ScreenController> = {
  DbTypeSelection: dbTypeSelection,
  ConnectionInput: connectionInput,
  DatabaseSelection: databaseSelection,
  TableView: tableView,
  MessagePopup: messagePopup,
};

/**
 * Routes one key to the current screen. The status line only survives until
 * the next key. Ctrl+C quits everywhere except the focused result pane, where
 * it copies.
 */
export async function dispatchKey(ui: DatabaseClientUI, event: KeyEvent): Promise<void> {
  ui.statusMessage = null;
  const copies = ui.screen === "TableView" && ui.focus === "QueryResult";
  if (event.ctrl && event.key === "c" && !copies) {
    ui.quit();
    return;
  }
  await controllers[ui.screen].handleKey(ui, event);
}

export function renderScreen(ui: DatabaseClientUI, width: number, height: number): Frame {
  return controllers[ui.screen].render(ui, width, height);
}
