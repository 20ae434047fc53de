export type Screen = "DbTypeSelection" | "ConnectionInput" | "DatabaseSelection" | "TableView" | "MessagePopup";

export type ScreenEvent =
  | "backendChosen"
  | "unsupportedBackendChosen"
  | "connected"
  | "cancel"
  | "databaseOpened"
  | "backToDatabases"
  | "dismiss";

const TRANSITIONS: Record<Screen, Partial<Record<ScreenEvent, Screen>>> = {
  DbTypeSelection: { backendChosen: "ConnectionInput", unsupportedBackendChosen: "MessagePopup" },
  ConnectionInput: { connected: "DatabaseSelection", cancel: "DbTypeSelection" },
  DatabaseSelection: { databaseOpened: "TableView" },
  TableView: { backToDatabases: "DatabaseSelection" },
  MessagePopup: { dismiss: "DbTypeSelection" },
};

/** Next screen for `event`; pairs missing from the table keep the current screen. */
export function transition(screen: Screen, event: ScreenEvent): Screen {
  return TRANSITIONS[screen][event] ?? screen;
}

export type FocusedWidget = "TablesList" | "SqlEditor" | "QueryResult";

const FOCUS_ORDER: FocusedWidget[] = ["TablesList", "SqlEditor", "QueryResult"];

export function nextFocus(focus: FocusedWidget): FocusedWidget {
  return FOCUS_ORDER[(FOCUS_ORDER.indexOf(focus) + 1) % FOCUS_ORDER.length] ?? "TablesList";
}
