import type { Clipboard } from "../clipboard.js";
import type { AppConfig } from "../config.js";
import type { BackendKind, DbClient, TableSchema } from "../drivers/base.js";
import { FetchTimeoutError, UnsupportedOperationError, errorMessage } from "../errors.js";
import { withTimeout } from "../lock.js";
import type { Logger } from "../logger.js";
import type { ConnectionRegistry } from "../registry.js";
import {
  DEFAULT_DATABASE,
  UNSUPPORTED_BACKEND_MESSAGE,
  connectionUrl,
  emptyConnectionInput,
  requireServerBackend,
  type ConnectionInput,
  type ServerBackend,
} from "./connection-form.js";
import { DebugLog } from "./debug-log.js";
import { SqlEditor, classifyStatement } from "./editor.js";
import { nextFocus, transition, type FocusedWidget, type Screen, type ScreenEvent } from "./fsm.js";
import {
  EMPTY_RESULT,
  INITIAL_CURSOR,
  clampCursor,
  copyAllText,
  copySelectedText,
  ingest,
  moveCursor,
  truncationNotice,
  type CursorMove,
  type ResultCursor,
  type ResultSet,
  type Viewport,
} from "./results.js";

export interface BackendChoice {
  label: string;
  kind: BackendKind;
}

export const BACKEND_CHOICES: readonly BackendChoice[] = [
  { label: "Postgres", kind: "postgres" },
  { label: "MySQL", kind: "mysql" },
  { label: "SQLite", kind: "sqlite" },
];
export const NON_SELECT_SUCCESS = "Non-SELECT query executed successfully.";
/** Rows shown at once in the database list. */
export const DATABASE_LIST_HEIGHT = 20;

export interface ClientUIDeps {
  registry: ConnectionRegistry;
  config: AppConfig;
  logger: Logger;
  clipboard: Clipboard;
}

export type ResultPaneMode = "result" | "debug";

/**
 * All mutable state of one interactive session plus the operations the
 * screen controllers call. Nothing here touches the terminal.
 */
export class DatabaseClientUI {
  screen: Screen = "DbTypeSelection";
  exitRequested = false;
  /** Shown once in the footer, cleared by the next key. */
  statusMessage: string | null = null;

  selectedDbType = 0;
  backend: BackendKind = "postgres";
  connectionInput: ConnectionInput;
  connectionError: string | null = null;
  popupMessage = UNSUPPORTED_BACKEND_MESSAGE;
  /** Set when the session was opened on a SQLite file. */
  sqliteFile: string | null = null;

  databases: string[] = [];
  selectedDatabase = 0;
  databasesScroll = 0;
  currentDatabase: string | null = null;
  needsDbRefresh = false;

  tables: string[] = [];
  selectedTable = 0;
  tablesScroll = 0;
  tablesVisibleRows = 20;
  expandedTable: string | null = null;
  readonly tableSchemas = new Map<string, TableSchema>();
  needsTablesRefresh = false;

  focus: FocusedWidget = "TablesList";
  readonly editor = new SqlEditor();
  result: ResultSet = EMPTY_RESULT;
  cursor: ResultCursor = { ...INITIAL_CURSOR };
  resultVisibleRows = 10;
  resultMessage: string | null = null;
  resultError: string | null = null;
  resultPaneMode: ResultPaneMode = "result";
  debugCursor: ResultCursor = { ...INITIAL_CURSOR };
  readonly debug: DebugLog;

  private readonly registry: ConnectionRegistry;
  private readonly config: AppConfig;
  private readonly logger: Logger;
  private readonly clipboard: Clipboard;

  constructor(deps: ClientUIDeps) {
    this.registry = deps.registry;
    this.config = deps.config;
    this.logger = deps.logger;
    this.clipboard = deps.clipboard;
    this.debug = new DebugLog(deps.config.debugHistory);
    this.connectionInput = emptyConnectionInput(deps.config.defaults);
  }

  fire(event: ScreenEvent): void {
    const next = transition(this.screen, event);
    if (next !== this.screen) this.logger.debug(`Screen ${this.screen} -> ${next} (${event})`);
    this.screen = next;
  }

  quit(): void {
    this.exitRequested = true;
  }

  note(message: string): void {
    this.debug.add(message);
    this.logger.debug(message);
  }

  // ── Backend choice and connection ───────────────────────────────────

  moveDbType(delta: number): void {
    this.selectedDbType = Math.max(0, Math.min(this.selectedDbType + delta, BACKEND_CHOICES.length - 1));
  }

  chooseBackend(): void {
    const choice = BACKEND_CHOICES[this.selectedDbType];
    if (!choice) return;
    try {
      this.backend = requireServerBackend(choice.kind);
    } catch (e) {
      if (!(e instanceof UnsupportedOperationError)) throw e;
      this.popupMessage = e.message;
      this.fire("unsupportedBackendChosen");
      return;
    }
    this.connectionError = null;
    this.fire("backendChosen");
  }

  /** Connects to the backend's default database using the form values. */
  async connectToDefaultDb(): Promise<void> {
    let kind: ServerBackend;
    try {
      kind = requireServerBackend(this.backend);
    } catch (e) {
      this.connectionError = errorMessage(e);
      return;
    }
    const database = DEFAULT_DATABASE[kind];
    try {
      await this.registry.connect(kind, connectionUrl(kind, this.connectionInput, database));
    } catch (e) {
      this.connectionError = errorMessage(e);
      this.logger.error(`Connection failed: ${this.connectionError}`);
      return;
    }
    this.connectionError = null;
    this.currentDatabase = database;
    this.resetDatabaseState();
    this.needsDbRefresh = true;
    this.note(`Connected to ${kind} database ${database}`);
    this.fire("connected");
  }

  /** Reconnects scoped to `name`, or to the selected database when omitted. */
  async connectToSelectedDb(name = this.databases[this.selectedDatabase]): Promise<void> {
    if (name === undefined) return;
    const kind = this.backend;
    const url = kind === "sqlite" ? (this.sqliteFile ?? ":memory:") : connectionUrl(kind, this.connectionInput, name);
    try {
      await this.registry.connect(kind, url);
    } catch (e) {
      const message = `Failed to connect to ${name}: ${errorMessage(e)}`;
      this.statusMessage = message;
      this.logger.error(message);
      return;
    }
    this.currentDatabase = name;
    this.resetTableState();
    this.needsTablesRefresh = true;
    this.note(`Opened database ${name}: ${await this.registry.status()}`);
    this.fire("databaseOpened");
  }

  /** Opens a SQLite file directly and lands on the database list. */
  async openSqliteFile(path: string): Promise<void> {
    await this.registry.connect("sqlite", path);
    this.backend = "sqlite";
    this.sqliteFile = path;
    this.selectedDbType = BACKEND_CHOICES.findIndex((c) => c.kind === "sqlite");
    this.resetDatabaseState();
    this.needsDbRefresh = true;
    this.screen = "DatabaseSelection";
    this.note(`Opened SQLite file ${path}`);
  }

  cancelConnectionInput(): void {
    this.connectionError = null;
    this.fire("cancel");
  }

  private resetDatabaseState(): void {
    this.databases = [];
    this.selectedDatabase = 0;
    this.databasesScroll = 0;
    this.resetTableState();
  }

  private resetTableState(): void {
    this.tables = [];
    this.selectedTable = 0;
    this.tablesScroll = 0;
    this.expandedTable = null;
    this.tableSchemas.clear();
  }

  // ── Lazy list refresh ───────────────────────────────────────────────

  /** Runs the fetch a dirty screen needs before it is drawn. */
  async prepareScreen(): Promise<void> {
    if (this.screen === "DatabaseSelection" && this.needsDbRefresh) {
      const list = await this.fetchList("databases", (c) => c.listDatabases());
      this.databases = list ?? [];
      this.needsDbRefresh = list === null;
      this.selectedDatabase = Math.max(0, Math.min(this.selectedDatabase, this.databases.length - 1));
      this.databasesScroll = Math.min(this.databasesScroll, this.selectedDatabase);
    } else if (this.screen === "TableView" && this.needsTablesRefresh) {
      const list = await this.fetchList("tables", (c) => c.listTables());
      this.tables = list ?? [];
      this.needsTablesRefresh = list === null;
      this.selectedTable = Math.max(0, Math.min(this.selectedTable, this.tables.length - 1));
      this.tablesScroll = Math.min(this.tablesScroll, this.selectedTable);
      if (this.expandedTable !== null && !this.tables.includes(this.expandedTable)) this.expandedTable = null;
    }
  }

  private async fetchList(label: string, fetch: (client: DbClient) => Promise<string[]>): Promise<string[] | null> {
    try {
      return await withTimeout(this.registry.use(fetch), this.config.fetchTimeoutMs, label, (outcome) =>
        this.logger.debug(
          "value" in outcome
            ? `Discarded late ${label} result (${outcome.value.length} entries)`
            : `Discarded late ${label} failure: ${errorMessage(outcome.error)}`,
        ),
      );
    } catch (e) {
      const message = e instanceof FetchTimeoutError ? e.message : `Error fetching ${label}: ${errorMessage(e)}`;
      this.statusMessage = message;
      this.logger.error(message);
      this.debug.add(message);
      return null;
    }
  }

  // ── Lists ───────────────────────────────────────────────────────────

  moveDatabaseSelection(delta: number): void {
    if (this.databases.length === 0) return;
    this.selectedDatabase = Math.max(0, Math.min(this.selectedDatabase + delta, this.databases.length - 1));
    this.databasesScroll = follow(this.selectedDatabase, this.databasesScroll, DATABASE_LIST_HEIGHT);
  }

  moveTableSelection(delta: number): void {
    if (this.tables.length === 0) return;
    this.selectedTable = Math.max(0, Math.min(this.selectedTable + delta, this.tables.length - 1));
    this.tablesScroll = follow(this.selectedTable, this.tablesScroll, this.tablesVisibleRows);
  }

  setTablesViewport(rows: number): void {
    this.tablesVisibleRows = Math.max(1, rows);
    this.tablesScroll = follow(this.selectedTable, this.tablesScroll, this.tablesVisibleRows);
  }

  /**
   * Expands the selected table, describing it on first use, or collapses it
   * when it is already expanded.
   */
  async toggleTable(): Promise<void> {
    const table = this.tables[this.selectedTable];
    if (table === undefined) {
      this.logger.warn("No tables available.");
      return;
    }
    if (this.expandedTable === table) {
      this.expandedTable = null;
      return;
    }
    if (!this.tableSchemas.has(table)) {
      try {
        const described = await this.registry.use((c) => c.describeTable(table));
        this.tableSchemas.set(table, {
          tableName: table,
          columns: described.columns.map((col) => ({ name: col.name, dataType: "", isNullable: true, default: null })),
          indexes: [],
        });
      } catch (e) {
        const message = `Error describing table ${table}: ${errorMessage(e)}`;
        this.statusMessage = message;
        this.logger.error(message);
        return;
      }
    }
    this.expandedTable = table;
  }

  // ── Focus and navigation ────────────────────────────────────────────

  cycleFocus(): void {
    this.focus = nextFocus(this.focus);
  }

  backToDatabases(): void {
    this.editor.clear();
    this.clearResult();
    this.resultPaneMode = "result";
    this.expandedTable = null;
    this.fire("backToDatabases");
  }

  // ── Query execution ─────────────────────────────────────────────────

  async executeSql(): Promise<void> {
    const sql = this.editor.text.trim();
    if (sql === "") return;
    this.resultPaneMode = "result";
    this.note(`Executing: ${sql}`);
    try {
      if (classifyStatement(sql) === "select") {
        const { header, rows } = await this.registry.use((c) => c.queryWithColumnOrder(sql));
        const max = this.config.maxResultRows;
        const { result, returned, truncated } = ingest(header, rows, max, this.logger);
        this.result = result;
        this.cursor = { ...INITIAL_CURSOR };
        this.resultError = null;
        this.resultMessage = truncated ? truncationNotice(max, returned) : null;
        this.note(`Headers found: ${JSON.stringify(header)}`);
        this.note(`Rows kept: ${result.rows.length} of ${returned}`);
      } else {
        await this.registry.use((c) => c.execute(sql));
        this.clearResult();
        this.resultMessage = NON_SELECT_SUCCESS;
      }
      this.needsTablesRefresh = true;
    } catch (e) {
      this.clearResult();
      this.resultError = `SQL Error: ${errorMessage(e)}`;
      this.logger.error(this.resultError);
      this.debug.add(this.resultError);
    }
  }

  private clearResult(): void {
    this.result = EMPTY_RESULT;
    this.cursor = { ...INITIAL_CURSOR };
    this.resultMessage = null;
    this.resultError = null;
  }

  // ── Result pane ─────────────────────────────────────────────────────

  /** The rows the result pane currently shows: query result or debug history. */
  activeResult(): ResultSet {
    return this.resultPaneMode === "debug" ? this.debug.toResultSet() : this.result;
  }

  activeCursor(): ResultCursor {
    return this.resultPaneMode === "debug" ? this.debugCursor : this.cursor;
  }

  moveResult(move: CursorMove): void {
    const before = this.activeCursor();
    const next = moveCursor(before, move, this.viewport());
    this.setActiveCursor(next);
    if (next.columnScroll !== before.columnScroll) this.note(`Horizontal scroll to column ${next.columnScroll}`);
  }

  setResultViewport(rows: number): void {
    this.resultVisibleRows = Math.max(1, rows);
    this.setActiveCursor(clampCursor(this.activeCursor(), this.viewport()));
  }

  toggleDebug(): void {
    if (this.resultPaneMode === "debug") {
      this.resultPaneMode = "result";
      return;
    }
    this.resultPaneMode = "debug";
    this.debugCursor = { ...INITIAL_CURSOR };
  }

  async copySelectedRow(): Promise<void> {
    const text = copySelectedText(this.activeResult(), this.activeCursor().selectedRow);
    if (text) await this.writeClipboard(text, "Copied selected row to clipboard");
  }

  async copyAllRows(): Promise<void> {
    const result = this.activeResult();
    const text = copyAllText(result);
    if (text) await this.writeClipboard(text, `Copied ${result.rows.length} rows to clipboard`);
  }

  private async writeClipboard(text: string, done: string): Promise<void> {
    try {
      await this.clipboard.write(text);
      this.statusMessage = done;
    } catch (e) {
      this.statusMessage = `Error copying to clipboard: ${errorMessage(e)}`;
      this.logger.error(this.statusMessage);
    }
  }

  private viewport(): Viewport {
    const result = this.activeResult();
    return { totalRows: result.rows.length, totalColumns: result.header.length, visibleRows: this.resultVisibleRows };
  }

  private setActiveCursor(cursor: ResultCursor): void {
    if (this.resultPaneMode === "debug") this.debugCursor = cursor;
    else this.cursor = cursor;
  }
}

/** Scroll offset that keeps `selected` inside a window of `height` rows. */
export function follow(selected: number, scroll: number, height: number): number {
  if (selected < scroll) return selected;
  if (selected >= scroll + height) return selected - height + 1;
  return scroll;
}
