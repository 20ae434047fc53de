import type { KeyEvent } from "./terminal/keys.js";
import type { DatabaseClientUI } from "./ui/client-ui.js";
import type { Frame } from "./ui/frame.js";
import { dispatchKey, renderScreen } from "./ui/screens/index.js";

/** The part of `TerminalSession` the event loop needs. */
export interface Terminal {
  readonly size: { width: number; height: number };
  nextKey(): Promise<KeyEvent>;
  draw(frame: Frame): void;
  onResize(listener: () => void): void;
}

/**
 * Runs the event loop until a quit is requested: refresh whatever the current
 * screen needs, draw it, then wait for and handle one key. Database errors are
 * handled inside the UI; anything that escapes here is fatal.
 */
export async function runApp(ui: DatabaseClientUI, terminal: Terminal): Promise<void> {
  const redraw = (): void => {
    const { width, height } = terminal.size;
    terminal.draw(renderScreen(ui, width, height));
  };
  terminal.onResize(redraw);

  while (!ui.exitRequested) {
    await ui.prepareScreen();
    redraw();
    await dispatchKey(ui, await terminal.nextKey());
  }
}
