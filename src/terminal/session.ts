import { emitKeypressEvents, type Key } from "node:readline";
import type { Frame } from "../ui/frame.js";
import { ALT_SCREEN_OFF, ALT_SCREEN_ON, CURSOR_HIDE, CURSOR_SHOW, renderFrame } from "./ansi.js";
import { fromKeypress, type KeyEvent } from "./keys.js";

export interface TerminalStreams {
  input: NodeJS.ReadStream;
  output: NodeJS.WriteStream;
}

type ProcessHook = [event: string, handler: (...args: unknown[]) => void];

/**
 * Owns the terminal for the lifetime of the UI: raw mode, the alternate
 * screen and a hidden cursor. `release` restores all three and is safe to
 * call more than once; process hooks call it on every exit path.
 */
export class TerminalSession {
  private readonly queue: KeyEvent[] = [];
  private waiter: ((event: KeyEvent) => void) | null = null;
  private resizeListener: (() => void) | null = null;
  private released = false;
  private readonly hooks: ProcessHook[];

  private constructor(private readonly streams: TerminalStreams) {
    this.hooks = [
      ["exit", () => this.release()],
      ["uncaughtException", (error) => this.fail("Uncaught exception", error)],
      ["unhandledRejection", (reason) => this.fail("Unhandled rejection", reason)],
      ["SIGTERM", () => this.exit(0)],
      ["SIGHUP", () => this.exit(0)],
    ];
  }

  static open(streams: TerminalStreams = { input: process.stdin, output: process.stdout }): TerminalSession {
    const session = new TerminalSession(streams);
    session.start();
    return session;
  }

  get size(): { width: number; height: number } {
    return { width: this.streams.output.columns || 80, height: this.streams.output.rows || 24 };
  }

  /** Resolves with the next key, buffered or yet to arrive. */
  nextKey(): Promise<KeyEvent> {
    const queued = this.queue.shift();
    if (queued) return Promise.resolve(queued);
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  draw(frame: Frame): void {
    if (this.released) return;
    this.streams.output.write(renderFrame(frame));
  }

  onResize(listener: () => void): void {
    this.resizeListener = listener;
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    const { input, output } = this.streams;
    input.off("keypress", this.onKeypress);
    output.off("resize", this.onResizeEvent);
    for (const [event, handler] of this.hooks) process.off(event, handler);
    if (input.isTTY) input.setRawMode(false);
    input.pause();
    output.write(`${CURSOR_SHOW}${ALT_SCREEN_OFF}`);
  }

  private start(): void {
    const { input, output } = this.streams;
    emitKeypressEvents(input);
    if (input.isTTY) input.setRawMode(true);
    input.on("keypress", this.onKeypress);
    input.resume();
    output.on("resize", this.onResizeEvent);
    for (const [event, handler] of this.hooks) process.on(event, handler);
    output.write(`${ALT_SCREEN_ON}${CURSOR_HIDE}`);
  }

  private readonly onKeypress = (str: string | undefined, key: Key | undefined): void => {
    const event = fromKeypress(str, key);
    if (!event) return;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter(event);
    } else {
      this.queue.push(event);
    }
  };

  private readonly onResizeEvent = (): void => {
    this.resizeListener?.();
  };

  private fail(what: string, error: unknown): void {
    this.release();
    const detail = error instanceof Error ? (error.stack ?? error.message) : String(error);
    process.stderr.write(`sqlpane: ${what}: ${detail}\n`);
    process.exit(1);
  }

  private exit(code: number): void {
    this.release();
    process.exit(code);
  }
}
