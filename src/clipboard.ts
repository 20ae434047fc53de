import clipboard from "clipboardy";

export interface Clipboard {
  write(text: string): Promise<void>;
}

export const systemClipboard: Clipboard = {
  write: (text) => clipboard.write(text),
};

/** Keeps the last written text; used when no system clipboard is wanted. */
export class MemoryClipboard implements Clipboard {
  contents = "";

  async write(text: string): Promise<void> {
    this.contents = text;
  }
}
