export interface Cursor {
  x: number;
  y: number;
}

export type StatementKind = "select" | "other";

/** Case-insensitive `SELECT` prefix on the trimmed text. */
export function classifyStatement(sql: string): StatementKind {
  return /^select\b/i.test(sql.trim()) ? "select" : "other";
}

/**
 * Multi-line SQL buffer. Every mutation moves the cursor with the text and
 * then re-clamps it, so `cursor.y < lines.length` and
 * `cursor.x <= lines[cursor.y].length` hold between calls.
 */
export class SqlEditor {
  private lines: string[] = [""];
  private pos: Cursor = { x: 0, y: 0 };
  /** First visible line. */
  scroll = 0;

  get cursor(): Cursor {
    return { ...this.pos };
  }

  get text(): string {
    return this.lines.join("\n");
  }

  get lineCount(): number {
    return this.lines.length;
  }

  getLines(): readonly string[] {
    return this.lines;
  }

  isEmpty(): boolean {
    return this.text.trim() === "";
  }

  clear(): void {
    this.lines = [""];
    this.pos = { x: 0, y: 0 };
    this.scroll = 0;
  }

  setText(text: string): void {
    this.lines = text.split("\n");
    const last = this.lines.length - 1;
    this.pos = { x: this.lines[last]?.length ?? 0, y: last };
    this.clamp();
  }

  insert(ch: string): void {
    const line = this.current();
    this.lines[this.pos.y] = line.slice(0, this.pos.x) + ch + line.slice(this.pos.x);
    this.pos.x += ch.length;
    this.clamp();
  }

  newline(): void {
    const line = this.current();
    this.lines.splice(this.pos.y, 1, line.slice(0, this.pos.x), line.slice(this.pos.x));
    this.pos = { x: 0, y: this.pos.y + 1 };
    this.clamp();
  }

  /** Deletes left of the cursor; at column 0 joins with the previous line. */
  backspace(): void {
    if (this.pos.x > 0) {
      const line = this.current();
      const width = widthBefore(line, this.pos.x);
      this.lines[this.pos.y] = line.slice(0, this.pos.x - width) + line.slice(this.pos.x);
      this.pos.x -= width;
    } else if (this.pos.y > 0) {
      const prev = this.lines[this.pos.y - 1] ?? "";
      this.lines.splice(this.pos.y - 1, 2, prev + this.current());
      this.pos = { x: prev.length, y: this.pos.y - 1 };
    }
    this.clamp();
  }

  /** Deletes under the cursor; at end of line joins with the next line. */
  delete(): void {
    const line = this.current();
    if (this.pos.x < line.length) {
      this.lines[this.pos.y] = line.slice(0, this.pos.x) + line.slice(this.pos.x + widthAt(line, this.pos.x));
    } else if (this.pos.y < this.lines.length - 1) {
      this.lines.splice(this.pos.y, 2, line + (this.lines[this.pos.y + 1] ?? ""));
    }
    this.clamp();
  }

  left(): void {
    this.pos.x -= this.pos.x > 0 ? widthBefore(this.current(), this.pos.x) : 1;
    this.clamp();
  }

  right(): void {
    this.pos.x += widthAt(this.current(), this.pos.x);
    this.clamp();
  }

  up(): void {
    this.pos.y -= 1;
    this.clamp();
  }

  down(): void {
    this.pos.y += 1;
    this.clamp();
  }

  home(): void {
    this.pos.x = 0;
  }

  end(): void {
    this.pos.x = this.current().length;
  }

  /** Keeps the cursor line inside a window of `height` lines. */
  followCursor(height: number): void {
    const h = Math.max(1, height);
    if (this.pos.y < this.scroll) this.scroll = this.pos.y;
    else if (this.pos.y >= this.scroll + h) this.scroll = this.pos.y - h + 1;
    this.scroll = Math.max(0, Math.min(this.scroll, this.lines.length - 1));
  }

  private current(): string {
    return this.lines[this.pos.y] ?? "";
  }

  private clamp(): void {
    if (this.lines.length === 0) this.lines = [""];
    this.pos.y = Math.max(0, Math.min(this.pos.y, this.lines.length - 1));
    this.pos.x = Math.max(0, Math.min(this.pos.x, this.current().length));
    // Never rest between the two halves of a surrogate pair.
    if (this.pos.x > 0 && (this.current().codePointAt(this.pos.x - 1) ?? 0) > 0xffff) this.pos.x -= 1;
  }
}

/** UTF-16 units taken by the code point that ends at `x`. */
function widthBefore(line: string, x: number): number {
  return x >= 2 && (line.codePointAt(x - 2) ?? 0) > 0xffff ? 2 : 1;
}

/** UTF-16 units taken by the code point that starts at `x`. */
function widthAt(line: string, x: number): number {
  return (line.codePointAt(x) ?? 0) > 0xffff ? 2 : 1;
}
