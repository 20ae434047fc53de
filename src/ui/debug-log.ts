import type { ResultSet } from "./results.js";

/** Bounded in-memory history shown by the debug view; oldest entries fall off. */
export class DebugLog {
  private readonly items: string[] = [];

  constructor(readonly capacity: number) {}

  add(message: string): void {
    this.items.push(message);
    if (this.items.length > this.capacity) this.items.splice(0, this.items.length - this.capacity);
  }

  get size(): number {
    return this.items.length;
  }

  entries(): readonly string[] {
    return this.items;
  }

  toResultSet(): ResultSet {
    return {
      header: ["#", "Debug Info"],
      rows: this.items.map((message, i) => [
        ["#", String(i + 1)],
        ["Debug Info", message],
      ]),
    };
  }
}
