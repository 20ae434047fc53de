import type { KeyEvent } from "../../terminal/keys.js";
import type { DatabaseClientUI } from "../client-ui.js";
import { seg, type Frame, type Line } from "../frame.js";

export interface ScreenController {
  render(ui: DatabaseClientUI, width: number, height: number): Frame;
  handleKey(ui: DatabaseClientUI, event: KeyEvent): Promise<void>;
}

/**
 * Builds a help line from alternating parts: `[key, text, key, text, ...]`.
 * Keys are highlighted.
 */
export function helpLine(...parts: string[]): Line {
  return parts.map((text, i) => seg(text, i % 2 === 0 ? "key" : undefined));
}

export function selectable(label: string, width: number, selected: boolean): Line {
  return selected ? [seg(label.padEnd(width).slice(0, Math.max(0, width)), "selected")] : [seg(label)];
}
