import type { Key } from "node:readline";

export interface KeyEvent {
  /** Named key ("ArrowUp", "Enter", "F5", ...) or a single printable character. */
  key: string;
  ctrl: boolean;
  shift: boolean;
  meta: boolean;
}

const NAMED: Record<string, string> = {
  up: "ArrowUp",
  down: "ArrowDown",
  left: "ArrowLeft",
  right: "ArrowRight",
  return: "Enter",
  enter: "Enter",
  escape: "Escape",
  tab: "Tab",
  backspace: "Backspace",
  delete: "Delete",
  pageup: "PageUp",
  pagedown: "PageDown",
  home: "Home",
  end: "End",
};
for (let n = 1; n <= 12; n++) NAMED[`f${n}`] = `F${n}`;

export function keyEvent(key: string, mods: Partial<Omit<KeyEvent, "key">> = {}): KeyEvent {
  return { key, ctrl: mods.ctrl ?? false, shift: mods.shift ?? false, meta: mods.meta ?? false };
}

/**
 * Maps a readline `keypress` to a `KeyEvent`. Returns null for sequences
 * with no meaning here (mouse reports, unknown escapes).
 */
export function fromKeypress(str: string | undefined, key: Key | undefined): KeyEvent | null {
  const mods = { ctrl: key?.ctrl ?? false, shift: key?.shift ?? false, meta: key?.meta ?? false };
  const name = key?.name;
  if (name !== undefined) {
    const named = NAMED[name];
    if (named) return keyEvent(named, mods);
    if (mods.ctrl && /^[a-z]$/.test(name)) return keyEvent(name, mods);
  }
  if (str !== undefined && [...str].length === 1 && !/[\x00-\x1f\x7f]/.test(str)) {
    return keyEvent(str, { ...mods, ctrl: false });
  }
  return null;
}

export function isPrintable(event: KeyEvent): boolean {
  return !event.ctrl && !event.meta && [...event.key].length === 1;
}
