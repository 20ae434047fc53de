export type Tone = "normal" | "selected" | "focus" | "muted" | "error" | "success" | "header" | "key";

export interface Segment {
  text: string;
  tone?: Tone;
}

export type Line = Segment[];

export interface Frame {
  lines: Line[];
  /** Terminal cursor position; hidden when absent. */
  cursor?: { x: number; y: number };
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export const seg = (text: string, tone?: Tone): Segment => (tone ? { text, tone } : { text });

export function lineWidth(line: Line): number {
  return line.reduce((n, s) => n + s.text.length, 0);
}

export function lineText(line: Line): string {
  return line.map((s) => s.text).join("");
}

/** Cuts or pads `line` to exactly `width` columns. */
export function fitLine(line: Line, width: number, tone?: Tone): Line {
  const out: Line = [];
  let used = 0;
  for (const s of line) {
    if (used >= width) break;
    const text = s.text.slice(0, width - used);
    if (text) out.push({ ...s, text });
    used += text.length;
  }
  if (used < width) out.push(seg(" ".repeat(width - used), tone));
  return out;
}

export function blank(width: number, height: number): Line[] {
  return Array.from({ length: Math.max(0, height) }, () => [seg(" ".repeat(Math.max(0, width)))]);
}

/**
 * Bordered panel of exactly `width` x `height` cells. Body lines beyond the
 * inner height are dropped.
 */
export function box(
  title: string,
  body: Line[],
  width: number,
  height: number,
  opts: { focused?: boolean; centerTitle?: boolean } = {},
): Line[] {
  if (width < 2 || height < 2) return blank(width, height);
  const inner = width - 2;
  const border = opts.focused ? "focus" : "muted";
  const label = title ? ` ${title} `.slice(0, inner) : "";
  const before = opts.centerTitle ? Math.floor((inner - label.length) / 2) : 0;
  const top = `┌${"─".repeat(before)}${label}${"─".repeat(inner - label.length - before)}┐`;
  const lines: Line[] = [[seg(top, border)]];
  for (let i = 0; i < height - 2; i++) {
    lines.push([seg("│", border), ...fitLine(body[i] ?? [], inner), seg("│", border)]);
  }
  lines.push([seg(`└${"─".repeat(inner)}┘`, border)]);
  return lines;
}

/** Places blocks side by side; every block must have the same height. */
export function hjoin(...blocks: Line[][]): Line[] {
  const height = Math.max(0, ...blocks.map((b) => b.length));
  return Array.from({ length: height }, (_, i) => blocks.flatMap((b) => b[i] ?? []));
}

/** Splits `total` cells by percentages; the last part takes the remainder. */
export function split(total: number, percents: number[]): number[] {
  const sizes = percents.map((p) => Math.floor((total * p) / 100));
  const rest = total - sizes.reduce((a, b) => a + b, 0);
  if (sizes.length > 0) sizes[sizes.length - 1] += rest;
  return sizes;
}

export function centerLine(line: Line, width: number): Line {
  const pad = Math.max(0, Math.floor((width - lineWidth(line)) / 2));
  return fitLine([seg(" ".repeat(pad)), ...line], width);
}

/**
 * Full screen with a panel at half the width in the second vertical band and
 * footer lines centred in the third. `bands` are height percentages.
 */
export function dialogScreen(
  width: number,
  height: number,
  panel: (width: number, height: number) => Line[],
  footer: Line[],
  bands: number[] = [30, 40, 20, 10],
): Line[] {
  const [top = 0, middle = 0, foot = 0] = split(height, bands);
  const panelWidth = Math.floor(width / 2);
  const left = Math.floor((width - panelWidth) / 2);
  const body = panel(panelWidth, middle).map((line) => fitLine([seg(" ".repeat(left)), ...line], width));
  const footLines = Array.from({ length: foot }, (_, i) => centerLine(footer[i] ?? [], width));
  const lines = [...blank(width, top), ...body, ...footLines];
  return [...lines, ...blank(width, height - lines.length)];
}

/** Greedy word wrap; words longer than `width` are split. */
export function wrapText(text: string, width: number): string[] {
  const w = Math.max(1, width);
  const out: string[] = [];
  for (const paragraph of text.split("\n")) {
    let line = "";
    for (const word of paragraph.split(/\s+/).filter(Boolean)) {
      let rest = word;
      while (rest.length > w) {
        if (line) out.push(line);
        out.push(rest.slice(0, w));
        line = "";
        rest = rest.slice(w);
      }
      if (!line) line = rest;
      else if (line.length + 1 + rest.length <= w) line += ` ${rest}`;
      else {
        out.push(line);
        line = rest;
      }
    }
    out.push(line);
  }
  return out;
}

/** Plain text of each line; used in tests and logs. */
export function frameText(frame: Frame): string[] {
  return frame.lines.map(lineText);
}
