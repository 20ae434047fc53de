import type { Frame, Tone } from "../ui/frame.js";

const ESC = "\x1b[";
const RESET = `${ESC}0m`;

export const ALT_SCREEN_ON = `${ESC}?1049h`;
export const ALT_SCREEN_OFF = `${ESC}?1049l`;
export const CURSOR_HIDE = `${ESC}?25l`;
export const CURSOR_SHOW = `${ESC}?25h`;

const TONES: Record<Tone, string> = {
  normal: "",
  selected: `${ESC}30;46m`,
  focus: `${ESC}33m`,
  muted: `${ESC}90m`,
  error: `${ESC}31m`,
  success: `${ESC}32m`,
  header: `${ESC}1;36m`,
  key: `${ESC}36m`,
};

/** Full repaint of `frame` from the top-left corner. */
export function renderFrame(frame: Frame): string {
  let out = `${ESC}H`;
  frame.lines.forEach((line, row) => {
    if (row > 0) out += "\r\n";
    for (const segment of line) {
      const sgr = TONES[segment.tone ?? "normal"];
      out += sgr ? `${sgr}${segment.text}${RESET}` : segment.text;
    }
    out += `${ESC}K`;
  });
  out += `${ESC}J`;
  if (frame.cursor) out += `${ESC}${frame.cursor.y + 1};${frame.cursor.x + 1}H${CURSOR_SHOW}`;
  else out += CURSOR_HIDE;
  return out;
}
