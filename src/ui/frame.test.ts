import { describe, expect, it } from "vitest";
import { box, centerLine, dialogScreen, fitLine, frameText, hjoin, lineText, lineWidth, seg, split, wrapText } from "./frame.js";

describe("fitLine", () => {
  it("cuts across segments and keeps tones", () => {
    expect(fitLine([seg("abc", "error"), seg("def")], 4)).toEqual([seg("abc", "error"), seg("d")]);
  });

  it("pads short lines", () => {
    expect(fitLine([seg("ab")], 4)).toEqual([seg("ab"), seg("  ")]);
    expect(lineWidth(fitLine([], 3))).toBe(3);
  });
});

describe("box", () => {
  it("draws a titled border around the body", () => {
    const lines = box("T", [[seg("hi")], [seg("dropped")]], 6, 3);
    expect(lines.map(lineText)).toEqual(["┌ T ─┐", "│hi  │", "└────┘"]);
  });

  it("centres the title when asked", () => {
    expect(box("T", [], 7, 2, { centerTitle: true }).map(lineText)).toEqual(["┌─ T ─┐", "└─────┘"]);
  });

  it("uses the focus tone for a focused border", () => {
    expect(box("", [], 4, 2, { focused: true })[0]).toEqual([seg("┌──┐", "focus")]);
  });
});

describe("layout helpers", () => {
  it("splits by percentage with the remainder last", () => {
    expect(split(10, [30, 70])).toEqual([3, 7]);
    expect(split(11, [50, 50])).toEqual([5, 6]);
  });

  it("joins blocks side by side", () => {
    expect(hjoin([[seg("a")], [seg("b")]], [[seg("1")], [seg("2")]]).map(lineText)).toEqual(["a1", "b2"]);
  });

  it("centres a line", () => {
    expect(lineText(centerLine([seg("ab")], 6))).toBe("  ab  ");
  });
});

describe("wrapText", () => {
  it("wraps on word boundaries", () => {
    expect(wrapText("hello world foo", 11)).toEqual(["hello world", "foo"]);
  });

  it("splits words longer than the width", () => {
    expect(wrapText("abcdefghij", 4)).toEqual(["abcd", "efgh", "ij"]);
  });

  it("keeps blank lines between paragraphs", () => {
    expect(wrapText("a\n\nb", 5)).toEqual(["a", "", "b"]);
  });
});

describe("dialogScreen", () => {
  it("centres the panel in the second band and the footer in the third", () => {
    const text = frameText({
      lines: dialogScreen(20, 10, (w, h) => box("X", [], w, h), [[seg("help")]]),
    });
    expect(text).toHaveLength(10);
    expect(text.every((line) => line.length === 20)).toBe(true);
    expect(text[2]).toBe(" ".repeat(20));
    expect(text[3]).toBe("     ┌ X ─────┐     ");
    expect(text[6]).toBe("     └────────┘     ");
    expect(text[7]).toBe("        help        ");
  });
});
