import { box, centerLine, dialogScreen, seg, wrapText } from "../frame.js";
import type { ScreenController } from "./controller.js";

export const messagePopup: ScreenController = {
  render(ui, width, height) {
    const panel = (w: number, h: number) =>
      box("Message", wrapText(ui.popupMessage, w - 2).map((l) => centerLine([seg(l)], w - 2)), w, h, { centerTitle: true });
    return { lines: dialogScreen(width, height, panel, [[seg("Press any key to return.")]]) };
  },

  async handleKey(ui) {
    ui.fire("dismiss");
  },
};
