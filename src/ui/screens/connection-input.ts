import { isPrintable } from "../../terminal/keys.js";
import { eraseChar, formLines, isLastField, moveField, typeChar } from "../connection-form.js";
import { box, dialogScreen, seg, wrapText } from "../frame.js";
import { helpLine, type ScreenController } from "./controller.js";

export const connectionInput: ScreenController = {
  render(ui, width, height) {
    const error = ui.connectionError;
    const panel = (w: number, h: number) =>
      error === null
        ? box("Enter Connection Details", formLines(ui.connectionInput).map((l) => [seg(l)]), w, h, { centerTitle: true })
        : box("Error", wrapText(error, w - 2).map((l) => [seg(l, "error")]), w, h, { centerTitle: true });
    const footer =
      error === null
        ? [helpLine("Enter", " to confirm input, ", "Up/Down", " to navigate fields, ", "Esc", " to go back")]
        : [helpLine("Enter/Esc", " to dismiss")];
    return { lines: dialogScreen(width, height, panel, footer) };
  },

  async handleKey(ui, event) {
    if (ui.connectionError !== null) {
      // The error overlay swallows everything except its dismiss keys.
      if (event.key === "Enter" || event.key === "Escape") ui.connectionError = null;
      return;
    }
    switch (event.key) {
      case "Escape":
        ui.cancelConnectionInput();
        return;
      case "ArrowUp":
        ui.connectionInput = moveField(ui.connectionInput, -1);
        return;
      case "ArrowDown":
        ui.connectionInput = moveField(ui.connectionInput, 1);
        return;
      case "Backspace":
        ui.connectionInput = eraseChar(ui.connectionInput);
        return;
      case "Enter":
        if (isLastField(ui.connectionInput)) await ui.connectToDefaultDb();
        else ui.connectionInput = moveField(ui.connectionInput, 1);
        return;
    }
    if (isPrintable(event)) ui.connectionInput = typeChar(ui.connectionInput, event.key);
  },
};
