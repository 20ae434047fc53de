import { BACKEND_CHOICES } from "../client-ui.js";
import { box, dialogScreen } from "../frame.js";
import { helpLine, selectable, type ScreenController } from "./controller.js";

export const dbTypeSelection: ScreenController = {
  render(ui, width, height) {
    const panel = (w: number, h: number) =>
      box(
        "Select Database Type",
        BACKEND_CHOICES.map((choice, i) => selectable(choice.label, w - 2, i === ui.selectedDbType)),
        w,
        h,
        { centerTitle: true },
      );
    const help = helpLine("Up/Down", " to navigate, ", "Enter", " to select, ", "q", " to quit");
    return { lines: dialogScreen(width, height, panel, [help]) };
  },

  async handleKey(ui, event) {
    switch (event.key) {
      case "ArrowUp":
        ui.moveDbType(-1);
        break;
      case "ArrowDown":
        ui.moveDbType(1);
        break;
      case "Enter":
        ui.chooseBackend();
        break;
      case "q":
        ui.quit();
        break;
    }
  },
};
