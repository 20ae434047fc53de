import { DATABASE_LIST_HEIGHT } from "../client-ui.js";
import { box, dialogScreen, seg, type Line } from "../frame.js";
import { helpLine, selectable, type ScreenController } from "./controller.js";

export const databaseSelection: ScreenController = {
  render(ui, width, height) {
    const title = `Select Database (${ui.selectedDatabase + 1}/${ui.databases.length})`;
    const visible = ui.databases.slice(ui.databasesScroll, ui.databasesScroll + DATABASE_LIST_HEIGHT);
    const panel = (w: number, h: number) =>
      box(
        title,
        visible.map((name, i) => selectable(name, w - 2, ui.databasesScroll + i === ui.selectedDatabase)),
        w,
        h,
        { centerTitle: true },
      );
    const footer: Line[] = [helpLine("Up/Down", " to navigate, ", "Enter", " to select, ", "q", " to quit")];
    if (ui.statusMessage) footer.push([seg(ui.statusMessage, "error")]);
    return { lines: dialogScreen(width, height, panel, footer, [30, 40, 30]) };
  },

  async handleKey(ui, event) {
    switch (event.key) {
      case "ArrowUp":
        ui.moveDatabaseSelection(-1);
        break;
      case "ArrowDown":
        ui.moveDatabaseSelection(1);
        break;
      case "Enter":
        await ui.connectToSelectedDb();
        break;
      case "q":
        ui.quit();
        break;
    }
  },
};
