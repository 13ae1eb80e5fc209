import StartGame from "./game/main";
import { CommLog } from "./managers/CommLog";
import { RadarSimulation } from "./managers/RadarSimulation";
import { UIManager } from "./managers/UIManager";
import { createScopeConfig, readConfigOverrides } from "./models/ScopeConfig";

document.addEventListener("DOMContentLoaded", () => {
  const config = createScopeConfig(readConfigOverrides(window.location.search));
  const commLog = new CommLog();
  let simulation: RadarSimulation | null = null;

  const ui = new UIManager({
    onCommand: (cmd) => {
      if (!simulation) {
        console.warn("Command ignored, radar not ready:", cmd);
        return;
      }
      simulation.submitCommand(cmd);
    },
  });
  commLog.subscribe((entry) => ui.addLog(entry));

  StartGame("game-container", {
    onReady: (display) => {
      simulation = new RadarSimulation(display, commLog, config);
      simulation.start();
      ui.focusCommandInput();
    },
    onResize: (extent) => simulation?.handleResize(extent),
  });
});
