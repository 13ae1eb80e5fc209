import { AUTO, Game, Scale } from "phaser";
import { RadarScene, type RadarSceneHooks } from "./scenes/RadarScene";

//  Find out more information about the Game Config at:
//  https://docs.phaser.io/api-documentation/typedef/types-core#gameconfig
const config: Phaser.Types.Core.GameConfig = {
  type: AUTO,
  width: "100%",
  height: "100%",
  scale: {
    mode: Scale.RESIZE,
    autoCenter: Scale.CENTER_BOTH,
  },
  backgroundColor: "#000000",
};

const StartGame = (parent: string, hooks: RadarSceneHooks) => {
  return new Game({ ...config, parent, scene: [new RadarScene(hooks)] });
};

export default StartGame;
