import { Scene } from "phaser";
import type { AircraftView, DisplayPort, RenderFrame } from "../../models/RenderFrame";
import type { ScopeGeometry } from "../../models/ScopeScaler";
import { fadeColor, hexToColor, trailFade } from "../../utils/Color";

// 蛍光体 (phosphor) palette
const COLOR_GLOW = 0x00ff00;
const COLOR_DIM = 0x006600;
const COLOR_GLOW_STR = "#00FF00";
const COLOR_DIM_STR = "#006600";

const PLANE_SIZE = 6;
const SWEEP_SPEED = 0.05; // rad per frame
const RING_COUNT = 3;
const GRID_TICKS = 6;
const DASH = 3;

export interface RadarSceneHooks {
  onReady: (display: RadarScene) => void;
  onResize: (extent: number) => void;
}

interface ScopeLayers {
  root: Phaser.GameObjects.Container;
  grid: Phaser.GameObjects.Graphics;
  blips: Phaser.GameObjects.Graphics;
  sweep: Phaser.GameObjects.Graphics;
}

interface BlipLabels {
  code: Phaser.GameObjects.Text;
  coords: Phaser.GameObjects.Text;
}

/**
 * Phaser render adapter. The simulation hands it a frame per tick in display
 * coordinates; all styling (fade, sweep, grid) lives here.
 */
export class RadarScene extends Scene implements DisplayPort {
  private layers: ScopeLayers | null = null;
  private gridLabels: Phaser.GameObjects.Text[] = [];
  private labels = new Map<string, BlipLabels>();
  private gridExtent = 0;
  private sweepAngle = 0;

  constructor(private hooks: RadarSceneHooks) {
    super("Radar");
  }

  create() {
    this.cameras.main.setBackgroundColor(0x000000);

    const root = this.add.container(0, 0);
    const grid = this.add.graphics();
    const blips = this.add.graphics();
    const sweep = this.add.graphics();
    root.add([grid, blips, sweep]);
    this.layers = { root, grid, blips, sweep };
    this.layoutRoot();

    this.scale.on("resize", this.handleResize, this);
    this.events.once("shutdown", () => {
      this.scale.off("resize", this.handleResize, this);
    });

    this.input.keyboard?.on("keydown-F11", (event: KeyboardEvent) => {
      event.preventDefault();
      this.scale.toggleFullscreen();
    });
    this.input.keyboard?.on("keydown-ESC", () => {
      if (this.scale.isFullscreen) this.scale.stopFullscreen();
    });

    this.hooks.onReady(this);
  }

  /** Side of the largest square that fits the canvas. */
  getExtent(): number {
    return Math.max(1, Math.floor(Math.min(this.scale.width, this.scale.height)));
  }

  private handleResize() {
    this.layoutRoot();
    this.hooks.onResize(this.getExtent());
  }

  // center the square scope inside the (possibly wide) canvas
  private layoutRoot() {
    if (!this.layers) return;
    const s = this.getExtent();
    this.layers.root.setPosition((this.scale.width - s) / 2, (this.scale.height - s) / 2);
  }

  render(frame: RenderFrame) {
    const layers = this.layers;
    if (!layers) return;

    if (frame.scope.extent !== this.gridExtent) {
      this.layoutRoot();
      this.drawGrid(layers, frame.scope);
      this.gridExtent = frame.scope.extent;
    }

    layers.blips.clear();
    const live = new Set<string>();
    frame.aircraft.forEach((ac) => {
      live.add(ac.id);
      this.drawAircraft(layers, ac);
    });

    this.labels.forEach((labels, id) => {
      if (!live.has(id)) {
        labels.code.destroy();
        labels.coords.destroy();
        this.labels.delete(id);
      }
    });

    this.drawSweep(layers.sweep, frame.scope);
  }

  private drawGrid(layers: ScopeLayers, scope: ScopeGeometry) {
    const g = layers.grid;
    const { extent: size, center: c, radius } = scope;
    g.clear();
    this.gridLabels.forEach((t) => t.destroy());
    this.gridLabels = [];

    // 1. Scope edge
    g.lineStyle(2, COLOR_GLOW, 1);
    g.strokeCircle(c.x, c.y, radius);

    // 2. Range rings (dashed)
    g.lineStyle(1, COLOR_DIM, 1);
    for (let i = 1; i <= RING_COUNT; i++) {
      this.strokeDashedCircle(g, c.x, c.y, (radius / RING_COUNT) * i);
    }

    // 3. Crosshairs
    g.lineBetween(0, c.y, size, c.y);
    g.lineBetween(c.x, 0, c.x, size);

    // 4. Coordinate ticks, labelled in virtual units
    const virtualInterval = scope.virtualMax / GRID_TICKS;
    const visualInterval = size / GRID_TICKS;
    g.lineStyle(1, COLOR_GLOW, 1);
    for (let i = 0; i <= GRID_TICKS; i++) {
      const value = Math.trunc(i * virtualInterval);
      const pos = i * visualInterval;

      g.lineBetween(pos, c.y - 4, pos, c.y + 4);
      if (i < GRID_TICKS) {
        this.addGridLabel(layers, pos, size - 15, `${value} X`, 0.5, 0);
      }

      g.lineBetween(c.x - 4, pos, c.x + 4, pos);
      if (i !== 0) {
        this.addGridLabel(layers, 8, pos, `${value} Y`, 0, 0.5);
      }
    }
    // the last X label would be clipped at the right edge
    this.addGridLabel(layers, size - 25, size - 15, `${Math.trunc(scope.virtualMax)} X`, 0.5, 0);
  }

  private addGridLabel(
    layers: ScopeLayers,
    x: number,
    y: number,
    text: string,
    originX: number,
    originY: number,
  ) {
    const label = this.add
      .text(x, y, text, { fontFamily: "Courier", fontSize: "8px", color: COLOR_GLOW_STR })
      .setOrigin(originX, originY);
    layers.root.add(label);
    this.gridLabels.push(label);
  }

  private strokeDashedCircle(g: Phaser.GameObjects.Graphics, cx: number, cy: number, r: number) {
    if (r <= 0) return;
    const step = DASH / r; // angle covered by one dash
    for (let a = 0; a < Math.PI * 2; a += step * 2) {
      g.beginPath();
      g.arc(cx, cy, r, a, Math.min(a + step, Math.PI * 2));
      g.strokePath();
    }
  }

  private drawAircraft(layers: ScopeLayers, ac: AircraftView) {
    const g = layers.blips;
    const { x, y } = ac.position;
    const color = hexToColor(ac.color);

    // Trail, fading toward black
    ac.trail.forEach((p, i) => {
      g.fillStyle(hexToColor(fadeColor(ac.color, trailFade(i, ac.trail.length))), 1);
      g.fillCircle(p.x, p.y, 1);
    });

    // Primary return
    g.fillStyle(color, 1);
    g.fillCircle(x, y, PLANE_SIZE / 2);
    g.lineStyle(1, COLOR_GLOW, 1);
    g.strokeCircle(x, y, PLANE_SIZE / 2);

    // Destination marker
    const d = ac.destination;
    g.lineStyle(1, COLOR_DIM, 1);
    g.lineBetween(d.x - 5, d.y, d.x + 5, d.y);
    g.lineBetween(d.x, d.y - 5, d.x, d.y + 5);

    const labels = this.getLabels(layers, ac);
    labels.code.setPosition(x, y + 10);
    labels.coords.setPosition(x, y + 20).setText(ac.label);
  }

  private getLabels(layers: ScopeLayers, ac: AircraftView): BlipLabels {
    const existing = this.labels.get(ac.id);
    if (existing) return existing;

    const code = this.add
      .text(0, 0, ac.id, { fontFamily: "Courier", fontSize: "8px", color: ac.color })
      .setOrigin(0.5);
    const coords = this.add
      .text(0, 0, ac.label, { fontFamily: "Courier", fontSize: "7px", color: COLOR_DIM_STR })
      .setOrigin(0.5);
    layers.root.add([code, coords]);

    const labels = { code, coords };
    this.labels.set(ac.id, labels);
    return labels;
  }

  private drawSweep(g: Phaser.GameObjects.Graphics, scope: ScopeGeometry) {
    const { center: c, radius } = scope;
    g.clear();
    g.lineStyle(3, COLOR_GLOW, 1);
    g.lineBetween(
      c.x,
      c.y,
      c.x + Math.cos(this.sweepAngle) * radius,
      c.y + Math.sin(this.sweepAngle) * radius,
    );

    this.sweepAngle += SWEEP_SPEED;
    if (this.sweepAngle > 2 * Math.PI) {
      this.sweepAngle -= 2 * Math.PI;
    }
  }
}
