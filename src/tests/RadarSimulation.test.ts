import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { DisplayPort, RenderFrame } from "../models/RenderFrame";
import { createScopeConfig } from "../models/ScopeConfig";
import { CommLog } from "../managers/CommLog";
import { RadarSimulation } from "../managers/RadarSimulation";

class FakeDisplay implements DisplayPort {
  public frames: RenderFrame[] = [];
  constructor(public extent: number) {}

  getExtent(): number {
    return this.extent;
  }

  render(frame: RenderFrame): void {
    this.frames.push(frame);
  }

  lastFrame(): RenderFrame {
    const frame = this.frames[this.frames.length - 1];
    if (!frame) throw new Error("nothing rendered yet");
    return frame;
  }
}

describe("RadarSimulation", () => {
  const config = createScopeConfig({ seed: 7 });
  let display: FakeDisplay;
  let log: CommLog;
  let sim: RadarSimulation;

  beforeEach(() => {
    vi.useFakeTimers();
    display = new FakeDisplay(600);
    log = new CommLog(() => new Date(2024, 0, 1, 12, 0, 0));
    sim = new RadarSimulation(display, log, config);
  });

  afterEach(() => {
    sim.stop();
    vi.useRealTimers();
  });

  it("should spawn the whole manifest", () => {
    expect(sim.traffic.getAircrafts().map((ac) => ac.id)).toEqual([
      "FW190",
      "SPITF",
      "BF109",
      "P51MUS",
      "MOSSI",
    ]);
  });

  it("should announce itself and draw once on start", () => {
    sim.start();

    const messages = log.getEntries().map((e) => `${e.source}: ${e.message}`);
    expect(messages).toEqual([
      "SYSTEM: Radar powered up. Scanning initiated.",
      "SYSTEM: INSTRUCTIONS: Command format: [CODE] [X] [Y] where X, Y are 0-600 (e.g., FW190 400 150). F11 for Fullscreen.",
      "SYSTEM: Aircraft Codes: FW190, SPITF, BF109, P51MUS, MOSSI",
    ]);
    expect(display.frames).toHaveLength(1);
  });

  it("should render once per tick interval", () => {
    sim.start();
    vi.advanceTimersByTime(33 * 3);

    expect(display.frames).toHaveLength(4);

    sim.stop();
    vi.advanceTimersByTime(33 * 3);
    expect(display.frames).toHaveLength(4);
    expect(sim.isRunning()).toBe(false);
  });

  it("should pick up the display extent at the start of a tick", () => {
    sim.tick();
    display.extent = 300;
    sim.tick();

    const frame = display.lastFrame();
    expect(frame.scope.extent).toBe(300);
    expect(frame.scope.center).toEqual({ x: 150, y: 150 });
    frame.aircraft.forEach((view) => {
      // old-scale history is gone; at most the point added this tick remains
      expect(view.trail.length).toBeLessThanOrEqual(1);
      if (view.trail.length === 1) {
        expect(view.trail[0]).toEqual(view.position);
      }
    });
  });

  it("should clear trails on a resize notification", () => {
    sim.tick();
    sim.tick();
    sim.handleResize(450);

    sim.traffic.getAircrafts().forEach((ac) => {
      expect(ac.getTrail()).toEqual([]);
    });
  });

  it("should log the echo, the outcome and the pilot reply for a command", () => {
    const result = sim.submitCommand("spitf 400 150");

    expect(result.handled).toBe(true);
    expect(sim.traffic.getAircraftById("SPITF")?.destination).toEqual({ x: 400, y: 150 });
    expect(log.getEntries().map((e) => [e.source, e.message])).toEqual([
      ["COMMAND", "SPITF 400 150"],
      ["SYSTEM", "ACFT SPITF cleared direct X=400, Y=150."],
      ["PILOT", "ACFT SPITF: Roger, turning to intercept coordinates X=400, Y=150. Tally ho!"],
    ]);
  });

  it("should log only the echo and the error for a rejected command", () => {
    const result = sim.submitCommand("GHOST 1 1");

    expect(result.handled).toBe(false);
    expect(log.getEntries().map((e) => [e.source, e.message])).toEqual([
      ["COMMAND", "GHOST 1 1"],
      ["SYSTEM", "ERROR: Aircraft code GHOST not found."],
    ]);
  });

  it("should retarget aircraft that reach their destination", () => {
    // fleet speeds are 0.35-0.5 and no trip across the scope is longer than 560 units
    for (let i = 0; i < 2000; i++) sim.tick();

    const arrivals = log
      .getEntries()
      .filter((e) => e.source === "PILOT" && e.message.endsWith("I'm at the target area. Awaiting new orders."));
    expect(arrivals.length).toBeGreaterThan(0);
  });

  it("should spawn the same traffic for the same seed", () => {
    const other = new RadarSimulation(new FakeDisplay(600), new CommLog(), config);

    const a = sim.traffic.buildFrame().aircraft.map((v) => v.position);
    const b = other.traffic.buildFrame().aircraft.map((v) => v.position);
    expect(a).toEqual(b);
  });
});
