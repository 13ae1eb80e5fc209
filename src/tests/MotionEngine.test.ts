import { describe, it, expect, beforeEach } from "vitest";
import { Aircraft } from "../models/Aircraft";
import { VirtualCoordinateSpace } from "../models/CoordinateSpace";
import { MotionEngine } from "../models/MotionEngine";
import { ScopeScaler } from "../models/ScopeScaler";

describe("MotionEngine", () => {
  const space = new VirtualCoordinateSpace(600, 0.5 - 20 / 600);
  let scaler: ScopeScaler;
  let engine: MotionEngine;

  // 50 units away along a 3-4-5 triangle
  const createAC = (speed: number) =>
    new Aircraft("SPITF", { x: 100, y: 100 }, { x: 130, y: 140 }, speed, "#A8E6CF", space);

  beforeEach(() => {
    scaler = new ScopeScaler(space, 300);
    engine = new MotionEngine(scaler, 1);
  });

  it("should move exactly one speed step toward the destination", () => {
    const ac = createAC(5);

    const arrived = engine.advance(ac);

    expect(arrived).toBe(false);
    expect(ac.position.x).toBeCloseTo(103);
    expect(ac.position.y).toBeCloseTo(104);
    expect(ac.distanceToDestination()).toBeCloseTo(45);
  });

  it("should record the new position in display coordinates", () => {
    const ac = createAC(5);

    engine.advance(ac);

    const trail = ac.getTrail();
    expect(trail).toHaveLength(1);
    // extent 300 on a 600 range: half scale
    expect(trail[0].x).toBeCloseTo(51.5);
    expect(trail[0].y).toBeCloseTo(52);
  });

  it("should keep only the last five trail points", () => {
    const ac = createAC(1);

    for (let i = 0; i < 8; i++) engine.advance(ac);

    const trail = ac.getTrail();
    expect(trail).toHaveLength(5);
    // the newest point is the current position
    expect(trail[4].x).toBeCloseTo(scaler.toDisplay(ac.position).x);
    expect(trail[4].y).toBeCloseTo(scaler.toDisplay(ac.position).y);
  });

  it("should decrease distance by speed every tick while farther than speed", () => {
    const ac = createAC(3);
    let previous = ac.distanceToDestination();

    while (previous > ac.speed) {
      engine.advance(ac);
      const current = ac.distanceToDestination();
      expect(previous - current).toBeCloseTo(3);
      previous = current;
    }
  });

  it("should snap to the destination and signal arrival once", () => {
    const ac = createAC(3);
    const arrivals: number[] = [];

    for (let tick = 1; tick <= 30; tick++) {
      if (engine.advance(ac)) arrivals.push(tick);
    }

    // 16 full steps leave 2 units, the 17th snaps
    expect(arrivals).toEqual([17]);
    expect(ac.position).toEqual({ x: 130, y: 140 });
    expect(ac.getTrail()).toEqual([]);
  });

  it("should not move or arrive when already within epsilon", () => {
    const ac = new Aircraft(
      "SPITF",
      { x: 100, y: 100 },
      { x: 100.5, y: 100 },
      1,
      "#A8E6CF",
      space,
    );

    expect(engine.advance(ac)).toBe(false);
    expect(ac.position).toEqual({ x: 100, y: 100 });
    expect(ac.getTrail()).toEqual([]);
  });

  it("should arrive once at fleet speeds below the arrival epsilon", () => {
    // 5 units away at 0.4 per tick: 12 steps leave 0.2, the 13th snaps
    const ac = new Aircraft("MOSSI", { x: 100, y: 100 }, { x: 103, y: 104 }, 0.4, "#E0BBE4", space);
    const arrivals: number[] = [];

    for (let tick = 1; tick <= 40; tick++) {
      if (engine.advance(ac)) arrivals.push(tick);
    }

    expect(arrivals).toEqual([13]);
    expect(ac.position).toEqual({ x: 103, y: 104 });
    expect(ac.approaching).toBe(false);
  });

  it("should arrive again after a new destination is assigned", () => {
    const ac = new Aircraft("MOSSI", { x: 100, y: 100 }, { x: 103, y: 104 }, 0.4, "#E0BBE4", space);
    let arrivals = 0;

    for (let tick = 0; tick < 40; tick++) {
      if (engine.advance(ac)) arrivals++;
    }
    ac.destination = { x: 110, y: 104 };
    for (let tick = 0; tick < 40; tick++) {
      if (engine.advance(ac)) arrivals++;
    }

    expect(arrivals).toBe(2);
    expect(ac.position).toEqual({ x: 110, y: 104 });
  });

  it("should scale the step by dtTicks", () => {
    const ac = createAC(5);

    engine.advance(ac, 2);

    expect(ac.distanceToDestination()).toBeCloseTo(40);
  });
});
