import type { Aircraft } from "../models/Aircraft";
import type { DestinationPolicy } from "../models/DestinationPolicy";
import { MotionEngine } from "../models/MotionEngine";
import type { RenderFrame } from "../models/RenderFrame";
import type { ScopeScaler } from "../models/ScopeScaler";
import type { RandomSource } from "../utils/Random";
import type { AircraftRegistry } from "./CommandSystem";
import type { LogSink } from "./CommLog";

/**
 * Owns the aircraft. Every mutation of aircraft state goes through here or
 * through the CommandSystem handed this registry, on the same event loop.
 */
export class TrafficManager implements AircraftRegistry {
  private readonly aircrafts: Aircraft[];
  private readonly engine: MotionEngine;

  constructor(
    aircrafts: Aircraft[],
    private scaler: ScopeScaler,
    private policy: DestinationPolicy,
    private rng: RandomSource,
    private log: LogSink,
    arrivalEpsilon: number = 1,
  ) {
    this.aircrafts = [...aircrafts];
    this.engine = new MotionEngine(scaler, arrivalEpsilon);
  }

  public getAircrafts(): readonly Aircraft[] {
    return this.aircrafts;
  }

  public getAircraftById(id: string): Aircraft | null {
    const key = id.toUpperCase();
    return this.aircrafts.find((ac) => ac.id.toUpperCase() === key) ?? null;
  }

  /**
   * Applies a new display extent. Trails hold display coordinates taken at the
   * old scale, so they are dropped whenever the scale changes.
   */
  public resize(extent: number): boolean {
    const changed = this.scaler.resize(extent);
    if (changed) {
      this.aircrafts.forEach((ac) => ac.clearTrail());
    }
    return changed;
  }

  /** Advances every aircraft one tick; arrivals get a fresh destination. */
  public update(dtTicks: number = 1) {
    this.aircrafts.forEach((ac) => {
      const arrived = this.engine.advance(ac, dtTicks);
      if (arrived) {
        this.log.log(`ACFT ${ac.id}: I'm at the target area. Awaiting new orders.`, "PILOT");
        ac.destination = this.policy.nextDestination(this.rng);
      }
    });
  }

  public buildFrame(): RenderFrame {
    return {
      scope: this.scaler.geometry(),
      aircraft: this.aircrafts.map((ac) => ({
        id: ac.id,
        color: ac.color,
        position: this.scaler.toDisplay(ac.position),
        destination: this.scaler.toDisplay(ac.destination),
        trail: ac.getTrail(),
        label: ac.coordinateLabel,
      })),
    };
  }
}
