import type { Aircraft } from "./Aircraft";
import type { ScopeScaler } from "./ScopeScaler";

/**
 * Constant-speed straight-line motion toward the destination.
 */
export class MotionEngine {
  constructor(
    private readonly scaler: ScopeScaler,
    private readonly arrivalEpsilon: number = 1,
  ) {}

  /**
   * Moves the aircraft one step (speed * dtTicks) toward its destination.
   * Returns true only on the tick that ends an approach, whatever the speed;
   * an aircraft idling on its destination does not arrive again.
   * Picking the next destination is left to the caller.
   */
  advance(ac: Aircraft, dtTicks: number = 1): boolean {
    const step = ac.speed * dtTicks;
    const dist = ac.distanceToDestination();

    if (dist > step) {
      const factor = step / dist;
      ac.position = {
        x: ac.position.x + (ac.destination.x - ac.position.x) * factor,
        y: ac.position.y + (ac.destination.y - ac.position.y) * factor,
      };
      ac.approaching = true;
      ac.addTrailPoint(this.scaler.toDisplay(ac.position));
      return false;
    }

    if (ac.approaching || dist > this.arrivalEpsilon) {
      ac.position = { ...ac.destination };
      ac.approaching = false;
      ac.clearTrail();
      return true;
    }

    return false;
  }
}
