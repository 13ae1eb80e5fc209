import type { Point, VirtualCoordinateSpace } from "./CoordinateSpace";
import { type RandomSource, randomInRange } from "../utils/Random";

export interface DestinationPolicy {
  nextDestination(rng: RandomSource): Point;
}

/**
 * Random point in the ring [minFactor * R, R] around the scope center.
 * R < MAX / 2, so every point lands inside the virtual space.
 */
export class AnnulusDestinationPolicy implements DestinationPolicy {
  constructor(
    private readonly space: VirtualCoordinateSpace,
    private readonly minFactor: number = 0.2,
  ) {}

  nextDestination(rng: RandomSource): Point {
    const R = this.space.radius;
    const r = randomInRange(rng, R * this.minFactor, R);
    const angle = randomInRange(rng, 0, 2 * Math.PI);
    const c = this.space.center;

    return {
      x: c.x + r * Math.cos(angle),
      y: c.y + r * Math.sin(angle),
    };
  }
}
