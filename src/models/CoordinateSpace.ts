import type { ScopeConfig } from "./ScopeConfig";

export interface Point {
  x: number;
  y: number;
}

/**
 * The fixed logical range [0, max]² that all simulation state lives in.
 * Display size never changes it.
 */
export class VirtualCoordinateSpace {
  readonly max: number;
  readonly radiusFactor: number;

  constructor(max: number, radiusFactor: number) {
    this.max = max;
    this.radiusFactor = radiusFactor;
  }

  static fromConfig(config: Readonly<ScopeConfig>): VirtualCoordinateSpace {
    return new VirtualCoordinateSpace(config.virtualMax, config.scopeRadiusFactor);
  }

  get center(): Point {
    return { x: this.max / 2, y: this.max / 2 };
  }

  /** Scope radius in virtual units. */
  get radius(): number {
    return this.max * this.radiusFactor;
  }

  contains(p: Point): boolean {
    return p.x >= 0 && p.x <= this.max && p.y >= 0 && p.y <= this.max;
  }
}

export function distance(a: Point, b: Point): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  return Math.sqrt(dx * dx + dy * dy);
}
