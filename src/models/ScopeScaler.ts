import type { Point, VirtualCoordinateSpace } from "./CoordinateSpace";

export interface ScopeGeometry {
  extent: number; // side of the square drawable area (px)
  center: Point; // px
  radius: number; // px
  virtualMax: number;
}

/**
 * Maps virtual coordinates onto a square display area of side `extent` and back.
 * Only the extent is stored; everything else is derived from it on read.
 */
export class ScopeScaler {
  private extent: number;

  constructor(
    private readonly space: VirtualCoordinateSpace,
    extent: number = space.max,
  ) {
    this.extent = ScopeScaler.checkExtent(extent);
  }

  private static checkExtent(extent: number): number {
    if (!Number.isFinite(extent) || extent <= 0) {
      throw new RangeError(`Display extent must be positive (got ${extent})`);
    }
    return extent;
  }

  /**
   * Applies a new extent. Returns true when the scale actually changed, so the
   * caller knows display-space history is stale.
   */
  resize(extent: number): boolean {
    const next = ScopeScaler.checkExtent(extent);
    if (next === this.extent) return false;
    this.extent = next;
    return true;
  }

  getExtent(): number {
    return this.extent;
  }

  get scale(): number {
    return this.extent / this.space.max;
  }

  toDisplay(p: Point): Point {
    const s = this.scale;
    return { x: p.x * s, y: p.y * s };
  }

  toVirtual(p: Point): Point {
    const s = this.space.max / this.extent;
    return { x: p.x * s, y: p.y * s };
  }

  geometry(): ScopeGeometry {
    return {
      extent: this.extent,
      center: { x: this.extent / 2, y: this.extent / 2 },
      radius: this.extent * this.space.radiusFactor,
      virtualMax: this.space.max,
    };
  }
}
