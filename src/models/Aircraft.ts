import { type Point, type VirtualCoordinateSpace, distance } from "./CoordinateSpace";
import { RingBuffer } from "../utils/RingBuffer";

export class Aircraft {
  // 位置・目的地は仮想座標 (0..MAX)、航跡だけが表示座標

  readonly id: string;
  readonly speed: number; // virtual units per tick
  readonly color: string; // #RRGGBB
  position: Point;
  // set while flying toward the destination, cleared on arrival
  approaching = false;
  private _destination: Point;

  // 航跡（トレール）: display coordinates, oldest first
  private trail: RingBuffer<Point>;

  constructor(
    id: string,
    position: Point,
    destination: Point,
    speed: number,
    color: string,
    private readonly space: VirtualCoordinateSpace,
    trailLength: number = 5,
  ) {
    if (!Number.isFinite(speed) || speed <= 0) {
      throw new RangeError(`Aircraft ${id}: speed must be positive (got ${speed})`);
    }
    this.id = id;
    this.position = { ...position };
    this.speed = speed;
    this.color = color;
    this.trail = new RingBuffer<Point>(trailLength);
    this._destination = this.checkedDestination(destination);
  }

  get destination(): Point {
    return this._destination;
  }

  set destination(p: Point) {
    this._destination = this.checkedDestination(p);
  }

  private checkedDestination(p: Point): Point {
    if (!this.space.contains(p)) {
      throw new RangeError(
        `Aircraft ${this.id}: destination (${p.x}, ${p.y}) outside 0-${this.space.max}`,
      );
    }
    return { x: p.x, y: p.y };
  }

  distanceToDestination(): number {
    return distance(this.position, this._destination);
  }

  addTrailPoint(p: Point) {
    this.trail.push({ x: p.x, y: p.y });
  }

  clearTrail() {
    this.trail.clear();
  }

  getTrail(): Point[] {
    return this.trail.toArray();
  }

  /** Label drawn under the blip, from the virtual position. */
  get coordinateLabel(): string {
    return `X=${Math.trunc(this.position.x)}, Y=${Math.trunc(this.position.y)}`;
  }
}
