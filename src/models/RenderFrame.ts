import type { Point } from "./CoordinateSpace";
import type { ScopeGeometry } from "./ScopeScaler";

// Everything here is in display coordinates except `label`,
// which shows the virtual position.
export interface AircraftView {
  id: string;
  color: string;
  position: Point;
  destination: Point;
  trail: Point[];
  label: string;
}

export interface RenderFrame {
  scope: ScopeGeometry;
  aircraft: AircraftView[];
}

export interface RenderSink {
  render(frame: RenderFrame): void;
}

/** The display as the simulation sees it: a size to scale to and a place to draw. */
export interface DisplayPort extends RenderSink {
  getExtent(): number;
}
