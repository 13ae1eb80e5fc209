import { Aircraft } from "../models/Aircraft";
import type { VirtualCoordinateSpace } from "../models/CoordinateSpace";
import type { DestinationPolicy } from "../models/DestinationPolicy";
import type { ScopeConfig } from "../models/ScopeConfig";
import { type RandomSource, randomInRange } from "../utils/Random";
import manifestData from "../data/manifest.json";

export interface ManifestEntry {
  id: string;
  color: string;
}

export const DEFAULT_MANIFEST: readonly ManifestEntry[] = manifestData;

export class SpawnManager {
  constructor(
    private config: Readonly<ScopeConfig>,
    private space: VirtualCoordinateSpace,
    private policy: DestinationPolicy,
    private rng: RandomSource,
  ) {}

  /**
   * Creates one aircraft per manifest entry, scattered inside the inner part of
   * the scope, each with a first destination from the policy.
   */
  public spawnFleet(manifest: readonly ManifestEntry[] = DEFAULT_MANIFEST): Aircraft[] {
    const seen = new Set<string>();
    return manifest.map((entry) => {
      const id = entry.id.toUpperCase();
      if (seen.has(id)) {
        throw new Error(`Duplicate aircraft id in manifest: ${id}`);
      }
      seen.add(id);
      return this.spawnAircraft(id, entry.color);
    });
  }

  private spawnAircraft(id: string, color: string): Aircraft {
    const c = this.space.center;
    const r = randomInRange(this.rng, 0, this.space.radius * this.config.spawnRadiusFactor);
    const angle = randomInRange(this.rng, 0, 2 * Math.PI);
    const position = { x: c.x + r * Math.cos(angle), y: c.y + r * Math.sin(angle) };
    const speed = this.config.baseSpeed + this.rng() * this.config.speedJitter;

    return new Aircraft(
      id,
      position,
      this.policy.nextDestination(this.rng),
      speed,
      color,
      this.space,
      this.config.trailLength,
    );
  }
}
