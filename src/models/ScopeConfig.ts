export interface ScopeConfig {
  /** Upper bound of the virtual coordinate range on both axes. */
  virtualMax: number;
  /** Scope radius as a fraction of the drawable extent. */
  scopeRadiusFactor: number;
  /** Inner radius of the destination annulus, as a fraction of the scope radius. */
  minDestinationFactor: number;
  /** Aircraft start inside this fraction of the scope radius. */
  spawnRadiusFactor: number;
  baseSpeed: number; // virtual units per tick
  speedJitter: number; // extra speed, scaled by rng()
  arrivalEpsilon: number; // virtual units
  trailLength: number;
  tickIntervalMs: number;
  /** Seed for the destination RNG. null means Math.random. */
  seed: number | null;
}

const DEFAULT_VIRTUAL_MAX = 600;
// 20 units of margin between the scope edge and the canvas edge
const DEFAULT_SCOPE_MARGIN = 20;

export const DEFAULT_SCOPE_CONFIG: Readonly<ScopeConfig> = Object.freeze({
  virtualMax: DEFAULT_VIRTUAL_MAX,
  scopeRadiusFactor: 0.5 - DEFAULT_SCOPE_MARGIN / DEFAULT_VIRTUAL_MAX,
  minDestinationFactor: 0.2,
  spawnRadiusFactor: 0.7,
  baseSpeed: 0.35,
  speedJitter: 0.15,
  arrivalEpsilon: 1,
  trailLength: 5,
  tickIntervalMs: 33,
  seed: null,
});

function requirePositive(key: keyof ScopeConfig, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Config ${key} must be a positive number (got ${value})`);
  }
}

function requireFraction(key: keyof ScopeConfig, value: number, max: number): void {
  if (!Number.isFinite(value) || value <= 0 || value > max) {
    throw new Error(`Config ${key} must be in (0, ${max}] (got ${value})`);
  }
}

/**
 * Builds a frozen configuration from the defaults and the given overrides.
 * Throws when a value would break the scope geometry.
 */
export function createScopeConfig(
  overrides: Partial<ScopeConfig> = {},
): Readonly<ScopeConfig> {
  const config: ScopeConfig = { ...DEFAULT_SCOPE_CONFIG, ...overrides };

  requirePositive("virtualMax", config.virtualMax);
  requirePositive("baseSpeed", config.baseSpeed);
  requirePositive("arrivalEpsilon", config.arrivalEpsilon);
  requirePositive("tickIntervalMs", config.tickIntervalMs);
  // destinations must stay inside [0, MAX]², so the radius stays under MAX/2
  if (
    !Number.isFinite(config.scopeRadiusFactor) ||
    config.scopeRadiusFactor <= 0 ||
    config.scopeRadiusFactor >= 0.5
  ) {
    throw new Error(
      `Config scopeRadiusFactor must be in (0, 0.5) (got ${config.scopeRadiusFactor})`,
    );
  }
  requireFraction("minDestinationFactor", config.minDestinationFactor, 1);
  requireFraction("spawnRadiusFactor", config.spawnRadiusFactor, 1);

  if (!Number.isFinite(config.speedJitter) || config.speedJitter < 0) {
    throw new Error(
      `Config speedJitter must be zero or positive (got ${config.speedJitter})`,
    );
  }
  if (!Number.isInteger(config.trailLength) || config.trailLength < 1) {
    throw new Error(
      `Config trailLength must be an integer >= 1 (got ${config.trailLength})`,
    );
  }
  if (config.seed !== null && !Number.isInteger(config.seed)) {
    throw new Error(`Config seed must be an integer (got ${config.seed})`);
  }

  return Object.freeze(config);
}

function readOptionalNumber(
  params: URLSearchParams,
  key: string,
): number | undefined {
  const value = params.get(key);
  if (value === null || value.trim() === "") {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Query parameter ${key} must be a valid number`);
  }
  return parsed;
}

/**
 * Reads overrides from a page query string: `?seed=42&tick=50&max=800`.
 */
export function readConfigOverrides(search: string): Partial<ScopeConfig> {
  const params = new URLSearchParams(search);
  const overrides: Partial<ScopeConfig> = {};

  const seed = readOptionalNumber(params, "seed");
  if (seed !== undefined) overrides.seed = seed;

  const tick = readOptionalNumber(params, "tick");
  if (tick !== undefined) overrides.tickIntervalMs = tick;

  const max = readOptionalNumber(params, "max");
  if (max !== undefined) {
    overrides.virtualMax = max;
    // keep the 20-unit margin when the range changes
    overrides.scopeRadiusFactor = 0.5 - DEFAULT_SCOPE_MARGIN / max;
  }

  return overrides;
}
