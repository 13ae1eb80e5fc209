import { VirtualCoordinateSpace } from "../models/CoordinateSpace";
import {
  AnnulusDestinationPolicy,
  type DestinationPolicy,
} from "../models/DestinationPolicy";
import type { DisplayPort } from "../models/RenderFrame";
import { DEFAULT_SCOPE_CONFIG, type ScopeConfig } from "../models/ScopeConfig";
import { ScopeScaler } from "../models/ScopeScaler";
import { type RandomSource, createSeededRandom } from "../utils/Random";
import { CommandSystem, type CommandResult } from "./CommandSystem";
import type { LogSink } from "./CommLog";
import { SimulationClock } from "./SimulationClock";
import { DEFAULT_MANIFEST, type ManifestEntry, SpawnManager } from "./SpawnManager";
import { TrafficManager } from "./TrafficManager";

export interface SimulationOptions {
  manifest?: readonly ManifestEntry[];
  rng?: RandomSource;
  policy?: DestinationPolicy;
}

export class RadarSimulation {
  public readonly traffic: TrafficManager;
  private readonly commands: CommandSystem;
  private readonly clock: SimulationClock;
  private readonly space: VirtualCoordinateSpace;

  constructor(
    private display: DisplayPort,
    private log: LogSink,
    config: Readonly<ScopeConfig> = DEFAULT_SCOPE_CONFIG,
    options: SimulationOptions = {},
  ) {
    this.space = VirtualCoordinateSpace.fromConfig(config);
    const rng =
      options.rng ??
      (config.seed !== null ? createSeededRandom(config.seed) : Math.random);
    const policy =
      options.policy ??
      new AnnulusDestinationPolicy(this.space, config.minDestinationFactor);

    const spawner = new SpawnManager(config, this.space, policy, rng);
    const fleet = spawner.spawnFleet(options.manifest ?? DEFAULT_MANIFEST);

    const scaler = new ScopeScaler(this.space, display.getExtent());
    this.traffic = new TrafficManager(
      fleet,
      scaler,
      policy,
      rng,
      log,
      config.arrivalEpsilon,
    );
    this.commands = new CommandSystem(this.traffic, this.space);
    this.clock = new SimulationClock(config.tickIntervalMs, () => this.tick());
  }

  public start() {
    if (this.clock.isRunning()) return;

    const max = this.space.max;
    this.log.log("Radar powered up. Scanning initiated.", "SYSTEM");
    this.log.log(
      `INSTRUCTIONS: Command format: [CODE] [X] [Y] where X, Y are 0-${max} (e.g., FW190 400 150). F11 for Fullscreen.`,
      "SYSTEM",
    );
    this.log.log(
      "Aircraft Codes: " + this.traffic.getAircrafts().map((ac) => ac.id).join(", "),
      "SYSTEM",
    );

    this.display.render(this.traffic.buildFrame());
    this.clock.start();
  }

  public stop() {
    this.clock.stop();
  }

  public isRunning(): boolean {
    return this.clock.isRunning();
  }

  /** One tick: rescale to the current display, move, redraw. */
  public tick() {
    this.traffic.resize(this.display.getExtent());
    this.traffic.update();
    this.display.render(this.traffic.buildFrame());
  }

  public handleResize(extent: number) {
    this.traffic.resize(extent);
  }

  public submitCommand(raw: string): CommandResult {
    const result = this.commands.handle(raw);
    this.log.log(result.echo, "COMMAND");
    this.log.log(result.systemLog, "SYSTEM");
    if (result.pilotLog) {
      this.log.log(result.pilotLog, "PILOT");
    }
    return result;
  }
}
