/**
 * Fixed-interval tick driver. Holds no simulation state: each tick calls
 * `onTick` and then arms the next one, until stop().
 */
export class SimulationClock {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private tickCount = 0;

  constructor(
    private readonly intervalMs: number,
    private readonly onTick: () => void,
  ) {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new Error(`Tick interval must be positive (got ${intervalMs})`);
    }
  }

  start(): void {
    if (this.running) {
      console.warn("SimulationClock already running");
      return;
    }
    this.running = true;
    this.arm();
  }

  stop(): void {
    this.running = false;
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  getTickCount(): number {
    return this.tickCount;
  }

  private arm(): void {
    this.timer = setTimeout(this.fire, this.intervalMs);
  }

  private fire = (): void => {
    this.timer = null;
    if (!this.running) return;
    this.tickCount++;
    try {
      this.onTick();
    } finally {
      // a failing tick still reaches the host, but the loop keeps going
      if (this.running) this.arm();
    }
  };
}
