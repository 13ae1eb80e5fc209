import type { Aircraft } from "../models/Aircraft";
import type { VirtualCoordinateSpace } from "../models/CoordinateSpace";

export type CommandErrorKind =
  | "MALFORMED_SYNTAX"
  | "INVALID_NUMBER"
  | "UNKNOWN_AIRCRAFT"
  | "OUT_OF_BOUNDS";

export interface CommandError {
  kind: CommandErrorKind;
  message: string;
}

export interface RetargetCommand {
  type: "RETARGET";
  aircraftId: string;
  x: number;
  y: number;
}

export type InterpretResult =
  | { ok: true; command: RetargetCommand }
  | { ok: false; error: CommandError };

export interface CommandResult {
  handled: boolean;
  echo: string; // normalized input, as the operator typed it
  systemLog: string;
  pilotLog?: string;
  command?: RetargetCommand;
  error?: CommandError;
}

export interface AircraftRegistry {
  getAircraftById(id: string): Aircraft | null;
}

// plain decimal, optional exponent. No hex, no NaN/Infinity.
const NUMBER_TOKEN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:E[+-]?\d+)?$/i;

function parseCoordinate(token: string): number | null {
  if (!NUMBER_TOKEN.test(token)) return null;
  const value = Number(token);
  return Number.isFinite(value) ? value : null;
}

export class CommandSystem {
  constructor(
    private registry: AircraftRegistry,
    private space: VirtualCoordinateSpace,
  ) {}

  public static normalize(raw: string): string {
    return raw.trim().toUpperCase();
  }

  /**
   * Parses `IDENTIFIER X Y`. Checks run in order: token count, numbers,
   * aircraft id, bounds. Nothing is mutated here.
   */
  public interpret(raw: string): InterpretResult {
    const command = CommandSystem.normalize(raw);
    const parts = command.split(/\s+/).filter((p) => p.length > 0);

    if (parts.length !== 3) {
      return this.fail(
        "MALFORMED_SYNTAX",
        "ERROR: Invalid format. Use: [CODE] [X] [Y] (e.g., SPITF 400 150).",
      );
    }

    const [code, rawX, rawY] = parts;
    const x = parseCoordinate(rawX);
    const y = parseCoordinate(rawY);
    if (x === null || y === null) {
      return this.fail("INVALID_NUMBER", "ERROR: Coordinates must be numbers.");
    }

    const ac = this.registry.getAircraftById(code);
    if (!ac) {
      return this.fail("UNKNOWN_AIRCRAFT", `ERROR: Aircraft code ${code} not found.`);
    }

    if (!this.space.contains({ x, y })) {
      return this.fail(
        "OUT_OF_BOUNDS",
        `ERROR: Destination (${Math.trunc(x)}, ${Math.trunc(y)}) outside of tactical scope (0-${this.space.max}).`,
      );
    }

    return { ok: true, command: { type: "RETARGET", aircraftId: ac.id, x, y } };
  }

  /**
   * Interprets and applies. An accepted command overrides whatever destination
   * the aircraft was flying to and drops its trail.
   */
  public handle(raw: string): CommandResult {
    const echo = CommandSystem.normalize(raw);
    const outcome = this.interpret(echo);

    if (!outcome.ok) {
      return {
        handled: false,
        echo,
        systemLog: outcome.error.message,
        error: outcome.error,
      };
    }

    const { command } = outcome;
    const ac = this.registry.getAircraftById(command.aircraftId);
    if (!ac) {
      // interpret() just resolved this id against the same registry
      throw new Error(`Aircraft ${command.aircraftId} disappeared from the registry`);
    }

    ac.destination = { x: command.x, y: command.y };
    ac.clearTrail();

    const xi = Math.trunc(command.x);
    const yi = Math.trunc(command.y);
    return {
      handled: true,
      echo,
      command,
      systemLog: `ACFT ${ac.id} cleared direct X=${xi}, Y=${yi}.`,
      pilotLog: `ACFT ${ac.id}: Roger, turning to intercept coordinates X=${xi}, Y=${yi}. Tally ho!`,
    };
  }

  private fail(kind: CommandErrorKind, message: string): InterpretResult {
    return { ok: false, error: { kind, message } };
  }
}
