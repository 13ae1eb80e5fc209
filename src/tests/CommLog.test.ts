import { describe, it, expect, vi } from "vitest";
import { CommLog, formatLogEntry, formatTimestamp } from "../managers/CommLog";

describe("CommLog", () => {
  const fixedNow = () => new Date(2024, 0, 1, 9, 5, 7);

  it("should timestamp and tag entries, SYSTEM by default", () => {
    const log = new CommLog(fixedNow);

    log.log("Radar powered up.");
    log.log("SPITF 400 150", "COMMAND");

    expect(log.getEntries()).toEqual([
      { timestamp: fixedNow(), source: "SYSTEM", message: "Radar powered up." },
      { timestamp: fixedNow(), source: "COMMAND", message: "SPITF 400 150" },
    ]);
  });

  it("should notify listeners until they unsubscribe", () => {
    const log = new CommLog(fixedNow);
    const listener = vi.fn();

    const unsubscribe = log.subscribe(listener);
    log.log("first", "PILOT");
    unsubscribe();
    log.log("second", "PILOT");

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith({
      timestamp: fixedNow(),
      source: "PILOT",
      message: "first",
    });
    expect(log.getEntries()).toHaveLength(2);
  });

  it("should format entries as [HH:MM:SS] SOURCE: message", () => {
    expect(formatTimestamp(fixedNow())).toBe("09:05:07");
    expect(
      formatLogEntry({ timestamp: fixedNow(), source: "PILOT", message: "Tally ho!" }),
    ).toBe("[09:05:07] PILOT: Tally ho!");
  });
});
