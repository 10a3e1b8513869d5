import { describe, expect, it, vi } from "vitest";
import { ServerClock } from "./clock.js";

function clockAt(start: number): { clock: ServerClock; advance: (ms: number) => void } {
  let now = start;
  return {
    clock: new ServerClock(() => now),
    advance: (ms) => {
      now += ms;
    },
  };
}

describe("ServerClock", () => {
  it("should place the server stamp halfway through the round trip", () => {
    const { clock, advance } = clockAt(1_000);

    // Ping at 1000, answered at server time 5050, pong back at 1100
    advance(100);
    clock.processPong(1_000, 5_050);

    expect(clock.getState()).toMatchObject({ averageOffsetMs: 4_000, averageRttMs: 100, isReliable: false });
    expect(clock.serverNow()).toBe(5_100);
    expect(clock.toLocal(5_100)).toBe(1_100);
  });

  it("should become reliable after five samples", () => {
    const { clock, advance } = clockAt(0);

    for (let i = 0; i < 5; i++) {
      const t0 = i * 1_000;
      advance(1_000 - 20);
      clock.processPong(t0, t0 + 10 + 250);
      advance(20);
    }

    expect(clock.isReliable()).toBe(true);
    expect(clock.getState().samples).toHaveLength(5);
    expect(clock.getState().averageOffsetMs).toBeCloseTo(250, 6);
  });

  it("should weight fast round trips over slow ones and drop outliers", () => {
    const { clock, advance } = clockAt(0);

    advance(10);
    clock.processPong(0, 5 + 100); // rtt 10, offset 100
    advance(10);
    clock.processPong(10, 15 + 200); // rtt 10, offset 200
    advance(100);
    clock.processPong(20, 70 + 900); // rtt 100, outlier

    // Median RTT is 10, so the 100 ms sample is ignored
    expect(clock.getState().averageOffsetMs).toBeCloseTo(150, 6);
    expect(clock.getState().averageRttMs).toBe(10);
    expect(clock.getState().samples).toHaveLength(3);
  });

  it("should keep at most seven samples and forget old ones", () => {
    const { clock, advance } = clockAt(0);

    for (let i = 0; i < 9; i++) {
      advance(10);
      clock.processPong(0, 0);
    }
    expect(clock.getState().samples).toHaveLength(7);

    advance(61_000);
    clock.processPong(61_080, 61_090);
    expect(clock.getState().samples).toHaveLength(1);
  });

  it("should notify subscribers and reset", () => {
    const { clock, advance } = clockAt(0);
    const listener = vi.fn();
    const unsubscribe = clock.subscribe(listener);

    advance(10);
    clock.processPong(0, 100);
    clock.reset();
    unsubscribe();
    clock.processPong(0, 100);

    expect(listener).toHaveBeenCalledTimes(2);
    expect(listener).toHaveBeenLastCalledWith({ samples: [], averageOffsetMs: 0, averageRttMs: 0, isReliable: false });
  });
});
