import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { PlayerUnavailableError } from "@remote-haptics/shared";
import { FakeMpv, tempSocketPath } from "../testing/fakeMpv.js";
import { backoffDelay } from "./backoff.js";
import { LiveClock, type PlaybackChange } from "./playbackSource.js";
import { PlaybackTracker } from "./tracker.js";

const FAST_BACKOFF = { initialMs: 5, factor: 2, maxMs: 20 };

describe("PlaybackTracker", () => {
  let mpv: FakeMpv;
  let tracker: PlaybackTracker;
  let changes: PlaybackChange[];

  beforeEach(async () => {
    mpv = new FakeMpv();
    mpv.properties.set("time-pos", 12.5);
    await mpv.start();
    tracker = new PlaybackTracker({ socketPath: mpv.socketPath, backoff: FAST_BACKOFF, maxRetries: 5 });
    changes = [];
    tracker.subscribe(({ change }) => changes.push(change));
  });

  afterEach(async () => {
    tracker.stop();
    await mpv.stop();
  });

  async function connected(): Promise<void> {
    tracker.start();
    await vi.waitFor(() => expect(tracker.getStatus()).toBe("connected"));
  }

  it("publishes a fresh snapshot on connect", async () => {
    expect(tracker.currentState().stale).toBe(true);
    await connected();

    const state = tracker.currentState();
    expect(state.position).toBe(12.5);
    expect(state.rate).toBe(1);
    expect(state.sequence).toBe(1);
    expect(state.stale).toBe(false);
    expect(changes).toEqual(["restored"]);
    expect(Object.isFrozen(state)).toBe(true);
  });

  it("observes position, pause, speed and end of media", async () => {
    await connected();
    const names = mpv.received.filter((args) => args[0] === "observe_property").map((args) => args[2]);
    expect(names).toEqual(["time-pos", "pause", "speed", "eof-reached"]);
  });

  it("refreshes position without moving the sequence", async () => {
    await connected();
    mpv.setProperty("time-pos", 14);
    await vi.waitFor(() => expect(tracker.currentState().position).toBe(14));
    expect(tracker.currentState().sequence).toBe(1);
    expect(changes).toEqual(["restored"]);
  });

  it("bumps the sequence on pause and speed changes", async () => {
    await connected();

    mpv.setProperty("pause", true);
    await vi.waitFor(() => expect(tracker.currentState().rate).toBe(0));
    expect(tracker.currentState().sequence).toBe(2);

    mpv.setProperty("speed", 1.5);
    mpv.setProperty("pause", false);
    await vi.waitFor(() => expect(tracker.currentState().rate).toBe(1.5));
    expect(tracker.currentState().sequence).toBe(3);
    expect(changes).toEqual(["restored", "rate", "rate"]);
  });

  it("reports seeks and the settled position", async () => {
    await connected();

    mpv.seekTo(40);
    await vi.waitFor(() => expect(changes).toContain("seek-complete"));

    expect(changes).toEqual(["restored", "seek", "seek-complete"]);
    // Once when the seek starts, again when it settles
    expect(tracker.currentState().sequence).toBe(3);
    expect(tracker.currentState().position).toBeCloseTo(40, 1);
  });

  it("reports end of media once", async () => {
    await connected();
    mpv.setProperty("eof-reached", true);
    mpv.broadcast({ event: "end-file", reason: "eof" });

    await vi.waitFor(() => expect(changes).toContain("end"));
    expect(tracker.currentState().rate).toBe(0);
    expect(changes.filter((c) => c === "end")).toHaveLength(1);
  });

  it("flags the snapshot stale on disconnect and restores it", async () => {
    await connected();

    mpv.dropClients();
    await vi.waitFor(() => expect(changes).toContain("stale"));
    expect(tracker.currentState().stale).toBe(true);

    await vi.waitFor(() => expect(changes.filter((c) => c === "restored")).toHaveLength(2));
    expect(tracker.currentState().stale).toBe(false);
    expect(tracker.currentState().sequence).toBe(2);
  });

  it("sends transport commands", async () => {
    await connected();

    await tracker.seek(90);
    await tracker.setPaused(true);

    expect(mpv.received).toContainEqual(["seek", 90, "absolute"]);
    expect(mpv.received).toContainEqual(["set_property", "pause", true]);
  });
});

describe("PlaybackTracker without a player", () => {
  it("declares the player unavailable after the retry ceiling", async () => {
    const socketPath = tempSocketPath("absent");
    const tracker = new PlaybackTracker({ socketPath, backoff: FAST_BACKOFF, maxRetries: 3 });
    const changes: PlaybackChange[] = [];
    tracker.subscribe(({ change }) => changes.push(change));

    tracker.start();
    await vi.waitFor(() => expect(tracker.getStatus()).toBe("unavailable"));

    expect(tracker.available).toBe(false);
    expect(changes).toEqual(["unavailable"]);
    expect(tracker.getUnavailableError()).toBeInstanceOf(PlayerUnavailableError);
    await expect(tracker.seek(1)).rejects.toBeInstanceOf(PlayerUnavailableError);

    const mpv = new FakeMpv(socketPath);
    await mpv.start();
    try {
      tracker.reconnect();
      await vi.waitFor(() => expect(tracker.getStatus()).toBe("connected"));
      expect(tracker.available).toBe(true);
      expect(tracker.getUnavailableError()).toBeNull();
    } finally {
      tracker.stop();
      await mpv.stop();
    }
  });
});

describe("PlaybackTracker past the retry ceiling", () => {
  it("keeps retrying and recovers when the player comes back", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const socketPath = tempSocketPath("late");
    const tracker = new PlaybackTracker({ socketPath, backoff: FAST_BACKOFF, maxRetries: 2 });
    const changes: PlaybackChange[] = [];
    tracker.subscribe(({ change }) => changes.push(change));

    tracker.start();
    await vi.waitFor(() => expect(tracker.getStatus()).toBe("unavailable"));
    // Several rechecks fail quietly before the player starts
    await new Promise((resolve) => setTimeout(resolve, 100));
    expect(changes).toEqual(["unavailable"]);

    const mpv = new FakeMpv(socketPath);
    await mpv.start();
    try {
      await vi.waitFor(() => expect(tracker.getStatus()).toBe("connected"));
      expect(changes).toEqual(["unavailable", "restored"]);
      expect(tracker.available).toBe(true);
      expect(tracker.currentState().stale).toBe(false);
    } finally {
      tracker.stop();
      await mpv.stop();
      vi.restoreAllMocks();
    }
  });
});

describe("backoffDelay", () => {
  it("grows exponentially up to the cap", () => {
    expect([0, 1, 2, 3, 4, 5, 6].map((attempt) => backoffDelay(attempt))).toEqual([
      250, 500, 1000, 2000, 4000, 5000, 5000,
    ]);
  });
});

describe("LiveClock", () => {
  it("advances in real time and never goes stale", () => {
    const clock = new LiveClock(1_000);
    expect(clock.positionAt(3_500)).toBe(2.5);
    expect(clock.currentState()).toEqual({ position: 0, rate: 1, sequence: 1, updatedAt: 1_000, stale: false });
    expect(clock.available).toBe(true);
  });

  it("restarts the timeline at the capture start", () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const clock = new LiveClock(1_000);

    clock.anchor(1_200);

    expect(clock.positionAt(1_500)).toBeCloseTo(0.3, 9);
    expect(clock.currentState()).toEqual({ position: 0, rate: 1, sequence: 2, updatedAt: 1_200, stale: false });
    vi.restoreAllMocks();
  });
});
