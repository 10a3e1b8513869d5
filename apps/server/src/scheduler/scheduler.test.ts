import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createImpulse, type CommandId, type HapticCommand } from "@remote-haptics/shared";
import { FakePlayback } from "../testing/fakePlayback.js";
import { EventScheduler, type CommandSink } from "./scheduler.js";

const START = 100_000;

interface Sent {
  command: HapticCommand;
  preempts: CommandId | undefined;
}

describe("EventScheduler", () => {
  let playback: FakePlayback;
  let sent: Sent[];
  let sink: CommandSink;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(START);
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    playback = new FakePlayback({ position: 9 });
    sent = [];
    sink = {
      dispatch: (command, preempts) => {
        sent.push({ command, preempts });
      },
    };
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe("dispatch time", () => {
    it("schedules an impulse one second ahead of the playhead one second out", () => {
      const scheduler = new EventScheduler(playback, sink);
      scheduler.submit(createImpulse(10, 0.8));

      expect(scheduler.pendingCommands()).toEqual([
        { commandId: "cmd-1", dispatchTime: START + 1000, intensity: 0.8, durationMs: 120, deviceTarget: "broadcast" },
      ]);

      vi.advanceTimersByTime(999);
      expect(sent).toHaveLength(0);
      vi.advanceTimersByTime(1);
      expect(sent.map((s) => s.command.commandId)).toEqual(["cmd-1"]);
    });

    it("divides the media offset by the playback rate", () => {
      playback.set({ rate: 2 });
      const scheduler = new EventScheduler(playback, sink);
      scheduler.submit(createImpulse(11, 0.5));
      expect(scheduler.pendingCommands()[0]?.dispatchTime).toBe(START + 1000);
    });

    it("fires impulses slightly behind the playhead immediately", () => {
      const scheduler = new EventScheduler(playback, sink);
      scheduler.submit(createImpulse(8.9, 0.5));
      expect(scheduler.pendingCommands()[0]?.dispatchTime).toBe(START);
    });

    it("drops impulses beyond the late tolerance", () => {
      const scheduler = new EventScheduler(playback, sink);
      scheduler.submit(createImpulse(8, 0.5));
      expect(scheduler.pendingCommands()).toHaveLength(0);
      expect(scheduler.stats().dropped.late).toBe(1);
    });

    it("keeps dispatch order non-decreasing for increasing timestamps", () => {
      const scheduler = new EventScheduler(playback, sink);
      for (const timestamp of [9.1, 9.3, 9.6, 10.2, 10.9]) {
        scheduler.submit(createImpulse(timestamp, 0.5));
      }
      vi.advanceTimersByTime(3000);

      const times = sent.map((s) => s.command.dispatchTime);
      expect(times).toHaveLength(5);
      expect([...times].sort((a, b) => a - b)).toEqual(times);
      expect(sent.every((s) => s.preempts === undefined)).toBe(true);
    });

    it("scales and clamps intensity", () => {
      const scheduler = new EventScheduler(playback, sink, { intensityScale: 2 });
      scheduler.submit(createImpulse(10, 0.3));
      scheduler.submit(createImpulse(10.5, 0.8));
      expect(scheduler.pendingCommands().map((c) => c.intensity)).toEqual([0.6, 1]);
    });
  });

  describe("routing", () => {
    it("maps channels to targets and broadcasts the rest", () => {
      const scheduler = new EventScheduler(playback, sink, {
        routes: new Map([
          [0, "left"],
          [1, "right"],
        ]),
      });
      scheduler.submit(createImpulse(10, 0.5, 1));
      scheduler.submit(createImpulse(10.5, 0.5, 4));
      scheduler.submit(createImpulse(11, 0.5));

      expect(scheduler.pendingCommands().map((c) => c.deviceTarget)).toEqual(["right", "broadcast", "broadcast"]);
    });
  });

  describe("holding", () => {
    it("keeps the most recent impulses while paused", () => {
      playback.set({ rate: 0 });
      const scheduler = new EventScheduler(playback, sink, { queueBound: 2 });
      scheduler.submit(createImpulse(10, 0.1));
      scheduler.submit(createImpulse(11, 0.2));
      scheduler.submit(createImpulse(12, 0.3));

      expect(scheduler.queuedImpulses().map((i) => i.timestamp)).toEqual([11, 12]);
      expect(scheduler.pendingCommands()).toHaveLength(0);
      expect(scheduler.stats().dropped.overflow).toBe(1);
      expect(scheduler.stats().held).toBe(true);
    });

    it("schedules held impulses when playback resumes", () => {
      playback.set({ rate: 0 });
      const scheduler = new EventScheduler(playback, sink);
      scheduler.submit(createImpulse(10, 0.5));
      scheduler.submit(createImpulse(11, 0.5));

      playback.set({ rate: 1, sequence: 2 }, "rate");

      expect(scheduler.queuedImpulses()).toHaveLength(0);
      expect(scheduler.pendingCommands().map((c) => c.dispatchTime)).toEqual([START + 1000, START + 2000]);
      vi.advanceTimersByTime(2000);
      expect(sent).toHaveLength(2);
    });

    it("returns pending impulses to the queue when playback pauses", () => {
      const scheduler = new EventScheduler(playback, sink);
      scheduler.submit(createImpulse(10, 0.5));

      playback.set({ rate: 0, sequence: 2 }, "rate");
      vi.advanceTimersByTime(5000);

      expect(sent).toHaveLength(0);
      expect(scheduler.queuedImpulses().map((i) => i.timestamp)).toEqual([10]);
    });

    it("reschedules pending commands after a speed change", () => {
      const scheduler = new EventScheduler(playback, sink);
      scheduler.submit(createImpulse(11, 0.5));
      expect(scheduler.pendingCommands()[0]?.dispatchTime).toBe(START + 2000);

      playback.set({ rate: 2, sequence: 2 }, "rate");

      expect(scheduler.pendingCommands()).toHaveLength(1);
      expect(scheduler.pendingCommands()[0]?.dispatchTime).toBe(START + 1000);
      vi.advanceTimersByTime(1000);
      expect(sent).toHaveLength(1);
    });

    it("holds while the player connection is stale or unavailable", () => {
      const scheduler = new EventScheduler(playback, sink);
      scheduler.submit(createImpulse(10, 0.5));

      playback.set({ stale: true }, "stale");
      expect(scheduler.pendingCommands()).toHaveLength(0);
      expect(scheduler.queuedImpulses()).toHaveLength(1);

      playback.available = false;
      playback.set({}, "unavailable");
      scheduler.submit(createImpulse(10.5, 0.5));
      expect(scheduler.queuedImpulses()).toHaveLength(2);

      playback.available = true;
      playback.set({ stale: false, sequence: 2 }, "restored");
      expect(scheduler.pendingCommands()).toHaveLength(2);
      vi.advanceTimersByTime(1500);
      expect(sent).toHaveLength(2);
    });
  });

  describe("stale-seek", () => {
    it("drops pending and held work on seek", () => {
      const scheduler = new EventScheduler(playback, sink);
      scheduler.submit(createImpulse(10, 0.5));
      scheduler.submit(createImpulse(10.5, 0.5));

      playback.set({ position: 30, sequence: 2 }, "seek");
      vi.advanceTimersByTime(5000);

      expect(sent).toHaveLength(0);
      expect(scheduler.pendingCommands()).toHaveLength(0);
      expect(scheduler.stats().dropped.stale).toBe(2);
    });

    it("drops impulses submitted while a seek is settling", () => {
      const scheduler = new EventScheduler(playback, sink);
      playback.set({ sequence: 2 }, "seek");

      // Old pass still computed against the pre-seek playhead
      scheduler.submit(createImpulse(9.3, 0.5));
      scheduler.submit(createImpulse(9.7, 0.5));
      expect(scheduler.pendingCommands()).toHaveLength(0);

      playback.set({ position: 30, sequence: 3 }, "seek-complete");
      scheduler.submit(createImpulse(30.5, 0.5));
      vi.advanceTimersByTime(5000);

      expect(sent.map((s) => s.command.commandId)).toEqual(["cmd-1"]);
      expect(scheduler.stats().dropped.stale).toBe(2);
    });

    it("never dispatches a command whose sequence changed", () => {
      const scheduler = new EventScheduler(playback, sink);
      scheduler.submit(createImpulse(10, 0.5));

      // Sequence moves without a notification reaching the scheduler first
      playback.set({ sequence: 2 });
      vi.advanceTimersByTime(1000);

      expect(sent).toHaveLength(0);
      expect(scheduler.stats().dropped.stale).toBe(1);
    });

    it("drops everything at end of media", () => {
      const scheduler = new EventScheduler(playback, sink);
      scheduler.submit(createImpulse(10, 0.5));
      playback.set({ rate: 0, sequence: 2 }, "end");
      expect(scheduler.pendingCommands()).toHaveLength(0);
      expect(scheduler.queuedImpulses()).toHaveLength(0);
    });
  });

  describe("pre-emption", () => {
    it("marks an overlapping command as pre-empting the one in flight", () => {
      const scheduler = new EventScheduler(playback, sink);
      scheduler.submit(createImpulse(10, 0.5));
      scheduler.submit(createImpulse(10.05, 0.7));
      vi.advanceTimersByTime(1100);

      expect(sent.map((s) => [s.command.commandId, s.preempts])).toEqual([
        ["cmd-1", undefined],
        ["cmd-2", "cmd-1"],
      ]);
      expect(scheduler.stats().preemptions).toBe(1);
    });

    it("does not pre-empt across targets or after the window closed", () => {
      const scheduler = new EventScheduler(playback, sink, { routes: new Map([[0, "left"]]) });
      scheduler.submit(createImpulse(10, 0.5, 0));
      scheduler.submit(createImpulse(10.05, 0.5));
      scheduler.submit(createImpulse(10.5, 0.5, 0));
      vi.advanceTimersByTime(2000);

      expect(sent.map((s) => s.preempts)).toEqual([undefined, undefined, undefined]);
    });

    it("cancels the earlier of two overlapping commands due together", () => {
      playback.set({ position: 10 });
      const scheduler = new EventScheduler(playback, sink);
      scheduler.submit(createImpulse(9.9, 0.5));
      scheduler.submit(createImpulse(9.95, 0.6));
      vi.advanceTimersByTime(0);

      expect(sent.map((s) => s.command.commandId)).toEqual(["cmd-2"]);
      expect(scheduler.stats().dropped.preempted).toBe(1);
    });
  });

  describe("lifecycle", () => {
    it("moves idle -> scheduling -> draining -> idle", () => {
      const scheduler = new EventScheduler(playback, sink);
      expect(scheduler.getState()).toBe("idle");

      scheduler.submit(createImpulse(10, 0.5));
      expect(scheduler.getState()).toBe("scheduling");

      scheduler.endOfStream();
      expect(scheduler.getState()).toBe("draining");

      vi.advanceTimersByTime(1000);
      expect(scheduler.getState()).toBe("idle");
      expect(sent).toHaveLength(1);
    });

    it("goes straight to idle when nothing is pending", () => {
      const scheduler = new EventScheduler(playback, sink);
      scheduler.submit(createImpulse(1, 0.5));
      scheduler.endOfStream();
      expect(scheduler.getState()).toBe("idle");
    });

    it("stop clears all work", () => {
      const scheduler = new EventScheduler(playback, sink);
      scheduler.submit(createImpulse(10, 0.5));
      scheduler.stop();
      vi.advanceTimersByTime(2000);
      expect(sent).toHaveLength(0);
      expect(scheduler.getState()).toBe("idle");
    });

    it("stops listening after dispose", () => {
      const scheduler = new EventScheduler(playback, sink);
      scheduler.dispose();
      playback.set({ rate: 0 });
      scheduler.submit(createImpulse(10, 0.5));
      playback.set({ rate: 1, sequence: 2 }, "rate");
      expect(scheduler.pendingCommands()).toHaveLength(0);
    });

    it("keeps dispatching when the sink throws", () => {
      const errors = vi.spyOn(console, "error").mockImplementation(() => undefined);
      const failing: CommandSink = {
        dispatch: (command) => {
          if (command.commandId === "cmd-1") throw new Error("socket gone");
          sent.push({ command, preempts: undefined });
        },
      };
      const scheduler = new EventScheduler(playback, failing);
      scheduler.submit(createImpulse(10, 0.5));
      scheduler.submit(createImpulse(10.5, 0.5));
      vi.advanceTimersByTime(2000);

      expect(sent.map((s) => s.command.commandId)).toEqual(["cmd-2"]);
      expect(errors).toHaveBeenCalledWith("[scheduler] dispatch failed commandId=cmd-1: socket gone");
      expect(scheduler.stats().dispatched).toBe(2);
    });
  });
});
