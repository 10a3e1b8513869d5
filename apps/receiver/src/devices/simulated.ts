/**
 * In-memory actuator for tests and `--device sim:<id>`.
 */

import {
  DeviceError,
  type CommandId,
  type DeviceFailureReason,
  type DeviceTarget,
  type HapticCommand,
} from "@remote-haptics/shared";
import type { HapticDevice } from "./device.js";

export interface SimulatedState {
  intensity: number;
  activeCommandId: CommandId | null;
  /** Wall-clock ms at which the current effect stops */
  effectEndsAt: number | null;
}

const NEUTRAL: SimulatedState = Object.freeze({ intensity: 0, activeCommandId: null, effectEndsAt: null });

export class SimulatedDevice implements HapticDevice {
  private state: SimulatedState = NEUTRAL;
  private failure: DeviceFailureReason | null = null;
  /** Every command that reached the actuator, in order */
  readonly applied: CommandId[] = [];
  resets = 0;

  constructor(
    readonly id: DeviceTarget,
    readonly name: string = `Simulated ${id}`
  ) {}

  snapshot(): SimulatedState {
    return this.state;
  }

  /** Intensity the actuator outputs at `now` */
  intensityAt(now: number = Date.now()): number {
    const { effectEndsAt, intensity } = this.state;
    return effectEndsAt !== null && now < effectEndsAt ? intensity : 0;
  }

  /** Make every call fail with `reason` until cleared with null */
  fail(reason: DeviceFailureReason | null): void {
    this.failure = reason;
  }

  async apply(command: HapticCommand): Promise<void> {
    this.check("apply");
    // The effect runs from arrival for the command's full duration
    this.state = Object.freeze({
      intensity: command.intensity,
      activeCommandId: command.commandId,
      effectEndsAt: Date.now() + command.durationMs,
    });
    this.applied.push(command.commandId);
  }

  async reset(): Promise<void> {
    this.check("reset");
    this.state = NEUTRAL;
    this.resets++;
  }

  async probe(): Promise<void> {
    this.check("probe");
  }

  private check(action: string): void {
    if (this.failure) {
      throw new DeviceError(this.id, this.failure, `${this.id}: ${action} failed: simulated ${this.failure}`);
    }
  }
}
