/**
 * Device registry.
 *
 * Resolves command targets to devices, tracks availability and turns device
 * failures into ack outcomes and status reports. A failed device stays out of
 * rotation until a rediscovery pass probes it successfully.
 */

import {
  BROADCAST_TARGET,
  DeviceError,
  type AckStatus,
  type DeviceFailureReason,
  type DeviceInfo,
  type DeviceStatusPayload,
  type DeviceTarget,
  type HapticCommand,
} from "@remote-haptics/shared";
import { toDeviceError, type HapticDevice } from "./device.js";

export interface ApplyOutcome {
  status: Exclude<AckStatus, "expired">;
  detail?: string;
}

export type DeviceStatusListener = (status: DeviceStatusPayload) => void;

interface Entry {
  device: HapticDevice;
  available: boolean;
  reason: DeviceFailureReason | null;
}

export class DeviceRegistry {
  private readonly entries = new Map<DeviceTarget, Entry>();
  private readonly listeners = new Set<DeviceStatusListener>();
  private rediscoverTimer: NodeJS.Timeout | null = null;
  private rediscovering = false;

  constructor(devices: HapticDevice[]) {
    for (const device of devices) {
      if (device.id === BROADCAST_TARGET) {
        throw new Error(`Device id "${BROADCAST_TARGET}" is reserved`);
      }
      if (this.entries.has(device.id)) {
        throw new Error(`Duplicate device id: ${device.id}`);
      }
      this.entries.set(device.id, { device, available: true, reason: null });
    }
  }

  /** Devices as announced in HELLO */
  list(): DeviceInfo[] {
    return [...this.entries.values()].map(({ device, available }) => ({
      id: device.id,
      name: device.name,
      available,
    }));
  }

  isAvailable(target: DeviceTarget): boolean {
    return this.entries.get(target)?.available === true;
  }

  /** Subscribe to availability changes */
  onStatus(listener: DeviceStatusListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  // ==========================================================================
  // Actuation
  // ==========================================================================

  async apply(command: HapticCommand): Promise<ApplyOutcome> {
    if (command.deviceTarget === BROADCAST_TARGET) {
      const targets = [...this.entries.values()].filter((entry) => entry.available);
      if (targets.length === 0) {
        return { status: "device_error", detail: "no available devices" };
      }
      const results = await Promise.all(targets.map((entry) => this.applyTo(entry, command)));
      const failed = results.filter((error): error is DeviceError => error !== null);
      if (failed.length === targets.length) {
        return { status: "device_error", detail: failed.map((error) => error.message).join("; ") };
      }
      return { status: "applied" };
    }

    const entry = this.entries.get(command.deviceTarget);
    if (!entry) {
      return { status: "unknown_target" };
    }
    if (!entry.available) {
      return { status: "device_error", detail: `${command.deviceTarget} unavailable (${entry.reason ?? "io"})` };
    }
    const error = await this.applyTo(entry, command);
    return error ? { status: "device_error", detail: error.message } : { status: "applied" };
  }

  /** Force every device to neutral; failures mark the device unavailable */
  async resetAll(): Promise<void> {
    await Promise.all(
      [...this.entries.values()].map(async (entry) => {
        try {
          await entry.device.reset();
        } catch (error) {
          this.markUnavailable(entry, toDeviceError(entry.device.id, error, "reset"));
        }
      })
    );
  }

  private async applyTo(entry: Entry, command: HapticCommand): Promise<DeviceError | null> {
    try {
      await entry.device.apply(command);
      return null;
    } catch (error) {
      const deviceError = toDeviceError(entry.device.id, error, "apply");
      this.markUnavailable(entry, deviceError);
      return deviceError;
    }
  }

  // ==========================================================================
  // Availability
  // ==========================================================================

  /** Probe unavailable devices and restore the ones that answer */
  async rediscover(): Promise<DeviceTarget[]> {
    if (this.rediscovering) return [];
    this.rediscovering = true;
    const restored: DeviceTarget[] = [];
    try {
      for (const entry of this.entries.values()) {
        if (entry.available) continue;
        try {
          await entry.device.probe();
          await entry.device.reset();
        } catch {
          // Still gone; try again next pass
          continue;
        }
        entry.available = true;
        entry.reason = null;
        restored.push(entry.device.id);
        console.log(`[devices] restored target=${entry.device.id}`);
        this.notify({ deviceTarget: entry.device.id, available: true });
      }
    } finally {
      this.rediscovering = false;
    }
    return restored;
  }

  startRediscovery(intervalMs: number): void {
    if (this.rediscoverTimer) return;
    this.rediscoverTimer = setInterval(() => {
      this.rediscover().catch((error: unknown) => {
        console.error("[devices] rediscovery failed:", error);
      });
    }, intervalMs);
    this.rediscoverTimer.unref();
  }

  stopRediscovery(): void {
    if (this.rediscoverTimer) {
      clearInterval(this.rediscoverTimer);
      this.rediscoverTimer = null;
    }
  }

  private markUnavailable(entry: Entry, error: DeviceError): void {
    if (!entry.available) return;
    entry.available = false;
    entry.reason = error.reason;
    console.warn(`[devices] unavailable target=${entry.device.id} reason=${error.reason}: ${error.message}`);
    this.notify({ deviceTarget: entry.device.id, available: false, reason: error.reason });
  }

  private notify(status: DeviceStatusPayload): void {
    for (const listener of this.listeners) {
      listener(status);
    }
  }
}
