/**
 * Linux LED-class vibrator driven through the transient trigger.
 *
 * The LED directory (e.g. /sys/class/leds/vibrator) must already have
 * `transient` selected as its trigger, which exposes `activate`, `duration`
 * and `state`. The trigger is on/off: intensity only decides whether the
 * motor runs at all.
 */

import { constants } from "fs";
import { access, writeFile } from "fs/promises";
import { basename, join } from "path";
import type { DeviceTarget, HapticCommand } from "@remote-haptics/shared";
import { toDeviceError, type HapticDevice } from "./device.js";

const CONTROL_FILES = ["activate", "duration", "state", "brightness"] as const;
type ControlFile = (typeof CONTROL_FILES)[number];

export class SysfsVibratorDevice implements HapticDevice {
  readonly name: string;

  constructor(
    readonly id: DeviceTarget,
    readonly path: string,
    name?: string
  ) {
    this.name = name ?? basename(path);
  }

  async apply(command: HapticCommand): Promise<void> {
    const durationMs = Math.round(command.durationMs);
    if (command.intensity <= 0 || durationMs <= 0) {
      await this.reset();
      return;
    }
    // Cancel the running timer so the new duration counts from now
    await this.write("activate", "0");
    await this.write("duration", String(durationMs));
    await this.write("state", "1");
    await this.write("activate", "1");
  }

  async reset(): Promise<void> {
    await this.write("activate", "0");
    await this.write("brightness", "0");
  }

  async probe(): Promise<void> {
    for (const file of CONTROL_FILES) {
      try {
        await access(join(this.path, file), constants.W_OK);
      } catch (error) {
        throw toDeviceError(this.id, error, `open ${file}`);
      }
    }
  }

  private async write(file: ControlFile, value: string): Promise<void> {
    try {
      // r+ never creates: a missing attribute means the device went away
      await writeFile(join(this.path, file), value, { flag: "r+" });
    } catch (error) {
      throw toDeviceError(this.id, error, `write ${file}`);
    }
  }
}
