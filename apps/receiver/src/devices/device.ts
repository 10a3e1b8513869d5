/**
 * Actuator contract shared by every device kind.
 */

import {
  DeviceError,
  errorMessage,
  type DeviceFailureReason,
  type DeviceTarget,
  type HapticCommand,
} from "@remote-haptics/shared";

export interface HapticDevice {
  readonly id: DeviceTarget;
  readonly name: string;
  /** Start the command's effect, replacing whatever is playing. Throws DeviceError. */
  apply(command: HapticCommand): Promise<void>;
  /** Force the actuator to neutral; calling it again changes nothing */
  reset(): Promise<void>;
  /** Check the device is present and writable. Throws DeviceError. */
  probe(): Promise<void>;
}

const ERRNO_REASONS: Record<string, DeviceFailureReason> = {
  EACCES: "permission_denied",
  EPERM: "permission_denied",
  EROFS: "permission_denied",
  ENOENT: "unplugged",
  ENODEV: "unplugged",
  ENXIO: "unplugged",
};

/** Map a filesystem error onto the device failure taxonomy */
export function toDeviceError(target: DeviceTarget, error: unknown, action: string): DeviceError {
  if (error instanceof DeviceError) return error;
  const code =
    typeof error === "object" && error !== null && "code" in error && typeof error.code === "string"
      ? error.code
      : undefined;
  const reason: DeviceFailureReason = (code ? ERRNO_REASONS[code] : undefined) ?? "io";
  return new DeviceError(target, reason, `${target}: ${action} failed: ${errorMessage(error)}`, { cause: error });
}
