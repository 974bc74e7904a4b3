/**
 * Audio Source
 *
 * Contract for the platform audio input and the device-selection rule shared by
 * every implementation.
 */

import { AudioDevice, DeviceSelector, Frame } from "../../types/index";
import { DeviceError } from "../../utils/errors";
import { Logger } from "../../utils/logger";

export interface AudioSource {
  /**
   * Resolves the input device once; later calls return the same device.
   * Fails with DeviceError.
   */
  selectDevice(selectDevice: DeviceSelector): Promise<AudioDevice>;

  /**
   * Starts capture on the selected device, selecting it first if needed.
   * Fails with DeviceError.
   */
  open(selectDevice: DeviceSelector): Promise<AudioDevice>;

  /**
   * Waits for the next frame. Resolves `null` once the source is closed and fails
   * with DeviceError when the device stops delivering audio.
   */
  readFrame(): Promise<Frame | null>;

  /**
   * Discards captured audio until `resume()`
   */
  suspend(): void;
  resume(): void;

  /**
   * Releases the device. Safe to call more than once.
   */
  close(): Promise<void>;

  readonly isOpen: boolean;
}

/**
 * Picks the capture device: a configured device that is present, then the default
 * device, and only otherwise asks the operator.
 */
export async function resolveDevice(
  devices: AudioDevice[],
  selectDevice: DeviceSelector,
  preferredId?: string,
  logger: Logger = new Logger("AudioDevice")
): Promise<AudioDevice> {
  if (devices.length === 0) {
    throw new DeviceError("No audio input devices found");
  }

  if (preferredId) {
    const preferred = devices.find((device) => device.id === preferredId);
    if (preferred) {
      return preferred;
    }
    logger.warn("Configured audio device not found, falling back", {
      preferredId,
      available: devices.map((device) => device.id),
    });
  }

  const fallback = devices.find((device) => device.isDefault);
  if (fallback) {
    logger.info("Using default input device", { device: fallback.id });
    return fallback;
  }

  const choice = await selectDevice(devices);
  const selected = devices.find((device) => device.id === choice.id);
  if (!selected) {
    throw new DeviceError(`Selected audio device is not available: ${choice.id}`);
  }
  logger.info("Operator selected input device", { device: selected.id });
  return selected;
}
