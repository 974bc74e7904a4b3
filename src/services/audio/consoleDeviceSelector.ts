import { createInterface } from "readline/promises";
import { AudioDevice, DeviceSelector } from "../../types/index";
import { DeviceError } from "../../utils/errors";

/**
 * Prompts the operator on the terminal until a listed device number is entered.
 * Only used when no default input device exists.
 */
export function createConsoleDeviceSelector(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): DeviceSelector {
  return async (candidates: AudioDevice[]): Promise<AudioDevice> => {
    if (candidates.length === 0) {
      throw new DeviceError("No audio input devices to choose from");
    }

    const rl = createInterface({ input, output });
    try {
      output.write("\nAvailable input devices:\n");
      candidates.forEach((device, index) => {
        output.write(`  ${index + 1}. ${device.name} (${device.id})\n`);
      });

      for (;;) {
        const answer = await rl.question(`Select input device [1-${candidates.length}]: `);
        const choice = candidates[Number.parseInt(answer.trim(), 10) - 1];
        if (choice) {
          return choice;
        }
        output.write("Invalid selection, try again.\n");
      }
    } finally {
      rl.close();
    }
  };
}
