import type { Device } from "../domain/audio/types";
import { DeviceEnumerationError, describeError } from "../domain/errors";
import type { AudioDevicePort, RawDeviceInfo } from "../ports/audio/AudioDevicePort";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import { ConsoleLogger } from "../adapters/sys/ConsoleLogger";

export class DeviceRegistry {
  constructor(
    private readonly backend: AudioDevicePort,
    private readonly logger: LoggerPort = new ConsoleLogger()
  ) {}

  /** Snapshot of the input devices currently reported by the audio layer. Opens nothing. */
  listDevices(): Device[] {
    let raw: RawDeviceInfo[];
    try {
      raw = this.backend.listDevices();
    } catch (err) {
      throw new DeviceEnumerationError(`Could not enumerate audio devices (${describeError(err)}).`, {
        cause: err,
      });
    }

    return raw
      .map((info, index) => ({ info, index }))
      .filter(({ info }) => info.maxInputChannels > 0)
      .map(({ info, index }) =>
        Object.freeze({
          index,
          name: info.name,
          channelCount: info.maxInputChannels,
          defaultSampleRate: info.defaultSampleRate,
        })
      );
  }

  /**
   * Resolves a user-facing label: "default" (or nothing) gives `undefined`,
   * digits select by index, anything else matches a name case-insensitively.
   */
  findDevice(label?: string): Device | undefined {
    if (!label || label.toLowerCase() === "default") return undefined;

    const devices = this.listDevices();
    const match = /^\d+$/.test(label)
      ? devices.find((device) => device.index === Number.parseInt(label, 10))
      : devices.find((device) => device.name.toLowerCase().includes(label.toLowerCase()));

    if (match) {
      this.logger.info(`Audio device matched "${label}": [${match.index}] ${match.name}`);
      return match;
    }

    const available = devices.map((device) => `  [${device.index}] ${device.name}`).join("\n");
    throw new DeviceEnumerationError(
      `Audio device "${label}" not found. Available devices:\n${available || "  (none)"}`
    );
  }
}
