/**
 * Development device: commands work, nothing is updated or reset.
 * Use it in place of HydraDevice while writing tests around a device.
 */

import type { ShellConnection } from "../connection/interface";
import { Device, type DeviceOptions, type DispatchOptions } from "./device";
import { NOT_SUPPORTED, type NotSupported, type UpdatableDevice } from "./interface";

export class DevelDevice implements UpdatableDevice {
  readonly device: Device;

  constructor(connections: ShellConnection[], options: DeviceOptions = {}) {
    this.device = new Device(connections, { name: options.name ?? "DevelDevice" });
  }

  get name(): string {
    return this.device.name;
  }

  cmd(msg: string, options?: DispatchOptions): Promise<string> {
    return this.device.cmd(msg, options);
  }

  async latestBuild(): Promise<NotSupported> {
    return NOT_SUPPORTED;
  }

  async currentFirmwareVersion(): Promise<NotSupported> {
    return NOT_SUPPORTED;
  }

  async hasNewestFirmware(): Promise<NotSupported> {
    return NOT_SUPPORTED;
  }

  async isUpdated(): Promise<boolean> {
    return true;
  }

  async update(link?: string): Promise<void> {
    this.device.log(`skipping update${link ? ` to ${link}` : ""}`);
  }

  async resetConfig(): Promise<void> {
    this.device.log("skipping config reset");
  }

  toString(): string {
    return this.device.toString().replace(/^Device/, "DevelDevice");
  }
}
