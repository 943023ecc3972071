/**
 * Updatable Device Interface
 * Update/freshness policy on top of a Device; implemented by the production
 * policy (HydraDevice) and the no-op development policy (DevelDevice).
 */

import type { Device, DispatchOptions } from "./device";

export const NOT_SUPPORTED = "not supported";
export type NotSupported = typeof NOT_SUPPORTED;

export interface UpdatableDevice {
  readonly name: string;
  readonly device: Device;

  cmd(msg: string, options?: DispatchOptions): Promise<string>;

  /**
   * Newest build published for this device family
   */
  latestBuild(): Promise<string>;

  /**
   * Version string of the installed firmware, read from the device
   */
  currentFirmwareVersion(): Promise<string>;

  /**
   * Whether the latest build number occurs in the installed version string
   */
  hasNewestFirmware(): Promise<boolean | NotSupported>;

  isUpdated(): Promise<boolean>;

  /**
   * Update to the newest build unless already updated
   * @param link - update archive, defaults to the device's update link
   */
  update(link?: string): Promise<void>;

  /**
   * Wipe the device configuration and halt it. Never rejects.
   */
  resetConfig(): Promise<void>;
}
