/**
 * Device Module
 * Re-exports all device components
 */

export * from "./device";
export * from "./devel";
export * from "./errors";
export * from "./hydra";
export * from "./interface";
export * from "./recovery";

import type { ShellConnection } from "../connection/interface";
import { DevelDevice } from "./devel";
import { HydraDevice, type HydraOptions } from "./hydra";
import type { UpdatableDevice } from "./interface";

export type DeviceKind = "hydra" | "devel";

/**
 * Create an updatable device with the production or the no-op policy
 */
export function createDevice(
  kind: DeviceKind,
  connections: ShellConnection[],
  options: HydraOptions
): UpdatableDevice {
  if (kind === "devel") {
    return new DevelDevice(connections, { name: options.name });
  }
  return new HydraDevice(connections, options);
}
