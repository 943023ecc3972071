/**
 * Hydra Device
 * Production update policy: compare the installed firmware with the newest
 * published build, run the on-device updater and verify the result.
 */

import type { BuildSource } from "../builds/source";
import type { ShellConnection } from "../connection/interface";
import { config } from "../config";
import { Logger } from "../logger";
import { Device, type DispatchOptions } from "./device";
import { CantHandleError, UpdateFailedError } from "./errors";
import type { UpdatableDevice } from "./interface";
import { delay, pollUntil, type ClockFn, type SleepFn } from "./recovery";

export const FIRMWARE_VERSION_CMD = "do-update --current-update-version | awk '{print $2}'";
export const RESET_CONFIG_CMD = "rm -rf /var/lib/connman/* && hip-activate-config --reset && sync && halt -p";
export const RECOVERY_PROBE_CMD = "true";

/**
 * Login prompt after the reboot, or ssh reporting the closed session.
 * Without a terminal ssh prints "Connection to <host> closed by remote host."
 */
export const UPDATE_EXPECT = /([lL]ogin: )|([cC]onnection\sto\s\S*\sclosed( by remote host)?\.)/;
export const RESET_EXPECT = /([lL]ogin:)|([cC]onnection\sto\s\S*\sclosed( by remote host)?\.)|(Timeout.*\.)|(INFO - LAN)/;

export function updateCommand(link: string): string {
  // One command line: the reboot may end the session before a second call
  return `do-update -c && get-update ${link} && do-update`;
}

export interface HydraTimeouts {
  /** ms for download, apply and reboot */
  update: number;
  /** ms to wait for the device to answer after the update */
  recovery: number;
  recoveryPollInterval: number;
  reset: number;
  resetLogin: number;
  /** ms paused after a configuration reset */
  resetSettle: number;
}

export interface HydraOptions {
  name?: string;
  /** Default update archive location */
  updateLink: string;
  buildSource: BuildSource;
  timeouts?: Partial<HydraTimeouts>;
  sleep?: SleepFn;
  now?: ClockFn;
}

interface Freshness {
  latestBuild: string;
  firmwareVersion: string;
  fresh: boolean;
}

export class HydraDevice implements UpdatableDevice {
  readonly device: Device;
  readonly updateLink: string;
  readonly buildSource: BuildSource;
  private readonly timeouts: HydraTimeouts;
  private readonly sleep: SleepFn;
  private readonly now: ClockFn;
  private readonly logger: Logger;

  constructor(connections: ShellConnection[], options: HydraOptions) {
    this.device = new Device(connections, { name: options.name ?? "Hydra" });
    this.updateLink = options.updateLink;
    this.buildSource = options.buildSource;
    this.timeouts = {
      update: config.UPDATE_TIMEOUT,
      recovery: config.RECOVERY_TIMEOUT,
      recoveryPollInterval: config.RECOVERY_POLL_INTERVAL,
      reset: config.RESET_TIMEOUT,
      resetLogin: config.RESET_LOGIN_TIMEOUT,
      resetSettle: config.RESET_SETTLE,
      ...options.timeouts,
    };
    this.sleep = options.sleep ?? delay;
    this.now = options.now ?? Date.now;
    this.logger = new Logger(`device:${this.device.name}`);
  }

  get name(): string {
    return this.device.name;
  }

  get buildMetadataUri(): string {
    return this.buildSource.uri;
  }

  cmd(msg: string, options?: DispatchOptions): Promise<string> {
    return this.device.cmd(msg, options);
  }

  latestBuild(): Promise<string> {
    return this.buildSource.latestBuildNumber();
  }

  async currentFirmwareVersion(): Promise<string> {
    const out = await this.device.cmd(FIRMWARE_VERSION_CMD);
    return out.trim();
  }

  async hasNewestFirmware(): Promise<boolean> {
    const { fresh } = await this.freshness();
    return fresh;
  }

  isUpdated(): Promise<boolean> {
    return this.hasNewestFirmware();
  }

  async update(link?: string): Promise<void> {
    const target = link ?? this.updateLink;
    this.logger.info(`Attempt update to ${target}`);

    if (await this.isUpdated()) {
      this.logger.info("Already updated.");
      return;
    }

    const result = await this.device.dispatch(updateCommand(target), {
      expect: UPDATE_EXPECT,
      timeout: this.timeouts.update,
    });
    const exitStatus = result.connection.lastExitStatus;
    this.logger.debug("reset connections after reboot", {
      match: result.connection.lastMatch,
      exitStatus,
    });
    await this.disconnect(result.attempted);

    this.logger.debug("wait till device recovered from updating");
    if (!(await this.waitForRecovery())) {
      throw new UpdateFailedError({ reason: "not-recovered", exitStatus, output: result.output });
    }
    this.logger.debug("continue");

    if (exitStatus !== null && exitStatus !== 0) {
      const found = await this.freshness().catch((error: unknown) => {
        this.logger.error("could not check firmware after failed update", error);
        return null;
      });
      throw new UpdateFailedError({
        reason: "exit-status",
        exitStatus,
        output: result.output,
        latestBuild: found?.latestBuild,
        firmwareVersion: found?.firmwareVersion,
      });
    }

    const { latestBuild, firmwareVersion, fresh } = await this.freshness();
    if (!fresh) {
      throw new UpdateFailedError({ reason: "not-updated", exitStatus, output: result.output, latestBuild, firmwareVersion });
    }
    this.logger.info(`Updated to build ${latestBuild}`, { firmwareVersion });
  }

  async resetConfig(): Promise<void> {
    try {
      const result = await this.device.dispatch(RESET_CONFIG_CMD, {
        expect: RESET_EXPECT,
        timeout: this.timeouts.reset,
        loginTimeout: this.timeouts.resetLogin,
      });
      if (!(result.connection.lastMatch ?? "").toLowerCase().includes("login")) {
        this.logger.debug("reset connections after config reset");
        await this.disconnect(result.attempted);
      }
      this.logger.debug("wait till device recovered from config reset");
      await this.sleep(this.timeouts.resetSettle);
      this.logger.debug("continue");
    } catch (error) {
      this.logger.error("config reset failed", error);
    }
  }

  toString(): string {
    return this.device.toString().replace(/^Device/, "HydraDevice");
  }

  // Not cached, every call queries build source and device
  private async freshness(): Promise<Freshness> {
    const latestBuild = await this.latestBuild();
    const firmwareVersion = await this.currentFirmwareVersion();
    // Substring match: "42" is also found in "rel-420"
    return { latestBuild, firmwareVersion, fresh: firmwareVersion.includes(latestBuild) };
  }

  private async disconnect(connections: ShellConnection[]): Promise<void> {
    for (const connection of connections) {
      try {
        await connection.disconnect();
      } catch (error) {
        this.logger.error(`could not disconnect ${connection}`, error);
      }
    }
  }

  private waitForRecovery(): Promise<boolean> {
    return pollUntil(
      async () => {
        try {
          await this.device.cmd(RECOVERY_PROBE_CMD, { timeout: this.timeouts.recoveryPollInterval });
          return true;
        } catch (error) {
          if (error instanceof CantHandleError) return false;
          throw error;
        }
      },
      {
        timeout: this.timeouts.recovery,
        interval: this.timeouts.recoveryPollInterval,
        sleep: this.sleep,
        now: this.now,
      }
    );
  }
}
