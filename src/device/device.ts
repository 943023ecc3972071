/**
 * Device
 * A target device reached over an ordered list of shell connections.
 * Every higher-level operation goes through cmd/dispatch.
 */

import type { CmdOptions, ShellConnection } from "../connection/interface";
import { config } from "../config";
import { Logger } from "../logger";
import { CantHandleError } from "./errors";

export interface DeviceOptions {
  /** Name used in logs and errors, defaults to the class name */
  name?: string;
  /** Receives one error entry per failed connection attempt */
  logger?: Logger;
}

export type DispatchOptions = Partial<CmdOptions>;

export interface DispatchResult {
  output: string;
  /** Connection that ran the command */
  connection: ShellConnection;
  /** Every connection tried, in order, the successful one last */
  attempted: ShellConnection[];
}

type Attempt = { ok: true; output: string } | { ok: false; error: unknown };

async function attempt(connection: ShellConnection, msg: string, options: CmdOptions): Promise<Attempt> {
  try {
    return { ok: true, output: await connection.cmd(msg, options) };
  } catch (error) {
    return { ok: false, error };
  }
}

export class Device {
  readonly name: string;
  private readonly connections: readonly ShellConnection[];
  private readonly logger: Logger;

  constructor(connections: ShellConnection[], options: DeviceOptions = {}) {
    this.connections = [...connections];
    this.name = options.name ?? new.target.name;
    this.logger = options.logger ?? new Logger(`device:${this.name}`);
  }

  getConnections(): readonly ShellConnection[] {
    return this.connections;
  }

  /**
   * Send a shell command and return its output
   *
   * @param options.expect - pattern that ends the command instead of the prompt
   * @param options.timeout - ms before a connection gives up, default 30s
   * @throws CantHandleError when no connection could run the command
   */
  async cmd(msg: string, options: DispatchOptions = {}): Promise<string> {
    const result = await this.dispatch(msg, options);
    return result.output;
  }

  /**
   * Like cmd, but also reports which connections were used.
   * Connections are tried in list order; the first success wins.
   */
  async dispatch(msg: string, options: DispatchOptions = {}): Promise<DispatchResult> {
    const cmdOptions: CmdOptions = {
      expect: options.expect,
      timeout: options.timeout ?? config.CMD_TIMEOUT,
      loginTimeout: options.loginTimeout,
    };
    const attempted: ShellConnection[] = [];

    for (const connection of this.connections) {
      attempted.push(connection);
      const result = await attempt(connection, msg, cmdOptions);
      if (result.ok) {
        return { output: result.output, connection, attempted };
      }
      this.logger.error(`${connection} could not run '${msg}'`, result.error);
    }

    throw new CantHandleError(this.name, this.connections.map(String), msg);
  }

  /**
   * Debug-level log under this device's context
   */
  log(msg: string): void {
    this.logger.debug(msg);
  }

  toString(): string {
    const conns = this.connections.map((c) => `'${c}'`).join(", ");
    return `Device([${conns}]):name=${this.name}`;
  }
}
