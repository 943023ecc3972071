/**
 * Device layer errors
 */

export class DeviceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * No connection of a device could run a command
 */
export class CantHandleError extends DeviceError {
  constructor(
    readonly device: string,
    readonly connections: string[],
    readonly command: string
  ) {
    const conns = connections.map((c) => `'${c}'`).join(", ");
    super(`dev:'${device}',conns:[${conns}]:could not send cmd '${command}'`);
  }
}

export type UpdateFailureReason = "exit-status" | "not-updated" | "not-recovered";

export interface UpdateFailure {
  reason: UpdateFailureReason;
  exitStatus: number | null;
  output: string;
  latestBuild?: string;
  firmwareVersion?: string;
}

/**
 * An update did not finish or was rolled back
 */
export class UpdateFailedError extends DeviceError {
  readonly reason: UpdateFailureReason;
  readonly exitStatus: number | null;
  readonly output: string;
  readonly latestBuild?: string;
  readonly firmwareVersion?: string;

  constructor(failure: UpdateFailure) {
    super(
      `${failure.reason}:build:${failure.latestBuild ?? "?"};fw:${failure.firmwareVersion ?? "?"};` +
        `exit:${failure.exitStatus ?? "none"};out:${failure.output.slice(0, 100)}`
    );
    this.reason = failure.reason;
    this.exitStatus = failure.exitStatus;
    this.output = failure.output;
    this.latestBuild = failure.latestBuild;
    this.firmwareVersion = failure.firmwareVersion;
  }
}
