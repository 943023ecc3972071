/**
 * SSH Connection
 * Runs each command through the system ssh client (key based, no prompts)
 */

import { spawn } from "child_process";
import type { EventEmitter } from "events";
import type { Readable } from "stream";
import { config } from "../config";
import type { CmdOptions, ShellConnection } from "./interface";

/** ssh exits with 255 when the client itself failed */
const SSH_CLIENT_ERROR = 255;

/**
 * The part of ChildProcess this connection uses
 */
export interface ShellProcess extends EventEmitter {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

/**
 * Function to start a process (injectable for testing)
 */
export type SpawnFn = (command: string, args: string[]) => ShellProcess;

export interface SshConnectionOptions {
  host: string;
  user?: string;
  port?: number;
  /** ssh executable, default "ssh" */
  binary?: string;
  spawn?: SpawnFn;
}

export class SshConnection implements ShellConnection {
  lastMatch: string | null = null;
  lastExitStatus: number | null = null;
  private current: ShellProcess | null = null;
  private spawnFn: SpawnFn;

  constructor(private options: SshConnectionOptions) {
    this.spawnFn = options.spawn ?? ((command, args) => spawn(command, args));
  }

  private get target(): string {
    return this.options.user ? `${this.options.user}@${this.options.host}` : this.options.host;
  }

  cmd(msg: string, options: CmdOptions): Promise<string> {
    const loginTimeout = options.loginTimeout ?? config.LOGIN_TIMEOUT;
    const args = [
      "-o", "BatchMode=yes",
      "-o", `ConnectTimeout=${Math.max(1, Math.ceil(loginTimeout / 1000))}`,
      "-p", String(this.options.port ?? 22),
      this.target,
      "--",
      msg,
    ];

    return new Promise((resolve, reject) => {
      const proc = this.spawnFn(this.options.binary ?? "ssh", args);
      this.current = proc;
      let stdout = "";
      let stderr = "";
      let settled = false;

      const finish = (error: Error | null, output = ""): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (this.current === proc) this.current = null;
        if (error) {
          reject(error);
        } else {
          resolve(output);
        }
      };

      const timer = setTimeout(() => {
        proc.kill("SIGKILL");
        finish(new Error(`${this}: no answer to '${msg}' within ${options.timeout}ms`));
      }, options.timeout);

      proc.stdout?.on("data", (data: Buffer | string) => {
        stdout += data.toString();
      });
      proc.stderr?.on("data", (data: Buffer | string) => {
        stderr += data.toString();
      });

      proc.on("error", (err: Error) => {
        finish(new Error(`${this}: ${err.message}`));
      });

      proc.on("close", (code: number | null) => {
        if (options.expect) {
          const match = options.expect.exec(`${stdout}${stderr}`);
          if (!match) {
            finish(new Error(`${this}: '${msg}' ended (exit ${code}) without matching ${options.expect}`));
            return;
          }
          this.lastMatch = match[0];
          this.lastExitStatus = code === SSH_CLIENT_ERROR ? null : code;
          finish(null, stdout.trimEnd());
          return;
        }

        if (code === null || code === SSH_CLIENT_ERROR) {
          finish(new Error(`${this}: ssh failed (exit ${code}): ${stderr.trim()}`));
          return;
        }
        this.lastMatch = null;
        this.lastExitStatus = code;
        finish(null, stdout.trimEnd());
      });
    });
  }

  async disconnect(): Promise<void> {
    const proc = this.current;
    this.current = null;
    proc?.kill("SIGTERM");
  }

  toString(): string {
    return `SshConnection(${this.target}:${this.options.port ?? 22})`;
  }
}
