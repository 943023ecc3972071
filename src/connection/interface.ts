/**
 * Shell Connection Interface
 * One channel (serial console, SSH, ...) to the target device's shell.
 * Device depends on this abstraction only.
 */

export interface CmdOptions {
  /**
   * Pattern that ends the command instead of the shell prompt,
   * e.g. a login banner after a reboot
   */
  expect?: RegExp;
  /** ms to wait for the prompt or `expect` */
  timeout: number;
  /** ms allowed for logging in when a new session has to be opened */
  loginTimeout?: number;
}

export interface ShellConnection {
  /**
   * Run a shell command and resolve with its output.
   * Rejects on timeout, failed login or a lost channel.
   */
  cmd(msg: string, options: CmdOptions): Promise<string>;

  /**
   * Drop the live session. Idempotent; the next cmd opens a new one.
   */
  disconnect(): Promise<void>;

  /** Text that ended the last command (prompt or `expect` match) */
  readonly lastMatch: string | null;

  /** Exit status of the last command, null when none was reported */
  readonly lastExitStatus: number | null;

  toString(): string;
}
