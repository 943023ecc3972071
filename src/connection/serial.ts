/**
 * Serial Connection
 * Drives the device's login shell on a serial console
 */

import { SerialPort } from "serialport";
import { config } from "../config";
import type { CmdOptions, ShellConnection } from "./interface";

/** Printed after each command together with its exit status */
export const STATUS_MARKER = "__RC__";
export const DEFAULT_PROMPT = /[#$] $/;
const LOGIN_PROMPT = /[lL]ogin: ?$/;
const PASSWORD_PROMPT = /[pP]assword: ?$/;

/**
 * Opened serial line as seen by the connection
 */
export interface SerialLink {
  write(data: string): void;
  close(): Promise<void>;
  onData(listener: (chunk: string) => void): void;
  onClose(listener: () => void): void;
}

/**
 * Function to open a serial line (injectable for testing)
 */
export type OpenLinkFn = (path: string, baudRate: number) => Promise<SerialLink>;

/**
 * Default link using the serialport library
 */
export function openSerialLink(path: string, baudRate: number): Promise<SerialLink> {
  return new Promise((resolve, reject) => {
    const port = new SerialPort(
      {
        path,
        baudRate,
        dataBits: 8,
        parity: "none",
        stopBits: 1,
        rtscts: false,
      },
      (err) => {
        if (err) {
          reject(err);
          return;
        }
        resolve({
          write: (data) => {
            port.write(data);
          },
          close: () =>
            new Promise((done, fail) => {
              if (!port.isOpen) {
                done();
                return;
              }
              port.close((closeErr) => (closeErr ? fail(closeErr) : done()));
            }),
          onData: (listener) => {
            port.on("data", (data: Buffer) => listener(data.toString("utf-8")));
          },
          onClose: (listener) => {
            port.on("close", () => listener());
          },
        });
      }
    );
  });
}

export interface SerialPortInfo {
  path: string;
  manufacturer?: string;
  vendorId?: string;
  productId?: string;
}

/**
 * List all serial ports
 */
export async function listSerialPorts(): Promise<SerialPortInfo[]> {
  const ports = await SerialPort.list();
  return ports.map((p) => ({
    path: p.path,
    manufacturer: p.manufacturer,
    vendorId: p.vendorId,
    productId: p.productId,
  }));
}

export interface SerialConnectionOptions {
  port: string;
  baudRate?: number;
  user?: string;
  password?: string;
  /** Shell prompt at the end of the output, default `# ` or `$ ` */
  prompt?: RegExp;
  openLink?: OpenLinkFn;
}

interface Waiter {
  pattern: RegExp;
  resolve: (match: RegExpExecArray) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

const compact = (text: string): string => text.replace(/\s+/g, "");

/**
 * Drop the echoed command from captured console text. A long command
 * wraps at the console width, so its echo can span several lines.
 */
function stripEcho(text: string, sent: string): string {
  const lines = text.split(/\r?\n/);
  const wanted = compact(sent);
  let echoed = "";
  for (let i = 0; i < lines.length; i++) {
    echoed += compact(lines[i]);
    if (echoed.includes(wanted)) {
      return lines.slice(i + 1).join("\n").trim();
    }
  }
  // Echo turned off or mangled
  return lines.slice(1).join("\n").trim();
}

export class SerialConnection implements ShellConnection {
  lastMatch: string | null = null;
  lastExitStatus: number | null = null;
  private link: SerialLink | null = null;
  private buffer = "";
  private waiter: Waiter | null = null;
  private prompt: RegExp;
  private openLink: OpenLinkFn;

  constructor(private options: SerialConnectionOptions) {
    this.prompt = options.prompt ?? DEFAULT_PROMPT;
    this.openLink = options.openLink ?? openSerialLink;
  }

  async cmd(msg: string, options: CmdOptions): Promise<string> {
    const link = await this.session(options.loginTimeout ?? config.LOGIN_TIMEOUT);
    this.buffer = "";

    if (options.expect) {
      link.write(`${msg}\n`);
      const match = await this.waitFor(options.expect, options.timeout);
      this.lastMatch = match[0];
      this.lastExitStatus = null;
      return stripEcho(match.input.slice(0, match.index), msg);
    }

    const line = `${msg}; echo "${STATUS_MARKER}$?"`;
    link.write(`${line}\n`);
    const done = new RegExp(`${STATUS_MARKER}(\\d+)\\r?\\n[\\s\\S]*?(${this.prompt.source})`);
    const match = await this.waitFor(done, options.timeout);
    this.lastMatch = match[2];
    this.lastExitStatus = parseInt(match[1], 10);
    return stripEcho(match.input.slice(0, match.index), line);
  }

  async disconnect(): Promise<void> {
    const link = this.link;
    this.link = null;
    this.buffer = "";
    this.failWaiter(new Error(`${this}: disconnected`));
    await link?.close();
  }

  isConnected(): boolean {
    return this.link !== null;
  }

  toString(): string {
    return `SerialConnection(${this.options.port})`;
  }

  /**
   * Live link, opened and logged in on first use
   */
  private async session(loginTimeout: number): Promise<SerialLink> {
    if (this.link) return this.link;

    const link = await this.openLink(this.options.port, this.options.baudRate ?? config.BAUD_RATE);
    this.link = link;
    this.buffer = "";
    link.onData((chunk) => {
      this.buffer += chunk;
      this.checkWaiter();
    });
    link.onClose(() => {
      if (this.link !== link) return;
      this.link = null;
      this.failWaiter(new Error(`${this}: port closed`));
    });

    try {
      await this.login(link, loginTimeout);
    } catch (error) {
      await this.disconnect();
      throw error;
    }
    return link;
  }

  private async login(link: SerialLink, timeout: number): Promise<void> {
    // Wake the console, it answers with a login or a shell prompt
    link.write("\n");
    const greeting = await this.waitFor(new RegExp(`${LOGIN_PROMPT.source}|${this.prompt.source}`), timeout);
    if (!LOGIN_PROMPT.test(greeting[0])) return;

    if (!this.options.user) {
      throw new Error(`${this}: login prompt but no user configured`);
    }
    link.write(`${this.options.user}\n`);
    const next = await this.waitFor(new RegExp(`${PASSWORD_PROMPT.source}|${this.prompt.source}`), timeout);
    if (PASSWORD_PROMPT.test(next[0])) {
      link.write(`${this.options.password ?? ""}\n`);
      await this.waitFor(this.prompt, timeout);
    }
  }

  private waitFor(pattern: RegExp, timeout: number): Promise<RegExpExecArray> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.failWaiter(new Error(`${this}: no match for ${pattern} within ${timeout}ms`));
      }, timeout);
      this.waiter = { pattern, resolve, reject, timer };
      this.checkWaiter();
    });
  }

  private checkWaiter(): void {
    const waiter = this.waiter;
    if (!waiter) return;
    const match = waiter.pattern.exec(this.buffer);
    if (!match) return;

    this.waiter = null;
    clearTimeout(waiter.timer);
    this.buffer = this.buffer.slice(match.index + match[0].length);
    waiter.resolve(match);
  }

  private failWaiter(error: Error): void {
    const waiter = this.waiter;
    if (!waiter) return;
    this.waiter = null;
    clearTimeout(waiter.timer);
    waiter.reject(error);
  }
}
