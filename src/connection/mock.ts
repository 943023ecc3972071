/**
 * Mock Shell Connection for Testing
 * Can replace a real connection wherever a ShellConnection is expected
 */

import type { CmdOptions, ShellConnection } from "./interface";

export type MockReply =
  | { output: string; exitStatus?: number | null; match?: string | null }
  | { error: Error };

export type MockHandler = (msg: string, options: CmdOptions) => MockReply;

export interface MockCall {
  msg: string;
  options: CmdOptions;
}

export class MockConnection implements ShellConnection {
  lastMatch: string | null = null;
  lastExitStatus: number | null = null;
  public calls: MockCall[] = [];
  public disconnectCalls = 0;

  constructor(
    private label: string,
    private handler: MockHandler = () => ({ output: "" })
  ) {}

  async cmd(msg: string, options: CmdOptions): Promise<string> {
    this.calls.push({ msg, options });
    const reply = this.handler(msg, options);
    if ("error" in reply) {
      throw reply.error;
    }
    this.lastMatch = reply.match ?? null;
    this.lastExitStatus = reply.exitStatus === undefined ? 0 : reply.exitStatus;
    return reply.output;
  }

  async disconnect(): Promise<void> {
    this.disconnectCalls++;
  }

  commands(): string[] {
    return this.calls.map((call) => call.msg);
  }

  toString(): string {
    return this.label;
  }
}

/**
 * Connection whose every command fails
 */
export function failingConnection(label: string, message = "connection refused"): MockConnection {
  return new MockConnection(label, () => ({ error: new Error(message) }));
}
