/**
 * Serial Connection Tests
 * A scripted console stands in for the serial port
 */

import { describe, it, beforeEach } from "node:test";
import assert from "node:assert";
import { SerialConnection, STATUS_MARKER, type SerialLink } from "../../src/connection/serial";

type ConsoleReply = { output: string; status: number } | { raw: string } | null;
type ConsoleState = "login" | "password" | "shell";

const STATUS_SUFFIX = `; echo "${STATUS_MARKER}$?"`;

class FakeConsole implements SerialLink {
  public written: string[] = [];
  public closed = 0;
  private state: ConsoleState;
  private dataListeners: ((chunk: string) => void)[] = [];
  private closeListeners: (() => void)[] = [];

  constructor(
    requireLogin: boolean,
    private run: (cmd: string) => ConsoleReply,
    private columns = 0
  ) {
    this.state = requireLogin ? "login" : "shell";
  }

  write(data: string): void {
    this.written.push(data);
    const line = data.replace(/\n$/, "");
    setImmediate(() => this.answer(line));
  }

  async close(): Promise<void> {
    this.closed++;
  }

  onData(listener: (chunk: string) => void): void {
    this.dataListeners.push(listener);
  }

  onClose(listener: () => void): void {
    this.closeListeners.push(listener);
  }

  drop(): void {
    for (const listener of this.closeListeners) listener();
  }

  private send(text: string): void {
    for (const listener of this.dataListeners) listener(text);
  }

  /** Echo of a typed line, wrapped at the console width */
  private echo(line: string): string {
    if (this.columns <= 0) return line;
    const rows: string[] = [];
    for (let i = 0; i < line.length; i += this.columns) {
      rows.push(line.slice(i, i + this.columns));
    }
    return rows.join("\r\n");
  }

  private answer(line: string): void {
    if (line === "") {
      this.send(this.state === "login" ? "\r\nhydra login: " : "\r\n# ");
      return;
    }
    if (this.state === "login") {
      this.state = "password";
      this.send(`${line}\r\nPassword: `);
      return;
    }
    if (this.state === "password") {
      this.state = "shell";
      this.send("\r\n# ");
      return;
    }

    const withStatus = line.endsWith(STATUS_SUFFIX);
    const reply = this.run(withStatus ? line.slice(0, -STATUS_SUFFIX.length) : line);
    if (reply === null) return;
    if ("raw" in reply) {
      this.send(`${this.echo(line)}\r\n${reply.raw}`);
      return;
    }
    const body = reply.output ? `${reply.output}\r\n` : "";
    this.send(`${this.echo(line)}\r\n${body}${STATUS_MARKER}${reply.status}\r\n# `);
  }
}

describe("SerialConnection", () => {
  let consoles: FakeConsole[];
  let opened: { path: string; baudRate: number }[];
  let requireLogin: boolean;
  let columns: number;
  let run: (cmd: string) => ConsoleReply;

  const connect = (options: { user?: string; password?: string } = { user: "root", password: "secret" }) =>
    new SerialConnection({
      port: "/dev/ttyUSB0",
      ...options,
      openLink: async (path, baudRate) => {
        opened.push({ path, baudRate });
        const link = new FakeConsole(requireLogin, (cmd) => run(cmd), columns);
        consoles.push(link);
        return link;
      },
    });

  beforeEach(() => {
    consoles = [];
    opened = [];
    requireLogin = true;
    columns = 0;
    run = (cmd) => (cmd === "cat /etc/version" ? { output: "rel-42-signed", status: 0 } : { output: "", status: 127 });
  });

  it("logs in on first use and returns the command output", async () => {
    const conn = connect();

    const out = await conn.cmd("cat /etc/version", { timeout: 1000, loginTimeout: 1000 });

    assert.strictEqual(out, "rel-42-signed");
    assert.strictEqual(conn.lastExitStatus, 0);
    assert.strictEqual(conn.lastMatch, "# ");
    assert.deepStrictEqual(opened, [{ path: "/dev/ttyUSB0", baudRate: 115200 }]);
    assert.deepStrictEqual(consoles[0].written, [
      "\n",
      "root\n",
      "secret\n",
      `cat /etc/version${STATUS_SUFFIX}\n`,
    ]);
  });

  it("reuses the session for later commands", async () => {
    const conn = connect();

    await conn.cmd("cat /etc/version", { timeout: 1000 });
    await conn.cmd("cat /etc/version", { timeout: 1000 });

    assert.strictEqual(opened.length, 1);
    assert.strictEqual(consoles[0].written.length, 5);
  });

  it("skips login when the console already shows a prompt", async () => {
    requireLogin = false;
    const conn = connect({});

    assert.strictEqual(await conn.cmd("cat /etc/version", { timeout: 1000 }), "rel-42-signed");
    assert.deepStrictEqual(consoles[0].written, ["\n", `cat /etc/version${STATUS_SUFFIX}\n`]);
  });

  it("keeps multi-line output and the exit status", async () => {
    requireLogin = false;
    run = () => ({ output: "line one\r\nline two", status: 2 });
    const conn = connect({});

    assert.strictEqual(await conn.cmd("ls /missing", { timeout: 1000 }), "line one\nline two");
    assert.strictEqual(conn.lastExitStatus, 2);
  });

  it("returns empty output for a silent command", async () => {
    requireLogin = false;
    run = () => ({ output: "", status: 1 });
    const conn = connect({});

    assert.strictEqual(await conn.cmd("false", { timeout: 1000 }), "");
    assert.strictEqual(conn.lastExitStatus, 1);
  });

  it("ends on an expect match without exit status", async () => {
    requireLogin = false;
    run = () => ({ raw: "Rebooting...\r\n\r\nhydra login: " });
    const conn = connect({});

    const out = await conn.cmd("do-update", { timeout: 1000, expect: /([lL]ogin: )/ });

    assert.strictEqual(out, "Rebooting...\n\nhydra");
    assert.strictEqual(conn.lastMatch, "login: ");
    assert.strictEqual(conn.lastExitStatus, null);
    assert.strictEqual(consoles[0].written[1], "do-update\n");
  });

  it("strips an echo that wrapped over several console lines", async () => {
    requireLogin = false;
    columns = 20;
    const conn = connect({});

    assert.strictEqual(await conn.cmd("cat /etc/version", { timeout: 1000 }), "rel-42-signed");
    assert.strictEqual(conn.lastExitStatus, 0);
  });

  it("strips a wrapped echo before an expect match", async () => {
    requireLogin = false;
    columns = 20;
    run = () => ({ raw: "Rebooting...\r\n\r\nhydra login: " });
    const conn = connect({});

    const out = await conn.cmd("do-update -c && get-update http://ci.test/u.zip && do-update", {
      timeout: 1000,
      expect: /([lL]ogin: )/,
    });

    assert.strictEqual(out, "Rebooting...\n\nhydra");
  });

  it("fails and closes the port when login is needed but no user is set", async () => {
    const conn = connect({});

    await assert.rejects(conn.cmd("uptime", { timeout: 1000 }), /no user configured/);
    assert.strictEqual(consoles[0].closed, 1);
    assert.strictEqual(conn.isConnected(), false);
  });

  it("times out when the prompt never comes back", async () => {
    requireLogin = false;
    run = () => null;
    const conn = connect({});

    await assert.rejects(conn.cmd("sleep 100", { timeout: 30 }), /within 30ms/);
  });

  it("fails the running command when the port closes", async () => {
    requireLogin = false;
    run = () => {
      setImmediate(() => consoles[0].drop());
      return null;
    };
    const conn = connect({});

    await assert.rejects(conn.cmd("reboot", { timeout: 1000 }), /port closed/);
    assert.strictEqual(conn.isConnected(), false);
  });

  it("opens a new session after disconnect", async () => {
    const conn = connect();

    await conn.cmd("cat /etc/version", { timeout: 1000 });
    await conn.disconnect();
    await conn.disconnect();
    assert.strictEqual(consoles[0].closed, 1);
    assert.strictEqual(conn.isConnected(), false);

    assert.strictEqual(await conn.cmd("cat /etc/version", { timeout: 1000 }), "rel-42-signed");
    assert.strictEqual(opened.length, 2);
    assert.deepStrictEqual(consoles[1].written.slice(0, 3), ["\n", "root\n", "secret\n"]);
  });

  it("describes itself by port", () => {
    assert.strictEqual(String(connect()), "SerialConnection(/dev/ttyUSB0)");
  });
});
