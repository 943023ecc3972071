/**
 * Connection Module
 * Re-exports all connection components
 */

export * from "./interface";
export * from "./mock";
export * from "./serial";
export * from "./ssh";

import type { ShellConnection } from "./interface";
import { SerialConnection } from "./serial";
import { SshConnection } from "./ssh";

export interface Credentials {
  user?: string;
  password?: string;
}

/**
 * Build a connection from a spec string:
 *   ssh://user@host[:port]
 *   serial:///dev/ttyUSB0[?baud=115200]
 */
export function parseConnectionSpec(spec: string, credentials: Credentials = {}): ShellConnection {
  let url: URL;
  try {
    url = new URL(spec);
  } catch {
    throw new Error(`Invalid connection '${spec}', expected ssh://user@host or serial:///dev/path`);
  }

  if (url.protocol === "ssh:") {
    if (!url.hostname) {
      throw new Error(`Connection '${spec}' has no host`);
    }
    return new SshConnection({
      host: url.hostname,
      user: decodeURIComponent(url.username) || credentials.user,
      port: url.port ? parseInt(url.port, 10) : undefined,
    });
  }

  if (url.protocol === "serial:") {
    if (!url.pathname || url.pathname === "/") {
      throw new Error(`Connection '${spec}' has no port path`);
    }
    const baud = url.searchParams.get("baud");
    return new SerialConnection({
      port: url.pathname,
      baudRate: baud ? parseInt(baud, 10) : undefined,
      user: credentials.user,
      password: credentials.password,
    });
  }

  throw new Error(`Unsupported connection type '${url.protocol}' in '${spec}'`);
}
