/**
 * Build Source
 * Where the newest published build number comes from
 */

import axios, { type AxiosInstance } from "axios";
import { config } from "../config";

export interface BuildSource {
  readonly uri: string;
  /**
   * Identifier of the newest available build
   */
  latestBuildNumber(): Promise<string>;
}

export interface BuildRecord {
  number: number;
  [key: string]: unknown;
}

export class BuildMetadataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BuildMetadataError";
  }
}

function isBuildRecord(value: unknown): value is BuildRecord {
  return (
    typeof value === "object" &&
    value !== null &&
    "number" in value &&
    typeof value.number === "number" &&
    Number.isInteger(value.number)
  );
}

/**
 * Pick the highest build number from a `{ builds: [{ number }] }` document.
 * Higher numbers are newer; timestamps are not looked at.
 */
export function latestBuildNumber(payload: unknown): string {
  if (typeof payload !== "object" || payload === null || !("builds" in payload) || !Array.isArray(payload.builds)) {
    throw new BuildMetadataError("build metadata has no 'builds' list");
  }

  const builds: unknown[] = payload.builds;
  if (builds.length === 0) {
    throw new BuildMetadataError("build metadata lists no builds");
  }

  let latest: number | null = null;
  for (const build of builds) {
    if (!isBuildRecord(build)) {
      throw new BuildMetadataError(`invalid build record: ${JSON.stringify(build)}`);
    }
    if (latest === null || build.number > latest) {
      latest = build.number;
    }
  }
  return String(latest);
}

export interface HttpBuildSourceOptions {
  /** Request timeout in ms */
  timeout?: number;
  /** Injectable client (for testing) */
  client?: AxiosInstance;
}

/**
 * Reads build records from a JSON endpoint (e.g. a CI server's job API)
 */
export class HttpBuildSource implements BuildSource {
  private client: AxiosInstance;
  private timeout: number;

  constructor(readonly uri: string, options: HttpBuildSourceOptions = {}) {
    this.client = options.client ?? axios.create();
    this.timeout = options.timeout ?? config.BUILDS_TIMEOUT;
  }

  async latestBuildNumber(): Promise<string> {
    const response = await this.client.get<unknown>(this.uri, {
      timeout: this.timeout,
      headers: { Accept: "application/json" },
      responseType: "json",
    });
    return latestBuildNumber(response.data);
  }
}
