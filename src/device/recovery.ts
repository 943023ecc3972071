/**
 * Waiting for a device to come back after a reboot
 */

export type SleepFn = (ms: number) => Promise<void>;
export type ClockFn = () => number;

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface PollOptions {
  /** ms after which polling gives up */
  timeout: number;
  /** ms between probes, also waited before the first one */
  interval: number;
  sleep?: SleepFn;
  now?: ClockFn;
}

/**
 * Run `probe` every interval until it returns true or the timeout passes
 * @returns whether the probe succeeded in time
 */
export async function pollUntil(probe: () => Promise<boolean>, options: PollOptions): Promise<boolean> {
  const sleep = options.sleep ?? delay;
  const now = options.now ?? Date.now;
  const deadline = now() + options.timeout;

  for (;;) {
    await sleep(options.interval);
    if (await probe()) return true;
    if (now() >= deadline) return false;
  }
}
