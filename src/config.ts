/**
 * Configuration from environment variables
 * CLI flags override these, nothing else is read from disk
 */

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvString(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

export const config = {
  /**
   * Update archive fetched by the device during `update`
   * @env TARGET_UPDATE_LINK
   * @default "" (must be given)
   */
  UPDATE_LINK: getEnvString("TARGET_UPDATE_LINK", ""),

  /**
   * JSON endpoint listing the published builds
   * @env TARGET_BUILDS_URI
   * @default "" (must be given)
   */
  BUILDS_URI: getEnvString("TARGET_BUILDS_URI", ""),

  /**
   * Timeout of an ordinary shell command in ms
   * @env TARGET_CMD_TIMEOUT
   * @default 30000
   */
  CMD_TIMEOUT: getEnvNumber("TARGET_CMD_TIMEOUT", 30_000),

  /**
   * Login timeout when a connection opens a new session, in ms
   * @env TARGET_LOGIN_TIMEOUT
   * @default 10000
   */
  LOGIN_TIMEOUT: getEnvNumber("TARGET_LOGIN_TIMEOUT", 10_000),

  /**
   * Timeout of the combined download/apply/reboot command in ms
   * @env TARGET_UPDATE_TIMEOUT
   * @default 600000
   */
  UPDATE_TIMEOUT: getEnvNumber("TARGET_UPDATE_TIMEOUT", 600_000),

  /**
   * How long to wait for the device to answer again after an update, in ms
   * @env TARGET_RECOVERY_TIMEOUT
   * @default 240000
   */
  RECOVERY_TIMEOUT: getEnvNumber("TARGET_RECOVERY_TIMEOUT", 240_000),

  /**
   * Delay between two recovery probes in ms
   * @env TARGET_RECOVERY_POLL_INTERVAL
   * @default 10000
   */
  RECOVERY_POLL_INTERVAL: getEnvNumber("TARGET_RECOVERY_POLL_INTERVAL", 10_000),

  /**
   * Timeout of the configuration reset command in ms
   * @env TARGET_RESET_TIMEOUT
   * @default 150000
   */
  RESET_TIMEOUT: getEnvNumber("TARGET_RESET_TIMEOUT", 150_000),

  /**
   * Login timeout used by the configuration reset command in ms
   * @env TARGET_RESET_LOGIN_TIMEOUT
   * @default 20000
   */
  RESET_LOGIN_TIMEOUT: getEnvNumber("TARGET_RESET_LOGIN_TIMEOUT", 20_000),

  /**
   * Pause after a configuration reset (the device halts) in ms
   * @env TARGET_RESET_SETTLE
   * @default 120000
   */
  RESET_SETTLE: getEnvNumber("TARGET_RESET_SETTLE", 120_000),

  /**
   * HTTP timeout when querying the build server in ms
   * @env TARGET_BUILDS_TIMEOUT
   * @default 10000
   */
  BUILDS_TIMEOUT: getEnvNumber("TARGET_BUILDS_TIMEOUT", 10_000),

  /**
   * Serial baud rate
   * @env TARGET_BAUD_RATE
   * @default 115200
   */
  BAUD_RATE: getEnvNumber("TARGET_BAUD_RATE", 115200),

  /**
   * Log level: debug, info, warn, error, silent
   * @env TARGET_LOG_LEVEL
   * @default "info"
   */
  LOG_LEVEL: getEnvString("TARGET_LOG_LEVEL", "info"),
};

/**
 * Print current configuration (for debugging)
 */
export function printConfig(): void {
  console.log("Target Shell Configuration:");
  console.log(`  Update Link:       ${config.UPDATE_LINK || "(not set)"}`);
  console.log(`  Builds URI:        ${config.BUILDS_URI || "(not set)"}`);
  console.log(`  Command Timeout:   ${config.CMD_TIMEOUT}ms`);
  console.log(`  Login Timeout:     ${config.LOGIN_TIMEOUT}ms`);
  console.log(`  Update Timeout:    ${config.UPDATE_TIMEOUT}ms`);
  console.log(`  Recovery Timeout:  ${config.RECOVERY_TIMEOUT}ms (poll ${config.RECOVERY_POLL_INTERVAL}ms)`);
  console.log(`  Reset Timeout:     ${config.RESET_TIMEOUT}ms (settle ${config.RESET_SETTLE}ms)`);
  console.log(`  Baud Rate:         ${config.BAUD_RATE}`);
  console.log(`  Log Level:         ${config.LOG_LEVEL}`);
}
