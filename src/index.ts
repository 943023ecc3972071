/**
 * Target Shell - Entry Point
 * Run shell commands on a target device and keep its firmware current
 */

import { parseArgs } from "util";
import { HttpBuildSource } from "./builds/source";
import { listSerialPorts, parseConnectionSpec } from "./connection";
import { config, printConfig } from "./config";
import { createDevice } from "./device";
import { Logger } from "./logger";

// Parse CLI arguments (override ENV defaults)
const { values, positionals } = parseArgs({
  args: process.argv.slice(2),
  allowPositionals: true,
  options: {
    conn: { type: "string", short: "c", multiple: true, default: [] },
    name: { type: "string", short: "n" },
    devel: { type: "boolean", default: false },
    user: { type: "string", short: "u" },
    password: { type: "string" },
    "update-link": { type: "string", default: config.UPDATE_LINK },
    "builds-uri": { type: "string", default: config.BUILDS_URI },
    timeout: { type: "string", short: "t", default: String(config.CMD_TIMEOUT) },
    list: { type: "boolean", short: "l", default: false },
    config: { type: "boolean", default: false },
    help: { type: "boolean", short: "h", default: false },
  },
});

const logger = new Logger("cli");

// Help
if (values.help || (positionals.length === 0 && !values.list && !values.config)) {
  console.log(`
Target Shell

Usage:
  npx tsx src/index.ts [options] <command> [args]

Commands:
  cmd <shell command...>  Run a shell command, print its output
  version                 Print the installed firmware version
  status                  Print latest build, installed version and freshness
  update [link]           Update to the latest build unless already updated
  reset-config            Wipe the device configuration and halt it

Options:
  -c, --conn <spec>       Connection, repeat in order of preference:
                            ssh://user@host[:port]
                            serial:///dev/ttyUSB0[?baud=115200]
  -n, --name <name>       Device name for logs
      --devel             Development device: never updates or resets
  -u, --user <user>       Login user for serial consoles
      --password <pw>     Login password for serial consoles
      --update-link <uri> Update archive (default: $TARGET_UPDATE_LINK)
      --builds-uri <uri>  Build list JSON (default: $TARGET_BUILDS_URI)
  -t, --timeout <ms>      Command timeout (default: ${config.CMD_TIMEOUT})
  -l, --list              List available serial ports
      --config            Show configuration
  -h, --help              Show this help

Examples:
  npx tsx src/index.ts -c ssh://root@192.168.2.100 -c serial:///dev/ttyUSB2 cmd ls -al
  npx tsx src/index.ts -c ssh://root@192.168.2.100 status
  TARGET_LOG_LEVEL=debug npx tsx src/index.ts -c serial:///dev/ttyUSB0 -u root update
`);
  process.exit(0);
}

if (values.config) {
  printConfig();
  process.exit(0);
}

// List ports
if (values.list) {
  console.log("Available serial ports:");
  const ports = await listSerialPorts();
  for (const port of ports) {
    console.log(`  ${port.path}`);
    if (port.manufacturer) console.log(`    Manufacturer: ${port.manufacturer}`);
    if (port.vendorId) console.log(`    VID:PID: ${port.vendorId}:${port.productId}`);
  }
  process.exit(0);
}

const [command, ...args] = positionals;

try {
  const updateLink = values["update-link"] ?? "";
  const buildsUri = values["builds-uri"] ?? "";
  const connections = (values.conn ?? []).map((spec) =>
    parseConnectionSpec(spec, { user: values.user, password: values.password })
  );
  const device = createDevice(values.devel ? "devel" : "hydra", connections, {
    name: values.name,
    updateLink,
    buildSource: new HttpBuildSource(buildsUri),
  });
  const needsBuilds = !values.devel && (command === "status" || command === "update");
  if (needsBuilds && !buildsUri) {
    throw new Error("No build list configured, use --builds-uri or TARGET_BUILDS_URI");
  }

  switch (command) {
    case "cmd": {
      if (args.length === 0) throw new Error("cmd needs a shell command");
      const timeout = parseInt(values.timeout ?? "", 10);
      console.log(await device.cmd(args.join(" "), { timeout: isNaN(timeout) ? undefined : timeout }));
      break;
    }
    case "version":
      console.log(await device.currentFirmwareVersion());
      break;
    case "status":
      console.log(`Latest build:     ${await device.latestBuild()}`);
      console.log(`Firmware version: ${await device.currentFirmwareVersion()}`);
      console.log(`Updated:          ${await device.isUpdated()}`);
      break;
    case "update": {
      const link = args[0] ?? updateLink;
      if (!link && !values.devel) {
        throw new Error("No update link configured, use --update-link or TARGET_UPDATE_LINK");
      }
      await device.update(link);
      console.log("Device is up to date");
      break;
    }
    case "reset-config":
      await device.resetConfig();
      break;
    default:
      throw new Error(`Unknown command '${command}', see --help`);
  }
  process.exit(0);
} catch (error) {
  logger.error("command failed", error);
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
}
