/**
 * Main entry point for the sensor bridge
 * Starts serial monitoring and the web server, or lists serial ports with --list-ports
 */

import * as os from "os";
import CliTable3 from "cli-table3";
import pc from "picocolors";
import { loadConfig, rankSerialPorts } from "./config";
import { describeError } from "./errors";
import { initializeApp, type RunningApp } from "./index";

/**
 * Print detected serial ports as a table
 */
async function listPorts(): Promise<void> {
  const ranked = await rankSerialPorts();
  if (ranked.length === 0) {
    console.log("No serial ports found");
    return;
  }

  const table = new CliTable3({
    head: ["Path", "Manufacturer", "Vendor", "Product", "Score", "Reason"],
  });
  for (const { port, score, reason } of ranked) {
    table.push([
      port.path,
      port.manufacturer ?? "",
      port.vendorId ?? "",
      port.productId ?? "",
      score.toString(),
      reason,
    ]);
  }
  console.log(table.toString());
}

/**
 * Log the startup banner with local and network URLs
 */
function printBanner(app: RunningApp): void {
  const { port } = app.config.server;

  const addresses: string[] = [];
  for (const nets of Object.values(os.networkInterfaces())) {
    for (const net of nets ?? []) {
      if (net.family === "IPv4" && !net.internal) {
        addresses.push(net.address);
      }
    }
  }

  console.log(`${pc.green("Sensor Bridge")} started successfully!`);
  console.log("");
  console.log(`  ➜  ${pc.gray("Local:")}   ${pc.cyan(`http://localhost:${port}`)}`);
  if (addresses.length > 0) {
    console.log(`  ➜  ${pc.gray("Network:")} ${pc.cyan(`http://${addresses[0]}:${port}`)}`);
  }
  console.log("");
  console.log(`  ${pc.gray("Latest reading:")} ${pc.cyan(`http://localhost:${port}/data`)}`);
  console.log(`  ${pc.gray("Prometheus:")}     ${pc.cyan(`http://localhost:${port}/metrics`)}`);
  console.log("");
  console.log(
    app.device
      ? `- Serial monitoring active on ${pc.cyan(app.device.path)}`
      : "- Serial monitoring disabled"
  );
}

async function main(): Promise<void> {
  if (process.argv.includes("--list-ports")) {
    await listPorts();
    return;
  }

  const app = await initializeApp(loadConfig());
  printBanner(app);

  let stopping = false;
  const stop = (signal: string) => {
    if (stopping) return;
    stopping = true;
    console.log(`\nReceived ${signal}, shutting down...`);
    app.shutdown().then(
      () => process.exit(0),
      (error) => {
        console.error(`${pc.red("Shutdown failed:")} ${describeError(error)}`);
        process.exit(1);
      }
    );
  };

  process.on("SIGINT", () => stop("SIGINT"));
  process.on("SIGTERM", () => stop("SIGTERM"));
}

main().catch((error) => {
  console.error(`${pc.red("Failed to start:")} ${describeError(error)}`);
  process.exit(1);
});
