#!/usr/bin/env node
/**
 * Charger telemetry collector.
 *
 * `scan` (default) listens for signed beacon advertisements, persists every
 * new reading and shows the live table; `report` prints what is stored.
 */
import { createWriteStream, mkdirSync, WriteStream } from "fs";
import { dirname } from "path";
import { Config, loadConfig, resolveSecret } from "./config";
import { openDatabase } from "./db/connection";
import { createSchema } from "./db/schema";
import { DuckDBTelemetryStore } from "./db/repositories";
import { runReport } from "./report";
import { SignatureVerifier } from "./beacon/signature";
import { FrameExtractor } from "./beacon/extractor";
import { newClient, withScanner } from "./clients/ble";
import { IdentityRepository } from "./services/identity";
import { DisplayController } from "./services/controller";
import { IngestionPipeline } from "./services/pipeline";
import { InteractiveView } from "./ui/view";
import { openTerminalSession, TerminalSession } from "./ui/terminal";
import { LogBuffer } from "./common/logBuffer";
import {
  getLogger,
  LogDestination,
  setLogDestination,
} from "./common/logger";

const logger = getLogger();

const args = process.argv.slice(2);
const cmd = args[0] && !args[0].startsWith("--") ? args[0] : "scan";

function getArg(flag: string, fallback?: string) {
  const idx = args.indexOf(flag);
  if (idx === -1) return fallback;
  const val = args[idx + 1];
  if (!val || val.startsWith("--")) return fallback;
  return val;
}

function hasFlag(flag: string) {
  return args.includes(flag);
}

function usage(exitCode = 0): never {
  console.log(`charger-telemetry <command> [options]

Commands:
  scan [--config <path>] [--no-ui]
  report [--config <path>] [--battery <id>] [--label <label>]

Environment:
  CONFIG_PATH        config file, if --config is not given
  BEACON_SECRET_KEY  HMAC key shared with the beacons
  DUCKDB_PATH        database file
  BEACON_LOG_LEVEL   trace | debug | info | warn | error
`);
  process.exit(exitCode);
}

function openLogFile(path: string): WriteStream {
  mkdirSync(dirname(path), { recursive: true });
  return createWriteStream(path, { flags: "a" });
}

function endStream(stream: WriteStream): Promise<void> {
  return new Promise((resolve) => stream.end(() => resolve()));
}

// -------------------- Scan --------------------
async function scan(config: Config, ui: boolean): Promise<void> {
  const db = await openDatabase(config.database.path);
  await createSchema(db.connection);
  const store = new DuckDBTelemetryStore(db);
  logger.with().str("path", config.database.path).logger().info("Database ready");

  const repo = await IdentityRepository.create(store, logger);
  const logBuffer = new LogBuffer(config.ui.logLines);
  const view = new InteractiveView({
    refreshIntervalMs: config.ui.refreshIntervalMs,
    flashDurationMs: config.ui.flashDurationMs,
    logSource: logBuffer,
  });
  const controller = new DisplayController(repo, view, logger);
  const pipeline = new IngestionPipeline(controller, logger);
  pipeline.attach(view);

  const extractor = new FrameExtractor({
    verifier: new SignatureVerifier(resolveSecret(config)),
    sink: pipeline,
    logger,
    deviceName: config.scanner.deviceName,
    serviceUuid: config.scanner.serviceUuid,
    macLength: config.security.macLength,
  });

  const scanner = newClient({
    logger,
    allowDuplicates: config.scanner.allowDuplicates,
  });
  scanner.setDetectionCallback((device, adv) => extractor.detectionCallback(device, adv));
  scanner.on("error", (e) =>
    logger.with().error(e).logger().error("Scanner error")
  );

  const stopped = new Promise<string>((resolve) => {
    process.once("SIGINT", () => resolve("SIGINT"));
    process.once("SIGTERM", () => resolve("SIGTERM"));
    view.onQuit(() => resolve("quit"));
    scanner.on("cancelled", () => resolve("cancelled"));
  });

  let terminal: TerminalSession | null = null;
  let logFile: WriteStream | null = null;
  let previousDestination: LogDestination | null = null;
  let detachLog: (() => void) | null = null;

  try {
    if (ui) {
      // the terminal belongs to the view; log lines go to a file
      const file = openLogFile(config.logging.file);
      logFile = file;
      previousDestination = setLogDestination((_level, line) => {
        file.write(line + "\n");
      });
      detachLog = logBuffer.attach();
      terminal = openTerminalSession(view);
    }

    const reason = await withScanner(scanner, () => stopped);
    logger.info(`Received ${reason}, shutting down...`);
  } finally {
    await pipeline.close();
    terminal?.close();
    detachLog?.();
    if (previousDestination) setLogDestination(previousDestination);
    if (logFile) await endStream(logFile);
    await store.close();

    const stats = pipeline.stats();
    logger
      .with()
      .num("processed", stats.processed)
      .num("failed", stats.failed)
      .logger()
      .info("Ingestion stopped");
  }
}

// -------------------- Report --------------------
async function report(config: Config): Promise<void> {
  const db = await openDatabase(config.database.path);
  const store = new DuckDBTelemetryStore(db);
  try {
    await createSchema(db.connection);
    const battery = getArg("--battery");
    let batteryId: number | undefined;
    if (battery !== undefined) {
      batteryId = Number(battery);
      if (!Number.isInteger(batteryId)) {
        console.error(`--battery expects a number, got "${battery}"`);
        usage(1);
      }
    }
    await runReport(store, { batteryId, label: getArg("--label") });
  } finally {
    await store.close();
  }
}

// -------------------- Main Flow --------------------
async function main() {
  if (hasFlag("--help") || cmd === "help") usage(0);

  const path = getArg("--config");
  switch (cmd) {
    case "scan": {
      const config = loadConfig({ path, requireSecret: true });
      return scan(config, config.ui.enabled && !hasFlag("--no-ui"));
    }
    case "report":
      return report(loadConfig({ path }));
    default:
      console.error(`Unknown command: ${cmd}`);
      usage(1);
  }
}

main().then(
  () => process.exit(0),
  (err) => {
    logger.with().error(err).logger().error("Fatal startup error");
    process.exit(1);
  }
);
