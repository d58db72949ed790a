import events from "events";
import noble = require("@abandonware/noble");
import { CancellationError } from "../../common/errors";
import { Logger } from "../../common/logger";
import {
  AdvertisementPayload,
  DiscoveredDevice,
} from "../../beacon/extractor";

function getRequiredProperty<
  C extends Record<string, unknown>,
  P extends keyof C & string
>(config: C, propName: P): C[P] {
  if (config[propName] !== undefined) {
    return config[propName];
  }
  throw new Error("Missing required configuration property '" + propName + "'");
}

export type BeaconScannerClientOptions = {
  logger: Logger;
  /** Report every advertisement, not only the first per peripheral. @default true */
  allowDuplicates?: boolean;
  /** How long to wait for the adapter to power on. @default 15000 */
  poweredOnTimeoutMs?: number;
};

export type DetectionCallback = (
  device: DiscoveredDevice,
  advertisement: AdvertisementPayload
) => void;

export interface BeaconScannerClient extends events.EventEmitter {
  on(event: "cancelled", listener: () => void): this;
  on(event: "error", listener: (error: Error) => void): this;

  once(event: "cancelled", listener: () => void): this;
  once(event: "error", listener: (error: Error) => void): this;

  emit(event: "cancelled"): boolean;
  emit(event: "error", error: Error): boolean;
}

/*
 * BLE advertisement scanner
 */
export class BeaconScannerClient extends events.EventEmitter {
  private readonly logger: Logger;
  private readonly allowDuplicates: boolean;
  private readonly poweredOnTimeoutMs: number;

  private callback: DetectionCallback | null = null;
  private scanning = false;

  constructor(config: BeaconScannerClientOptions) {
    super();
    this.logger = getRequiredProperty(config, "logger");
    this.allowDuplicates = config.allowDuplicates ?? true;
    this.poweredOnTimeoutMs = config.poweredOnTimeoutMs ?? 15000;
  }

  /**
   * Registers the handler for each advertisement. A {@link CancellationError}
   * thrown by it stops the scan and emits "cancelled".
   */
  setDetectionCallback(callback: DetectionCallback | null): void {
    this.callback = callback;
  }

  async start(): Promise<void> {
    if (this.scanning) return;
    await this.waitForPoweredOn();
    noble.on("discover", this.onDiscover);
    noble.on("stateChange", this.onStateChange);
    this.logger.info("Starting BLE scan");
    try {
      await noble.startScanningAsync([], this.allowDuplicates);
    } catch (err) {
      noble.removeListener("discover", this.onDiscover);
      noble.removeListener("stateChange", this.onStateChange);
      throw err;
    }
    this.scanning = true;
  }

  async stop(): Promise<void> {
    if (!this.scanning) return;
    this.scanning = false;
    noble.removeListener("discover", this.onDiscover);
    noble.removeListener("stateChange", this.onStateChange);
    await noble.stopScanningAsync();
    this.logger.info("BLE scan stopped");
  }

  private waitForPoweredOn(): Promise<void> {
    if (noble.state === "poweredOn") return Promise.resolve();
    this.logger.info("Waiting for Bluetooth adapter...");
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        noble.removeListener("stateChange", listener);
        reject(new Error(`Bluetooth adapter not powered on (state: ${noble.state})`));
      }, this.poweredOnTimeoutMs);
      const listener = (state: string) => {
        if (state !== "poweredOn") return;
        clearTimeout(timer);
        noble.removeListener("stateChange", listener);
        resolve();
      };
      noble.on("stateChange", listener);
    });
  }

  private readonly onStateChange = (state: string) => {
    this.logger.with().str("state", state).logger().warn("Bluetooth adapter state changed");
  };

  private readonly onDiscover = (peripheral: noble.Peripheral) => {
    const device: DiscoveredDevice = {
      id: peripheral.id,
      address: peripheral.address || null,
      name: peripheral.advertisement.localName || null,
    };
    const advertisement: AdvertisementPayload = {
      localName: peripheral.advertisement.localName,
      serviceData: peripheral.advertisement.serviceData ?? [],
    };
    if (!this.callback) return;
    try {
      this.callback(device, advertisement);
    } catch (err) {
      if (err instanceof CancellationError) {
        this.logger.with().str("reason", err.message).logger().info("Scan cancelled");
        this.stop().then(
          () => this.emit("cancelled"),
          (stopErr: unknown) => {
            this.emit("error", stopErr instanceof Error ? stopErr : new Error(String(stopErr)));
          }
        );
        return;
      }
      this.emit("error", err instanceof Error ? err : new Error(String(err)));
    }
  };
}

export function newClient(config: BeaconScannerClientOptions): BeaconScannerClient {
  return new BeaconScannerClient(config);
}

/** Scans for the duration of `fn`; the scan is stopped however `fn` ends. */
export async function withScanner<T>(
  client: BeaconScannerClient,
  fn: () => Promise<T>
): Promise<T> {
  await client.start();
  try {
    return await fn();
  } finally {
    await client.stop();
  }
}
