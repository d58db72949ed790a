import { RepositoryContractError } from "../common/errors";
import { Logger } from "../common/logger";
import { timed } from "../common/timing";
import { TelemetryStore } from "../db/store";
import {
  Battery,
  BeaconOrigin,
  Device,
  TelemetryRecord,
  TelemetrySnapshot,
} from "../types";

type LastKnownField = "resistance" | "capacity" | "dischargeCurrent";

const LAST_KNOWN_FIELDS: readonly LastKnownField[] = [
  "resistance",
  "capacity",
  "dischargeCurrent",
];

/**
 * Maps beacon external ids onto synthetic device and battery rows and writes
 * telemetry against them.
 *
 * Cached rows are replaced only after the storage write succeeded.
 *
 * Not safe for interleaved calls: two concurrent saves for a new device would
 * both miss the cache. Callers go through the ingestion pipeline, which runs
 * one event at a time.
 */
export class IdentityRepository {
  private readonly deviceCache = new Map<string, Device>();
  // keyed by device external id
  private readonly batteryCache = new Map<string, Battery>();

  private constructor(
    private readonly store: TelemetryStore,
    private readonly logger: Logger
  ) {}

  static async create(store: TelemetryStore, logger: Logger): Promise<IdentityRepository> {
    const repo = new IdentityRepository(store, logger);
    await repo.loadDevices();
    return repo;
  }

  async reload(): Promise<void> {
    this.batteryCache.clear();
    await this.loadDevices();
    const byDeviceId = new Map<number, Device>();
    for (const d of this.deviceCache.values()) byDeviceId.set(d.id, d);
    for (const battery of await this.store.listBatteries()) {
      const device = byDeviceId.get(battery.deviceId);
      // first battery wins, as with the lazy lookup
      if (device && !this.batteryCache.has(device.externalId)) {
        this.batteryCache.set(device.externalId, battery);
      }
    }
  }

  getDeviceByExternalId(externalId: string): Device | undefined {
    return this.deviceCache.get(externalId);
  }

  getBatteryByExternalId(externalId: string): Battery | undefined {
    return this.batteryCache.get(externalId);
  }

  async saveTelemetry(
    snapshot: TelemetrySnapshot,
    externalId: string,
    origin?: BeaconOrigin
  ): Promise<TelemetryRecord> {
    const device = await this.resolveDevice(externalId, origin);
    let battery = await this.resolveBattery(device);

    const record = await timed(this.logger, "insertTelemetry", () =>
      this.store.insertTelemetry({
        voltage: snapshot.batteryMilliVolts,
        resistance: snapshot.resistanceRaw,
        // not carried by the current frame
        capacity: 0,
        mode: 0,
        dischargeCurrent: 0,
        advCount: snapshot.advCount,
        uptimeSeconds: snapshot.uptimeSeconds,
        batteryId: battery.id,
        recordedAt: new Date(),
      })
    );

    for (const field of LAST_KNOWN_FIELDS) {
      const value = record[field];
      if (value > 0) {
        const updated: Battery = { ...battery };
        updated[field] = value;
        await timed(this.logger, `updateBattery.${field}`, () =>
          this.store.updateBattery(updated)
        );
        this.batteryCache.set(externalId, updated);
        battery = updated;
      }
    }

    return record;
  }

  /** @throws {RepositoryContractError} when no battery is cached for `externalId` */
  async updateBatteryLabel(externalId: string, label: string): Promise<Battery> {
    const cached = this.batteryCache.get(externalId);
    if (!cached) {
      throw new RepositoryContractError(
        `No battery cached for device ${externalId}; telemetry must be saved before relabeling`
      );
    }
    const battery: Battery = { ...cached, label };
    await timed(this.logger, "updateBattery.label", () => this.store.updateBattery(battery));
    this.batteryCache.set(externalId, battery);
    this.logger
      .with()
      .str("externalId", externalId)
      .num("batteryId", battery.id)
      .str("label", label)
      .logger()
      .info("Battery relabeled");
    return battery;
  }

  private async loadDevices(): Promise<void> {
    this.deviceCache.clear();
    const devices = await timed(this.logger, "listDevices", () => this.store.listDevices());
    for (const d of devices) this.deviceCache.set(d.externalId, d);
    this.logger.with().num("devices", devices.length).logger().debug("Device cache loaded");
  }

  private async resolveDevice(externalId: string, origin?: BeaconOrigin): Promise<Device> {
    const cached = this.deviceCache.get(externalId);
    if (!cached) {
      const device = await timed(this.logger, "insertDevice", () =>
        this.store.insertDevice({
          externalId,
          macAddress: origin?.address ?? null,
          name: origin?.name ?? null,
          firstSeen: new Date(),
        })
      );
      this.deviceCache.set(externalId, device);
      this.logger
        .with()
        .str("externalId", externalId)
        .num("deviceId", device.id)
        .logger()
        .info("New device registered");
      return device;
    }

    const address = cached.macAddress ?? origin?.address ?? null;
    const name = cached.name ?? origin?.name ?? null;
    if (address !== cached.macAddress || name !== cached.name) {
      const updated: Device = { ...cached, macAddress: address, name };
      await timed(this.logger, "updateDevice", () => this.store.updateDevice(updated));
      this.deviceCache.set(externalId, updated);
      return updated;
    }
    return cached;
  }

  private async resolveBattery(device: Device): Promise<Battery> {
    const cached = this.batteryCache.get(device.externalId);
    if (cached) return cached;

    const existing = await timed(this.logger, "getBatteriesByDeviceId", () =>
      this.store.getBatteriesByDeviceId(device.id)
    );
    const battery =
      existing[0] ??
      (await timed(this.logger, "insertBattery", () =>
        this.store.insertBattery({ deviceId: device.id })
      ));
    this.batteryCache.set(device.externalId, battery);
    return battery;
  }
}
