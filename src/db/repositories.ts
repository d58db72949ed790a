import { DuckDBConnection, DuckDBValue } from "@duckdb/node-api";
import {
  Battery,
  Device,
  NewBattery,
  NewDevice,
  NewTelemetry,
  TelemetryRecord,
} from "../types";
import { DatabaseHandle } from "./connection";
import { TelemetryStore } from "./store";

type Row = Record<string, DuckDBValue>;

// Utility to normalize a DuckDB timestamp value (object or string) to JS Date
export function toDate(val: DuckDBValue): Date {
  if (val === null) return new Date(NaN);
  const s = typeof val === "string" ? val : val.toString();
  return new Date(s.replace(" ", "T") + "Z");
}

export function asNumber(val: DuckDBValue): number {
  if (typeof val === "number") return val;
  if (typeof val === "bigint") return Number(val);
  if (val === null) return 0;
  return Number(val.toString());
}

function asText(val: DuckDBValue): string | null {
  if (val === null) return null;
  return typeof val === "string" ? val : val.toString();
}

// timestamps are stored as naive UTC
function toTimestampParam(date: Date): string {
  return date.toISOString().replace("T", " ").replace("Z", "");
}

function firstRow(rows: Row[]): Row | undefined {
  return rows.length ? rows[0] : undefined;
}

function mapDevice(r: Row): Device {
  return {
    id: asNumber(r.id),
    externalId: String(asText(r.external_id)),
    macAddress: asText(r.mac_address),
    name: asText(r.name),
    firstSeen: toDate(r.first_seen),
  };
}

function mapBattery(r: Row): Battery {
  return {
    id: asNumber(r.id),
    deviceId: asNumber(r.device_id),
    label: asText(r.label),
    resistance: asNumber(r.resistance),
    capacity: asNumber(r.capacity),
    dischargeCurrent: asNumber(r.discharge_current),
  };
}

function mapTelemetry(r: Row): TelemetryRecord {
  return {
    id: asNumber(r.id),
    voltage: asNumber(r.voltage),
    resistance: asNumber(r.resistance),
    capacity: asNumber(r.capacity),
    advCount: asNumber(r.adv_count),
    uptimeSeconds: asNumber(r.uptime_seconds),
    mode: asNumber(r.mode),
    dischargeCurrent: asNumber(r.discharge_current),
    batteryId: asNumber(r.battery_id),
    recordedAt: toDate(r.recorded_at),
  };
}

const DEVICE_COLUMNS = `id, external_id, mac_address, name, first_seen`;
const BATTERY_COLUMNS = `id, device_id, label, resistance, capacity, discharge_current`;
const TELEMETRY_COLUMNS = `id, voltage, resistance, capacity, adv_count, uptime_seconds,
  mode, discharge_current, battery_id, recorded_at`;

export class DeviceRepository {
  constructor(private conn: DuckDBConnection) {}

  async insert(device: NewDevice): Promise<Device> {
    const reader = await this.conn.runAndReadAll(
      `insert into devices(external_id, mac_address, name, first_seen)
       values($external_id, $mac_address, $name, cast($first_seen as timestamp))
       returning id`,
      {
        external_id: device.externalId,
        mac_address: device.macAddress,
        name: device.name,
        first_seen: toTimestampParam(device.firstSeen),
      }
    );
    const id = asNumber(reader.getRowObjects()[0].id);
    return { id, ...device };
  }

  async update(device: Device): Promise<void> {
    await this.conn.run(
      `update devices set mac_address=$mac_address, name=$name where id=$id`,
      { id: device.id, mac_address: device.macAddress, name: device.name }
    );
  }

  async get(id: number): Promise<Device | undefined> {
    const reader = await this.conn.runAndReadAll(
      `select ${DEVICE_COLUMNS} from devices where id=$id`,
      { id }
    );
    const row = firstRow(reader.getRowObjects());
    return row ? mapDevice(row) : undefined;
  }

  async getAll(): Promise<Device[]> {
    const reader = await this.conn.runAndReadAll(
      `select ${DEVICE_COLUMNS} from devices order by id`
    );
    return reader.getRowObjects().map(mapDevice);
  }
}

export class BatteryRepository {
  constructor(private conn: DuckDBConnection) {}

  async insert(battery: NewBattery): Promise<Battery> {
    const stored: Omit<Battery, "id"> = {
      deviceId: battery.deviceId,
      label: battery.label ?? null,
      resistance: battery.resistance ?? 0,
      capacity: battery.capacity ?? 0,
      dischargeCurrent: battery.dischargeCurrent ?? 0,
    };
    const reader = await this.conn.runAndReadAll(
      `insert into batteries(device_id, label, resistance, capacity, discharge_current)
       values($device_id, $label, $resistance, $capacity, $discharge_current)
       returning id`,
      {
        device_id: stored.deviceId,
        label: stored.label,
        resistance: stored.resistance,
        capacity: stored.capacity,
        discharge_current: stored.dischargeCurrent,
      }
    );
    const id = asNumber(reader.getRowObjects()[0].id);
    return { id, ...stored };
  }

  async update(battery: Battery): Promise<void> {
    await this.conn.run(
      // a battery never moves between devices
      `update batteries set label=$label, resistance=$resistance,
         capacity=$capacity, discharge_current=$discharge_current
       where id=$id`,
      {
        id: battery.id,
        label: battery.label,
        resistance: battery.resistance,
        capacity: battery.capacity,
        discharge_current: battery.dischargeCurrent,
      }
    );
  }

  async get(id: number): Promise<Battery | undefined> {
    const reader = await this.conn.runAndReadAll(
      `select ${BATTERY_COLUMNS} from batteries where id=$id`,
      { id }
    );
    const row = firstRow(reader.getRowObjects());
    return row ? mapBattery(row) : undefined;
  }

  async getAll(): Promise<Battery[]> {
    const reader = await this.conn.runAndReadAll(
      `select ${BATTERY_COLUMNS} from batteries order by id`
    );
    return reader.getRowObjects().map(mapBattery);
  }

  async listByDevice(deviceId: number): Promise<Battery[]> {
    const reader = await this.conn.runAndReadAll(
      `select ${BATTERY_COLUMNS} from batteries where device_id=$d order by id`,
      { d: deviceId }
    );
    return reader.getRowObjects().map(mapBattery);
  }

  async listByLabel(label: string): Promise<Battery[]> {
    const reader = await this.conn.runAndReadAll(
      `select ${BATTERY_COLUMNS} from batteries where label=$l order by id`,
      { l: label }
    );
    return reader.getRowObjects().map(mapBattery);
  }
}

export class TelemetryRepository {
  constructor(private conn: DuckDBConnection) {}

  async insert(record: NewTelemetry): Promise<TelemetryRecord> {
    const reader = await this.conn.runAndReadAll(
      `insert into telemetry(voltage, resistance, capacity, adv_count, uptime_seconds,
         mode, discharge_current, battery_id, recorded_at)
       values($voltage, $resistance, $capacity, $adv_count, $uptime_seconds,
         $mode, $discharge_current, $battery_id, cast($recorded_at as timestamp))
       returning id`,
      {
        voltage: record.voltage,
        resistance: record.resistance,
        capacity: record.capacity,
        // u32 on the wire; a plain number would bind as a 32-bit INTEGER
        adv_count: BigInt(record.advCount),
        uptime_seconds: record.uptimeSeconds,
        mode: record.mode,
        discharge_current: record.dischargeCurrent,
        battery_id: record.batteryId,
        recorded_at: toTimestampParam(record.recordedAt),
      }
    );
    const id = asNumber(reader.getRowObjects()[0].id);
    return { id, ...record };
  }

  async getAll(): Promise<TelemetryRecord[]> {
    const reader = await this.conn.runAndReadAll(
      `select ${TELEMETRY_COLUMNS} from telemetry order by id`
    );
    return reader.getRowObjects().map(mapTelemetry);
  }

  async listByBattery(batteryId: number): Promise<TelemetryRecord[]> {
    const reader = await this.conn.runAndReadAll(
      `select ${TELEMETRY_COLUMNS} from telemetry where battery_id=$b order by recorded_at, id`,
      { b: batteryId }
    );
    return reader.getRowObjects().map(mapTelemetry);
  }
}

/** {@link TelemetryStore} over one DuckDB connection. */
export class DuckDBTelemetryStore implements TelemetryStore {
  readonly devices: DeviceRepository;
  readonly batteries: BatteryRepository;
  readonly telemetry: TelemetryRepository;

  constructor(private db: DatabaseHandle) {
    this.devices = new DeviceRepository(db.connection);
    this.batteries = new BatteryRepository(db.connection);
    this.telemetry = new TelemetryRepository(db.connection);
  }

  listDevices() {
    return this.devices.getAll();
  }

  getDevice(id: number) {
    return this.devices.get(id);
  }

  insertDevice(device: NewDevice) {
    return this.devices.insert(device);
  }

  updateDevice(device: Device) {
    return this.devices.update(device);
  }

  listBatteries() {
    return this.batteries.getAll();
  }

  getBattery(id: number) {
    return this.batteries.get(id);
  }

  getBatteriesByDeviceId(deviceId: number) {
    return this.batteries.listByDevice(deviceId);
  }

  getBatteriesByLabel(label: string) {
    return this.batteries.listByLabel(label);
  }

  insertBattery(battery: NewBattery) {
    return this.batteries.insert(battery);
  }

  updateBattery(battery: Battery) {
    return this.batteries.update(battery);
  }

  insertTelemetry(record: NewTelemetry) {
    return this.telemetry.insert(record);
  }

  listTelemetry() {
    return this.telemetry.getAll();
  }

  getTelemetryByBatteryId(batteryId: number) {
    return this.telemetry.listByBattery(batteryId);
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
