import {
  Battery,
  Device,
  NewBattery,
  NewDevice,
  NewTelemetry,
  TelemetryRecord,
} from "../types";

/**
 * Row-level storage used by the identity layer and the report command.
 * Inserts return the stored row with its generated id.
 */
export interface TelemetryStore {
  listDevices(): Promise<Device[]>;
  getDevice(id: number): Promise<Device | undefined>;
  insertDevice(device: NewDevice): Promise<Device>;
  updateDevice(device: Device): Promise<void>;

  listBatteries(): Promise<Battery[]>;
  getBattery(id: number): Promise<Battery | undefined>;
  getBatteriesByDeviceId(deviceId: number): Promise<Battery[]>;
  getBatteriesByLabel(label: string): Promise<Battery[]>;
  insertBattery(battery: NewBattery): Promise<Battery>;
  updateBattery(battery: Battery): Promise<void>;

  insertTelemetry(record: NewTelemetry): Promise<TelemetryRecord>;
  listTelemetry(): Promise<TelemetryRecord[]>;
  getTelemetryByBatteryId(batteryId: number): Promise<TelemetryRecord[]>;

  close(): Promise<void>;
}
