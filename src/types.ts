/** One decoded 14-byte telemetry frame. */
export interface TelemetrySnapshot {
  frameType: number;
  version: number;
  batteryMilliVolts: number;
  resistanceRaw: number;
  advCount: number;
  uptimeSeconds: number;
}

/** Where an advertisement came from, as reported by the scanner. */
export interface BeaconOrigin {
  address?: string | null;
  name?: string | null;
}

export interface Device {
  id: number;
  externalId: string;
  macAddress: string | null;
  name: string | null;
  firstSeen: Date;
}

export type NewDevice = Omit<Device, "id">;

export interface Battery {
  id: number;
  deviceId: number;
  label: string | null;
  // last-known values; 0 means unknown
  resistance: number;
  capacity: number;
  dischargeCurrent: number;
}

export type NewBattery = Pick<Battery, "deviceId"> & Partial<Omit<Battery, "id" | "deviceId">>;

export interface TelemetryRecord {
  id: number;
  voltage: number;
  resistance: number;
  capacity: number;
  advCount: number;
  uptimeSeconds: number;
  mode: number;
  dischargeCurrent: number;
  batteryId: number;
  recordedAt: Date;
}

export type NewTelemetry = Omit<TelemetryRecord, "id">;

export enum OperatingMode {
  Charge = 0,
  Discharge = 1,
  Analysis = 2,
  InternalResistance = 3,
}

export function modeName(mode: number): string {
  switch (mode) {
    case OperatingMode.Charge:
      return "Charge";
    case OperatingMode.Discharge:
      return "Discharge";
    case OperatingMode.Analysis:
      return "Analysis";
    case OperatingMode.InternalResistance:
      return "InternalResistance";
    default:
      return `Unknown(${mode})`;
  }
}

/** A table row of the live view. Keyed by `batteryId`, ordered by `label`. */
export interface DisplayRow {
  batteryId: number;
  externalId: string;
  label: string;
  capacity: number;
  resistance: number;
  voltage: number;
  dischargeCurrent: number;
  advCount: number;
  uptimeSeconds: number;
  mode: string;
  updatedAt: Date;
}

export function batteryLabel(battery: Pick<Battery, "id" | "label">): string {
  return battery.label ?? String(battery.id);
}
