import { TelemetryStore } from "./db/store";
import { Battery, batteryLabel, modeName, TelemetryRecord } from "./types";

export type ReportOptions = {
  batteryId?: number;
  label?: string;
};

type Print = (line: string) => void;

function describeBattery(b: Battery, readings: number): string {
  return (
    `  #${b.id} label=${batteryLabel(b)} device=${b.deviceId} ` +
    `R=${b.resistance} capacity=${b.capacity} discharge=${b.dischargeCurrent} readings=${readings}`
  );
}

function describeReading(t: TelemetryRecord): string {
  return (
    `  ${t.recordedAt.toISOString()} V=${t.voltage}mV R=${t.resistance} ` +
    `adv=${t.advCount} uptime=${t.uptimeSeconds}s mode=${modeName(t.mode)}`
  );
}

/** Prints what the database holds. Read-only. */
export async function runReport(
  store: TelemetryStore,
  options: ReportOptions = {},
  print: Print = (line) => console.log(line)
): Promise<void> {
  if (options.batteryId !== undefined) {
    const battery = await store.getBattery(options.batteryId);
    if (!battery) {
      print(`Battery ${options.batteryId} not found`);
      return;
    }
    const history = await store.getTelemetryByBatteryId(battery.id);
    print(`Battery ${battery.id} (${batteryLabel(battery)}): ${history.length} readings`);
    for (const t of history) print(describeReading(t));
    return;
  }

  const telemetry = await store.listTelemetry();
  const counts = new Map<number, number>();
  for (const t of telemetry) counts.set(t.batteryId, (counts.get(t.batteryId) ?? 0) + 1);

  if (options.label !== undefined) {
    const batteries = await store.getBatteriesByLabel(options.label);
    print(`Batteries labeled "${options.label}": ${batteries.length}`);
    for (const b of batteries) print(describeBattery(b, counts.get(b.id) ?? 0));
    return;
  }

  const devices = await store.listDevices();
  print(`Devices: ${devices.length}`);
  for (const d of devices) {
    print(
      `  #${d.id} ${d.externalId} mac=${d.macAddress ?? "-"} name=${d.name ?? "-"} first_seen=${d.firstSeen.toISOString()}`
    );
  }
  const batteries = await store.listBatteries();
  print(`Batteries: ${batteries.length}`);
  for (const b of batteries) print(describeBattery(b, counts.get(b.id) ?? 0));
  print(`Telemetry rows: ${telemetry.length}`);
}
