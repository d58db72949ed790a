import { Logger } from "../common/logger";
import {
  batteryLabel,
  BeaconOrigin,
  DisplayRow,
  modeName,
  TelemetrySnapshot,
} from "../types";
import { IdentityRepository } from "./identity";

/** The part of the view the controller writes to. */
export interface RowSink {
  updateRow(row: DisplayRow): void;
  applyLabel(batteryId: number, label: string): void;
  markDirty(): void;
}

export class DisplayController {
  constructor(
    private readonly repo: IdentityRepository,
    private readonly view: RowSink,
    private readonly logger: Logger
  ) {}

  async handleTelemetry(
    snapshot: TelemetrySnapshot,
    externalId: string,
    origin?: BeaconOrigin
  ): Promise<DisplayRow> {
    const record = await this.repo.saveTelemetry(snapshot, externalId, origin);
    const battery = this.repo.getBatteryByExternalId(externalId);

    const row: DisplayRow = {
      batteryId: record.batteryId,
      externalId,
      label: battery ? batteryLabel(battery) : String(record.batteryId),
      capacity: battery?.capacity ?? record.capacity,
      resistance: battery?.resistance ?? record.resistance,
      dischargeCurrent: battery?.dischargeCurrent ?? record.dischargeCurrent,
      voltage: record.voltage,
      advCount: record.advCount,
      uptimeSeconds: record.uptimeSeconds,
      mode: modeName(record.mode),
      updatedAt: record.recordedAt,
    };
    this.view.updateRow(row);

    this.logger
      .with()
      .str("externalId", externalId)
      .num("batteryId", row.batteryId)
      .logger()
      .info(
        `Telemetry received from ${externalId} - V=${record.voltage}mV, adv=${record.advCount}, uptime=${record.uptimeSeconds}s`
      );
    return row;
  }

  async handleLabelChange(externalId: string, label: string): Promise<void> {
    const battery = await this.repo.updateBatteryLabel(externalId, label);
    this.view.applyLabel(battery.id, batteryLabel(battery));
    this.view.markDirty();
  }
}
