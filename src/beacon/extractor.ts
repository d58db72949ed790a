import { CancellationError } from "../common/errors";
import { toHexString } from "../common/hex";
import { Logger } from "../common/logger";
import { BeaconOrigin, TelemetrySnapshot } from "../types";
import {
  decodeTelemetryFrame,
  sameSnapshot,
  TELEMETRY_PAYLOAD_LENGTH,
} from "./decoder";
import { MAC_TRUNCATION_LENGTH, SignatureVerifier } from "./signature";

export const TELEMETRY_SERVICE_UUID = "0000feaa-0000-1000-8000-00805f9b34fb";

/** 0xFEAA as transmitted (little-endian); some beacons repeat it inside the payload. */
export const DUPLICATED_SERVICE_PREFIX = Uint8Array.of(0xaa, 0xfe);

const BLUETOOTH_BASE_UUID_SUFFIX = "00001000800000805f9b34fb";

export interface ServiceDataEntry {
  uuid: string;
  data: Uint8Array;
}

export interface DiscoveredDevice {
  /** Stable opaque identifier of the peripheral; becomes the device's external id. */
  id: string;
  address: string | null;
  name: string | null;
}

export interface AdvertisementPayload {
  localName?: string | null;
  serviceData: Iterable<ServiceDataEntry>;
}

/** Receives every accepted, changed snapshot. Must not block. */
export interface TelemetrySink {
  submitTelemetry(
    snapshot: TelemetrySnapshot,
    externalId: string,
    origin?: BeaconOrigin
  ): void;
}

export type FrameExtractorOptions = {
  verifier: SignatureVerifier;
  sink: TelemetrySink;
  logger: Logger;
  /** Exact advertised name of the beacons to follow. */
  deviceName: string;
  serviceUuid?: string;
  /** Bytes of truncated MAC at the end of each frame. @default 4 */
  macLength?: number;
};

/** Lowercase 128-bit form without dashes. 16-bit short UUIDs expand on the Bluetooth base UUID. */
export function normalizeUuid(uuid: string): string {
  const clean = uuid.replace(/-/g, "").toLowerCase();
  if (clean.length === 4) return `0000${clean}${BLUETOOTH_BASE_UUID_SUFFIX}`;
  if (clean.length === 8) return `${clean}${BLUETOOTH_BASE_UUID_SUFFIX}`;
  return clean;
}

function startsWithPrefix(raw: Uint8Array): boolean {
  return (
    raw[0] === DUPLICATED_SERVICE_PREFIX[0] &&
    raw[1] === DUPLICATED_SERVICE_PREFIX[1]
  );
}

/**
 * Turns BLE advertisements into authenticated telemetry snapshots.
 *
 * Beacons repeat the same advertisement many times a second; only the first
 * occurrence of each distinct reading per source reaches the sink.
 */
export class FrameExtractor {
  private readonly verifier: SignatureVerifier;
  private readonly sink: TelemetrySink;
  private readonly logger: Logger;
  private readonly deviceName: string;
  private readonly serviceUuid: string;
  private readonly macLength: number;
  private readonly lastSeen = new Map<string, TelemetrySnapshot>();

  constructor(options: FrameExtractorOptions) {
    this.verifier = options.verifier;
    this.sink = options.sink;
    this.logger = options.logger;
    this.deviceName = options.deviceName;
    this.serviceUuid = normalizeUuid(options.serviceUuid ?? TELEMETRY_SERVICE_UUID);
    this.macLength = options.macLength ?? MAC_TRUNCATION_LENGTH;
  }

  /**
   * Scanner callback. Only {@link CancellationError} escapes; everything else
   * is logged so that one bad advertisement cannot end the scan.
   */
  detectionCallback(device: DiscoveredDevice, advertisement: AdvertisementPayload): void {
    try {
      const name = advertisement.localName ?? device.name;
      if (name !== this.deviceName) return;
      this.parseAdvertisement(device, advertisement.serviceData);
    } catch (err) {
      if (err instanceof CancellationError) throw err;
      this.logger
        .with()
        .str("source", device.address ?? device.id)
        .error(err)
        .logger()
        .error("Advertisement handling failed");
    }
  }

  /**
   * Returns the snapshot forwarded to the sink, or `null` when the
   * advertisement carried nothing new.
   */
  parseAdvertisement(
    source: DiscoveredDevice,
    serviceData: Iterable<ServiceDataEntry>
  ): TelemetrySnapshot | null {
    const sourceLabel = source.address ?? source.id;

    for (const entry of serviceData) {
      if (normalizeUuid(entry.uuid) !== this.serviceUuid) continue;

      const data = entry.data;
      const frameLength = TELEMETRY_PAYLOAD_LENGTH + this.macLength;
      if (
        data.length !== frameLength &&
        data.length !== frameLength + DUPLICATED_SERVICE_PREFIX.length
      ) {
        this.logger
          .with()
          .str("source", sourceLabel)
          .num("length", data.length)
          .logger()
          .debug("Not a telemetry frame (could be URL, UID, etc.)");
        continue;
      }

      const raw = data.subarray(0, data.length - this.macLength);
      const mac = data.subarray(data.length - this.macLength);
      if (!this.verifier.verify(raw, mac, this.macLength)) {
        this.logger
          .with()
          .str("source", sourceLabel)
          .str("mac", toHexString(mac))
          .logger()
          .warn("Skipping frame with invalid signature");
        continue;
      }

      // the MAC covers the prefix as transmitted, so it is only stripped now
      let payload: Uint8Array;
      const prefixed = TELEMETRY_PAYLOAD_LENGTH + DUPLICATED_SERVICE_PREFIX.length;
      if (raw.length === prefixed && startsWithPrefix(raw)) {
        payload = raw.subarray(DUPLICATED_SERVICE_PREFIX.length);
      } else if (raw.length === TELEMETRY_PAYLOAD_LENGTH) {
        payload = raw;
      } else {
        this.logger
          .with()
          .str("source", sourceLabel)
          .str("raw", toHexString(raw))
          .logger()
          .debug("Not a telemetry payload after prefix check");
        continue;
      }

      let snapshot: TelemetrySnapshot;
      try {
        snapshot = decodeTelemetryFrame(payload);
      } catch (err) {
        this.logger
          .with()
          .str("source", sourceLabel)
          .error(err)
          .logger()
          .error(`[${sourceLabel}] Failed to decode telemetry`);
        continue;
      }

      const previous = this.lastSeen.get(source.id);
      if (previous && sameSnapshot(previous, snapshot)) {
        return null;
      }

      this.sink.submitTelemetry(snapshot, source.id, {
        address: source.address,
        name: source.name,
      });
      this.lastSeen.set(source.id, snapshot);

      if (this.logger.isTraceEnabled()) {
        this.logger
          .with()
          .str("source", sourceLabel)
          .str("payload", toHexString(payload))
          .logger()
          .trace("Accepted telemetry frame");
      }
      return snapshot;
    }
    return null;
  }

  /** Drops the dedup state of one source, so its next reading is forwarded. */
  forget(sourceId: string): void {
    this.lastSeen.delete(sourceId);
  }

  reset(): void {
    this.lastSeen.clear();
  }
}
