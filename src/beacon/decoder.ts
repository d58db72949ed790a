import { FrameLengthError } from "../common/errors";
import { TelemetrySnapshot } from "../types";

export const TELEMETRY_PAYLOAD_LENGTH = 14;

/**
 * The uptime field is documented in tenths of a second, but readings have
 * always been scaled by 1000. Left as is until the firmware units are confirmed.
 */
export const UPTIME_DIVISOR = 1000;

/**
 * Decodes a telemetry payload.
 *
 * Layout (big-endian):
 *   [0]      frame type (0x20)
 *   [1]      version
 *   [2-3]    battery millivolts, uint16
 *   [4-5]    resistance, int16
 *   [6-9]    advertisement counter, uint32
 *   [10-13]  uptime, uint32
 *
 * @throws {FrameLengthError} unless the payload is exactly 14 bytes
 */
export function decodeTelemetryFrame(payload: Uint8Array): TelemetrySnapshot {
  if (payload.length !== TELEMETRY_PAYLOAD_LENGTH) {
    throw new FrameLengthError(TELEMETRY_PAYLOAD_LENGTH, payload.length);
  }
  const view = new DataView(payload.buffer, payload.byteOffset, payload.byteLength);
  return {
    frameType: view.getUint8(0),
    version: view.getUint8(1),
    batteryMilliVolts: view.getUint16(2, false),
    resistanceRaw: view.getInt16(4, false),
    advCount: view.getUint32(6, false),
    uptimeSeconds: view.getUint32(10, false) / UPTIME_DIVISOR,
  };
}

/** Field-by-field equality; two frames that decode alike are the same reading. */
export function sameSnapshot(a: TelemetrySnapshot, b: TelemetrySnapshot): boolean {
  return (
    a.frameType === b.frameType &&
    a.version === b.version &&
    a.batteryMilliVolts === b.batteryMilliVolts &&
    a.resistanceRaw === b.resistanceRaw &&
    a.advCount === b.advCount &&
    a.uptimeSeconds === b.uptimeSeconds
  );
}
