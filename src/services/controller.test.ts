import {
  BeaconLoggerEvents,
  getLogger,
  LogRecord,
  resetLogDestination,
  setLogDestination,
} from "../common/logger";
import { RepositoryContractError } from "../common/errors";
import { MemoryTelemetryStore } from "../testing/memoryStore";
import { TelemetrySnapshot } from "../types";
import { InteractiveView } from "../ui/view";
import { DisplayController } from "./controller";
import { IdentityRepository } from "./identity";

const snapshot: TelemetrySnapshot = {
  frameType: 0x20,
  version: 1,
  batteryMilliVolts: 3700,
  resistanceRaw: 50,
  advCount: 7,
  uptimeSeconds: 10,
};

describe("DisplayController", () => {
  let store: MemoryTelemetryStore;
  let view: InteractiveView;
  let controller: DisplayController;
  let records: LogRecord[];
  const onLog = (r: LogRecord) => records.push(r);

  beforeAll(() => {
    setLogDestination(() => undefined);
    BeaconLoggerEvents.on("log", onLog);
  });

  afterAll(() => {
    BeaconLoggerEvents.off("log", onLog);
    resetLogDestination();
  });

  beforeEach(async () => {
    records = [];
    store = new MemoryTelemetryStore();
    const repo = await IdentityRepository.create(store, getLogger());
    view = new InteractiveView();
    controller = new DisplayController(repo, view, getLogger());
  });

  test("should build a display row and put it on the view", async () => {
    const row = await controller.handleTelemetry(snapshot, "beacon-a");
    expect(row).toMatchObject({
      batteryId: 1,
      externalId: "beacon-a",
      label: "1",
      voltage: 3700,
      resistance: 50,
      capacity: 0,
      dischargeCurrent: 0,
      advCount: 7,
      uptimeSeconds: 10,
      mode: "Charge",
    });
    expect(view.getRow(1)).toEqual(row);
    expect(view.isDirty()).toBe(true);
  });

  test("should show the last-known resistance when a reading has none", async () => {
    await controller.handleTelemetry(snapshot, "beacon-a");
    const row = await controller.handleTelemetry(
      { ...snapshot, resistanceRaw: 0, advCount: 8 },
      "beacon-a"
    );
    expect(row.resistance).toBe(50);
  });

  test("should log a summary line per reading", async () => {
    await controller.handleTelemetry(snapshot, "beacon-a");
    expect(records.map((r) => r.message)).toContain(
      "Telemetry received from beacon-a - V=3700mV, adv=7, uptime=10s"
    );
  });

  test("should apply a label change to storage and the view", async () => {
    await controller.handleTelemetry(snapshot, "beacon-a");
    view.tick();

    await controller.handleLabelChange("beacon-a", "42");

    expect(view.getRow(1)?.label).toBe("42");
    expect(view.findRowByLabel("42")?.batteryId).toBe(1);
    expect(view.findRowByLabel("1")).toBeUndefined();
    expect(view.isDirty()).toBe(true);
    expect((await store.getBattery(1))?.label).toBe("42");
  });

  test("should keep the new label on later readings", async () => {
    await controller.handleTelemetry(snapshot, "beacon-a");
    await controller.handleLabelChange("beacon-a", "42");
    const row = await controller.handleTelemetry({ ...snapshot, advCount: 8 }, "beacon-a");
    expect(row.label).toBe("42");
  });

  test("should reject a label change for an unseen beacon", async () => {
    await expect(controller.handleLabelChange("beacon-x", "1")).rejects.toBeInstanceOf(
      RepositoryContractError
    );
  });
});
