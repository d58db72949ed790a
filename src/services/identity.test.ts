import { RepositoryContractError } from "../common/errors";
import { getLogger, resetLogDestination, setLogDestination } from "../common/logger";
import { MemoryTelemetryStore } from "../testing/memoryStore";
import { TelemetrySnapshot } from "../types";
import { IdentityRepository } from "./identity";

const snapshot = (overrides: Partial<TelemetrySnapshot> = {}): TelemetrySnapshot => ({
  frameType: 0x20,
  version: 1,
  batteryMilliVolts: 3700,
  resistanceRaw: 50,
  advCount: 7,
  uptimeSeconds: 10,
  ...overrides,
});

describe("IdentityRepository", () => {
  let store: MemoryTelemetryStore;
  let repo: IdentityRepository;

  beforeAll(() => {
    setLogDestination(() => undefined);
  });

  afterAll(() => {
    resetLogDestination();
  });

  beforeEach(async () => {
    store = new MemoryTelemetryStore();
    repo = await IdentityRepository.create(store, getLogger());
  });

  test("should create one device and one battery per external id", async () => {
    await repo.saveTelemetry(snapshot({ advCount: 1 }), "beacon-a");
    await repo.saveTelemetry(snapshot({ advCount: 2 }), "beacon-a");
    await repo.saveTelemetry(snapshot({ advCount: 3 }), "beacon-b");

    expect((await store.listDevices()).map((d) => d.externalId)).toEqual(["beacon-a", "beacon-b"]);
    expect(await store.listBatteries()).toHaveLength(2);
    expect(await store.listTelemetry()).toHaveLength(3);
  });

  test("should map snapshot fields onto the telemetry row", async () => {
    const record = await repo.saveTelemetry(snapshot(), "beacon-a");
    expect(record).toMatchObject({
      voltage: 3700,
      resistance: 50,
      capacity: 0,
      advCount: 7,
      uptimeSeconds: 10,
      mode: 0,
      dischargeCurrent: 0,
      batteryId: repo.getBatteryByExternalId("beacon-a")?.id,
    });
    expect(record.recordedAt).toBeInstanceOf(Date);
  });

  test("should keep last-known values when a reading carries none", async () => {
    await repo.saveTelemetry(snapshot({ resistanceRaw: 42 }), "beacon-a");
    await repo.saveTelemetry(snapshot({ resistanceRaw: 0, advCount: 8 }), "beacon-a");
    await repo.saveTelemetry(snapshot({ resistanceRaw: -3, advCount: 9 }), "beacon-a");

    const battery = repo.getBatteryByExternalId("beacon-a");
    expect(battery?.resistance).toBe(42);
    const [stored] = await store.listBatteries();
    expect(stored.resistance).toBe(42);
    expect(stored.capacity).toBe(0);
  });

  test("should replace a last-known value with a newer positive one", async () => {
    await repo.saveTelemetry(snapshot({ resistanceRaw: 42 }), "beacon-a");
    await repo.saveTelemetry(snapshot({ resistanceRaw: 40, advCount: 8 }), "beacon-a");
    expect((await store.listBatteries())[0].resistance).toBe(40);
  });

  test("should record and backfill the beacon address and name", async () => {
    await repo.saveTelemetry(snapshot(), "beacon-a");
    expect(repo.getDeviceByExternalId("beacon-a")?.macAddress).toBeNull();

    await repo.saveTelemetry(snapshot({ advCount: 8 }), "beacon-a", {
      address: "aa:bb:cc:dd:ee:01",
      name: "ESP32 TLM Beacon",
    });
    const [device] = await store.listDevices();
    expect(device.macAddress).toBe("aa:bb:cc:dd:ee:01");
    expect(device.name).toBe("ESP32 TLM Beacon");
  });

  test("should not overwrite a known address", async () => {
    await repo.saveTelemetry(snapshot(), "beacon-a", { address: "aa:bb:cc:dd:ee:01" });
    await repo.saveTelemetry(snapshot({ advCount: 8 }), "beacon-a", { address: "aa:bb:cc:dd:ee:02" });
    expect((await store.listDevices())[0].macAddress).toBe("aa:bb:cc:dd:ee:01");
  });

  test("should reuse stored identities after a restart", async () => {
    await repo.saveTelemetry(snapshot(), "beacon-a");
    await repo.updateBatteryLabel("beacon-a", "7");

    const restarted = await IdentityRepository.create(store, getLogger());
    expect(restarted.getDeviceByExternalId("beacon-a")).toBeDefined();
    expect(restarted.getBatteryByExternalId("beacon-a")).toBeUndefined();

    const record = await restarted.saveTelemetry(snapshot({ advCount: 8 }), "beacon-a");
    expect(await store.listDevices()).toHaveLength(1);
    expect(await store.listBatteries()).toHaveLength(1);
    expect(restarted.getBatteryByExternalId("beacon-a")?.label).toBe("7");
    expect(record.batteryId).toBe(1);
  });

  test("should rebuild both caches on reload", async () => {
    await repo.saveTelemetry(snapshot(), "beacon-a");
    const other = await IdentityRepository.create(store, getLogger());
    await other.reload();
    expect(other.getBatteryByExternalId("beacon-a")?.id).toBe(1);
  });

  test("should persist a new label", async () => {
    await repo.saveTelemetry(snapshot(), "beacon-a");
    const battery = await repo.updateBatteryLabel("beacon-a", "12");
    expect(battery.label).toBe("12");
    expect((await store.getBattery(battery.id))?.label).toBe("12");
  });

  test("should refuse to relabel an unknown battery", async () => {
    await expect(repo.updateBatteryLabel("beacon-x", "1")).rejects.toBeInstanceOf(
      RepositoryContractError
    );
  });

  test("should surface storage failures", async () => {
    store.failNext(new Error("disk full"));
    await expect(repo.saveTelemetry(snapshot(), "beacon-a")).rejects.toThrow("disk full");
  });

  test("should keep the cached label when the write fails", async () => {
    await repo.saveTelemetry(snapshot(), "beacon-a");
    store.failNext(new Error("disk full"));

    await expect(repo.updateBatteryLabel("beacon-a", "99")).rejects.toThrow("disk full");
    expect(repo.getBatteryByExternalId("beacon-a")?.label).toBeNull();
    expect((await store.listBatteries())[0].label).toBeNull();
  });

  test("should keep the cached last-known value when the write fails", async () => {
    await repo.saveTelemetry(snapshot({ resistanceRaw: 50 }), "beacon-a");
    jest.spyOn(store, "updateBattery").mockRejectedValueOnce(new Error("disk full"));

    await expect(
      repo.saveTelemetry(snapshot({ resistanceRaw: 77, advCount: 8 }), "beacon-a")
    ).rejects.toThrow("disk full");
    expect(repo.getBatteryByExternalId("beacon-a")?.resistance).toBe(50);
    expect((await store.listBatteries())[0].resistance).toBe(50);
  });

  test("should retry a device backfill that failed to persist", async () => {
    const origin = { address: "aa:bb:cc:dd:ee:01", name: "ESP32 TLM Beacon" };
    await repo.saveTelemetry(snapshot(), "beacon-a");
    store.failNext(new Error("disk full"));

    await expect(repo.saveTelemetry(snapshot({ advCount: 8 }), "beacon-a", origin)).rejects.toThrow(
      "disk full"
    );
    expect(repo.getDeviceByExternalId("beacon-a")?.macAddress).toBeNull();
    expect((await store.listDevices())[0].macAddress).toBeNull();

    await repo.saveTelemetry(snapshot({ advCount: 9 }), "beacon-a", origin);
    expect(repo.getDeviceByExternalId("beacon-a")?.macAddress).toBe("aa:bb:cc:dd:ee:01");
    expect((await store.listDevices())[0].macAddress).toBe("aa:bb:cc:dd:ee:01");
  });
});
