import { FrameExtractor } from "../beacon/extractor";
import { SignatureVerifier } from "../beacon/signature";
import { getLogger, resetLogDestination, setLogDestination } from "../common/logger";
import { MemoryTelemetryStore } from "../testing/memoryStore";
import { InteractiveView } from "../ui/view";
import { DisplayController } from "./controller";
import { IdentityRepository } from "./identity";
import { IngestionPipeline } from "./pipeline";

const verifier = new SignatureVerifier("test-secret");

function frame(advCount: number, resistance = 50): Uint8Array {
  const out = new Uint8Array(18);
  const view = new DataView(out.buffer);
  view.setUint8(0, 0x20);
  view.setUint8(1, 1);
  view.setUint16(2, 3700, false);
  view.setInt16(4, resistance, false);
  view.setUint32(6, advCount, false);
  view.setUint32(10, 10000, false);
  out.set(verifier.sign(out.subarray(0, 14)), 14);
  return out;
}

function advertise(extractor: FrameExtractor, id: string, data: Uint8Array) {
  extractor.detectionCallback(
    { id, address: null, name: null },
    { localName: "ESP32 TLM Beacon", serviceData: [{ uuid: "feaa", data }] }
  );
}

describe("ingestion", () => {
  let store: MemoryTelemetryStore;
  let view: InteractiveView;
  let pipeline: IngestionPipeline;
  let extractor: FrameExtractor;

  beforeAll(() => {
    setLogDestination(() => undefined);
  });

  afterAll(() => {
    resetLogDestination();
  });

  beforeEach(async () => {
    const logger = getLogger();
    store = new MemoryTelemetryStore();
    const repo = await IdentityRepository.create(store, logger);
    view = new InteractiveView();
    pipeline = new IngestionPipeline(new DisplayController(repo, view, logger), logger);
    pipeline.attach(view);
    extractor = new FrameExtractor({
      verifier,
      sink: pipeline,
      logger,
      deviceName: "ESP32 TLM Beacon",
    });
  });

  test("should persist each distinct reading once", async () => {
    // same beacon twice before the consumer runs, then repeats
    advertise(extractor, "beacon-a", frame(1));
    advertise(extractor, "beacon-a", frame(2));
    advertise(extractor, "beacon-a", frame(2));
    advertise(extractor, "beacon-b", frame(1));
    await pipeline.drained();

    expect(await store.listDevices()).toHaveLength(2);
    expect(await store.listBatteries()).toHaveLength(2);
    expect(await store.listTelemetry()).toHaveLength(3);
    expect(view.sortedRows().map((r) => [r.externalId, r.advCount])).toEqual([
      ["beacon-a", 2],
      ["beacon-b", 1],
    ]);
  });

  test("should rename through the prompt while readings keep arriving", async () => {
    advertise(extractor, "beacon-a", frame(1));
    await pipeline.drained();

    view.handleKey("c");
    view.setPromptInput("1");
    view.submitPrompt();
    view.setPromptInput("42");
    view.submitPrompt();
    advertise(extractor, "beacon-a", frame(2, 0));
    await pipeline.drained();

    expect(view.findRowByLabel("42")?.advCount).toBe(2);
    expect(view.findRowByLabel("1")).toBeUndefined();
    expect(view.getRow(1)?.resistance).toBe(50);
    expect((await store.getBattery(1))?.label).toBe("42");
  });

  test("should drop forged frames", async () => {
    const forged = frame(1);
    forged[17] ^= 0x01;
    advertise(extractor, "beacon-a", forged);
    await pipeline.drained();
    expect(await store.listTelemetry()).toHaveLength(0);
  });
});
