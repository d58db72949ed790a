import React from "react";
import { render } from "ink-testing-library";
import { LogBuffer } from "../common/logBuffer";
import { DisplayRow } from "../types";
import App from "./App";
import { InteractiveView } from "./view";

function row(batteryId: number, label: string): DisplayRow {
  return {
    batteryId,
    externalId: `beacon-${batteryId}`,
    label,
    capacity: 0,
    resistance: 50,
    voltage: 3700,
    dischargeCurrent: 0,
    advCount: 7,
    uptimeSeconds: 10,
    mode: "Charge",
    updatedAt: new Date(0),
  };
}

const flush = () => new Promise((resolve) => setTimeout(resolve, 10));

describe("App", () => {
  let view: InteractiveView;

  beforeEach(() => {
    view = new InteractiveView();
  });

  afterEach(() => {
    view.dispose();
  });

  test("should show a placeholder before any beacon is seen", () => {
    view.tick();
    const { lastFrame, unmount } = render(<App view={view} />);
    expect(lastFrame()).toContain("Waiting for beacons...");
    expect(lastFrame()).toContain("Charger telemetry - 0 batteries");
    expect(lastFrame()).toContain("l: log  c: rename  q: quit");
    unmount();
  });

  test("should render one table line per battery", () => {
    view.updateRow(row(1, "1"));
    view.updateRow(row(2, "7"));
    view.tick();
    const { lastFrame, unmount } = render(<App view={view} />);
    const frame = lastFrame() ?? "";
    expect(frame).toContain("Charger telemetry - 2 batteries");
    expect(frame).toContain("beacon-1");
    expect(frame).toContain("beacon-2");
    expect(frame).toContain("3700");
    expect(frame).toContain("10.0");
    expect(frame).not.toContain("Waiting for beacons...");
    unmount();
  });

  test("should redraw when the view publishes", async () => {
    view.tick();
    const { lastFrame, unmount } = render(<App view={view} />);
    view.updateRow(row(1, "1"));
    view.tick();
    await flush();
    expect(lastFrame()).toContain("beacon-1");
    unmount();
  });

  test("should show the log pane in log mode", () => {
    const buffer = new LogBuffer(10);
    buffer.push("12:00:00 INFO  first entry");
    buffer.push("12:00:01 WARN  second entry");
    view = new InteractiveView({ logSource: buffer });
    view.handleKey("l");
    view.tick();
    const { lastFrame, unmount } = render(<App view={view} />);
    const frame = lastFrame() ?? "";
    expect(frame).toContain("Log (2 lines)");
    expect(frame).toContain("second entry");
    expect(frame).toContain("t: table");
    unmount();
  });

  test("should show the rename prompt and flash messages", () => {
    view.updateRow(row(1, "1"));
    view.showFlash("Battery 99 not found", "warn");
    view.handleKey("c");
    view.tick();
    const { lastFrame, unmount } = render(<App view={view} />);
    const frame = lastFrame() ?? "";
    expect(frame).toContain("Battery to rename (label or number):");
    expect(frame).toContain("Battery 99 not found");
    expect(frame).toContain("Enter: confirm  Esc: cancel");
    unmount();
  });
});
