import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { RULES_STORAGE_KEY } from "@/lib/config";
import {
  FakeBundleResolver,
  FakeDockPreferences,
  FakeDockProcess,
  FakeKeyEvents,
  FakeWindowControl,
} from "@/lib/testing/fakes";
import { createMemoryStateStorage } from "@/store/storage";
import { createAutomationRuntime } from "./automation-runtime";

const NOTES = "com.example.notes";

const dockEntries = [
  {
    "tile-data": { "bundle-identifier": NOTES, "file-label": "Notes" },
    "tile-type": "file-tile",
  },
];

function setup() {
  const windowControl = new FakeWindowControl();
  const keyEvents = new FakeKeyEvents();
  const dockPreferences = new FakeDockPreferences(dockEntries);
  const dockProcess = new FakeDockProcess();
  const storage = createMemoryStateStorage();
  const runtime = createAutomationRuntime({
    config: {
      dataDir: "/tmp/space-pilot-test",
      dockDomain: "com.apple.dock",
      dryRun: false,
      telemetryLogPath: null,
    },
    storage,
    platform: {
      windowControl,
      keyEvents,
      dockPreferences,
      dockProcess,
      bundleResolver: new FakeBundleResolver({ "/Applications/Notes.app": NOTES }),
    },
  });
  return { runtime, storage, windowControl, keyEvents, dockPreferences, dockProcess };
}

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(() => {
  vi.useRealTimers();
});

describe("createAutomationRuntime", () => {
  it("drives both pipelines from one space change", async () => {
    const { runtime, windowControl, dockPreferences, dockProcess } = setup();
    windowControl.launch(NOTES);
    runtime.rules.getState().addRule({
      appBundleID: NOTES,
      appName: "Notes",
      groups: [{ targetSpaceIDs: ["S1"], actions: [{ type: "hide" }] }],
      elseActions: [{ type: "show" }],
    });
    const captured = await runtime.captureDockSet("Everyday");
    runtime.start();

    runtime.registry.announceCurrentSpace("S1");
    await vi.runAllTimersAsync();
    await runtime.whenIdle();

    expect(windowControl.state(NOTES)?.hidden).toBe(true);
    expect(dockPreferences.writes).toEqual([dockEntries]);
    expect(dockProcess.restarts).toBe(1);
    expect(runtime.scheduler.lastAppliedDockSetId).toBe(captured?.id);
  });

  it("persists rules through the provided storage", () => {
    const { runtime, storage } = setup();

    runtime.rules.getState().addRule({ appBundleID: NOTES, appName: "Notes" });

    expect(storage.entries.has(RULES_STORAGE_KEY)).toBe(true);
  });

  it("builds tiles from application paths", async () => {
    const { runtime } = setup();

    const tile = await runtime.createTileFromFile("/Applications/Notes.app");

    expect(tile).toMatchObject({ label: "Notes", bundleIdentifier: NOTES });
  });

  it("ignores space changes after stop", async () => {
    const { runtime, windowControl, dockPreferences } = setup();
    windowControl.launch(NOTES);
    runtime.rules.getState().addRule({
      appBundleID: NOTES,
      appName: "Notes",
      elseActions: [{ type: "hide" }],
    });
    await runtime.captureDockSet("Everyday");
    runtime.start();
    runtime.stop();

    runtime.registry.announceCurrentSpace("S1");
    await vi.runAllTimersAsync();
    await runtime.whenIdle();

    expect(windowControl.state(NOTES)?.hidden).toBe(false);
    expect(dockPreferences.writes).toEqual([]);
  });
});
