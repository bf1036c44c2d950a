import { describe, expect, it } from "vitest";
import { FakeDockPreferences } from "@/lib/testing/fakes";
import { createDockConfigStore } from "@/store/dock-config-store";
import { createMemoryStateStorage } from "@/store/storage";
import { captureDockSet } from "./capture";

const currentDock = [
  {
    "tile-data": {
      "bundle-identifier": "com.example.mail",
      "file-data": { _CFURLString: "file:///Applications/Mail.app/", _CFURLStringType: 15 },
      "file-label": "Mail",
    },
    "tile-type": "file-tile",
  },
  { "tile-data": {}, "tile-type": "spacer-tile" },
];

describe("captureDockSet", () => {
  it("snapshots the current dock into a new default set", async () => {
    const preferences = new FakeDockPreferences(currentDock);
    const dockConfig = createDockConfigStore({ storage: createMemoryStateStorage() });

    const dockSet = await captureDockSet({
      preferences,
      dockConfig,
      name: "Morning",
      now: () => 1714550400000,
    });

    expect(dockSet).not.toBeNull();
    expect(dockSet?.name).toBe("Morning");
    expect(dockSet?.dateCreated).toBe(1714550400000);
    expect(dockSet?.tiles.map((tile) => tile.label)).toEqual(["Mail", "spacer-tile"]);
    expect(dockSet?.tiles.map((tile) => tile.rawData)).toEqual(currentDock);
    expect(dockConfig.getState().defaultDockSetID).toBe(dockSet?.id);
  });

  it("keeps the existing default when capturing another set", async () => {
    const preferences = new FakeDockPreferences(currentDock);
    const dockConfig = createDockConfigStore({ storage: createMemoryStateStorage() });
    const first = await captureDockSet({ preferences, dockConfig, name: "First" });

    const second = await captureDockSet({ preferences, dockConfig, name: "Second" });

    expect(second?.id).not.toBe(first?.id);
    expect(dockConfig.getState().defaultDockSetID).toBe(first?.id);
    expect(dockConfig.getState().dockSets).toHaveLength(2);
  });

  it("returns null when the dock cannot be read", async () => {
    const preferences = new FakeDockPreferences(null);
    const dockConfig = createDockConfigStore({ storage: createMemoryStateStorage() });

    await expect(captureDockSet({ preferences, dockConfig, name: "Nothing" })).resolves.toBeNull();
    expect(dockConfig.getState().dockSets).toEqual([]);
  });
});
