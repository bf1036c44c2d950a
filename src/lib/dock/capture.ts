import type { DockSet } from "@/types";
import type { DockConfigStore } from "@/store/dock-config-store";
import { appendTelemetry } from "@/lib/telemetry";
import { parseDockEntries } from "./tiles";
import type { DockPreferenceStore } from "./types";

export interface CaptureDockSetOptions {
  preferences: DockPreferenceStore;
  dockConfig: DockConfigStore;
  name: string;
  now?: () => number;
}

/**
 * Snapshots the dock as it is right now into a new dock set. The first set
 * ever captured becomes the default.
 */
export async function captureDockSet(options: CaptureDockSetOptions): Promise<DockSet | null> {
  const entries = await options.preferences.readPersistentApps();
  if (!entries) {
    void appendTelemetry({
      level: "warn",
      source: "dock.capture",
      event: "read_failed",
      data: { name: options.name },
    });
    return null;
  }

  const tiles = parseDockEntries(entries);
  const dockSet = options.dockConfig.getState().addDockSet({
    name: options.name,
    tiles,
    dateCreated: (options.now ?? Date.now)(),
  });

  void appendTelemetry({
    level: "info",
    source: "dock.capture",
    event: "captured",
    data: { dockSetId: dockSet.id, tiles: tiles.length },
  });
  return dockSet;
}
