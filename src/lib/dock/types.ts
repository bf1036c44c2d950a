import type { DockRecord } from "@/types";

/** The dock's preference domain, read and replaced wholesale. */
export interface DockPreferenceStore {
  /** Current persistent-apps array, or null when the value is absent or unreadable. */
  readPersistentApps: () => Promise<unknown[] | null>;
  /** Stages a replacement; nothing reaches the dock until synchronize() succeeds. */
  writePersistentApps: (entries: DockRecord[]) => Promise<void>;
  /** Flushes staged writes to the backing store. Resolves false when the flush failed. */
  synchronize: () => Promise<boolean>;
}

export interface DockProcess {
  /** Restarts the process hosting the dock and resolves once the restart command completes. */
  restart: () => Promise<void>;
}
