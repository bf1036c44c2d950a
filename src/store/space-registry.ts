// Space Registry - last known current space plus the ordered list of known spaces
//
// The registry is written only by the transport adapter (announce*) and read by
// the rule engine and the dock scheduler. Subscribers receive each distinct new
// current space id; consecutive duplicates are suppressed by the selector
// subscription. The registry never polls: refresh() asks the transport to
// re-announce and returns.

import { createStore } from "zustand/vanilla";
import { subscribeWithSelector } from "zustand/middleware";
import type { SpaceDescriptor, SpaceId } from "@/types";
import {
  normalizeSpaceList,
  parseCurrentSpaceAnnouncement,
} from "@/lib/spaces/announcement";
import { appendTelemetry } from "@/lib/telemetry";

export interface SpaceTransport {
  /** Asks the external feed to re-announce the current space and the space list. */
  requestRefresh: () => void | Promise<void>;
}

export interface SpaceRegistryState {
  currentSpaceId: SpaceId | null;
  currentSpaceName: string | null;
  spaces: SpaceDescriptor[];
  setCurrentSpace: (id: SpaceId, name?: string) => void;
  setSpaces: (spaces: SpaceDescriptor[]) => void;
}

export function createSpaceRegistryStore() {
  return createStore<SpaceRegistryState>()(
    subscribeWithSelector((set) => ({
      currentSpaceId: null,
      currentSpaceName: null,
      spaces: [],

      setCurrentSpace: (id, name) => {
        if (id.length === 0) return;
        set((state) => ({
          currentSpaceId: id,
          currentSpaceName:
            name ??
            state.spaces.find((space) => space.id === id)?.name ??
            (state.currentSpaceId === id ? state.currentSpaceName : null),
        }));
      },

      setSpaces: (spaces) => {
        set({ spaces: [...spaces] });
      },
    }))
  );
}

export type SpaceRegistryStore = ReturnType<typeof createSpaceRegistryStore>;

export class SpaceRegistry {
  readonly store = createSpaceRegistryStore();

  constructor(private readonly transport?: SpaceTransport) {}

  currentSpaceID(): SpaceId | null {
    return this.store.getState().currentSpaceId;
  }

  currentSpaceName(): string | null {
    return this.store.getState().currentSpaceName;
  }

  knownSpaces(): SpaceDescriptor[] {
    return this.store.getState().spaces;
  }

  subscribe(listener: (spaceId: SpaceId) => void): () => void {
    return this.store.subscribe(
      (state) => state.currentSpaceId,
      (spaceId) => {
        if (spaceId) listener(spaceId);
      }
    );
  }

  async refresh(): Promise<void> {
    if (!this.transport) return;
    try {
      await this.transport.requestRefresh();
    } catch (error) {
      void appendTelemetry({
        level: "warn",
        source: "spaces.registry",
        event: "refresh_failed",
        data: { error },
      });
    }
  }

  announceCurrentSpace(raw: unknown): void {
    const announcement = parseCurrentSpaceAnnouncement(raw);
    if (!announcement) {
      void appendTelemetry({
        level: "warn",
        source: "spaces.registry",
        event: "invalid_current_space",
      });
      return;
    }
    this.store.getState().setCurrentSpace(announcement.id, announcement.name);
  }

  announceSpaces(raw: unknown): void {
    this.store.getState().setSpaces(normalizeSpaceList(raw));
  }
}
