// Dock Configuration Store - named dock sets, the default pointer and
// per-space assignments
//
// MUTATION PATTERN:
// Actions are synchronous and persisted before they return. Tiles are copied
// on the way in so callers never share rawData with the store. Use castDraft
// when handing plain values to an immer draft.
//
// INVARIANTS (kept by every action and by rehydration):
// - defaultDockSetID, when set, names an existing dock set
// - spaceAssignments only point at existing dock sets
//
// PERSISTENCE:
// rawData is encoded with the tagged JSON codec (binary and date values), and
// the display fields of every tile are recomputed from rawData on load.

import { createStore } from "zustand/vanilla";
import {
  createJSONStorage,
  persist,
  subscribeWithSelector,
  type StateStorage,
} from "zustand/middleware";
import { immer } from "zustand/middleware/immer";
import { castDraft } from "immer";
import { nanoid } from "nanoid";
import { z } from "zod";
import type { DockConfig, DockSet, DockSetId, DockTile, DockTileId, SpaceId } from "@/types";
import { DOCK_CONFIG_STORAGE_KEY } from "@/lib/config";
import { cloneDockRecord, decodeDockRecord, encodeDockRecordValue, type JsonValue } from "@/lib/dock/raw-codec";
import { parseDockTile } from "@/lib/dock/tiles";
import { appendTelemetry } from "@/lib/telemetry";

export const DOCK_CONFIG_SCHEMA_VERSION = 1;

export interface CreateDockSetInput {
  name: string;
  tiles?: DockTile[];
  dateCreated?: number;
}

export interface DockConfigStoreState extends DockConfig {
  addDockSet: (input: CreateDockSetInput) => DockSet;
  renameDockSet: (id: DockSetId, name: string) => boolean;
  deleteDockSet: (id: DockSetId) => boolean;
  moveDockSet: (fromIndex: number, toIndex: number) => void;
  setDefaultDockSet: (id: DockSetId | undefined) => boolean;

  assignSpace: (spaceId: SpaceId, dockSetId: DockSetId) => boolean;
  unassignSpace: (spaceId: SpaceId) => void;

  addTile: (dockSetId: DockSetId, tile: DockTile, index?: number) => boolean;
  removeTile: (dockSetId: DockSetId, tileId: DockTileId) => boolean;
  moveTile: (dockSetId: DockSetId, fromIndex: number, toIndex: number) => void;
  replaceTiles: (dockSetId: DockSetId, tiles: DockTile[]) => boolean;
}

const persistedTileSchema = z.object({
  id: z.string().min(1),
  rawData: z.unknown(),
});

const persistedDockSetSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  dateCreated: z.number().finite(),
  tiles: z.array(z.unknown()).catch([]),
});

const persistedConfigSchema = z.object({
  dockSets: z.array(z.unknown()).catch([]),
  defaultDockSetID: z.string().optional().catch(undefined),
  spaceAssignments: z.record(z.string(), z.string()).catch({}),
});

function cloneTile(tile: DockTile): DockTile {
  return { ...tile, rawData: cloneDockRecord(tile.rawData) };
}

function isValidIndex(index: number, length: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < length;
}

function encodeTile(tile: DockTile): { [key: string]: JsonValue } {
  return {
    id: tile.id,
    label: tile.label,
    ...(tile.bundleIdentifier ? { bundleIdentifier: tile.bundleIdentifier } : {}),
    ...(tile.fileURL ? { fileURL: tile.fileURL } : {}),
    rawData: encodeDockRecordValue(tile.rawData),
  };
}

export function encodeDockConfig(config: DockConfig): { [key: string]: JsonValue } {
  return {
    dockSets: config.dockSets.map((dockSet) => ({
      id: dockSet.id,
      name: dockSet.name,
      dateCreated: dockSet.dateCreated,
      tiles: dockSet.tiles.map(encodeTile),
    })),
    ...(config.defaultDockSetID ? { defaultDockSetID: config.defaultDockSetID } : {}),
    spaceAssignments: { ...config.spaceAssignments },
  };
}

function decodeTile(raw: unknown): DockTile | null {
  const parsed = persistedTileSchema.safeParse(raw);
  if (!parsed.success) return null;
  const rawData = decodeDockRecord(parsed.data.rawData);
  return rawData ? parseDockTile(rawData, parsed.data.id) : null;
}

function decodeDockSet(raw: unknown): DockSet | null {
  const parsed = persistedDockSetSchema.safeParse(raw);
  if (!parsed.success) return null;
  const tiles: DockTile[] = [];
  for (const entry of parsed.data.tiles) {
    const tile = decodeTile(entry);
    if (tile) tiles.push(tile);
  }
  return {
    id: parsed.data.id,
    name: parsed.data.name,
    dateCreated: parsed.data.dateCreated,
    tiles,
  };
}

/** Drops dangling assignments and repairs a default that no longer resolves. */
export function normalizeDockConfig(config: DockConfig): DockConfig {
  const ids = new Set(config.dockSets.map((dockSet) => dockSet.id));
  const spaceAssignments: Record<SpaceId, DockSetId> = {};
  for (const [spaceId, dockSetId] of Object.entries(config.spaceAssignments)) {
    if (ids.has(dockSetId)) spaceAssignments[spaceId] = dockSetId;
  }
  const defaultDockSetID =
    config.defaultDockSetID === undefined || ids.has(config.defaultDockSetID)
      ? config.defaultDockSetID
      : config.dockSets[0]?.id;
  return {
    dockSets: config.dockSets,
    ...(defaultDockSetID ? { defaultDockSetID } : {}),
    spaceAssignments,
  };
}

export function decodeDockConfig(raw: unknown): DockConfig {
  const parsed = persistedConfigSchema.safeParse(raw);
  if (!parsed.success) return { dockSets: [], spaceAssignments: {} };

  const seen = new Set<DockSetId>();
  const dockSets: DockSet[] = [];
  for (const entry of parsed.data.dockSets) {
    const dockSet = decodeDockSet(entry);
    if (!dockSet || seen.has(dockSet.id)) continue;
    seen.add(dockSet.id);
    dockSets.push(dockSet);
  }

  return normalizeDockConfig({
    dockSets,
    defaultDockSetID: parsed.data.defaultDockSetID,
    spaceAssignments: parsed.data.spaceAssignments,
  });
}

export function selectDockConfig(state: DockConfigStoreState): DockConfig {
  return {
    dockSets: state.dockSets,
    ...(state.defaultDockSetID ? { defaultDockSetID: state.defaultDockSetID } : {}),
    spaceAssignments: state.spaceAssignments,
  };
}

export function createDockConfigStore(options: { storage: StateStorage }) {
  return createStore<DockConfigStoreState>()(
    subscribeWithSelector(
      persist(
        immer((set, get) => ({
          dockSets: [],
          defaultDockSetID: undefined,
          spaceAssignments: {},

          addDockSet: (input) => {
            const dockSet: DockSet = {
              id: `dockset_${nanoid(10)}`,
              name: input.name,
              dateCreated: input.dateCreated ?? Date.now(),
              tiles: (input.tiles ?? []).map(cloneTile),
            };
            set((state) => {
              state.dockSets.push(castDraft(dockSet));
              if (!state.defaultDockSetID) state.defaultDockSetID = dockSet.id;
            });
            return dockSet;
          },

          renameDockSet: (id, name) => {
            if (!get().dockSets.some((dockSet) => dockSet.id === id)) return false;
            set((state) => {
              const dockSet = state.dockSets.find((entry) => entry.id === id);
              if (dockSet) dockSet.name = name;
            });
            return true;
          },

          deleteDockSet: (id) => {
            const index = get().dockSets.findIndex((dockSet) => dockSet.id === id);
            if (index === -1) return false;
            set((state) => {
              state.dockSets.splice(index, 1);
              for (const [spaceId, dockSetId] of Object.entries(state.spaceAssignments)) {
                if (dockSetId === id) delete state.spaceAssignments[spaceId];
              }
              if (state.defaultDockSetID === id) {
                state.defaultDockSetID = state.dockSets[0]?.id;
              }
            });
            return true;
          },

          moveDockSet: (fromIndex, toIndex) => {
            const { dockSets } = get();
            if (
              fromIndex === toIndex ||
              !isValidIndex(fromIndex, dockSets.length) ||
              !isValidIndex(toIndex, dockSets.length)
            ) {
              return;
            }
            set((state) => {
              const [moved] = state.dockSets.splice(fromIndex, 1);
              state.dockSets.splice(toIndex, 0, moved);
            });
          },

          setDefaultDockSet: (id) => {
            if (id !== undefined && !get().dockSets.some((dockSet) => dockSet.id === id)) {
              return false;
            }
            set((state) => {
              state.defaultDockSetID = id;
            });
            return true;
          },

          assignSpace: (spaceId, dockSetId) => {
            if (!spaceId || !get().dockSets.some((dockSet) => dockSet.id === dockSetId)) {
              return false;
            }
            set((state) => {
              state.spaceAssignments[spaceId] = dockSetId;
            });
            return true;
          },

          unassignSpace: (spaceId) => {
            if (!(spaceId in get().spaceAssignments)) return;
            set((state) => {
              delete state.spaceAssignments[spaceId];
            });
          },

          addTile: (dockSetId, tile, index) => {
            const target = get().dockSets.find((dockSet) => dockSet.id === dockSetId);
            if (!target) return false;
            const copy = cloneTile(tile);
            set((state) => {
              const dockSet = state.dockSets.find((entry) => entry.id === dockSetId);
              if (!dockSet) return;
              const position =
                index === undefined || !Number.isInteger(index)
                  ? dockSet.tiles.length
                  : Math.min(Math.max(index, 0), dockSet.tiles.length);
              dockSet.tiles.splice(position, 0, castDraft(copy));
            });
            return true;
          },

          removeTile: (dockSetId, tileId) => {
            const target = get().dockSets.find((dockSet) => dockSet.id === dockSetId);
            if (!target?.tiles.some((tile) => tile.id === tileId)) return false;
            set((state) => {
              const dockSet = state.dockSets.find((entry) => entry.id === dockSetId);
              if (!dockSet) return;
              const index = dockSet.tiles.findIndex((tile) => tile.id === tileId);
              if (index !== -1) dockSet.tiles.splice(index, 1);
            });
            return true;
          },

          moveTile: (dockSetId, fromIndex, toIndex) => {
            const target = get().dockSets.find((dockSet) => dockSet.id === dockSetId);
            if (
              !target ||
              fromIndex === toIndex ||
              !isValidIndex(fromIndex, target.tiles.length) ||
              !isValidIndex(toIndex, target.tiles.length)
            ) {
              return;
            }
            set((state) => {
              const dockSet = state.dockSets.find((entry) => entry.id === dockSetId);
              if (!dockSet) return;
              const [moved] = dockSet.tiles.splice(fromIndex, 1);
              dockSet.tiles.splice(toIndex, 0, moved);
            });
          },

          replaceTiles: (dockSetId, tiles) => {
            if (!get().dockSets.some((dockSet) => dockSet.id === dockSetId)) return false;
            const copies = tiles.map(cloneTile);
            set((state) => {
              const dockSet = state.dockSets.find((entry) => entry.id === dockSetId);
              if (dockSet) dockSet.tiles = castDraft(copies);
            });
            return true;
          },
        })),
        {
          name: DOCK_CONFIG_STORAGE_KEY,
          version: DOCK_CONFIG_SCHEMA_VERSION,
          storage: createJSONStorage(() => options.storage),
          partialize: (state) => encodeDockConfig(selectDockConfig(state)),
          merge: (persistedState, currentState) => ({
            ...currentState,
            defaultDockSetID: undefined,
            ...decodeDockConfig(persistedState),
          }),
          onRehydrateStorage: () => (_state, error) => {
            if (error) {
              void appendTelemetry({
                level: "warn",
                source: "store.dock-config",
                event: "rehydrate_failed",
                data: { error },
              });
            }
          },
        }
      )
    )
  );
}

export type DockConfigStore = ReturnType<typeof createDockConfigStore>;
