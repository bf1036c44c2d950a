import path from "node:path";
import { pathToFileURL } from "node:url";
import { nanoid } from "nanoid";
import type { DockRecord, DockSet, DockTile } from "@/types";
import { appendTelemetry } from "@/lib/telemetry";
import { cloneDockRecord, isDockRecord, toDockRecordValue } from "./raw-codec";

export const UNKNOWN_TILE_LABEL = "Unknown";

/** Dock "file-type" marker for an application bundle. */
const APPLICATION_FILE_TYPE = 41;
/** CFURL string type for an absolute URL. */
const ABSOLUTE_URL_STRING_TYPE = 15;
// Bundles are directories; the dock stores their URLs with a trailing slash.
const BUNDLE_EXTENSIONS = new Set([".app", ".bundle", ".prefpane"]);

export type SpacerKind = "spacer-tile" | "small-spacer-tile";

export interface BundleResolver {
  bundleIdentifier: (filePath: string) => Promise<string | undefined>;
}

export function createDockTileId(): string {
  return `tile_${nanoid(10)}`;
}

function readString(record: DockRecord | undefined, key: string): string | undefined {
  const value = record?.[key];
  return typeof value === "string" ? value : undefined;
}

function readRecord(record: DockRecord | undefined, key: string): DockRecord | undefined {
  const value = record?.[key];
  return isDockRecord(value) ? value : undefined;
}

function parseFileURL(value: string | undefined): string | undefined {
  if (!value) return undefined;
  try {
    return new URL(value).href;
  } catch {
    return undefined;
  }
}

/**
 * Projects the display fields out of a raw dock entry. Entries without
 * tile-data (spacers) are labelled by their tile type; rawData is always the
 * whole entry.
 */
export function parseDockTile(entry: DockRecord, id: string = createDockTileId()): DockTile {
  const rawData = cloneDockRecord(entry);
  const tileData = readRecord(rawData, "tile-data");
  const fileData = readRecord(tileData, "file-data");

  const label =
    readString(tileData, "file-label") ?? readString(rawData, "tile-type") ?? UNKNOWN_TILE_LABEL;
  const bundleIdentifier = readString(tileData, "bundle-identifier");
  const fileURL = parseFileURL(readString(fileData, "_CFURLString"));

  return {
    id,
    label,
    ...(bundleIdentifier ? { bundleIdentifier } : {}),
    ...(fileURL ? { fileURL } : {}),
    rawData,
  };
}

/** Parses the dock's persistent-apps array. Non-record entries are dropped. */
export function parseDockEntries(entries: readonly unknown[]): DockTile[] {
  const tiles: DockTile[] = [];
  entries.forEach((entry, index) => {
    const normalized = toDockRecordValue(entry);
    if (!isDockRecord(normalized)) {
      void appendTelemetry({
        level: "warn",
        source: "dock.tiles",
        event: "entry_skipped",
        data: { index },
      });
      return;
    }
    tiles.push(parseDockTile(normalized));
  });
  return tiles;
}

export function buildDockEntries(tiles: readonly DockTile[]): DockRecord[] {
  return tiles.map((tile) => cloneDockRecord(tile.rawData));
}

export function createSpacerTile(kind: SpacerKind = "spacer-tile"): DockTile {
  return parseDockTile({ "tile-data": {}, "tile-type": kind });
}

export function fileURLForPath(filePath: string): string {
  const href = pathToFileURL(filePath).href;
  const isBundle = BUNDLE_EXTENSIONS.has(path.extname(filePath).toLowerCase());
  return isBundle && !href.endsWith("/") ? `${href}/` : href;
}

export async function createTileFromFile(
  filePath: string,
  resolver: BundleResolver
): Promise<DockTile> {
  const label = path.basename(filePath, path.extname(filePath));
  const fileURL = fileURLForPath(filePath);

  let bundleIdentifier: string | undefined;
  try {
    bundleIdentifier = await resolver.bundleIdentifier(filePath);
  } catch (error) {
    void appendTelemetry({
      level: "warn",
      source: "dock.tiles",
      event: "bundle_lookup_failed",
      data: { filePath, error },
    });
  }

  return parseDockTile({
    "tile-data": {
      "file-data": {
        _CFURLString: fileURL,
        _CFURLStringType: ABSOLUTE_URL_STRING_TYPE,
      },
      "file-label": label,
      "bundle-identifier": bundleIdentifier ?? "",
      "file-type": APPLICATION_FILE_TYPE,
    },
    "tile-type": "file-tile",
  });
}

/** Change detection for dock sets compares identity and name only. */
export function isSameDockSet(a: DockSet | undefined, b: DockSet | undefined): boolean {
  if (!a || !b) return a === b;
  return a.id === b.id && a.name === b.name;
}
