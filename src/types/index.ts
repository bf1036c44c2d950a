// types/index.ts
//
// Single source of truth for the domain model shared by the stores, the rule
// engine and the dock scheduler.
//
// ORGANIZATION:
// 1. Identifiers
// 2. Spaces - descriptors announced by the space-change feed
// 3. Window Actions - tagged variants executed against an application
// 4. Rules - per-application policies keyed by space membership
// 5. Dock - raw preference records, tiles, sets and the config aggregate
//
// DESIGN PRINCIPLES:
// - Discriminated unions for action variants (WindowAction)
// - Raw dock records are the source of truth; typed tile fields are a projection
// - All timestamps are milliseconds since epoch (Date.now())

// ============================================================================
// 1. Identifiers
// ============================================================================

export type SpaceId = string;
export type RuleId = string;
export type RuleGroupId = string;
export type DockSetId = string;
export type DockTileId = string;

// ============================================================================
// 2. Spaces
// ============================================================================

export interface SpaceDescriptor {
  id: SpaceId;
  name: string;
  number: number;
}

// ============================================================================
// 3. Window Actions
// ============================================================================

export type WindowAction =
  | { type: "doNothing" }
  | { type: "show" }
  | { type: "hide" }
  | { type: "minimize" }
  | { type: "bringToFront" }
  | {
      type: "hotkey";
      keyCode: number;
      modifiers: number;
      restoreWindow: boolean;
      waitForFrontmost: boolean;
    }
  | { type: "globalHotkey"; keyCode: number; modifiers: number };

export type WindowActionType = WindowAction["type"];

// ============================================================================
// 4. Rules
// ============================================================================

export interface RuleGroup {
  id: RuleGroupId;
  targetSpaceIDs: SpaceId[];
  actions: WindowAction[];
}

export interface AppRule {
  id: RuleId;
  appBundleID: string;
  appName: string;
  isEnabled: boolean;
  groups: RuleGroup[];
  elseActions: WindowAction[];
}

export type RuleSortOption = "name" | "space";

// ============================================================================
// 5. Dock
// ============================================================================

/**
 * A value inside an OS dock preference record. Mirrors the property-list value
 * space: binary payloads and dates are kept as-is.
 */
export type DockRecordValue =
  | string
  | number
  | boolean
  | Date
  | Buffer
  | DockRecord
  | DockRecordValue[];

export interface DockRecord {
  [key: string]: DockRecordValue;
}

export interface DockTile {
  id: DockTileId;
  label: string;
  bundleIdentifier?: string;
  fileURL?: string;
  rawData: DockRecord;
}

export interface DockSet {
  id: DockSetId;
  name: string;
  dateCreated: number;
  tiles: DockTile[];
}

export interface DockConfig {
  dockSets: DockSet[];
  defaultDockSetID?: DockSetId;
  spaceAssignments: Record<SpaceId, DockSetId>;
}
