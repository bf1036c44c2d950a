// Persisted rule decoding
//
// Rules have been stored in three shapes:
//   v1: { targetSpaceIDs, matchAction: "Show", elseAction: "DoNothing" }
//   v2: { targetSpaceIDs, matchActions: [...], elseActions: [...] }
//   v3: { groups: [{ targetSpaceIDs, actions }], elseActions }
// migrateRules() lifts v1/v2 into v3; decodeRules() validates v3 and drops
// anything it cannot read. Action decoding never fails: an unknown action type
// becomes doNothing, and hotkeys stored before restoreWindow/waitForFrontmost
// existed get false for both.

import { nanoid } from "nanoid";
import { z } from "zod";
import type { AppRule, RuleGroup, RuleSortOption, WindowAction } from "@/types";

export const RULES_SCHEMA_VERSION = 3;

const keyCodeSchema = z.number().int();
const modifiersSchema = z.number().int().nonnegative();

const windowActionSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("doNothing") }),
  z.object({ type: z.literal("show") }),
  z.object({ type: z.literal("hide") }),
  z.object({ type: z.literal("minimize") }),
  z.object({ type: z.literal("bringToFront") }),
  z.object({
    type: z.literal("hotkey"),
    keyCode: keyCodeSchema,
    modifiers: modifiersSchema,
    restoreWindow: z.boolean().default(false),
    waitForFrontmost: z.boolean().default(false),
  }),
  z.object({
    type: z.literal("globalHotkey"),
    keyCode: keyCodeSchema,
    modifiers: modifiersSchema,
  }),
]);

const LEGACY_ACTION_NAMES: Record<string, WindowAction> = {
  DoNothing: { type: "doNothing" },
  Show: { type: "show" },
  Hide: { type: "hide" },
};

const ruleGroupSchema = z.object({
  id: z.string().min(1).optional(),
  targetSpaceIDs: z.array(z.string()).default([]),
  actions: z.array(z.unknown()).default([]),
});

const appRuleSchema = z.object({
  id: z.string().min(1),
  appBundleID: z.string(),
  appName: z.string(),
  isEnabled: z.boolean().default(true),
  groups: z.array(ruleGroupSchema).default([]),
  elseActions: z.array(z.unknown()).default([]),
});

const legacyRuleSchema = z.object({
  id: z.string().min(1),
  appBundleID: z.string(),
  appName: z.string(),
  isEnabled: z.boolean().default(true),
  targetSpaceIDs: z.array(z.string()).default([]),
  matchAction: z.string().optional(),
  elseAction: z.string().optional(),
  matchActions: z.array(z.unknown()).optional(),
  elseActions: z.array(z.unknown()).optional(),
});

const sortOptionSchema = z.enum(["name", "space"]);

export function decodeWindowAction(raw: unknown): WindowAction {
  if (typeof raw === "string") {
    return LEGACY_ACTION_NAMES[raw] ?? { type: "doNothing" };
  }
  const parsed = windowActionSchema.safeParse(raw);
  return parsed.success ? parsed.data : { type: "doNothing" };
}

function decodeGroup(raw: z.infer<typeof ruleGroupSchema>): RuleGroup {
  return {
    id: raw.id ?? `group_${nanoid(10)}`,
    targetSpaceIDs: Array.from(new Set(raw.targetSpaceIDs)),
    actions: raw.actions.map(decodeWindowAction),
  };
}

export function decodeRule(raw: unknown): AppRule | null {
  const parsed = appRuleSchema.safeParse(raw);
  if (!parsed.success) return null;
  return {
    id: parsed.data.id,
    appBundleID: parsed.data.appBundleID,
    appName: parsed.data.appName,
    isEnabled: parsed.data.isEnabled,
    groups: parsed.data.groups.map(decodeGroup),
    elseActions: parsed.data.elseActions.map(decodeWindowAction),
  };
}

export function decodeRules(raw: unknown): AppRule[] {
  if (!Array.isArray(raw)) return [];
  const rules: AppRule[] = [];
  for (const entry of raw) {
    const rule = decodeRule(entry);
    if (rule) rules.push(rule);
  }
  return rules;
}

export function decodeSortOption(raw: unknown): RuleSortOption {
  const parsed = sortOptionSchema.safeParse(raw);
  return parsed.success ? parsed.data : "name";
}

function migrateLegacyRule(raw: unknown): unknown {
  const parsed = legacyRuleSchema.safeParse(raw);
  if (!parsed.success) return raw;
  const legacy = parsed.data;

  const matchActions =
    legacy.matchActions ?? (legacy.matchAction !== undefined ? [legacy.matchAction] : []);
  const elseActions =
    legacy.elseActions ?? (legacy.elseAction !== undefined ? [legacy.elseAction] : []);

  const hasGroup = legacy.targetSpaceIDs.length > 0 || matchActions.length > 0;
  return {
    id: legacy.id,
    appBundleID: legacy.appBundleID,
    appName: legacy.appName,
    isEnabled: legacy.isEnabled,
    groups: hasGroup
      ? [{ targetSpaceIDs: legacy.targetSpaceIDs, actions: matchActions }]
      : [],
    elseActions,
  };
}

/** Lifts rules persisted by an older schema version into the grouped shape. */
export function migrateRules(raw: unknown, fromVersion: number): unknown[] {
  if (!Array.isArray(raw)) return [];
  if (fromVersion >= RULES_SCHEMA_VERSION) return raw;
  return raw.map((entry) => {
    if (entry && typeof entry === "object" && "groups" in entry) return entry;
    return migrateLegacyRule(entry);
  });
}
