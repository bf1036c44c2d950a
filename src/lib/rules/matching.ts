import type {
  AppRule,
  RuleGroup,
  RuleSortOption,
  SpaceDescriptor,
  SpaceId,
  WindowAction,
} from "@/types";

/** Sort key for rules that reference no known space. */
export const NO_SPACE_SORT_KEY = 999;

export interface RuleResolution {
  rule: AppRule;
  group: RuleGroup | null;
  actions: WindowAction[];
}

/** First group (by position) whose targets contain the space wins. */
export function findMatchingGroup(rule: AppRule, spaceId: SpaceId): RuleGroup | null {
  return rule.groups.find((group) => group.targetSpaceIDs.includes(spaceId)) ?? null;
}

export function resolveRuleActions(rule: AppRule, spaceId: SpaceId): RuleResolution {
  const group = findMatchingGroup(rule, spaceId);
  return {
    rule,
    group,
    actions: group ? group.actions : rule.elseActions,
  };
}

/** Enabled rules in store order, each paired with the actions it should run. */
export function resolveRulesForSpace(rules: AppRule[], spaceId: SpaceId): RuleResolution[] {
  return rules
    .filter((rule) => rule.isEnabled)
    .map((rule) => resolveRuleActions(rule, spaceId));
}

function compareNames(a: AppRule, b: AppRule): number {
  return a.appName.localeCompare(b.appName, undefined, { sensitivity: "base" });
}

export function getLowestSpaceNumber(rule: AppRule, spaces: SpaceDescriptor[]): number {
  const targets = new Set(rule.groups.flatMap((group) => group.targetSpaceIDs));
  if (targets.size === 0) return NO_SPACE_SORT_KEY;

  let lowest = NO_SPACE_SORT_KEY;
  for (const space of spaces) {
    if (targets.has(space.id) && space.number < lowest) {
      lowest = space.number;
    }
  }
  return lowest;
}

export function sortRules(
  rules: AppRule[],
  option: RuleSortOption,
  spaces: SpaceDescriptor[]
): AppRule[] {
  if (option === "name") {
    return [...rules].sort(compareNames);
  }

  const keys = new Map(rules.map((rule) => [rule.id, getLowestSpaceNumber(rule, spaces)]));
  return [...rules].sort((a, b) => {
    const diff = (keys.get(a.id) ?? NO_SPACE_SORT_KEY) - (keys.get(b.id) ?? NO_SPACE_SORT_KEY);
    return diff !== 0 ? diff : compareNames(a, b);
  });
}
