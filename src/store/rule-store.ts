// Rule Store - ordered, persisted automation rules
//
// MUTATION PATTERN:
// Every action mutates through an immer draft and the persist middleware
// writes the whole collection under RULES_STORAGE_KEY before the action
// returns. Consumers that need to react to edits (the rule engine) subscribe
// to the `rules` selector; sortOption changes do not touch `rules`.
//
// PERSISTENCE:
// Stored data is decoded, never trusted: migrate() lifts older shapes and
// merge() validates, so corrupt entries are dropped and a corrupt payload
// leaves an empty store.

import { createStore } from "zustand/vanilla";
import {
  createJSONStorage,
  persist,
  subscribeWithSelector,
  type StateStorage,
} from "zustand/middleware";
import { immer } from "zustand/middleware/immer";
import { nanoid } from "nanoid";
import { z } from "zod";
import type {
  AppRule,
  RuleGroup,
  RuleId,
  RuleSortOption,
  SpaceDescriptor,
  WindowAction,
} from "@/types";
import { RULES_STORAGE_KEY } from "@/lib/config";
import { sortRules } from "@/lib/rules/matching";
import {
  RULES_SCHEMA_VERSION,
  decodeRules,
  decodeSortOption,
  migrateRules,
} from "@/lib/rules/schema";
import { appendTelemetry } from "@/lib/telemetry";

export interface CreateRuleGroupInput {
  id?: string;
  targetSpaceIDs: string[];
  actions: WindowAction[];
}

export interface CreateRuleInput {
  appBundleID: string;
  appName: string;
  isEnabled?: boolean;
  groups?: CreateRuleGroupInput[];
  elseActions?: WindowAction[];
}

export interface RuleStoreState {
  rules: AppRule[];
  sortOption: RuleSortOption;

  addRule: (input: CreateRuleInput) => AppRule;
  updateRule: (id: RuleId, recipe: (draft: AppRule) => void) => boolean;
  deleteRule: (id: RuleId) => boolean;
  setRuleEnabled: (id: RuleId, enabled: boolean) => void;
  moveRule: (fromIndex: number, toIndex: number) => void;
  replaceRules: (rules: AppRule[]) => void;
  setSortOption: (option: RuleSortOption) => void;
}

const persistedRecordSchema = z
  .object({
    rules: z.unknown(),
    sortOption: z.unknown(),
  })
  .partial();

export function createRuleGroup(input: CreateRuleGroupInput): RuleGroup {
  return {
    id: input.id ?? `group_${nanoid(10)}`,
    targetSpaceIDs: Array.from(new Set(input.targetSpaceIDs)),
    actions: structuredClone(input.actions),
  };
}

function createRuleRecord(input: CreateRuleInput): AppRule {
  return {
    id: `rule_${nanoid(10)}`,
    appBundleID: input.appBundleID,
    appName: input.appName,
    isEnabled: input.isEnabled ?? true,
    groups: (input.groups ?? []).map(createRuleGroup),
    elseActions: structuredClone(input.elseActions ?? []),
  };
}

export function createRuleStore(options: { storage: StateStorage }) {
  return createStore<RuleStoreState>()(
    subscribeWithSelector(
      persist(
        immer((set, get) => ({
          rules: [],
          sortOption: "name",

          addRule: (input) => {
            const rule = createRuleRecord(input);
            set((state) => {
              state.rules.push(rule);
            });
            return rule;
          },

          updateRule: (id, recipe) => {
            if (!get().rules.some((rule) => rule.id === id)) return false;
            set((state) => {
              const rule = state.rules.find((entry) => entry.id === id);
              if (rule) recipe(rule);
            });
            return true;
          },

          deleteRule: (id) => {
            const index = get().rules.findIndex((rule) => rule.id === id);
            if (index === -1) return false;
            set((state) => {
              state.rules.splice(index, 1);
            });
            return true;
          },

          setRuleEnabled: (id, enabled) => {
            set((state) => {
              const rule = state.rules.find((entry) => entry.id === id);
              if (rule) rule.isEnabled = enabled;
            });
          },

          moveRule: (fromIndex, toIndex) => {
            const { rules } = get();
            if (
              fromIndex === toIndex ||
              fromIndex < 0 ||
              fromIndex >= rules.length ||
              toIndex < 0 ||
              toIndex >= rules.length
            ) {
              return;
            }
            set((state) => {
              const [moved] = state.rules.splice(fromIndex, 1);
              state.rules.splice(toIndex, 0, moved);
            });
          },

          replaceRules: (rules) => {
            set((state) => {
              state.rules = structuredClone(rules);
            });
          },

          setSortOption: (option) => {
            set((state) => {
              state.sortOption = option;
            });
          },
        })),
        {
          name: RULES_STORAGE_KEY,
          version: RULES_SCHEMA_VERSION,
          storage: createJSONStorage(() => options.storage),
          partialize: (state) => ({
            rules: state.rules,
            sortOption: state.sortOption,
          }),
          migrate: (persistedState, version) => {
            const parsed = persistedRecordSchema.safeParse(persistedState);
            const record = parsed.success ? parsed.data : {};
            return {
              rules: decodeRules(migrateRules(record.rules, version)),
              sortOption: decodeSortOption(record.sortOption),
            };
          },
          merge: (persistedState, currentState) => {
            const parsed = persistedRecordSchema.safeParse(persistedState);
            if (!parsed.success) return currentState;
            return {
              ...currentState,
              rules: decodeRules(parsed.data.rules),
              sortOption: decodeSortOption(parsed.data.sortOption),
            };
          },
          onRehydrateStorage: () => (_state, error) => {
            if (error) {
              void appendTelemetry({
                level: "warn",
                source: "store.rules",
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

export type RuleStore = ReturnType<typeof createRuleStore>;

export function selectSortedRules(
  state: Pick<RuleStoreState, "rules" | "sortOption">,
  spaces: SpaceDescriptor[]
): AppRule[] {
  return sortRules(state.rules, state.sortOption, spaces);
}
