import { describe, expect, it } from "vitest";
import { RULES_STORAGE_KEY } from "@/lib/config";
import { createMemoryStateStorage } from "./storage";
import { createRuleStore, selectSortedRules } from "./rule-store";

function persisted(state: unknown, version = 3) {
  return { [RULES_STORAGE_KEY]: JSON.stringify({ state, version }) };
}

describe("rule store", () => {
  it("adds rules with generated ids and defaults", () => {
    const store = createRuleStore({ storage: createMemoryStateStorage() });

    const rule = store.getState().addRule({ appBundleID: "com.example.notes", appName: "Notes" });

    expect(rule.id).toMatch(/^rule_/);
    expect(rule).toMatchObject({ isEnabled: true, groups: [], elseActions: [] });
    expect(store.getState().rules).toEqual([rule]);
  });

  it("persists every mutation under the rules key", () => {
    const storage = createMemoryStateStorage();
    const store = createRuleStore({ storage });

    const rule = store.getState().addRule({
      appBundleID: "com.example.notes",
      appName: "Notes",
      groups: [{ targetSpaceIDs: ["S1"], actions: [{ type: "hide" }] }],
    });
    store.getState().setRuleEnabled(rule.id, false);

    const stored = JSON.parse(storage.entries.get(RULES_STORAGE_KEY) ?? "{}");
    expect(stored.version).toBe(3);
    expect(stored.state.rules[0]).toMatchObject({ id: rule.id, isEnabled: false });

    const reloaded = createRuleStore({ storage });
    expect(reloaded.getState().rules).toEqual(store.getState().rules);
  });

  it("updates, moves and deletes rules", () => {
    const store = createRuleStore({ storage: createMemoryStateStorage() });
    const notes = store.getState().addRule({ appBundleID: "com.example.notes", appName: "Notes" });
    const mail = store.getState().addRule({ appBundleID: "com.example.mail", appName: "Mail" });

    expect(
      store.getState().updateRule(notes.id, (draft) => {
        draft.elseActions.push({ type: "minimize" });
      })
    ).toBe(true);
    expect(store.getState().updateRule("missing", () => undefined)).toBe(false);

    store.getState().moveRule(1, 0);
    expect(store.getState().rules.map((rule) => rule.id)).toEqual([mail.id, notes.id]);

    store.getState().moveRule(0, 5);
    expect(store.getState().rules.map((rule) => rule.id)).toEqual([mail.id, notes.id]);

    expect(store.getState().deleteRule(mail.id)).toBe(true);
    expect(store.getState().deleteRule(mail.id)).toBe(false);
    expect(store.getState().rules).toHaveLength(1);
    expect(store.getState().rules[0].elseActions).toEqual([{ type: "minimize" }]);
  });

  it("replaces the whole rule list", () => {
    const storage = createMemoryStateStorage();
    const store = createRuleStore({ storage });
    const notes = store.getState().addRule({ appBundleID: "com.example.notes", appName: "Notes" });
    const mail = store.getState().addRule({ appBundleID: "com.example.mail", appName: "Mail" });

    store.getState().replaceRules([mail]);

    expect(store.getState().rules.map((rule) => rule.id)).toEqual([mail.id]);
    expect(store.getState().rules.some((rule) => rule.id === notes.id)).toBe(false);
    expect(createRuleStore({ storage }).getState().rules.map((rule) => rule.id)).toEqual([mail.id]);
  });

  it("migrates rules stored by an older version", () => {
    const storage = createMemoryStateStorage(
      persisted(
        {
          rules: [
            {
              id: "legacy",
              appBundleID: "com.example.notes",
              appName: "Notes",
              targetSpaceIDs: ["S1"],
              matchAction: "Hide",
              elseAction: "Show",
            },
          ],
        },
        1
      )
    );

    const store = createRuleStore({ storage });

    const [rule] = store.getState().rules;
    expect(rule.id).toBe("legacy");
    expect(rule.groups[0]).toMatchObject({ targetSpaceIDs: ["S1"], actions: [{ type: "hide" }] });
    expect(rule.elseActions).toEqual([{ type: "show" }]);
  });

  it("falls back to an empty store when the stored payload is corrupt", () => {
    const storage = createMemoryStateStorage({ [RULES_STORAGE_KEY]: "{not json" });

    const store = createRuleStore({ storage });

    expect(store.getState().rules).toEqual([]);
    expect(store.getState().sortOption).toBe("name");
  });

  it("drops individually corrupt rules on load", () => {
    const storage = createMemoryStateStorage(
      persisted({
        rules: [
          { id: "ok", appBundleID: "com.example.notes", appName: "Notes", groups: [], elseActions: [] },
          { id: 7 },
        ],
        sortOption: "space",
      })
    );

    const store = createRuleStore({ storage });

    expect(store.getState().rules.map((rule) => rule.id)).toEqual(["ok"]);
    expect(store.getState().sortOption).toBe("space");
  });

  it("projects a sorted view without reordering the store", () => {
    const store = createRuleStore({ storage: createMemoryStateStorage() });
    store.getState().addRule({ appBundleID: "b", appName: "Zoom" });
    store.getState().addRule({ appBundleID: "a", appName: "Atlas" });

    const sorted = selectSortedRules(store.getState(), []);

    expect(sorted.map((rule) => rule.appName)).toEqual(["Atlas", "Zoom"]);
    expect(store.getState().rules.map((rule) => rule.appName)).toEqual(["Zoom", "Atlas"]);
  });
});
