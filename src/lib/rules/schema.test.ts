import { describe, expect, it } from "vitest";
import { decodeRules, decodeSortOption, decodeWindowAction, migrateRules } from "./schema";

describe("decodeWindowAction", () => {
  it("maps legacy action names", () => {
    expect(decodeWindowAction("Show")).toEqual({ type: "show" });
    expect(decodeWindowAction("Hide")).toEqual({ type: "hide" });
    expect(decodeWindowAction("DoNothing")).toEqual({ type: "doNothing" });
  });

  it("decodes unknown actions as doNothing", () => {
    expect(decodeWindowAction("Explode")).toEqual({ type: "doNothing" });
    expect(decodeWindowAction({ type: "teleport" })).toEqual({ type: "doNothing" });
    expect(decodeWindowAction(null)).toEqual({ type: "doNothing" });
  });

  it("fills in hotkey policy flags stored before they existed", () => {
    expect(decodeWindowAction({ type: "hotkey", keyCode: 12, modifiers: 1048576 })).toEqual({
      type: "hotkey",
      keyCode: 12,
      modifiers: 1048576,
      restoreWindow: false,
      waitForFrontmost: false,
    });
  });
});

describe("decodeRules", () => {
  it("drops rules that cannot be decoded and keeps the rest", () => {
    const rules = decodeRules([
      { id: "r1", appBundleID: "com.example.notes", appName: "Notes", groups: [], elseActions: [] },
      { appBundleID: "missing-id" },
      "garbage",
    ]);

    expect(rules.map((rule) => rule.id)).toEqual(["r1"]);
    expect(rules[0].isEnabled).toBe(true);
  });

  it("returns an empty list for a non-array payload", () => {
    expect(decodeRules({ rules: [] })).toEqual([]);
  });

  it("dedupes group targets and keeps group ids", () => {
    const [rule] = decodeRules([
      {
        id: "r1",
        appBundleID: "com.example.notes",
        appName: "Notes",
        groups: [{ id: "g1", targetSpaceIDs: ["S1", "S1", "S2"], actions: ["Hide"] }],
      },
    ]);

    expect(rule.groups).toEqual([
      { id: "g1", targetSpaceIDs: ["S1", "S2"], actions: [{ type: "hide" }] },
    ]);
  });
});

describe("migrateRules", () => {
  it("lifts single-action rules into one group", () => {
    const migrated = decodeRules(
      migrateRules(
        [
          {
            id: "r1",
            appBundleID: "com.example.notes",
            appName: "Notes",
            isEnabled: false,
            targetSpaceIDs: ["S1"],
            matchAction: "Hide",
            elseAction: "Show",
          },
        ],
        1
      )
    );

    expect(migrated).toHaveLength(1);
    expect(migrated[0]).toMatchObject({
      id: "r1",
      isEnabled: false,
      groups: [{ targetSpaceIDs: ["S1"], actions: [{ type: "hide" }] }],
      elseActions: [{ type: "show" }],
    });
  });

  it("lifts action-list rules into one group", () => {
    const migrated = decodeRules(
      migrateRules(
        [
          {
            id: "r2",
            appBundleID: "com.example.mail",
            appName: "Mail",
            targetSpaceIDs: ["S2", "S3"],
            matchActions: [{ type: "minimize" }, { type: "hotkey", keyCode: 1, modifiers: 0 }],
            elseActions: [],
          },
        ],
        2
      )
    );

    expect(migrated[0].groups).toHaveLength(1);
    expect(migrated[0].groups[0].targetSpaceIDs).toEqual(["S2", "S3"]);
    expect(migrated[0].groups[0].actions).toEqual([
      { type: "minimize" },
      { type: "hotkey", keyCode: 1, modifiers: 0, restoreWindow: false, waitForFrontmost: false },
    ]);
  });

  it("creates no group for a legacy rule without targets or match actions", () => {
    const migrated = decodeRules(
      migrateRules(
        [{ id: "r3", appBundleID: "com.example.chat", appName: "Chat", elseAction: "Hide" }],
        1
      )
    );

    expect(migrated[0].groups).toEqual([]);
    expect(migrated[0].elseActions).toEqual([{ type: "hide" }]);
  });

  it("leaves current-version rules untouched", () => {
    const current = [{ id: "r4", appBundleID: "a", appName: "A", groups: [], elseActions: [] }];
    expect(migrateRules(current, 3)).toBe(current);
  });
});

describe("decodeSortOption", () => {
  it("defaults to name", () => {
    expect(decodeSortOption("space")).toBe("space");
    expect(decodeSortOption("date")).toBe("name");
  });
});
