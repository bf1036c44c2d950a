import { describe, expect, it } from "vitest";
import type { AppRule, RuleGroup } from "@/types";
import { findMatchingGroup, getLowestSpaceNumber, NO_SPACE_SORT_KEY, sortRules } from "./matching";

function rule(id: string, appName: string, groups: Array<Pick<RuleGroup, "targetSpaceIDs">> = []): AppRule {
  return {
    id,
    appBundleID: `com.example.${id}`,
    appName,
    isEnabled: true,
    groups: groups.map((group, index) => ({
      id: `${id}-g${index}`,
      targetSpaceIDs: group.targetSpaceIDs,
      actions: [],
    })),
    elseActions: [],
  };
}

const spaces = [
  { id: "S1", name: "Home", number: 1 },
  { id: "S2", name: "Work", number: 2 },
  { id: "S3", name: "Play", number: 3 },
];

describe("findMatchingGroup", () => {
  it("resolves overlapping groups by position", () => {
    const target = rule("notes", "Notes", [
      { targetSpaceIDs: ["S2"] },
      { targetSpaceIDs: ["S1", "S2"] },
    ]);

    expect(findMatchingGroup(target, "S2")?.id).toBe("notes-g0");
    expect(findMatchingGroup(target, "S1")?.id).toBe("notes-g1");
    expect(findMatchingGroup(target, "S9")).toBeNull();
  });
});

describe("sortRules", () => {
  it("sorts by name ignoring case", () => {
    const sorted = sortRules(
      [rule("b", "beta"), rule("a", "Alpha"), rule("c", "Charlie")],
      "name",
      spaces
    );

    expect(sorted.map((entry) => entry.appName)).toEqual(["Alpha", "beta", "Charlie"]);
  });

  it("sorts by lowest space number, then by name, with unassigned rules last", () => {
    const sorted = sortRules(
      [
        rule("none", "Aardvark"),
        rule("three", "Zed", [{ targetSpaceIDs: ["S3"] }]),
        rule("two-b", "Bravo", [{ targetSpaceIDs: ["S3"] }, { targetSpaceIDs: ["S2"] }]),
        rule("two-a", "Alpha", [{ targetSpaceIDs: ["S2"] }]),
      ],
      "space",
      spaces
    );

    expect(sorted.map((entry) => entry.id)).toEqual(["two-a", "two-b", "three", "none"]);
  });

  it("does not reorder the input", () => {
    const input = [rule("b", "Beta"), rule("a", "Alpha")];
    sortRules(input, "name", spaces);
    expect(input.map((entry) => entry.id)).toEqual(["b", "a"]);
  });
});

describe("getLowestSpaceNumber", () => {
  it("uses the sentinel when no referenced space is known", () => {
    expect(getLowestSpaceNumber(rule("x", "X", [{ targetSpaceIDs: ["gone"] }]), spaces)).toBe(
      NO_SPACE_SORT_KEY
    );
  });
});
