import { describe, expect, it, vi } from "vitest";
import { SpaceRegistry } from "./space-registry";

describe("SpaceRegistry", () => {
  it("starts with no current space and no known spaces", () => {
    const registry = new SpaceRegistry();

    expect(registry.currentSpaceID()).toBeNull();
    expect(registry.knownSpaces()).toEqual([]);
  });

  it("delivers distinct changes and suppresses consecutive duplicates", () => {
    const registry = new SpaceRegistry();
    const seen: string[] = [];
    registry.subscribe((spaceId) => seen.push(spaceId));

    registry.announceCurrentSpace("S1");
    registry.announceCurrentSpace("S1");
    registry.announceCurrentSpace({ id: "S2", name: "Work" });
    registry.announceCurrentSpace("S1");

    expect(seen).toEqual(["S1", "S2", "S1"]);
    expect(registry.currentSpaceID()).toBe("S1");
  });

  it("only delivers changes that happen after subscribing", () => {
    const registry = new SpaceRegistry();
    registry.announceCurrentSpace("S1");
    const listener = vi.fn();

    registry.subscribe(listener);

    expect(listener).not.toHaveBeenCalled();
  });

  it("ignores malformed announcements", () => {
    const registry = new SpaceRegistry();
    registry.announceCurrentSpace("S1");

    registry.announceCurrentSpace("");
    registry.announceCurrentSpace({ name: "no id" });
    registry.announceCurrentSpace(42);

    expect(registry.currentSpaceID()).toBe("S1");
  });

  it("normalizes the space list and names the current space from it", () => {
    const registry = new SpaceRegistry();
    registry.announceSpaces([
      { id: "S2", name: "Work", number: 2 },
      { id: "S1", name: "Home", number: 1 },
      { id: "S1", name: "Duplicate", number: 5 },
      { id: "", name: "Blank", number: 3 },
      "not a space",
    ]);
    registry.announceCurrentSpace("S2");

    expect(registry.knownSpaces()).toEqual([
      { id: "S1", name: "Home", number: 1 },
      { id: "S2", name: "Work", number: 2 },
    ]);
    expect(registry.currentSpaceName()).toBe("Work");
  });

  it("delegates refresh to the transport and swallows its failures", async () => {
    const requestRefresh = vi
      .fn<() => Promise<void>>()
      .mockResolvedValueOnce(undefined)
      .mockRejectedValueOnce(new Error("transport closed"));
    const registry = new SpaceRegistry({ requestRefresh });

    await registry.refresh();
    await expect(registry.refresh()).resolves.toBeUndefined();

    expect(requestRefresh).toHaveBeenCalledTimes(2);
  });

  it("unsubscribes", () => {
    const registry = new SpaceRegistry();
    const listener = vi.fn();
    const unsubscribe = registry.subscribe(listener);

    unsubscribe();
    registry.announceCurrentSpace("S1");

    expect(listener).not.toHaveBeenCalled();
  });
});
