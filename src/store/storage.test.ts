import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createFileStateStorage } from "./storage";

let dataDir: string;

beforeEach(() => {
  dataDir = path.join(fs.mkdtempSync(path.join(os.tmpdir(), "space-pilot-storage-")), "data");
});

afterEach(() => {
  fs.rmSync(path.dirname(dataDir), { recursive: true, force: true });
});

describe("createFileStateStorage", () => {
  it("returns null for keys that were never written", () => {
    expect(createFileStateStorage(dataDir).getItem("space-pilot.rules")).toBeNull();
  });

  it("writes one file per key and reads it back", () => {
    const storage = createFileStateStorage(dataDir);

    storage.setItem("space-pilot.rules", '{"state":{}}');

    expect(fs.readdirSync(dataDir)).toEqual(["space-pilot.rules.json"]);
    expect(createFileStateStorage(dataDir).getItem("space-pilot.rules")).toBe('{"state":{}}');
  });

  it("replaces the whole value on every write", () => {
    const storage = createFileStateStorage(dataDir);
    storage.setItem("key", "first value that is longer");

    storage.setItem("key", "second");

    expect(storage.getItem("key")).toBe("second");
  });

  it("removes keys", () => {
    const storage = createFileStateStorage(dataDir);
    storage.setItem("key", "value");

    storage.removeItem("key");
    storage.removeItem("key");

    expect(storage.getItem("key")).toBeNull();
  });

  it("encodes key names into safe file names", () => {
    const storage = createFileStateStorage(dataDir);

    storage.setItem("a/b", "nested");

    expect(fs.readdirSync(dataDir)).toEqual(["a%2Fb.json"]);
  });
});
