// Key-value storage behind the persisted stores.
//
// Each key is one JSON file under the data directory, replaced wholesale on
// every write (temp file + rename). Reads and writes are synchronous so the
// stores hydrate during creation and a mutation is on disk when it returns.

import fs from "node:fs";
import path from "node:path";
import type { StateStorage } from "zustand/middleware";
import { appendTelemetry } from "@/lib/telemetry";

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export function createFileStateStorage(dataDir: string): StateStorage {
  const fileFor = (name: string) => path.join(dataDir, `${encodeURIComponent(name)}.json`);

  return {
    getItem: (name) => {
      try {
        return fs.readFileSync(fileFor(name), "utf8");
      } catch (error) {
        if (!isMissingFileError(error)) {
          void appendTelemetry({
            level: "warn",
            source: "store.storage",
            event: "read_failed",
            data: { name, error },
          });
        }
        return null;
      }
    },

    setItem: (name, value) => {
      const target = fileFor(name);
      const temp = `${target}.${process.pid}.tmp`;
      try {
        fs.mkdirSync(dataDir, { recursive: true });
        fs.writeFileSync(temp, value, "utf8");
        fs.renameSync(temp, target);
      } catch (error) {
        void appendTelemetry({
          level: "error",
          source: "store.storage",
          event: "write_failed",
          data: { name, error },
        });
      }
    },

    removeItem: (name) => {
      fs.rmSync(fileFor(name), { force: true });
    },
  };
}

export function createMemoryStateStorage(initial: Record<string, string> = {}): StateStorage & {
  entries: Map<string, string>;
} {
  const entries = new Map(Object.entries(initial));
  return {
    entries,
    getItem: (name) => entries.get(name) ?? null,
    setItem: (name, value) => {
      entries.set(name, value);
    },
    removeItem: (name) => {
      entries.delete(name);
    },
  };
}
