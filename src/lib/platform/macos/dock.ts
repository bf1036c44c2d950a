// Dock preference domain and process control through `defaults` and `killall`.
//
// The whole domain is exported as an XML property list, the persistent-apps
// key replaced, and the domain imported back. Writes are staged until
// synchronize() so the import is the single mutating step.

import path from "node:path";
import * as plist from "plist";
import type { DockRecord } from "@/types";
import type { DockPreferenceStore, DockProcess } from "@/lib/dock/types";
import type { BundleResolver } from "@/lib/dock/tiles";
import { isDockRecord, toDockRecordValue } from "@/lib/dock/raw-codec";
import { appendTelemetry } from "@/lib/telemetry";
import { runCommand, type CommandRunner } from "./command";

export const PERSISTENT_APPS_KEY = "persistent-apps";
const DOCK_PROCESS_NAME = "Dock";

export interface MacOSDockOptions {
  domain: string;
  runner?: CommandRunner;
  dryRun?: boolean;
}

export class MacOSDockPreferences implements DockPreferenceStore {
  private readonly domain: string;
  private readonly runner: CommandRunner;
  private readonly dryRun: boolean;
  private staged: DockRecord[] | null = null;

  constructor(options: MacOSDockOptions) {
    this.domain = options.domain;
    this.runner = options.runner ?? runCommand;
    this.dryRun = options.dryRun ?? false;
  }

  private async exportDomain(): Promise<DockRecord> {
    const result = await this.runner("defaults", ["export", this.domain, "-"]);
    const parsed = toDockRecordValue(plist.parse(result.stdout));
    return isDockRecord(parsed) ? parsed : {};
  }

  async readPersistentApps(): Promise<unknown[] | null> {
    try {
      const domain = await this.exportDomain();
      const apps = domain[PERSISTENT_APPS_KEY];
      return Array.isArray(apps) ? apps : null;
    } catch (error) {
      void appendTelemetry({
        level: "warn",
        source: "platform.dock",
        event: "read_failed",
        data: { domain: this.domain, error },
      });
      return null;
    }
  }

  async writePersistentApps(entries: DockRecord[]): Promise<void> {
    this.staged = entries;
  }

  async synchronize(): Promise<boolean> {
    const entries = this.staged;
    if (!entries) return true;

    if (this.dryRun) {
      this.staged = null;
      void appendTelemetry({
        level: "info",
        source: "platform.dock",
        event: "dry_run_write",
        data: { domain: this.domain, entries: entries.length },
      });
      return true;
    }

    try {
      const domain = await this.exportDomain();
      domain[PERSISTENT_APPS_KEY] = entries;
      await this.runner("defaults", ["import", this.domain, "-"], {
        input: plist.build(domain),
      });
      this.staged = null;
      return true;
    } catch (error) {
      void appendTelemetry({
        level: "error",
        source: "platform.dock",
        event: "synchronize_failed",
        data: { domain: this.domain, error },
      });
      return false;
    }
  }
}

export class MacOSDockProcess implements DockProcess {
  private readonly runner: CommandRunner;
  private readonly dryRun: boolean;

  constructor(options: Omit<MacOSDockOptions, "domain"> = {}) {
    this.runner = options.runner ?? runCommand;
    this.dryRun = options.dryRun ?? false;
  }

  async restart(): Promise<void> {
    if (this.dryRun) return;
    await this.runner("killall", [DOCK_PROCESS_NAME]);
  }
}

/** Reads CFBundleIdentifier from an application bundle's Info.plist. */
export class MacOSBundleResolver implements BundleResolver {
  private readonly runner: CommandRunner;

  constructor(runner: CommandRunner = runCommand) {
    this.runner = runner;
  }

  async bundleIdentifier(filePath: string): Promise<string | undefined> {
    const infoPath = path.join(filePath, "Contents", "Info");
    const result = await this.runner("defaults", ["read", infoPath, "CFBundleIdentifier"], {
      allowFailure: true,
    });
    const identifier = result.stdout.trim();
    return result.exitCode === 0 && identifier ? identifier : undefined;
  }
}
