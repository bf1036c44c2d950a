import type { StateStorage } from "zustand/middleware";
import type { DockSet, DockTile } from "@/types";
import { getRuntimeConfigFromEnv, type RuntimeConfig } from "@/lib/config";
import { captureDockSet } from "@/lib/dock/capture";
import { DockSwitchScheduler } from "@/lib/dock/scheduler";
import { createTileFromFile, type BundleResolver } from "@/lib/dock/tiles";
import type { DockPreferenceStore, DockProcess } from "@/lib/dock/types";
import {
  MacOSBundleResolver,
  MacOSDockPreferences,
  MacOSDockProcess,
} from "@/lib/platform/macos/dock";
import { MacOSWindowControl } from "@/lib/platform/macos/window-control";
import { RuleEngine } from "@/lib/rules/engine";
import { appendTelemetry } from "@/lib/telemetry";
import { WindowActionExecutor } from "@/lib/window/executor";
import type { KeyEventSink, WindowControl } from "@/lib/window/types";
import { createDockConfigStore, type DockConfigStore } from "@/store/dock-config-store";
import { createRuleStore, type RuleStore } from "@/store/rule-store";
import { SpaceRegistry, type SpaceTransport } from "@/store/space-registry";
import { createFileStateStorage } from "@/store/storage";

export interface AutomationPlatform {
  windowControl: WindowControl;
  keyEvents: KeyEventSink;
  dockPreferences: DockPreferenceStore;
  dockProcess: DockProcess;
  bundleResolver: BundleResolver;
}

export interface AutomationRuntimeOptions {
  config?: RuntimeConfig;
  storage?: StateStorage;
  transport?: SpaceTransport;
  platform?: AutomationPlatform;
  sleep?: (ms: number) => Promise<void>;
}

export interface AutomationRuntime {
  config: RuntimeConfig;
  registry: SpaceRegistry;
  rules: RuleStore;
  dockConfig: DockConfigStore;
  engine: RuleEngine;
  scheduler: DockSwitchScheduler;
  start: () => void;
  stop: () => void;
  whenIdle: () => Promise<void>;
  captureDockSet: (name: string) => Promise<DockSet | null>;
  createTileFromFile: (filePath: string) => Promise<DockTile>;
}

export function createMacOSPlatform(config: RuntimeConfig): AutomationPlatform {
  const windowControl = new MacOSWindowControl({ dryRun: config.dryRun });
  return {
    windowControl,
    keyEvents: windowControl,
    dockPreferences: new MacOSDockPreferences({ domain: config.dockDomain, dryRun: config.dryRun }),
    dockProcess: new MacOSDockProcess({ dryRun: config.dryRun }),
    bundleResolver: new MacOSBundleResolver(),
  };
}

/**
 * Wires the registry, both persisted stores and the two reactive pipelines.
 * Nothing reacts to space changes until start() is called.
 */
export function createAutomationRuntime(options: AutomationRuntimeOptions = {}): AutomationRuntime {
  const config = options.config ?? getRuntimeConfigFromEnv();
  const storage = options.storage ?? createFileStateStorage(config.dataDir);
  const platform = options.platform ?? createMacOSPlatform(config);

  const registry = new SpaceRegistry(options.transport);
  const rules = createRuleStore({ storage });
  const dockConfig = createDockConfigStore({ storage });

  const executor = new WindowActionExecutor({
    control: platform.windowControl,
    keyEvents: platform.keyEvents,
    sleep: options.sleep,
  });
  const engine = new RuleEngine({ registry, rules, executor });
  const scheduler = new DockSwitchScheduler({
    registry,
    dockConfig,
    preferences: platform.dockPreferences,
    dockProcess: platform.dockProcess,
    sleep: options.sleep,
  });

  return {
    config,
    registry,
    rules,
    dockConfig,
    engine,
    scheduler,

    start: () => {
      engine.start();
      scheduler.start();
      void appendTelemetry({
        level: "info",
        source: "runtime",
        event: "started",
        data: { dryRun: config.dryRun, dockDomain: config.dockDomain },
      });
    },

    stop: () => {
      engine.stop();
      scheduler.stop();
    },

    whenIdle: async () => {
      await Promise.all([engine.whenIdle(), scheduler.whenIdle()]);
    },

    captureDockSet: (name) =>
      captureDockSet({ preferences: platform.dockPreferences, dockConfig, name }),

    createTileFromFile: (filePath) => createTileFromFile(filePath, platform.bundleResolver),
  };
}
