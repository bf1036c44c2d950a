export type * from "@/types";

export {
  DOCK_SWITCH_DEBOUNCE_MS,
  DOCK_WRITE_SETTLE_MS,
  HOTKEY_ACTIVATION_SETTLE_MS,
  getRuntimeConfigFromEnv,
  type RuntimeConfig,
} from "@/lib/config";
export {
  createAutomationRuntime,
  createMacOSPlatform,
  type AutomationPlatform,
  type AutomationRuntime,
  type AutomationRuntimeOptions,
} from "@/lib/automation-runtime";

export { SpaceRegistry, type SpaceTransport } from "@/store/space-registry";
export { createRuleStore, selectSortedRules, type RuleStore } from "@/store/rule-store";
export {
  createDockConfigStore,
  selectDockConfig,
  type DockConfigStore,
} from "@/store/dock-config-store";
export { createFileStateStorage, createMemoryStateStorage } from "@/store/storage";

export {
  ACTION_TEMPLATES,
  MODIFIER_FLAGS,
  UNSET_KEY_CODE,
  createHotkeyAction,
  formatShortcut,
  getActionLabel,
} from "@/lib/rules/actions";
export { sortRules, resolveRulesForSpace } from "@/lib/rules/matching";
export { RuleEngine } from "@/lib/rules/engine";
export { WindowActionExecutor, type ExecutionReport } from "@/lib/window/executor";
export {
  PermissionDeniedError,
  type KeyEventSink,
  type WindowControl,
} from "@/lib/window/types";

export { DockSwitchScheduler, type DockSwitchOutcome } from "@/lib/dock/scheduler";
export { captureDockSet } from "@/lib/dock/capture";
export {
  createSpacerTile,
  createTileFromFile,
  fileURLForPath,
  isSameDockSet,
  type BundleResolver,
} from "@/lib/dock/tiles";
export type { DockPreferenceStore, DockProcess } from "@/lib/dock/types";
export { PlatformCommandError } from "@/lib/platform/macos/command";

export { listTelemetry, clearTelemetry } from "@/lib/telemetry";
