import os from "node:os";
import path from "node:path";

/** Quiet period before a dock switch runs; later space changes supersede it. */
export const DOCK_SWITCH_DEBOUNCE_MS = 300;
/** Wait between a successful preference flush and the dock restart. */
export const DOCK_WRITE_SETTLE_MS = 150;
/** Wait after activating an app before a hotkey is dispatched into it. */
export const HOTKEY_ACTIVATION_SETTLE_MS = 100;

export const RULES_STORAGE_KEY = "space-pilot.rules";
export const DOCK_CONFIG_STORAGE_KEY = "space-pilot.dock-config";

const DEFAULT_DOCK_DOMAIN = "com.apple.dock";

export interface RuntimeConfig {
  dataDir: string;
  dockDomain: string;
  dryRun: boolean;
  telemetryLogPath: string | null;
}

export function parseBooleanEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (value == null) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return defaultValue;
}

function defaultDataDir(): string {
  if (process.platform === "darwin") {
    return path.join(os.homedir(), "Library", "Application Support", "space-pilot");
  }
  const xdg = process.env.XDG_CONFIG_HOME?.trim();
  return path.join(xdg && xdg.length > 0 ? xdg : path.join(os.homedir(), ".config"), "space-pilot");
}

export function getRuntimeConfigFromEnv(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const dataDir = env.SPACE_PILOT_DATA_DIR?.trim() || defaultDataDir();
  const telemetryDisabled = parseBooleanEnv(env.TELEMETRY_LOG_DISABLED, false);

  return {
    dataDir,
    dockDomain: env.SPACE_PILOT_DOCK_DOMAIN?.trim() || DEFAULT_DOCK_DOMAIN,
    dryRun: parseBooleanEnv(env.SPACE_PILOT_DRY_RUN, false),
    telemetryLogPath: telemetryDisabled
      ? null
      : env.TELEMETRY_LOG_PATH ?? path.join(dataDir, "telemetry", "space-pilot.log"),
  };
}
