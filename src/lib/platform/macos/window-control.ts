// Window control over System Events (JXA via osascript). Window indexes are
// 1-based positions in the process's window list.

import { z } from "zod";
import {
  PermissionDeniedError,
  type AppWindow,
  type KeyEventSink,
  type RunningApplication,
  type WindowControl,
} from "@/lib/window/types";
import { PlatformCommandError, runCommand, type CommandRunner } from "./command";

/** osascript errors raised when assistive access has not been granted. */
const ACCESSIBILITY_ERROR_CODES = ["-1719", "-25211", "-1743"];

const runningApplicationSchema = z.object({
  bundleId: z.string().min(1),
  name: z.string().optional(),
  pid: z.number().int().optional(),
});

const windowListSchema = z.array(
  z.object({
    index: z.number().int().positive(),
    title: z.string().optional(),
  })
);

const PROCESS_HELPERS = `
const systemEvents = Application("System Events");
function processFor(bundleId) {
  const matches = systemEvents.applicationProcesses.whose({ bundleIdentifier: bundleId })();
  return matches.length > 0 ? matches[0] : null;
}
function describe(proc) {
  return JSON.stringify({ bundleId: proc.bundleIdentifier(), name: proc.name(), pid: proc.unixId() });
}
`;

const SCRIPTS = {
  find: `${PROCESS_HELPERS}
function run(argv) { const proc = processFor(argv[0]); return proc ? describe(proc) : ""; }`,
  frontmost: `${PROCESS_HELPERS}
function run() {
  const matches = systemEvents.applicationProcesses.whose({ frontmost: true })();
  return matches.length > 0 ? describe(matches[0]) : "";
}`,
  isFrontmost: `${PROCESS_HELPERS}
function run(argv) { const proc = processFor(argv[0]); return proc && proc.frontmost() ? "1" : "0"; }`,
  uiScripting: `function run() { return Application("System Events").uiElementsEnabled() ? "1" : "0"; }`,
  setVisible: `${PROCESS_HELPERS}
function run(argv) { const proc = processFor(argv[0]); if (proc) proc.visible = argv[1] === "1"; return ""; }`,
  activate: `function run(argv) { Application(argv[0]).activate(); return ""; }`,
  listWindows: `${PROCESS_HELPERS}
function run(argv) {
  const proc = processFor(argv[0]);
  if (!proc) return "[]";
  return JSON.stringify(proc.windows().map((w, i) => ({ index: i + 1, title: w.name() || undefined })));
}`,
  isMinimized: `${PROCESS_HELPERS}
function run(argv) {
  const proc = processFor(argv[0]);
  if (!proc) return "0";
  return proc.windows[Number(argv[1]) - 1].attributes["AXMinimized"].value() ? "1" : "0";
}`,
  setMinimized: `${PROCESS_HELPERS}
function run(argv) {
  const proc = processFor(argv[0]);
  if (proc) proc.windows[Number(argv[1]) - 1].attributes["AXMinimized"].value = argv[2] === "1";
  return "";
}`,
  postKey: `ObjC.import("CoreGraphics");
function run(argv) {
  const event = $.CGEventCreateKeyboardEvent(null, Number(argv[0]), argv[2] === "1");
  $.CGEventSetFlags(event, Number(argv[1]));
  $.CGEventPost(0, event);
  return "";
}`,
} as const;

type ScriptName = keyof typeof SCRIPTS;

export interface MacOSWindowControlOptions {
  runner?: CommandRunner;
  dryRun?: boolean;
}

function isAccessibilityFailure(error: unknown): boolean {
  return (
    error instanceof PlatformCommandError &&
    ACCESSIBILITY_ERROR_CODES.some((code) => error.stderr.includes(code))
  );
}

function parseApplication(output: string): RunningApplication | null {
  const trimmed = output.trim();
  if (!trimmed) return null;
  const parsed = runningApplicationSchema.safeParse(JSON.parse(trimmed));
  return parsed.success ? parsed.data : null;
}

export class MacOSWindowControl implements WindowControl, KeyEventSink {
  private readonly runner: CommandRunner;
  private readonly dryRun: boolean;

  constructor(options: MacOSWindowControlOptions = {}) {
    this.runner = options.runner ?? runCommand;
    this.dryRun = options.dryRun ?? false;
  }

  private async script(name: ScriptName, args: Array<string | number> = []): Promise<string> {
    try {
      const result = await this.runner("osascript", [
        "-l",
        "JavaScript",
        "-e",
        SCRIPTS[name],
        ...args.map(String),
      ]);
      return result.stdout;
    } catch (error) {
      if (isAccessibilityFailure(error)) {
        throw new PermissionDeniedError(
          name === "postKey" ? "input_denied" : "accessibility_denied",
          `System Events refused "${name}"`
        );
      }
      throw error;
    }
  }

  /** Mutating scripts are skipped entirely in dry-run mode. */
  private async mutate(name: ScriptName, args: Array<string | number>): Promise<void> {
    if (this.dryRun) return;
    await this.script(name, args);
  }

  async findRunningApplication(bundleId: string): Promise<RunningApplication | null> {
    return parseApplication(await this.script("find", [bundleId]));
  }

  async frontmostApplication(): Promise<RunningApplication | null> {
    return parseApplication(await this.script("frontmost"));
  }

  async isFrontmost(app: RunningApplication): Promise<boolean> {
    return (await this.script("isFrontmost", [app.bundleId])).trim() === "1";
  }

  async hasAccessibilityPermission(): Promise<boolean> {
    try {
      return (await this.script("uiScripting")).trim() === "1";
    } catch (error) {
      if (error instanceof PermissionDeniedError) return false;
      throw error;
    }
  }

  hide(app: RunningApplication): Promise<void> {
    return this.mutate("setVisible", [app.bundleId, "0"]);
  }

  unhide(app: RunningApplication): Promise<void> {
    return this.mutate("setVisible", [app.bundleId, "1"]);
  }

  activate(app: RunningApplication): Promise<void> {
    return this.mutate("activate", [app.bundleId]);
  }

  async listWindows(app: RunningApplication): Promise<AppWindow[]> {
    const output = (await this.script("listWindows", [app.bundleId])).trim();
    const parsed = windowListSchema.safeParse(JSON.parse(output || "[]"));
    return parsed.success ? parsed.data : [];
  }

  async isWindowMinimized(app: RunningApplication, window: AppWindow): Promise<boolean> {
    return (await this.script("isMinimized", [app.bundleId, window.index])).trim() === "1";
  }

  setWindowMinimized(app: RunningApplication, window: AppWindow, minimized: boolean): Promise<void> {
    return this.mutate("setMinimized", [app.bundleId, window.index, minimized ? "1" : "0"]);
  }

  postKeyEvent(keyCode: number, modifiers: number, isDown: boolean): Promise<void> {
    return this.mutate("postKey", [keyCode, modifiers, isDown ? "1" : "0"]);
  }
}
