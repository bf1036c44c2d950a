// Window Action Executor
//
// Runs an ordered action list against one application, each step awaited
// before the next. Expected conditions are not errors:
// - target not running: the whole sequence is a no-op
// - accessibility permission missing: show/hide/minimize are skipped
// - unset hotkey key code: nothing is dispatched
// Anything else an adapter throws ends the sequence and propagates to the
// caller, which isolates it per rule.

import type { WindowAction } from "@/types";
import { HOTKEY_ACTIVATION_SETTLE_MS } from "@/lib/config";
import { isUnsetKeyCode } from "@/lib/rules/actions";
import { appendTelemetry } from "@/lib/telemetry";
import {
  PermissionDeniedError,
  type KeyEventSink,
  type RunningApplication,
  type WindowControl,
} from "./types";

export type StepSkipReason =
  | "no_op"
  | "permission_denied"
  | "unset_key_code"
  | "not_frontmost";

export type StepOutcome =
  | { action: WindowAction; status: "performed" }
  | { action: WindowAction; status: "skipped"; reason: StepSkipReason };

export interface ExecutionReport {
  bundleId: string;
  running: boolean;
  steps: StepOutcome[];
}

export interface WindowActionExecutorOptions {
  control: WindowControl;
  keyEvents: KeyEventSink;
  sleep?: (ms: number) => Promise<void>;
}

type AxStep = "show" | "hide" | "minimize";

interface RunContext {
  app: RunningApplication;
  permission: boolean | null;
}

export function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class WindowActionExecutor {
  private readonly control: WindowControl;
  private readonly keyEvents: KeyEventSink;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: WindowActionExecutorOptions) {
    this.control = options.control;
    this.keyEvents = options.keyEvents;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async run(bundleId: string, actions: WindowAction[]): Promise<ExecutionReport> {
    const report: ExecutionReport = { bundleId, running: false, steps: [] };
    if (actions.length === 0 || bundleId.length === 0) return report;

    const app = await this.control.findRunningApplication(bundleId);
    if (!app) return report;
    report.running = true;

    const context: RunContext = { app, permission: null };
    for (const action of actions) {
      report.steps.push(await this.runStep(action, context));
    }
    return report;
  }

  private async runStep(action: WindowAction, context: RunContext): Promise<StepOutcome> {
    try {
      switch (action.type) {
        case "doNothing":
          return { action, status: "skipped", reason: "no_op" };
        case "show":
        case "hide":
        case "minimize":
          return await this.runAccessibilityStep(action, action.type, context);
        case "bringToFront":
          await this.control.activate(context.app);
          return { action, status: "performed" };
        case "hotkey":
          return await this.runHotkey(action, context);
        case "globalHotkey":
          if (isUnsetKeyCode(action.keyCode)) {
            return { action, status: "skipped", reason: "unset_key_code" };
          }
          await this.postKeyStroke(action.keyCode, action.modifiers);
          return { action, status: "performed" };
      }
    } catch (error) {
      if (error instanceof PermissionDeniedError) {
        void appendTelemetry({
          level: "warn",
          source: "window.executor",
          event: "permission_denied",
          data: { bundleId: context.app.bundleId, action: action.type, code: error.code },
        });
        return { action, status: "skipped", reason: "permission_denied" };
      }
      throw error;
    }
  }

  private async hasPermission(context: RunContext): Promise<boolean> {
    if (context.permission === null) {
      context.permission = await this.control.hasAccessibilityPermission();
    }
    return context.permission;
  }

  private async runAccessibilityStep(
    action: WindowAction,
    step: AxStep,
    context: RunContext
  ): Promise<StepOutcome> {
    if (!(await this.hasPermission(context))) {
      return { action, status: "skipped", reason: "permission_denied" };
    }

    const { app } = context;
    switch (step) {
      case "hide":
        await this.control.hide(app);
        break;
      case "show": {
        await this.control.unhide(app);
        for (const window of await this.control.listWindows(app)) {
          if (await this.control.isWindowMinimized(app, window)) {
            await this.control.setWindowMinimized(app, window, false);
          }
        }
        break;
      }
      case "minimize":
        for (const window of await this.control.listWindows(app)) {
          await this.control.setWindowMinimized(app, window, true);
        }
        break;
    }
    return { action, status: "performed" };
  }

  private async runHotkey(
    action: Extract<WindowAction, { type: "hotkey" }>,
    context: RunContext
  ): Promise<StepOutcome> {
    if (isUnsetKeyCode(action.keyCode)) {
      return { action, status: "skipped", reason: "unset_key_code" };
    }

    const { app } = context;
    let previous: RunningApplication | null = null;

    if (!(await this.control.isFrontmost(app))) {
      if (action.waitForFrontmost) {
        return { action, status: "skipped", reason: "not_frontmost" };
      }
      if (action.restoreWindow) {
        previous = await this.control.frontmostApplication();
      }
      await this.control.activate(app);
      await this.sleep(HOTKEY_ACTIVATION_SETTLE_MS);
    }

    await this.postKeyStroke(action.keyCode, action.modifiers);

    if (previous && previous.bundleId !== app.bundleId) {
      // Best effort: the previous app may have quit in the meantime.
      try {
        await this.control.activate(previous);
      } catch (error) {
        void appendTelemetry({
          level: "warn",
          source: "window.executor",
          event: "restore_focus_failed",
          data: { bundleId: previous.bundleId, error },
        });
      }
    }
    return { action, status: "performed" };
  }

  private async postKeyStroke(keyCode: number, modifiers: number): Promise<void> {
    await this.keyEvents.postKeyEvent(keyCode, modifiers, true);
    await this.keyEvents.postKeyEvent(keyCode, modifiers, false);
  }
}
