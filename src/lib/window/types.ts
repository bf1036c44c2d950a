// Window control surface
//
// Narrow capabilities the executor needs from the OS. Adapters throw
// PermissionDeniedError when the platform refuses an operation for lack of the
// accessibility or synthetic-input permission; the executor turns that into a
// skipped step.

export interface RunningApplication {
  bundleId: string;
  name?: string;
  pid?: number;
}

export interface AppWindow {
  /** Position of the window in the application's window list. */
  index: number;
  title?: string;
}

export interface WindowControl {
  findRunningApplication: (bundleId: string) => Promise<RunningApplication | null>;
  frontmostApplication: () => Promise<RunningApplication | null>;
  isFrontmost: (app: RunningApplication) => Promise<boolean>;
  hasAccessibilityPermission: () => Promise<boolean>;

  hide: (app: RunningApplication) => Promise<void>;
  /** Unhides without taking focus. */
  unhide: (app: RunningApplication) => Promise<void>;
  /** Activates the application, taking focus from the current one. */
  activate: (app: RunningApplication) => Promise<void>;

  listWindows: (app: RunningApplication) => Promise<AppWindow[]>;
  isWindowMinimized: (app: RunningApplication, window: AppWindow) => Promise<boolean>;
  setWindowMinimized: (
    app: RunningApplication,
    window: AppWindow,
    minimized: boolean
  ) => Promise<void>;
}

export interface KeyEventSink {
  postKeyEvent: (keyCode: number, modifiers: number, isDown: boolean) => Promise<void>;
}

export type PermissionDeniedErrorCode = "accessibility_denied" | "input_denied";

export class PermissionDeniedError extends Error {
  readonly code: PermissionDeniedErrorCode;

  constructor(code: PermissionDeniedErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = "PermissionDeniedError";
  }
}
