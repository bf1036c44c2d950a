import type { WindowAction, WindowActionType } from "@/types";
import keyNames from "./key-names.json";

/** Key code of a hotkey that has not been recorded yet. Never dispatched. */
export const UNSET_KEY_CODE = -1;

/** Modifier bits, shared by the recorder and the synthetic key events. */
export const MODIFIER_FLAGS = {
  shift: 1 << 17,
  control: 1 << 18,
  option: 1 << 19,
  command: 1 << 20,
} as const;

const KEY_NAMES: Record<string, string | undefined> = keyNames;

export const ACTION_TEMPLATES: readonly WindowAction[] = [
  { type: "show" },
  { type: "hide" },
  { type: "minimize" },
  { type: "bringToFront" },
  {
    type: "hotkey",
    keyCode: UNSET_KEY_CODE,
    modifiers: 0,
    restoreWindow: false,
    waitForFrontmost: false,
  },
  { type: "globalHotkey", keyCode: UNSET_KEY_CODE, modifiers: 0 },
  { type: "doNothing" },
];

const ACTION_LABELS: Record<WindowActionType, string> = {
  doNothing: "Do Nothing",
  show: "Show",
  hide: "Hide",
  minimize: "Minimize",
  bringToFront: "Bring to Front",
  hotkey: "Press",
  globalHotkey: "Press Globally",
};

export function createHotkeyAction(
  keyCode: number,
  modifiers: number,
  options: { restoreWindow?: boolean; waitForFrontmost?: boolean } = {}
): WindowAction {
  return {
    type: "hotkey",
    keyCode,
    modifiers,
    restoreWindow: options.restoreWindow ?? false,
    waitForFrontmost: options.waitForFrontmost ?? false,
  };
}

export function isUnsetKeyCode(keyCode: number): boolean {
  return !Number.isInteger(keyCode) || keyCode < 0;
}

export function getActionKey(action: WindowAction): string {
  switch (action.type) {
    case "hotkey":
      return `hotkey-${action.keyCode}-${action.modifiers}`;
    case "globalHotkey":
      return `globalHotkey-${action.keyCode}-${action.modifiers}`;
    default:
      return action.type;
  }
}

export function formatShortcut(keyCode: number, modifiers: number): string {
  if (keyCode === UNSET_KEY_CODE) return "Record Shortcut...";

  let output = "";
  if (modifiers & MODIFIER_FLAGS.control) output += "⌃";
  if (modifiers & MODIFIER_FLAGS.option) output += "⌥";
  if (modifiers & MODIFIER_FLAGS.shift) output += "⇧";
  if (modifiers & MODIFIER_FLAGS.command) output += "⌘";

  const name = KEY_NAMES[String(keyCode)];
  return output + (name ? name.toUpperCase() : "?");
}

export function getActionLabel(action: WindowAction): string {
  switch (action.type) {
    case "hotkey":
    case "globalHotkey":
      return `${ACTION_LABELS[action.type]}: ${formatShortcut(action.keyCode, action.modifiers)}`;
    default:
      return ACTION_LABELS[action.type];
  }
}
