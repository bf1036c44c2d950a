// Dock Switch Scheduler
//
// One pending switch at a time. Each space change aborts the previous pending
// switch, sleeps for the debounce window and only then resolves its target, so
// a burst of changes realizes only the last destination. The abort flag is
// checked after the sleep and again once the apply queue is free; after that
// the write -> synchronize -> restart sequence always runs to completion.
//
// lastAppliedDockSetId is recorded only after the dock restart resolves. It is
// cleared whenever the default dock set changes.

import type { DockSet, DockSetId, SpaceId } from "@/types";
import { DOCK_SWITCH_DEBOUNCE_MS, DOCK_WRITE_SETTLE_MS } from "@/lib/config";
import type { SpaceRegistry } from "@/store/space-registry";
import type { DockConfigStore } from "@/store/dock-config-store";
import { appendTelemetry } from "@/lib/telemetry";
import { defaultSleep } from "@/lib/window/executor";
import { buildDockEntries } from "./tiles";
import type { DockPreferenceStore, DockProcess } from "./types";

export type DockSwitchOutcome =
  | { status: "applied"; dockSetId: DockSetId }
  | {
      status: "skipped";
      reason:
        | "superseded"
        | "no_target"
        | "already_applied"
        | "missing_set"
        | "empty_set";
    }
  | { status: "failed"; dockSetId: DockSetId; reason: "sync_failed" | "error" };

export interface DockSwitchSchedulerOptions {
  registry: SpaceRegistry;
  dockConfig: DockConfigStore;
  preferences: DockPreferenceStore;
  dockProcess: DockProcess;
  sleep?: (ms: number) => Promise<void>;
}

interface PendingSwitch {
  spaceId: SpaceId;
  controller: AbortController;
  task: Promise<DockSwitchOutcome>;
}

export class DockSwitchScheduler {
  private readonly registry: SpaceRegistry;
  private readonly dockConfig: DockConfigStore;
  private readonly preferences: DockPreferenceStore;
  private readonly dockProcess: DockProcess;
  private readonly sleep: (ms: number) => Promise<void>;

  private pending: PendingSwitch | null = null;
  private applyChain: Promise<unknown> = Promise.resolve();
  private lastApplied: DockSetId | null = null;
  private unsubscribers: Array<() => void> = [];

  constructor(options: DockSwitchSchedulerOptions) {
    this.registry = options.registry;
    this.dockConfig = options.dockConfig;
    this.preferences = options.preferences;
    this.dockProcess = options.dockProcess;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get lastAppliedDockSetId(): DockSetId | null {
    return this.lastApplied;
  }

  get isRunning(): boolean {
    return this.unsubscribers.length > 0;
  }

  start(): void {
    if (this.isRunning) return;
    this.unsubscribers = [
      this.registry.subscribe((spaceId) => {
        void this.scheduleSwitch(spaceId);
      }),
      this.dockConfig.subscribe(
        (state) => state.defaultDockSetID,
        () => {
          this.invalidate();
        }
      ),
    ];
  }

  stop(): void {
    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.unsubscribers = [];
    this.cancelPending();
  }

  /** Forgets the last applied set so the next switch re-evaluates from scratch. */
  invalidate(): void {
    this.lastApplied = null;
  }

  cancelPending(): void {
    this.pending?.controller.abort();
    this.pending = null;
  }

  scheduleSwitch(spaceId: SpaceId): Promise<DockSwitchOutcome> {
    this.cancelPending();

    const controller = new AbortController();
    const task = this.runSwitch(spaceId, controller.signal);
    const pending: PendingSwitch = { spaceId, controller, task };
    this.pending = pending;

    void task.finally(() => {
      if (this.pending === pending) this.pending = null;
    });
    return task;
  }

  /** Resolves once no switch is pending and no apply sequence is running. */
  async whenIdle(): Promise<void> {
    while (this.pending) {
      await this.pending.task;
    }
    await this.applyChain;
  }

  /** Writes the set to the dock store and restarts the dock. Serialized with scheduled switches. */
  applyDockSet(dockSet: DockSet): Promise<DockSwitchOutcome> {
    return this.enqueue(() => this.apply(dockSet));
  }

  private enqueue<T>(work: () => Promise<T>): Promise<T> {
    const next = this.applyChain.then(work);
    this.applyChain = next.catch(() => undefined);
    return next;
  }

  private async runSwitch(spaceId: SpaceId, signal: AbortSignal): Promise<DockSwitchOutcome> {
    await this.sleep(DOCK_SWITCH_DEBOUNCE_MS);
    if (signal.aborted) return { status: "skipped", reason: "superseded" };

    return this.enqueue(async (): Promise<DockSwitchOutcome> => {
      if (signal.aborted) return { status: "skipped", reason: "superseded" };

      const outcome = this.resolveTarget(spaceId);
      if ("status" in outcome) {
        if (outcome.reason === "empty_set") {
          void appendTelemetry({
            level: "warn",
            source: "dock.scheduler",
            event: "empty_set_skipped",
            data: { spaceId },
          });
        }
        return outcome;
      }
      return this.apply(outcome);
    });
  }

  private resolveTarget(spaceId: SpaceId): DockSet | Extract<DockSwitchOutcome, { status: "skipped" }> {
    const { dockSets, defaultDockSetID, spaceAssignments } = this.dockConfig.getState();
    const target = spaceAssignments[spaceId] ?? defaultDockSetID;
    if (!target) return { status: "skipped", reason: "no_target" };

    // The default set always re-applies so a reset repairs out-of-band drift.
    if (target !== defaultDockSetID && target === this.lastApplied) {
      return { status: "skipped", reason: "already_applied" };
    }

    const dockSet = dockSets.find((entry) => entry.id === target);
    if (!dockSet) return { status: "skipped", reason: "missing_set" };
    if (dockSet.tiles.length === 0) return { status: "skipped", reason: "empty_set" };
    return dockSet;
  }

  private async apply(dockSet: DockSet): Promise<DockSwitchOutcome> {
    try {
      await this.preferences.writePersistentApps(buildDockEntries(dockSet.tiles));
      const synchronized = await this.preferences.synchronize();
      if (!synchronized) {
        void appendTelemetry({
          level: "error",
          source: "dock.scheduler",
          event: "sync_failed",
          data: { dockSetId: dockSet.id },
        });
        return { status: "failed", dockSetId: dockSet.id, reason: "sync_failed" };
      }

      await this.sleep(DOCK_WRITE_SETTLE_MS);
      await this.dockProcess.restart();
    } catch (error) {
      void appendTelemetry({
        level: "error",
        source: "dock.scheduler",
        event: "apply_failed",
        data: { dockSetId: dockSet.id, error },
      });
      return { status: "failed", dockSetId: dockSet.id, reason: "error" };
    }

    this.lastApplied = dockSet.id;
    void appendTelemetry({
      level: "info",
      source: "dock.scheduler",
      event: "applied",
      data: { dockSetId: dockSet.id, name: dockSet.name, tiles: dockSet.tiles.length },
    });
    return { status: "applied", dockSetId: dockSet.id };
  }
}
