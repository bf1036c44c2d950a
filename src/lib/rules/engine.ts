import type { SpaceId, WindowAction } from "@/types";
import type { SpaceRegistry } from "@/store/space-registry";
import type { RuleStore } from "@/store/rule-store";
import type { ExecutionReport } from "@/lib/window/executor";
import { appendTelemetry } from "@/lib/telemetry";
import { resolveRulesForSpace, type RuleResolution } from "./matching";

export type RuleEvaluationReason = "space_change" | "rules_changed" | "manual";

export interface RuleActionRunner {
  run: (bundleId: string, actions: WindowAction[]) => Promise<ExecutionReport>;
}

export interface RuleEngineOptions {
  registry: SpaceRegistry;
  rules: RuleStore;
  executor: RuleActionRunner;
}

/**
 * Applies window rules whenever the current space changes or the rule set is
 * edited. Resolution happens synchronously in event order. Runs for the same
 * application are chained, so an earlier space's actions always finish before
 * a later space's start; different applications proceed independently.
 */
export class RuleEngine {
  private readonly registry: SpaceRegistry;
  private readonly rules: RuleStore;
  private readonly executor: RuleActionRunner;
  private readonly inFlight = new Set<Promise<void>>();
  private readonly appChains = new Map<string, Promise<void>>();
  private unsubscribers: Array<() => void> = [];

  constructor(options: RuleEngineOptions) {
    this.registry = options.registry;
    this.rules = options.rules;
    this.executor = options.executor;
  }

  get isRunning(): boolean {
    return this.unsubscribers.length > 0;
  }

  start(): void {
    if (this.isRunning) return;
    this.unsubscribers = [
      this.registry.subscribe((spaceId) => {
        void this.applyRules(spaceId, "space_change");
      }),
      this.rules.subscribe(
        (state) => state.rules,
        () => {
          this.reevaluate();
        }
      ),
    ];
  }

  stop(): void {
    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.unsubscribers = [];
  }

  /** Re-applies the rules against the current space, if one is known. */
  reevaluate(): void {
    const spaceId = this.registry.currentSpaceID();
    if (!spaceId) return;
    void this.applyRules(spaceId, "rules_changed");
  }

  applyRules(spaceId: SpaceId, reason: RuleEvaluationReason = "manual"): Promise<void> {
    const resolutions = resolveRulesForSpace(this.rules.getState().rules, spaceId);
    if (resolutions.length === 0) return Promise.resolve();

    void appendTelemetry({
      level: "info",
      source: "rules.engine",
      event: "apply",
      data: { spaceId, reason, rules: resolutions.length },
    });

    const batch = Promise.all(
      resolutions.map((resolution) => this.enqueue(resolution, spaceId))
    ).then(() => undefined);

    this.inFlight.add(batch);
    void batch.finally(() => {
      this.inFlight.delete(batch);
    });
    return batch;
  }

  /** Resolves once every started rule task has finished. */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight));
    }
  }

  private enqueue(resolution: RuleResolution, spaceId: SpaceId): Promise<void> {
    const key = resolution.rule.appBundleID;
    const previous = this.appChains.get(key) ?? Promise.resolve();
    const next = previous.then(() => this.runRule(resolution, spaceId));
    this.appChains.set(key, next);
    void next.finally(() => {
      if (this.appChains.get(key) === next) this.appChains.delete(key);
    });
    return next;
  }

  private async runRule(resolution: RuleResolution, spaceId: SpaceId): Promise<void> {
    const { rule, group, actions } = resolution;
    try {
      const report = await this.executor.run(rule.appBundleID, actions);
      if (!report.running) return;
      const reasons = report.steps.flatMap((step) =>
        step.status === "skipped" && step.reason !== "no_op" ? [step.reason] : []
      );
      if (reasons.length > 0) {
        void appendTelemetry({
          level: "info",
          source: "rules.engine",
          event: "steps_skipped",
          data: { ruleId: rule.id, spaceId, reasons },
        });
      }
    } catch (error) {
      void appendTelemetry({
        level: "error",
        source: "rules.engine",
        event: "rule_failed",
        data: { ruleId: rule.id, groupId: group?.id ?? null, spaceId, error },
      });
    }
  }
}
