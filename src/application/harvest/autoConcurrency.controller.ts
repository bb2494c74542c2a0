import type { RunMetrics } from "../../core/run/RunMetrics";
import type { ResourceMonitor } from "../../ports/ResourceMonitor";
import type { ConcurrencyGovernor } from "../../shared/concurrency/governor";
import { logEvent } from "../../shared/logging/logEvent";
import type { Clock } from "../../shared/time/clock";
import type { HarvestConfig } from "./harvest.config";

export type ControllerSettings = Pick<
  HarvestConfig,
  | "cpuUpperThreshold"
  | "cpuLowerThreshold"
  | "memUpperThreshold"
  | "checkIntervalSeconds"
  | "cooldownSeconds"
  | "failureRateThreshold"
  | "opsPerWorkerPerMinute"
>;

export type TickOutcome =
  | { action: "throttled"; from: number; to: number; failureRate: number; nextDelayMs: number }
  | { action: "decreased" | "increased"; from: number; to: number; cpuPercent: number; memoryPercent: number; nextDelayMs: number }
  | { action: "held"; reason: "cooldown" | "within_thresholds" | "at_bound"; nextDelayMs: number };

/**
 * Periodically adapts the governor limit. A high failure rate halves the
 * limit and pauses for two cooldowns; otherwise CPU and memory pressure
 * nudge the limit by one. Both branches respect the cooldown.
 */
export class AutoConcurrencyController {
  constructor(
    private readonly deps: {
      governor: ConcurrencyGovernor;
      metrics: RunMetrics;
      resources: ResourceMonitor;
      clock: Clock;
      settings: ControllerSettings;
    }
  ) {}

  async run(signal: AbortSignal): Promise<void> {
    const { governor, clock } = this.deps;
    const bounds = { min: governor.minBound, max: governor.maxBound, limit: governor.limit };
    if (governor.limit >= governor.maxBound) {
      logEvent("warn", "controller.started", {
        ...bounds,
        reason: "limit_at_max",
        message: "HARVEST_MAX_CONCURRENCY does not exceed the starting limit; the controller can only lower it"
      });
    } else {
      logEvent("info", "controller.started", bounds);
    }

    while (!signal.aborted) {
      const outcome = this.tick();
      await clock.sleep(outcome.nextDelayMs, signal);
    }

    logEvent("info", "controller.stopped", { limit: governor.limit });
  }

  tick(): TickOutcome {
    const { governor, metrics, resources, clock, settings } = this.deps;
    const now = clock.now();
    const cooldownMs = settings.cooldownSeconds * 1000;
    const intervalMs = settings.checkIntervalSeconds * 1000;
    const cooledDown = now - governor.snapshot().lastChangeAt >= cooldownMs;

    const recentFailures = metrics.recentFailureCount(now);
    const estimatedCapacity = governor.limit * settings.opsPerWorkerPerMinute;
    const failureRate = recentFailures / Math.max(estimatedCapacity, 1);

    if (failureRate > settings.failureRateThreshold && cooledDown) {
      const from = governor.limit;
      const to = governor.setLimit(Math.max(governor.minBound, Math.floor(from * 0.5)), now);
      logEvent("warn", "controller.throttled", {
        from,
        to,
        recentFailures,
        failureRate: Number(failureRate.toFixed(4))
      });
      return { action: "throttled", from, to, failureRate, nextDelayMs: cooldownMs * 2 };
    }

    if (!cooledDown) {
      return { action: "held", reason: "cooldown", nextDelayMs: intervalMs };
    }

    const { cpuPercent, memoryPercent } = resources.sample();
    const from = governor.limit;
    const overloaded = cpuPercent > settings.cpuUpperThreshold || memoryPercent > settings.memUpperThreshold;
    const idle = cpuPercent < settings.cpuLowerThreshold && memoryPercent < settings.memUpperThreshold;

    let target = from;
    if (overloaded && from > governor.minBound) target = from - 1;
    else if (!overloaded && idle && from < governor.maxBound) target = from + 1;

    if (target === from) {
      return {
        action: "held",
        reason: overloaded || idle ? "at_bound" : "within_thresholds",
        nextDelayMs: intervalMs
      };
    }

    const to = governor.setLimit(target, now);
    const action = to < from ? "decreased" : "increased";
    logEvent("info", `controller.${action}`, { from, to, cpuPercent, memoryPercent });
    return { action, from, to, cpuPercent, memoryPercent, nextDelayMs: intervalMs };
  }
}
