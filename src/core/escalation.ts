import { setImmediate as nextTick } from "node:timers/promises";
import type { EscalationEvent, NotificationSink } from "../collaborators/notifications.js";
import { createLogger, errorMessage } from "../logger.js";
import type { ActiveStatus, Clock, IssueRecord } from "../types.js";
import { systemClock } from "../types.js";
import type { IssueStore } from "./issueStore.js";
import { isActive } from "./lifecycleRules.js";

const log = createLogger("escalation");

const YIELD_EVERY = 100;

export type EscalationThresholds = Record<ActiveStatus, number>;

export interface EscalationOptions {
  intervalMs: number;
  thresholds: EscalationThresholds;
}

export interface ScanSummary {
  scanned: number;
  emitted: number;
  skipped: number;
  failed: number;
}

/** The issue-level hooks the lifecycle needs; kept narrow so tests can stub them. */
export interface EscalationTimers {
  reset(issueId: string): void;
  cancel(issueId: string): void;
}

type IssueSource = Pick<IssueStore, "listActive" | "getRecord">;

/**
 * Advisory escalation. Each scan works from a snapshot and treats every issue on its own; the
 * highest tier already emitted per issue+status is remembered so repeat scans stay silent until
 * the next multiple of the threshold is crossed.
 */
export class EscalationScheduler implements EscalationTimers {
  private readonly emittedTiers = new Map<string, number>();
  private timer: NodeJS.Timeout | null = null;
  private scanning = false;
  private controller: AbortController | null = null;

  constructor(
    private readonly issues: IssueSource,
    private readonly notifier: NotificationSink,
    private readonly options: EscalationOptions,
    private readonly clock: Clock = systemClock
  ) {}

  start(signal?: AbortSignal) {
    if (this.timer || signal?.aborted) return;
    this.controller = new AbortController();
    const controller = this.controller;
    signal?.addEventListener("abort", () => this.stop(), { once: true });

    this.timer = setInterval(() => {
      if (this.scanning) {
        log.debug("Previous scan still running, skipping tick");
        return;
      }
      this.scanOnce(controller.signal).catch((error: unknown) => {
        log.error("Escalation scan crashed", { error: errorMessage(error) });
      });
    }, this.options.intervalMs);
    this.timer.unref();
    log.info("Escalation scheduler started", { intervalMs: this.options.intervalMs });
  }

  stop() {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
    this.controller?.abort();
    this.controller = null;
  }

  get running() {
    return this.timer !== null;
  }

  async scanOnce(signal?: AbortSignal): Promise<ScanSummary> {
    const summary: ScanSummary = { scanned: 0, emitted: 0, skipped: 0, failed: 0 };
    this.scanning = true;
    try {
      const snapshot = this.issues.listActive();
      const now = this.clock().getTime();

      for (const [position, issue] of snapshot.entries()) {
        if (position > 0 && position % YIELD_EVERY === 0) await nextTick();
        if (signal?.aborted) break;
        summary.scanned++;
        try {
          const event = this.evaluate(issue, now);
          if (event) {
            this.dispatch(event);
            summary.emitted++;
          } else {
            summary.skipped++;
          }
        } catch (error) {
          summary.failed++;
          log.error("Escalation check failed", { issueId: issue.id, error: errorMessage(error) });
        }
      }
    } finally {
      this.scanning = false;
    }

    if (summary.emitted > 0 || summary.failed > 0) log.info("Escalation scan finished", { ...summary });
    return summary;
  }

  tierFor(issueId: string, status: ActiveStatus) {
    return this.emittedTiers.get(tierKey(issueId, status)) ?? 0;
  }

  reset(issueId: string) {
    for (const key of [...this.emittedTiers.keys()]) {
      if (key.startsWith(`${issueId}:`)) this.emittedTiers.delete(key);
    }
  }

  cancel(issueId: string) {
    this.reset(issueId);
  }

  private evaluate(snapshot: IssueRecord, now: number): EscalationEvent | undefined {
    const status = snapshot.status;
    if (!isActive(status)) return undefined;
    const threshold = this.options.thresholds[status];
    const elapsed = now - Date.parse(snapshot.lastTransitionAt);
    if (!Number.isFinite(elapsed)) throw new Error(`Unreadable lastTransitionAt ${snapshot.lastTransitionAt}`);
    if (elapsed < threshold) return undefined;

    const tier = Math.floor(elapsed / threshold);
    const key = tierKey(snapshot.id, status);
    if (tier <= (this.emittedTiers.get(key) ?? 0)) return undefined;

    const current = this.issues.getRecord(snapshot.id);
    if (!current || current.status !== snapshot.status || current.lastTransitionAt !== snapshot.lastTransitionAt) {
      return undefined;
    }

    this.emittedTiers.set(key, tier);
    return {
      kind: "escalation",
      issueId: snapshot.id,
      status,
      unitId: current.unitId,
      tier,
      overdueMs: elapsed - threshold
    };
  }

  private dispatch(event: EscalationEvent) {
    log.warn("Issue escalated", { issueId: event.issueId, status: event.status, tier: event.tier });
    this.notifier.notify(event).catch((error: unknown) => {
      log.error("Escalation delivery failed", { issueId: event.issueId, error: errorMessage(error) });
    });
  }
}

function tierKey(issueId: string, status: ActiveStatus) {
  return `${issueId}:${status}`;
}
