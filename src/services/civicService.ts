import { z } from "zod";
import type { JurisdictionRegistry } from "../config/jurisdictions.js";
import { DbIdentityAuthorizer, type IdentityAuthorizer, UserDirectory } from "../collaborators/identity.js";
import { DbNotificationSink, type NotificationSink } from "../collaborators/notifications.js";
import { IssueAggregator, type AggregationError } from "../core/aggregator.js";
import { type EscalationOptions, EscalationScheduler } from "../core/escalation.js";
import { GeoGrid } from "../core/geo.js";
import { IssueStore } from "../core/issueStore.js";
import { KeyedLock } from "../core/keyedLock.js";
import { LifecycleStateMachine } from "../core/lifecycle.js";
import { ReportStore, reportInputSchema } from "../core/reportStore.js";
import { RoutingResolver } from "../core/routing.js";
import { GridSimilarityIndex, type SimilarityIndex } from "../core/similarityIndex.js";
import type { Db } from "../db.js";
import { type NoJurisdictionError, NotFoundError, type Result, ValidationError, fail, ok } from "../errors.js";
import { IssueEventEmitter } from "../events/issueEvents.js";
import { createLogger, errorMessage } from "../logger.js";
import { CATEGORIES, ISSUE_STATUSES, systemClock } from "../types.js";
import type { Clock, IssueDetail, IssueRecord, IssueStatus, Page, Report } from "../types.js";

const log = createLogger("service");

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

const listQuerySchema = z.object({
  status: z.enum(ISSUE_STATUSES).optional(),
  category: z.enum(CATEGORIES).optional(),
  unit: z.string().min(1).optional(),
  page: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE)
});

export interface ServiceOptions {
  mergeRadiusMeters: number;
  mergeThreshold: number;
  transitionMaxAttempts: number;
  escalation: EscalationOptions;
}

export interface ServiceDeps {
  db: Db;
  registry: JurisdictionRegistry;
  identity?: IdentityAuthorizer;
  notifier?: NotificationSink;
  index?: SimilarityIndex;
  users?: UserDirectory;
  clock?: Clock;
}

export interface SubmissionReceipt {
  reportId: string;
  issueId: string;
  status: IssueStatus;
  created: boolean;
}

export type SubmissionError = ValidationError | NoJurisdictionError | AggregationError;

/** Wires the core together and exposes the operations the HTTP layer calls. */
export class CivicIssueService {
  readonly reports: ReportStore;
  readonly issues: IssueStore;
  readonly index: SimilarityIndex;
  readonly router: RoutingResolver;
  readonly aggregator: IssueAggregator;
  readonly lifecycle: LifecycleStateMachine;
  readonly escalation: EscalationScheduler;
  readonly events = new IssueEventEmitter();
  readonly users: UserDirectory;
  readonly inbox: DbNotificationSink;
  private readonly notifier: NotificationSink;

  constructor(deps: ServiceDeps, options: ServiceOptions) {
    const clock = deps.clock ?? systemClock;
    const lock = new KeyedLock();
    const grid = new GeoGrid(options.mergeRadiusMeters);

    this.users = deps.users ?? new UserDirectory(deps.db);
    this.inbox = new DbNotificationSink(deps.db, this.users, clock);
    this.notifier = deps.notifier ?? this.inbox;
    this.reports = new ReportStore(deps.db, clock);
    this.issues = new IssueStore(deps.db);
    this.index = deps.index ?? new GridSimilarityIndex({ radiusMeters: options.mergeRadiusMeters });
    this.router = new RoutingResolver(deps.registry);
    this.escalation = new EscalationScheduler(this.issues, this.notifier, options.escalation, clock);

    this.aggregator = new IssueAggregator(
      { reports: this.reports, issues: this.issues, index: this.index, router: this.router, lock, grid, clock },
      { mergeThreshold: options.mergeThreshold, radiusMeters: options.mergeRadiusMeters }
    );
    this.lifecycle = new LifecycleStateMachine(
      {
        issues: this.issues,
        identity: deps.identity ?? new DbIdentityAuthorizer(deps.db),
        timers: this.escalation,
        index: this.index,
        events: this.events,
        lock,
        clock
      },
      { maxAttempts: options.transitionMaxAttempts }
    );

    this.events.onTransition(({ issue, event }) => {
      const recipients = this.reports.submittersOf(issue.id);
      this.deliver({ kind: "status_changed", issueId: issue.id, from: event.from, to: event.to, note: event.note, recipients });
    });
  }

  /** Rebuilds the similarity index from the stores; the index holds nothing the database lacks. */
  warmUp() {
    this.index.clear();
    const active = this.issues.listActive();
    for (const issue of active) {
      this.index.insert(issue, this.issues.descriptionsOf(issue.id));
    }
    log.info("Similarity index rebuilt", { issues: active.length });
  }

  start(signal?: AbortSignal) {
    this.warmUp();
    this.escalation.start(signal);
  }

  stop() {
    this.escalation.stop();
  }

  async submitReport(input: unknown): Promise<Result<SubmissionReceipt, SubmissionError>> {
    const parsed = reportInputSchema.safeParse(input);
    if (!parsed.success) return fail(new ValidationError("Invalid report", parsed.error.flatten()));

    const { category, location, submitterId } = parsed.data;
    const routed = this.router.route(category, location);
    if (!routed.ok) {
      log.warn("Rejected unroutable report", { category, ...location });
      this.deliver({ kind: "no_jurisdiction", category, location, submitterId });
      return routed;
    }

    const stored = this.reports.submit(parsed.data);
    if (!stored.ok) return stored;

    const resolved = await this.aggregator.resolve(stored.value, routed.value);
    if (!resolved.ok) {
      log.error("Stored report could not be aggregated", { reportId: stored.value.id, error: resolved.error.code });
      return resolved;
    }

    return ok({
      reportId: stored.value.id,
      issueId: resolved.value.issueId,
      status: resolved.value.status,
      created: resolved.value.created
    });
  }

  getReport(reportId: string): Result<Report, NotFoundError> {
    return this.reports.get(reportId);
  }

  /** A citizen's own reports, newest first, each with the current status of its issue. */
  reportsBySubmitter(submitterId: string): Array<Report & { issueStatus: IssueStatus | null }> {
    return this.reports.listBySubmitter(submitterId).map((report) => ({
      ...report,
      issueStatus: report.issueId ? (this.issues.getRecord(report.issueId)?.status ?? null) : null
    }));
  }

  getIssue(issueId: string): Result<IssueDetail, NotFoundError> {
    const record = this.issues.getRecord(issueId);
    if (!record) return fail(new NotFoundError("issue", issueId));
    return ok({ ...record, reports: this.reports.listByIssue(issueId), events: this.issues.events(issueId) });
  }

  listIssues(query: unknown): Result<Page<IssueRecord>, ValidationError> {
    const parsed = listQuerySchema.safeParse(query);
    if (!parsed.success) return fail(new ValidationError("Invalid listing query", parsed.error.flatten()));
    const { status, category, unit, page, pageSize } = parsed.data;
    return ok(this.issues.list({ status, category, unitId: unit }, page, pageSize));
  }

  transition(issueId: string, targetStatus: string, actorId: string, note?: string | null) {
    return this.lifecycle.transition(issueId, targetStatus, actorId, note);
  }

  setPriority(issueId: string, priority: string, actorId: string) {
    return this.lifecycle.setPriority(issueId, priority, actorId);
  }

  private deliver(event: Parameters<NotificationSink["notify"]>[0]) {
    this.notifier.notify(event).catch((error: unknown) => {
      log.error("Notification delivery failed", { kind: event.kind, error: errorMessage(error) });
    });
  }
}
