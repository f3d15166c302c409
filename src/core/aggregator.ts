import { v4 as uuid } from "uuid";
import { type AlreadyLinkedError, type NoJurisdictionError, NotFoundError, type Result, fail, ok } from "../errors.js";
import { createLogger } from "../logger.js";
import type { Clock, IssueRecord, IssueStatus, Report } from "../types.js";
import { systemClock } from "../types.js";
import type { GeoGrid } from "./geo.js";
import type { IssueStore } from "./issueStore.js";
import type { KeyedLock } from "./keyedLock.js";
import { isTerminal } from "./lifecycleRules.js";
import type { ReportStore } from "./reportStore.js";
import type { RoutingResolver } from "./routing.js";
import type { IssueCandidate, SimilarityIndex } from "./similarityIndex.js";

const log = createLogger("aggregator");

export interface Resolution {
  issueId: string;
  created: boolean;
  status: IssueStatus;
}

export type AggregationError = NotFoundError | NoJurisdictionError | AlreadyLinkedError;

export interface AggregatorDeps {
  reports: ReportStore;
  issues: IssueStore;
  index: SimilarityIndex;
  router: RoutingResolver;
  lock: KeyedLock;
  grid: GeoGrid;
  clock?: Clock;
}

export interface AggregatorOptions {
  mergeThreshold: number;
  radiusMeters: number;
}

/** Wraps a rejected link so it can abort a SQLite transaction and be handed back as a value. */
class LinkRejected extends Error {
  constructor(readonly reason: NotFoundError | AlreadyLinkedError) {
    super(reason.message);
  }
}

export class IssueAggregator {
  private readonly clock: Clock;

  constructor(private readonly deps: AggregatorDeps, private readonly options: AggregatorOptions) {
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Merge-or-create for one stored report. Holds the lock of every grid cell the report's merge
   * disc touches, so two reports close enough to merge are never resolved side by side.
   * A `unitId` the caller already routed to is used for a new issue instead of routing again.
   */
  async resolve(report: Report, unitId?: string): Promise<Result<Resolution, AggregationError>> {
    const cells = this.deps.grid.cellsAround(report.location, this.options.radiusMeters).map((cell) => `cell:${cell}`);
    return this.deps.lock.runExclusive(cells, () => this.resolveLocked(report, unitId));
  }

  private async resolveLocked(report: Report, unitId?: string): Promise<Result<Resolution, AggregationError>> {
    const stored = this.deps.reports.get(report.id);
    if (!stored.ok) return stored;
    if (stored.value.issueId) {
      const linked = this.deps.issues.getRecord(stored.value.issueId);
      if (!linked) return fail(new NotFoundError("issue", stored.value.issueId));
      return ok({ issueId: linked.id, created: false, status: linked.status });
    }

    const candidates = await this.deps.index.findCandidates(report);
    const target = this.pickTarget(candidates);
    if (target) return this.merge(report, target);
    return this.create(report, unitId);
  }

  private pickTarget(candidates: IssueCandidate[]): IssueRecord | undefined {
    for (const candidate of candidates) {
      if (candidate.score < this.options.mergeThreshold) return undefined;
      const issue = this.deps.issues.getRecord(candidate.issueId);
      if (issue && !isTerminal(issue.status)) return issue;
    }
    return undefined;
  }

  private merge(report: Report, target: IssueRecord): Result<Resolution, AggregationError> {
    const outcome = this.withinTransaction(() => {
      this.link(report.id, target.id);
      const updated = this.deps.issues.addMember(target.id, report.location);
      if (!updated) throw new LinkRejected(new NotFoundError("issue", target.id));
      return updated;
    });
    if (!outcome.ok) return outcome;

    this.deps.index.update(target.id, outcome.value.centroid, report.description);
    log.info("Report merged", { reportId: report.id, issueId: target.id, members: outcome.value.memberCount });
    return ok({ issueId: target.id, created: false, status: outcome.value.status });
  }

  private create(report: Report, routedUnitId?: string): Result<Resolution, AggregationError> {
    const routed = routedUnitId === undefined ? this.deps.router.route(report.category, report.location) : ok(routedUnitId);
    if (!routed.ok) {
      log.warn("Report could not be routed", { reportId: report.id, category: report.category });
      return routed;
    }

    const unitId = routed.value;
    const issueId = `ISS-${uuid()}`;
    const outcome = this.withinTransaction(() => {
      const issue = this.deps.issues.create({
        id: issueId,
        category: report.category,
        location: report.location,
        unitId,
        createdAt: this.clock().toISOString(),
        actorId: report.submitterId
      });
      this.link(report.id, issueId);
      return issue;
    });
    if (!outcome.ok) return outcome;

    this.deps.index.insert(outcome.value, [report.description]);
    log.info("Issue created", { issueId, reportId: report.id, unitId });
    return ok({ issueId, created: true, status: outcome.value.status });
  }

  private link(reportId: string, issueId: string) {
    const linked = this.deps.reports.linkToIssue(reportId, issueId);
    if (!linked.ok) throw new LinkRejected(linked.error);
  }

  private withinTransaction<T>(work: () => T): Result<T, NotFoundError | AlreadyLinkedError> {
    try {
      return ok(this.deps.issues.transaction(work));
    } catch (error) {
      if (error instanceof LinkRejected) return fail(error.reason);
      throw error;
    }
  }
}
