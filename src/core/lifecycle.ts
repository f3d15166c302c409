import { z } from "zod";
import type { IdentityAuthorizer } from "../collaborators/identity.js";
import {
  ConflictError,
  InvalidTransitionError,
  NotFoundError,
  type Result,
  UnauthorizedError,
  ValidationError,
  fail,
  ok
} from "../errors.js";
import type { IssueEventEmitter } from "../events/issueEvents.js";
import { createLogger } from "../logger.js";
import { ISSUE_STATUSES, PRIORITIES, systemClock } from "../types.js";
import type { Clock, IssueRecord, IssueStatus, Priority, StatusEvent } from "../types.js";
import type { EscalationTimers } from "./escalation.js";
import type { IssueStore } from "./issueStore.js";
import type { KeyedLock } from "./keyedLock.js";
import { canTransition, isTerminal } from "./lifecycleRules.js";
import type { SimilarityIndex } from "./similarityIndex.js";

const log = createLogger("lifecycle");

export const MAX_NOTE_LENGTH = 1000;

const transitionSchema = z.object({
  targetStatus: z.enum(ISSUE_STATUSES),
  actorId: z.string().trim().min(1),
  note: z.string().max(MAX_NOTE_LENGTH).nullish()
});

export type TransitionError =
  | ValidationError
  | NotFoundError
  | UnauthorizedError
  | InvalidTransitionError
  | ConflictError;

export interface LifecycleDeps {
  issues: IssueStore;
  identity: IdentityAuthorizer;
  timers: EscalationTimers;
  index: SimilarityIndex;
  events: IssueEventEmitter;
  lock: KeyedLock;
  clock?: Clock;
}

export interface LifecycleOptions {
  maxAttempts: number;
}

export function issueLockKey(issueId: string) {
  return `issue:${issueId}`;
}

export class LifecycleStateMachine {
  private readonly clock: Clock;

  constructor(private readonly deps: LifecycleDeps, private readonly options: LifecycleOptions) {
    this.clock = deps.clock ?? systemClock;
  }

  async transition(
    issueId: string,
    targetStatus: string,
    actorId: string,
    note?: string | null
  ): Promise<Result<StatusEvent, TransitionError>> {
    const parsed = transitionSchema.safeParse({ targetStatus, actorId, note });
    if (!parsed.success) return fail(new ValidationError("Invalid transition request", parsed.error.flatten()));
    const request = parsed.data;

    const before = this.deps.issues.getRecord(issueId);
    if (!before) return fail(new NotFoundError("issue", issueId));

    const allowed = await this.deps.identity.authorize(request.actorId, before.unitId, `transition:${request.targetStatus}`);
    if (!allowed) {
      log.warn("Transition refused", { issueId, actorId: request.actorId, target: request.targetStatus });
      return fail(new UnauthorizedError(request.actorId, before.unitId));
    }

    const outcome = await this.deps.lock.runExclusive(issueLockKey(issueId), () =>
      this.applyWithRetry(issueId, request.targetStatus, request.actorId, request.note ?? null)
    );
    if (!outcome.ok) return outcome;

    const { issue, event } = outcome.value;
    if (isTerminal(event.to)) {
      this.deps.timers.cancel(issueId);
      this.deps.index.remove(issueId);
    } else {
      this.deps.timers.reset(issueId);
    }
    log.info("Issue transitioned", { issueId, from: event.from, to: event.to, actorId: event.actorId });
    this.deps.events.emitTransition({ issue, event });
    return ok(event);
  }

  async setPriority(
    issueId: string,
    priority: string,
    actorId: string
  ): Promise<Result<IssueRecord, ValidationError | NotFoundError | UnauthorizedError>> {
    const parsed = z.enum(PRIORITIES).safeParse(priority);
    if (!parsed.success) return fail(new ValidationError("Invalid priority", parsed.error.flatten()));

    const before = this.deps.issues.getRecord(issueId);
    if (!before) return fail(new NotFoundError("issue", issueId));
    if (!(await this.deps.identity.authorize(actorId, before.unitId, "set_priority"))) {
      return fail(new UnauthorizedError(actorId, before.unitId));
    }

    const next: Priority = parsed.data;
    const updated = await this.deps.lock.runExclusive(issueLockKey(issueId), () =>
      this.deps.issues.setPriority(issueId, next)
    );
    if (!updated) return fail(new NotFoundError("issue", issueId));
    return ok(updated);
  }

  /**
   * Compare-and-swap on (status, version). The per-issue lock serialises callers in this process;
   * the version check catches writers outside it.
   */
  private applyWithRetry(
    issueId: string,
    target: IssueStatus,
    actorId: string,
    note: string | null
  ): Result<{ issue: IssueRecord; event: StatusEvent }, NotFoundError | InvalidTransitionError | ConflictError> {
    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      const current = this.deps.issues.getRecord(issueId);
      if (!current) return fail(new NotFoundError("issue", issueId));
      if (!canTransition(current.status, target)) return fail(new InvalidTransitionError(current.status, target));

      const at = this.monotonicNow(current.lastTransitionAt);
      const event = this.deps.issues.compareAndSetStatus({
        issueId,
        expectedStatus: current.status,
        expectedVersion: current.version,
        to: target,
        actorId,
        note,
        at
      });
      if (event) {
        const issue = this.deps.issues.getRecord(issueId);
        if (!issue) return fail(new NotFoundError("issue", issueId));
        return ok({ issue, event });
      }
      log.debug("Status compare-and-swap lost, retrying", { issueId, attempt });
    }

    log.warn("Transition gave up after concurrent updates", { issueId, attempts: this.options.maxAttempts });
    return fail(new ConflictError(issueId, this.options.maxAttempts));
  }

  /** Event timestamps never run backwards, even if the wall clock does. */
  private monotonicNow(previous: string) {
    const now = this.clock();
    const last = Date.parse(previous);
    return (now.getTime() < last ? new Date(last) : now).toISOString();
  }
}
