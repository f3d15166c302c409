import type { IssueStatus } from "./types.js";

export type ErrorCode =
  | "ValidationError"
  | "NotFound"
  | "InvalidTransition"
  | "Unauthorized"
  | "NoJurisdiction"
  | "AlreadyLinked"
  | "Conflict";

export class CivicError extends Error {
  readonly code: ErrorCode;
  readonly status: number;

  constructor(code: ErrorCode, message: string, status: number) {
    super(message);
    this.name = code;
    this.code = code;
    this.status = status;
  }
}

export class ValidationError extends CivicError {
  constructor(message: string, readonly details?: Record<string, unknown>) {
    super("ValidationError", message, 400);
  }
}

export class NotFoundError extends CivicError {
  constructor(readonly entity: "report" | "issue" | "unit" | "notification" | "media", readonly id: string) {
    super("NotFound", `${entity} ${id} not found`, 404);
  }
}

export class InvalidTransitionError extends CivicError {
  constructor(readonly from: IssueStatus, readonly to: IssueStatus) {
    super("InvalidTransition", `Cannot move issue from ${from} to ${to}`, 409);
  }
}

export class UnauthorizedError extends CivicError {
  constructor(readonly actorId: string, readonly unitId: string) {
    super("Unauthorized", `Actor ${actorId} may not act for unit ${unitId}`, 403);
  }
}

export class NoJurisdictionError extends CivicError {
  constructor(readonly category: string, readonly latitude: number, readonly longitude: number) {
    super("NoJurisdiction", `No unit handles ${category} at (${latitude}, ${longitude})`, 422);
  }
}

export class AlreadyLinkedError extends CivicError {
  constructor(readonly reportId: string, readonly currentIssueId: string, readonly requestedIssueId: string) {
    super(
      "AlreadyLinked",
      `Report ${reportId} already belongs to ${currentIssueId}, refusing link to ${requestedIssueId}`,
      500
    );
  }
}

export class ConflictError extends CivicError {
  constructor(readonly issueId: string, readonly attempts: number) {
    super("Conflict", `Issue ${issueId} changed concurrently; gave up after ${attempts} attempts`, 409);
  }
}

export type Result<T, E extends CivicError = CivicError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E extends CivicError>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
