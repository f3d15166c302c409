import { v4 as uuid } from "uuid";
import { z } from "zod";
import type { Db } from "../db.js";
import { AlreadyLinkedError, NotFoundError, type Result, ValidationError, fail, ok } from "../errors.js";
import { createLogger } from "../logger.js";
import { CATEGORIES, type Clock, type Report, type ReportInput, systemClock } from "../types.js";

const log = createLogger("reports");

export const MAX_DESCRIPTION_LENGTH = 2000;

export const reportInputSchema = z.object({
  submitterId: z.string().refine((value) => value.trim().length > 0, { message: "Submitter must not be empty" }),
  category: z.enum(CATEGORIES),
  description: z
    .string()
    .max(MAX_DESCRIPTION_LENGTH)
    .refine((value) => value.trim().length > 0, { message: "Description must not be empty" }),
  location: z.object({
    latitude: z.number().finite().min(-90).max(90),
    longitude: z.number().finite().min(-180).max(180)
  }),
  mediaRef: z.string().min(1).nullish()
});

interface ReportRow {
  id: string;
  submitter_id: string;
  category: Report["category"];
  description: string;
  latitude: number;
  longitude: number;
  submitted_at: string;
  media_ref: string | null;
  issue_id: string | null;
}

function toReport(row: ReportRow): Report {
  return {
    id: row.id,
    submitterId: row.submitter_id,
    category: row.category,
    description: row.description,
    location: { latitude: row.latitude, longitude: row.longitude },
    submittedAt: row.submitted_at,
    mediaRef: row.media_ref,
    issueId: row.issue_id
  };
}

/** Append-only record of citizen submissions. Rows are never updated except for the issue link. */
export class ReportStore {
  constructor(private readonly db: Db, private readonly clock: Clock = systemClock) {}

  submit(input: unknown): Result<Report, ValidationError> {
    const parsed = reportInputSchema.safeParse(input);
    if (!parsed.success) {
      return fail(new ValidationError("Invalid report", parsed.error.flatten()));
    }

    const data: ReportInput = parsed.data;
    const report: Report = {
      id: `RPT-${uuid()}`,
      submitterId: data.submitterId,
      category: data.category,
      description: data.description,
      location: { latitude: data.location.latitude, longitude: data.location.longitude },
      submittedAt: this.clock().toISOString(),
      mediaRef: data.mediaRef ?? null,
      issueId: null
    };

    this.db
      .prepare(`
        INSERT INTO reports (id, submitter_id, category, description, latitude, longitude, submitted_at, media_ref)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      `)
      .run(
        report.id,
        report.submitterId,
        report.category,
        report.description,
        report.location.latitude,
        report.location.longitude,
        report.submittedAt,
        report.mediaRef
      );

    return ok(report);
  }

  get(reportId: string): Result<Report, NotFoundError> {
    const row = this.db.prepare("SELECT * FROM reports WHERE id = ?").get(reportId) as ReportRow | undefined;
    if (!row) return fail(new NotFoundError("report", reportId));
    return ok(toReport(row));
  }

  linkToIssue(reportId: string, issueId: string): Result<void, NotFoundError | AlreadyLinkedError> {
    const row = this.db.prepare("SELECT issue_id FROM reports WHERE id = ?").get(reportId) as
      | { issue_id: string | null }
      | undefined;
    if (!row) return fail(new NotFoundError("report", reportId));
    if (row.issue_id === issueId) return ok(undefined);
    if (row.issue_id !== null) {
      log.error("Report already linked to a different issue", {
        reportId,
        currentIssueId: row.issue_id,
        requestedIssueId: issueId
      });
      return fail(new AlreadyLinkedError(reportId, row.issue_id, issueId));
    }

    this.db.prepare("UPDATE reports SET issue_id = ? WHERE id = ? AND issue_id IS NULL").run(issueId, reportId);
    return ok(undefined);
  }

  listByIssue(issueId: string): Report[] {
    const rows = this.db
      .prepare("SELECT * FROM reports WHERE issue_id = ? ORDER BY submitted_at, id")
      .all(issueId) as ReportRow[];
    return rows.map(toReport);
  }

  listBySubmitter(submitterId: string): Report[] {
    const rows = this.db
      .prepare("SELECT * FROM reports WHERE submitter_id = ? ORDER BY submitted_at DESC, id")
      .all(submitterId) as ReportRow[];
    return rows.map(toReport);
  }

  submittersOf(issueId: string): string[] {
    const rows = this.db
      .prepare("SELECT DISTINCT submitter_id FROM reports WHERE issue_id = ? ORDER BY submitter_id")
      .all(issueId) as Array<{ submitter_id: string }>;
    return rows.map((row) => row.submitter_id);
  }
}
