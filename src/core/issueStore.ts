import type { Db } from "../db.js";
import type {
  Category,
  GeoPoint,
  IssueFilter,
  IssueRecord,
  IssueStatus,
  Page,
  Priority,
  StatusEvent
} from "../types.js";
import { runningCentroid } from "./geo.js";

interface IssueRow {
  id: string;
  category: Category;
  latitude: number;
  longitude: number;
  member_count: number;
  status: IssueStatus;
  priority: Priority;
  unit_id: string;
  created_at: string;
  last_transition_at: string;
  version: number;
}

interface StatusEventRow {
  id: number;
  issue_id: string;
  from_status: IssueStatus | null;
  to_status: IssueStatus;
  actor_id: string;
  note: string | null;
  at: string;
}

function toRecord(row: IssueRow): IssueRecord {
  return {
    id: row.id,
    category: row.category,
    centroid: { latitude: row.latitude, longitude: row.longitude },
    memberCount: row.member_count,
    status: row.status,
    priority: row.priority,
    unitId: row.unit_id,
    createdAt: row.created_at,
    lastTransitionAt: row.last_transition_at,
    version: row.version
  };
}

function toEvent(row: StatusEventRow): StatusEvent {
  return {
    id: row.id,
    issueId: row.issue_id,
    from: row.from_status,
    to: row.to_status,
    actorId: row.actor_id,
    note: row.note,
    at: row.at
  };
}

export interface NewIssue {
  id: string;
  category: Category;
  location: GeoPoint;
  unitId: string;
  createdAt: string;
  actorId: string;
}

export interface StatusChange {
  issueId: string;
  expectedStatus: IssueStatus;
  expectedVersion: number;
  to: IssueStatus;
  actorId: string;
  note: string | null;
  at: string;
}

export class IssueStore {
  constructor(private readonly db: Db) {}

  /** Runs `work` inside one SQLite transaction; a throw rolls everything back and is rethrown. */
  transaction<T>(work: () => T): T {
    return this.db.transaction(work)();
  }

  create(issue: NewIssue): IssueRecord {
    this.transaction(() => {
      this.db
        .prepare(`
          INSERT INTO issues (id, category, latitude, longitude, member_count, status, unit_id, created_at, last_transition_at)
          VALUES (?, ?, ?, ?, 1, 'reported', ?, ?, ?)
        `)
        .run(
          issue.id,
          issue.category,
          issue.location.latitude,
          issue.location.longitude,
          issue.unitId,
          issue.createdAt,
          issue.createdAt
        );
      this.db
        .prepare("INSERT INTO status_events (issue_id, from_status, to_status, actor_id, note, at) VALUES (?, NULL, 'reported', ?, NULL, ?)")
        .run(issue.id, issue.actorId, issue.createdAt);
    });

    const created = this.getRecord(issue.id);
    if (!created) throw new Error(`Issue ${issue.id} vanished after insert`);
    return created;
  }

  getRecord(issueId: string): IssueRecord | undefined {
    const row = this.db.prepare("SELECT * FROM issues WHERE id = ?").get(issueId) as IssueRow | undefined;
    return row ? toRecord(row) : undefined;
  }

  events(issueId: string): StatusEvent[] {
    const rows = this.db
      .prepare("SELECT * FROM status_events WHERE issue_id = ? ORDER BY id")
      .all(issueId) as StatusEventRow[];
    return rows.map(toEvent);
  }

  /** Adds one member located at `point`; the centroid becomes the running average. */
  addMember(issueId: string, point: GeoPoint): IssueRecord | undefined {
    const current = this.getRecord(issueId);
    if (!current) return undefined;
    const count = current.memberCount + 1;
    const centroid = runningCentroid(current.centroid, count, point);
    this.db
      .prepare("UPDATE issues SET latitude = ?, longitude = ?, member_count = ?, version = version + 1 WHERE id = ?")
      .run(centroid.latitude, centroid.longitude, count, issueId);
    return this.getRecord(issueId);
  }

  /**
   * Moves the issue to `change.to` only if it is still at the expected status and version.
   * Returns the recorded event, or undefined when another writer got there first.
   */
  compareAndSetStatus(change: StatusChange): StatusEvent | undefined {
    return this.transaction(() => {
      const updated = this.db
        .prepare(`
          UPDATE issues
          SET status = ?, last_transition_at = ?, version = version + 1
          WHERE id = ? AND status = ? AND version = ?
        `)
        .run(change.to, change.at, change.issueId, change.expectedStatus, change.expectedVersion);
      if (updated.changes !== 1) return undefined;

      const inserted = this.db
        .prepare("INSERT INTO status_events (issue_id, from_status, to_status, actor_id, note, at) VALUES (?, ?, ?, ?, ?, ?)")
        .run(change.issueId, change.expectedStatus, change.to, change.actorId, change.note, change.at);

      const event: StatusEvent = {
        id: Number(inserted.lastInsertRowid),
        issueId: change.issueId,
        from: change.expectedStatus,
        to: change.to,
        actorId: change.actorId,
        note: change.note,
        at: change.at
      };
      return event;
    });
  }

  setPriority(issueId: string, priority: Priority): IssueRecord | undefined {
    this.db.prepare("UPDATE issues SET priority = ?, version = version + 1 WHERE id = ?").run(priority, issueId);
    return this.getRecord(issueId);
  }

  list(filter: IssueFilter, page: number, pageSize: number): Page<IssueRecord> {
    const clauses: string[] = [];
    const params: string[] = [];
    if (filter.status) {
      clauses.push("status = ?");
      params.push(filter.status);
    }
    if (filter.category) {
      clauses.push("category = ?");
      params.push(filter.category);
    }
    if (filter.unitId) {
      clauses.push("unit_id = ?");
      params.push(filter.unitId);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";

    const total = (this.db.prepare(`SELECT COUNT(*) AS count FROM issues ${where}`).get(...params) as { count: number })
      .count;
    const rows = this.db
      .prepare(`SELECT * FROM issues ${where} ORDER BY created_at DESC, id DESC LIMIT ? OFFSET ?`)
      .all(...params, pageSize, (page - 1) * pageSize) as IssueRow[];

    return { items: rows.map(toRecord), page, pageSize, total };
  }

  listActive(): IssueRecord[] {
    const rows = this.db
      .prepare("SELECT * FROM issues WHERE status NOT IN ('resolved', 'rejected') ORDER BY last_transition_at, id")
      .all() as IssueRow[];
    return rows.map(toRecord);
  }

  descriptionsOf(issueId: string): string[] {
    const rows = this.db
      .prepare("SELECT description FROM reports WHERE issue_id = ? ORDER BY submitted_at, id")
      .all(issueId) as Array<{ description: string }>;
    return rows.map((row) => row.description);
  }
}
