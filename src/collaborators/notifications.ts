import { v4 as uuid } from "uuid";
import type { Db } from "../db.js";
import { NotFoundError, type Result, fail, ok } from "../errors.js";
import { createLogger } from "../logger.js";
import type { ActiveStatus, Category, Clock, GeoPoint, IssueStatus } from "../types.js";
import { systemClock } from "../types.js";
import type { UserDirectory } from "./identity.js";

const log = createLogger("notifications");

export interface EscalationEvent {
  kind: "escalation";
  issueId: string;
  status: ActiveStatus;
  unitId: string;
  tier: number;
  overdueMs: number;
}

export interface StatusChangedEvent {
  kind: "status_changed";
  issueId: string;
  from: IssueStatus | null;
  to: IssueStatus;
  note: string | null;
  recipients: string[];
}

export interface NoJurisdictionEvent {
  kind: "no_jurisdiction";
  category: Category;
  location: GeoPoint;
  submitterId: string;
}

export type NotificationEvent = EscalationEvent | StatusChangedEvent | NoJurisdictionEvent;

/** Delivery collaborator. Callers never wait on it while holding a lock. */
export interface NotificationSink {
  notify(event: NotificationEvent): Promise<void>;
}

export interface Notification {
  id: string;
  recipientId: string;
  kind: NotificationEvent["kind"];
  title: string;
  body: string;
  issueId: string | null;
  isRead: boolean;
  createdAt: string;
}

interface NotificationRow {
  id: string;
  recipient_id: string;
  kind: NotificationEvent["kind"];
  title: string;
  body: string;
  issue_id: string | null;
  is_read: number;
  created_at: string;
}

function toNotification(row: NotificationRow): Notification {
  return {
    id: row.id,
    recipientId: row.recipient_id,
    kind: row.kind,
    title: row.title,
    body: row.body,
    issueId: row.issue_id,
    isRead: row.is_read === 1,
    createdAt: row.created_at
  };
}

const STATUS_LABELS: Record<IssueStatus, string> = {
  reported: "Reported",
  acknowledged: "Acknowledged",
  in_progress: "In progress",
  resolved: "Resolved",
  rejected: "Rejected"
};

function hours(ms: number) {
  return Math.round(ms / 36_000) / 100;
}

interface Message {
  recipients: string[];
  title: string;
  body: string;
  issueId: string | null;
}

/**
 * In-app inbox. Status changes go to the submitters of every member report, escalations to the
 * officials of the responsible unit, routing failures to admins.
 */
export class DbNotificationSink implements NotificationSink {
  constructor(
    private readonly db: Db,
    private readonly users: Pick<UserDirectory, "idsWhere">,
    private readonly clock: Clock = systemClock
  ) {}

  async notify(event: NotificationEvent): Promise<void> {
    const message = this.compose(event);
    if (message.recipients.length === 0) {
      log.warn("Notification has no recipients", { kind: event.kind, issueId: message.issueId });
      return;
    }

    const insert = this.db.prepare(`
      INSERT INTO notifications (id, recipient_id, kind, title, body, issue_id, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);
    const createdAt = this.clock().toISOString();
    this.db.transaction(() => {
      for (const recipient of message.recipients) {
        insert.run(uuid(), recipient, event.kind, message.title, message.body, message.issueId, createdAt);
      }
    })();
    log.debug("Notification stored", { kind: event.kind, recipients: message.recipients.length });
  }

  list(recipientId: string, limit = 50): Notification[] {
    const rows = this.db
      .prepare("SELECT * FROM notifications WHERE recipient_id = ? ORDER BY created_at DESC, rowid DESC LIMIT ?")
      .all(recipientId, limit) as NotificationRow[];
    return rows.map(toNotification);
  }

  markRead(id: string, recipientId: string): Result<Notification, NotFoundError> {
    const updated = this.db
      .prepare("UPDATE notifications SET is_read = 1 WHERE id = ? AND recipient_id = ?")
      .run(id, recipientId);
    if (updated.changes !== 1) return fail(new NotFoundError("notification", id));
    const row = this.db.prepare("SELECT * FROM notifications WHERE id = ?").get(id) as NotificationRow;
    return ok(toNotification(row));
  }

  private compose(event: NotificationEvent): Message {
    switch (event.kind) {
      case "status_changed":
        return {
          recipients: event.recipients,
          title: `Issue ${STATUS_LABELS[event.to].toLowerCase()}`,
          body: event.note
            ? `Your report is now ${STATUS_LABELS[event.to]}: ${event.note}`
            : `Your report is now ${STATUS_LABELS[event.to]}.`,
          issueId: event.issueId
        };
      case "escalation":
        return {
          recipients: this.users.idsWhere({ role: "authority", unitId: event.unitId }),
          title: `Escalation tier ${event.tier}`,
          body: `Still ${STATUS_LABELS[event.status].toLowerCase()} ${hours(event.overdueMs)} hours past its deadline.`,
          issueId: event.issueId
        };
      case "no_jurisdiction":
        return {
          recipients: this.users.idsWhere({ role: "admin" }),
          title: "Unroutable report",
          body: `No unit handles ${event.category} at (${event.location.latitude}, ${event.location.longitude}).`,
          issueId: null
        };
    }
  }
}
