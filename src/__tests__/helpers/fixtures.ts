import { UserDirectory } from "../../collaborators/identity.js";
import type { NotificationEvent, NotificationSink } from "../../collaborators/notifications.js";
import { JurisdictionRegistry } from "../../config/jurisdictions.js";
import { type Db, openDb } from "../../db.js";
import { CivicIssueService, type ServiceOptions } from "../../services/civicService.js";
import type { Clock, IssueRecord, SessionUser, UserRole } from "../../types.js";

export const HOUR_MS = 60 * 60 * 1000;

export const KENYATTA_AVENUE = { latitude: -1.286, longitude: 36.817 };
export const KENYATTA_AVENUE_NEARBY = { latitude: -1.2861, longitude: 36.8171 };

export function mutableClock(start = "2024-03-01T08:00:00.000Z") {
  let now = new Date(start).getTime();
  const clock: Clock = () => new Date(now);
  return {
    clock,
    advance(ms: number) {
      now += ms;
    },
    set(iso: string) {
      now = new Date(iso).getTime();
    },
    iso() {
      return new Date(now).toISOString();
    }
  };
}

export class RecordingSink implements NotificationSink {
  readonly events: NotificationEvent[] = [];

  async notify(event: NotificationEvent) {
    this.events.push(event);
  }

  ofKind<K extends NotificationEvent["kind"]>(kind: K) {
    return this.events.filter((event): event is Extract<NotificationEvent, { kind: K }> => event.kind === kind);
  }
}

export function nairobiRegistry() {
  return JurisdictionRegistry.fromFile("config/jurisdictions.json");
}

export const testOptions: ServiceOptions = {
  mergeRadiusMeters: 150,
  mergeThreshold: 0.75,
  transitionMaxAttempts: 3,
  escalation: {
    intervalMs: 60_000,
    thresholds: { reported: 72 * HOUR_MS, acknowledged: 168 * HOUR_MS, in_progress: 336 * HOUR_MS }
  }
};

export interface TestContext {
  db: Db;
  service: CivicIssueService;
  users: UserDirectory;
  sink: RecordingSink;
  time: ReturnType<typeof mutableClock>;
}

/** Service over a private in-memory database with a recording sink and a controllable clock. */
export function createTestService(options: Partial<ServiceOptions> = {}, withSink = true): TestContext {
  const db = openDb(":memory:");
  const users = new UserDirectory(db, 4);
  const sink = new RecordingSink();
  const time = mutableClock();
  const service = new CivicIssueService(
    { db, registry: nairobiRegistry(), users, clock: time.clock, notifier: withSink ? sink : undefined },
    { ...testOptions, ...options }
  );
  return { db, service, users, sink, time };
}

let userSeq = 0;

export function addUser(users: UserDirectory, role: UserRole, unitId: string | null = null): SessionUser {
  userSeq += 1;
  return users.create({
    email: `${role}-${userSeq}@example.test`,
    password: "test-password",
    name: `${role} ${userSeq}`,
    role,
    unitId
  });
}

export function issueRecord(overrides: Partial<IssueRecord> = {}): IssueRecord {
  return {
    id: "ISS-test",
    category: "roads",
    centroid: { ...KENYATTA_AVENUE },
    memberCount: 1,
    status: "reported",
    priority: "medium",
    unitId: "nairobi-roads",
    createdAt: "2024-03-01T08:00:00.000Z",
    lastTransitionAt: "2024-03-01T08:00:00.000Z",
    version: 0,
    ...overrides
  };
}
