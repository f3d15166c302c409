import { afterEach, describe, expect, it, vi } from "vitest";
import type { NotificationEvent, NotificationSink } from "../collaborators/notifications.js";
import { EscalationScheduler } from "../core/escalation.js";
import type { IssueRecord } from "../types.js";
import { issueRecord, mutableClock, RecordingSink } from "./helpers/fixtures.js";

const thresholds = { reported: 1_000, acknowledged: 2_000, in_progress: 3_000 };
const START = "2024-03-01T08:00:00.000Z";

function source(records: IssueRecord[]) {
  const byId = new Map(records.map((record) => [record.id, record]));
  return {
    listActive: vi.fn(() => [...byId.values()]),
    getRecord: vi.fn((id: string) => byId.get(id)),
    byId
  };
}

function scheduler(records: IssueRecord[], notifier: NotificationSink = new RecordingSink()) {
  const issues = source(records);
  const time = mutableClock(START);
  const escalation = new EscalationScheduler(issues, notifier, { intervalMs: 500, thresholds }, time.clock);
  return { issues, time, escalation };
}

describe("EscalationScheduler", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("stays quiet until the threshold passes", async () => {
    const sink = new RecordingSink();
    const { time, escalation } = scheduler([issueRecord()], sink);
    time.advance(999);
    expect(await escalation.scanOnce()).toEqual({ scanned: 1, emitted: 0, skipped: 1, failed: 0 });
    expect(sink.events).toEqual([]);
  });

  it("emits each tier once as multiples of the threshold pass", async () => {
    const sink = new RecordingSink();
    const { time, escalation } = scheduler([issueRecord()], sink);

    time.advance(1_000);
    await escalation.scanOnce();
    time.advance(500);
    await escalation.scanOnce();
    time.advance(500);
    await escalation.scanOnce();

    expect(sink.events).toEqual([
      { kind: "escalation", issueId: "ISS-test", status: "reported", unitId: "nairobi-roads", tier: 1, overdueMs: 0 },
      { kind: "escalation", issueId: "ISS-test", status: "reported", unitId: "nairobi-roads", tier: 2, overdueMs: 1_000 }
    ]);
    expect(escalation.tierFor("ISS-test", "reported")).toBe(2);
  });

  it("uses the threshold of the issue's current status", async () => {
    const sink = new RecordingSink();
    const { time, escalation } = scheduler([issueRecord({ status: "in_progress" })], sink);
    time.advance(2_999);
    expect((await escalation.scanOnce()).emitted).toBe(0);
    time.advance(1);
    expect((await escalation.scanOnce()).emitted).toBe(1);
  });

  it("skips an issue that moved on since the snapshot", async () => {
    const sink = new RecordingSink();
    const { issues, time, escalation } = scheduler([issueRecord()], sink);
    issues.getRecord.mockReturnValueOnce(issueRecord({ status: "acknowledged", lastTransitionAt: "2024-03-01T08:00:00.900Z" }));
    time.advance(1_500);

    expect(await escalation.scanOnce()).toEqual({ scanned: 1, emitted: 0, skipped: 1, failed: 0 });
    expect(escalation.tierFor("ISS-test", "reported")).toBe(0);
    expect(sink.events).toEqual([]);
  });

  it("keeps scanning when one issue fails", async () => {
    const sink = new RecordingSink();
    const { time, escalation } = scheduler(
      [
        issueRecord({ id: "ISS-broken", lastTransitionAt: "not a timestamp" }),
        issueRecord({ id: "ISS-ok" })
      ],
      sink
    );
    time.advance(1_000);

    expect(await escalation.scanOnce()).toEqual({ scanned: 2, emitted: 1, skipped: 0, failed: 1 });
    expect(sink.events.map((event) => (event.kind === "escalation" ? event.issueId : null))).toEqual(["ISS-ok"]);
  });

  it("survives a failing notification sink", async () => {
    const failing: NotificationSink = {
      notify: vi.fn(async (_event: NotificationEvent) => {
        throw new Error("sink down");
      })
    };
    const { time, escalation } = scheduler([issueRecord()], failing);
    time.advance(1_000);
    expect((await escalation.scanOnce()).emitted).toBe(1);
    expect(failing.notify).toHaveBeenCalledTimes(1);
  });

  it("emits again after its tiers are reset", async () => {
    const sink = new RecordingSink();
    const { time, escalation } = scheduler([issueRecord()], sink);
    time.advance(1_000);
    await escalation.scanOnce();
    escalation.reset("ISS-test");
    expect(escalation.tierFor("ISS-test", "reported")).toBe(0);
    await escalation.scanOnce();
    expect(sink.events).toHaveLength(2);
  });

  it("does nothing once aborted", async () => {
    const { time, escalation } = scheduler([issueRecord({ id: "ISS-1" }), issueRecord({ id: "ISS-2" })]);
    time.advance(5_000);
    const controller = new AbortController();
    controller.abort();
    expect(await escalation.scanOnce(controller.signal)).toEqual({ scanned: 0, emitted: 0, skipped: 0, failed: 0 });
  });

  it("stops between items when aborted mid-scan", async () => {
    const records = Array.from({ length: 250 }, (_unused, n) => issueRecord({ id: `ISS-${String(n).padStart(3, "0")}` }));
    const sink = new RecordingSink();
    const { time, escalation } = scheduler(records, sink);
    time.advance(1_000);
    const controller = new AbortController();

    const scan = escalation.scanOnce(controller.signal);
    controller.abort();
    const summary = await scan;

    expect(summary.scanned).toBe(100);
    expect(summary.emitted).toBe(100);
  });

  it("scans on an interval until stopped", () => {
    vi.useFakeTimers({ toFake: ["setInterval", "clearInterval"] });
    const { issues, escalation } = scheduler([issueRecord()]);
    const shutdown = new AbortController();

    escalation.start(shutdown.signal);
    expect(escalation.running).toBe(true);
    vi.advanceTimersByTime(1_000);
    expect(issues.listActive).toHaveBeenCalledTimes(2);

    shutdown.abort();
    expect(escalation.running).toBe(false);
    vi.advanceTimersByTime(1_000);
    expect(issues.listActive).toHaveBeenCalledTimes(2);
  });

  it("does not start once shutdown has begun", () => {
    vi.useFakeTimers({ toFake: ["setInterval", "clearInterval"] });
    const { issues, escalation } = scheduler([issueRecord()]);
    const shutdown = new AbortController();
    shutdown.abort();

    escalation.start(shutdown.signal);
    expect(escalation.running).toBe(false);
    vi.advanceTimersByTime(5_000);
    expect(issues.listActive).not.toHaveBeenCalled();
  });
});
