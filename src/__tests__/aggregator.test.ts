import { beforeEach, describe, expect, it, vi } from "vitest";
import { fail, NoJurisdictionError } from "../errors.js";
import { addUser, createTestService, KENYATTA_AVENUE, KENYATTA_AVENUE_NEARBY, type TestContext } from "./helpers/fixtures.js";

const POTHOLE = "Large pothole on Kenyatta Avenue near the roundabout";

function countRows(ctx: TestContext, table: "issues" | "reports") {
  return (ctx.db.prepare(`SELECT COUNT(*) AS count FROM ${table}`).get() as { count: number }).count;
}

describe("IssueAggregator", () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestService();
  });

  function submit(description = POTHOLE, location = KENYATTA_AVENUE, category = "roads", submitterId = "7") {
    return ctx.service.submitReport({ submitterId, category, description, location });
  }

  async function submitted(...args: Parameters<typeof submit>) {
    const result = await submit(...args);
    if (!result.ok) throw result.error;
    return result.value;
  }

  it("opens a new issue for the first report in an area", async () => {
    const receipt = await submitted();
    expect(receipt.created).toBe(true);
    expect(receipt.status).toBe("reported");
    expect(receipt.issueId).toMatch(/^ISS-/);

    const issue = ctx.service.getIssue(receipt.issueId);
    if (!issue.ok) throw issue.error;
    expect(issue.value.memberCount).toBe(1);
    expect(issue.value.unitId).toBe("nairobi-roads");
    expect(issue.value.reports.map((report) => report.id)).toEqual([receipt.reportId]);
    expect(issue.value.events.map(({ from, to, actorId }) => ({ from, to, actorId }))).toEqual([
      { from: null, to: "reported", actorId: "7" }
    ]);
  });

  it("merges a near duplicate and moves the centroid", async () => {
    const first = await submitted();
    const second = await submitted("Deep pothole on Kenyatta Avenue by the roundabout", KENYATTA_AVENUE_NEARBY, "roads", "8");

    expect(second.created).toBe(false);
    expect(second.issueId).toBe(first.issueId);
    const issue = ctx.service.getIssue(first.issueId);
    if (!issue.ok) throw issue.error;
    expect(issue.value.memberCount).toBe(2);
    expect(issue.value.centroid.latitude).toBeCloseTo(-1.28605, 10);
    expect(issue.value.centroid.longitude).toBeCloseTo(36.81705, 10);
    expect(ctx.service.reports.submittersOf(first.issueId)).toEqual(["7", "8"]);
  });

  it("keeps different categories and distant reports apart", async () => {
    const roads = await submitted();
    const water = await submitted("Burst water main flooding Kenyatta Avenue", KENYATTA_AVENUE, "water");
    const far = await submitted(POTHOLE, { latitude: KENYATTA_AVENUE.latitude + 0.01, longitude: KENYATTA_AVENUE.longitude });

    expect(water.created).toBe(true);
    expect(far.created).toBe(true);
    expect(new Set([roads.issueId, water.issueId, far.issueId]).size).toBe(3);
    const waterIssue = ctx.service.getIssue(water.issueId);
    expect(waterIssue.ok && waterIssue.value.unitId).toBe("nairobi-water");
  });

  it("does not merge reports whose wording differs", async () => {
    const first = await submitted();
    const other = await submitted("Streetlight broken outside school gate", KENYATTA_AVENUE_NEARBY);
    expect(other.created).toBe(true);
    expect(other.issueId).not.toBe(first.issueId);
  });

  it("resolves simultaneous duplicates into exactly one issue", async () => {
    const receipts = await Promise.all(
      Array.from({ length: 10 }, (_unused, n) => submitted(POTHOLE, KENYATTA_AVENUE, "roads", String(100 + n)))
    );

    expect(new Set(receipts.map((receipt) => receipt.issueId)).size).toBe(1);
    expect(receipts.filter((receipt) => receipt.created)).toHaveLength(1);
    expect(countRows(ctx, "issues")).toBe(1);
    const issue = ctx.service.getIssue(receipts[0]?.issueId ?? "");
    expect(issue.ok && issue.value.memberCount).toBe(10);
  });

  it("never merges into a closed issue", async () => {
    const admin = addUser(ctx.users, "admin");
    const first = await submitted();
    const rejected = await ctx.service.transition(first.issueId, "rejected", String(admin.id), "Duplicate of an older ticket");
    expect(rejected.ok).toBe(true);

    const closed = ctx.service.issues.getRecord(first.issueId);
    if (!closed) throw new Error("issue missing");
    ctx.service.index.insert(closed, [POTHOLE]);

    const next = await submitted();
    expect(next.created).toBe(true);
    expect(next.issueId).not.toBe(first.issueId);
  });

  it("returns the existing link when a report is resolved twice", async () => {
    const receipt = await submitted();
    const report = ctx.service.getReport(receipt.reportId);
    if (!report.ok) throw report.error;

    const again = await ctx.service.aggregator.resolve(report.value);
    expect(again).toEqual({ ok: true, value: { issueId: receipt.issueId, created: false, status: "reported" } });
    expect(countRows(ctx, "issues")).toBe(1);
  });

  it("rejects unroutable reports before storing anything and alerts admins", async () => {
    const result = await submit(POTHOLE, { latitude: 10, longitude: 10 });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("NoJurisdiction");
    expect(countRows(ctx, "reports")).toBe(0);
    expect(ctx.sink.ofKind("no_jurisdiction")).toEqual([
      { kind: "no_jurisdiction", category: "roads", location: { latitude: 10, longitude: 10 }, submitterId: "7" }
    ]);
  });

  it("keeps the unit chosen at submission when the table changes before the issue opens", async () => {
    const route = ctx.service.router.route.bind(ctx.service.router);
    const spy = vi
      .spyOn(ctx.service.router, "route")
      .mockImplementationOnce(route)
      .mockReturnValue(fail(new NoJurisdictionError("roads", KENYATTA_AVENUE.latitude, KENYATTA_AVENUE.longitude)));

    const receipt = await submitted();
    expect(spy).toHaveBeenCalledTimes(1);
    const issue = ctx.service.getIssue(receipt.issueId);
    if (!issue.ok) throw issue.error;
    expect(issue.value.unitId).toBe("nairobi-roads");
    expect(ctx.db.prepare("SELECT id FROM reports WHERE issue_id IS NULL").all()).toEqual([]);
  });

  it("rejects invalid input without side effects", async () => {
    const result = await submit("   ");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe("ValidationError");
    expect(countRows(ctx, "reports")).toBe(0);
    expect(countRows(ctx, "issues")).toBe(0);
  });

  it("rebuilds the index from storage on warm-up", async () => {
    const first = await submitted();
    ctx.service.index.clear();
    ctx.service.warmUp();
    expect(ctx.service.index.size).toBe(1);

    const duplicate = await submitted("Deep pothole on Kenyatta Avenue by the roundabout", KENYATTA_AVENUE_NEARBY);
    expect(duplicate.issueId).toBe(first.issueId);
  });
});
