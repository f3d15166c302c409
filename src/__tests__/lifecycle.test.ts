import { beforeEach, describe, expect, it, vi } from "vitest";
import { canTransition, isTerminal, TRANSITIONS } from "../core/lifecycleRules.js";
import { ISSUE_STATUSES, type SessionUser } from "../types.js";
import { addUser, createTestService, HOUR_MS, KENYATTA_AVENUE, type TestContext } from "./helpers/fixtures.js";

describe("lifecycle rules", () => {
  it("only moves forward, with rejection open until closure", () => {
    const allowed = ISSUE_STATUSES.flatMap((from) =>
      ISSUE_STATUSES.filter((to) => canTransition(from, to)).map((to) => `${from}->${to}`)
    );
    expect(allowed).toEqual([
      "reported->acknowledged",
      "reported->rejected",
      "acknowledged->in_progress",
      "acknowledged->rejected",
      "in_progress->resolved",
      "in_progress->rejected"
    ]);
    expect(ISSUE_STATUSES.filter(isTerminal)).toEqual(["resolved", "rejected"]);
    expect(TRANSITIONS.resolved).toEqual([]);
  });
});

describe("LifecycleStateMachine", () => {
  let ctx: TestContext;
  let official: SessionUser;
  let issueId: string;

  beforeEach(async () => {
    ctx = createTestService();
    official = addUser(ctx.users, "authority", "nairobi-roads");
    const receipt = await ctx.service.submitReport({
      submitterId: "7",
      category: "roads",
      description: "Large pothole on Kenyatta Avenue near the roundabout",
      location: KENYATTA_AVENUE
    });
    if (!receipt.ok) throw receipt.error;
    issueId = receipt.value.issueId;
  });

  const actor = (user: SessionUser) => String(user.id);

  it("walks an issue through to resolution and records every step", async () => {
    for (const target of ["acknowledged", "in_progress", "resolved"]) {
      ctx.time.advance(HOUR_MS);
      const result = await ctx.service.transition(issueId, target, actor(official), `to ${target}`);
      expect(result.ok).toBe(true);
    }

    const issue = ctx.service.getIssue(issueId);
    if (!issue.ok) throw issue.error;
    expect(issue.value.status).toBe("resolved");
    expect(issue.value.version).toBe(3);
    expect(issue.value.lastTransitionAt).toBe("2024-03-01T11:00:00.000Z");
    expect(issue.value.events.map(({ from, to, note }) => [from, to, note])).toEqual([
      [null, "reported", null],
      ["reported", "acknowledged", "to acknowledged"],
      ["acknowledged", "in_progress", "to in_progress"],
      ["in_progress", "resolved", "to resolved"]
    ]);
    expect(ctx.service.index.size).toBe(0);
  });

  it("refuses officials of other units and citizens", async () => {
    const waterOfficial = addUser(ctx.users, "authority", "nairobi-water");
    const citizen = addUser(ctx.users, "citizen");

    for (const user of [waterOfficial, citizen]) {
      const result = await ctx.service.transition(issueId, "acknowledged", actor(user));
      expect(result.ok).toBe(false);
      if (result.ok) continue;
      expect(result.error.code).toBe("Unauthorized");
      expect(result.error.status).toBe(403);
    }
    expect(ctx.service.issues.getRecord(issueId)?.status).toBe("reported");
  });

  it("lets admins act for any unit", async () => {
    const admin = addUser(ctx.users, "admin");
    const result = await ctx.service.transition(issueId, "rejected", actor(admin), "Private property");
    expect(result.ok && result.value.to).toBe("rejected");
  });

  it("rejects moves the table does not allow", async () => {
    const result = await ctx.service.transition(issueId, "resolved", actor(official));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("InvalidTransition");
    expect(result.error.message).toBe("Cannot move issue from reported to resolved");
    expect(ctx.service.issues.events(issueId)).toHaveLength(1);
  });

  it("validates the target and note", async () => {
    const unknownTarget = await ctx.service.transition(issueId, "closed", actor(official));
    const longNote = await ctx.service.transition(issueId, "acknowledged", actor(official), "n".repeat(1001));
    for (const result of [unknownTarget, longNote]) {
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe("ValidationError");
    }
  });

  it("reports unknown issues as not found", async () => {
    const result = await ctx.service.transition("ISS-missing", "acknowledged", actor(official));
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe("NotFound");
  });

  it("treats terminal states as final", async () => {
    await ctx.service.transition(issueId, "rejected", actor(official));
    for (const target of ["reported", "acknowledged", "in_progress", "resolved", "rejected"]) {
      const result = await ctx.service.transition(issueId, target, actor(official));
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe("InvalidTransition");
    }
    expect(ctx.service.issues.getRecord(issueId)?.status).toBe("rejected");
  });

  it("lets exactly one of two racing transitions win", async () => {
    const results = await Promise.all([
      ctx.service.transition(issueId, "acknowledged", actor(official)),
      ctx.service.transition(issueId, "acknowledged", actor(official))
    ]);
    expect(results.filter((result) => result.ok)).toHaveLength(1);
    const loser = results.find((result) => !result.ok);
    expect(loser && !loser.ok && loser.error.code).toBe("InvalidTransition");
    expect(ctx.service.issues.events(issueId)).toHaveLength(2);
  });

  it("gives up with Conflict when the compare-and-swap keeps losing", async () => {
    const cas = vi.spyOn(ctx.service.issues, "compareAndSetStatus").mockReturnValue(undefined);
    const result = await ctx.service.transition(issueId, "acknowledged", actor(official));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("Conflict");
      expect(result.error.status).toBe(409);
    }
    expect(cas).toHaveBeenCalledTimes(3);
  });

  it("never records a transition earlier than the previous one", async () => {
    ctx.time.set("2024-02-29T08:00:00.000Z");
    const result = await ctx.service.transition(issueId, "acknowledged", actor(official));
    expect(result.ok && result.value.at).toBe("2024-03-01T08:00:00.000Z");
  });

  it("notifies every submitter of the issue", async () => {
    await ctx.service.submitReport({
      submitterId: "8",
      category: "roads",
      description: "Pothole on Kenyatta Avenue roundabout",
      location: KENYATTA_AVENUE
    });
    await ctx.service.transition(issueId, "acknowledged", actor(official), "Crew booked");
    expect(ctx.sink.ofKind("status_changed")).toEqual([
      { kind: "status_changed", issueId, from: "reported", to: "acknowledged", note: "Crew booked", recipients: ["7", "8"] }
    ]);
  });

  it("restarts escalation for the new status", async () => {
    ctx.time.advance(73 * HOUR_MS);
    const scan = await ctx.service.escalation.scanOnce();
    expect(scan.emitted).toBe(1);
    expect(ctx.service.escalation.tierFor(issueId, "reported")).toBe(1);

    await ctx.service.transition(issueId, "acknowledged", actor(official));
    expect(ctx.service.escalation.tierFor(issueId, "reported")).toBe(0);
    expect((await ctx.service.escalation.scanOnce()).emitted).toBe(0);
  });

  describe("setPriority", () => {
    it("updates the priority for the responsible unit", async () => {
      const result = await ctx.service.setPriority(issueId, "urgent", actor(official));
      expect(result.ok && result.value.priority).toBe("urgent");
    });

    it("rejects unknown priorities and outsiders", async () => {
      const unknown = await ctx.service.setPriority(issueId, "critical", actor(official));
      const outsider = await ctx.service.setPriority(issueId, "high", actor(addUser(ctx.users, "citizen")));
      expect(!unknown.ok && unknown.error.code).toBe("ValidationError");
      expect(!outsider.ok && outsider.error.code).toBe("Unauthorized");
      expect(ctx.service.issues.getRecord(issueId)?.priority).toBe("medium");
    });
  });
});
